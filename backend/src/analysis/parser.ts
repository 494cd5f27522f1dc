// Keyword-based request parsing

import type { RequestParser } from "../pipeline/steps.js";
import { DiscountRateSchema, TimeHorizonSchema, WtpThresholdSchema } from "./types.js";
import type { AnalysisRequest, AnalysisType, ModelType, ParsedAttributes } from "./types.js";

export interface ParserDefaults {
  modelType: ModelType;
  timeHorizon: number;
  discountRate: number;
  wtpThreshold: number;
}

export const PARSER_DEFAULTS: ParserDefaults = {
  modelType: "markov",
  timeHorizon: 10,
  discountRate: 0.03,
  wtpThreshold: 50000,
};

export const MODEL_TYPE_LABELS: Record<ModelType, string> = {
  decision_tree: "Decision tree",
  markov: "Markov",
  psm: "Partitioned survival",
};

const COMPARISON =
  /([a-z0-9][\w\- ]*?)\s+(?:vs\.?|versus|compared (?:to|with))\s+([a-z0-9][\w\-]*(?: [\w\-]+)*?)(?=\s+(?:for|in|over|with|among|at)\b|[.,;:]|$)/i;
const LEAD_WORDS = /\b(?:of|comparing|compare|evaluating|evaluate|assessing|assess|between)\b/i;
const POPULATION =
  /\b(?:for|in)\s+(?:patients with\s+)?([a-z0-9][\w\-]*(?: [\w\-]+)*?)(?=\s+(?:over|with|at|using|vs\.?|versus|from|and)\b|[.,;:]|$)/gi;
const HORIZON = /(\d+)[- ]?(?:years?|yrs?)\b/i;
const DISCOUNT = /(\d+(?:\.\d+)?)\s*%\s*discount/i;
const WTP = /\$?\s?(\d[\d,]*)\s*(?:per|\/)\s*qaly/i;

export function detectModelType(query: string): ModelType | undefined {
  const q = query.toLowerCase();
  if (q.includes("markov")) return "markov";
  if (q.includes("partitioned survival") || /\bpsm\b/.test(q)) return "psm";
  if (q.includes("decision tree")) return "decision_tree";
  return undefined;
}

export function detectAnalysisType(query: string): AnalysisType {
  const q = query.toLowerCase();
  if (q.includes("budget impact")) return "budget-impact";
  if (/cost[- ]effectiveness/.test(q) && !q.includes("qaly")) return "cost-effectiveness";
  return "cost-utility";
}

export function extractComparison(query: string): { intervention: string; comparator: string } | undefined {
  const match = COMPARISON.exec(query);
  if (!match) return undefined;
  const left = match[1].split(LEAD_WORDS);
  const intervention = left[left.length - 1].trim();
  const comparator = match[2].trim();
  if (!intervention || !comparator) return undefined;
  return { intervention, comparator };
}

export function extractDiseaseArea(query: string): string | undefined {
  let last: string | undefined;
  for (const match of query.matchAll(POPULATION)) {
    last = match[1].trim();
  }
  return last;
}

/** First match of `pattern` as a number, or undefined when absent or rejected by `accept`. */
function extractNumber(pattern: RegExp, query: string, accept: (value: number) => boolean): number | undefined {
  const match = pattern.exec(query);
  if (!match) return undefined;
  const value = Number(match[1].replace(/,/g, ""));
  return Number.isFinite(value) && accept(value) ? value : undefined;
}

const validHorizon = (years: number) => TimeHorizonSchema.safeParse(years).success;
const validDiscountPercent = (percent: number) => DiscountRateSchema.safeParse(percent / 100).success;
const validWtp = (wtp: number) => WtpThresholdSchema.safeParse(wtp).success;

export class KeywordRequestParser implements RequestParser {
  constructor(private defaults: ParserDefaults = PARSER_DEFAULTS) {}

  async parse(request: AnalysisRequest): Promise<ParsedAttributes> {
    return this.parseSync(request);
  }

  parseSync(request: AnalysisRequest): ParsedAttributes {
    const query = request.query;
    const comparison = extractComparison(query);
    const intervention = comparison?.intervention ?? "Intervention";
    const comparator = comparison?.comparator ?? "Standard of care";
    const diseaseArea = extractDiseaseArea(query) ?? "Unspecified";
    const modelType = request.modelType ?? detectModelType(query) ?? this.defaults.modelType;
    const analysisType = detectAnalysisType(query);

    const discountPercent = extractNumber(DISCOUNT, query, validDiscountPercent);
    const timeHorizon = request.timeHorizon ?? extractNumber(HORIZON, query, validHorizon) ?? this.defaults.timeHorizon;
    const discountRate =
      request.discountRate ?? (discountPercent !== undefined ? discountPercent / 100 : this.defaults.discountRate);
    const wtpThreshold = request.wtpThreshold ?? extractNumber(WTP, query, validWtp) ?? this.defaults.wtpThreshold;

    const projectName =
      request.projectName ?? (comparison ? `${intervention} vs ${comparator}` : "Health Economics Analysis");

    return {
      projectName,
      diseaseArea,
      intervention,
      comparator,
      modelType,
      analysisType,
      perspective: /societal/i.test(query) ? "societal" : "healthcare payer",
      timeHorizon,
      discountRate,
      wtpThreshold,
      summary:
        `${MODEL_TYPE_LABELS[modelType]} ${analysisType} analysis of ${intervention} vs ${comparator} ` +
        `in ${diseaseArea} over ${timeHorizon} years`,
    };
  }
}
