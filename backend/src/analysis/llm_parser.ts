// Request parsing through an LLM, with the keyword parser as fallback

import { Message } from "../llm/client.js";
import type { Client } from "../llm/client.js";
import { describeCause } from "../pipeline/errors.js";
import type { RequestParser } from "../pipeline/steps.js";
import { KeywordRequestParser, MODEL_TYPE_LABELS } from "./parser.js";
import { ParsedAttributesSchema } from "./types.js";
import type { AnalysisRequest, ParsedAttributes } from "./types.js";

const SYSTEM_PROMPT = `You extract the design of a health economic evaluation from a request.
Reply with a single JSON object and nothing else, using these keys:
projectName, diseaseArea, intervention, comparator,
modelType ("decision_tree" | "markov" | "psm"),
analysisType ("cost-utility" | "cost-effectiveness" | "budget-impact"),
perspective, timeHorizon (years), discountRate (fraction, e.g. 0.03),
wtpThreshold (currency per QALY), summary (one sentence).
Omit any key you cannot infer.`;

const LlmAttributesSchema = ParsedAttributesSchema.partial();

/** Pull the first JSON object out of a reply that may wrap it in prose or a fenced block. */
export function extractJsonObject(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  const candidate = fenced ? fenced[1] : text;
  const start = candidate.indexOf("{");
  const end = candidate.lastIndexOf("}");
  if (start === -1 || end <= start) {
    throw new Error("no JSON object in model reply");
  }
  return JSON.parse(candidate.slice(start, end + 1));
}

export class LLMRequestParser implements RequestParser {
  constructor(
    private client: Client,
    private model: string,
    private fallback: KeywordRequestParser = new KeywordRequestParser(),
  ) {}

  async parse(request: AnalysisRequest): Promise<ParsedAttributes> {
    const baseline = this.fallback.parseSync(request);

    let suggested: Partial<ParsedAttributes>;
    try {
      const response = await this.client.complete({
        model: this.model,
        messages: [Message.system(SYSTEM_PROMPT), Message.user(request.query)],
        responseFormat: { type: "json" },
        temperature: 0,
      });
      const parsed = LlmAttributesSchema.safeParse(extractJsonObject(Message.getText(response.message)));
      if (!parsed.success) {
        throw new Error(`model reply did not match the expected attributes: ${parsed.error.message}`);
      }
      suggested = parsed.data;
    } catch (err) {
      console.warn(`[parser] LLM parsing failed, using keyword parser: ${describeCause(err)}`);
      return baseline;
    }

    // Explicit request fields win over anything the model inferred.
    const merged: ParsedAttributes = {
      ...baseline,
      ...suggested,
      modelType: request.modelType ?? suggested.modelType ?? baseline.modelType,
      timeHorizon: request.timeHorizon ?? suggested.timeHorizon ?? baseline.timeHorizon,
      discountRate: request.discountRate ?? suggested.discountRate ?? baseline.discountRate,
      wtpThreshold: request.wtpThreshold ?? suggested.wtpThreshold ?? baseline.wtpThreshold,
      projectName: request.projectName ?? suggested.projectName ?? baseline.projectName,
    };
    if (!suggested.summary) {
      merged.summary =
        `${MODEL_TYPE_LABELS[merged.modelType]} ${merged.analysisType} analysis of ${merged.intervention} ` +
        `vs ${merged.comparator} in ${merged.diseaseArea} over ${merged.timeHorizon} years`;
    }
    return merged;
  }
}
