// The nine pipeline steps and their registry

import type {
  AnalysisRequest,
  BaseCaseResult,
  DeterministicSensitivityResult,
  EvidenceItem,
  EvidenceSearchResult,
  ModelStructure,
  ParsedAttributes,
  ProbabilisticSensitivityResult,
  ValidationResult,
} from "../analysis/types.js";
import { ContractViolation, StepExecutionError, describeCause } from "./errors.js";
import { DECLARED_OUTPUTS } from "./state.js";
import { StepNameSchema } from "./types.js";
import type {
  ControlUpdate,
  OutputKey,
  PipelineState,
  StepContext,
  StepName,
  StepOutcome,
  StepOutputs,
} from "./types.js";

export interface Step {
  readonly name: StepName;
  readonly outputs: readonly OutputKey[];
  execute(state: Readonly<PipelineState>, context: StepContext): Promise<StepOutcome>;
}

// ─── Collaborator contracts ───────────────────────────────────────────────────

export interface RequestParser {
  parse(request: AnalysisRequest): Promise<ParsedAttributes>;
}

export interface EvidenceProvider {
  search(attributes: ParsedAttributes): Promise<EvidenceSearchResult>;
}

export interface ModelBuilder {
  build(attributes: ParsedAttributes, evidence: EvidenceItem[]): Promise<ModelStructure>;
}

/** Domain problems come back as data; only infrastructure failures throw. */
export interface ModelValidator {
  validate(model: ModelStructure): Promise<ValidationResult>;
}

export interface ComputationEngine {
  computeBase(model: ModelStructure): Promise<BaseCaseResult>;
  computeExtendedA(primary: BaseCaseResult): Promise<DeterministicSensitivityResult>;
  computeExtendedB(
    primary: BaseCaseResult,
    extendedA: DeterministicSensitivityResult,
  ): Promise<ProbabilisticSensitivityResult>;
}

/** Must render whatever subset of outputs is present. */
export interface ReportRenderer {
  render(state: Readonly<PipelineState>): Promise<string>;
}

export interface Collaborators {
  parser: RequestParser;
  evidence: EvidenceProvider;
  builder: ModelBuilder;
  validator: ModelValidator;
  computation: ComputationEngine;
  reporter: ReportRenderer;
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

export function requireOutput<K extends OutputKey>(
  state: Readonly<PipelineState>,
  key: K,
  step: StepName,
): NonNullable<Partial<StepOutputs>[K]> {
  const value = state.outputs[key];
  if (value === undefined || value === null) {
    throw new StepExecutionError(step, new Error(`required input "${key}" is missing`));
  }
  return value;
}

function success(
  update: Partial<StepOutputs>,
  extras: { warnings?: string[]; notes?: string[]; control?: ControlUpdate } = {},
): StepOutcome {
  return { status: "SUCCESS", update, ...extras };
}

function failure(err: unknown): StepOutcome {
  return { status: "FAIL", failureReason: describeCause(err), cause: err };
}

// ─── Steps ────────────────────────────────────────────────────────────────────

export class ParseStep implements Step {
  readonly name = "Parse";
  readonly outputs = DECLARED_OUTPUTS.Parse;

  constructor(private parser: RequestParser) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    try {
      const parsedAttributes = await this.parser.parse(state.request);
      return success({ parsedAttributes }, { notes: [`Parsed request: ${parsedAttributes.summary}`] });
    } catch (err) {
      return failure(err);
    }
  }
}

export class RetrieveStep implements Step {
  readonly name = "Retrieve";
  readonly outputs = DECLARED_OUTPUTS.Retrieve;

  constructor(private provider: EvidenceProvider) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    const attributes = requireOutput(state, "parsedAttributes", this.name);
    try {
      const found = await this.provider.search(attributes);
      return success(
        { evidence: found.evidence, evidenceSources: found.sources },
        {
          warnings: found.missing.map((p) => `No evidence found for parameter ${p}`),
          notes: [`Retrieved ${found.evidence.length} estimates from ${found.sources.length} sources`],
        },
      );
    } catch (err) {
      return failure(err);
    }
  }
}

export class BuildStep implements Step {
  readonly name = "Build";
  readonly outputs = DECLARED_OUTPUTS.Build;

  constructor(private builder: ModelBuilder) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    const attributes = requireOutput(state, "parsedAttributes", this.name);
    const evidence = requireOutput(state, "evidence", this.name);
    try {
      const modelStructure = await this.builder.build(attributes, evidence);
      return success({ modelStructure }, { notes: [`Built ${modelStructure.modelType} model`] });
    } catch (err) {
      return failure(err);
    }
  }
}

export class ValidateStep implements Step {
  readonly name = "Validate";
  readonly outputs = DECLARED_OUTPUTS.Validate;

  constructor(private validator: ModelValidator) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    const model = requireOutput(state, "modelStructure", this.name);
    try {
      const validationResult = await this.validator.validate(model);
      return success(
        { validationResult },
        {
          warnings: validationResult.warnings,
          notes: [
            `${validationResult.errors.length} errors, ${validationResult.warnings.length} warnings, ` +
              `${validationResult.suggestions.length} suggestions`,
          ],
        },
      );
    } catch (err) {
      return failure(err);
    }
  }
}

/** Marker step: only runs on resume, to apply the external decision. */
export class AwaitingDecisionStep implements Step {
  readonly name = "Awaiting-Decision";
  readonly outputs = DECLARED_OUTPUTS["Awaiting-Decision"];

  async execute(_state: Readonly<PipelineState>, context: StepContext): Promise<StepOutcome> {
    const decision = context.decision;
    if (!decision) {
      throw new StepExecutionError(this.name, new Error("no decision supplied"));
    }
    const notes = [decision.approved ? "Decision: approved" : "Decision: rejected"];
    if (decision.commentary) notes.push(`Commentary: ${decision.commentary}`);
    return success({}, { control: { awaitingDecision: false, decision }, notes });
  }
}

export class ComputeBaseStep implements Step {
  readonly name = "Compute-Base";
  readonly outputs = DECLARED_OUTPUTS["Compute-Base"];

  constructor(private engine: ComputationEngine) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    const model = requireOutput(state, "modelStructure", this.name);
    requireOutput(state, "validationResult", this.name);
    try {
      const primaryResult = await this.engine.computeBase(model);
      return success({ primaryResult });
    } catch (err) {
      return failure(err);
    }
  }
}

export class ComputeExtendedAStep implements Step {
  readonly name = "Compute-Extended-A";
  readonly outputs = DECLARED_OUTPUTS["Compute-Extended-A"];

  constructor(private engine: ComputationEngine) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    const primary = requireOutput(state, "primaryResult", this.name);
    try {
      const extendedResultA = await this.engine.computeExtendedA(primary);
      return success({ extendedResultA });
    } catch (err) {
      return failure(err);
    }
  }
}

export class ComputeExtendedBStep implements Step {
  readonly name = "Compute-Extended-B";
  readonly outputs = DECLARED_OUTPUTS["Compute-Extended-B"];

  constructor(private engine: ComputationEngine) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    const primary = requireOutput(state, "primaryResult", this.name);
    const extendedA = requireOutput(state, "extendedResultA", this.name);
    try {
      const extendedResultB = await this.engine.computeExtendedB(primary, extendedA);
      return success({ extendedResultB });
    } catch (err) {
      return failure(err);
    }
  }
}

export class ReportStep implements Step {
  readonly name = "Report";
  readonly outputs = DECLARED_OUTPUTS.Report;

  constructor(private renderer: ReportRenderer) {}

  async execute(state: Readonly<PipelineState>): Promise<StepOutcome> {
    try {
      const reportText = await this.renderer.render(state);
      return success({ reportText });
    } catch (err) {
      return failure(err);
    }
  }
}

export class EndStep implements Step {
  readonly name = "End";
  readonly outputs = DECLARED_OUTPUTS.End;

  async execute(): Promise<StepOutcome> {
    return success({}, { control: { terminal: true } });
  }
}

// ─── Registry ─────────────────────────────────────────────────────────────────

export class StepRegistry {
  private steps = new Map<StepName, Step>();

  register(step: Step): void {
    if (this.steps.has(step.name)) {
      throw new ContractViolation(`Step already registered: ${step.name}`);
    }
    this.steps.set(step.name, step);
  }

  resolve(name: StepName): Step {
    const step = this.steps.get(name);
    if (!step) {
      throw new ContractViolation(`No step registered for ${name}`);
    }
    return step;
  }

  /** Throws unless every step the router can reach has an implementation. */
  assertComplete(): void {
    const missing = StepNameSchema.options.filter((name) => !this.steps.has(name));
    if (missing.length > 0) {
      throw new ContractViolation(`Missing step implementations: ${missing.join(", ")}`);
    }
  }
}

export function createDefaultRegistry(collaborators: Collaborators): StepRegistry {
  const registry = new StepRegistry();

  registry.register(new ParseStep(collaborators.parser));
  registry.register(new RetrieveStep(collaborators.evidence));
  registry.register(new BuildStep(collaborators.builder));
  registry.register(new ValidateStep(collaborators.validator));
  registry.register(new AwaitingDecisionStep());
  registry.register(new ComputeBaseStep(collaborators.computation));
  registry.register(new ComputeExtendedAStep(collaborators.computation));
  registry.register(new ComputeExtendedBStep(collaborators.computation));
  registry.register(new ReportStep(collaborators.reporter));
  registry.register(new EndStep());

  return registry;
}
