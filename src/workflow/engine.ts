import { DEFAULT_WORKFLOW_CONFIG, type WorkflowConfig } from "../config.js";
import { InvalidInputError, errorMessage } from "../errors.js";
import { log, type LogLevel } from "../logger.js";
import type { PersistenceService } from "../collaborators/types.js";
import type { Case, CaseStatus } from "../schema/case.js";
import {
  failed,
  isConfidence,
  type StageName,
  type StageOutcome,
  type StagePayloads,
} from "../schema/outcome.js";
import type { CaseResult } from "../schema/result.js";
import type { CaseStages, StageContract } from "../stages/types.js";
import { aggregate } from "./aggregator.js";
import { CaseState, type Clock } from "./caseState.js";
import { evidenceView, safetyView, symptomView, treatmentView } from "./views.js";

/** In-progress status while a stage runs, and the status once it is accepted. */
const STAGE_STATUS: Record<StageName, { running: CaseStatus; done: CaseStatus }> = {
  symptom_analysis: { running: "analyzing", done: "validating" },
  evidence_validation: { running: "validating", done: "planning" },
  treatment_planning: { running: "planning", done: "reviewing_safety" },
  safety_review: { running: "reviewing_safety", done: "completed" },
};

export interface WorkflowProgress {
  caseId: string;
  stage: StageName;
  status: CaseStatus;
  attempt: number;
  outcome?: StageOutcome<unknown>["kind"];
}

export interface ExecuteOptions {
  /** Checked before each stage; an in-flight stage call is allowed to finish. */
  signal?: AbortSignal;
  requestId?: string;
  onProgress?: (progress: WorkflowProgress) => void;
}

export interface WorkflowEngineOptions {
  stages: CaseStages;
  persistence: PersistenceService;
  config?: Pick<WorkflowConfig, "retryLimit">;
  clock?: Clock;
}

interface RunContext {
  state: CaseState;
  options: ExecuteOptions;
}

export class WorkflowEngine {
  private readonly stages: CaseStages;
  private readonly persistence: PersistenceService;
  private readonly retryLimit: number;
  private readonly clock: Clock;

  constructor(options: WorkflowEngineOptions) {
    this.stages = options.stages;
    this.persistence = options.persistence;
    this.retryLimit = Math.max(0, options.config?.retryLimit ?? DEFAULT_WORKFLOW_CONFIG.retryLimit);
    this.clock = options.clock ?? (() => new Date());
  }

  async execute(caseRecord: Case, options: ExecuteOptions = {}): Promise<CaseResult> {
    if (caseRecord.symptoms.length === 0) {
      throw new InvalidInputError(`Case ${caseRecord.id} has no symptoms to analyze`);
    }

    const context: RunContext = { state: new CaseState(caseRecord, this.clock), options };
    this.log(context, "info", "Starting case workflow", {
      patientId: caseRecord.patientId,
      symptoms: caseRecord.symptoms.length,
      retryLimit: this.retryLimit,
    });

    const completed =
      (await this.runStage(context, "symptom_analysis", this.stages.symptomAnalysis, symptomView)) &&
      (await this.runStage(context, "evidence_validation", this.stages.evidenceValidation, evidenceView)) &&
      (await this.runStage(context, "treatment_planning", this.stages.treatmentPlanning, treatmentView)) &&
      (await this.runStage(context, "safety_review", this.stages.safetyReview, safetyView));

    return this.finish(context, completed);
  }

  /** Runs one stage with its retry policy. Returns false once the pipeline has halted. */
  private async runStage<S extends StageName, V>(
    context: RunContext,
    stage: S,
    contract: StageContract<V, StagePayloads[S]>,
    buildView: (state: CaseState) => V,
  ): Promise<boolean> {
    const { state } = context;
    const view = buildView(state);
    const maxAttempts = 1 + this.retryLimit;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (context.options.signal?.aborted) {
        const reason = `Cancelled before ${stage} attempt ${attempt}`;
        state.fail(stage, "cancelled", reason, attempt - 1);
        this.log(context, "warn", "Case workflow cancelled", { stage, attempt });
        return false;
      }

      state.transition(STAGE_STATUS[stage].running);
      this.notify(context, stage, attempt);

      const outcome = await this.invoke(context, stage, contract, view);

      if (outcome.kind !== "failed") {
        state.record(stage, attempt, outcome);
        state.transition(STAGE_STATUS[stage].done);
        this.notify(context, stage, attempt, outcome.kind);
        this.log(context, outcome.kind === "success" ? "info" : "warn", `Stage ${stage} ${outcome.kind}`, {
          stage,
          attempt,
          confidence: outcome.kind === "success" ? outcome.confidence : undefined,
          warning: outcome.kind === "degraded" ? outcome.warning : undefined,
        });
        return true;
      }

      if (outcome.retryable && attempt < maxAttempts) {
        state.record(stage, attempt, outcome);
        this.notify(context, stage, attempt, outcome.kind);
        this.log(context, "warn", `Stage ${stage} failed, retrying`, {
          stage,
          attempt,
          reason: outcome.reason,
        });
        continue;
      }

      const reason =
        outcome.retryable && maxAttempts > 1
          ? `${outcome.reason} (retries exhausted after ${attempt} attempts)`
          : outcome.reason;
      state.record(stage, attempt, failed(reason, false));
      this.notify(context, stage, attempt, outcome.kind);
      state.fail(stage, "terminal_stage_failure", reason, attempt);
      this.log(context, "error", `Stage ${stage} failed; halting pipeline`, { stage, attempt, reason });
      return false;
    }

    return false;
  }

  private async invoke<S extends StageName, V>(
    context: RunContext,
    stage: S,
    contract: StageContract<V, StagePayloads[S]>,
    view: V,
  ): Promise<StageOutcome<StagePayloads[S]>> {
    try {
      const outcome = await contract.run(view);
      if (outcome.kind === "success" && !isConfidence(outcome.confidence)) {
        this.log(context, "error", `Stage ${stage} reported an invalid confidence`, {
          stage,
          confidence: String(outcome.confidence),
        });
        return failed(`${contract.name} reported confidence ${outcome.confidence} outside [0, 1]`, false);
      }
      return outcome;
    } catch (error) {
      // A stage is expected to return Failed rather than throw.
      this.log(context, "error", `Stage ${stage} threw`, { stage, error: errorMessage(error) });
      return failed(`${contract.name} threw: ${errorMessage(error)}`, false);
    }
  }

  private async finish(context: RunContext, completed: boolean): Promise<CaseResult> {
    const result = aggregate(context.state);

    try {
      await this.persistence.save(result);
    } catch (error) {
      this.log(context, "error", "Failed to persist case result", { error: errorMessage(error) });
    }

    this.log(context, completed ? "info" : "warn", `Case workflow ${result.status}`, {
      isComplete: result.isComplete,
      overallConfidence: result.overallConfidence,
      failure: result.failure,
    });
    return result;
  }

  private notify(
    context: RunContext,
    stage: StageName,
    attempt: number,
    outcome?: WorkflowProgress["outcome"],
  ): void {
    const { onProgress } = context.options;
    if (!onProgress) {
      return;
    }
    try {
      onProgress({ caseId: context.state.case.id, stage, status: context.state.status, attempt, outcome });
    } catch (error) {
      this.log(context, "warn", "Progress listener threw", { error: errorMessage(error) });
    }
  }

  private log(context: RunContext, level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    log({
      level,
      component: "workflow",
      caseId: context.state.case.id,
      requestId: context.options.requestId,
      message,
      meta,
    });
  }
}
