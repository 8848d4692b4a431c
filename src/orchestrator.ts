import { JsonInteractionTable } from "./collaborators/interactionTable.js";
import { ProviderInvocationService } from "./collaborators/llmInvocation.js";
import { PubMedRetrievalService } from "./collaborators/pubmed.js";
import type {
  CaseListFilter,
  CaseSummary,
  InteractionTable,
  LlmInvocation,
  PersistenceService,
  RetrievalService,
  StoredCase,
} from "./collaborators/types.js";
import { DEFAULT_WORKFLOW_CONFIG, type AppConfig, type WorkflowConfig } from "./config.js";
import { JsonCaseStore } from "./data/caseStore.js";
import { InvalidInputError, errorMessage } from "./errors.js";
import { LLMProviderManager } from "./llm/LLMProviderManager.js";
import { logger } from "./logger.js";
import type { Case } from "./schema/case.js";
import type { CaseResult } from "./schema/result.js";
import { vitalsSnapshotSchema, type VitalsAssessment, type VitalsSnapshot } from "./schema/vitals.js";
import { EvidenceValidationStage } from "./stages/evidenceValidation.js";
import { SafetyReviewStage } from "./stages/safetyReview.js";
import { SymptomAnalysisStage } from "./stages/symptomAnalysis.js";
import { TreatmentPlanningStage } from "./stages/treatmentPlanning.js";
import type { CaseStages } from "./stages/types.js";
import { VitalsMonitoringStage } from "./stages/vitalsMonitoring.js";
import type { Clock } from "./workflow/caseState.js";
import { WorkflowEngine, type ExecuteOptions } from "./workflow/engine.js";

export interface OrchestratorDependencies {
  stages: CaseStages;
  persistence: PersistenceService;
  workflow?: WorkflowConfig;
  clock?: Clock;
}

/**
 * Entry points for case execution and vitals monitoring, plus read-only
 * lookups over persisted results.
 */
export class ClinicalOrchestrator {
  private readonly engine: WorkflowEngine;
  private readonly vitals: VitalsMonitoringStage;
  private readonly persistence: PersistenceService;

  constructor(dependencies: OrchestratorDependencies) {
    const workflow = dependencies.workflow ?? DEFAULT_WORKFLOW_CONFIG;
    this.persistence = dependencies.persistence;
    this.engine = new WorkflowEngine({
      stages: dependencies.stages,
      persistence: dependencies.persistence,
      config: workflow,
      clock: dependencies.clock,
    });
    this.vitals = new VitalsMonitoringStage(workflow.vitals);
  }

  executeCase(caseRecord: Case, options?: ExecuteOptions): Promise<CaseResult> {
    return this.engine.execute(caseRecord, options);
  }

  /**
   * Classifies a snapshot and appends it to the patient's series. Trends are
   * computed against `priorSnapshots` when given, otherwise against the
   * stored series.
   */
  async monitorVitals(
    patientId: string,
    snapshot: VitalsSnapshot,
    priorSnapshots?: readonly VitalsSnapshot[],
  ): Promise<VitalsAssessment> {
    const validated = vitalsSnapshotSchema.safeParse(snapshot);
    if (!validated.success) {
      throw new InvalidInputError(`Invalid vitals snapshot: ${validated.error.issues.map((issue) => issue.message).join("; ")}`);
    }
    if (validated.data.patientId !== patientId) {
      throw new InvalidInputError(`Snapshot belongs to patient ${validated.data.patientId}, not ${patientId}`);
    }

    const prior = priorSnapshots ?? (await this.storedSeries(patientId));
    const outcome = await this.vitals.run({ patientId, snapshot: validated.data, prior });
    if (outcome.kind === "failed") {
      throw new Error(`Vitals monitoring failed: ${outcome.reason}`);
    }

    await this.persistence.appendVitals(validated.data);
    if (outcome.payload.status !== "normal") {
      logger.warn("Abnormal vitals", "vitals", {
        patientId,
        status: outcome.payload.status,
        alerts: outcome.payload.alerts.map((alert) => alert.code),
      });
    }
    return outcome.payload;
  }

  getCase(caseId: string): Promise<StoredCase | undefined> {
    return this.persistence.getCase(caseId);
  }

  listCases(filter?: CaseListFilter): Promise<CaseSummary[]> {
    return this.persistence.listCases(filter);
  }

  /** Most recent `limit` snapshots for the patient, oldest first. */
  async vitalsHistory(patientId: string, limit?: number): Promise<VitalsSnapshot[]> {
    const series = await this.persistence.load(patientId);
    return limit === undefined ? series : series.slice(-limit);
  }

  private async storedSeries(patientId: string): Promise<VitalsSnapshot[]> {
    try {
      return await this.persistence.load(patientId);
    } catch (error) {
      logger.warn("Vitals history unavailable; assessing without trends", "vitals", {
        patientId,
        error: errorMessage(error),
      });
      return [];
    }
  }
}

export interface CollaboratorOverrides {
  llm?: LlmInvocation;
  retrieval?: RetrievalService;
  interactions?: InteractionTable;
  persistence?: PersistenceService;
}

/** Wires the default collaborators from configuration. */
export function createOrchestrator(config: AppConfig, overrides: CollaboratorOverrides = {}): ClinicalOrchestrator {
  const llm =
    overrides.llm ?? new ProviderInvocationService(new LLMProviderManager({ llm: config.llm }), config.llm);
  const retrieval = overrides.retrieval ?? new PubMedRetrievalService(config.retrieval);
  const interactions = overrides.interactions ?? new JsonInteractionTable(config.storage.interactionsPath);
  const persistence = overrides.persistence ?? new JsonCaseStore(config.storage.dataPath);

  return new ClinicalOrchestrator({
    stages: {
      symptomAnalysis: new SymptomAnalysisStage({ llm, retrieval }),
      evidenceValidation: new EvidenceValidationStage({
        llm,
        retrieval,
        resultsPerDiagnosis: config.retrieval.maxResults,
      }),
      treatmentPlanning: new TreatmentPlanningStage({
        llm,
        interactions,
        confidenceThreshold: config.workflow.diagnosisConfidenceThreshold,
      }),
      safetyReview: new SafetyReviewStage({ llm }),
    },
    persistence,
    workflow: config.workflow,
  });
}
