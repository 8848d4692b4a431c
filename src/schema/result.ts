import type { CaseStatus } from "./case.js";
import type {
  DiagnosisReport,
  EvidenceReport,
  SafetyReview,
  Severity,
  TreatmentPlan,
} from "./clinical.js";
import type { StageName, StageOutcome, StagePayloads } from "./outcome.js";

export type FailureKind = "terminal_stage_failure" | "cancelled";

export interface StageFailure {
  stage: StageName;
  kind: FailureKind;
  reason: string;
  attempts: number;
}

export interface StageEntry<S extends StageName = StageName> {
  sequence: number;
  stage: S;
  attempt: number;
  outcome: StageOutcome<StagePayloads[S]>;
  recordedAt: string;
}

export interface StatusTransition {
  sequence: number;
  from: CaseStatus;
  to: CaseStatus;
  at: string;
  reason?: string;
}

export interface AuditTrail {
  entries: StageEntry[];
  transitions: StatusTransition[];
}

export type FlagSource = "safety_review" | "treatment_planning";

export interface RankedFlag {
  source: FlagSource;
  severity: Severity;
  description: string;
  medication?: string;
}

export interface StageWarning {
  stage: StageName;
  warning: string;
}

export interface StageSummary {
  stage: StageName;
  outcome: "success" | "degraded" | "failed" | "not_run";
  attempts: number;
  confidence?: number;
}

export interface CaseResult {
  caseId: string;
  patientId: string;
  status: CaseStatus;
  isComplete: boolean;
  /** Minimum confidence across successful stages; null when no stage succeeded. */
  overallConfidence: number | null;
  diagnosis?: DiagnosisReport;
  evidence?: EvidenceReport;
  treatmentPlan?: TreatmentPlan;
  safetyReview?: SafetyReview;
  flags: RankedFlag[];
  warnings: StageWarning[];
  failure?: StageFailure;
  stages: StageSummary[];
  auditTrail: AuditTrail;
  createdAt: string;
  finalizedAt: string;
}
