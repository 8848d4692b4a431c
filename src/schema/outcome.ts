import type { DiagnosisReport, EvidenceReport, SafetyReview, TreatmentPlan } from "./clinical.js";

export type StageName =
  | "symptom_analysis"
  | "evidence_validation"
  | "treatment_planning"
  | "safety_review";

/** Fixed topological order of the case pipeline. */
export const STAGE_ORDER: readonly StageName[] = [
  "symptom_analysis",
  "evidence_validation",
  "treatment_planning",
  "safety_review",
];

export interface StagePayloads {
  symptom_analysis: DiagnosisReport;
  evidence_validation: EvidenceReport;
  treatment_planning: TreatmentPlan;
  safety_review: SafetyReview;
}

export interface SuccessOutcome<P> {
  kind: "success";
  payload: P;
  confidence: number;
  citations?: string[];
}

export interface DegradedOutcome<P> {
  kind: "degraded";
  payload: P;
  warning: string;
}

export interface FailedOutcome {
  kind: "failed";
  reason: string;
  retryable: boolean;
}

export type StageOutcome<P> = SuccessOutcome<P> | DegradedOutcome<P> | FailedOutcome;

export type AcceptedOutcome<P> = SuccessOutcome<P> | DegradedOutcome<P>;

export function success<P>(payload: P, confidence: number, citations?: string[]): SuccessOutcome<P> {
  const outcome: SuccessOutcome<P> = { kind: "success", payload, confidence: clampConfidence(confidence) };
  if (citations && citations.length > 0) {
    outcome.citations = citations;
  }
  return outcome;
}

export function degraded<P>(payload: P, warning: string): DegradedOutcome<P> {
  return { kind: "degraded", payload, warning };
}

export function failed(reason: string, retryable: boolean): FailedOutcome {
  return { kind: "failed", reason, retryable };
}

export function isAccepted<P>(outcome: StageOutcome<P>): outcome is AcceptedOutcome<P> {
  return outcome.kind !== "failed";
}

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/** True for a finite number in [0, 1]. */
export function isConfidence(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}
