import type { Case } from "../schema/case.js";
import type {
  DiagnosisReport,
  EvidenceReport,
  SafetyReview,
  TreatmentPlan,
} from "../schema/clinical.js";
import type { StageOutcome } from "../schema/outcome.js";
import type { VitalsSnapshot } from "../schema/vitals.js";

/**
 * The one capability every analysis stage implements. The engine only
 * depends on this contract and on the outcome variant it returns.
 */
export interface StageContract<View, Payload> {
  readonly name: string;
  run(view: View): Promise<StageOutcome<Payload>>;
}

/**
 * An upstream result as a downstream stage sees it. Failed outcomes never
 * reach a view; degraded ones carry their warning.
 */
export type UpstreamResult<P> =
  | { kind: "success"; payload: P; confidence: number }
  | { kind: "degraded"; payload: P; warning: string };

export interface SymptomView {
  readonly case: Case;
}

export interface EvidenceView {
  readonly case: Case;
  readonly diagnosis: UpstreamResult<DiagnosisReport>;
}

export interface TreatmentView {
  readonly case: Case;
  readonly diagnosis: UpstreamResult<DiagnosisReport>;
  readonly evidence: UpstreamResult<EvidenceReport>;
}

export interface SafetyView {
  readonly case: Case;
  readonly diagnosis: UpstreamResult<DiagnosisReport>;
  readonly evidence: UpstreamResult<EvidenceReport>;
  readonly treatment: UpstreamResult<TreatmentPlan>;
}

export interface VitalsView {
  readonly patientId: string;
  readonly snapshot: VitalsSnapshot;
  /** Earlier snapshots for the same patient, oldest first. */
  readonly prior: readonly VitalsSnapshot[];
}

export interface CaseStages {
  symptomAnalysis: StageContract<SymptomView, DiagnosisReport>;
  evidenceValidation: StageContract<EvidenceView, EvidenceReport>;
  treatmentPlanning: StageContract<TreatmentView, TreatmentPlan>;
  safetyReview: StageContract<SafetyView, SafetyReview>;
}
