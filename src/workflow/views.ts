import { WorkflowInvariantError } from "../errors.js";
import type { StageName, StagePayloads } from "../schema/outcome.js";
import type {
  EvidenceView,
  SafetyView,
  SymptomView,
  TreatmentView,
  UpstreamResult,
} from "../stages/types.js";
import type { CaseState } from "./caseState.js";

function upstream<S extends StageName>(state: CaseState, stage: S): UpstreamResult<StagePayloads[S]> {
  const outcome = state.accepted(stage);
  if (!outcome) {
    throw new WorkflowInvariantError(
      `Upstream stage ${stage} has no accepted outcome in case ${state.case.id}`,
    );
  }
  if (outcome.kind === "success") {
    return { kind: "success", payload: outcome.payload, confidence: outcome.confidence };
  }
  return { kind: "degraded", payload: outcome.payload, warning: outcome.warning };
}

export function symptomView(state: CaseState): SymptomView {
  return { case: state.case };
}

export function evidenceView(state: CaseState): EvidenceView {
  return {
    case: state.case,
    diagnosis: upstream(state, "symptom_analysis"),
  };
}

export function treatmentView(state: CaseState): TreatmentView {
  return {
    case: state.case,
    diagnosis: upstream(state, "symptom_analysis"),
    evidence: upstream(state, "evidence_validation"),
  };
}

export function safetyView(state: CaseState): SafetyView {
  return {
    case: state.case,
    diagnosis: upstream(state, "symptom_analysis"),
    evidence: upstream(state, "evidence_validation"),
    treatment: upstream(state, "treatment_planning"),
  };
}
