import { AggregationError } from "../errors.js";
import { maxSeverity, severityRank, type ContraindicationFlag, type Severity } from "../schema/clinical.js";
import { STAGE_ORDER, isConfidence, type StageName } from "../schema/outcome.js";
import type {
  CaseResult,
  FlagSource,
  RankedFlag,
  StageSummary,
  StageWarning,
} from "../schema/result.js";
import type { CaseState } from "./caseState.js";

// Safety flags outrank treatment flags of equal severity.
const FLAG_SOURCE_ORDER: Record<FlagSource, number> = {
  safety_review: 0,
  treatment_planning: 1,
};

function summarize(state: CaseState, stage: StageName): StageSummary {
  const attempts = state.attempts(stage);
  const accepted = state.accepted(stage);
  if (accepted?.kind === "success") {
    if (!isConfidence(accepted.confidence)) {
      throw new AggregationError(
        `Stage ${stage} reported confidence ${accepted.confidence} outside [0, 1] in case ${state.case.id}`,
      );
    }
    return { stage, outcome: "success", attempts, confidence: accepted.confidence };
  }
  if (accepted) {
    return { stage, outcome: "degraded", attempts };
  }
  return { stage, outcome: attempts > 0 ? "failed" : "not_run", attempts };
}

function assertConsistent(state: CaseState, summaries: StageSummary[]): void {
  let upstreamAccepted = true;
  for (const summary of summaries) {
    const accepted = summary.outcome === "success" || summary.outcome === "degraded";
    if (accepted && !upstreamAccepted) {
      throw new AggregationError(
        `Stage ${summary.stage} was accepted without an accepted upstream in case ${state.case.id}`,
      );
    }
    upstreamAccepted = upstreamAccepted && accepted;
  }

  if (state.status === "completed" && !upstreamAccepted) {
    throw new AggregationError(`Case ${state.case.id} is completed but not every stage was accepted`);
  }
  if (state.status === "failed" && !state.failure) {
    throw new AggregationError(`Case ${state.case.id} failed without a recorded failure`);
  }
}

export function rankFlags(flags: RankedFlag[]): RankedFlag[] {
  return flags
    .map((flag, index) => ({ flag, index }))
    .sort((a, b) => {
      const bySeverity = severityRank(b.flag.severity) - severityRank(a.flag.severity);
      if (bySeverity !== 0) return bySeverity;
      const bySource = FLAG_SOURCE_ORDER[a.flag.source] - FLAG_SOURCE_ORDER[b.flag.source];
      if (bySource !== 0) return bySource;
      return a.index - b.index;
    })
    .map(({ flag }) => flag);
}

/**
 * Folds a CaseState into its CaseResult. Pure: the same state always yields
 * a deep-equal result, and no clock is read (`finalizedAt` is the last
 * recorded status transition).
 */
export function aggregate(state: CaseState): CaseResult {
  const summaries = STAGE_ORDER.map((stage) => summarize(state, stage));
  assertConsistent(state, summaries);

  const diagnosis = state.accepted("symptom_analysis");
  const evidence = state.accepted("evidence_validation");
  const treatment = state.accepted("treatment_planning");
  const safety = state.accepted("safety_review");

  const confidences = summaries
    .map((summary) => summary.confidence)
    .filter((value): value is number => value !== undefined);
  const overallConfidence = confidences.length > 0 ? Math.min(...confidences) : null;

  const warnings: StageWarning[] = [];
  for (const stage of STAGE_ORDER) {
    const outcome = state.accepted(stage);
    if (outcome?.kind === "degraded") {
      warnings.push({ stage, warning: outcome.warning });
    }
  }

  const flags: RankedFlag[] = [];
  const contraindications = treatment?.payload.contraindications ?? [];
  const restated = new Map<ContraindicationFlag, Severity>();
  if (safety) {
    for (const concern of safety.payload.concerns) {
      const ref = concern.contraindication;
      const original = ref
        ? contraindications.find(
            (flag) => flag.medication === ref.medication && flag.conflictsWith === ref.conflictsWith,
          )
        : undefined;
      if (original) {
        restated.set(original, maxSeverity(restated.get(original) ?? original.severity, concern.severity));
        continue;
      }
      flags.push({ source: "safety_review", severity: concern.severity, description: concern.description });
    }
  }
  for (const flag of contraindications) {
    flags.push({
      source: "treatment_planning",
      severity: restated.get(flag) ?? flag.severity,
      description: flag.detail,
      medication: flag.medication,
    });
  }

  const auditTrail = state.auditTrail();
  const lastTransition = auditTrail.transitions[auditTrail.transitions.length - 1];
  const isComplete =
    state.status === "completed" && summaries.every((summary) => summary.outcome !== "failed" && summary.outcome !== "not_run");

  const result: CaseResult = {
    caseId: state.case.id,
    patientId: state.case.patientId,
    status: state.status,
    isComplete,
    overallConfidence,
    flags: rankFlags(flags),
    warnings,
    stages: summaries,
    auditTrail,
    createdAt: state.case.createdAt,
    finalizedAt: lastTransition?.at ?? state.case.createdAt,
  };

  // assertConsistent guarantees each payload's upstream stages were accepted.
  if (diagnosis) result.diagnosis = diagnosis.payload;
  if (evidence) result.evidence = evidence.payload;
  if (treatment) result.treatmentPlan = treatment.payload;
  if (safety) result.safetyReview = safety.payload;

  const failure = state.failure;
  if (failure) {
    result.failure = failure;
  }

  return result;
}
