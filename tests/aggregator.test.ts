import { describe, expect, it } from "vitest";
import { AggregationError, WorkflowInvariantError } from "../src/errors.js";
import type { ContraindicationFlag } from "../src/schema/clinical.js";
import { degraded, failed, success } from "../src/schema/outcome.js";
import { aggregate, rankFlags } from "../src/workflow/aggregator.js";
import { CaseState } from "../src/workflow/caseState.js";
import {
  diagnosisReport,
  evidenceReport,
  makeCase,
  safetyReview,
  steppingClock,
  treatmentPlan,
} from "./helpers/fakes.js";

const interactionFlag: ContraindicationFlag = {
  medication: "Amoxicillin",
  kind: "interaction",
  conflictsWith: "warfarin",
  severity: "medium",
  detail: "Amoxicillin interacts with warfarin",
};

const allergyFlag: ContraindicationFlag = {
  medication: "Amoxicillin",
  kind: "allergy",
  conflictsWith: "Penicillin",
  severity: "high",
  detail: "Amoxicillin conflicts with documented Penicillin allergy",
};

function completedState(): CaseState {
  const state = new CaseState(makeCase(), steppingClock());
  state.transition("analyzing");
  state.record("symptom_analysis", 1, success(diagnosisReport(0.8), 0.8));
  state.transition("validating");
  state.record("evidence_validation", 1, success(evidenceReport(), 0.5));
  state.transition("planning");
  state.record(
    "treatment_planning",
    1,
    success(treatmentPlan({ contraindications: [interactionFlag, allergyFlag] }), 0.9),
  );
  state.transition("reviewing_safety");
  state.record(
    "safety_review",
    1,
    success(
      safetyReview({
        concerns: [
          { severity: "medium", description: "Consent documentation should be verified" },
          { severity: "low", description: "Upstream analysis degraded" },
        ],
      }),
      0.6,
    ),
  );
  state.transition("completed");
  return state;
}

describe("aggregate", () => {
  it("takes the minimum confidence over successful stages", () => {
    const result = aggregate(completedState());

    expect(result.isComplete).toBe(true);
    expect(result.overallConfidence).toBe(0.5);
    expect(result.diagnosis).toEqual(diagnosisReport(0.8));
    expect(result.safetyReview?.concerns).toHaveLength(2);
  });

  it("is idempotent over the same state", () => {
    const state = completedState();
    expect(aggregate(state)).toEqual(aggregate(state));
  });

  it("ranks flags by severity with safety concerns ahead of treatment flags on ties", () => {
    const result = aggregate(completedState());

    expect(result.flags.map((flag) => [flag.source, flag.severity, flag.description])).toEqual([
      ["treatment_planning", "high", "Amoxicillin conflicts with documented Penicillin allergy"],
      ["safety_review", "medium", "Consent documentation should be verified"],
      ["treatment_planning", "medium", "Amoxicillin interacts with warfarin"],
      ["safety_review", "low", "Upstream analysis degraded"],
    ]);
    expect(result.flags[0]?.medication).toBe("Amoxicillin");
  });

  it("folds a safety concern that restates a contraindication into the treatment flag", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("analyzing");
    state.record("symptom_analysis", 1, success(diagnosisReport(0.8), 0.8));
    state.transition("validating");
    state.record("evidence_validation", 1, success(evidenceReport(), 0.7));
    state.transition("planning");
    state.record("treatment_planning", 1, success(treatmentPlan({ contraindications: [allergyFlag] }), 0.9));
    state.transition("reviewing_safety");
    state.record(
      "safety_review",
      1,
      success(
        safetyReview({
          riskLevel: "high",
          concerns: [
            {
              severity: "high",
              description: "High-risk medication prescribed: Amoxicillin (allergy with Penicillin)",
              contraindication: { medication: "Amoxicillin", conflictsWith: "Penicillin" },
            },
            { severity: "medium", description: "Consent documentation should be verified" },
          ],
        }),
        0.6,
      ),
    );
    state.transition("completed");

    const result = aggregate(state);

    expect(result.flags).toEqual([
      {
        source: "treatment_planning",
        severity: "high",
        description: "Amoxicillin conflicts with documented Penicillin allergy",
        medication: "Amoxicillin",
      },
      { source: "safety_review", severity: "medium", description: "Consent documentation should be verified" },
    ]);
    expect(result.safetyReview?.concerns).toHaveLength(2);
  });

  it("keeps the original order among equal flags from the same source", () => {
    const ranked = rankFlags([
      { source: "treatment_planning", severity: "low", description: "first" },
      { source: "treatment_planning", severity: "low", description: "second" },
    ]);
    expect(ranked.map((flag) => flag.description)).toEqual(["first", "second"]);
  });

  it("collects warnings from degraded stages and leaves them out of the confidence", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("analyzing");
    state.record("symptom_analysis", 1, degraded(diagnosisReport(0.4), "Literature context unavailable"));
    state.transition("validating");
    state.record("evidence_validation", 1, failed("search timed out", false));
    state.fail("evidence_validation", "terminal_stage_failure", "search timed out", 1);

    const result = aggregate(state);

    expect(result.overallConfidence).toBeNull();
    expect(result.isComplete).toBe(false);
    expect(result.warnings).toEqual([{ stage: "symptom_analysis", warning: "Literature context unavailable" }]);
    expect(result.stages.map((stage) => stage.outcome)).toEqual(["degraded", "failed", "not_run", "not_run"]);
    expect(result.evidence).toBeUndefined();
  });

  it("rejects a completed case with a missing stage", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("analyzing");
    state.transition("completed");

    expect(() => aggregate(state)).toThrow(AggregationError);
  });

  it("rejects an accepted stage without an accepted upstream", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("validating");
    state.record("evidence_validation", 1, success(evidenceReport(), 0.9));

    expect(() => aggregate(state)).toThrow(AggregationError);
  });

  it("rejects a successful stage whose confidence is not in [0, 1]", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("analyzing");
    state.record("symptom_analysis", 1, { kind: "success", payload: diagnosisReport(), confidence: Number.NaN });

    expect(() => aggregate(state)).toThrow(
      new AggregationError("Stage symptom_analysis reported confidence NaN outside [0, 1] in case case_test"),
    );
  });

  it("rejects a failed case without a failure record", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("failed");

    expect(() => aggregate(state)).toThrow(AggregationError);
  });
});

describe("CaseState", () => {
  it("refuses to move the status backwards", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.transition("planning");

    expect(() => state.transition("analyzing")).toThrow(WorkflowInvariantError);
    expect(state.status).toBe("planning");
  });

  it("refuses new records once the case is terminal", () => {
    const state = new CaseState(makeCase(), steppingClock());
    state.fail("symptom_analysis", "cancelled", "Cancelled before symptom_analysis attempt 1", 0);

    expect(() => state.record("symptom_analysis", 1, success(diagnosisReport(), 0.8))).toThrow(
      WorkflowInvariantError,
    );
    expect(() => state.transition("analyzing")).toThrow(WorkflowInvariantError);
  });

  it("hands out copies of its audit trail", () => {
    const state = completedState();
    const trail = state.auditTrail();
    trail.entries.pop();

    expect(state.auditTrail().entries).toHaveLength(4);
    expect(state.auditTrail().transitions.map((transition) => transition.sequence)).toEqual([1, 3, 5, 7, 9]);
  });
});
