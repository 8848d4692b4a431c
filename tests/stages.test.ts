import { describe, expect, it } from "vitest";
import { CollaboratorError } from "../src/errors.js";
import type { Case } from "../src/schema/case.js";
import type { Evidence, SafetyReview as SafetyReviewPayload } from "../src/schema/clinical.js";
import { EvidenceValidationStage } from "../src/stages/evidenceValidation.js";
import {
  DEFAULT_APPROVED_DRUGS,
  SafetyReviewStage,
  applySafetyRules,
  type ModelSafetyReview,
} from "../src/stages/safetyReview.js";
import { SymptomAnalysisStage } from "../src/stages/symptomAnalysis.js";
import { TreatmentPlanningStage } from "../src/stages/treatmentPlanning.js";
import type { EvidenceView, SafetyView, TreatmentView } from "../src/stages/types.js";
import {
  FakeInteractions,
  FakeLlm,
  FakeRetrieval,
  diagnosis,
  diagnosisReport,
  evidenceReport,
  makeCase,
  treatmentPlan,
} from "./helpers/fakes.js";

const source: Evidence = {
  id: "pmid:1001",
  title: "Management of acute pharyngitis",
  url: "https://pubmed.ncbi.nlm.nih.gov/1001/",
  journal: "Test Journal",
  year: 2021,
};

function evidenceView(caseRecord: Case = makeCase()): EvidenceView {
  return {
    case: caseRecord,
    diagnosis: {
      kind: "success",
      payload: {
        diagnoses: [diagnosis("Streptococcal pharyngitis", 0.8), diagnosis("Viral pharyngitis", 0.5)],
        recommendedTests: [],
        redFlags: [],
      },
      confidence: 0.8,
    },
  };
}

function treatmentView(caseRecord: Case = makeCase(), primaryConfidence = 0.8): TreatmentView {
  return {
    case: caseRecord,
    diagnosis: { kind: "success", payload: diagnosisReport(primaryConfidence), confidence: primaryConfidence },
    evidence: { kind: "success", payload: evidenceReport([source]), confidence: 0.7 },
  };
}

function safetyView(caseRecord: Case = makeCase(), plan = treatmentPlan()): SafetyView {
  return {
    ...treatmentView(caseRecord),
    treatment: { kind: "success", payload: plan, confidence: 0.8 },
  };
}

describe("SymptomAnalysisStage", () => {
  const response = {
    diagnoses: [
      { name: "Viral pharyngitis", icd10Code: "j02.9", confidence: 0.4, supportingSymptoms: ["Sore Throat", "cough"] },
      { name: "Streptococcal pharyngitis", icd10Code: "J02.0", confidence: 0.7, supportingSymptoms: ["fever"] },
    ],
    recommendedTests: ["Rapid strep test"],
  };

  it("ranks diagnoses and keeps only reported supporting symptoms", async () => {
    const llm = new FakeLlm({ symptom_analysis: () => response });
    const retrieval = new FakeRetrieval([source]);
    const stage = new SymptomAnalysisStage({ llm, retrieval });

    const outcome = await stage.run({ case: makeCase() });

    expect(outcome).toEqual({
      kind: "success",
      confidence: 0.7,
      citations: ["pmid:1001"],
      payload: {
        diagnoses: [
          {
            name: "Streptococcal pharyngitis",
            icd10Code: "J02.0",
            confidence: 0.7,
            supportingSymptoms: ["fever"],
          },
          {
            name: "Viral pharyngitis",
            icd10Code: "J02.9",
            confidence: 0.4,
            supportingSymptoms: ["sore throat"],
          },
        ],
        recommendedTests: ["Rapid strep test"],
        redFlags: [],
      },
    });
    expect(retrieval.queries).toEqual([{ text: "Differential diagnosis for: fever, sore throat", limit: 3 }]);
    expect(llm.requests[0]?.input["chiefComplaint"]).toBe("Sore throat and fever");
  });

  it("degrades when literature context is unavailable", async () => {
    const stage = new SymptomAnalysisStage({
      llm: new FakeLlm({ symptom_analysis: () => response }),
      retrieval: new FakeRetrieval(new Error("search offline")),
    });

    const outcome = await stage.run({ case: makeCase() });

    expect(outcome.kind).toBe("degraded");
    expect(outcome.kind === "degraded" && outcome.warning).toBe("Literature context unavailable: search offline");
  });

  it("carries the retryable flag of a collaborator error", async () => {
    const stage = new SymptomAnalysisStage({
      llm: new FakeLlm({
        symptom_analysis: () => {
          throw new CollaboratorError("llm", "request timed out", { retryable: true });
        },
      }),
      retrieval: new FakeRetrieval(),
    });

    expect(await stage.run({ case: makeCase() })).toEqual({
      kind: "failed",
      reason: "Symptom analysis failed: llm: request timed out",
      retryable: true,
    });
  });

  it("treats a malformed response as retryable", async () => {
    const stage = new SymptomAnalysisStage({
      llm: new FakeLlm({ symptom_analysis: () => ({ diagnoses: "none" }) }),
      retrieval: new FakeRetrieval(),
    });

    const outcome = await stage.run({ case: makeCase() });

    expect(outcome.kind).toBe("failed");
    expect(outcome.kind === "failed" && outcome.retryable).toBe(true);
    expect(outcome.kind === "failed" && outcome.reason).toMatch(/^Symptom analysis returned an invalid response: diagnoses: /);
  });

  it("fails without retry when no diagnosis is produced", async () => {
    const stage = new SymptomAnalysisStage({
      llm: new FakeLlm({ symptom_analysis: () => ({ diagnoses: [] }) }),
      retrieval: new FakeRetrieval(),
    });

    expect(await stage.run({ case: makeCase() })).toEqual({
      kind: "failed",
      reason: "Symptom analysis produced no diagnoses",
      retryable: false,
    });
  });
});

describe("EvidenceValidationStage", () => {
  const synthesis = {
    evidenceLevel: "high",
    findings: [{ diagnosis: "Streptococcal pharyngitis", supported: true, summary: "Guideline supported" }],
    recommendations: ["Confirm with rapid antigen test"],
  };

  it("searches per diagnosis and de-duplicates sources", async () => {
    const retrieval = new FakeRetrieval([source]);
    const stage = new EvidenceValidationStage({
      llm: new FakeLlm({ evidence_validation: () => synthesis }),
      retrieval,
    });

    const outcome = await stage.run(evidenceView());

    expect(retrieval.queries).toEqual([
      { text: "Streptococcal pharyngitis diagnosis treatment guidelines", limit: 5 },
      { text: "Viral pharyngitis diagnosis treatment guidelines", limit: 5 },
    ]);
    expect(outcome).toEqual({
      kind: "success",
      confidence: 0.8,
      citations: ["pmid:1001"],
      payload: { ...synthesis, sources: [source] },
    });
  });

  it("degrades when no literature is found", async () => {
    const stage = new EvidenceValidationStage({
      llm: new FakeLlm({ evidence_validation: () => synthesis }),
      retrieval: new FakeRetrieval([]),
    });

    const outcome = await stage.run(evidenceView());

    expect(outcome.kind).toBe("degraded");
    expect(outcome.kind === "degraded" && outcome.warning).toBe(
      "No supporting literature found for the differential diagnosis",
    );
  });

  it("fails when a literature search fails", async () => {
    const llm = new FakeLlm({ evidence_validation: () => synthesis });
    const stage = new EvidenceValidationStage({
      llm,
      retrieval: new FakeRetrieval(new CollaboratorError("retrieval", "HTTP 503", { retryable: true, status: 503 })),
    });

    expect(await stage.run(evidenceView())).toEqual({
      kind: "failed",
      reason: "Literature search for Streptococcal pharyngitis failed: retrieval: HTTP 503",
      retryable: true,
    });
    expect(llm.requests).toHaveLength(0);
  });
});

describe("TreatmentPlanningStage", () => {
  const proposal = {
    medications: [{ name: "Amoxicillin", dose: "500 mg", frequency: "twice daily", duration: "10 days" }],
    nonPharmacological: ["Rest", "Fluids"],
    followUp: "Review in 48 hours",
  };

  it("withholds medications when the primary diagnosis is below the confidence threshold", async () => {
    const llm = new FakeLlm({ treatment_planning: () => proposal });
    const stage = new TreatmentPlanningStage({ llm, interactions: new FakeInteractions() });

    const outcome = await stage.run(treatmentView(makeCase(), 0.2));

    expect(outcome.kind).toBe("degraded");
    if (outcome.kind !== "degraded") return;
    expect(outcome.payload.medications).toEqual([]);
    expect(outcome.payload.nonPharmacological).toEqual(["Rest", "Fluids"]);
    expect(outcome.warning).toBe(
      "Primary diagnosis confidence 0.2 is below 0.3; medications withheld pending clinician review",
    );
    expect(llm.requests[0]?.input["proposeMedications"]).toBe(false);
  });

  it("flags a penicillin-class antibiotic for a penicillin-allergic patient", async () => {
    const caseRecord = makeCase({
      patient: {
        age: 42,
        sex: "female",
        medicalHistory: [],
        allergies: ["Penicillin"],
        currentMedications: [],
        consentObtained: true,
      },
    });
    const stage = new TreatmentPlanningStage({
      llm: new FakeLlm({ treatment_planning: () => proposal }),
      interactions: new FakeInteractions([
        {
          drug: "amoxicillin",
          interactsWith: "penicillin",
          severity: "high",
          description: "Penicillin-class antibiotic",
        },
      ]),
    });

    const outcome = await stage.run(treatmentView(caseRecord));

    expect(outcome.kind).toBe("success");
    if (outcome.kind !== "success") return;
    expect(outcome.confidence).toBe(0.8);
    expect(outcome.payload.monitoringProtocol).toEqual({
      vitalSigns: [],
      labTests: [],
      frequency: "As clinically indicated",
    });
    expect(outcome.payload.contraindications).toEqual([
      {
        medication: "Amoxicillin",
        kind: "allergy",
        conflictsWith: "Penicillin",
        severity: "high",
        detail: "Amoxicillin conflicts with documented Penicillin allergy: Penicillin-class antibiotic",
      },
    ]);
  });

  it("degrades when the interaction table cannot be read", async () => {
    const stage = new TreatmentPlanningStage({
      llm: new FakeLlm({ treatment_planning: () => proposal }),
      interactions: new FakeInteractions(new Error("table missing")),
    });

    const outcome = await stage.run(treatmentView());

    expect(outcome.kind).toBe("degraded");
    if (outcome.kind !== "degraded") return;
    expect(outcome.payload.medications).toHaveLength(1);
    expect(outcome.warning).toBe("Interaction lookup unavailable for Amoxicillin: table missing");
  });
});

describe("applySafetyRules", () => {
  const clean: ModelSafetyReview = {
    compliance: {
      hipaa: { passed: true, rationale: "" },
      fda: { passed: true, rationale: "" },
      ethics: { passed: true, rationale: "" },
    },
    riskLevel: "low",
    recommendation: "approve",
    concerns: [],
  };

  it("adds deterministic concerns and escalates the risk", () => {
    const caseRecord = makeCase({
      patient: {
        age: 70,
        sex: "male",
        medicalHistory: [],
        allergies: ["Penicillin"],
        currentMedications: [],
        consentObtained: false,
      },
    });
    const plan = treatmentPlan({
      medications: [
        { name: "Amoxicillin", dose: "500 mg", frequency: "twice daily" },
        { name: "Zanamivir", dose: "10 mg", frequency: "twice daily" },
      ],
      contraindications: [
        {
          medication: "Amoxicillin",
          kind: "allergy",
          conflictsWith: "Penicillin",
          severity: "high",
          detail: "Amoxicillin conflicts with documented Penicillin allergy",
        },
      ],
    });

    const review: SafetyReviewPayload = applySafetyRules(
      clean,
      safetyView(caseRecord, plan),
      new Set(DEFAULT_APPROVED_DRUGS),
    );

    expect(review.concerns).toEqual([
      { severity: "high", description: "Medication 'Zanamivir' needs FDA approval verification" },
      { severity: "high", description: "Patient consent documentation should be verified" },
      { severity: "medium", description: "Geriatric patient - consider dose adjustments and polypharmacy risks" },
      {
        severity: "high",
        description: "High-risk medication prescribed: Amoxicillin (allergy with Penicillin)",
        contraindication: { medication: "Amoxicillin", conflictsWith: "Penicillin" },
      },
    ]);
    expect(review.compliance).toEqual({
      hipaa: { passed: false, rationale: "Patient consent documentation should be verified" },
      fda: { passed: false, rationale: "Medication 'Zanamivir' needs FDA approval verification" },
      ethics: { passed: false, rationale: "Geriatric patient - consider dose adjustments and polypharmacy risks" },
    });
    expect(review.riskLevel).toBe("high");
    expect(review.recommendation).toBe("approve_with_caveats");
  });

  it("never lowers the reviewer's assessment", () => {
    const review = applySafetyRules(
      { ...clean, riskLevel: "high", recommendation: "reject" },
      safetyView(),
      new Set(DEFAULT_APPROVED_DRUGS),
    );

    expect(review.concerns).toEqual([]);
    expect(review.riskLevel).toBe("high");
    expect(review.recommendation).toBe("reject");
  });

  it("records degraded upstream stages as concerns", () => {
    const view: SafetyView = {
      ...safetyView(),
      evidence: { kind: "degraded", payload: evidenceReport(), warning: "No supporting literature" },
      treatment: { kind: "degraded", payload: treatmentPlan({ medications: [] }), warning: "medications withheld" },
    };

    const review = applySafetyRules(clean, view, new Set(DEFAULT_APPROVED_DRUGS));

    expect(review.concerns).toEqual([
      { severity: "medium", description: "Treatment plan degraded: medications withheld" },
      { severity: "low", description: "Upstream analysis degraded: No supporting literature" },
    ]);
    expect(review.riskLevel).toBe("medium");
    expect(review.recommendation).toBe("approve_with_caveats");
  });
});

describe("SafetyReviewStage", () => {
  it("derives a stricter recommendation from the reported risk", async () => {
    const stage = new SafetyReviewStage({
      llm: new FakeLlm({
        safety_review: () => ({ riskLevel: "critical", recommendation: "approve", confidence: 0.9 }),
      }),
    });

    const outcome = await stage.run(safetyView());

    expect(outcome.kind).toBe("success");
    if (outcome.kind !== "success") return;
    expect(outcome.confidence).toBe(0.9);
    expect(outcome.payload.recommendation).toBe("reject");
    expect(outcome.payload.compliance.fda).toEqual({ passed: true, rationale: "Not assessed by reviewer" });
  });

  it("falls back to the primary diagnosis confidence", async () => {
    const stage = new SafetyReviewStage({ llm: new FakeLlm({ safety_review: () => ({}) }) });

    const outcome = await stage.run(safetyView());

    expect(outcome.kind === "success" && outcome.confidence).toBe(0.8);
  });
});
