import { z } from "zod";
import type { LlmInvocation } from "../collaborators/types.js";
import {
  SEVERITIES,
  maxSeverity,
  severityRank,
  stricterRecommendation,
  type ComplianceCheck,
  type RiskLevel,
  type SafetyConcern,
  type SafetyRecommendation,
  type SafetyReview,
} from "../schema/clinical.js";
import { success, type StageOutcome } from "../schema/outcome.js";
import { failureFromError, normalizeName, parseModelOutput } from "./common.js";
import { SAFETY_REVIEW_INSTRUCTIONS } from "./prompts.js";
import type { SafetyView, StageContract } from "./types.js";

/** Generic names with verified FDA approval for the indications this service handles. */
export const DEFAULT_APPROVED_DRUGS: readonly string[] = [
  "acetaminophen",
  "ibuprofen",
  "aspirin",
  "amoxicillin",
  "metformin",
  "lisinopril",
  "atorvastatin",
  "omeprazole",
  "levothyroxine",
  "albuterol",
  "oseltamivir",
  "azithromycin",
];

const severitySchema = z.enum(["low", "medium", "high", "critical"]);

const complianceSchema = z.object({
  passed: z.boolean(),
  rationale: z.string().default(""),
});

const NOT_ASSESSED = { passed: true, rationale: "Not assessed by reviewer" };

const safetyResponseSchema = z.object({
  compliance: z
    .object({
      hipaa: complianceSchema.default(NOT_ASSESSED),
      fda: complianceSchema.default(NOT_ASSESSED),
      ethics: complianceSchema.default(NOT_ASSESSED),
    })
    .default({}),
  riskLevel: severitySchema.default("low"),
  recommendation: z.enum(["approve", "approve_with_caveats", "reject"]).default("approve"),
  concerns: z
    .array(z.object({ severity: severitySchema, description: z.string().min(1) }))
    .default([]),
  confidence: z.number().min(0).max(1).optional(),
});

export type ModelSafetyReview = Omit<z.output<typeof safetyResponseSchema>, "confidence">;

function recommendationFor(risk: RiskLevel): SafetyRecommendation {
  switch (risk) {
    case "low":
      return "approve";
    case "medium":
    case "high":
      return "approve_with_caveats";
    case "critical":
      return "reject";
  }
}

function withIssues(check: ComplianceCheck, issues: string[]): ComplianceCheck {
  if (issues.length === 0) {
    return check;
  }
  const rationale = [check.rationale, ...issues].filter((part) => part.length > 0).join("; ");
  return { passed: false, rationale };
}

/**
 * Layers deterministic compliance rules over the reviewer's assessment. The
 * rules can only tighten the result: risk and recommendation never drop
 * below what the reviewer reported.
 */
export function applySafetyRules(
  model: ModelSafetyReview,
  view: SafetyView,
  approvedDrugs: ReadonlySet<string>,
): SafetyReview {
  const { patient } = view.case;
  const plan = view.treatment.payload;
  const concerns: SafetyConcern[] = [...model.concerns];

  const unapproved = plan.medications
    .map((medication) => medication.name)
    .filter((name) => !approvedDrugs.has(normalizeName(name)));
  const fdaIssues = unapproved.map((name) => `Medication '${name}' needs FDA approval verification`);
  for (const issue of fdaIssues) {
    concerns.push({ severity: "high", description: issue });
  }

  const hipaaIssues: string[] = [];
  if (!patient.consentObtained) {
    hipaaIssues.push("Patient consent documentation should be verified");
    concerns.push({ severity: "high", description: "Patient consent documentation should be verified" });
  }

  const ethicsIssues: string[] = [];
  if (patient.age < 18) {
    ethicsIssues.push("Pediatric patient - ensure appropriate consent from guardian");
  } else if (patient.age > 65) {
    ethicsIssues.push("Geriatric patient - consider dose adjustments and polypharmacy risks");
  }
  for (const issue of ethicsIssues) {
    concerns.push({ severity: "medium", description: issue });
  }

  for (const flag of plan.contraindications) {
    if (severityRank(flag.severity) >= severityRank("high")) {
      concerns.push({
        severity: flag.severity,
        description: `High-risk medication prescribed: ${flag.medication} (${flag.kind} with ${flag.conflictsWith})`,
        contraindication: { medication: flag.medication, conflictsWith: flag.conflictsWith },
      });
    }
  }

  if (view.treatment.kind === "degraded") {
    concerns.push({ severity: "medium", description: `Treatment plan degraded: ${view.treatment.warning}` });
  }
  for (const upstream of [view.diagnosis, view.evidence]) {
    if (upstream.kind === "degraded") {
      concerns.push({ severity: "low", description: `Upstream analysis degraded: ${upstream.warning}` });
    }
  }

  const riskLevel = concerns.reduce<RiskLevel>(
    (level, concern) => maxSeverity(level, concern.severity),
    model.riskLevel,
  );

  return {
    compliance: {
      hipaa: withIssues(model.compliance.hipaa, hipaaIssues),
      fda: withIssues(model.compliance.fda, fdaIssues),
      ethics: withIssues(model.compliance.ethics, ethicsIssues),
    },
    riskLevel,
    recommendation: stricterRecommendation(model.recommendation, recommendationFor(riskLevel)),
    concerns,
  };
}

export interface SafetyReviewOptions {
  llm: LlmInvocation;
  approvedDrugs?: readonly string[];
}

export class SafetyReviewStage implements StageContract<SafetyView, SafetyReview> {
  readonly name = "SafetyReview";
  private readonly llm: LlmInvocation;
  private readonly approvedDrugs: ReadonlySet<string>;

  constructor(options: SafetyReviewOptions) {
    this.llm = options.llm;
    this.approvedDrugs = new Set((options.approvedDrugs ?? DEFAULT_APPROVED_DRUGS).map(normalizeName));
  }

  async run(view: SafetyView): Promise<StageOutcome<SafetyReview>> {
    const { patient } = view.case;
    const primary = view.diagnosis.payload.diagnoses[0];

    let raw: unknown;
    try {
      raw = await this.llm.invoke({
        task: "safety_review",
        instructions: SAFETY_REVIEW_INSTRUCTIONS,
        input: {
          diagnosis: primary,
          treatmentPlan: view.treatment.payload,
          demographics: {
            age: patient.age,
            sex: patient.sex,
            hasMedicalHistory: patient.medicalHistory.length > 0,
          },
          consentObtained: patient.consentObtained,
          riskLevels: SEVERITIES,
        },
        temperature: 0.1,
      });
    } catch (error) {
      return failureFromError(error, "Safety review");
    }

    const parsed = parseModelOutput(safetyResponseSchema, raw, "Safety review");
    if (!parsed.success) {
      return parsed.outcome;
    }

    const { confidence, ...model } = parsed.value;
    const review = applySafetyRules(model, view, this.approvedDrugs);
    return success(review, confidence ?? primary?.confidence ?? 0);
  }
}
