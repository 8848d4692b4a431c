import { z } from "zod";
import type { InteractionTable, LlmInvocation } from "../collaborators/types.js";
import { DEFAULT_WORKFLOW_CONFIG } from "../config.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { InteractionRecord, Medication, TreatmentPlan } from "../schema/clinical.js";
import { degraded, failed, success, type StageOutcome } from "../schema/outcome.js";
import { failureFromError, parseModelOutput, upstreamWarnings } from "./common.js";
import { crossReference } from "./contraindications.js";
import { TREATMENT_PLANNING_INSTRUCTIONS } from "./prompts.js";
import type { StageContract, TreatmentView } from "./types.js";

const treatmentResponseSchema = z.object({
  medications: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        dose: z.string().default("unspecified"),
        frequency: z.string().default("unspecified"),
        duration: z.string().optional(),
        route: z.string().optional(),
      }),
    )
    .default([]),
  nonPharmacological: z.array(z.string()).default([]),
  monitoringProtocol: z
    .object({
      vitalSigns: z.array(z.string()).default([]),
      labTests: z.array(z.string()).default([]),
      frequency: z.string().default("As clinically indicated"),
    })
    .default({}),
  followUp: z.string().default("Follow up with the treating clinician"),
  patientEducation: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).optional(),
});

export interface TreatmentPlanningOptions {
  llm: LlmInvocation;
  interactions: InteractionTable;
  /** Primary diagnosis confidence below which no medications are proposed. */
  confidenceThreshold?: number;
}

export class TreatmentPlanningStage implements StageContract<TreatmentView, TreatmentPlan> {
  readonly name = "TreatmentPlanning";
  private readonly llm: LlmInvocation;
  private readonly interactions: InteractionTable;
  private readonly confidenceThreshold: number;

  constructor(options: TreatmentPlanningOptions) {
    this.llm = options.llm;
    this.interactions = options.interactions;
    this.confidenceThreshold =
      options.confidenceThreshold ?? DEFAULT_WORKFLOW_CONFIG.diagnosisConfidenceThreshold;
  }

  async run(view: TreatmentView): Promise<StageOutcome<TreatmentPlan>> {
    const { patient } = view.case;
    const primary = view.diagnosis.payload.diagnoses[0];
    if (!primary) {
      return failed("Treatment planning requires a primary diagnosis", false);
    }

    const gated = primary.confidence < this.confidenceThreshold;

    let raw: unknown;
    try {
      raw = await this.llm.invoke({
        task: "treatment_planning",
        instructions: TREATMENT_PLANNING_INSTRUCTIONS,
        input: {
          diagnosis: { name: primary.name, icd10Code: primary.icd10Code, confidence: primary.confidence },
          patient: {
            age: patient.age,
            sex: patient.sex,
            allergies: patient.allergies,
            comorbidities: patient.medicalHistory,
            currentMedications: patient.currentMedications,
          },
          evidenceRecommendations: view.evidence.payload.recommendations,
          upstreamWarnings: upstreamWarnings(view.diagnosis, view.evidence),
          proposeMedications: !gated,
        },
        temperature: 0.3,
      });
    } catch (error) {
      return failureFromError(error, "Treatment planning");
    }

    const parsed = parseModelOutput(treatmentResponseSchema, raw, "Treatment planning");
    if (!parsed.success) {
      return parsed.outcome;
    }

    const warnings: string[] = [];
    let medications: Medication[] = parsed.value.medications;
    if (gated) {
      medications = [];
      warnings.push(
        `Primary diagnosis confidence ${primary.confidence} is below ${this.confidenceThreshold}; medications withheld pending clinician review`,
      );
    }

    const records: InteractionRecord[] = [];
    for (const medication of medications) {
      try {
        records.push(...(await this.interactions.lookup(medication.name)));
      } catch (error) {
        warnings.push(`Interaction lookup unavailable for ${medication.name}: ${errorMessage(error)}`);
        logger.warn("Interaction lookup failed", "stage:treatment_planning", {
          caseId: view.case.id,
          medication: medication.name,
          error: errorMessage(error),
        });
      }
    }

    const plan: TreatmentPlan = {
      medications,
      nonPharmacological: parsed.value.nonPharmacological,
      monitoringProtocol: parsed.value.monitoringProtocol,
      followUp: parsed.value.followUp,
      patientEducation: parsed.value.patientEducation,
      contraindications: crossReference(patient, medications, records),
    };

    if (warnings.length > 0) {
      return degraded(plan, warnings.join("; "));
    }
    return success(plan, parsed.value.confidence ?? primary.confidence);
  }
}
