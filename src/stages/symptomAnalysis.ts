import { z } from "zod";
import type { LlmInvocation, RetrievalService } from "../collaborators/types.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { Diagnosis, DiagnosisReport, Evidence } from "../schema/clinical.js";
import {
  clampConfidence,
  degraded,
  failed,
  success,
  type StageOutcome,
} from "../schema/outcome.js";
import { failureFromError, normalizeName, parseModelOutput } from "./common.js";
import { SYMPTOM_ANALYSIS_INSTRUCTIONS } from "./prompts.js";
import type { StageContract, SymptomView } from "./types.js";

const severitySchema = z.enum(["low", "medium", "high", "critical"]);

const symptomResponseSchema = z.object({
  diagnoses: z.array(
    z.object({
      name: z.string().trim().min(1),
      icd10Code: z.string().trim().min(1),
      confidence: z.number().min(0).max(1),
      supportingSymptoms: z.array(z.string()).default([]),
      reasoning: z.string().optional(),
      urgency: severitySchema.optional(),
    }),
  ),
  recommendedTests: z.array(z.string()).default([]),
  redFlags: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).optional(),
});

export interface SymptomAnalysisOptions {
  llm: LlmInvocation;
  retrieval: RetrievalService;
  contextResults?: number;
}

export class SymptomAnalysisStage implements StageContract<SymptomView, DiagnosisReport> {
  readonly name = "SymptomAnalysis";
  private readonly llm: LlmInvocation;
  private readonly retrieval: RetrievalService;
  private readonly contextResults: number;

  constructor(options: SymptomAnalysisOptions) {
    this.llm = options.llm;
    this.retrieval = options.retrieval;
    this.contextResults = options.contextResults ?? 3;
  }

  async run(view: SymptomView): Promise<StageOutcome<DiagnosisReport>> {
    const { case: caseRecord } = view;
    const symptomNames = caseRecord.symptoms.map((symptom) => symptom.name);

    let literature: Evidence[] = [];
    let contextWarning: string | undefined;
    try {
      literature = await this.retrieval.search({
        text: `Differential diagnosis for: ${symptomNames.join(", ")}`,
        limit: this.contextResults,
      });
    } catch (error) {
      contextWarning = `Literature context unavailable: ${errorMessage(error)}`;
      logger.warn("Symptom analysis continuing without literature context", "stage:symptom_analysis", {
        caseId: caseRecord.id,
        error: errorMessage(error),
      });
    }

    let raw: unknown;
    try {
      raw = await this.llm.invoke({
        task: "symptom_analysis",
        instructions: SYMPTOM_ANALYSIS_INSTRUCTIONS,
        input: {
          symptoms: caseRecord.symptoms,
          chiefComplaint: caseRecord.chiefComplaint,
          onset: caseRecord.onset,
          age: caseRecord.patient.age,
          sex: caseRecord.patient.sex,
          medicalHistory: caseRecord.patient.medicalHistory,
          literature: literature.map((item) => ({ title: item.title, journal: item.journal, year: item.year })),
        },
        temperature: 0.3,
      });
    } catch (error) {
      return failureFromError(error, "Symptom analysis");
    }

    const parsed = parseModelOutput(symptomResponseSchema, raw, "Symptom analysis");
    if (!parsed.success) {
      return parsed.outcome;
    }

    // Supporting symptoms are restricted to symptoms the case actually reports.
    const reported = new Map(symptomNames.map((name) => [normalizeName(name), name]));
    const diagnoses: Diagnosis[] = parsed.value.diagnoses
      .map((entry) => {
        const supporting = entry.supportingSymptoms
          .map((name) => reported.get(normalizeName(name)))
          .filter((name): name is string => name !== undefined);
        const diagnosis: Diagnosis = {
          name: entry.name,
          icd10Code: entry.icd10Code.toUpperCase(),
          confidence: clampConfidence(entry.confidence),
          supportingSymptoms: Array.from(new Set(supporting)),
        };
        if (entry.reasoning) diagnosis.reasoning = entry.reasoning;
        if (entry.urgency) diagnosis.urgency = entry.urgency;
        return diagnosis;
      })
      .sort((a, b) => b.confidence - a.confidence);

    const primary = diagnoses[0];
    if (!primary) {
      return failed("Symptom analysis produced no diagnoses", false);
    }

    const report: DiagnosisReport = {
      diagnoses,
      recommendedTests: parsed.value.recommendedTests,
      redFlags: parsed.value.redFlags,
    };

    if (contextWarning) {
      return degraded(report, contextWarning);
    }
    return success(
      report,
      parsed.value.confidence ?? primary.confidence,
      literature.map((item) => item.id),
    );
  }
}
