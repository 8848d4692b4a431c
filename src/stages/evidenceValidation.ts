import { z } from "zod";
import type { LlmInvocation, RetrievalService } from "../collaborators/types.js";
import type { Evidence, EvidenceReport } from "../schema/clinical.js";
import { degraded, success, type StageOutcome } from "../schema/outcome.js";
import { failureFromError, parseModelOutput, upstreamWarnings } from "./common.js";
import { EVIDENCE_VALIDATION_INSTRUCTIONS } from "./prompts.js";
import type { EvidenceView, StageContract } from "./types.js";

const evidenceResponseSchema = z.object({
  evidenceLevel: z.enum(["high", "moderate", "low", "unknown"]).default("unknown"),
  findings: z
    .array(
      z.object({
        diagnosis: z.string(),
        supported: z.boolean(),
        summary: z.string().default(""),
      }),
    )
    .default([]),
  recommendations: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).optional(),
});

export interface EvidenceValidationOptions {
  llm: LlmInvocation;
  retrieval: RetrievalService;
  /** How many of the ranked diagnoses to research. */
  diagnosesToValidate?: number;
  resultsPerDiagnosis?: number;
}

export class EvidenceValidationStage implements StageContract<EvidenceView, EvidenceReport> {
  readonly name = "EvidenceValidation";
  private readonly llm: LlmInvocation;
  private readonly retrieval: RetrievalService;
  private readonly diagnosesToValidate: number;
  private readonly resultsPerDiagnosis: number;

  constructor(options: EvidenceValidationOptions) {
    this.llm = options.llm;
    this.retrieval = options.retrieval;
    this.diagnosesToValidate = options.diagnosesToValidate ?? 3;
    this.resultsPerDiagnosis = options.resultsPerDiagnosis ?? 5;
  }

  async run(view: EvidenceView): Promise<StageOutcome<EvidenceReport>> {
    const candidates = view.diagnosis.payload.diagnoses.slice(0, this.diagnosesToValidate);

    const sources = new Map<string, Evidence>();
    for (const diagnosis of candidates) {
      try {
        const found = await this.retrieval.search({
          text: `${diagnosis.name} diagnosis treatment guidelines`,
          limit: this.resultsPerDiagnosis,
        });
        for (const item of found) {
          if (!sources.has(item.id)) {
            sources.set(item.id, item);
          }
        }
      } catch (error) {
        return failureFromError(error, `Literature search for ${diagnosis.name}`);
      }
    }

    let raw: unknown;
    try {
      raw = await this.llm.invoke({
        task: "evidence_validation",
        instructions: EVIDENCE_VALIDATION_INSTRUCTIONS,
        input: {
          diagnoses: candidates.map(({ name, icd10Code, confidence, reasoning }) => ({
            name,
            icd10Code,
            confidence,
            reasoning,
          })),
          sources: Array.from(sources.values()).map(({ id, title, journal, year }) => ({ id, title, journal, year })),
          upstreamWarnings: upstreamWarnings(view.diagnosis),
        },
        temperature: 0.2,
      });
    } catch (error) {
      return failureFromError(error, "Evidence synthesis");
    }

    const parsed = parseModelOutput(evidenceResponseSchema, raw, "Evidence synthesis");
    if (!parsed.success) {
      return parsed.outcome;
    }

    const report: EvidenceReport = {
      evidenceLevel: parsed.value.evidenceLevel,
      findings: parsed.value.findings,
      recommendations: parsed.value.recommendations,
      sources: Array.from(sources.values()),
    };

    if (report.sources.length === 0) {
      return degraded(report, "No supporting literature found for the differential diagnosis");
    }

    const fallback = view.diagnosis.payload.diagnoses[0]?.confidence ?? 0;
    return success(
      report,
      parsed.value.confidence ?? fallback,
      report.sources.map((source) => source.id),
    );
  }
}
