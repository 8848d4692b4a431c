import { z } from "zod";
import type { CaseSummary } from "../collaborators/types.js";
import type { ClinicalOrchestrator } from "../orchestrator.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const statusValues = [
  "pending",
  "analyzing",
  "validating",
  "planning",
  "reviewing_safety",
  "completed",
  "failed",
] as const;

const caseSummarySchema = z.object({
  caseId: z.string(),
  patientId: z.string(),
  status: z.enum(statusValues),
  isComplete: z.boolean(),
  overallConfidence: z.number().nullable(),
  primaryDiagnosis: z.string().optional(),
  createdAt: z.string(),
  finalizedAt: z.string(),
});

const caseListInputSchema = z.object({
  patientId: z.string().trim().min(1).optional(),
  status: z.enum(statusValues).optional(),
  limit: z.number().int().min(1).max(500).optional(),
});

const caseListOutputSchema = z.object({
  cases: z.array(caseSummarySchema),
  count: z.number().int().nonnegative(),
});

export type CaseListInput = z.infer<typeof caseListInputSchema>;
export type CaseListOutput = { cases: CaseSummary[]; count: number };

export function createCaseListTool(
  orchestrator: ClinicalOrchestrator,
): ToolDefinition<typeof caseListInputSchema.shape, CaseListOutput> {
  return {
    name: "case_list",
    description: "List persisted case results, newest first, filtered by patient or status.",
    inputSchema: caseListInputSchema,
    outputSchema: caseListOutputSchema,
    handler: async (input: CaseListInput, context: ToolContext) => {
      const cases = await orchestrator.listCases({
        patientId: input.patientId,
        status: input.status,
        limit: input.limit,
      });

      context.logger?.info("Listed cases", { count: cases.length });

      return { cases, count: cases.length };
    },
  };
}
