import { z } from "zod";
import type { StoredCase } from "../collaborators/types.js";
import type { ClinicalOrchestrator } from "../orchestrator.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const caseGetInputSchema = z.object({
  caseId: z.string().trim().min(1, "Case identifier is required"),
  includeAudit: z.boolean().optional(),
});

const caseGetOutputSchema = z.object({
  result: z.object({ caseId: z.string(), status: z.string(), isComplete: z.boolean() }).passthrough(),
  auditTrail: z.array(z.object({ caseId: z.string(), sequence: z.number(), stage: z.string() }).passthrough()),
});

export type CaseGetInput = z.infer<typeof caseGetInputSchema>;

export function createCaseGetTool(
  orchestrator: ClinicalOrchestrator,
): ToolDefinition<typeof caseGetInputSchema.shape, StoredCase> {
  return {
    name: "case_get",
    description: "Fetch a persisted case result and, optionally, its stage audit trail.",
    inputSchema: caseGetInputSchema,
    outputSchema: caseGetOutputSchema,
    handler: async (input: CaseGetInput, context: ToolContext) => {
      const stored = await orchestrator.getCase(input.caseId);
      if (!stored) {
        throw new Error(`Case ${input.caseId} not found`);
      }

      context.logger?.info("Fetched case", {
        caseId: input.caseId,
        status: stored.result.status,
        auditEntries: stored.auditTrail.length,
      });

      return input.includeAudit === false ? { result: stored.result, auditTrail: [] } : stored;
    },
  };
}
