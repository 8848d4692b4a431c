import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { ClinicalOrchestrator } from "../orchestrator.js";
import { buildCase, caseInputSchema } from "../schema/case.js";
import { STAGE_ORDER } from "../schema/outcome.js";
import type { CaseResult } from "../schema/result.js";
import type { WorkflowProgress } from "../workflow/engine.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const caseExecuteOutputSchema = z.object({
  caseId: z.string(),
  patientId: z.string(),
  status: z.string(),
  isComplete: z.boolean(),
  overallConfidence: z.number().nullable(),
  flags: z.array(z.object({ source: z.string(), severity: z.string(), description: z.string() }).passthrough()),
  warnings: z.array(z.object({ stage: z.string(), warning: z.string() })),
});

export type CaseExecuteInput = z.infer<typeof caseInputSchema>;

function progressMessage(progress: WorkflowProgress): string {
  return progress.outcome
    ? `${progress.stage} attempt ${progress.attempt}: ${progress.outcome}`
    : `${progress.stage} attempt ${progress.attempt} started`;
}

export function createCaseExecuteTool(
  orchestrator: ClinicalOrchestrator,
): ToolDefinition<typeof caseInputSchema.shape, CaseResult> {
  return {
    name: "case_execute",
    description:
      "Run a patient case through symptom analysis, evidence validation, treatment planning and safety review, and return the aggregated result.",
    inputSchema: caseInputSchema,
    outputSchema: caseExecuteOutputSchema,
    handler: async (input: CaseExecuteInput, context: ToolContext) => {
      const caseRecord = buildCase(input, {
        id: `case_${randomUUID()}`,
        createdAt: context.now().toISOString(),
      });

      const pending: Array<Promise<void>> = [];
      const { reportProgress } = context;
      const onProgress = reportProgress
        ? (progress: WorkflowProgress) => {
            const index = STAGE_ORDER.indexOf(progress.stage);
            pending.push(
              reportProgress({
                progress: progress.outcome && progress.outcome !== "failed" ? index + 1 : index,
                total: STAGE_ORDER.length,
                message: progressMessage(progress),
              }).catch((error: unknown) => {
                context.logger?.error("Failed to send progress notification", { error });
              }),
            );
          }
        : undefined;

      const result = await orchestrator.executeCase(caseRecord, {
        signal: context.signal,
        requestId: context.requestId,
        onProgress,
      });
      await Promise.all(pending);

      context.logger?.info("Executed case", {
        caseId: result.caseId,
        status: result.status,
        isComplete: result.isComplete,
        overallConfidence: result.overallConfidence,
      });

      return result;
    },
  };
}
