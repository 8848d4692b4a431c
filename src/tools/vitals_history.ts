import { z } from "zod";
import type { ClinicalOrchestrator } from "../orchestrator.js";
import type { VitalsSnapshot } from "../schema/vitals.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const vitalsHistoryInputSchema = z.object({
  patientId: z.string().trim().min(1, "Patient identifier is required"),
  limit: z.number().int().min(1).max(1000).optional(),
});

const vitalsHistoryOutputSchema = z.object({
  patientId: z.string(),
  snapshots: z.array(z.object({ patientId: z.string(), timestamp: z.string() }).passthrough()),
  count: z.number().int().nonnegative(),
});

export type VitalsHistoryInput = z.infer<typeof vitalsHistoryInputSchema>;
export type VitalsHistoryOutput = { patientId: string; snapshots: VitalsSnapshot[]; count: number };

export function createVitalsHistoryTool(
  orchestrator: ClinicalOrchestrator,
): ToolDefinition<typeof vitalsHistoryInputSchema.shape, VitalsHistoryOutput> {
  return {
    name: "vitals_history",
    description: "Return a patient's recorded vital signs snapshots, oldest first.",
    inputSchema: vitalsHistoryInputSchema,
    outputSchema: vitalsHistoryOutputSchema,
    handler: async (input: VitalsHistoryInput, context: ToolContext) => {
      const snapshots = await orchestrator.vitalsHistory(input.patientId, input.limit);
      context.logger?.info("Fetched vitals history", { patientId: input.patientId, count: snapshots.length });
      return { patientId: input.patientId, snapshots, count: snapshots.length };
    },
  };
}
