import { z } from "zod";
import type { ClinicalOrchestrator } from "../orchestrator.js";
import { vitalsSnapshotSchema, type VitalsAssessment } from "../schema/vitals.js";
import type { ToolContext, ToolDefinition } from "./types.js";

const severitySchema = z.enum(["low", "medium", "high", "critical"]);

const vitalsMonitorInputSchema = z.object({
  snapshot: vitalsSnapshotSchema,
  priorSnapshots: z.array(vitalsSnapshotSchema).optional(),
});

const vitalsMonitorOutputSchema = z.object({
  patientId: z.string(),
  timestamp: z.string(),
  status: z.enum(["normal", "abnormal", "critical"]),
  alerts: z.array(
    z.object({
      code: z.string(),
      vital: z.string(),
      value: z.number(),
      severity: severitySchema,
      message: z.string(),
      actionRequired: z.string(),
    }),
  ),
  trends: z.array(
    z.object({
      vital: z.string(),
      direction: z.enum(["rising", "falling", "stable"]),
      change: z.number(),
      previous: z.number(),
      current: z.number(),
    }),
  ),
  comparedWith: z.string().optional(),
});

export type VitalsMonitorInput = z.infer<typeof vitalsMonitorInputSchema>;

export function createVitalsMonitorTool(
  orchestrator: ClinicalOrchestrator,
): ToolDefinition<typeof vitalsMonitorInputSchema.shape, VitalsAssessment> {
  return {
    name: "vitals_monitor",
    description:
      "Classify a vital signs snapshot into alerts, compute trends against the previous reading and record it in the patient's series.",
    inputSchema: vitalsMonitorInputSchema,
    outputSchema: vitalsMonitorOutputSchema,
    handler: async (input: VitalsMonitorInput, context: ToolContext) => {
      const assessment = await orchestrator.monitorVitals(
        input.snapshot.patientId,
        input.snapshot,
        input.priorSnapshots,
      );

      context.logger?.info("Assessed vitals", {
        patientId: assessment.patientId,
        status: assessment.status,
        alerts: assessment.alerts.length,
      });

      return assessment;
    },
  };
}
