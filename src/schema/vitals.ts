import { z } from "zod";
import type { Severity } from "./clinical.js";

export type VitalKey =
  | "heartRate"
  | "systolic"
  | "diastolic"
  | "temperature"
  | "respiratoryRate"
  | "oxygenSaturation";

export const VITAL_KEYS: readonly VitalKey[] = [
  "heartRate",
  "systolic",
  "diastolic",
  "oxygenSaturation",
  "temperature",
  "respiratoryRate",
];

export const vitalsSnapshotSchema = z
  .object({
    patientId: z.string().trim().min(1, "Patient identifier is required"),
    timestamp: z.string().datetime({ offset: true }),
    heartRate: z.number().int().min(0).max(300).optional(),
    systolic: z.number().int().min(0).max(300).optional(),
    diastolic: z.number().int().min(0).max(200).optional(),
    temperature: z.number().min(25).max(45).optional(),
    respiratoryRate: z.number().int().min(0).max(100).optional(),
    oxygenSaturation: z.number().min(0).max(100).optional(),
  })
  .refine(
    (snapshot) => VITAL_KEYS.some((key) => snapshot[key] !== undefined),
    { message: "At least one vital sign measurement is required" },
  );

export type VitalsSnapshot = Readonly<z.infer<typeof vitalsSnapshotSchema>>;

export type AlertCode =
  | "tachycardia"
  | "bradycardia"
  | "hypertension"
  | "hypertensive_crisis"
  | "hypotension"
  | "hypoxemia"
  | "fever"
  | "hyperpyrexia"
  | "hypothermia"
  | "tachypnea"
  | "bradypnea";

export interface VitalsAlert {
  code: AlertCode;
  vital: VitalKey;
  value: number;
  severity: Severity;
  message: string;
  actionRequired: string;
}

export type TrendDirection = "rising" | "falling" | "stable";

export interface VitalTrend {
  vital: VitalKey;
  direction: TrendDirection;
  change: number;
  previous: number;
  current: number;
}

export type VitalsStatus = "normal" | "abnormal" | "critical";

export interface VitalsAssessment {
  patientId: string;
  timestamp: string;
  status: VitalsStatus;
  alerts: VitalsAlert[];
  trends: VitalTrend[];
  /** Timestamp of the snapshot the trends were computed against. */
  comparedWith?: string;
}
