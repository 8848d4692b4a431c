import { z } from "zod";
import { InvalidInputError } from "../errors.js";

export const sexSchema = z.enum(["male", "female", "other", "unknown"]);

export const symptomSchema = z.object({
  name: z.string().trim().min(1, "Symptom name is required"),
  severity: z.number().int().min(1).max(10),
  durationDays: z.number().min(0),
  description: z.string().trim().optional(),
});

export const patientProfileSchema = z.object({
  age: z.number().int().min(0).max(150),
  sex: sexSchema.default("unknown"),
  medicalHistory: z.array(z.string().trim().min(1)).default([]),
  allergies: z.array(z.string().trim().min(1)).default([]),
  currentMedications: z.array(z.string().trim().min(1)).default([]),
  consentObtained: z.boolean().default(false),
});

export type Symptom = z.infer<typeof symptomSchema>;
export type PatientProfile = z.infer<typeof patientProfileSchema>;

export type CasePatient = Readonly<
  Omit<PatientProfile, "medicalHistory" | "allergies" | "currentMedications">
> & {
  readonly medicalHistory: readonly string[];
  readonly allergies: readonly string[];
  readonly currentMedications: readonly string[];
};

export interface Case {
  readonly id: string;
  readonly patientId: string;
  readonly createdAt: string;
  readonly patient: CasePatient;
  readonly symptoms: ReadonlyArray<Readonly<Symptom>>;
  readonly chiefComplaint: string;
  readonly onset: string;
}

export type CaseStatus =
  | "pending"
  | "analyzing"
  | "validating"
  | "planning"
  | "reviewing_safety"
  | "completed"
  | "failed";

/** Forward order of the status machine; `failed` sits outside it. */
export const STATUS_ORDER: readonly CaseStatus[] = [
  "pending",
  "analyzing",
  "validating",
  "planning",
  "reviewing_safety",
  "completed",
];

export function isTerminalStatus(status: CaseStatus): boolean {
  return status === "completed" || status === "failed";
}

export const caseInputSchema = z.object({
  patientId: z.string().trim().min(1, "Patient identifier is required"),
  patient: patientProfileSchema,
  symptoms: z.array(symptomSchema),
  chiefComplaint: z.string().trim().default(""),
  onset: z.string().trim().default(""),
});

export type CaseInput = z.input<typeof caseInputSchema>;

/** Validates raw input and deep-freezes it into an immutable Case. */
export function buildCase(input: unknown, identity: { id: string; createdAt: string }): Case {
  const result = caseInputSchema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidInputError(`Invalid case: ${details}`);
  }
  const parsed = result.data;
  return Object.freeze({
    id: identity.id,
    patientId: parsed.patientId,
    createdAt: identity.createdAt,
    patient: Object.freeze({
      ...parsed.patient,
      medicalHistory: Object.freeze([...parsed.patient.medicalHistory]),
      allergies: Object.freeze([...parsed.patient.allergies]),
      currentMedications: Object.freeze([...parsed.patient.currentMedications]),
    }),
    symptoms: Object.freeze(parsed.symptoms.map((symptom) => Object.freeze({ ...symptom }))),
    chiefComplaint: parsed.chiefComplaint,
    onset: parsed.onset,
  });
}
