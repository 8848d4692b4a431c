import type { CasePatient } from "../schema/case.js";
import {
  maxSeverity,
  type ContraindicationFlag,
  type InteractionRecord,
  type Medication,
} from "../schema/clinical.js";
import { namesMatch, normalizeName } from "./common.js";

export type ContraindicationSubject = Pick<CasePatient, "allergies" | "currentMedications">;

/** The other side of an interaction record relative to `medication`, if the record concerns it. */
function counterpart(record: InteractionRecord, medication: string): string | undefined {
  if (namesMatch(record.drug, medication)) {
    return record.interactsWith;
  }
  if (namesMatch(record.interactsWith, medication)) {
    return record.drug;
  }
  return undefined;
}

/**
 * Cross-references proposed medications against the patient's allergies and
 * current medications. Pure and deterministic: flags come out in medication
 * order, allergy conflicts before interactions, one flag per
 * (medication, kind, conflict) keeping the highest severity seen.
 */
export function crossReference(
  patient: ContraindicationSubject,
  medications: readonly Medication[],
  interactions: readonly InteractionRecord[],
): ContraindicationFlag[] {
  const flags = new Map<string, ContraindicationFlag>();

  const add = (flag: ContraindicationFlag) => {
    const key = [flag.medication, flag.kind, flag.conflictsWith].map(normalizeName).join("|");
    const existing = flags.get(key);
    if (existing) {
      existing.severity = maxSeverity(existing.severity, flag.severity);
      return;
    }
    flags.set(key, flag);
  };

  for (const medication of medications) {
    const related = interactions
      .map((record) => ({ record, other: counterpart(record, medication.name) }))
      .filter((entry): entry is { record: InteractionRecord; other: string } => entry.other !== undefined);

    for (const allergy of patient.allergies) {
      if (namesMatch(medication.name, allergy)) {
        add({
          medication: medication.name,
          kind: "allergy",
          conflictsWith: allergy,
          severity: "high",
          detail: `${medication.name} matches documented ${allergy} allergy`,
        });
      }
      for (const { record, other } of related) {
        if (namesMatch(other, allergy)) {
          add({
            medication: medication.name,
            kind: "allergy",
            conflictsWith: allergy,
            severity: maxSeverity(record.severity, "medium"),
            detail: `${medication.name} conflicts with documented ${allergy} allergy: ${record.description}`,
          });
        }
      }
    }

    for (const current of patient.currentMedications) {
      for (const { record, other } of related) {
        if (namesMatch(other, current)) {
          add({
            medication: medication.name,
            kind: "interaction",
            conflictsWith: current,
            severity: record.severity,
            detail: `${medication.name} interacts with ${current}: ${record.description}`,
          });
        }
      }
    }
  }

  return Array.from(flags.values());
}
