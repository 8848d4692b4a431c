import type { Low } from "lowdb";
import { JSONFilePreset } from "lowdb/node";
import type {
  CaseListFilter,
  CaseSummary,
  PersistenceService,
  StoredCase,
} from "../collaborators/types.js";
import { InvalidInputError } from "../errors.js";
import { logger } from "../logger.js";
import { resolveFromRoot } from "../paths.js";
import type { CaseResult, StageEntry } from "../schema/result.js";
import { VITAL_KEYS, type VitalsSnapshot } from "../schema/vitals.js";

type AuditRecord = StageEntry & { caseId: string };

type DbSchema = {
  cases: CaseResult[];
  audit: AuditRecord[];
  vitals: VitalsSnapshot[];
};

const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;

export function defaultDataPath(): string {
  return resolveFromRoot("data", "clinical.json");
}

function sameMeasurements(a: VitalsSnapshot, b: VitalsSnapshot): boolean {
  return VITAL_KEYS.every((key) => a[key] === b[key]);
}

function summarize(result: CaseResult): CaseSummary {
  const summary: CaseSummary = {
    caseId: result.caseId,
    patientId: result.patientId,
    status: result.status,
    isComplete: result.isComplete,
    overallConfidence: result.overallConfidence,
    createdAt: result.createdAt,
    finalizedAt: result.finalizedAt,
  };
  const primary = result.diagnosis?.diagnoses[0];
  if (primary) {
    summary.primaryDiagnosis = primary.name;
  }
  return summary;
}

/**
 * lowdb-backed persistence. One JSON file holds three collections: case
 * results (replaced on resave), the append-only stage audit keyed by
 * caseId + sequence, and vitals snapshots keyed by patientId + timestamp.
 *
 * The file is read once when the store opens; afterwards this process is
 * assumed to be its only writer.
 */
export class JsonCaseStore implements PersistenceService {
  private dbInstance: Promise<Low<DbSchema>> | undefined;

  constructor(private readonly filePath: string = defaultDataPath()) {}

  get path(): string {
    return this.filePath;
  }

  async save(result: CaseResult): Promise<void> {
    const db = await this.getDb();
    const index = db.data.cases.findIndex((entry) => entry.caseId === result.caseId);
    if (index >= 0) {
      db.data.cases[index] = result;
    } else {
      db.data.cases.push(result);
    }

    const recorded = new Set(
      db.data.audit.filter((entry) => entry.caseId === result.caseId).map((entry) => entry.sequence),
    );
    for (const entry of result.auditTrail.entries) {
      if (!recorded.has(entry.sequence)) {
        db.data.audit.push({ ...entry, caseId: result.caseId });
      }
    }

    await db.write();
    logger.debug("Saved case result", "caseStore", { caseId: result.caseId, status: result.status });
  }

  async getCase(caseId: string): Promise<StoredCase | undefined> {
    const db = await this.getDb();
    const result = db.data.cases.find((entry) => entry.caseId === caseId);
    if (!result) {
      return undefined;
    }
    const auditTrail = db.data.audit
      .filter((entry) => entry.caseId === caseId)
      .sort((a, b) => a.sequence - b.sequence);
    return { result, auditTrail };
  }

  async listCases(filter: CaseListFilter = {}): Promise<CaseSummary[]> {
    const db = await this.getDb();
    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
    return db.data.cases
      .filter((entry) => !filter.patientId || entry.patientId === filter.patientId)
      .filter((entry) => !filter.status || entry.status === filter.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt) || a.caseId.localeCompare(b.caseId))
      .slice(0, limit)
      .map(summarize);
  }

  /** The patient's vitals series, oldest first. */
  async load(patientId: string): Promise<VitalsSnapshot[]> {
    const db = await this.getDb();
    return db.data.vitals
      .filter((snapshot) => snapshot.patientId === patientId)
      .sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  }

  /**
   * Appends a snapshot. Re-submitting an identical snapshot is a no-op; a
   * different reading at the same timestamp is rejected.
   */
  async appendVitals(snapshot: VitalsSnapshot): Promise<void> {
    const db = await this.getDb();
    const at = Date.parse(snapshot.timestamp);
    const existing = db.data.vitals.find(
      (entry) => entry.patientId === snapshot.patientId && Date.parse(entry.timestamp) === at,
    );
    if (existing) {
      if (sameMeasurements(existing, snapshot)) {
        return;
      }
      throw new InvalidInputError(
        `Vitals for patient ${snapshot.patientId} at ${snapshot.timestamp} were already recorded with different values`,
      );
    }

    db.data.vitals.push({ ...snapshot });
    await db.write();
  }

  private getDb(): Promise<Low<DbSchema>> {
    if (!this.dbInstance) {
      this.dbInstance = this.open().catch((error: unknown) => {
        this.dbInstance = undefined;
        throw error;
      });
    }
    return this.dbInstance;
  }

  private async open(): Promise<Low<DbSchema>> {
    logger.info("Opening case store", "caseStore", { path: this.filePath });
    const db = await JSONFilePreset<DbSchema>(this.filePath, { cases: [], audit: [], vitals: [] });

    // Files written by older builds may lack a collection.
    if (!Array.isArray(db.data.cases)) db.data.cases = [];
    if (!Array.isArray(db.data.audit)) db.data.audit = [];
    if (!Array.isArray(db.data.vitals)) db.data.vitals = [];
    return db;
  }
}
