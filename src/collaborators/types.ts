import type { CaseStatus } from "../schema/case.js";
import type { Evidence, InteractionRecord } from "../schema/clinical.js";
import type { CaseResult, StageEntry } from "../schema/result.js";
import type { VitalsSnapshot } from "../schema/vitals.js";

/**
 * Stage-specific request handed to the LLM collaborator. The engine never
 * looks inside it; stages build it and parse what comes back.
 */
export interface StageRequest {
  task: string;
  instructions: string;
  input: Record<string, unknown>;
  temperature?: number;
  maxTokens?: number;
}

/** Collaborators signal failure by throwing `CollaboratorError`. */
export interface LlmInvocation {
  invoke(request: StageRequest): Promise<unknown>;
}

export interface RetrievalQuery {
  text: string;
  limit?: number;
}

export interface RetrievalService {
  search(query: RetrievalQuery): Promise<Evidence[]>;
}

export interface InteractionTable {
  lookup(drug: string): Promise<InteractionRecord[]>;
}

export interface CaseListFilter {
  patientId?: string;
  status?: CaseStatus;
  limit?: number;
}

export interface CaseSummary {
  caseId: string;
  patientId: string;
  status: CaseStatus;
  isComplete: boolean;
  overallConfidence: number | null;
  primaryDiagnosis?: string;
  createdAt: string;
  finalizedAt: string;
}

export interface StoredCase {
  result: CaseResult;
  auditTrail: Array<StageEntry & { caseId: string }>;
}

export interface PersistenceService {
  save(result: CaseResult): Promise<void>;
  load(patientId: string): Promise<VitalsSnapshot[]>;
  appendVitals(snapshot: VitalsSnapshot): Promise<void>;
  getCase(caseId: string): Promise<StoredCase | undefined>;
  listCases(filter?: CaseListFilter): Promise<CaseSummary[]>;
}
