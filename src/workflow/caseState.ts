import { STATUS_ORDER, isTerminalStatus, type Case, type CaseStatus } from "../schema/case.js";
import {
  isAccepted,
  type AcceptedOutcome,
  type StageName,
  type StageOutcome,
  type StagePayloads,
} from "../schema/outcome.js";
import type {
  AuditTrail,
  FailureKind,
  StageEntry,
  StageFailure,
  StatusTransition,
} from "../schema/result.js";
import { WorkflowInvariantError } from "../errors.js";

export type Clock = () => Date;

/**
 * Append-only record of one case's progress through the pipeline.
 *
 * Owned by a single `WorkflowEngine.execute` call and never shared. Entries
 * and transitions are only ever appended; accessors hand out copies.
 */
export class CaseState {
  readonly case: Case;
  private readonly clock: Clock;
  private readonly entries: StageEntry[] = [];
  private readonly transitions: StatusTransition[] = [];
  private currentStatus: CaseStatus = "pending";
  private failureRecord: StageFailure | undefined;
  private sequence = 0;

  constructor(caseRecord: Case, clock: Clock = () => new Date()) {
    this.case = caseRecord;
    this.clock = clock;
  }

  get status(): CaseStatus {
    return this.currentStatus;
  }

  get failure(): StageFailure | undefined {
    return this.failureRecord ? { ...this.failureRecord } : undefined;
  }

  /**
   * Moves the status forward. Re-entering the current status is a no-op;
   * moving backwards or leaving a terminal status throws.
   */
  transition(to: CaseStatus, reason?: string): void {
    const from = this.currentStatus;
    if (from === to) {
      return;
    }
    if (isTerminalStatus(from)) {
      throw new WorkflowInvariantError(`Case ${this.case.id} is already ${from}; cannot move to ${to}`);
    }
    if (to !== "failed" && STATUS_ORDER.indexOf(to) < STATUS_ORDER.indexOf(from)) {
      throw new WorkflowInvariantError(`Status regression from ${from} to ${to} in case ${this.case.id}`);
    }

    const transition: StatusTransition = {
      sequence: this.nextSequence(),
      from,
      to,
      at: this.clock().toISOString(),
    };
    if (reason) {
      transition.reason = reason;
    }
    this.transitions.push(transition);
    this.currentStatus = to;
  }

  record<S extends StageName>(
    stage: S,
    attempt: number,
    outcome: StageOutcome<StagePayloads[S]>,
  ): StageEntry<S> {
    if (isTerminalStatus(this.currentStatus)) {
      throw new WorkflowInvariantError(`Cannot record ${stage} after case ${this.case.id} is ${this.currentStatus}`);
    }
    const entry: StageEntry<S> = {
      sequence: this.nextSequence(),
      stage,
      attempt,
      outcome,
      recordedAt: this.clock().toISOString(),
    };
    this.entries.push(entry);
    return entry;
  }

  fail(stage: StageName, kind: FailureKind, reason: string, attempts: number): void {
    this.failureRecord = { stage, kind, reason, attempts };
    this.transition("failed", reason);
  }

  /** Latest Success or Degraded outcome recorded for a stage. */
  accepted<S extends StageName>(stage: S): AcceptedOutcome<StagePayloads[S]> | undefined {
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const entry = this.entries[index];
      if (isEntryFor(entry, stage) && isAccepted(entry.outcome)) {
        return entry.outcome;
      }
    }
    return undefined;
  }

  attempts(stage: StageName): number {
    return this.entries.filter((entry) => entry.stage === stage).length;
  }

  latest<S extends StageName>(stage: S): StageEntry<S> | undefined {
    for (let index = this.entries.length - 1; index >= 0; index -= 1) {
      const entry = this.entries[index];
      if (isEntryFor(entry, stage)) {
        return entry;
      }
    }
    return undefined;
  }

  auditTrail(): AuditTrail {
    return {
      entries: this.entries.map((entry) => ({ ...entry })),
      transitions: this.transitions.map((transition) => ({ ...transition })),
    };
  }

  private nextSequence(): number {
    this.sequence += 1;
    return this.sequence;
  }
}

function isEntryFor<S extends StageName>(entry: StageEntry, stage: S): entry is StageEntry<S> {
  return entry.stage === stage;
}
