/**
 * Transaction Models
 */

import type { ChangeEvent } from "../../ledger/models/change-event.js";
import type { EntityIdentifier, GraphOp, StagingToken, StoreSide, VectorUpsertOp } from "../../../types/index.js";
import type { LockPolicy } from "../../config.js";

export const TRANSACTION_STATES = [
  "INIT",
  "STAGING",
  "PREPARING",
  "PREPARED",
  "COMMITTING",
  "COMMITTED",
  "ABORTING",
  "ROLLED_BACK",
  "PARTIALLY_COMMITTED",
  "ROLLBACK_FAILED",
] as const;

export type TransactionState = (typeof TRANSACTION_STATES)[number];

const TRANSITIONS: Record<TransactionState, readonly TransactionState[]> = {
  INIT: ["STAGING"],
  STAGING: ["PREPARING", "ABORTING"],
  PREPARING: ["PREPARED", "ABORTING"],
  PREPARED: ["COMMITTING", "ABORTING"],
  COMMITTING: ["COMMITTED", "ABORTING", "PARTIALLY_COMMITTED"],
  ABORTING: ["ROLLED_BACK", "ROLLBACK_FAILED"],
  COMMITTED: [],
  ROLLED_BACK: [],
  PARTIALLY_COMMITTED: [],
  ROLLBACK_FAILED: [],
};

export function canTransitionState(from: TransactionState, to: TransactionState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: TransactionState): boolean {
  return TRANSITIONS[state].length === 0;
}

/**
 * Caller's view of an open or finished transaction. The coordinator owns
 * every field; handles are never reused.
 */
export interface TransactionHandle {
  readonly id: string;
  readonly entityIds: readonly EntityIdentifier[];
  readonly state: TransactionState;
  readonly graphOps: readonly GraphOp[];
  readonly vectorOps: readonly VectorUpsertOp[];
  readonly tokens: readonly StagingToken[];
  /** Latest ledger record, once prepare has started */
  readonly event: ChangeEvent | null;
  readonly createdAt: Date;
}

export interface BeginOptions {
  lockPolicy?: LockPolicy;
  lockWaitTimeoutMs?: number;
}

export interface PhaseOptions {
  /** Overrides the configured deadline for this phase */
  deadlineMs?: number;
}

export interface CommitReceipt {
  transactionId: string;
  entityIds: EntityIdentifier[];
  changeEventId: string;
  sequence: number;
  committedSides: StoreSide[];
  committedAt: string;
}

/**
 * Read-only snapshot returned by `inspect` and `openTransactions`
 */
export interface TransactionSnapshot {
  id: string;
  entityIds: EntityIdentifier[];
  state: TransactionState;
  graphOps: number;
  vectorOps: number;
  tokens: StagingToken[];
  createdAt: string;
}
