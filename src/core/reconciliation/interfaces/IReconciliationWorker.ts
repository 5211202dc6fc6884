/**
 * Reconciliation Worker Interface
 *
 * Completes transactions the ledger marks `reconciliation_required` by
 * replaying their pending sides from the recorded payload. A failed
 * rollback is reported, never replayed.
 */

import type { EntityIdentifier } from "../../../types/index.js";

export type ReconciliationResolution =
  /** Every pending side replayed; the transaction is now committed */
  | "reconciled"
  /** A later transaction on the entity committed; replay would regress it */
  | "superseded"
  /** Replay failed; another attempt is recorded */
  | "retry_scheduled"
  /** Replay failed at the attempt cap; the transaction is now failed */
  | "abandoned"
  /** The entity lock could not be taken; nothing was recorded */
  | "deferred"
  /** Another sweep already resolved the transaction */
  | "skipped"
  /** The ledger itself failed; nothing was recorded */
  | "error";

export interface ReconciliationOutcome {
  transactionId: string;
  entityId: EntityIdentifier;
  resolution: ReconciliationResolution;
  /** Attempts recorded after this sweep */
  attempt: number;
  error?: string;
}

export interface ReconciliationReport {
  examined: number;
  reconciled: number;
  superseded: number;
  retried: number;
  abandoned: number;
  deferred: number;
  /** Failed rollbacks left for an operator; not counted in `examined` */
  manual: number;
  outcomes: ReconciliationOutcome[];
  startedAt: string;
  finishedAt: string;
}

export interface IReconciliationWorker {
  /**
   * One sweep over at most `limit` replayable transactions, oldest first.
   * Overlapping calls run one after another.
   */
  reconcileOnce(limit?: number): Promise<ReconciliationReport>;

  /**
   * Sweep every `intervalMs` until stopped
   */
  start(intervalMs?: number): void;

  /**
   * Stop the timer and wait for a sweep in progress
   */
  stop(): Promise<void>;

  readonly isRunning: boolean;
}
