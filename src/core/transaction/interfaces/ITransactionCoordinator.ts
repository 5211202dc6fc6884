/**
 * Transaction Coordinator Interface
 *
 * Two-phase write across the graph and vector stores:
 * begin → stage → prepare → commit, or rollback.
 */

import type { z } from "zod";
import type { GraphOpSchema, VectorUpsertOpSchema, EntityIdentifier } from "../../../types/index.js";
import type {
  BeginOptions,
  CommitReceipt,
  PhaseOptions,
  TransactionHandle,
  TransactionSnapshot,
} from "../models/transaction.js";

export type GraphOpInput = z.input<typeof GraphOpSchema>;
export type VectorUpsertOpInput = z.input<typeof VectorUpsertOpSchema>;

export interface ITransactionCoordinator {
  /**
   * Open a transaction holding the write lock of every entity
   *
   * @throws ValidationError for empty or malformed identifiers
   * @throws ConcurrencyConflictError when a lock cannot be taken
   */
  begin(entityIds: EntityIdentifier | readonly EntityIdentifier[], options?: BeginOptions): Promise<TransactionHandle>;

  /**
   * Add the transaction's vector upsert. At most one per transaction.
   *
   * @throws InvalidStateError outside STAGING
   * @throws ValidationError for a malformed op or an unlocked entity
   */
  stageVectorOp(handle: TransactionHandle, op: VectorUpsertOpInput): void;

  /**
   * @throws InvalidStateError outside STAGING
   * @throws ValidationError for a malformed op or an unlocked entity
   */
  stageGraphOp(handle: TransactionHandle, op: GraphOpInput): void;

  /**
   * Stage both sides in their stores. On any failure everything staged is
   * discarded and the transaction ends ROLLED_BACK.
   *
   * @throws AbortedError naming the failing adapter(s)
   * @throws ReconciliationRequiredError if a discard failed during the abort
   */
  prepare(handle: TransactionHandle, options?: PhaseOptions): Promise<void>;

  /**
   * Make both sides visible, graph first
   *
   * @throws AbortedError if the first commit failed and nothing became visible
   * @throws ReconciliationRequiredError after a partial commit
   */
  commit(handle: TransactionHandle, options?: PhaseOptions): Promise<CommitReceipt>;

  /**
   * Discard everything staged and release the locks
   *
   * @throws ReconciliationRequiredError if a discard failed
   */
  rollback(handle: TransactionHandle): Promise<void>;

  inspect(transactionId: string): TransactionSnapshot | null;

  openTransactions(): TransactionSnapshot[];

  /**
   * Wait for staging tokens that arrived after their deadline to be discarded
   */
  drain(): Promise<void>;
}
