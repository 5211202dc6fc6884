/**
 * Change Ledger Interface
 *
 * Append-only record of every attempted change. Each status a transaction
 * reaches is a new record; nothing already recorded is rewritten.
 */

import type { ChangeEvent, ChangeStatus } from "../models/change-event.js";
import type { EntityIdentifier } from "../../../types/index.js";

/**
 * Subscription callback type
 */
export type LedgerSubscriber = (event: ChangeEvent) => void;

/**
 * Subscription filter. Omitted fields match everything.
 */
export interface SubscriptionFilter {
  statuses?: ChangeStatus[];
  entityIds?: EntityIdentifier[];
  transactionId?: string;
}

export interface IChangeLedger {
  /**
   * Load persisted records and rebuild the sequence counter
   */
  initialize(): Promise<void>;

  /**
   * Append a record. The ledger assigns its sequence; the returned copy
   * carries it.
   *
   * @throws ValidationError if the record is malformed
   * @throws InvalidStateError if the status does not follow the transaction's latest
   */
  record(event: ChangeEvent): Promise<ChangeEvent>;

  /**
   * All records for an entity in append order
   */
  history(entityId: EntityIdentifier): ChangeEvent[];

  /**
   * All records for one transaction in append order
   */
  transaction(transactionId: string): ChangeEvent[];

  /**
   * Latest record of a transaction, or null
   */
  latest(transactionId: string): ChangeEvent | null;

  /**
   * Latest record of every transaction still awaiting reconciliation,
   * oldest first
   */
  pendingReconciliation(limit?: number): ChangeEvent[];

  /**
   * Subscribe to appended records; returns an unsubscribe function
   */
  subscribe(callback: LedgerSubscriber, filter?: SubscriptionFilter): () => void;

  getCurrentSequence(): number;

  /**
   * Wait for in-flight appends and drop subscribers
   */
  shutdown(): Promise<void>;
}

/**
 * Ledger Storage Interface
 */
export interface ILedgerStorage {
  /** Every stored record, in append order */
  load(): Promise<ChangeEvent[]>;
  append(event: ChangeEvent): Promise<void>;
}
