/**
 * Change Ledger Implementation
 *
 * Records are indexed in memory by entity and transaction on top of an
 * append-only storage backend. Appends are serialized so sequences are
 * strictly increasing in storage order.
 */

import type { IChangeLedger, ILedgerStorage, LedgerSubscriber, SubscriptionFilter } from "../interfaces/IChangeLedger.js";
import { canTransition, ChangeEventSchema, type ChangeEvent } from "../models/change-event.js";
import type { EntityIdentifier } from "../../../types/index.js";
import { fromZodError, InvalidStateError } from "../../errors.js";
import { Mutex } from "../../../utils/async.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("change-ledger");

export class ChangeLedger implements IChangeLedger {
  private readonly byEntity = new Map<EntityIdentifier, ChangeEvent[]>();
  private readonly byTransaction = new Map<string, ChangeEvent[]>();
  private readonly subscribers = new Map<number, { callback: LedgerSubscriber; filter?: SubscriptionFilter }>();
  private readonly appendLock = new Mutex();
  private nextSubscriberId = 0;
  private currentSequence = 0;
  private initialized = false;

  constructor(private readonly storage: ILedgerStorage) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const stored = await this.storage.load();
    for (const event of stored) {
      this.index(event);
      this.currentSequence = Math.max(this.currentSequence, event.sequence);
    }

    this.initialized = true;
    logger.debug({ records: stored.length, sequence: this.currentSequence }, "Change ledger initialized");
  }

  async record(event: ChangeEvent): Promise<ChangeEvent> {
    this.ensureInitialized();

    const parsed = ChangeEventSchema.safeParse(event);
    if (!parsed.success) {
      throw fromZodError(parsed.error, "event", { transactionId: event.transactionId });
    }

    return this.appendLock.runExclusive(async () => {
      const previous = this.latest(parsed.data.transactionId);
      const from = previous?.status ?? null;
      if (!canTransition(from, parsed.data.status)) {
        throw new InvalidStateError(
          `Transaction ${parsed.data.transactionId} cannot move from ${from ?? "(none)"} to ${parsed.data.status}`,
          { transactionId: parsed.data.transactionId, state: from ?? undefined }
        );
      }

      const stored: ChangeEvent = { ...parsed.data, sequence: this.currentSequence + 1 };
      // Durable before it becomes observable
      await this.storage.append(stored);
      this.currentSequence = stored.sequence;
      this.index(stored);

      logger.debug(
        {
          transactionId: stored.transactionId,
          entityId: stored.entityId,
          status: stored.status,
          sequence: stored.sequence,
        },
        "Change recorded"
      );

      this.notifySubscribers(stored);
      return structuredClone(stored);
    });
  }

  history(entityId: EntityIdentifier): ChangeEvent[] {
    return (this.byEntity.get(entityId) ?? []).map((event) => structuredClone(event));
  }

  transaction(transactionId: string): ChangeEvent[] {
    return (this.byTransaction.get(transactionId) ?? []).map((event) => structuredClone(event));
  }

  latest(transactionId: string): ChangeEvent | null {
    const records = this.byTransaction.get(transactionId);
    const last = records?.[records.length - 1];
    return last ? structuredClone(last) : null;
  }

  pendingReconciliation(limit = Number.POSITIVE_INFINITY): ChangeEvent[] {
    const pending: ChangeEvent[] = [];
    for (const records of this.byTransaction.values()) {
      const last = records[records.length - 1];
      if (last?.status === "reconciliation_required") {
        pending.push(last);
      }
    }

    return pending
      .sort((a, b) => a.sequence - b.sequence)
      .slice(0, limit)
      .map((event) => structuredClone(event));
  }

  subscribe(callback: LedgerSubscriber, filter?: SubscriptionFilter): () => void {
    const id = this.nextSubscriberId++;
    this.subscribers.set(id, { callback, filter });
    return () => {
      this.subscribers.delete(id);
    };
  }

  getCurrentSequence(): number {
    return this.currentSequence;
  }

  async shutdown(): Promise<void> {
    // Wait for any append in flight
    await this.appendLock.runExclusive(async () => undefined);
    this.subscribers.clear();
    logger.debug({ sequence: this.currentSequence }, "Change ledger shut down");
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private index(event: ChangeEvent): void {
    append(this.byEntity, event.entityId, event);
    append(this.byTransaction, event.transactionId, event);
  }

  private notifySubscribers(event: ChangeEvent): void {
    for (const { callback, filter } of this.subscribers.values()) {
      if (!matchesFilter(event, filter)) continue;
      try {
        callback(structuredClone(event));
      } catch (error) {
        logger.warn({ err: error, transactionId: event.transactionId }, "Ledger subscriber threw");
      }
    }
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new InvalidStateError("Change ledger used before initialize()");
    }
  }
}

function append<K>(map: Map<K, ChangeEvent[]>, key: K, event: ChangeEvent): void {
  const list = map.get(key);
  if (list) {
    list.push(event);
  } else {
    map.set(key, [event]);
  }
}

function matchesFilter(event: ChangeEvent, filter?: SubscriptionFilter): boolean {
  if (!filter) return true;
  if (filter.statuses && !filter.statuses.includes(event.status)) return false;
  if (filter.entityIds && !filter.entityIds.includes(event.entityId)) return false;
  if (filter.transactionId && filter.transactionId !== event.transactionId) return false;
  return true;
}
