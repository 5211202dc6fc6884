/**
 * Reconciliation Worker Implementation
 *
 * Replays are the same idempotent upserts the original transaction staged,
 * so a sweep may be repeated or interrupted at any point. Records of a
 * failed rollback (intent `discard`) are never replayed; they wait for an
 * operator.
 */

import { randomUUID } from "node:crypto";
import type {
  IReconciliationWorker,
  ReconciliationOutcome,
  ReconciliationReport,
} from "../interfaces/IReconciliationWorker.js";
import type { IChangeLedger } from "../../ledger/interfaces/IChangeLedger.js";
import { transitionChangeEvent, type ChangeEvent } from "../../ledger/models/change-event.js";
import type { IGraphStoreAdapter, IVectorStoreAdapter } from "../../stores/interfaces/IStoreAdapter.js";
import type { EntityLockTable } from "../../transaction/impl/EntityLockTable.js";
import { ReconciliationConfigSchema, type ReconciliationConfig, type ReconciliationConfigInput } from "../../config.js";
import {
  ConcurrencyConflictError,
  DeadlineExceededError,
  InvalidStateError,
  wrapError,
  type StoryweaveError,
} from "../../errors.js";
import type { EntityIdentifier, StagingToken, StoreSide } from "../../../types/index.js";
import { mapConcurrent, Mutex, withDeadline } from "../../../utils/async.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("reconciliation-worker");

const REPLAY_ORDER: readonly StoreSide[] = ["graph", "vector"];

export interface ReconciliationWorkerOptions {
  graph: IGraphStoreAdapter;
  vector: IVectorStoreAdapter;
  ledger: IChangeLedger;
  /** The coordinator's lock table */
  locks: EntityLockTable;
  config?: ReconciliationConfigInput;
  lockWaitTimeoutMs?: number;
  /** Deadline for each replayed prepare and commit */
  deadlineMs?: number;
}

export class ReconciliationWorker implements IReconciliationWorker {
  readonly config: ReconciliationConfig;

  private readonly graph: IGraphStoreAdapter;
  private readonly vector: IVectorStoreAdapter;
  private readonly ledger: IChangeLedger;
  private readonly locks: EntityLockTable;
  private readonly lockWaitTimeoutMs: number;
  private readonly deadlineMs: number;
  private readonly sweepLock = new Mutex();
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(options: ReconciliationWorkerOptions) {
    this.graph = options.graph;
    this.vector = options.vector;
    this.ledger = options.ledger;
    this.locks = options.locks;
    this.config = ReconciliationConfigSchema.parse(options.config ?? {});
    this.lockWaitTimeoutMs = options.lockWaitTimeoutMs ?? 30_000;
    this.deadlineMs = options.deadlineMs ?? 10_000;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  async reconcileOnce(limit: number = this.config.batchSize): Promise<ReconciliationReport> {
    return this.sweepLock.runExclusive(async () => {
      const startedAt = new Date().toISOString();
      const waiting = this.ledger.pendingReconciliation();
      const manual = waiting.filter((record) => record.payload.intent === "discard");
      const records = waiting.filter((record) => record.payload.intent !== "discard").slice(0, limit);

      const outcomes = await mapConcurrent(
        records,
        async (record): Promise<ReconciliationOutcome> => {
          try {
            return await this.reconcile(record);
          } catch (error) {
            logger.error({ err: error, transactionId: record.transactionId }, "Reconciliation failed");
            return {
              transactionId: record.transactionId,
              entityId: record.entityId,
              resolution: "error",
              attempt: record.attempt,
              error: error instanceof Error ? error.message : String(error),
            };
          }
        },
        this.config.concurrency
      );

      const report: ReconciliationReport = {
        examined: records.length,
        reconciled: count(outcomes, "reconciled"),
        superseded: count(outcomes, "superseded"),
        retried: count(outcomes, "retry_scheduled"),
        abandoned: count(outcomes, "abandoned"),
        deferred: count(outcomes, "deferred"),
        manual: manual.length,
        outcomes,
        startedAt,
        finishedAt: new Date().toISOString(),
      };

      if (report.examined > 0) {
        logger.info(
          {
            examined: report.examined,
            reconciled: report.reconciled,
            superseded: report.superseded,
            retried: report.retried,
            abandoned: report.abandoned,
          },
          "Reconciliation sweep finished"
        );
      }
      if (manual.length > 0) {
        logger.warn(
          { transactionIds: manual.map((record) => record.transactionId) },
          "Failed rollbacks awaiting manual reconciliation"
        );
      }
      return report;
    });
  }

  start(intervalMs: number = this.config.intervalMs): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = this.reconcileOnce()
        .then(
          () => undefined,
          (error: unknown) => {
            logger.error({ err: error }, "Scheduled reconciliation sweep failed");
          }
        )
        .finally(() => {
          this.inFlight = null;
        });
    }, intervalMs);
    this.timer.unref();

    logger.debug({ intervalMs }, "Reconciliation worker started");
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  // ===========================================================================
  // Per-transaction
  // ===========================================================================

  private async reconcile(record: ChangeEvent): Promise<ReconciliationOutcome> {
    const outcome = (resolution: ReconciliationOutcome["resolution"], attempt = record.attempt, error?: string) => ({
      transactionId: record.transactionId,
      entityId: record.entityId,
      resolution,
      attempt,
      error,
    });

    if (this.isSuperseded(record)) {
      await this.recordSuperseded(record);
      return outcome("superseded");
    }

    const owner = `rec_${randomUUID()}`;
    const entityIds = entitiesOf(record);
    try {
      await this.locks.acquire(entityIds, owner, { policy: "queue", timeoutMs: this.lockWaitTimeoutMs });
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        logger.debug({ transactionId: record.transactionId, entityId: error.entityId }, "Reconciliation deferred");
        return outcome("deferred");
      }
      throw error;
    }

    try {
      // Another sweep may have finished it while we waited
      const latest = this.ledger.latest(record.transactionId);
      if (!latest || latest.status !== "reconciliation_required" || latest.sequence !== record.sequence) {
        return outcome("skipped");
      }
      // A newer transaction may have committed while this sweep waited for the lock
      if (this.isSuperseded(latest)) {
        await this.recordSuperseded(latest);
        return outcome("superseded");
      }

      const committed = [...latest.payload.committedSides];
      let failure: { side: StoreSide; error: StoryweaveError } | null = null;

      for (const side of REPLAY_ORDER) {
        if (!latest.payload.pendingSides.includes(side)) continue;
        try {
          await this.replay(latest, side);
          committed.push(side);
        } catch (error) {
          failure = { side, error: wrapError(error) };
          break;
        }
      }

      const pending = latest.payload.pendingSides.filter((side) => !committed.includes(side));
      if (!failure) {
        await this.ledger.record(
          transitionChangeEvent(latest, "committed", {
            phase: "reconcile",
            payload: { committedSides: committed, pendingSides: [], resolution: "reconciled" },
          })
        );
        logger.info({ transactionId: latest.transactionId, entityId: latest.entityId }, "Transaction reconciled");
        return outcome("reconciled");
      }

      const attempt = latest.attempt + 1;
      const abandon = attempt >= this.config.maxAttempts;
      await this.ledger.record(
        transitionChangeEvent(latest, abandon ? "failed" : "reconciliation_required", {
          phase: "reconcile",
          adapter: failure.side,
          errorCode: failure.error.code,
          errorMessage: failure.error.message,
          attempt,
          payload: {
            committedSides: committed,
            pendingSides: pending,
            resolution: abandon ? "abandoned" : undefined,
          },
        })
      );

      if (abandon) {
        logger.error(
          { err: failure.error, transactionId: latest.transactionId, attempt, pendingSides: pending },
          "Reconciliation abandoned"
        );
        return outcome("abandoned", attempt, failure.error.message);
      }
      logger.warn({ err: failure.error, transactionId: latest.transactionId, attempt }, "Reconciliation attempt failed");
      return outcome("retry_scheduled", attempt, failure.error.message);
    } finally {
      this.locks.release(entityIds, owner);
    }
  }

  /**
   * A transaction that started later on the same entity and committed wins
   */
  private isSuperseded(record: ChangeEvent): boolean {
    const started = this.ledger.transaction(record.transactionId)[0]?.sequence ?? record.sequence;
    return this.ledger.history(record.entityId).some((event) => {
      if (event.status !== "committed" || event.transactionId === record.transactionId) return false;
      const otherStarted = this.ledger.transaction(event.transactionId)[0]?.sequence ?? event.sequence;
      return otherStarted > started;
    });
  }

  private async recordSuperseded(record: ChangeEvent): Promise<void> {
    await this.ledger.record(
      transitionChangeEvent(record, "failed", {
        phase: "reconcile",
        payload: { resolution: "superseded" },
      })
    );
    logger.info({ transactionId: record.transactionId, entityId: record.entityId }, "Reconciliation superseded");
  }

  private async replay(record: ChangeEvent, side: StoreSide): Promise<void> {
    const token = await this.withDeadline(side, "prepare", (signal) => this.stage(record, side, signal));
    try {
      await this.withDeadline(side, "commit", () =>
        side === "graph" ? this.graph.commit(token) : this.vector.commit(token)
      );
    } catch (error) {
      await this.discardQuietly(side, token, record.transactionId);
      throw error;
    }
  }

  private stage(record: ChangeEvent, side: StoreSide, signal: AbortSignal): Promise<StagingToken> {
    if (side === "graph") {
      return this.graph.prepareWrite(record.payload.graph, { signal });
    }
    const op = record.payload.vector;
    if (!op) {
      throw new InvalidStateError(`Transaction ${record.transactionId} has no vector payload to replay`, {
        transactionId: record.transactionId,
        phase: "reconcile",
        adapter: side,
      });
    }
    return this.vector.prepareUpsert(op.id, op.content, op.metadata, { signal });
  }

  private withDeadline<T>(side: StoreSide, step: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withDeadline(
      fn,
      this.deadlineMs,
      () =>
        new DeadlineExceededError(`${side} ${step} replay exceeded ${this.deadlineMs}ms`, this.deadlineMs, {
          phase: "reconcile",
          adapter: side,
        })
    );
  }

  private async discardQuietly(side: StoreSide, token: StagingToken, transactionId: string): Promise<void> {
    try {
      await (side === "graph" ? this.graph.discard(token) : this.vector.discard(token));
    } catch (error) {
      logger.error({ err: error, transactionId, adapter: side, tokenId: token.id }, "Failed to discard replay stage");
    }
  }
}

/**
 * Every entity the payload writes: the record's own, the vector entry and
 * each node or edge source
 */
function entitiesOf(record: ChangeEvent): EntityIdentifier[] {
  const ids = new Set<EntityIdentifier>([record.entityId]);
  if (record.payload.vector) ids.add(record.payload.vector.id);
  for (const op of record.payload.graph) {
    ids.add(op.kind === "upsert_node" ? op.node.id : op.relationship.sourceId);
  }
  return [...ids];
}

function count(outcomes: ReconciliationOutcome[], resolution: ReconciliationOutcome["resolution"]): number {
  return outcomes.filter((o) => o.resolution === resolution).length;
}
