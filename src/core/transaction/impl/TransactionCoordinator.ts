/**
 * Transaction Coordinator
 *
 * Drives one write across the graph and vector stores through an explicit
 * state machine. Every adapter call is turned into a Result and the state
 * machine branches on it; no catch-all handler decides the outcome.
 *
 * Commit order is graph then vector. A failure before anything is visible
 * aborts cleanly; a failure after the graph commit leaves the transaction
 * PARTIALLY_COMMITTED with a reconciliation record in the ledger. The
 * committed side is never compensated.
 */

import { randomUUID } from "node:crypto";
import type { ITransactionCoordinator, GraphOpInput, VectorUpsertOpInput } from "../interfaces/ITransactionCoordinator.js";
import {
  canTransitionState,
  type BeginOptions,
  type CommitReceipt,
  type PhaseOptions,
  type TransactionHandle,
  type TransactionSnapshot,
  type TransactionState,
} from "../models/transaction.js";
import { EntityLockTable } from "./EntityLockTable.js";
import type { IGraphStoreAdapter, IStoreAdapter, IVectorStoreAdapter } from "../../stores/interfaces/IStoreAdapter.js";
import type { IChangeLedger } from "../../ledger/interfaces/IChangeLedger.js";
import {
  createChangeEvent,
  transitionChangeEvent,
  type ChangeEvent,
  type ChangePhase,
  type ChangeStatus,
  type ChangeTransition,
  type ChangeType,
} from "../../ledger/models/change-event.js";
import { CoordinatorConfigSchema, type CoordinatorConfig, type CoordinatorConfigInput } from "../../config.js";
import {
  AbortedError,
  DeadlineExceededError,
  fromZodError,
  InvalidStateError,
  ReconciliationRequiredError,
  TransientStoreError,
  ValidationError,
  wrapError,
  type AdapterFailure,
  type StoryweaveError,
  type TransactionErrorContext,
  type TransactionPhase,
} from "../../errors.js";
import {
  GraphOpSchema,
  VectorUpsertOpSchema,
  type EntityIdentifier,
  type GraphOp,
  type StagingToken,
  type StoreSide,
  type VectorUpsertOp,
} from "../../../types/index.js";
import { fromPromiseWith, partition, type Result } from "../../../types/result.js";
import { retry, Semaphore, withDeadline } from "../../../utils/async.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("transaction-coordinator");

const COMMIT_ORDER: readonly StoreSide[] = ["graph", "vector"];

interface MutableTransaction {
  id: string;
  entityIds: EntityIdentifier[];
  state: TransactionState;
  graphOps: GraphOp[];
  vectorOps: VectorUpsertOp[];
  tokens: StagingToken[];
  event: ChangeEvent | null;
  createdAt: Date;
}

export interface TransactionCoordinatorOptions {
  graph: IGraphStoreAdapter;
  vector: IVectorStoreAdapter;
  ledger: IChangeLedger;
  config?: CoordinatorConfigInput;
  /** Shared with the reconciliation worker so replays respect entity locks */
  locks?: EntityLockTable;
}

export class TransactionCoordinator implements ITransactionCoordinator {
  readonly locks: EntityLockTable;
  readonly config: CoordinatorConfig;

  private readonly graph: IGraphStoreAdapter;
  private readonly vector: IVectorStoreAdapter;
  private readonly ledger: IChangeLedger;
  private readonly semaphores: Record<StoreSide, Semaphore>;
  private readonly open = new Map<string, MutableTransaction>();
  private readonly cleanups = new Set<Promise<void>>();

  constructor(options: TransactionCoordinatorOptions) {
    this.graph = options.graph;
    this.vector = options.vector;
    this.ledger = options.ledger;
    this.config = CoordinatorConfigSchema.parse(options.config ?? {});
    this.locks = options.locks ?? new EntityLockTable();
    this.semaphores = {
      graph: new Semaphore(this.config.graphConcurrency),
      vector: new Semaphore(this.config.vectorConcurrency),
    };
  }

  // ===========================================================================
  // Begin / Stage
  // ===========================================================================

  async begin(
    entityIds: EntityIdentifier | readonly EntityIdentifier[],
    options: BeginOptions = {}
  ): Promise<TransactionHandle> {
    const ids = typeof entityIds === "string" ? [entityIds] : [...new Set(entityIds)];
    if (ids.length === 0 || ids.some((id) => id.trim().length === 0)) {
      throw new ValidationError("A transaction needs at least one non-empty entity identifier", {
        field: "entityIds",
        phase: "begin",
      });
    }

    const tx: MutableTransaction = {
      id: `txn_${randomUUID()}`,
      entityIds: ids,
      state: "INIT",
      graphOps: [],
      vectorOps: [],
      tokens: [],
      event: null,
      createdAt: new Date(),
    };

    await this.locks.acquire(ids, tx.id, {
      policy: options.lockPolicy ?? this.config.lockPolicy,
      timeoutMs: options.lockWaitTimeoutMs ?? this.config.lockWaitTimeoutMs,
    });

    this.open.set(tx.id, tx);
    this.transition(tx, "STAGING");
    return tx;
  }

  stageVectorOp(handle: TransactionHandle, op: VectorUpsertOpInput): void {
    const tx = this.requireState(handle, ["STAGING"], "stage");

    const parsed = VectorUpsertOpSchema.safeParse(op);
    if (!parsed.success) {
      throw fromZodError(parsed.error, "vectorOp", this.context(tx, "stage", "vector"));
    }
    this.requireLocked(tx, parsed.data.id, "vectorOp");
    if (tx.vectorOps.length > 0) {
      throw new ValidationError("A transaction carries at most one vector upsert", {
        ...this.context(tx, "stage", "vector"),
        field: "vectorOp",
      });
    }

    tx.vectorOps.push(parsed.data);
  }

  stageGraphOp(handle: TransactionHandle, op: GraphOpInput): void {
    const tx = this.requireState(handle, ["STAGING"], "stage");

    const parsed = GraphOpSchema.safeParse(op);
    if (!parsed.success) {
      throw fromZodError(parsed.error, "graphOp", this.context(tx, "stage", "graph"));
    }
    // Edges belong to their source; the target is not locked
    const owner = parsed.data.kind === "upsert_node" ? parsed.data.node.id : parsed.data.relationship.sourceId;
    this.requireLocked(tx, owner, "graphOp");

    tx.graphOps.push(parsed.data);
  }

  // ===========================================================================
  // Prepare
  // ===========================================================================

  async prepare(handle: TransactionHandle, options: PhaseOptions = {}): Promise<void> {
    const tx = this.requireState(handle, ["STAGING"], "prepare");
    const sides = sidesOf(tx);
    if (sides.length === 0) {
      throw new ValidationError("Nothing staged", { ...this.context(tx, "prepare"), field: "ops" });
    }

    this.transition(tx, "PREPARING");
    try {
      await this.recordPending(tx, "prepare");
    } catch (error) {
      this.transition(tx, "ABORTING");
      this.finish(tx, "ROLLED_BACK");
      throw error;
    }

    const deadlineMs = options.deadlineMs ?? this.config.prepareDeadlineMs;
    const results = await Promise.all(sides.map((side) => this.prepareSide(tx, side, deadlineMs)));

    const { oks: tokens, errs: failures } = partition(results);
    tx.tokens.push(...tokens);

    if (failures.length > 0) {
      return this.abort(tx, "prepare", failures);
    }
    this.transition(tx, "PREPARED");
  }

  private prepareSide(
    tx: MutableTransaction,
    side: StoreSide,
    deadlineMs: number
  ): Promise<Result<StagingToken, AdapterFailure>> {
    const stage = (signal: AbortSignal): Promise<StagingToken> => {
      if (side === "graph") {
        return this.graph.prepareWrite(tx.graphOps, { signal });
      }
      const [op] = tx.vectorOps;
      if (!op) {
        throw new InvalidStateError("No vector upsert staged", this.context(tx, "prepare", side));
      }
      return this.vector.prepareUpsert(op.id, op.content, op.metadata, { signal });
    };

    const staged = withDeadline(
      (signal) =>
        retry(
          async () => {
            const token = await this.semaphores[side].run(() => stage(signal));
            if (signal.aborted) {
              this.discardLate(tx, token);
              signal.throwIfAborted();
            }
            return token;
          },
          {
            ...this.config.retry,
            signal,
            retryIf: (error) => error instanceof TransientStoreError,
            onRetry: (error, attempt) => {
              logger.warn({ err: error, transactionId: tx.id, adapter: side, attempt }, "Retrying prepare");
            },
          }
        ),
      deadlineMs,
      () =>
        new DeadlineExceededError(
          `${side} prepare exceeded ${deadlineMs}ms`,
          deadlineMs,
          this.context(tx, "prepare", side)
        )
    );

    return fromPromiseWith(staged, (error) => ({ adapter: side, error: wrapError(error) }));
  }

  // ===========================================================================
  // Commit
  // ===========================================================================

  async commit(handle: TransactionHandle, options: PhaseOptions = {}): Promise<CommitReceipt> {
    const tx = this.requireState(handle, ["PREPARED"], "commit");
    this.transition(tx, "COMMITTING");

    const deadlineMs = options.deadlineMs ?? this.config.commitDeadlineMs;
    const ordered = COMMIT_ORDER.flatMap((side) => tx.tokens.filter((token) => token.adapter === side));
    const committed: StoreSide[] = [];

    for (const token of ordered) {
      const result = await this.commitSide(tx, token, deadlineMs);
      if (result.ok) {
        committed.push(token.adapter);
        continue;
      }

      // A commit that timed out or lost its connection may still land, so only a definite first failure aborts
      const nothingVisible = committed.length === 0 && !isAmbiguousCommitFailure(result.error.error);
      if (nothingVisible) {
        return this.abort(tx, "commit", [result.error]);
      }
      return this.partialCommit(tx, committed, result.error);
    }

    let event: ChangeEvent;
    try {
      event = await this.recordTransition(tx, "committed", {
        phase: "commit",
        payload: { committedSides: committed, pendingSides: [] },
      });
    } finally {
      tx.tokens = [];
      this.finish(tx, "COMMITTED");
    }

    return {
      transactionId: tx.id,
      entityIds: [...tx.entityIds],
      changeEventId: event.id,
      sequence: event.sequence,
      committedSides: committed,
      committedAt: event.timestamp,
    };
  }

  private commitSide(
    tx: MutableTransaction,
    token: StagingToken,
    deadlineMs: number
  ): Promise<Result<void, AdapterFailure>> {
    const side = token.adapter;
    const adapter = this.adapterFor(side);
    const committed = withDeadline(
      () => this.semaphores[side].run(() => adapter.commit(token)),
      deadlineMs,
      () =>
        new DeadlineExceededError(`${side} commit exceeded ${deadlineMs}ms`, deadlineMs, this.context(tx, "commit", side))
    );
    return fromPromiseWith(committed, (error) => ({ adapter: side, error: wrapError(error) }));
  }

  private async partialCommit(
    tx: MutableTransaction,
    committed: StoreSide[],
    failure: AdapterFailure
  ): Promise<never> {
    const pending = sidesOf(tx).filter((side) => !committed.includes(side));
    logger.error(
      {
        err: failure.error,
        transactionId: tx.id,
        entityIds: tx.entityIds,
        adapter: failure.adapter,
        committedSides: committed,
        pendingSides: pending,
      },
      "Transaction partially committed"
    );

    // Replays stage afresh, so anything still staged on the pending sides is dropped
    tx.tokens = tx.tokens.filter((token) => !committed.includes(token.adapter));
    for (const leftover of await this.discardTokens(tx)) {
      logger.error(
        { err: leftover.error, transactionId: tx.id, adapter: leftover.adapter },
        "Failed to discard stage after partial commit"
      );
    }

    let event: ChangeEvent;
    try {
      event = await this.recordTransition(tx, "reconciliation_required", {
        phase: "commit",
        adapter: failure.adapter,
        errorCode: failure.error.code,
        errorMessage: failure.error.message,
        payload: { committedSides: committed, pendingSides: pending },
      });
    } finally {
      this.finish(tx, "PARTIALLY_COMMITTED");
    }

    throw new ReconciliationRequiredError(
      `Transaction ${tx.id} partially committed (committed: ${committed.join(", ") || "none"}; pending: ${pending.join(", ")})`,
      {
        transactionId: tx.id,
        entityIds: [...tx.entityIds],
        phase: "commit",
        committedSides: committed,
        pendingSides: pending,
        changeEventId: event.id,
      },
      failure.error
    );
  }

  // ===========================================================================
  // Rollback
  // ===========================================================================

  async rollback(handle: TransactionHandle): Promise<void> {
    if (handle.state === "ROLLED_BACK" && !this.open.has(handle.id)) return;

    const tx = this.requireState(handle, ["STAGING", "PREPARED"], "rollback");
    this.transition(tx, "ABORTING");

    const failures = await this.discardTokens(tx);
    if (failures.length > 0) {
      return this.failRollback(tx, failures);
    }

    try {
      // Staged work that never reached prepare still leaves a trace
      if (!tx.event && sidesOf(tx).length > 0) {
        await this.recordPending(tx, "rollback");
      }
      if (tx.event) {
        await this.recordTransition(tx, "rolled_back", { phase: "rollback" });
      }
    } finally {
      this.finish(tx, "ROLLED_BACK");
    }
    logger.debug({ transactionId: tx.id }, "Transaction rolled back");
  }

  /**
   * Discards everything staged after a failed prepare or a definite first
   * commit failure, then raises AbortedError
   */
  private async abort(tx: MutableTransaction, phase: TransactionPhase, failures: AdapterFailure[]): Promise<never> {
    this.transition(tx, "ABORTING");
    const [first] = failures;
    logger.warn(
      {
        err: first?.error,
        transactionId: tx.id,
        entityIds: tx.entityIds,
        phase,
        failedAdapters: failures.map((f) => f.adapter),
      },
      "Transaction aborted"
    );

    const discardFailures = await this.discardTokens(tx);
    if (discardFailures.length > 0) {
      return this.failRollback(tx, discardFailures);
    }

    try {
      await this.recordTransition(tx, "rolled_back", {
        phase,
        adapter: first?.adapter,
        errorCode: first?.error.code,
        errorMessage: first?.error.message,
      });
    } finally {
      this.finish(tx, "ROLLED_BACK");
    }

    const detail = failures.map((f) => `${f.adapter}: ${f.error.message}`).join("; ");
    throw new AbortedError(
      `Transaction ${tx.id} aborted during ${phase} (${detail})`,
      { ...this.context(tx, phase, first?.adapter), transactionId: tx.id, phase },
      failures
    );
  }

  /**
   * A stage could not be discarded, so a store may still hold it. The write
   * was abandoned and is recorded with intent `discard`: reconciliation never
   * replays it and leaves it to an operator.
   */
  private async failRollback(tx: MutableTransaction, failures: AdapterFailure[]): Promise<never> {
    const [first] = failures;
    const undiscarded = failures.map((f) => f.adapter);
    logger.error({ err: first?.error, transactionId: tx.id, undiscardedSides: undiscarded }, "Rollback failed");

    let event: ChangeEvent;
    try {
      if (!tx.event) {
        await this.recordPending(tx, "rollback");
      }
      event = await this.recordTransition(tx, "reconciliation_required", {
        phase: "rollback",
        adapter: first?.adapter,
        errorCode: first?.error.code,
        errorMessage: first?.error.message,
        payload: { committedSides: [], pendingSides: [], intent: "discard", undiscardedSides: undiscarded },
      });
    } finally {
      this.finish(tx, "ROLLBACK_FAILED");
    }

    throw new ReconciliationRequiredError(
      `Transaction ${tx.id} could not discard its staged writes (${undiscarded.join(", ")})`,
      {
        transactionId: tx.id,
        entityIds: [...tx.entityIds],
        phase: "rollback",
        committedSides: [],
        pendingSides: [],
        undiscardedSides: undiscarded,
        changeEventId: event.id,
      },
      first?.error
    );
  }

  /**
   * Discards every token the transaction holds, returning the failures
   */
  private async discardTokens(tx: MutableTransaction): Promise<AdapterFailure[]> {
    const tokens = tx.tokens;
    tx.tokens = [];

    const results = await Promise.all(
      tokens.map((token) => {
        const side = token.adapter;
        const discarded = withDeadline(
          () => this.semaphores[side].run(() => this.adapterFor(side).discard(token)),
          this.config.commitDeadlineMs,
          () =>
            new DeadlineExceededError(
              `${side} discard exceeded ${this.config.commitDeadlineMs}ms`,
              this.config.commitDeadlineMs,
              this.context(tx, "rollback", side)
            )
        );
        return fromPromiseWith(discarded, (error): AdapterFailure => ({ adapter: side, error: wrapError(error) }));
      })
    );

    return partition(results).errs;
  }

  /**
   * A prepare finished after its deadline; its token is no longer wanted
   */
  private discardLate(tx: MutableTransaction, token: StagingToken): void {
    logger.warn(
      { transactionId: tx.id, adapter: token.adapter, tokenId: token.id },
      "Discarding staging token that arrived after the deadline"
    );

    const cleanup: Promise<void> = this.adapterFor(token.adapter)
      .discard(token)
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error(
            { err: error, transactionId: tx.id, adapter: token.adapter, tokenId: token.id },
            "Failed to discard late staging token"
          );
        }
      )
      .finally(() => {
        this.cleanups.delete(cleanup);
      });
    this.cleanups.add(cleanup);
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  inspect(transactionId: string): TransactionSnapshot | null {
    const tx = this.open.get(transactionId);
    return tx ? snapshot(tx) : null;
  }

  openTransactions(): TransactionSnapshot[] {
    return [...this.open.values()].map(snapshot);
  }

  async drain(): Promise<void> {
    while (this.cleanups.size > 0) {
      await Promise.all([...this.cleanups]);
    }
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private adapterFor(side: StoreSide): IStoreAdapter {
    return side === "graph" ? this.graph : this.vector;
  }

  private async recordPending(tx: MutableTransaction, phase: ChangePhase): Promise<void> {
    tx.event = await this.ledger.record(
      createChangeEvent({
        transactionId: tx.id,
        entityId: primaryEntity(tx),
        changeType: changeTypeOf(tx),
        status: "pending",
        phase,
        payload: {
          contentHash: contentHashOf(tx),
          vector: tx.vectorOps[0],
          graph: tx.graphOps,
          committedSides: [],
          pendingSides: sidesOf(tx),
        },
      })
    );
  }

  private async recordTransition(
    tx: MutableTransaction,
    status: ChangeStatus,
    changes: ChangeTransition
  ): Promise<ChangeEvent> {
    if (!tx.event) {
      throw new InvalidStateError(`Transaction ${tx.id} has no ledger record`, {
        ...this.context(tx, changes.phase ?? "commit"),
        state: tx.state,
      });
    }
    const event = await this.ledger.record(transitionChangeEvent(tx.event, status, changes));
    tx.event = event;
    return event;
  }

  private requireState(
    handle: TransactionHandle,
    allowed: readonly TransactionState[],
    phase: TransactionPhase
  ): MutableTransaction {
    const tx = this.open.get(handle.id);
    if (!tx) {
      throw new InvalidStateError(`Transaction ${handle.id} is not open (state ${handle.state})`, {
        transactionId: handle.id,
        entityIds: [...handle.entityIds],
        phase,
        state: handle.state,
      });
    }
    if (!allowed.includes(tx.state)) {
      throw new InvalidStateError(`Cannot ${phase} transaction ${tx.id} in state ${tx.state}`, {
        ...this.context(tx, phase),
        state: tx.state,
      });
    }
    return tx;
  }

  private requireLocked(tx: MutableTransaction, entityId: EntityIdentifier, field: string): void {
    if (!tx.entityIds.includes(entityId)) {
      throw new ValidationError(`Entity ${entityId} is not locked by transaction ${tx.id}`, {
        ...this.context(tx, "stage"),
        field,
        entityId,
      });
    }
  }

  private transition(tx: MutableTransaction, to: TransactionState): void {
    if (!canTransitionState(tx.state, to)) {
      throw new InvalidStateError(`Illegal transition ${tx.state} -> ${to} for transaction ${tx.id}`, {
        transactionId: tx.id,
        state: tx.state,
      });
    }
    logger.debug({ transactionId: tx.id, from: tx.state, to }, "Transaction state changed");
    tx.state = to;
  }

  /**
   * Enters a terminal state and releases the entity locks
   */
  private finish(tx: MutableTransaction, state: TransactionState): void {
    this.transition(tx, state);
    this.open.delete(tx.id);
    this.locks.release(tx.entityIds, tx.id);
  }

  private context(tx: MutableTransaction, phase: TransactionPhase, adapter?: StoreSide): TransactionErrorContext {
    return { transactionId: tx.id, entityIds: [...tx.entityIds], phase, adapter };
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * A commit that timed out or hit a transient store failure may have been
 * applied; only a definite rejection proves nothing became visible
 */
function isAmbiguousCommitFailure(error: StoryweaveError): boolean {
  return error instanceof DeadlineExceededError || error instanceof TransientStoreError;
}

function sidesOf(tx: MutableTransaction): StoreSide[] {
  const sides: StoreSide[] = [];
  if (tx.graphOps.length > 0) sides.push("graph");
  if (tx.vectorOps.length > 0) sides.push("vector");
  return sides;
}

function primaryEntity(tx: MutableTransaction): EntityIdentifier {
  const [first] = tx.entityIds;
  if (first === undefined) {
    throw new InvalidStateError(`Transaction ${tx.id} has no entities`, { transactionId: tx.id });
  }
  return first;
}

/**
 * content if the vector side changes; relationship if only edges change;
 * metadata otherwise
 */
function changeTypeOf(tx: { graphOps: readonly GraphOp[]; vectorOps: readonly VectorUpsertOp[] }): ChangeType {
  if (tx.vectorOps.length > 0) return "content";
  if (tx.graphOps.length > 0 && tx.graphOps.every((op) => op.kind === "upsert_relationship")) {
    return "relationship";
  }
  return "metadata";
}

function contentHashOf(tx: MutableTransaction): string | undefined {
  for (const op of tx.graphOps) {
    if (op.kind === "upsert_node") return op.node.contentHash;
  }
  return undefined;
}

function snapshot(tx: MutableTransaction): TransactionSnapshot {
  return {
    id: tx.id,
    entityIds: [...tx.entityIds],
    state: tx.state,
    graphOps: tx.graphOps.length,
    vectorOps: tx.vectorOps.length,
    tokens: tx.tokens.map((token) => ({ ...token })),
    createdAt: tx.createdAt.toISOString(),
  };
}
