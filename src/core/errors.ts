/**
 * Error Classes for Storyweave
 * Structured error handling with error codes
 *
 * The taxonomy lets a caller tell "nothing happened, retry freely"
 * (AbortedError, ConcurrencyConflictError) apart from "one store may hold
 * the write, reconcile before retrying" (ReconciliationRequiredError).
 */

import type { ZodError } from "zod";
import type { StoreSide } from "../types/index.js";

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Input errors (1xxx)
  VALIDATION_FAILED = "E1000",

  // Store adapter errors (2xxx)
  STORE_TRANSIENT = "E2000",
  STORE_FAILED = "E2001",
  DEADLINE_EXCEEDED = "E2002",

  // Transaction errors (3xxx)
  TRANSACTION_ABORTED = "E3000",
  CONCURRENCY_CONFLICT = "E3001",
  INVALID_STATE = "E3002",
  RECONCILIATION_REQUIRED = "E3003",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  CONFIGURATION_ERROR = "E9001",
}

export type TransactionPhase = "begin" | "stage" | "prepare" | "commit" | "rollback" | "reconcile";

/**
 * Where in a transaction an error surfaced
 */
export interface TransactionErrorContext {
  transactionId?: string;
  entityIds?: string[];
  phase?: TransactionPhase;
  adapter?: StoreSide;
  [key: string]: unknown;
}

/**
 * Base error class for all Storyweave errors
 */
export class StoryweaveError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;
  /** Whether repeating the same call may succeed */
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>,
    options?: { cause?: unknown; retryable?: boolean }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StoryweaveError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    this.retryable = options?.retryable ?? false;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging and ledger records
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Malformed input. Never retried.
 */
export class ValidationError extends StoryweaveError {
  public readonly field?: string;

  constructor(message: string, context?: Record<string, unknown> & { field?: string }) {
    super(message, ErrorCode.VALIDATION_FAILED, context);
    this.name = "ValidationError";
    this.field = context?.field;
  }
}

/**
 * Builds a ValidationError listing every zod issue under `field`
 */
export function fromZodError(error: ZodError, field: string, context?: Record<string, unknown>): ValidationError {
  const issues = error.issues.map((issue) => `${[field, ...issue.path].join(".")}: ${issue.message}`);
  return new ValidationError(`Invalid ${field}: ${issues.join("; ")}`, { ...context, field });
}

/**
 * Network or timeout failure inside a store adapter. Retried internally
 * with backoff before it escalates.
 */
export class TransientStoreError extends StoryweaveError {
  public readonly adapter?: StoreSide;

  constructor(message: string, context?: Record<string, unknown> & { adapter?: StoreSide }, cause?: unknown) {
    super(message, ErrorCode.STORE_TRANSIENT, context, { cause, retryable: true });
    this.name = "TransientStoreError";
    this.adapter = context?.adapter;
  }
}

/**
 * Non-transient store failure (constraint violation, bad token, closed store).
 */
export class StoreError extends StoryweaveError {
  public readonly adapter?: StoreSide;

  constructor(message: string, context?: Record<string, unknown> & { adapter?: StoreSide }, cause?: unknown) {
    super(message, ErrorCode.STORE_FAILED, context, { cause });
    this.name = "StoreError";
    this.adapter = context?.adapter;
  }
}

/**
 * A prepare or commit phase ran past its deadline.
 */
export class DeadlineExceededError extends StoryweaveError {
  public readonly deadlineMs: number;

  constructor(message: string, deadlineMs: number, context?: TransactionErrorContext) {
    super(message, ErrorCode.DEADLINE_EXCEEDED, { ...context, deadlineMs }, { retryable: true });
    this.name = "DeadlineExceededError";
    this.deadlineMs = deadlineMs;
  }
}

/**
 * Failure of one adapter while a transaction was in flight
 */
export interface AdapterFailure {
  adapter: StoreSide;
  error: StoryweaveError;
}

/**
 * A transaction was aborted before anything became visible. Every staged
 * write was discarded; retrying the whole operation from scratch is safe.
 */
export class AbortedError extends StoryweaveError {
  public readonly transactionId: string;
  public readonly phase: TransactionPhase;
  public readonly failures: AdapterFailure[];

  constructor(
    message: string,
    context: TransactionErrorContext & { transactionId: string; phase: TransactionPhase },
    failures: AdapterFailure[]
  ) {
    super(
      message,
      ErrorCode.TRANSACTION_ABORTED,
      { ...context, failedAdapters: failures.map((f) => f.adapter) },
      { cause: failures[0]?.error, retryable: true }
    );
    this.name = "AbortedError";
    this.transactionId = context.transactionId;
    this.phase = context.phase;
    this.failures = failures;
  }

  /** Adapters whose failure caused the abort */
  get failedAdapters(): StoreSide[] {
    return this.failures.map((f) => f.adapter);
  }
}

/**
 * Another open transaction holds the write lock on an entity.
 */
export class ConcurrencyConflictError extends StoryweaveError {
  public readonly entityId: string;
  public readonly heldBy?: string;

  constructor(entityId: string, heldBy?: string, context?: TransactionErrorContext) {
    super(
      `Entity ${entityId} is locked${heldBy ? ` by transaction ${heldBy}` : ""}`,
      ErrorCode.CONCURRENCY_CONFLICT,
      { ...context, entityId, heldBy },
      { retryable: true }
    );
    this.name = "ConcurrencyConflictError";
    this.entityId = entityId;
    this.heldBy = heldBy;
  }
}

/**
 * An operation was invoked in a transaction state that does not allow it.
 */
export class InvalidStateError extends StoryweaveError {
  public readonly state?: string;

  constructor(message: string, context?: TransactionErrorContext & { state?: string }) {
    super(message, ErrorCode.INVALID_STATE, context);
    this.name = "InvalidStateError";
    this.state = context?.state;
  }
}

/**
 * One store may hold the write while the other does not: a partial commit,
 * or a discard that failed during rollback. Blindly repeating the full
 * write is not safe. A partial commit is completed from `changeEventId`;
 * a failed discard (`undiscardedSides`) is left for an operator.
 */
export class ReconciliationRequiredError extends StoryweaveError {
  public readonly transactionId: string;
  public readonly entityIds: string[];
  public readonly committedSides: StoreSide[];
  public readonly pendingSides: StoreSide[];
  /** Sides whose staged work could not be discarded during rollback */
  public readonly undiscardedSides: StoreSide[];
  /** Ledger record carrying the idempotent replay payload */
  public readonly changeEventId: string;

  constructor(
    message: string,
    details: {
      transactionId: string;
      entityIds: string[];
      phase: TransactionPhase;
      committedSides: StoreSide[];
      pendingSides: StoreSide[];
      undiscardedSides?: StoreSide[];
      changeEventId: string;
    },
    cause?: unknown
  ) {
    super(message, ErrorCode.RECONCILIATION_REQUIRED, { ...details }, { cause });
    this.name = "ReconciliationRequiredError";
    this.transactionId = details.transactionId;
    this.entityIds = details.entityIds;
    this.committedSides = details.committedSides;
    this.pendingSides = details.pendingSides;
    this.undiscardedSides = details.undiscardedSides ?? [];
    this.changeEventId = details.changeEventId;
  }
}

/**
 * Invalid configuration file, environment or override
 */
export class ConfigurationError extends StoryweaveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Check if an error is a StoryweaveError
 */
export function isStoryweaveError(error: unknown): error is StoryweaveError {
  return error instanceof StoryweaveError;
}

/**
 * Whether the same call may succeed if repeated
 */
export function isRetryable(error: unknown): boolean {
  return isStoryweaveError(error) && error.retryable;
}

/**
 * Wrap an unknown error in a StoryweaveError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): StoryweaveError {
  if (isStoryweaveError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new StoryweaveError(error.message || defaultMessage, code, { originalError: error.name }, { cause: error });
  }

  return new StoryweaveError(typeof error === "string" ? error : defaultMessage, code);
}
