/**
 * Change Event Models
 *
 * One ledger record per status a transaction passes through. Records are
 * never edited; a transaction's current status is its latest record.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { GraphOpSchema, StoreSideSchema, VectorUpsertOpSchema } from "../../../types/index.js";

// =============================================================================
// Classification
// =============================================================================

export const ChangeTypeSchema = z.enum(["content", "relationship", "metadata"]);

export type ChangeType = z.infer<typeof ChangeTypeSchema>;

export const ChangeStatusSchema = z.enum(["pending", "committed", "failed", "rolled_back", "reconciliation_required"]);

export type ChangeStatus = z.infer<typeof ChangeStatusSchema>;

export const ChangePhaseSchema = z.enum(["begin", "stage", "prepare", "commit", "rollback", "reconcile"]);

export type ChangePhase = z.infer<typeof ChangePhaseSchema>;

/**
 * How a reconciliation_required transaction was closed
 */
export const ResolutionSchema = z.enum(["reconciled", "superseded", "abandoned"]);

export type Resolution = z.infer<typeof ResolutionSchema>;

/**
 * What recovery must do with the recorded write. `discard` marks a rollback
 * whose staged work could not be dropped: the write was abandoned and is
 * never replayed.
 */
export const ChangeIntentSchema = z.enum(["commit", "discard"]);

export type ChangeIntent = z.infer<typeof ChangeIntentSchema>;

// =============================================================================
// Payload
// =============================================================================

/**
 * Everything needed to replay either side of the transaction. Both replays
 * are idempotent upserts, so a payload may be applied any number of times.
 */
export const ChangePayloadSchema = z.object({
  contentHash: z.string().optional(),
  vector: VectorUpsertOpSchema.optional(),
  graph: z.array(GraphOpSchema).default([]),
  committedSides: z.array(StoreSideSchema).default([]),
  pendingSides: z.array(StoreSideSchema).default([]),
  resolution: ResolutionSchema.optional(),
  /** Absent means `commit` */
  intent: ChangeIntentSchema.optional(),
  /** Sides whose discard failed during rollback */
  undiscardedSides: z.array(StoreSideSchema).optional(),
});

export type ChangePayload = z.infer<typeof ChangePayloadSchema>;

// =============================================================================
// Event
// =============================================================================

export const ChangeEventSchema = z.object({
  id: z.string().min(1),
  transactionId: z.string().min(1),
  entityId: z.string().min(1),
  timestamp: z.string().datetime(),
  /** Assigned by the ledger on append; strictly increasing */
  sequence: z.number().int().nonnegative(),
  changeType: ChangeTypeSchema,
  status: ChangeStatusSchema,
  payload: ChangePayloadSchema,
  phase: ChangePhaseSchema.optional(),
  adapter: StoreSideSchema.optional(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
  /** Reconciliation attempts made so far */
  attempt: z.number().int().nonnegative().default(0),
});

export type ChangeEvent = z.infer<typeof ChangeEventSchema>;

// =============================================================================
// Transitions
// =============================================================================

const ALLOWED_TRANSITIONS: Record<ChangeStatus, readonly ChangeStatus[]> = {
  pending: ["committed", "failed", "rolled_back", "reconciliation_required"],
  reconciliation_required: ["reconciliation_required", "committed", "failed"],
  committed: [],
  failed: [],
  rolled_back: [],
};

export function isTerminalStatus(status: ChangeStatus): boolean {
  return ALLOWED_TRANSITIONS[status].length === 0;
}

/**
 * Whether a transaction whose latest status is `from` may record `to`.
 * A transaction's first record must be `pending`.
 */
export function canTransition(from: ChangeStatus | null, to: ChangeStatus): boolean {
  if (from === null) return to === "pending";
  return ALLOWED_TRANSITIONS[from].includes(to);
}

// =============================================================================
// Factory Functions
// =============================================================================

export type ChangeEventInput = Omit<ChangeEvent, "id" | "timestamp" | "sequence" | "attempt" | "payload"> & {
  payload: z.input<typeof ChangePayloadSchema>;
  attempt?: number;
};

export function createChangeEvent(input: ChangeEventInput): ChangeEvent {
  return {
    ...input,
    id: `chg_${randomUUID()}`,
    timestamp: new Date().toISOString(),
    sequence: 0,
    attempt: input.attempt ?? 0,
    payload: ChangePayloadSchema.parse(input.payload),
  };
}

/**
 * Next record for the same transaction with a new status
 */
export type ChangeTransition = Partial<Pick<ChangeEvent, "phase" | "adapter" | "errorCode" | "errorMessage" | "attempt">> & {
  payload?: Partial<ChangePayload>;
};

export function transitionChangeEvent(
  previous: ChangeEvent,
  status: ChangeStatus,
  changes: ChangeTransition = {}
): ChangeEvent {
  const { payload, ...rest } = changes;
  return createChangeEvent({
    transactionId: previous.transactionId,
    entityId: previous.entityId,
    changeType: previous.changeType,
    status,
    payload: { ...previous.payload, ...payload },
    phase: rest.phase ?? previous.phase,
    adapter: rest.adapter,
    errorCode: rest.errorCode,
    errorMessage: rest.errorMessage,
    attempt: rest.attempt ?? previous.attempt,
  });
}
