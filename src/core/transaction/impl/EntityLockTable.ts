/**
 * Entity Lock Table
 *
 * One exclusive write lock per entity. Multi-entity requests lock in sorted
 * order so two transactions can never wait on each other.
 */

import type { EntityIdentifier } from "../../../types/index.js";
import type { LockPolicy } from "../../config.js";
import { ConcurrencyConflictError } from "../../errors.js";
import { KeyedMutex } from "../../../utils/async.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("entity-locks");

export interface LockRequest {
  policy: LockPolicy;
  /** Total wait across every entity under the queue policy */
  timeoutMs: number;
}

export class EntityLockTable {
  private readonly mutex = new KeyedMutex<EntityIdentifier>();
  private readonly holders = new Map<EntityIdentifier, string>();

  /**
   * Locks every entity for `owner`, or none of them.
   *
   * @throws ConcurrencyConflictError when a lock is held (fail-fast) or the wait times out (queue)
   */
  async acquire(entityIds: readonly EntityIdentifier[], owner: string, request: LockRequest): Promise<void> {
    const ordered = [...new Set(entityIds)].sort();
    const acquired: EntityIdentifier[] = [];
    const deadline = Date.now() + request.timeoutMs;

    try {
      for (const entityId of ordered) {
        const granted =
          request.policy === "fail-fast"
            ? this.mutex.tryAcquire(entityId)
            : await this.mutex.acquire(entityId, Math.max(0, deadline - Date.now()));

        if (!granted) {
          throw new ConcurrencyConflictError(entityId, this.holders.get(entityId), {
            transactionId: owner,
            entityIds: ordered,
            phase: "begin",
          });
        }
        this.holders.set(entityId, owner);
        acquired.push(entityId);
      }
    } catch (error) {
      this.release(acquired, owner);
      throw error;
    }

    logger.debug({ owner, entityIds: ordered }, "Entity locks acquired");
  }

  /**
   * Releases the locks `owner` holds among `entityIds`; others are untouched
   */
  release(entityIds: readonly EntityIdentifier[], owner: string): void {
    for (const entityId of new Set(entityIds)) {
      if (this.holders.get(entityId) !== owner) continue;
      this.holders.delete(entityId);
      this.mutex.release(entityId);
    }
  }

  holderOf(entityId: EntityIdentifier): string | null {
    return this.holders.get(entityId) ?? null;
  }

  isLocked(entityId: EntityIdentifier): boolean {
    return this.mutex.isLocked(entityId);
  }

  waiting(entityId: EntityIdentifier): number {
    return this.mutex.waiting(entityId);
  }

  get size(): number {
    return this.holders.size;
  }
}
