/**
 * Entity Registry Implementation
 *
 * In-memory index over an append-only binding store. Identifiers are minted
 * once per natural key and never reassigned or removed.
 */

import { randomUUID } from "node:crypto";
import type { EntityIdentifier } from "../../../types/index.js";
import type { IEntityRegistry, IRegistryStorage, RegistryBinding } from "../interfaces/IEntityRegistry.js";
import { InvalidStateError, ValidationError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("entity-registry");

export interface EntityRegistryOptions {
  /** Identifier factory; defaults to `ent_<uuid>` */
  generateId?: () => EntityIdentifier;
}

export function generateEntityId(): EntityIdentifier {
  return `ent_${randomUUID()}`;
}

export class EntityRegistry implements IEntityRegistry {
  private readonly byKey = new Map<string, EntityIdentifier>();
  private readonly ids = new Set<EntityIdentifier>();
  private readonly inFlight = new Map<string, Promise<EntityIdentifier>>();
  private readonly generateId: () => EntityIdentifier;
  private initialized = false;

  constructor(
    private readonly storage: IRegistryStorage,
    options: EntityRegistryOptions = {}
  ) {
    this.generateId = options.generateId ?? generateEntityId;
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const bindings = await this.storage.load();
    for (const binding of bindings) {
      // First binding for a key wins; a later duplicate can only come from a hand-edited file
      if (this.byKey.has(binding.naturalKey)) {
        logger.warn({ naturalKey: binding.naturalKey }, "Ignoring duplicate registry binding");
        continue;
      }
      this.bind(binding);
    }

    this.initialized = true;
    logger.debug({ bindings: this.byKey.size }, "Entity registry initialized");
  }

  async resolveOrCreate(naturalKey: string): Promise<EntityIdentifier> {
    this.ensureInitialized();
    validateNaturalKey(naturalKey);

    const existing = this.byKey.get(naturalKey);
    if (existing) return existing;

    const pending = this.inFlight.get(naturalKey);
    if (pending) return pending;

    const creation = this.create(naturalKey).finally(() => {
      this.inFlight.delete(naturalKey);
    });
    this.inFlight.set(naturalKey, creation);
    return creation;
  }

  lookup(naturalKey: string): EntityIdentifier | null {
    this.ensureInitialized();
    return this.byKey.get(naturalKey) ?? null;
  }

  has(entityId: EntityIdentifier): boolean {
    this.ensureInitialized();
    return this.ids.has(entityId);
  }

  size(): number {
    return this.byKey.size;
  }

  private async create(naturalKey: string): Promise<EntityIdentifier> {
    const binding: RegistryBinding = {
      naturalKey,
      entityId: this.generateId(),
      createdAt: new Date().toISOString(),
    };

    if (this.ids.has(binding.entityId)) {
      throw new InvalidStateError(`Identifier ${binding.entityId} is already bound to another key`);
    }

    // Persist before the binding becomes observable
    await this.storage.append(binding);
    this.bind(binding);

    logger.debug({ naturalKey, entityId: binding.entityId }, "Minted entity identifier");
    return binding.entityId;
  }

  private bind(binding: RegistryBinding): void {
    this.byKey.set(binding.naturalKey, binding.entityId);
    this.ids.add(binding.entityId);
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new InvalidStateError("Entity registry used before initialize()");
    }
  }
}

function validateNaturalKey(naturalKey: string): void {
  if (naturalKey.trim().length === 0) {
    throw new ValidationError("Natural key must not be empty", { field: "naturalKey" });
  }
}
