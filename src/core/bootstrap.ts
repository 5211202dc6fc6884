/**
 * Composition root
 *
 * Wires the stores, registry, ledger, coordinator, reconciliation worker and
 * knowledge base from one validated config. Nothing touches a store until
 * `open()`.
 *
 * @example
 * ```typescript
 * const storyweave = createStoryweave({ config: { storage: "file" } });
 * await storyweave.open();
 * const id = await storyweave.knowledgeBase.updateStoryElement("character", "Sarah enters the room.");
 * await storyweave.close();
 * ```
 */

import { parseConfig, type StoryweaveConfig, type StoryweaveConfigInput } from "./config.js";
import { EntityRegistry } from "./registry/impl/EntityRegistry.js";
import { FileRegistryStorage, MemoryRegistryStorage } from "./registry/impl/RegistryStorage.js";
import type { IRegistryStorage } from "./registry/interfaces/IEntityRegistry.js";
import { ChangeLedger } from "./ledger/impl/ChangeLedger.js";
import { FileLedgerStorage, MemoryLedgerStorage } from "./ledger/impl/LedgerStorage.js";
import type { ILedgerStorage } from "./ledger/interfaces/IChangeLedger.js";
import type { EmbeddingProvider, IGraphStoreAdapter, IVectorStoreAdapter } from "./stores/interfaces/IStoreAdapter.js";
import { InMemoryGraphStore } from "./stores/impl/InMemoryGraphStore.js";
import { InMemoryVectorStore } from "./stores/impl/InMemoryVectorStore.js";
import { PostgresGraphStore } from "./stores/impl/PostgresGraphStore.js";
import { createPool } from "./stores/impl/postgres.js";
import { TransactionCoordinator } from "./transaction/impl/TransactionCoordinator.js";
import { ReconciliationWorker } from "./reconciliation/impl/ReconciliationWorker.js";
import { UnifiedKnowledgeBase } from "./knowledge-base/impl/UnifiedKnowledgeBase.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("storyweave");

export interface CreateStoryweaveOptions {
  config?: StoryweaveConfigInput | StoryweaveConfig;
  /** Replaces the graph store the config would select */
  graph?: IGraphStoreAdapter;
  vector?: IVectorStoreAdapter;
  /** Used by the default vector store */
  embedder?: EmbeddingProvider;
  registryStorage?: IRegistryStorage;
  ledgerStorage?: ILedgerStorage;
  /** Start periodic reconciliation on open (default false) */
  autoReconcile?: boolean;
}

export interface Storyweave {
  readonly config: StoryweaveConfig;
  readonly graph: IGraphStoreAdapter;
  readonly vector: IVectorStoreAdapter;
  readonly registry: EntityRegistry;
  readonly ledger: ChangeLedger;
  readonly coordinator: TransactionCoordinator;
  readonly reconciler: ReconciliationWorker;
  readonly knowledgeBase: UnifiedKnowledgeBase;
  open(): Promise<void>;
  close(): Promise<void>;
}

export function createStoryweave(options: CreateStoryweaveOptions = {}): Storyweave {
  const config = parseConfig(options.config ?? {});

  const graph = options.graph ?? createGraphStore(config);
  const vector = options.vector ?? new InMemoryVectorStore({ embedder: options.embedder });

  const registry = new EntityRegistry(
    options.registryStorage ??
      (config.storage === "file" ? new FileRegistryStorage(config.dataDir) : new MemoryRegistryStorage())
  );
  const ledger = new ChangeLedger(
    options.ledgerStorage ??
      (config.storage === "file" ? new FileLedgerStorage(config.dataDir) : new MemoryLedgerStorage())
  );

  const coordinator = new TransactionCoordinator({ graph, vector, ledger, config: config.coordinator });
  const reconciler = new ReconciliationWorker({
    graph,
    vector,
    ledger,
    locks: coordinator.locks,
    config: config.reconciliation,
    lockWaitTimeoutMs: config.coordinator.lockWaitTimeoutMs,
    deadlineMs: config.coordinator.commitDeadlineMs,
  });
  const knowledgeBase = new UnifiedKnowledgeBase({ registry, coordinator, ledger, graph, vector });

  let opened = false;

  return {
    config,
    graph,
    vector,
    registry,
    ledger,
    coordinator,
    reconciler,
    knowledgeBase,

    async open(): Promise<void> {
      if (opened) return;
      await Promise.all([graph.open(), vector.open()]);
      await Promise.all([registry.initialize(), ledger.initialize()]);
      if (options.autoReconcile) {
        reconciler.start();
      }
      opened = true;
      logger.info({ storage: config.storage, graph: graph.constructor.name }, "Storyweave opened");
    },

    async close(): Promise<void> {
      if (!opened) return;
      opened = false;
      await reconciler.stop();
      await coordinator.drain();
      await ledger.shutdown();
      await Promise.all([graph.close(), vector.close()]);
      logger.info("Storyweave closed");
    },
  };
}

function createGraphStore(config: StoryweaveConfig): IGraphStoreAdapter {
  if (config.postgres) {
    return new PostgresGraphStore({ pool: createPool(config.postgres) });
  }
  return new InMemoryGraphStore();
}
