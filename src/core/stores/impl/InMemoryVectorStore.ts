/**
 * In-memory vector store
 */

import type { EmbeddingProvider, IVectorStoreAdapter, PrepareOptions } from "../interfaces/IStoreAdapter.js";
import {
  VectorUpsertOpSchema,
  type EntityIdentifier,
  type Properties,
  type StagingToken,
  type VectorEntry,
  type VectorSearchHit,
} from "../../../types/index.js";
import { fromZodError, StoreError, ValidationError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";
import { assertOpen, assertTokenOwner, createStagingToken } from "./shared.js";

const logger = createLogger("memory-vector-store");

export interface InMemoryVectorStoreOptions {
  /** Computes embeddings while an upsert is prepared */
  embedder?: EmbeddingProvider;
}

export class InMemoryVectorStore implements IVectorStoreAdapter {
  readonly name = "vector" as const;

  private readonly entries = new Map<EntityIdentifier, VectorEntry>();
  private readonly staged = new Map<string, VectorEntry>();
  private readonly embedder?: EmbeddingProvider;
  private closed = false;

  constructor(options: InMemoryVectorStoreOptions = {}) {
    this.embedder = options.embedder;
  }

  async open(): Promise<void> {
    this.closed = false;
  }

  async close(): Promise<void> {
    this.staged.clear();
    this.closed = true;
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async prepareUpsert(
    id: EntityIdentifier,
    content: string,
    metadata: Properties,
    options: PrepareOptions = {}
  ): Promise<StagingToken> {
    assertOpen(this.closed, this.name);
    options.signal?.throwIfAborted();

    const parsed = VectorUpsertOpSchema.safeParse({ id, content, metadata });
    if (!parsed.success) {
      throw fromZodError(parsed.error, "vectorOp");
    }

    const entry: VectorEntry = { ...parsed.data, metadata: { ...parsed.data.metadata } };
    if (this.embedder) {
      entry.embedding = await this.embedder.embed(content);
      options.signal?.throwIfAborted();
    }

    const token = createStagingToken(this.name);
    this.staged.set(token.id, entry);
    logger.debug({ tokenId: token.id, entityId: id }, "Vector upsert staged");
    return token;
  }

  async commit(token: StagingToken): Promise<void> {
    assertOpen(this.closed, this.name);
    assertTokenOwner(token, this.name);

    const entry = this.staged.get(token.id);
    if (!entry) {
      throw new StoreError(`Unknown staging token ${token.id}`, { adapter: this.name, tokenId: token.id });
    }

    this.staged.delete(token.id);
    this.entries.set(entry.id, entry);
    logger.debug({ tokenId: token.id, entityId: entry.id }, "Vector upsert committed");
  }

  async discard(token: StagingToken): Promise<void> {
    assertTokenOwner(token, this.name);
    if (this.staged.delete(token.id)) {
      logger.debug({ tokenId: token.id }, "Vector upsert discarded");
    }
  }

  async get(id: EntityIdentifier): Promise<VectorEntry | null> {
    const entry = this.entries.get(id);
    return entry ? structuredClone(entry) : null;
  }

  async search(queryVector: number[], limit: number): Promise<VectorSearchHit[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Search limit must be a positive integer, got ${limit}`, { field: "limit" });
    }
    if (queryVector.length === 0) {
      throw new ValidationError("Query vector must not be empty", { field: "queryVector" });
    }

    const hits: VectorSearchHit[] = [];
    for (const entry of this.entries.values()) {
      if (!entry.embedding || entry.embedding.length !== queryVector.length) continue;
      hits.push({
        id: entry.id,
        score: cosineSimilarity(queryVector, entry.embedding),
        content: entry.content,
        metadata: { ...entry.metadata },
      });
    }

    return hits.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  get stagedCount(): number {
    return this.staged.size;
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Cosine similarity of two equal-length vectors; 0 when either is all zeros
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
