/**
 * UnifiedKnowledgeBase Tests
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

import { UnifiedKnowledgeBase } from "../impl/UnifiedKnowledgeBase.js";
import { EntityRegistry } from "../../registry/impl/EntityRegistry.js";
import { MemoryRegistryStorage } from "../../registry/impl/RegistryStorage.js";
import { TransactionCoordinator } from "../../transaction/impl/TransactionCoordinator.js";
import { InMemoryGraphStore } from "../../stores/impl/InMemoryGraphStore.js";
import { InMemoryVectorStore } from "../../stores/impl/InMemoryVectorStore.js";
import { ChangeLedger } from "../../ledger/impl/ChangeLedger.js";
import { MemoryLedgerStorage } from "../../ledger/impl/LedgerStorage.js";
import type { EmbeddingProvider } from "../../stores/interfaces/IStoreAdapter.js";
import { AbortedError, ReconciliationRequiredError, StoreError, ValidationError } from "../../errors.js";
import { calculateContentHash } from "../../../utils/hash.js";

const SARAH = "Sarah enters the room.";

async function setup(embedder?: EmbeddingProvider) {
  const registry = new EntityRegistry(new MemoryRegistryStorage());
  const ledger = new ChangeLedger(new MemoryLedgerStorage());
  await Promise.all([registry.initialize(), ledger.initialize()]);
  const graph = new InMemoryGraphStore();
  const vector = new InMemoryVectorStore({ embedder });
  const coordinator = new TransactionCoordinator({ graph, vector, ledger, config: { retry: { maxAttempts: 1 } } });
  const kb = new UnifiedKnowledgeBase({ registry, coordinator, ledger, graph, vector });
  return { registry, ledger, graph, vector, coordinator, kb };
}

describe("UnifiedKnowledgeBase", () => {
  let h: Awaited<ReturnType<typeof setup>>;

  beforeEach(async () => {
    h = await setup();
  });

  describe("updateStoryElement", () => {
    it("should write a new element to both stores under one identifier", async () => {
      const hash = calculateContentHash(SARAH);

      const entityId = await h.kb.updateStoryElement("character", SARAH);

      expect(entityId).toMatch(/^ent_/);
      expect(h.registry.lookup(`character:${hash}`)).toBe(entityId);

      const { node, vector } = await h.kb.getStoryElement(entityId);
      expect(node).toEqual({
        id: entityId,
        elementType: "character",
        contentHash: hash,
        properties: { content_hash: hash },
      });
      expect(vector?.content).toBe(SARAH);
      expect(vector?.metadata).toEqual({ type: "character", content_hash: hash });

      expect(await h.kb.checkConsistency(entityId)).toEqual({
        entityId,
        status: "consistent",
        graphHash: hash,
        vectorHash: hash,
      });
      expect(h.kb.history(entityId).map((e) => e.status)).toEqual(["pending", "committed"]);
    });

    it("should resolve identical content to the same element", async () => {
      const first = await h.kb.updateStoryElement("character", SARAH);
      const second = await h.kb.updateStoryElement("character", SARAH);

      expect(second).toBe(first);
      expect(h.graph.nodeCount).toBe(1);
      expect(h.vector.size).toBe(1);
      expect(h.kb.history(first)).toHaveLength(4);
    });

    it("should update an element addressed by an explicit key", async () => {
      const first = await h.kb.updateStoryElement("character", SARAH, [], {
        key: "character:sarah",
        metadata: { mood: "calm", age: 34 },
      });
      const second = await h.kb.updateStoryElement("character", "Sarah leaves the room.", [], {
        key: "character:sarah",
        metadata: { mood: "angry" },
      });

      expect(second).toBe(first);
      const { node, vector } = await h.kb.getStoryElement(first);
      const hash = calculateContentHash("Sarah leaves the room.");
      expect(node?.properties).toEqual({ mood: "angry", age: 34, content_hash: hash });
      expect(vector?.content).toBe("Sarah leaves the room.");
      expect(vector?.metadata).toEqual({ mood: "angry", type: "character", content_hash: hash });
    });

    it("should write each distinct relationship once", async () => {
      const tom = await h.kb.updateStoryElement("character", "Tom waits by the door.", [], { key: "character:tom" });
      const relationships = [
        { targetId: tom, type: "KNOWS" },
        { targetId: tom, type: "KNOWS" },
        { targetId: tom, type: "TRUSTS" },
      ];

      const sarah = await h.kb.updateStoryElement("character", SARAH, relationships, { key: "character:sarah" });
      await h.kb.updateStoryElement("character", SARAH, relationships, { key: "character:sarah" });

      expect(await h.kb.relationshipsOf(sarah)).toEqual([
        { sourceId: sarah, targetId: tom, type: "KNOWS" },
        { sourceId: sarah, targetId: tom, type: "TRUSTS" },
      ]);
      expect(h.ledger.history(sarah)[0]?.payload.graph).toHaveLength(3);
    });

    it("should linearize concurrent writes to the same element", async () => {
      const contents = ["one", "two", "three", "four", "five"];

      const ids = await Promise.all(
        contents.map((content) => h.kb.updateStoryElement("scene", content, [], { key: "scene:opening" }))
      );

      expect(new Set(ids).size).toBe(1);
      const [entityId] = ids;
      if (!entityId) throw new Error("no identifier");

      const history = h.kb.history(entityId);
      expect(history.map((e) => e.status)).toEqual(contents.flatMap(() => ["pending", "committed"]));
      for (let i = 0; i < history.length; i += 2) {
        expect(history[i]?.transactionId).toBe(history[i + 1]?.transactionId);
      }
      expect((await h.kb.checkConsistency(entityId)).status).toBe("consistent");
    });
  });

  describe("validation", () => {
    it("should reject empty element types and content before touching anything", async () => {
      await expect(h.kb.updateStoryElement("", SARAH)).rejects.toBeInstanceOf(ValidationError);
      await expect(h.kb.updateStoryElement("character", "   ")).rejects.toBeInstanceOf(ValidationError);
      await expect(
        h.kb.updateStoryElement("character", SARAH, [{ targetId: "", type: "KNOWS" }])
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        h.kb.updateStoryElement("character", SARAH, [], { metadata: { content_hash: "forged" } })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(h.registry.size()).toBe(0);
      expect(h.ledger.getCurrentSequence()).toBe(0);
    });

    it("should roll back and release the lock when staging is rejected", async () => {
      vi.spyOn(h.coordinator, "stageGraphOp").mockImplementationOnce(() => {
        throw new ValidationError("rejected", { field: "graphOp" });
      });

      await expect(h.kb.updateStoryElement("character", SARAH, [], { key: "character:sarah" })).rejects.toBeInstanceOf(
        ValidationError
      );

      const entityId = h.registry.lookup("character:sarah");
      expect(entityId).not.toBeNull();
      if (!entityId) return;
      expect(h.coordinator.locks.isLocked(entityId)).toBe(false);
      expect(h.kb.history(entityId).map((e) => e.status)).toEqual(["pending", "rolled_back"]);
      expect(await h.kb.checkConsistency(entityId)).toEqual({ entityId, status: "absent" });
    });

    it("should abort without writing when a relationship target does not exist", async () => {
      await expect(
        h.kb.updateStoryElement("character", SARAH, [{ targetId: "ent_nobody", type: "KNOWS" }], {
          key: "character:sarah",
        })
      ).rejects.toBeInstanceOf(AbortedError);

      const entityId = h.registry.lookup("character:sarah");
      if (!entityId) throw new Error("identifier was not minted");
      expect((await h.kb.getStoryElement(entityId)).vector).toBeNull();
      expect(h.coordinator.locks.isLocked(entityId)).toBe(false);
    });
  });

  describe("checkConsistency", () => {
    it("should report an element with no data as absent", async () => {
      expect(await h.kb.checkConsistency("ent_unknown")).toEqual({ entityId: "ent_unknown", status: "absent" });
    });

    it("should report the missing side after a partial commit", async () => {
      vi.spyOn(h.vector, "commit").mockRejectedValueOnce(new StoreError("vector offline", { adapter: "vector" }));

      await expect(h.kb.updateStoryElement("character", SARAH, [], { key: "character:sarah" })).rejects.toBeInstanceOf(
        ReconciliationRequiredError
      );

      const entityId = h.registry.lookup("character:sarah");
      if (!entityId) throw new Error("identifier was not minted");
      expect(await h.kb.checkConsistency(entityId)).toEqual({
        entityId,
        status: "vector_missing",
        graphHash: calculateContentHash(SARAH),
      });
    });

    it("should report stores that disagree on content", async () => {
      await h.graph.commit(
        await h.graph.prepareWrite([
          { kind: "upsert_node", node: { id: "ent_x", elementType: "place", contentHash: "stale", properties: {} } },
        ])
      );
      await h.vector.commit(await h.vector.prepareUpsert("ent_x", "The harbor at dawn.", {}));

      expect(await h.kb.checkConsistency("ent_x")).toEqual({
        entityId: "ent_x",
        status: "hash_mismatch",
        graphHash: "stale",
        vectorHash: calculateContentHash("The harbor at dawn."),
      });
    });
  });

  describe("searchSimilar", () => {
    it("should rank committed elements by similarity", async () => {
      h = await setup({
        async embed(text: string): Promise<number[]> {
          return text.includes("room") ? [1, 0] : [0, 1];
        },
      });
      const sarah = await h.kb.updateStoryElement("character", SARAH);
      await h.kb.updateStoryElement("place", "The harbor at dawn.");

      const hits = await h.kb.searchSimilar([1, 0.1], 1);

      expect(hits.map((hit) => hit.id)).toEqual([sarah]);
      expect(hits[0]?.content).toBe(SARAH);
    });
  });
});
