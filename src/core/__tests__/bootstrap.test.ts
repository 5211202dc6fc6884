/**
 * Composition root tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { createStoryweave } from "../bootstrap.js";
import { InMemoryGraphStore } from "../stores/impl/InMemoryGraphStore.js";
import { PostgresGraphStore } from "../stores/impl/PostgresGraphStore.js";
import { ReconciliationRequiredError, StoreError } from "../errors.js";

describe("createStoryweave", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "storyweave-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should wire in-memory stores by default", async () => {
    const storyweave = createStoryweave({ config: { dataDir: tempDir } });
    await storyweave.open();

    const entityId = await storyweave.knowledgeBase.updateStoryElement("character", "Sarah enters the room.");

    expect(storyweave.graph).toBeInstanceOf(InMemoryGraphStore);
    expect((await storyweave.knowledgeBase.checkConsistency(entityId)).status).toBe("consistent");
    expect(storyweave.reconciler.isRunning).toBe(false);
    await storyweave.close();
    expect(await storyweave.graph.ping()).toBe(false);
  });

  it("should recover a partial commit end to end", async () => {
    const storyweave = createStoryweave({ config: { dataDir: tempDir } });
    await storyweave.open();
    vi.spyOn(storyweave.vector, "commit").mockRejectedValueOnce(new StoreError("offline", { adapter: "vector" }));

    const error = await storyweave.knowledgeBase
      .updateStoryElement("character", "Sarah enters the room.", [], { key: "character:sarah" })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ReconciliationRequiredError);

    const report = await storyweave.reconciler.reconcileOnce();
    const entityId = storyweave.registry.lookup("character:sarah");

    expect(report.reconciled).toBe(1);
    expect(entityId).not.toBeNull();
    if (entityId) {
      expect((await storyweave.knowledgeBase.checkConsistency(entityId)).status).toBe("consistent");
    }
    await storyweave.close();
  });

  it("should keep registry and ledger on disk with file storage", async () => {
    const first = createStoryweave({ config: { dataDir: tempDir, storage: "file" } });
    await first.open();
    const entityId = await first.knowledgeBase.updateStoryElement("place", "The harbor at dawn.", [], {
      key: "place:harbor",
    });
    await first.close();

    const second = createStoryweave({ config: { dataDir: tempDir, storage: "file" } });
    await second.open();

    expect(second.registry.lookup("place:harbor")).toBe(entityId);
    expect(second.ledger.history(entityId).map((e) => e.status)).toEqual(["pending", "committed"]);
    await second.close();
  });

  it("should select the Postgres graph store when configured", () => {
    const storyweave = createStoryweave({
      config: { dataDir: tempDir, postgres: { connectionString: "postgres://localhost:5432/storyweave_test" } },
    });

    expect(storyweave.graph).toBeInstanceOf(PostgresGraphStore);
  });

  it("should run the reconciler between open and close when asked", async () => {
    const storyweave = createStoryweave({ config: { dataDir: tempDir }, autoReconcile: true });

    await storyweave.open();
    expect(storyweave.reconciler.isRunning).toBe(true);

    await storyweave.close();
    expect(storyweave.reconciler.isRunning).toBe(false);
  });
});
