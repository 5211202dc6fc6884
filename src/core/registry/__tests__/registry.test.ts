/**
 * EntityRegistry Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { EntityRegistry, generateEntityId } from "../impl/EntityRegistry.js";
import { FileRegistryStorage, MemoryRegistryStorage, REGISTRY_FILE } from "../impl/RegistryStorage.js";
import { InvalidStateError, ValidationError } from "../../errors.js";

describe("EntityRegistry", () => {
  let registry: EntityRegistry;

  beforeEach(async () => {
    registry = new EntityRegistry(new MemoryRegistryStorage());
    await registry.initialize();
  });

  it("should mint ent_ prefixed identifiers", () => {
    expect(generateEntityId()).toMatch(/^ent_[0-9a-f-]{36}$/);
  });

  it("should return the same identifier for the same key", async () => {
    const first = await registry.resolveOrCreate("character:sarah");
    const second = await registry.resolveOrCreate("character:sarah");

    expect(second).toBe(first);
    expect(registry.size()).toBe(1);
  });

  it("should return different identifiers for different keys", async () => {
    const a = await registry.resolveOrCreate("character:sarah");
    const b = await registry.resolveOrCreate("character:tom");

    expect(a).not.toBe(b);
    expect(registry.lookup("character:tom")).toBe(b);
    expect(registry.has(a)).toBe(true);
    expect(registry.has("ent_unknown")).toBe(false);
  });

  it("should mint exactly one identifier under concurrent first calls", async () => {
    const storage = new MemoryRegistryStorage();
    const appendSpy = vi.spyOn(storage, "append");
    const concurrent = new EntityRegistry(storage);
    await concurrent.initialize();

    const ids = await Promise.all(Array.from({ length: 20 }, () => concurrent.resolveOrCreate("scene:opening")));

    expect(new Set(ids).size).toBe(1);
    expect(appendSpy).toHaveBeenCalledTimes(1);
  });

  it("should return null when looking up an unseen key", () => {
    expect(registry.lookup("character:nobody")).toBeNull();
  });

  it("should reject empty and whitespace keys", async () => {
    await expect(registry.resolveOrCreate("")).rejects.toBeInstanceOf(ValidationError);
    await expect(registry.resolveOrCreate("   ")).rejects.toBeInstanceOf(ValidationError);
    expect(registry.size()).toBe(0);
  });

  it("should refuse use before initialize", async () => {
    const uninitialized = new EntityRegistry(new MemoryRegistryStorage());

    expect(() => uninitialized.lookup("x")).toThrow(InvalidStateError);
    await expect(uninitialized.resolveOrCreate("x")).rejects.toBeInstanceOf(InvalidStateError);
  });

  it("should not bind a key whose binding failed to persist", async () => {
    const storage = new MemoryRegistryStorage();
    vi.spyOn(storage, "append").mockRejectedValueOnce(new Error("disk full"));
    const failing = new EntityRegistry(storage);
    await failing.initialize();

    await expect(failing.resolveOrCreate("place:harbor")).rejects.toThrow("disk full");
    expect(failing.lookup("place:harbor")).toBeNull();

    const retried = await failing.resolveOrCreate("place:harbor");
    expect(failing.lookup("place:harbor")).toBe(retried);
  });

  it("should use a custom identifier factory", async () => {
    let next = 0;
    const custom = new EntityRegistry(new MemoryRegistryStorage(), { generateId: () => `E${++next}` });
    await custom.initialize();

    expect(await custom.resolveOrCreate("a")).toBe("E1");
    expect(await custom.resolveOrCreate("b")).toBe("E2");
    expect(await custom.resolveOrCreate("a")).toBe("E1");
  });
});

describe("FileRegistryStorage", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "registry-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should survive a reload", async () => {
    const first = new EntityRegistry(new FileRegistryStorage(tempDir));
    await first.initialize();
    const id = await first.resolveOrCreate("character:sarah");

    const reloaded = new EntityRegistry(new FileRegistryStorage(tempDir));
    await reloaded.initialize();

    expect(reloaded.lookup("character:sarah")).toBe(id);
    expect(await reloaded.resolveOrCreate("character:sarah")).toBe(id);
    expect(reloaded.size()).toBe(1);
  });

  it("should write one JSON line per binding", async () => {
    const registry = new EntityRegistry(new FileRegistryStorage(tempDir));
    await registry.initialize();
    await registry.resolveOrCreate("a");
    await registry.resolveOrCreate("b");

    const content = await fs.readFile(path.join(tempDir, REGISTRY_FILE), "utf-8");
    const lines = content.trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ naturalKey: "a" });
  });

  it("should read an empty registry when the file does not exist", async () => {
    const storage = new FileRegistryStorage(path.join(tempDir, "missing"));
    expect(await storage.load()).toEqual([]);
  });
});
