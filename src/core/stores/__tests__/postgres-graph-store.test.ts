/**
 * PostgreSQL graph store tests against an in-process fake pool
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { PostgresGraphStore } from "../impl/PostgresGraphStore.js";
import { mapPgError, runMigrations, type PgClientLike, type PgPoolLike } from "../impl/postgres.js";
import { StoreError, TransientStoreError, ValidationError } from "../../errors.js";

interface QueryCall {
  text: string;
  values?: unknown[];
}

class FakeClient implements PgClientLike {
  readonly queries: QueryCall[] = [];
  released: Error | boolean | undefined | "no" = "no";
  failOn?: { match: string; error: Error };

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.queries.push({ text: text.trim(), values });
    if (this.failOn && text.includes(this.failOn.match)) throw this.failOn.error;
    return { rows: [] };
  }

  release(err?: Error | boolean): void {
    this.released = err;
  }

  statements(): string[] {
    return this.queries.map((q) => q.text.split(/\s+/).slice(0, 3).join(" "));
  }
}

class FakePool implements PgPoolLike {
  readonly clients: FakeClient[] = [];
  readonly queries: QueryCall[] = [];
  rows: unknown[] = [];
  appliedVersions = new Set<string>();
  ended = false;
  nextClientFailure?: { match: string; error: Error };

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.queries.push({ text: text.trim(), values });
    if (text.includes("FROM schema_migrations")) {
      const version = String(values?.[0]);
      return { rows: this.appliedVersions.has(version) ? [{ version }] : [] };
    }
    return { rows: this.rows };
  }

  async connect(): Promise<PgClientLike> {
    const client = new FakeClient();
    client.failOn = this.nextClientFailure;
    this.nextClientFailure = undefined;
    this.clients.push(client);
    return client;
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("PostgresGraphStore", () => {
  let pool: FakePool;
  let graph: PostgresGraphStore;

  beforeEach(async () => {
    pool = new FakePool();
    graph = new PostgresGraphStore({ pool, migrate: false });
    await graph.open();
  });

  it("should stage writes inside an open transaction, nodes first", async () => {
    const token = await graph.prepareWrite([
      { kind: "upsert_relationship", relationship: { sourceId: "ent_a", targetId: "ent_b", type: "KNOWS" } },
      { kind: "upsert_node", node: { id: "ent_a", elementType: "character", contentHash: "h1", properties: { mood: "calm" } } },
    ]);

    const client = pool.clients[0];
    expect(client?.statements()).toEqual(["BEGIN", "INSERT INTO story_nodes", "INSERT INTO story_edges"]);
    expect(client?.queries[1]?.values).toEqual(["ent_a", "character", "h1", '{"mood":"calm"}']);
    expect(client?.released).toBe("no");
    expect(graph.stagedCount).toBe(1);

    await graph.commit(token);

    expect(client?.statements().at(-1)).toBe("COMMIT");
    expect(client?.released).toBeUndefined();
    expect(graph.stagedCount).toBe(0);
  });

  it("should roll back on discard and ignore unknown tokens", async () => {
    const token = await graph.prepareWrite([
      { kind: "upsert_node", node: { id: "ent_a", elementType: "character", contentHash: "h1" } },
    ]);

    await graph.discard(token);
    await graph.discard(token);

    expect(pool.clients[0]?.statements().at(-1)).toBe("ROLLBACK");
    await expect(graph.commit(token)).rejects.toBeInstanceOf(StoreError);
  });

  it("should abandon the transaction and map the error when an upsert fails", async () => {
    pool.nextClientFailure = { match: "story_edges", error: pgError("violates foreign key", "23503") };

    await expect(
      graph.prepareWrite([
        { kind: "upsert_relationship", relationship: { sourceId: "ent_a", targetId: "ent_ghost", type: "KNOWS" } },
      ])
    ).rejects.toBeInstanceOf(ValidationError);

    const client = pool.clients[0];
    expect(client?.statements().at(-1)).toBe("ROLLBACK");
    expect(client?.released).toBeUndefined();
    expect(graph.stagedCount).toBe(0);
  });

  it("should read nodes and relationships from rows", async () => {
    pool.rows = [{ id: "ent_a", element_type: "character", content_hash: "h1", properties: { mood: "calm" } }];
    expect(await graph.getNode("ent_a")).toEqual({
      id: "ent_a",
      elementType: "character",
      contentHash: "h1",
      properties: { mood: "calm" },
    });

    pool.rows = [{ source_id: "ent_a", target_id: "ent_b", rel_type: "KNOWS" }];
    expect(await graph.getRelationships("ent_a")).toEqual([{ sourceId: "ent_a", targetId: "ent_b", type: "KNOWS" }]);

    pool.rows = [];
    expect(await graph.getNode("ent_missing")).toBeNull();
  });

  it("should discard staged transactions and end the pool on close", async () => {
    await graph.prepareWrite([{ kind: "upsert_node", node: { id: "ent_a", elementType: "character", contentHash: "h1" } }]);

    await graph.close();

    expect(pool.clients[0]?.statements().at(-1)).toBe("ROLLBACK");
    expect(pool.ended).toBe(true);
    await expect(
      graph.prepareWrite([{ kind: "upsert_node", node: { id: "ent_b", elementType: "character", contentHash: "h2" } }])
    ).rejects.toBeInstanceOf(StoreError);
  });
});

describe("runMigrations", () => {
  let migrationsDir: string;

  beforeEach(async () => {
    migrationsDir = await fs.mkdtemp(path.join(os.tmpdir(), "migrations-test-"));
    await fs.writeFile(path.join(migrationsDir, "002_second.sql"), "SELECT 2;", "utf-8");
    await fs.writeFile(path.join(migrationsDir, "001_first.sql"), "SELECT 1;", "utf-8");
    await fs.writeFile(path.join(migrationsDir, "README.md"), "not sql", "utf-8");
  });

  afterEach(async () => {
    await fs.rm(migrationsDir, { recursive: true, force: true });
  });

  it("should apply pending files in name order and skip applied ones", async () => {
    const pool = new FakePool();
    pool.appliedVersions.add("001_first");

    const applied = await runMigrations(pool, migrationsDir);

    expect(applied).toEqual(["002_second"]);
    expect(pool.clients).toHaveLength(1);
    expect(pool.clients[0]?.queries.map((q) => q.text)).toEqual([
      "BEGIN",
      "SELECT 2;",
      "INSERT INTO schema_migrations (version) VALUES ($1)",
      "COMMIT",
    ]);
  });

  it("should roll back a failing migration", async () => {
    const pool = new FakePool();
    pool.nextClientFailure = { match: "SELECT 1", error: pgError("syntax error", "42601") };

    await expect(runMigrations(pool, migrationsDir)).rejects.toThrow("syntax error");
    expect(pool.clients[0]?.statements().at(-1)).toBe("ROLLBACK");
  });
});

describe("mapPgError", () => {
  it("should classify constraint violations as validation errors", () => {
    expect(mapPgError(pgError("duplicate", "23505"), "graph", "Write")).toBeInstanceOf(ValidationError);
  });

  it("should classify connection loss and serialization failures as transient", () => {
    expect(mapPgError(pgError("gone", "08006"), "graph", "Write")).toBeInstanceOf(TransientStoreError);
    expect(mapPgError(pgError("retry", "40001"), "graph", "Write")).toBeInstanceOf(TransientStoreError);
    expect(mapPgError(pgError("refused", "ECONNREFUSED"), "graph", "Write")).toBeInstanceOf(TransientStoreError);
  });

  it("should classify everything else as a store error", () => {
    const mapped = mapPgError(new Error("weird"), "graph", "Write");

    expect(mapped).toBeInstanceOf(StoreError);
    expect(mapped.message).toBe("Write failed: weird");
  });
});
