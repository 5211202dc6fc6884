/**
 * PostgreSQL plumbing: pool creation, migrations and error mapping
 */

import pg from "pg";
import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type { PostgresConfig } from "../../config.js";
import type { StoreSide } from "../../../types/index.js";
import { StoreError, TransientStoreError, ValidationError, type StoryweaveError } from "../../errors.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("postgres");

/**
 * The parts of `pg.PoolClient` the adapter uses
 */
export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(err?: Error | boolean): void;
}

/**
 * The parts of `pg.Pool` the adapter uses
 */
export interface PgPoolLike {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

/** SQL files shipped with the package */
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL("../../../../migrations/", import.meta.url));

export function createPool(config: PostgresConfig): pg.Pool {
  if (config.connectionString) {
    return new pg.Pool({ connectionString: config.connectionString, max: config.max });
  }
  return new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.max,
  });
}

/**
 * Applies every `.sql` file in `migrationsDir` not yet recorded in
 * `schema_migrations`, each in its own transaction, in file name order.
 *
 * @returns versions applied by this call
 */
export async function runMigrations(pool: PgPoolLike, migrationsDir: string = DEFAULT_MIGRATIONS_DIR): Promise<string[]> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const files = await readdir(migrationsDir);
  const sqlFiles = files.filter((f) => f.endsWith(".sql")).sort();
  const applied: string[] = [];

  for (const file of sqlFiles) {
    const version = file.replace(/\.sql$/, "");

    const { rows } = await pool.query("SELECT version FROM schema_migrations WHERE version = $1", [version]);
    if (rows.length > 0) continue;

    const sql = await readFile(join(migrationsDir, file), "utf-8");
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (version) VALUES ($1)", [version]);
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }

    applied.push(version);
    logger.info({ version }, "Applied migration");
  }

  return applied;
}

// =============================================================================
// Error Mapping
// =============================================================================

/** SQLSTATEs for rejected input */
const VALIDATION_CODES = new Set(["23502", "23503", "23505", "23514", "22P02"]);

/** SQLSTATEs worth retrying: lost connections, shutdowns, serialization */
const TRANSIENT_CODES = new Set(["40001", "40P01", "53300", "57P01", "57P02", "57P03"]);

const TRANSIENT_NODE_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EPIPE", "ENOTFOUND"]);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Classifies a driver error for the coordinator
 */
export function mapPgError(error: unknown, adapter: StoreSide, action: string): StoryweaveError {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  const context = { adapter, pgCode: code };

  if (code && VALIDATION_CODES.has(code)) {
    return new ValidationError(`${action} rejected: ${message}`, { ...context, field: "graphOps" });
  }
  if (code && (TRANSIENT_CODES.has(code) || code.startsWith("08") || TRANSIENT_NODE_CODES.has(code))) {
    return new TransientStoreError(`${action} failed: ${message}`, context, error);
  }
  return new StoreError(`${action} failed: ${message}`, context, error);
}
