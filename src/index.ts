/**
 * Storyweave
 *
 * Applies each story element update to a graph store and a vector store as
 * one logical transaction, with a change ledger and reconciliation of
 * partial commits.
 *
 * @module
 */

export * from "./core/errors.js";
export * from "./core/config.js";
export * from "./core/bootstrap.js";
export * from "./core/registry/index.js";
export * from "./core/ledger/index.js";
export * from "./core/stores/index.js";
export * from "./core/transaction/index.js";
export * from "./core/reconciliation/index.js";
export * from "./core/knowledge-base/index.js";
export * from "./types/index.js";
export * from "./types/result.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
export { calculateContentHash } from "./utils/hash.js";
