/**
 * Reconciliation Module
 *
 * Completes partially committed transactions from the change ledger.
 */

// Interfaces
export * from "./interfaces/IReconciliationWorker.js";

// Implementation
export { ReconciliationWorker, type ReconciliationWorkerOptions } from "./impl/ReconciliationWorker.js";
