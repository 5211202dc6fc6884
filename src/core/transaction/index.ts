/**
 * Transaction Module
 *
 * @module
 */

export type { ITransactionCoordinator, GraphOpInput, VectorUpsertOpInput } from "./interfaces/ITransactionCoordinator.js";
export * from "./models/transaction.js";
export { EntityLockTable, type LockRequest } from "./impl/EntityLockTable.js";
export { TransactionCoordinator, type TransactionCoordinatorOptions } from "./impl/TransactionCoordinator.js";
