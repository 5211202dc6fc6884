/**
 * Change Ledger Module
 *
 * @module
 */

export type { IChangeLedger, ILedgerStorage, LedgerSubscriber, SubscriptionFilter } from "./interfaces/IChangeLedger.js";
export * from "./models/change-event.js";
export { ChangeLedger } from "./impl/ChangeLedger.js";
export { MemoryLedgerStorage, FileLedgerStorage, LEDGER_FILE } from "./impl/LedgerStorage.js";
