/**
 * Ledger storage backends
 */

import * as path from "node:path";
import type { ILedgerStorage } from "../interfaces/IChangeLedger.js";
import { ChangeEventSchema, type ChangeEvent } from "../models/change-event.js";
import { appendJsonLine, readJsonLines } from "../../../utils/fs.js";

export const LEDGER_FILE = "ledger.jsonl";

export class MemoryLedgerStorage implements ILedgerStorage {
  private readonly events: ChangeEvent[] = [];

  async load(): Promise<ChangeEvent[]> {
    return this.events.map((event) => structuredClone(event));
  }

  async append(event: ChangeEvent): Promise<void> {
    this.events.push(structuredClone(event));
  }
}

/**
 * One record per line in `<dataDir>/ledger.jsonl`. Appends are serialized
 * by the ledger, so the file never interleaves partial lines.
 */
export class FileLedgerStorage implements ILedgerStorage {
  readonly filePath: string;

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, LEDGER_FILE);
  }

  async load(): Promise<ChangeEvent[]> {
    const lines = await readJsonLines(this.filePath, { repairTail: true });
    return lines.map((line) => ChangeEventSchema.parse(line));
  }

  async append(event: ChangeEvent): Promise<void> {
    await appendJsonLine(this.filePath, event);
  }
}
