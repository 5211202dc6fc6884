/**
 * Registry storage backends
 */

import * as path from "node:path";
import type { IRegistryStorage, RegistryBinding } from "../interfaces/IEntityRegistry.js";
import { RegistryBindingSchema } from "../interfaces/IEntityRegistry.js";
import { appendJsonLine, readJsonLines } from "../../../utils/fs.js";
import { Mutex } from "../../../utils/async.js";

export const REGISTRY_FILE = "registry.jsonl";

export class MemoryRegistryStorage implements IRegistryStorage {
  private readonly bindings: RegistryBinding[] = [];

  async load(): Promise<RegistryBinding[]> {
    return [...this.bindings];
  }

  async append(binding: RegistryBinding): Promise<void> {
    this.bindings.push({ ...binding });
  }
}

/**
 * One JSON object per line in `<dataDir>/registry.jsonl`
 */
export class FileRegistryStorage implements IRegistryStorage {
  private readonly filePath: string;
  private readonly writeLock = new Mutex();

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, REGISTRY_FILE);
  }

  async load(): Promise<RegistryBinding[]> {
    const lines = await readJsonLines(this.filePath, { repairTail: true });
    return lines.map((line) => RegistryBindingSchema.parse(line));
  }

  async append(binding: RegistryBinding): Promise<void> {
    await this.writeLock.runExclusive(() => appendJsonLine(this.filePath, binding));
  }
}
