/**
 * File System Utilities
 * Directory creation, JSON files and append-only JSON-lines logs
 */

import * as fsPromises from "node:fs/promises";
import * as path from "node:path";

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Ensures a directory exists, creating it recursively if needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fsPromises.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (!isErrnoException(error) || error.code !== "EEXIST") {
      throw error;
    }
  }
}

/**
 * Reads and parses a JSON file. Returns null when the file does not exist.
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return null;
    throw error;
  }
  return JSON.parse(content) as unknown;
}

/**
 * Appends one JSON value as a single line, creating the file and its
 * parent directories on first write.
 */
export async function appendJsonLine(filePath: string, value: unknown): Promise<void> {
  await ensureDirectory(path.dirname(filePath));
  await fsPromises.appendFile(filePath, `${JSON.stringify(value)}\n`, "utf-8");
}

export interface ReadJsonLinesOptions {
  /**
   * Leave the file ready for appends: a torn final line is cut off and a
   * final line missing its newline gets one
   */
  repairTail?: boolean;
}

/**
 * Reads every line of a JSON-lines file. A missing file reads as empty.
 * A torn final line (no trailing newline, unparsable) is dropped; any
 * other unparsable line is an error.
 */
export async function readJsonLines(filePath: string, options: ReadJsonLinesOptions = {}): Promise<unknown[]> {
  let content: string;
  try {
    content = await fsPromises.readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return [];
    throw error;
  }

  const lines = content.split("\n");
  const values: unknown[] = [];
  let torn = false;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i]?.trim();
    if (!line) continue;
    try {
      values.push(JSON.parse(line) as unknown);
    } catch (error) {
      const isLast = i === lines.length - 1;
      if (isLast) {
        torn = true;
        break;
      }
      throw new Error(`Corrupt JSON line ${i + 1} in ${filePath}: ${String(error)}`);
    }
  }

  if (options.repairTail && content.length > 0 && !content.endsWith("\n")) {
    if (torn) {
      const kept = content.slice(0, content.lastIndexOf("\n") + 1);
      await fsPromises.truncate(filePath, Buffer.byteLength(kept, "utf-8"));
    } else {
      await fsPromises.appendFile(filePath, "\n", "utf-8");
    }
  }

  return values;
}
