/**
 * @meridian/store — JSONL file primitives shared by the file backends.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn trailing lines) are skipped on load
 * - The file is the source of truth; in-memory state is derived
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { StoreError } from "./types.js";

/**
 * Ensure the parent directory of a file exists.
 */
export function ensureParentDir(filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
}

/**
 * Append one JSON line and fsync.
 */
export function appendJsonLine(filePath: string, value: unknown): void {
  const data = JSON.stringify(value) + "\n";
  let fd: number;
  try {
    fd = openSync(filePath, "a");
  } catch (err: unknown) {
    throw new StoreError(
      "IO_FAILURE",
      `Cannot open ${filePath} for append: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  try {
    appendFileSync(fd, data, "utf-8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

/**
 * Read every parseable JSON line of a file.
 *
 * Missing files read as empty. Lines that fail to parse (torn writes
 * from an unclean shutdown) are skipped.
 */
export function readJsonLines(filePath: string): unknown[] {
  if (!existsSync(filePath)) {
    return [];
  }

  const values: unknown[] = [];
  for (const line of readFileSync(filePath, "utf-8").split("\n")) {
    const trimmed = line.trim();
    if (trimmed.length === 0) {
      continue;
    }
    try {
      values.push(JSON.parse(trimmed));
    } catch {
      // Torn write
      continue;
    }
  }
  return values;
}
