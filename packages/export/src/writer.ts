/**
 * Session persistence — writes the tabular and structured exports side by
 * side as `session_<YYYYMMDD_HHMMSS>.csv` / `.json`.
 *
 * Writing never mutates the record, so a failed save still leaves the
 * summary available for display.
 */
import { mkdir, writeFile } from "node:fs/promises";
import { arch, platform, release } from "node:os";
import { join } from "node:path";

import type { SessionRecord } from "@pointing-lab/core";
import { toCsv } from "./csv.js";
import { toStructuredJson } from "./json.js";
import { PersistenceError } from "./errors.js";

export interface SaveSessionOptions {
  /** Timestamp used for the file names and `created_at`. Defaults to now. */
  readonly now?: Date;
  /** Platform identifier written to the JSON. Defaults to {@link platformIdentifier}. */
  readonly platform?: string;
}

export interface SavedSessionPaths {
  readonly csvPath: string;
  readonly jsonPath: string;
}

/** Operating-system identifier, e.g. "linux 6.1.0 x64". */
export function platformIdentifier(): string {
  return `${platform()} ${release()} ${arch()}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-time stamp used in session file names: YYYYMMDD_HHMMSS. */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}` +
    `_${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

async function writeOrThrow(filePath: string, content: string): Promise<void> {
  try {
    await writeFile(filePath, content, "utf-8");
  } catch (err) {
    throw new PersistenceError(filePath, err);
  }
}

/**
 * Write both export files for `record` into `directory` (created if
 * missing). Throws PersistenceError on any filesystem failure.
 */
export async function saveSession(
  record: SessionRecord,
  directory: string,
  options: SaveSessionOptions = {},
): Promise<SavedSessionPaths> {
  const now = options.now ?? new Date();
  const stamp = formatFileTimestamp(now);
  const csvPath = join(directory, `session_${stamp}.csv`);
  const jsonPath = join(directory, `session_${stamp}.json`);

  try {
    await mkdir(directory, { recursive: true });
  } catch (err) {
    throw new PersistenceError(directory, err);
  }

  await writeOrThrow(csvPath, toCsv(record.trials));
  await writeOrThrow(
    jsonPath,
    toStructuredJson(record, {
      createdAt: now,
      platform: options.platform ?? platformIdentifier(),
    }),
  );

  return { csvPath, jsonPath };
}
