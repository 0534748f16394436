/**
 * JSONL logging. Appends one JSON line per event.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(
  path: string,
  event: unknown
): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const line = JSON.stringify(event) + "\n";
  await appendFile(path, line);
}

/**
 * Diagnostics logging must not change a response: write failures are reported
 * on the console under the caller's tag.
 */
export async function appendJsonlReported(
  path: string,
  event: unknown,
  tag: string
): Promise<void> {
  try {
    await appendJsonl(path, event);
  } catch (e) {
    console.error(`[${tag}] Failed to append to ${path}:`, e instanceof Error ? e.message : e);
  }
}
