/**
 * Streamed completion accumulation: newline-delimited JSON fragments folded into one string.
 */

import { z } from "zod";

/** One incremental unit of a streamed generation (Ollama /api/generate shape). */
export const StreamFragmentSchema = z.object({
  response: z.string().optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});
export type StreamFragment = z.infer<typeof StreamFragmentSchema>;

export interface AccumulatedStream {
  text: string;
  fragments: number;
  skipped: number;
  /** Error reported in-band by the provider, if any. */
  providerError?: string;
}

/** Parses one NDJSON line; returns null for anything that is not a well-formed fragment. */
export function parseFragment(line: string): StreamFragment | null {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = StreamFragmentSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Splits a byte stream into text lines, decoding UTF-8 across chunk boundaries. */
export async function* readLines(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  let buffered = "";
  for await (const chunk of chunks) {
    buffered += decoder.decode(chunk, { stream: true });
    let newline = buffered.indexOf("\n");
    while (newline >= 0) {
      yield buffered.slice(0, newline);
      buffered = buffered.slice(newline + 1);
      newline = buffered.indexOf("\n");
    }
  }
  buffered += decoder.decode();
  if (buffered.length > 0) yield buffered;
}

/**
 * Concatenates the text of every fragment in arrival order. Blank lines are
 * ignored; malformed fragments are counted and skipped, never fatal.
 */
export async function accumulateFragments(lines: AsyncIterable<string>): Promise<AccumulatedStream> {
  const acc: AccumulatedStream = { text: "", fragments: 0, skipped: 0 };
  for await (const line of lines) {
    if (!line.trim()) continue;
    const fragment = parseFragment(line);
    if (!fragment) {
      acc.skipped++;
      continue;
    }
    acc.fragments++;
    if (fragment.response) acc.text += fragment.response;
    if (fragment.error) acc.providerError = fragment.error;
  }
  return acc;
}
