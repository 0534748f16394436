/**
 * Best-effort recovery of a JSON object from a free-form LLM completion.
 *
 * Repair is an ordered chain of pure string transforms followed by a parse step.
 * Transforms that rewrite JSON syntax only touch text from the first "{" onward,
 * and only outside string values, so prose preambles and string content survive.
 */

export type TextTransform = (text: string) => string;

export type RepairStrategy = "direct" | "span" | "balanced";

export type RepairResult =
  | { ok: true; value: Record<string, unknown>; repaired: string; strategy: RepairStrategy }
  | { ok: false; repaired: string; reason: string };

// ─── Segmentation ──────────────────────────────────────────────────────────

interface Segment {
  kind: "prose" | "code" | "string";
  text: string;
}

/**
 * Splits text into prose (before the first "{"), JSON string literals, and the
 * structural code between them. An unterminated string runs to the end.
 */
function segment(text: string): Segment[] {
  const start = text.indexOf("{");
  if (start < 0) return [{ kind: "prose", text }];
  const segments: Segment[] = [];
  if (start > 0) segments.push({ kind: "prose", text: text.slice(0, start) });
  let codeStart = start;
  let i = start;
  while (i < text.length) {
    if (text[i] !== '"') {
      i++;
      continue;
    }
    if (i > codeStart) segments.push({ kind: "code", text: text.slice(codeStart, i) });
    let j = i + 1;
    while (j < text.length && text[j] !== '"') {
      j += text[j] === "\\" ? 2 : 1;
    }
    const end = Math.min(j + 1, text.length);
    segments.push({ kind: "string", text: text.slice(i, end) });
    i = end;
    codeStart = end;
  }
  if (codeStart < text.length) segments.push({ kind: "code", text: text.slice(codeStart) });
  return segments;
}

function rewriteOutsideStrings(text: string, rewrite: TextTransform): string {
  return segment(text)
    .map((s) => (s.kind === "code" ? rewrite(s.text) : s.text))
    .join("");
}

// ─── Transforms ────────────────────────────────────────────────────────────

export function trimWhitespace(text: string): string {
  return text.trim();
}

/** Removes a leading ``` / ```json marker and a trailing ``` marker. */
export function stripCodeFences(text: string): string {
  let s = text.trim();
  if (s.startsWith("```")) s = s.replace(/^```[\w-]*/, "");
  if (s.endsWith("```")) s = s.slice(0, -3);
  return s.trim();
}

function unwrapStringLiteral(text: string): string {
  if (text.length < 2 || !text.startsWith('"') || !text.endsWith('"')) return text;
  try {
    const inner: unknown = JSON.parse(text);
    return typeof inner === "string" && inner.trim().startsWith("{") ? inner.trim() : text;
  } catch {
    return text;
  }
}

function hasOnlyEscapedQuotes(text: string): boolean {
  return text.includes('\\"') && !/(^|[^\\])"/.test(text);
}

/** Decodes escaping level by level until the payload has a real quote. */
function decodeEscapedPayload(text: string): string {
  let s = text;
  while (hasOnlyEscapedQuotes(s)) s = s.replace(/\\(["\\])/g, "$1");
  return s;
}

/**
 * Unwraps a payload that arrived as a quoted JSON string, decodes a payload whose
 * quotes are all escaped, and turns literal \n, \r, \t between tokens into spaces.
 */
export function normalizeEscapes(text: string): string {
  const decoded = decodeEscapedPayload(unwrapStringLiteral(text));
  return rewriteOutsideStrings(decoded, (code) => code.replace(/\\[nrt]/g, " "));
}

/** True/False/None emitted in place of JSON literals. */
export function normalizeLiterals(text: string): string {
  return rewriteOutsideStrings(text, (code) =>
    code
      .replace(/\bTrue\b/g, "true")
      .replace(/\bFalse\b/g, "false")
      .replace(/\bNone\b/g, "null")
  );
}

export function removeTrailingCommas(text: string): string {
  return rewriteOutsideStrings(text, (code) => code.replace(/,(\s*[}\]])/g, "$1"));
}

/** Applied in order; escapes come before literals since literal detection needs real string boundaries. */
export const REPAIR_TRANSFORMS: readonly TextTransform[] = [
  trimWhitespace,
  stripCodeFences,
  normalizeEscapes,
  normalizeLiterals,
  removeTrailingCommas,
];

export function applyRepairTransforms(raw: string): string {
  return REPAIR_TRANSFORMS.reduce((text, transform) => transform(text), raw);
}

// ─── Parsing ───────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseObject(candidate: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(candidate);
    return isPlainObject(value) ? value : null;
  } catch {
    return null;
  }
}

/**
 * Extracts the first complete {...} object by tracking brace depth and string
 * mode (double quotes with backslash escapes).
 */
export function extractFirstBalancedObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start < 0) return null;
  let depth = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < text.length; i++) {
    const c = text[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (inString) {
      if (c === "\\") escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === "{") depth++;
    else if (c === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

/**
 * Parses repaired text: directly when it is brace-bounded, else the span from the
 * first "{" to the last "}", else the first balanced object.
 */
export function parseRepaired(
  text: string
): { value: Record<string, unknown>; strategy: RepairStrategy } | null {
  const trimmed = text.trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) {
    const value = parseObject(trimmed);
    if (value) return { value, strategy: "direct" };
  }
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first < 0 || last <= first) return null;
  const span = parseObject(trimmed.slice(first, last + 1));
  if (span) return { value: span, strategy: "span" };
  const balanced = extractFirstBalancedObject(trimmed);
  const value = balanced != null ? parseObject(balanced) : null;
  return value ? { value, strategy: "balanced" } : null;
}

/** Never throws: an unrecoverable completion yields { ok: false }. */
export function repairCompletion(raw: string): RepairResult {
  const repaired = applyRepairTransforms(raw);
  if (!repaired.includes("{")) {
    return { ok: false, repaired, reason: "no JSON object in completion" };
  }
  const parsed = parseRepaired(repaired);
  if (!parsed) {
    return { ok: false, repaired, reason: "completion is not parseable as a JSON object" };
  }
  return { ok: true, value: parsed.value, repaired, strategy: parsed.strategy };
}

const SNIPPET_MAX = 400;

export function snippet(text: string): string {
  const s = String(text).trim();
  if (s.length <= SNIPPET_MAX) return s;
  return s.slice(0, SNIPPET_MAX) + "...";
}
