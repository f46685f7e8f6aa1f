/**
 * Planner-side argument decoding.
 *
 * Models usually send tool arguments as a JSON object string, but some wrap
 * it in a Markdown fence or surround it with prose. parseToolArguments
 * accepts all three, plus an already-decoded object.
 */

import { isPlainObject } from "../infra/guards.ts";
import { errorToString } from "../infra/errors.ts";

export type ParsedArguments =
  | { ok: true; args: Record<string, unknown> }
  | { ok: false; error: string };

const FENCE_RE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * The first balanced `{...}` span in text, honouring string literals.
 */
function extractObject(text: string): string | null {
  const start = text.indexOf("{");
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text.charAt(i);
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === "\"") inString = false;
      continue;
    }
    if (ch === "\"") inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function decode(text: string): ParsedArguments {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: `arguments are not valid JSON: ${errorToString(error)}` };
  }
  if (!isPlainObject(value)) {
    return { ok: false, error: "arguments must be a JSON object" };
  }
  return { ok: true, args: value };
}

export function parseToolArguments(raw: unknown): ParsedArguments {
  if (raw === undefined || raw === null) return { ok: true, args: {} };
  if (isPlainObject(raw)) return { ok: true, args: raw };
  if (typeof raw !== "string") {
    return { ok: false, error: "arguments must be a JSON object" };
  }

  const text = raw.trim();
  if (text === "") return { ok: true, args: {} };

  const direct = decode(text);
  if (direct.ok) return direct;

  const fenced = FENCE_RE.exec(text);
  if (fenced?.[1] !== undefined) {
    const inner = decode(fenced[1].trim());
    if (inner.ok) return inner;
  }

  const embedded = extractObject(text);
  if (embedded !== null && embedded !== text) {
    const inner = decode(embedded);
    if (inner.ok) return inner;
  }

  return direct;
}
