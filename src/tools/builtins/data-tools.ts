/**
 * Data tools - JSON parsing, Base64 encoding/decoding.
 */

import { defineTool, optional, required } from "../define.ts";
import { ToolCategory } from "../types.ts";
import { ToolValidationError } from "../errors.ts";
import { ArgReader } from "./args.ts";
import { errorToString } from "../../infra/errors.ts";

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

// ── json_parse ─────────────────────────────────

export const json_parse = defineTool({
  name: "json_parse",
  description: "Parse JSON string into a value",
  category: ToolCategory.DATA,
  parameters: [required("text", "string", "JSON string to parse")],
  handler(args, context) {
    const text = new ArgReader(args, context.toolName).string("text");
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ToolValidationError(context.toolName, `invalid JSON: ${errorToString(error)}`);
    }
    return { data };
  },
});

// ── json_stringify ────────────────────────────

export const json_stringify = defineTool({
  name: "json_stringify",
  description: "Serialize a value to a JSON string",
  category: ToolCategory.DATA,
  parameters: [
    required("data", "any", "Data to serialize"),
    optional("pretty", "boolean", "Format with indentation", { default: false }),
  ],
  handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const data = a.value("data");
    const text = a.boolean("pretty") ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    return { text };
  },
});

// ── base64_encode ─────────────────────────────

export const base64_encode = defineTool({
  name: "base64_encode",
  description: "Encode UTF-8 text to Base64",
  category: ToolCategory.DATA,
  parameters: [required("text", "string", "Text to encode")],
  handler(args, context) {
    const text = new ArgReader(args, context.toolName).string("text");
    return { encoded: Buffer.from(text, "utf-8").toString("base64") };
  },
});

// ── base64_decode ─────────────────────────────

export const base64_decode = defineTool({
  name: "base64_decode",
  description: "Decode a Base64 string to UTF-8 text",
  category: ToolCategory.DATA,
  parameters: [required("encoded", "string", "Base64 string to decode")],
  handler(args, context) {
    const encoded = new ArgReader(args, context.toolName).string("encoded").replace(/\s+/g, "");
    if (encoded.length % 4 === 1 || !BASE64_RE.test(encoded)) {
      throw new ToolValidationError(context.toolName, "'encoded' is not valid Base64");
    }
    return { decoded: Buffer.from(encoded, "base64").toString("utf-8") };
  },
});

export const dataTools = [json_parse, json_stringify, base64_encode, base64_decode];
