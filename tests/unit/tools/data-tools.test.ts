/**
 * Unit tests for data tools.
 */

import { describe, it, expect } from "vitest";
import { dataTools } from "../../../src/tools/builtins/data-tools.ts";
import { ToolExecutor } from "../../../src/tools/executor.ts";
import { ToolRegistry } from "../../../src/tools/registry.ts";
import { FailureKind } from "../../../src/tools/types.ts";

const registry = new ToolRegistry();
registry.registerMany(dataTools);
const executor = new ToolExecutor(registry);

describe("json_parse", () => {
  it("parses JSON text", async () => {
    const result = await executor.execute("json_parse", { text: "{\"a\":[1,true,null]}" });

    expect(result.success && result.result).toEqual({ data: { a: [1, true, null] } });
  });

  it("reports invalid JSON as invalid arguments", async () => {
    const result = await executor.execute("json_parse", { text: "{nope" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe(FailureKind.INVALID_ARGUMENTS);
      expect(result.error.message.startsWith("invalid JSON: ")).toBe(true);
    }
  });
});

describe("json_stringify", () => {
  it("serializes compactly by default", async () => {
    const result = await executor.execute("json_stringify", { data: { a: 1, b: ["x"] } });

    expect(result.success && result.result).toEqual({ text: "{\"a\":1,\"b\":[\"x\"]}" });
  });

  it("pretty prints", async () => {
    const result = await executor.execute("json_stringify", { data: { a: 1 }, pretty: true });

    expect(result.success && result.result).toEqual({ text: "{\n  \"a\": 1\n}" });
  });
});

describe("base64", () => {
  it("encodes UTF-8 text", async () => {
    const result = await executor.execute("base64_encode", { text: "héllo" });

    expect(result.success && result.result).toEqual({ encoded: "aMOpbGxv" });
  });

  it("decodes, ignoring whitespace", async () => {
    const result = await executor.execute("base64_decode", { encoded: "aMOp\nbGxv" });

    expect(result.success && result.result).toEqual({ decoded: "héllo" });
  });

  it.each(["abc!", "a", "ab=c"])("rejects %j", async (encoded) => {
    const result = await executor.execute("base64_decode", { encoded });

    expect(!result.success && result.error).toEqual({
      kind: FailureKind.INVALID_ARGUMENTS,
      message: "'encoded' is not valid Base64",
    });
  });
});
