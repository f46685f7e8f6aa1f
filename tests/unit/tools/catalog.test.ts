/**
 * Unit tests for ToolCatalog.
 */

import { describe, it, expect, vi } from "vitest";
import { ToolCatalog, getToolsDescription, toJsonSchema } from "../../../src/tools/catalog.ts";
import { ToolRegistry } from "../../../src/tools/registry.ts";
import { defineTool, optional, required } from "../../../src/tools/define.ts";

function sampleRegistry(handler = vi.fn(() => 0)): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(defineTool({
    name: "add",
    description: "Add two numbers",
    parameters: [required("a", "number", "First addend"), required("b", "number")],
    handler,
  }));
  registry.register(defineTool({
    name: "search",
    description: "Search things",
    parameters: [
      required("query", "string"),
      optional("mode", "string", "Search mode", { enum: ["fast", "deep"], default: "fast" }),
      optional("tags", "array"),
      optional("payload", "any"),
    ],
    handler,
  }));
  return registry;
}

describe("ToolCatalog", () => {
  it("describes every tool in registration order", () => {
    const catalog = new ToolCatalog(sampleRegistry());

    expect(catalog.describeAll()).toEqual([
      {
        name: "add",
        description: "Add two numbers",
        parameters: [
          { name: "a", type: "number", required: true, description: "First addend" },
          { name: "b", type: "number", required: true },
        ],
      },
      {
        name: "search",
        description: "Search things",
        parameters: [
          { name: "query", type: "string", required: true },
          { name: "mode", type: "string", required: false, description: "Search mode", enum: ["fast", "deep"], default: "fast" },
          { name: "tags", type: "array", required: false },
          { name: "payload", type: "any", required: false },
        ],
      },
    ]);
  });

  it("returns equal output on repeated calls and never runs a tool", () => {
    const handler = vi.fn(() => 0);
    const catalog = new ToolCatalog(sampleRegistry(handler));

    expect(catalog.describeAll()).toEqual(catalog.describeAll());
    expect(handler).not.toHaveBeenCalled();
  });

  it("hands out copies that callers may mutate", () => {
    const registry = sampleRegistry();
    const catalog = new ToolCatalog(registry);

    const first = catalog.describeAll();
    first[0]?.parameters.push({ name: "c", type: "number", required: true });

    expect(catalog.describeAll()[0]?.parameters).toHaveLength(2);
    expect(registry.lookup("add")?.parameters).toHaveLength(2);
  });

  it("returns an empty list for an empty registry", () => {
    expect(new ToolCatalog(new ToolRegistry()).describeAll()).toEqual([]);
  });

  it("builds function definitions with JSON Schema parameters", () => {
    const catalog = new ToolCatalog(sampleRegistry());

    const [, search] = catalog.toFunctionDefinitions();

    expect(search).toEqual({
      name: "search",
      description: "Search things",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string" },
          mode: { type: "string", description: "Search mode", enum: ["fast", "deep"], default: "fast" },
          tags: { type: "array", items: {} },
          payload: {},
        },
        required: ["query"],
        additionalProperties: true,
      },
    });
  });

  it("closes the schema when unknown arguments are rejected", () => {
    const catalog = new ToolCatalog(sampleRegistry(), { unknownArguments: "reject" });

    const [add] = catalog.toFunctionDefinitions();

    expect(add?.parameters.additionalProperties).toBe(false);
  });

  it("getToolsDescription matches describeAll", () => {
    const registry = sampleRegistry();
    expect(getToolsDescription(registry)).toEqual(new ToolCatalog(registry).describeAll());
  });
});

describe("toJsonSchema", () => {
  it("maps integer and boolean types", () => {
    expect(toJsonSchema([required("n", "integer"), optional("flag", "boolean")])).toEqual({
      type: "object",
      properties: { n: { type: "integer" }, flag: { type: "boolean" } },
      required: ["n"],
      additionalProperties: true,
    });
  });
});
