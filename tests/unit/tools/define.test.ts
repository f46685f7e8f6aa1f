/**
 * Unit tests for defineTool and the parameter shorthands.
 */

import { describe, it, expect } from "vitest";
import { defineTool, optional, required } from "../../../src/tools/define.ts";
import { ToolCategory } from "../../../src/tools/types.ts";
import type { ParameterSpec } from "../../../src/tools/types.ts";
import { InvalidToolDefinitionError } from "../../../src/tools/errors.ts";

describe("defineTool", () => {
  it("builds a frozen descriptor", () => {
    const tool = defineTool({
      name: "add",
      description: "Add two numbers",
      parameters: [required("a", "number", "First"), required("b", "number")],
      handler: () => 0,
    });

    expect(tool.name).toBe("add");
    expect(tool.category).toBe(ToolCategory.CUSTOM);
    expect(Object.isFrozen(tool)).toBe(true);
    expect(Object.isFrozen(tool.parameters)).toBe(true);
    expect(Object.isFrozen(tool.parameters[0])).toBe(true);
    expect(tool.parameters[0]).toEqual({ name: "a", type: "number", required: true, description: "First" });
    expect(tool.parameters[1]).toEqual({ name: "b", type: "number", required: true });
  });

  it("copies parameter specs so later edits do not leak in", () => {
    const specs: ParameterSpec[] = [optional("tags", "array", undefined, { default: ["x"] })];
    const tool = defineTool({ name: "tagged", description: "", parameters: specs, handler: () => 0 });

    specs.push(required("extra", "string"));
    const defaults = specs[0]?.default;
    if (Array.isArray(defaults)) defaults.push("y");

    expect(tool.parameters).toHaveLength(1);
    expect(tool.parameters[0]?.default).toEqual(["x"]);
  });

  it.each([
    ["", "empty"],
    ["has space", "space"],
    ["a".repeat(65), "too long"],
    ["dots.not.allowed", "dots"],
  ])("rejects the name %j (%s)", (name) => {
    expect(() => defineTool({ name, description: "", handler: () => 0 })).toThrow(
      InvalidToolDefinitionError,
    );
  });

  it("accepts names with digits, dashes and underscores", () => {
    expect(defineTool({ name: "get-v2_info", description: "", handler: () => 0 }).name).toBe("get-v2_info");
  });

  it("rejects duplicate parameter names", () => {
    expect(() =>
      defineTool({
        name: "dup",
        description: "",
        parameters: [required("a", "string"), optional("a", "string")],
        handler: () => 0,
      }),
    ).toThrow('Invalid tool definition "dup": parameter "a" is declared twice');
  });

  it("rejects a default on a required parameter", () => {
    expect(() =>
      defineTool({
        name: "bad_default",
        description: "",
        parameters: [{ name: "a", type: "number", required: true, default: 1 }],
        handler: () => 0,
      }),
    ).toThrow('required parameter "a" cannot have a default');
  });

  it("rejects a default of the wrong type", () => {
    expect(() =>
      defineTool({
        name: "bad_default",
        description: "",
        parameters: [optional("n", "integer", undefined, { default: 1.5 })],
        handler: () => 0,
      }),
    ).toThrow('default of "n" is not an integer');
  });

  it("rejects parameter names that are not identifiers", () => {
    expect(() =>
      defineTool({
        name: "bad_param",
        description: "",
        parameters: [required("1st", "string")],
        handler: () => 0,
      }),
    ).toThrow('parameter name "1st" is not a valid identifier');
  });

  it("keeps a positive timeout and rejects any other", () => {
    const tool = defineTool({ name: "slow", description: "", timeout: 5_000, handler: () => 0 });

    expect(tool.timeout).toBe(5_000);
    expect(defineTool({ name: "quick", description: "", handler: () => 0 })).not.toHaveProperty("timeout");
    expect(() => defineTool({ name: "slow", description: "", timeout: 0, handler: () => 0 })).toThrow(
      'Invalid tool definition "slow": timeout must be a positive number of milliseconds',
    );
  });
});
