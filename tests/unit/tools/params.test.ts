/**
 * Unit tests for argument binding.
 */

import { describe, it, expect } from "vitest";
import { bindArguments } from "../../../src/tools/params.ts";
import { optional, required } from "../../../src/tools/define.ts";
import type { ParameterSpec } from "../../../src/tools/types.ts";

describe("bindArguments", () => {
  const specs: ParameterSpec[] = [
    required("path", "string"),
    optional("limit", "integer", undefined, { default: 10 }),
    optional("verbose", "boolean"),
  ];

  it("binds valid arguments and fills defaults", () => {
    expect(bindArguments(specs, { path: "a.txt" })).toEqual({
      ok: true,
      args: { path: "a.txt", limit: 10 },
    });
  });

  it("keeps supplied optional values", () => {
    expect(bindArguments(specs, { path: "a.txt", limit: 3, verbose: true })).toEqual({
      ok: true,
      args: { path: "a.txt", limit: 3, verbose: true },
    });
  });

  it("treats null optional values as absent", () => {
    expect(bindArguments(specs, { path: "a.txt", limit: null, verbose: null })).toEqual({
      ok: true,
      args: { path: "a.txt", limit: 10 },
    });
  });

  it("treats a null required value as missing", () => {
    expect(bindArguments(specs, { path: null })).toEqual({
      ok: false,
      issues: ["missing required parameter 'path'"],
    });
  });

  it("rejects wrong types", () => {
    expect(bindArguments(specs, { path: 1, limit: 2.5, verbose: "yes" })).toEqual({
      ok: false,
      issues: ["'path' must be a string", "'limit' must be an integer", "'verbose' must be a boolean"],
    });
  });

  it("rejects non-mapping arguments", () => {
    expect(bindArguments(specs, [1, 2])).toEqual({
      ok: false,
      issues: ["arguments must be a mapping of parameter names to values"],
    });
    expect(bindArguments(specs, "path=a")).toEqual({
      ok: false,
      issues: ["arguments must be a mapping of parameter names to values"],
    });
  });

  it("enforces enum values", () => {
    const withEnum = [required("mode", "string", undefined, { enum: ["fast", "slow"] })];
    expect(bindArguments(withEnum, { mode: "fast" })).toEqual({ ok: true, args: { mode: "fast" } });
    expect(bindArguments(withEnum, { mode: "medium" })).toEqual({
      ok: false,
      issues: ["'mode' must be one of: \"fast\", \"slow\""],
    });
  });

  it("accepts any value for 'any' parameters", () => {
    const anySpec = [required("data", "any")];
    expect(bindArguments(anySpec, { data: [1, { x: 2 }] })).toEqual({
      ok: true,
      args: { data: [1, { x: 2 }] },
    });
  });

  it("checks object parameters are mappings", () => {
    const objSpec = [required("headers", "object")];
    expect(bindArguments(objSpec, { headers: { a: "b" } }).ok).toBe(true);
    expect(bindArguments(objSpec, { headers: ["a"] })).toEqual({
      ok: false,
      issues: ["'headers' must be a mapping"],
    });
  });

  it("rejects non-finite numbers", () => {
    const numSpec = [required("x", "number")];
    expect(bindArguments(numSpec, { x: Infinity })).toEqual({
      ok: false,
      issues: ["'x' must be a finite number"],
    });
  });

  it("rejects unknown keys only under the reject policy", () => {
    expect(bindArguments(specs, { path: "a", extra: 1 }, "passthrough")).toEqual({
      ok: true,
      args: { path: "a", limit: 10, extra: 1 },
    });
    expect(bindArguments(specs, { path: "a", x: 1, y: 2 }, "reject")).toEqual({
      ok: false,
      issues: ["unknown parameters 'x', 'y'"],
    });
  });

  it("gives each call its own copy of a default", () => {
    const listSpec = [optional("items", "array", undefined, { default: [] })];
    const first = bindArguments(listSpec, {});
    const second = bindArguments(listSpec, {});
    if (!first.ok || !second.ok) throw new Error("binding failed");

    expect(first.args["items"]).toEqual([]);
    expect(first.args["items"]).not.toBe(second.args["items"]);
  });
});
