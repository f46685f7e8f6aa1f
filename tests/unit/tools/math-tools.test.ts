/**
 * Unit tests for the calculate tool and the expression evaluator.
 */

import { describe, it, expect } from "vitest";
import { calculate } from "../../../src/tools/builtins/math-tools.ts";
import {
  evaluateExpression,
  ExpressionMathError,
  ExpressionSyntaxError,
  MAX_EXPRESSION_DEPTH,
} from "../../../src/tools/builtins/expression.ts";
import { ToolExecutor } from "../../../src/tools/executor.ts";
import { ToolRegistry } from "../../../src/tools/registry.ts";
import { FailureKind } from "../../../src/tools/types.ts";

describe("evaluateExpression", () => {
  it.each([
    ["2 + 3 * 4", 14],
    ["(2 + 3) * 4", 20],
    ["10 / 4", 2.5],
    ["7 % 3", 1],
    ["-7 % 3", 2],
    ["2 ^ 10", 1024],
    ["2 ** 3 ** 2", 512],
    ["-2 ^ 2", -4],
    ["2 ^ -1", 0.5],
    ["--3", 3],
    ["+4", 4],
    ["1.5e3 + .5", 1500.5],
    ["sqrt(16) / 2", 2],
    ["abs(-3.5)", 3.5],
    ["max(1, 7, 3) - min(4, 2)", 5],
    ["pow(2, 8)", 256],
    ["hypot(3, 4)", 5],
    ["floor(2.7) + ceil(2.1)", 5],
    ["round(3.14159, 2)", 3.14],
    ["log(8, 2)", 3],
    ["log10(1000)", 3],
    ["log2(32)", 5],
    ["ln(1)", 0],
    ["cos(0)", 1],
    ["0 * -1", 0],
  ])("%s = %s", (expression, expected) => {
    expect(evaluateExpression(expression)).toBeCloseTo(expected, 10);
  });

  it("knows pi, e and tau", () => {
    expect(evaluateExpression("pi")).toBe(Math.PI);
    expect(evaluateExpression("e")).toBe(Math.E);
    expect(evaluateExpression("tau / 2")).toBe(Math.PI);
  });

  it.each([
    ["__import__('os')", "unexpected character ''' at position 11"],
    ["2 +", "unexpected end of expression"],
    ["(1 + 2", "expected ')' but found end of expression at position 6"],
    ["1 2", "unexpected number 2 at position 2"],
    ["x + 1", "unknown name 'x'"],
    ["foo(1)", "unknown function 'foo'"],
    ["pi(2)", "'pi' is a constant, not a function"],
    ["sqrt", "function 'sqrt' must be called with arguments"],
    ["sqrt(1, 2)", "sqrt() takes 1 argument, got 2"],
    ["pow(2)", "pow() takes 2 arguments, got 1"],
    ["max()", "max() takes at least 1 arguments, got 0"],
    ["constructor", "unknown name 'constructor'"],
    ["", "expression is empty"],
  ])("rejects %j", (expression, message) => {
    expect(() => evaluateExpression(expression)).toThrow(ExpressionSyntaxError);
    expect(() => evaluateExpression(expression)).toThrow(message);
  });

  it("limits expression length", () => {
    expect(() => evaluateExpression("1+".repeat(600) + "1")).toThrow(
      "expression is longer than 1000 characters",
    );
  });

  it("limits nesting depth", () => {
    const deep = "(".repeat(MAX_EXPRESSION_DEPTH + 1) + "1" + ")".repeat(MAX_EXPRESSION_DEPTH + 1);
    expect(() => evaluateExpression(deep)).toThrow("expression nests deeper than 100 levels");
    const ok = "(".repeat(MAX_EXPRESSION_DEPTH) + "1" + ")".repeat(MAX_EXPRESSION_DEPTH);
    expect(evaluateExpression(ok)).toBe(1);
  });

  it.each([
    ["1 / 0", "division by zero"],
    ["5 % 0", "modulo by zero"],
    ["sqrt(-1)", "result is not a finite number (NaN)"],
    ["10 ^ 400", "result is not a finite number (Infinity)"],
  ])("raises a math error for %j", (expression, message) => {
    expect(() => evaluateExpression(expression)).toThrow(ExpressionMathError);
    expect(() => evaluateExpression(expression)).toThrow(message);
  });
});

describe("calculate tool", () => {
  const registry = new ToolRegistry();
  registry.register(calculate);
  const executor = new ToolExecutor(registry);

  it("evaluates through the executor", async () => {
    const result = await executor.execute("calculate", { expression: "2+3*4" });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.result).toBe(14);
    }
  });

  it("reports code injection attempts as invalid_arguments", async () => {
    const result = await executor.execute("calculate", { expression: "__import__('os')" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe(FailureKind.INVALID_ARGUMENTS);
      expect(result.error.message).toBe("invalid expression: unexpected character ''' at position 11");
    }
  });

  it("reports division by zero as execution_error", async () => {
    const result = await executor.execute("calculate", { expression: "1/0" });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toEqual({ kind: FailureKind.EXECUTION_ERROR, message: "division by zero" });
    }
  });

  it("requires the expression argument", async () => {
    const result = await executor.execute("calculate", {});

    expect(!result.success && result.error.message).toBe(
      "calculate: missing required parameter 'expression'",
    );
  });
});
