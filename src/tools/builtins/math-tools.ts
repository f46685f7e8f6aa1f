/**
 * Math tools - arithmetic over a restricted expression grammar.
 */

import { defineTool, required } from "../define.ts";
import { ToolCategory } from "../types.ts";
import { ToolValidationError } from "../errors.ts";
import {
  ExpressionSyntaxError,
  KNOWN_CONSTANTS,
  KNOWN_FUNCTIONS,
  evaluateExpression,
} from "./expression.ts";

// ── calculate ──────────────────────────────────

export const calculate = defineTool({
  name: "calculate",
  description: "Evaluate an arithmetic expression and return the number. "
    + "Supports + - * / % ^ (or **), parentheses, "
    + `constants ${KNOWN_CONSTANTS.join(", ")} `
    + `and functions ${KNOWN_FUNCTIONS.join(", ")}.`,
  category: ToolCategory.MATH,
  parameters: [
    required("expression", "string", "Arithmetic expression, e.g. '2 + 3 * 4' or 'sqrt(16) / 2'"),
  ],
  handler({ expression }) {
    const source = String(expression);
    try {
      return evaluateExpression(source);
    } catch (error) {
      if (error instanceof ExpressionSyntaxError) {
        throw new ToolValidationError("calculate", `invalid expression: ${error.message}`);
      }
      throw error;
    }
  },
});

export const mathTools = [calculate];
