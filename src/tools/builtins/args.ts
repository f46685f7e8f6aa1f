/**
 * Typed access to bound arguments inside builtin handlers.
 *
 * The executor has already checked types against the parameter spec, so a
 * mismatch here means a handler reads a key its spec does not declare.
 */

import type { ToolArgs } from "../types.ts";
import { ToolValidationError } from "../errors.ts";

export class ArgReader {
  constructor(
    private args: ToolArgs,
    private toolName: string,
  ) {}

  private fail(key: string, expected: string): never {
    throw new ToolValidationError(this.toolName, `'${key}' must be ${expected}`);
  }

  value(key: string): unknown {
    return this.args[key];
  }

  string(key: string): string {
    const value = this.args[key];
    if (typeof value !== "string") return this.fail(key, "a string");
    return value;
  }

  optionalString(key: string): string | undefined {
    const value = this.args[key];
    if (value === undefined) return undefined;
    if (typeof value !== "string") return this.fail(key, "a string");
    return value;
  }

  number(key: string): number {
    const value = this.args[key];
    if (typeof value !== "number") return this.fail(key, "a number");
    return value;
  }

  optionalNumber(key: string): number | undefined {
    const value = this.args[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number") return this.fail(key, "a number");
    return value;
  }

  boolean(key: string, fallback = false): boolean {
    const value = this.args[key];
    if (value === undefined) return fallback;
    if (typeof value !== "boolean") return this.fail(key, "a boolean");
    return value;
  }

  /** Like optionalNumber, but rejects zero and negatives. */
  positive(key: string): number | undefined {
    const value = this.optionalNumber(key);
    if (value !== undefined && value <= 0) return this.fail(key, "greater than 0");
    return value;
  }

  optionalRecord(key: string): Record<string, unknown> | undefined {
    const value = this.args[key];
    if (value === undefined) return undefined;
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return this.fail(key, "a mapping");
    }
    return Object.fromEntries(Object.entries(value));
  }
}
