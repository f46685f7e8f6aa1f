/**
 * Tools system - core types and utilities.
 */

import path from "node:path";

// ── ToolCategory ─────────────────────────────────────

export enum ToolCategory {
  SYSTEM = "system",
  FILE = "file",
  SHELL = "shell",
  NETWORK = "network",
  DATA = "data",
  MATH = "math",
  MEMORY = "memory",
  CUSTOM = "custom",
}

// ── Values & parameters ──────────────────────────────

/**
 * Values that cross the planner boundary: the JSON value space.
 */
export type ToolValue =
  | string
  | number
  | boolean
  | null
  | ToolValue[]
  | { [key: string]: ToolValue };

/**
 * Type tag of a parameter. `integer` is a number without a fraction,
 * `any` accepts every ToolValue.
 */
export type ParamType = "string" | "number" | "integer" | "boolean" | "array" | "object" | "any";

export interface ParameterSpec {
  name: string;
  type: ParamType;
  description?: string;
  required: boolean;
  /** Applied when the argument is absent. Only valid on optional parameters. */
  default?: ToolValue;
  /** Allowed values (string or number parameters). */
  enum?: readonly (string | number)[];
}

/** Arguments after binding: defaults applied, unknown keys per policy. */
export type ToolArgs = Record<string, unknown>;

// ── ToolContext ─────────────────────────────────

/**
 * Context passed to every handler invocation.
 */
export interface ToolContext {
  callId: string;
  toolName: string;
  /** Fires when the call times out or the caller cancels it. */
  signal: AbortSignal;
  /** Base directory for relative paths. */
  workdir: string;
  /** Tool-local configuration source (API keys and the like). */
  env: Record<string, string | undefined>;
}

export type ToolHandler = (args: ToolArgs, context: ToolContext) => unknown;

// ── ToolDescriptor ──────────────────────────────

/**
 * Immutable record binding a name to a handler, a description and a parameter spec.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly category: ToolCategory;
  readonly parameters: readonly ParameterSpec[];
  /** Per-tool call limit in ms; the executor uses it in place of its default. */
  readonly timeout?: number;
  readonly handler: ToolHandler;
}

// ── ExecutionResult ─────────────────────────────

export enum FailureKind {
  UNKNOWN_TOOL = "unknown_tool",
  INVALID_ARGUMENTS = "invalid_arguments",
  EXECUTION_ERROR = "execution_error",
  MISSING_CONFIGURATION = "missing_configuration",
  TIMEOUT = "timeout",
  CANCELLED = "cancelled",
}

export interface ExecutionFailureDetail {
  kind: FailureKind;
  message: string;
}

interface ExecutionMeta {
  callId: string;
  toolName: string;
  startedAt: number;
  completedAt: number;
  durationMs: number;
}

export interface ExecutionSuccess extends ExecutionMeta {
  success: true;
  result: unknown;
}

export interface ExecutionFailure extends ExecutionMeta {
  success: false;
  error: ExecutionFailureDetail;
}

/**
 * Uniform envelope returned by every dispatch. Plain data, safe to JSON-encode
 * whenever the tool's own value is.
 */
export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

// ── ToolStats ─────────────────────────────────

export interface ToolCallStats {
  count: number;
  failures: number;
  avgDuration: number;
}

export interface ToolStats {
  total: number;
  byCategory: Record<ToolCategory, number>;
  callStats: Record<string, ToolCallStats>;
}

// ── Paths ─────────────────────────────────────

/**
 * Resolve a path against a base directory, collapsing `.` and `..`.
 */
export function normalizePath(pathToNormalize: string, baseDir?: string): string {
  if (baseDir && !path.isAbsolute(pathToNormalize)) {
    return path.resolve(baseDir, pathToNormalize);
  }
  return path.resolve(pathToNormalize);
}
