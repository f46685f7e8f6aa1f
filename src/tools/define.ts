/**
 * Registration interface: attach name, description and parameter metadata
 * to a handler and get back a frozen ToolDescriptor.
 */

import type { ParameterSpec, ParamType, ToolDescriptor, ToolHandler, ToolValue } from "./types.ts";
import { ToolCategory } from "./types.ts";
import { InvalidToolDefinitionError } from "./errors.ts";
import { checkParameterSpecs } from "./params.ts";

/** Names accepted by OpenAI and Anthropic function calling alike. */
export const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

export interface ToolDefinition {
  name: string;
  description: string;
  category?: ToolCategory;
  parameters?: readonly ParameterSpec[];
  /** Upper bound for one call in ms, used when the caller gives none. */
  timeout?: number;
  handler: ToolHandler;
}

const definedTools = new WeakSet<ToolDescriptor>();

/** True for descriptors that came out of defineTool (already checked and frozen). */
export function isDefinedTool(tool: ToolDescriptor): boolean {
  return definedTools.has(tool);
}

function freezeSpec(spec: ParameterSpec): ParameterSpec {
  const copy: ParameterSpec = {
    name: spec.name,
    type: spec.type,
    required: spec.required,
  };
  if (spec.description !== undefined) copy.description = spec.description;
  if (spec.default !== undefined) copy.default = deepFreeze(structuredClone(spec.default));
  if (spec.enum !== undefined) copy.enum = Object.freeze([...spec.enum]);
  return Object.freeze(copy);
}

function deepFreeze(value: ToolValue): ToolValue {
  if (value !== null && typeof value === "object") {
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
    Object.freeze(value);
  }
  return value;
}

export function defineTool(def: ToolDefinition): ToolDescriptor {
  const name = def.name;
  if (typeof name !== "string" || !TOOL_NAME_PATTERN.test(name)) {
    throw new InvalidToolDefinitionError(
      String(name),
      "name must be 1-64 characters of letters, digits, '_' or '-'",
    );
  }
  if (typeof def.handler !== "function") {
    throw new InvalidToolDefinitionError(name, "handler must be a function");
  }
  if (typeof def.description !== "string") {
    throw new InvalidToolDefinitionError(name, "description must be a string");
  }

  if (def.timeout !== undefined && !(Number.isFinite(def.timeout) && def.timeout > 0)) {
    throw new InvalidToolDefinitionError(name, "timeout must be a positive number of milliseconds");
  }

  const parameters = def.parameters ?? [];
  const problems = checkParameterSpecs(parameters);
  if (problems.length > 0) {
    throw new InvalidToolDefinitionError(name, problems.join("; "));
  }

  const tool: ToolDescriptor = Object.freeze({
    name,
    description: def.description,
    category: def.category ?? ToolCategory.CUSTOM,
    parameters: Object.freeze(parameters.map(freezeSpec)),
    ...(def.timeout !== undefined ? { timeout: def.timeout } : {}),
    handler: def.handler,
  });
  definedTools.add(tool);
  return tool;
}

// ── Parameter shorthands ────────────────────────

type SpecExtras = Pick<ParameterSpec, "default" | "enum">;

export function required(
  name: string,
  type: ParamType,
  description?: string,
  extras: Pick<ParameterSpec, "enum"> = {},
): ParameterSpec {
  return { name, type, description, required: true, ...extras };
}

export function optional(
  name: string,
  type: ParamType,
  description?: string,
  extras: SpecExtras = {},
): ParameterSpec {
  return { name, type, description, required: false, ...extras };
}
