/**
 * ToolCatalog - machine-readable descriptions of every registered tool,
 * for building a planner prompt or a function-calling tool list.
 *
 * Reading the catalog never executes a tool. Every call returns fresh
 * copies, so callers may mutate what they get back.
 */

import type { ParameterSpec, ParamType, ToolDescriptor, ToolValue } from "./types.ts";
import type { UnknownArgumentsPolicy } from "./params.ts";

export interface ToolDescription {
  name: string;
  description: string;
  parameters: ParameterSpec[];
}

export interface JsonSchemaProperty {
  type?: Exclude<ParamType, "any">;
  description?: string;
  enum?: (string | number)[];
  default?: ToolValue;
  items?: Record<string, never>;
}

export interface JsonSchemaObject {
  [key: string]: unknown;
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
  additionalProperties: boolean;
}

export interface FunctionDefinition {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
}

/** What the catalog needs from a registry. */
export interface ToolListing {
  list(): ToolDescriptor[];
}

function copySpec(spec: ParameterSpec): ParameterSpec {
  const copy: ParameterSpec = { name: spec.name, type: spec.type, required: spec.required };
  if (spec.description !== undefined) copy.description = spec.description;
  if (spec.default !== undefined) copy.default = structuredClone(spec.default);
  if (spec.enum !== undefined) copy.enum = [...spec.enum];
  return copy;
}

function toProperty(spec: ParameterSpec): JsonSchemaProperty {
  const property: JsonSchemaProperty = {};
  if (spec.type !== "any") property.type = spec.type;
  if (spec.type === "array") property.items = {};
  if (spec.description) property.description = spec.description;
  if (spec.enum && spec.enum.length > 0) property.enum = [...spec.enum];
  if (spec.default !== undefined) property.default = structuredClone(spec.default);
  return property;
}

/**
 * JSON Schema for a parameter list. Unknown keys are allowed unless the
 * executor rejects them.
 */
export function toJsonSchema(
  parameters: readonly ParameterSpec[],
  options: { additionalProperties?: boolean } = {},
): JsonSchemaObject {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];
  for (const spec of parameters) {
    properties[spec.name] = toProperty(spec);
    if (spec.required) required.push(spec.name);
  }
  return {
    type: "object",
    properties,
    required,
    additionalProperties: options.additionalProperties ?? true,
  };
}

export interface ToolCatalogOptions {
  unknownArguments?: UnknownArgumentsPolicy;
}

export class ToolCatalog {
  private readonly additionalProperties: boolean;

  constructor(
    private registry: ToolListing,
    options: ToolCatalogOptions = {},
  ) {
    this.additionalProperties = (options.unknownArguments ?? "passthrough") === "passthrough";
  }

  /**
   * One entry per registered tool, in registration order.
   */
  describeAll(): ToolDescription[] {
    return this.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters.map(copySpec),
    }));
  }

  /**
   * Provider-neutral function definitions (name, description, JSON Schema).
   */
  toFunctionDefinitions(): FunctionDefinition[] {
    return this.registry.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: toJsonSchema(tool.parameters, {
        additionalProperties: this.additionalProperties,
      }),
    }));
  }
}

/**
 * Shortcut for `new ToolCatalog(registry).describeAll()`.
 */
export function getToolsDescription(registry: ToolListing): ToolDescription[] {
  return new ToolCatalog(registry).describeAll();
}
