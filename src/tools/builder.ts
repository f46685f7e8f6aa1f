/**
 * ToolsetBuilder - assemble a registry from descriptors and plain handlers,
 * then hand it out sealed.
 *
 *   const registry = new ToolsetBuilder()
 *     .use(builtinTools)
 *     .add("add", ({ a, b }) => Number(a) + Number(b), "Add two numbers", [
 *       required("a", "number"),
 *       required("b", "number"),
 *     ])
 *     .build();
 */

import type { ParameterSpec, ToolDescriptor, ToolHandler } from "./types.ts";
import { ToolCategory } from "./types.ts";
import { defineTool } from "./define.ts";
import { ToolRegistry, type OverwriteListener, type ToolRegistryOptions } from "./registry.ts";

export interface BuildOptions {
  /** Seal the registry before returning it (default true). */
  seal?: boolean;
}

export class ToolsetBuilder {
  private tools: ToolDescriptor[] = [];
  private listeners: OverwriteListener[] = [];

  constructor(private options: ToolRegistryOptions = {}) {}

  use(tools: ToolDescriptor | readonly ToolDescriptor[]): this {
    if (isDescriptorList(tools)) {
      this.tools.push(...tools);
    } else {
      this.tools.push(tools);
    }
    return this;
  }

  add(
    name: string,
    handler: ToolHandler,
    description: string,
    parameters: readonly ParameterSpec[] = [],
    category: ToolCategory = ToolCategory.CUSTOM,
  ): this {
    this.tools.push(defineTool({ name, description, parameters, category, handler }));
    return this;
  }

  onOverwrite(listener: OverwriteListener): this {
    this.listeners.push(listener);
    return this;
  }

  build(options: BuildOptions = {}): ToolRegistry {
    const registry = new ToolRegistry(this.options);
    for (const listener of this.listeners) {
      registry.onOverwrite(listener);
    }
    registry.registerMany(this.tools);
    return options.seal === false ? registry : registry.seal();
  }
}

function isDescriptorList(
  value: ToolDescriptor | readonly ToolDescriptor[],
): value is readonly ToolDescriptor[] {
  return Array.isArray(value);
}
