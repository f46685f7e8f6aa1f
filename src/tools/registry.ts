/**
 * ToolRegistry - owned name → descriptor mapping plus call statistics.
 *
 * Listing follows registration order. Re-registering a name replaces the
 * descriptor in place (same listing position) and is reported through a
 * `tool_overwritten` warning and the overwrite listeners; the "strict"
 * policy throws instead. The registry lives on one event loop, so mapping
 * writes never interleave.
 */

import type {
  ParameterSpec,
  ToolDescriptor,
  ToolHandler,
  ToolStats,
} from "./types.ts";
import { ToolCategory } from "./types.ts";
import { DuplicateToolError, RegistrySealedError } from "./errors.ts";
import { defineTool, isDefinedTool } from "./define.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("tools.registry");

export type DuplicatePolicy = "overwrite" | "strict";

export interface ToolRegistryOptions {
  duplicatePolicy?: DuplicatePolicy;
}

export type OverwriteListener = (previous: ToolDescriptor, next: ToolDescriptor) => void;

export class ToolRegistry {
  private tools = new Map<string, ToolDescriptor>();
  private callHistory = new Map<
    string,
    { count: number; failures: number; totalDuration: number }
  >();
  private overwriteListeners = new Set<OverwriteListener>();
  private sealed = false;
  readonly duplicatePolicy: DuplicatePolicy;

  constructor(options: ToolRegistryOptions = {}) {
    this.duplicatePolicy = options.duplicatePolicy ?? "overwrite";
  }

  /**
   * Register a descriptor. Descriptors not built with defineTool are checked
   * and frozen here; an invalid one throws InvalidToolDefinitionError.
   */
  register(descriptor: ToolDescriptor): void {
    if (this.sealed) {
      throw new RegistrySealedError(descriptor.name);
    }
    const tool = isDefinedTool(descriptor) ? descriptor : defineTool(descriptor);

    const previous = this.tools.get(tool.name);
    if (previous) {
      if (this.duplicatePolicy === "strict") {
        throw new DuplicateToolError(tool.name);
      }
      this.tools.set(tool.name, tool);
      logger.warn(
        { toolName: tool.name, previousDescription: previous.description },
        "tool_overwritten",
      );
      for (const listener of this.overwriteListeners) {
        listener(previous, tool);
      }
      return;
    }

    this.tools.set(tool.name, tool);
    logger.debug({ toolName: tool.name, category: tool.category }, "tool_registered");
  }

  /**
   * Register a handler directly; returns the descriptor that was stored.
   */
  registerTool(
    name: string,
    handler: ToolHandler,
    description: string,
    parameters: readonly ParameterSpec[] = [],
    category: ToolCategory = ToolCategory.CUSTOM,
  ): ToolDescriptor {
    const tool = defineTool({ name, description, parameters, category, handler });
    this.register(tool);
    return tool;
  }

  registerMany(tools: readonly ToolDescriptor[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  /**
   * Get a tool by name (undefined when not registered).
   */
  lookup(name: string): ToolDescriptor | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * All registered tools, in registration order.
   */
  list(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  listByCategory(category: ToolCategory): ToolDescriptor[] {
    return this.list().filter((t) => t.category === category);
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Subscribe to overwrite events. Returns an unsubscribe function.
   */
  onOverwrite(listener: OverwriteListener): () => void {
    this.overwriteListeners.add(listener);
    return () => {
      this.overwriteListeners.delete(listener);
    };
  }

  /**
   * Make the registry read-only. Further registration throws RegistrySealedError.
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Get tool usage statistics.
   */
  getStats(): ToolStats {
    const tools = this.list();
    const byCategory: Record<ToolCategory, number> = {
      [ToolCategory.SYSTEM]: 0,
      [ToolCategory.FILE]: 0,
      [ToolCategory.SHELL]: 0,
      [ToolCategory.NETWORK]: 0,
      [ToolCategory.DATA]: 0,
      [ToolCategory.MATH]: 0,
      [ToolCategory.MEMORY]: 0,
      [ToolCategory.CUSTOM]: 0,
    };

    for (const tool of tools) {
      byCategory[tool.category]++;
    }

    const callStats: ToolStats["callStats"] = {};
    for (const [name, stats] of this.callHistory.entries()) {
      callStats[name] = {
        count: stats.count,
        failures: stats.failures,
        avgDuration: stats.totalDuration / stats.count,
      };
    }

    return {
      total: tools.length,
      byCategory,
      callStats,
    };
  }

  /**
   * Update call statistics after a tool execution.
   */
  updateCallStats(toolName: string, duration: number, success: boolean): void {
    let stats = this.callHistory.get(toolName);
    if (!stats) {
      stats = { count: 0, failures: 0, totalDuration: 0 };
      this.callHistory.set(toolName, stats);
    }
    stats.count++;
    if (!success) {
      stats.failures++;
    }
    stats.totalDuration += duration;
  }
}
