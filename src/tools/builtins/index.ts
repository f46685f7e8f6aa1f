/**
 * Built-in tools - all available tools, and a registry holding the enabled ones.
 */

import { join } from "node:path";
import type { ToolDescriptor } from "../types.ts";
import { ToolsetBuilder } from "../builder.ts";
import type { ToolRegistry } from "../registry.ts";
import { ConfigError } from "../../infra/errors.ts";
import { defaultSettings, type Settings } from "../../infra/config.ts";
import { mathTools } from "./math-tools.ts";
import { fileTools } from "./file-tools.ts";
import { createShellTools } from "./shell-tools.ts";
import { systemTools } from "./system-tools.ts";
import { createNetworkTools } from "./network-tools.ts";
import { dataTools } from "./data-tools.ts";
import { MemoryStore, createMemoryTools } from "./memory-tools.ts";

export { calculate, mathTools } from "./math-tools.ts";
export {
  read_file,
  write_file,
  list_files,
  delete_file,
  move_file,
  get_file_info,
  edit_file,
  grep_files,
  fileTools,
  globToRegex,
} from "./file-tools.ts";
export { createShellTools, runCommand, buildShellCommand, type CommandResult } from "./shell-tools.ts";
export { current_time, get_env, system_info, sleep, systemTools } from "./system-tools.ts";
export { createNetworkTools, clearWebFetchCache, htmlToMarkdown } from "./network-tools.ts";
export { json_parse, json_stringify, base64_encode, base64_decode, dataTools } from "./data-tools.ts";
export {
  MemoryStore,
  createMemoryTools,
  listSessionFiles,
  sessionFileName,
  type MemoryMessage,
  type MemorySnapshot,
  type MemoryStoreOptions,
} from "./memory-tools.ts";
export { evaluateExpression, ExpressionSyntaxError, ExpressionMathError } from "./expression.ts";

/**
 * A new memory session under `tools.memory.dir` (default `<dataDir>/memory`).
 */
export function createMemoryStore(settings: Settings = defaultSettings()): MemoryStore {
  const memory = settings.tools.memory;
  return new MemoryStore({
    dir: memory.dir ?? join(settings.dataDir, "memory"),
    maxMessages: memory.maxMessages,
    maxFiles: memory.maxFiles,
  });
}

/**
 * Every builtin, configured from settings, in catalog order. Memory tools are
 * included only when `tools.memory.enabled` is set.
 */
export function allBuiltinTools(settings: Settings = defaultSettings()): ToolDescriptor[] {
  return [
    ...mathTools,
    ...fileTools,
    ...createShellTools(settings.tools.shell),
    ...systemTools,
    ...createNetworkTools(settings.tools.http, settings.tools.webSearch),
    ...dataTools,
    ...(settings.tools.memory.enabled ? createMemoryTools(createMemoryStore(settings)) : []),
  ];
}

/**
 * The builtins selected by `tools.enabled` (empty selects all).
 */
export function builtinTools(settings: Settings = defaultSettings()): ToolDescriptor[] {
  const all = allBuiltinTools(settings);
  const enabled = settings.tools.enabled;
  if (enabled.length === 0) return all;

  const known = new Set(all.map((t) => t.name));
  const unknown = enabled.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown builtin tools in tools.enabled: ${unknown.join(", ")}`);
  }
  return all.filter((t) => enabled.includes(t.name));
}

export interface BuiltinRegistryOptions {
  /** Seal the registry once the builtins are in (default false, so hosts can add their own). */
  seal?: boolean;
}

export function createBuiltinRegistry(
  settings: Settings = defaultSettings(),
  options: BuiltinRegistryOptions = {},
): ToolRegistry {
  return new ToolsetBuilder({ duplicatePolicy: settings.tools.duplicatePolicy })
    .use(builtinTools(settings))
    .build({ seal: options.seal ?? false });
}
