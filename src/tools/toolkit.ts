/**
 * Toolkit - registry, executor and catalog wired from one Settings object.
 */

import { ToolExecutor } from "./executor.ts";
import { ToolCatalog } from "./catalog.ts";
import type { ToolRegistry } from "./registry.ts";
import { createBuiltinRegistry } from "./builtins/index.ts";
import { defaultSettings, type Settings } from "../infra/config.ts";

export interface Toolkit {
  registry: ToolRegistry;
  executor: ToolExecutor;
  catalog: ToolCatalog;
}

export interface ToolkitOptions {
  /** Use this registry instead of the builtin one. */
  registry?: ToolRegistry;
  env?: Record<string, string | undefined>;
}

export function createToolkit(
  settings: Settings = defaultSettings(),
  options: ToolkitOptions = {},
): Toolkit {
  const registry = options.registry ?? createBuiltinRegistry(settings);
  const executor = new ToolExecutor(registry, {
    timeout: settings.tools.timeout * 1000,
    unknownArguments: settings.tools.unknownArguments,
    workdir: settings.tools.workdir,
    env: options.env,
  });
  const catalog = new ToolCatalog(registry, {
    unknownArguments: settings.tools.unknownArguments,
  });
  return { registry, executor, catalog };
}
