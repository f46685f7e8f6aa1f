export * from "./tools/index.ts";
export * from "./planner/index.ts";
export {
  TooldeckError,
  ConfigError,
  errorToString,
  getLogger,
  getSettings,
  setSettings,
  resetSettings,
  defaultSettings,
  loadSettings,
  SettingsSchema,
} from "./infra/index.ts";
export type {
  Settings,
  ToolsConfig,
  ShellConfig,
  HttpConfig,
  WebSearchConfig,
  MemoryConfig,
} from "./infra/index.ts";
