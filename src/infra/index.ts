export { TooldeckError, ConfigError, errorToString } from "./errors.ts";
export { getLogger } from "./logger.ts";
export { shortId } from "./id.ts";
export { isRecord, isPlainObject } from "./guards.ts";
export { getSettings, setSettings, resetSettings, defaultSettings, SettingsSchema } from "./config.ts";
export { loadSettings, loadFromEnv } from "./config-loader.ts";
export type { Settings, ToolsConfig, ShellConfig, HttpConfig, WebSearchConfig, MemoryConfig } from "./config.ts";
