/**
 * Configuration — process-wide Settings singleton.
 *
 * Settings come from loadSettings() (config files + env). Once loaded, the
 * root logger is re-initialised with the configured level and destination.
 */
import { join } from "node:path";
import { loadSettings } from "./config-loader.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";
import { reinitLogger } from "./logger.ts";

export { SettingsSchema };
export type { Settings, ToolsConfig, ShellConfig, HttpConfig, WebSearchConfig, MemoryConfig } from "./config-schema.ts";

let _settings: Settings | null = null;

export function getSettings(): Settings {
  if (!_settings) {
    _settings = loadSettings();
    reinitLogger(
      _settings.logLevel,
      join(_settings.dataDir, "logs/tooldeck.log"),
      _settings.logConsoleEnabled,
      _settings.nodeEnv,
    );
  }
  return _settings;
}

/** Override settings (for testing) */
export function setSettings(s: Settings): void {
  _settings = s;
}

/** Reset settings singleton so next getSettings() reloads from env (for testing) */
export function resetSettings(): void {
  _settings = null;
}

/** Settings built purely from schema defaults, with optional overrides. */
export function defaultSettings(overrides: Partial<Settings> = {}): Settings {
  return { ...SettingsSchema.parse({}), ...overrides };
}
