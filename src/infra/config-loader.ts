/**
 * ConfigLoader — Load configuration from YAML/JSON files with env var support.
 *
 * Features:
 * - Load from config.yml (base) + config.local.yml (override)
 * - Support ${ENV_VAR} interpolation in strings
 * - TOOLDECK_* environment variables override all file configs
 * - Fallback to env-only mode if no config file found
 * - Custom config path via TOOLDECK_CONFIG env var
 */
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorToString } from "./errors.ts";
import { isRecord } from "./guards.ts";
import { getLogger } from "./logger.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";

const logger = getLogger("config_loader");

type Env = Record<string, string | undefined>;
type RawConfig = Record<string, unknown>;

export interface LoadSettingsOptions {
  /** Directory searched for config files (default: process.cwd()). */
  cwd?: string;
  env?: Env;
}

/**
 * Interpolate ${VAR_NAME} placeholders with environment variables.
 * Supports bash-style default value syntax:
 * - ${VAR:-default}  Use default if VAR is unset or empty
 * - ${VAR:?error}    Error if VAR is unset or empty
 * - ${VAR:+alternate} Use alternate if VAR is set
 *
 * A string that interpolates to "" becomes undefined so schema defaults apply.
 */
export function interpolateEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") {
    const replaced = value.replace(/\$\{([^}]+)\}/g, (_match, content: string) => {
      const operatorMatch = /^([^:]+)(:-|:\?|:\+)(.*)$/.exec(content);
      if (!operatorMatch) {
        return env[content] ?? "";
      }

      const [, varName = "", operator, operand = ""] = operatorMatch;
      const envValue = env[varName];
      const isEmpty = envValue === undefined || envValue === "";

      switch (operator) {
        case ":-":
          return isEmpty ? operand : (envValue ?? "");
        case ":?":
          if (isEmpty) {
            throw new ConfigError(
              `Environment variable ${varName} is required but not set: ${operand || "missing value"}`,
            );
          }
          return envValue ?? "";
        default: // ":+"
          return isEmpty ? "" : operand;
      }
    });
    return replaced === "" ? undefined : replaced;
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env));
  }
  if (isRecord(value)) {
    const result: RawConfig = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = interpolateEnvVars(val, env);
    }
    return result;
  }
  return value;
}

/**
 * Load and parse config file (JSON or YAML), returning raw structure.
 */
function loadConfigFile(path: string, env: Env): RawConfig {
  let parsed: unknown;
  try {
    const content = readFileSync(path, "utf-8");
    const isYaml = path.endsWith(".yaml") || path.endsWith(".yml");
    parsed = isYaml ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to load config file ${path}: ${errorToString(err)}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${path} must contain a mapping at the top level`);
  }
  const interpolated = interpolateEnvVars(parsed, env);
  return isRecord(interpolated) ? interpolated : {};
}

/**
 * Deep merge two objects, with source overriding target.
 * Arrays and scalars are replaced; undefined values in source are skipped.
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function pickSingle(dir: string, names: string[], kind: string): string | null {
  const found = names.map((n) => join(dir, n)).filter((p) => existsSync(p));
  if (found.length > 1) {
    throw new ConfigError(
      `Multiple ${kind} config files found: ${found.join(", ")}. Please keep only one.`,
    );
  }
  return found[0] ?? null;
}

/**
 * Find and load config files with layered merging.
 * Priority: config.local.yml/yaml overrides config.yml/yaml
 */
function findAndMergeConfigs(dir: string, env: Env): RawConfig | null {
  const customPath = env["TOOLDECK_CONFIG"];
  if (customPath) {
    if (!existsSync(customPath)) {
      throw new ConfigError(`TOOLDECK_CONFIG points to a missing file: ${customPath}`);
    }
    logger.info({ path: customPath }, "loading_config_from_custom_path");
    return loadConfigFile(customPath, env);
  }

  const basePath = pickSingle(dir, ["config.yaml", "config.yml"], "base");
  const localPath = pickSingle(dir, ["config.local.yaml", "config.local.yml"], "local");

  if (!basePath && !localPath) {
    return null;
  }

  let config: RawConfig = {};
  if (basePath) {
    logger.info({ path: basePath }, "loading_base_config");
    config = loadConfigFile(basePath, env);
  }
  if (localPath) {
    logger.info({ path: localPath }, "loading_local_config_override");
    config = deepMerge(config, loadConfigFile(localPath, env));
  }
  return config;
}

/**
 * Map the file layout (`system:` + `tools:`) onto the Settings shape.
 */
function fileToRaw(config: RawConfig): RawConfig {
  const system = isRecord(config["system"]) ? config["system"] : {};
  return {
    logLevel: system["logLevel"],
    logConsoleEnabled: system["logConsoleEnabled"],
    dataDir: system["dataDir"],
    nodeEnv: system["nodeEnv"],
    tools: isRecord(config["tools"]) ? config["tools"] : undefined,
  };
}

/**
 * Environment overrides. Only variables that are set contribute.
 */
function envToRaw(env: Env): RawConfig {
  const nonEmpty = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value === "" ? undefined : value;
  };

  return {
    logLevel: nonEmpty("TOOLDECK_LOG_LEVEL"),
    logConsoleEnabled: nonEmpty("TOOLDECK_LOG_CONSOLE_ENABLED"),
    dataDir: nonEmpty("TOOLDECK_DATA_DIR"),
    nodeEnv: nonEmpty("NODE_ENV"),
    tools: {
      timeout: nonEmpty("TOOLDECK_TOOL_TIMEOUT"),
      duplicatePolicy: nonEmpty("TOOLDECK_DUPLICATE_POLICY"),
      unknownArguments: nonEmpty("TOOLDECK_UNKNOWN_ARGUMENTS"),
      enabled: nonEmpty("TOOLDECK_TOOLS"),
      workdir: nonEmpty("TOOLDECK_WORKDIR"),
      shell: {
        timeout: nonEmpty("TOOLDECK_SHELL_TIMEOUT"),
      },
      http: {
        timeout: nonEmpty("TOOLDECK_HTTP_TIMEOUT"),
      },
      memory: {
        enabled: nonEmpty("TOOLDECK_MEMORY_ENABLED"),
        dir: nonEmpty("TOOLDECK_MEMORY_DIR"),
      },
    },
  };
}

/**
 * Validate a raw settings object, turning Zod issues into a ConfigError.
 */
export function parseSettings(raw: unknown): Settings {
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load from env vars only (fallback when no config file).
 */
export function loadFromEnv(env: Env = process.env): Settings {
  return parseSettings(envToRaw(env));
}

/**
 * Load settings from config file or env vars.
 *
 * Priority:
 * 1. Environment variables (highest)
 * 2. config.local.yml/yaml (overrides base config)
 * 3. config.yml/yaml (base config)
 * 4. Schema defaults
 */
export function loadSettings(options: LoadSettingsOptions = {}): Settings {
  const env = options.env ?? process.env;
  const dir = options.cwd ?? process.cwd();

  const fileConfig = findAndMergeConfigs(dir, env);
  if (!fileConfig) {
    logger.info("loading_config_from_env");
    return loadFromEnv(env);
  }

  return parseSettings(deepMerge(fileToRaw(fileConfig), envToRaw(env)));
}
