/**
 * Configuration schemas and types.
 * Separated to avoid circular dependencies between config.ts and config-loader.ts.
 */
import { z } from "zod";

/**
 * Preprocess stringified arrays from env var interpolation.
 * YAML ${VAR:-[]} produces string "[]" instead of an actual array.
 * Comma-separated strings ("a,b") are accepted as well.
 */
function coerceStringArray(val: unknown): unknown {
  if (typeof val === "string") {
    const trimmed = val.trim();
    if (trimmed === "[]" || trimmed === "") return [];
    if (trimmed.startsWith("[")) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        if (Array.isArray(parsed)) return parsed;
      } catch {
        // Not valid JSON, let Zod report it
        return val;
      }
    }
    return trimmed.split(",").map((s) => s.trim()).filter(Boolean);
  }
  return val;
}

function coerceBoolean(val: unknown): unknown {
  if (typeof val === "string") {
    if (val === "true" || val === "1") return true;
    if (val === "false" || val === "0" || val === "") return false;
  }
  return val;
}

export const ShellConfigSchema = z.object({
  timeout: z.coerce.number().int().positive().default(60), // seconds
  maxOutputChars: z.coerce.number().int().positive().default(50_000),
});

export const HttpConfigSchema = z.object({
  timeout: z.coerce.number().int().positive().default(30), // seconds
  maxBodyChars: z.coerce.number().int().positive().default(100_000),
});

export const WebSearchConfigSchema = z.object({
  provider: z.enum(["tavily"]).default("tavily"),
  apiKey: z.string().optional(),
  endpoint: z.string().url().default("https://api.tavily.com/search"),
  maxResults: z.coerce.number().int().positive().default(5),
});

export const MemoryConfigSchema = z.object({
  enabled: z.preprocess(coerceBoolean, z.boolean().default(false)),
  dir: z.string().optional(), // defaults to <dataDir>/memory
  maxMessages: z.coerce.number().int().positive().default(40),
  maxFiles: z.coerce.number().int().positive().default(8),
});

export const ToolsConfigSchema = z.object({
  timeout: z.coerce.number().int().positive().default(30), // seconds, tool execution timeout
  duplicatePolicy: z.enum(["overwrite", "strict"]).default("overwrite"),
  unknownArguments: z.enum(["passthrough", "reject"]).default("passthrough"),
  // Builtin tools to enable; empty means all of them
  enabled: z.preprocess(coerceStringArray, z.array(z.string()).default([])),
  workdir: z.string().optional(),
  shell: ShellConfigSchema.default({}),
  http: HttpConfigSchema.default({}),
  webSearch: WebSearchConfigSchema.default({}),
  memory: MemoryConfigSchema.default({}),
});

export const SettingsSchema = z.object({
  tools: ToolsConfigSchema.default({}),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  logConsoleEnabled: z.preprocess(coerceBoolean, z.boolean().default(false)),
  dataDir: z.string().default("data"),
  nodeEnv: z.string().default("development"), // NODE_ENV: development | production | test
});

export type ShellConfig = z.infer<typeof ShellConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type WebSearchConfig = z.infer<typeof WebSearchConfigSchema>;
export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
