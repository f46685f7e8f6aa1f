/**
 * System tools - time, environment, and host information.
 */

import os from "node:os";
import { setTimeout as delay } from "node:timers/promises";
import { defineTool, optional, required } from "../define.ts";
import { ToolCategory } from "../types.ts";
import { ToolValidationError } from "../errors.ts";
import { ArgReader } from "./args.ts";

/** Longest sleep a planner may ask for, in seconds. */
export const MAX_SLEEP_SECONDS = 300;

// ── current_time ─────────────────────────────────

export const current_time = defineTool({
  name: "current_time",
  description: "Get the current time",
  category: ToolCategory.SYSTEM,
  parameters: [
    optional("timezone", "string", "IANA timezone (e.g., 'UTC', 'America/New_York')"),
  ],
  handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const timezone = a.optionalString("timezone") ?? "UTC";
    const now = new Date();

    let formatted: string;
    try {
      formatted = now.toLocaleString("en-US", { timeZone: timezone });
    } catch {
      throw new ToolValidationError(context.toolName, `unknown timezone '${timezone}'`);
    }

    return {
      timestamp: now.getTime(),
      iso: now.toISOString(),
      timezone,
      formatted,
    };
  },
});

// ── get_env ────────────────────────────────────

export const get_env = defineTool({
  name: "get_env",
  description: "Get the value of an environment variable (null when unset)",
  category: ToolCategory.SYSTEM,
  parameters: [required("key", "string", "Environment variable name")],
  handler(args, context) {
    const key = new ArgReader(args, context.toolName).string("key");
    return { key, value: context.env[key] ?? null };
  },
});

// ── system_info ────────────────────────────────

export const system_info = defineTool({
  name: "system_info",
  description: "Describe the host: platform, CPU, memory, load and uptime",
  category: ToolCategory.SYSTEM,
  parameters: [],
  handler() {
    const cpus = os.cpus();
    return {
      platform: os.platform(),
      arch: os.arch(),
      hostname: os.hostname(),
      release: os.release(),
      uptime: os.uptime(),
      cpuCount: cpus.length,
      cpuModel: cpus[0]?.model ?? null,
      loadAverage: os.loadavg(),
      totalMemory: os.totalmem(),
      freeMemory: os.freemem(),
      nodeVersion: process.version,
    };
  },
});

// ── sleep ───────────────────────────────────────

export const sleep = defineTool({
  name: "sleep",
  description: `Sleep for a duration in seconds (at most ${MAX_SLEEP_SECONDS})`,
  category: ToolCategory.SYSTEM,
  parameters: [required("seconds", "number", "Duration in seconds")],
  timeout: (MAX_SLEEP_SECONDS + 5) * 1000,
  async handler(args, context) {
    const seconds = new ArgReader(args, context.toolName).number("seconds");
    if (seconds < 0 || seconds > MAX_SLEEP_SECONDS) {
      throw new ToolValidationError(
        context.toolName,
        `'seconds' must be between 0 and ${MAX_SLEEP_SECONDS}`,
      );
    }
    await delay(seconds * 1000, undefined, { signal: context.signal });
    return { slept: seconds };
  },
});

export const systemTools = [current_time, get_env, system_info, sleep];
