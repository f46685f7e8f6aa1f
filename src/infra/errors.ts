/**
 * Error hierarchy for tooldeck.
 *
 * TooldeckError (base)
 * ├── ConfigError
 * └── ToolError            (see tools/errors.ts for the tool-specific tree)
 */

export class TooldeckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TooldeckError";
  }
}

export class ConfigError extends TooldeckError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * Error objects have non-enumerable `message` and `stack` properties,
 * so `JSON.stringify(err)` returns `"{}"`. pino serializes log fields
 * via JSON before sending them to the transport worker thread, which
 * means `logger.warn({ error: err })` loses all error information.
 *
 * Use this helper everywhere an error is passed to logger fields:
 *   `logger.warn({ error: errorToString(err) }, "something_failed")`
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
