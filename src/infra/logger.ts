/**
 * Structured logger — thin pino wrapper with file output support.
 *
 * Log format: JSON with human-readable `level` (label) and `time` (ISO 8601).
 * This applies to ALL outputs (file, console, any transport) so logs are
 * always grep-friendly and human-scannable without extra tooling.
 */
import pino from "pino";
import type { TransportSingleOptions, TransportMultiOptions } from "pino";
import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "node:fs";
import { dirname, join, basename } from "node:path";

/** Days a rotated log file is kept before cleanup removes it. */
export const LOG_RETENTION_DAYS = 30;

type Transport = TransportSingleOptions | TransportMultiOptions;

/**
 * Shared pino options for human-readable level and timestamp.
 *
 * NOTE: pino disallows `formatters.level` with multi-target transports,
 * so the label formatter is only applied in single-target mode.
 * pino-pretty renders levels on its own for the console target.
 */
function createLoggerOptions(
  level: string,
  transport: Transport,
  isMultiTarget: boolean,
): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level,
    transport,
    base: undefined, // drop pid and hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!isMultiTarget) {
    opts.formatters = {
      level(label) {
        return { level: label };
      },
    };
  }

  return opts;
}

/**
 * Remove rotated log files (e.g. tooldeck.log.1) older than the retention period.
 * Returns the number of files removed.
 */
export function cleanupOldLogs(logFile: string, retentionDays = LOG_RETENTION_DAYS): number {
  const logDir = dirname(logFile);
  const logFileName = basename(logFile);

  if (!existsSync(logDir)) {
    return 0;
  }

  const now = Date.now();
  const retentionMs = retentionDays * 24 * 60 * 60 * 1000;
  const escaped = logFileName.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const rotatedLogPattern = new RegExp(`^${escaped}\\.`);
  let removed = 0;

  for (const file of readdirSync(logDir)) {
    if (!rotatedLogPattern.test(file)) {
      continue;
    }

    const filePath = join(logDir, file);
    if (now - statSync(filePath).mtimeMs > retentionMs) {
      unlinkSync(filePath);
      removed++;
    }
  }

  return removed;
}

/**
 * Resolve transports based on environment and configuration.
 * File logging is always enabled. Console output is optional.
 */
export function resolveTransports(
  nodeEnv: string | undefined,
  logFile: string,
  logConsoleEnabled?: boolean,
): { transport: Transport; isMultiTarget: boolean } {
  const transports: TransportSingleOptions[] = [];

  if (logConsoleEnabled) {
    if (nodeEnv !== "production") {
      transports.push({
        target: "pino-pretty",
        options: { colorize: true },
      });
    } else {
      transports.push({
        target: "pino/file",
        options: { destination: 1 }, // stdout
      });
    }
  }

  const logDir = dirname(logFile);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  try {
    cleanupOldLogs(logFile);
  } catch (err) {
    // The logger is not up yet; report on stderr and keep starting.
    process.stderr.write(`log cleanup failed: ${err instanceof Error ? err.message : String(err)}\n`);
  }

  transports.push({
    target: "pino-roll",
    options: {
      file: logFile,
      frequency: "daily",
      size: "10m",
      mkdir: true,
    },
  });

  const [only] = transports;
  if (transports.length === 1 && only) {
    return { transport: only, isMultiTarget: false };
  }

  return {
    transport: { targets: transports },
    isMultiTarget: true,
  };
}

/**
 * Build a root logger. Level "silent" skips transports entirely so that
 * no worker thread is started (tests, one-shot CLI runs).
 */
export function createRootLogger(
  level: string,
  logFile: string,
  logConsoleEnabled?: boolean,
  nodeEnv?: string,
): pino.Logger {
  if (level === "silent") {
    return pino({ level: "silent" });
  }
  const { transport, isMultiTarget } = resolveTransports(nodeEnv, logFile, logConsoleEnabled);
  return pino(createLoggerOptions(level, transport, isMultiTarget));
}

/**
 * Bootstrap phase: settings are not loaded yet, so env vars are read directly.
 * reinitLogger() replaces this once settings are available.
 */
function initRootLogger(): pino.Logger {
  const level = process.env["TOOLDECK_LOG_LEVEL"] ?? "info";
  const dataDir = process.env["TOOLDECK_DATA_DIR"] || "data";
  return createRootLogger(
    level,
    join(dataDir, "logs/tooldeck.log"),
    process.env["TOOLDECK_LOG_CONSOLE_ENABLED"] === "true",
    process.env["NODE_ENV"],
  );
}

const rootLogger = initRootLogger();

/** Module loggers handed out so far; a pino child keeps its own level. */
const moduleLoggers = new Map<string, pino.Logger>();

/**
 * Get a child logger with a module name (one per name).
 */
export function getLogger(name: string): pino.Logger {
  let child = moduleLoggers.get(name);
  if (!child) {
    child = rootLogger.child({ module: name });
    moduleLoggers.set(name, child);
  }
  return child;
}

/**
 * Set the level of the root logger and every module logger.
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
  for (const child of moduleLoggers.values()) {
    child.level = level;
  }
}

/**
 * Reinitialize logger with loaded configuration (called by config.ts after settings are ready).
 */
export function reinitLogger(
  level: string,
  logFile: string,
  logConsoleEnabled?: boolean,
  nodeEnv?: string,
): void {
  const newLogger = createRootLogger(level, logFile, logConsoleEnabled, nodeEnv);

  // Children created earlier keep a reference to rootLogger, so swap its internals in place.
  Object.assign(rootLogger, newLogger);
  setLogLevel(level);
}

export { rootLogger };
