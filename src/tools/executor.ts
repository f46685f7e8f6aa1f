/**
 * ToolExecutor - the dispatch boundary.
 *
 * Resolves a tool by name, binds arguments against its parameter spec,
 * invokes the handler under a timeout / cancellation signal and turns every
 * outcome into an ExecutionResult. execute() never rejects: any fault a
 * handler raises is classified into the FailureKind taxonomy.
 *
 * Calls are dispatched one at a time; executeMany() runs them in sequence.
 */

import type {
  ExecutionFailureDetail,
  ExecutionResult,
  ToolArgs,
  ToolContext,
  ToolDescriptor,
} from "./types.ts";
import { FailureKind } from "./types.ts";
import {
  MissingConfigurationError,
  ToolCancelledError,
  ToolNotFoundError,
  ToolTimeoutError,
  ToolValidationError,
} from "./errors.ts";
import { bindArguments, type UnknownArgumentsPolicy } from "./params.ts";
import { errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { shortId } from "../infra/id.ts";

const logger = getLogger("tools.executor");

/** Upper bound for any single call, whatever the caller asks for (10 minutes). */
export const MAX_TOOL_TIMEOUT = 600_000;

export const DEFAULT_TOOL_TIMEOUT = 30_000;

/** What the executor needs from a registry. */
export interface ToolSource {
  lookup(name: string): ToolDescriptor | undefined;
  updateCallStats(name: string, duration: number, success: boolean): void;
}

export interface ExecutorOptions {
  /** Default per-call timeout in ms. */
  timeout?: number;
  unknownArguments?: UnknownArgumentsPolicy;
  /** Base directory handed to tools for relative paths. */
  workdir?: string;
  /** Tool-local configuration source; defaults to process.env. */
  env?: Record<string, string | undefined>;
}

export interface ExecuteOptions {
  /** Per-call timeout override in ms (capped at MAX_TOOL_TIMEOUT). */
  timeout?: number;
  /** Caller-side cancellation. */
  signal?: AbortSignal;
  callId?: string;
}

export interface ToolCallRequest {
  name: string;
  args?: unknown;
  options?: ExecuteOptions;
}

/**
 * Map a thrown value to the failure taxonomy.
 */
export function classifyError(error: unknown): ExecutionFailureDetail {
  if (error instanceof ToolValidationError) {
    return { kind: FailureKind.INVALID_ARGUMENTS, message: error.message };
  }
  if (error instanceof MissingConfigurationError) {
    return { kind: FailureKind.MISSING_CONFIGURATION, message: error.message };
  }
  if (error instanceof ToolTimeoutError) {
    return { kind: FailureKind.TIMEOUT, message: error.message };
  }
  if (error instanceof ToolCancelledError) {
    return { kind: FailureKind.CANCELLED, message: error.message };
  }
  if (error instanceof ToolNotFoundError) {
    return { kind: FailureKind.UNKNOWN_TOOL, message: error.message };
  }
  return { kind: FailureKind.EXECUTION_ERROR, message: describeFault(error) };
}

function describeFault(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name || "tool raised an error without a message";
  }
  const text = errorToString(error);
  return text || "tool raised an error without a message";
}

function reasonText(reason: unknown): string | undefined {
  if (reason === undefined) return undefined;
  return errorToString(reason);
}

export class ToolExecutor {
  private readonly timeout: number;
  private readonly unknownArguments: UnknownArgumentsPolicy;
  private readonly workdir: string;
  private readonly env: Record<string, string | undefined>;

  constructor(
    private registry: ToolSource,
    options: ExecutorOptions = {},
  ) {
    this.timeout = options.timeout ?? DEFAULT_TOOL_TIMEOUT;
    this.unknownArguments = options.unknownArguments ?? "passthrough";
    this.workdir = options.workdir ?? process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Execute a tool by name. Always resolves.
   */
  async execute(
    toolName: string,
    args: unknown = {},
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const callId = options.callId ?? shortId();
    const startedAt = Date.now();

    logger.info({ toolName, callId, args }, "tool_execute_start");

    const tool = this.registry.lookup(toolName);
    if (!tool) {
      return this.failure(toolName, callId, startedAt, {
        kind: FailureKind.UNKNOWN_TOOL,
        message: new ToolNotFoundError(toolName).message,
      }, false);
    }

    const bound = bindArguments(tool.parameters, args, this.unknownArguments);
    if (!bound.ok) {
      return this.failure(toolName, callId, startedAt, {
        kind: FailureKind.INVALID_ARGUMENTS,
        message: `${toolName}: ${bound.issues.join("; ")}`,
      });
    }

    // Per-call override, then the tool's own limit, then the executor default.
    const requested = options.timeout && options.timeout > 0
      ? options.timeout
      : tool.timeout ?? this.timeout;
    const effectiveTimeout = Math.min(requested, MAX_TOOL_TIMEOUT);

    try {
      const result = await this.invoke(tool, bound.args, callId, effectiveTimeout, options.signal);
      const completedAt = Date.now();
      const durationMs = completedAt - startedAt;

      this.registry.updateCallStats(toolName, durationMs, true);
      logger.info({ toolName, callId, success: true, durationMs }, "tool_execute_done");

      return {
        success: true,
        // A handler that returns nothing still yields a `result` key
        result: result === undefined ? null : result,
        callId,
        toolName,
        startedAt,
        completedAt,
        durationMs,
      };
    } catch (error) {
      return this.failure(toolName, callId, startedAt, classifyError(error));
    }
  }

  /**
   * Execute calls one after another, returning results in order.
   */
  async executeMany(calls: readonly ToolCallRequest[]): Promise<ExecutionResult[]> {
    const results: ExecutionResult[] = [];
    for (const call of calls) {
      results.push(await this.execute(call.name, call.args, call.options));
    }
    return results;
  }

  private failure(
    toolName: string,
    callId: string,
    startedAt: number,
    error: ExecutionFailureDetail,
    recordStats = true,
  ): ExecutionResult {
    const completedAt = Date.now();
    const durationMs = completedAt - startedAt;

    if (recordStats) {
      this.registry.updateCallStats(toolName, durationMs, false);
    }
    logger.warn(
      { toolName, callId, durationMs, kind: error.kind, error: error.message },
      "tool_execute_failed",
    );

    return {
      success: false,
      error,
      callId,
      toolName,
      startedAt,
      completedAt,
      durationMs,
    };
  }

  /**
   * Run the handler, racing it against the timeout and the caller's signal.
   * The handler sees a signal that aborts on either, so long-running work
   * (child processes, HTTP requests) can stop early.
   */
  private invoke(
    tool: ToolDescriptor,
    args: ToolArgs,
    callId: string,
    timeout: number,
    callerSignal?: AbortSignal,
  ): Promise<unknown> {
    if (callerSignal?.aborted) {
      return Promise.reject(new ToolCancelledError(tool.name, reasonText(callerSignal.reason)));
    }

    const controller = new AbortController();
    const context: ToolContext = {
      callId,
      toolName: tool.name,
      signal: controller.signal,
      workdir: this.workdir,
      env: this.env,
    };

    return new Promise<unknown>((resolve, reject) => {
      let settled = false;

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        callerSignal?.removeEventListener("abort", onAbort);
        settle();
      };

      const timer = setTimeout(() => {
        const error = new ToolTimeoutError(tool.name, timeout);
        controller.abort(error);
        finish(() => reject(error));
      }, timeout);

      const onAbort = (): void => {
        const error = new ToolCancelledError(tool.name, reasonText(callerSignal?.reason));
        controller.abort(error);
        finish(() => reject(error));
      };
      callerSignal?.addEventListener("abort", onAbort, { once: true });

      let pending: unknown;
      try {
        pending = tool.handler(args, context);
      } catch (error) {
        finish(() => reject(error));
        return;
      }

      Promise.resolve(pending).then(
        (value) => finish(() => resolve(value)),
        (error: unknown) => finish(() => reject(error)),
      );
    });
  }
}
