/**
 * Shell tools - run a command line through the system shell.
 *
 * A non-zero exit status is a normal result (the planner reads exitCode);
 * failing to start the shell is an execution error. The child is killed
 * when the call is cancelled or times out.
 */

import { spawn } from "node:child_process";
import { defineTool, optional, required } from "../define.ts";
import { ToolCategory, normalizePath } from "../types.ts";
import { ToolValidationError } from "../errors.ts";
import { MAX_TOOL_TIMEOUT } from "../executor.ts";
import type { ToolDescriptor } from "../types.ts";
import type { ShellConfig } from "../../infra/config-schema.ts";
import { ArgReader } from "./args.ts";
import { getLogger } from "../../infra/logger.ts";

const logger = getLogger("tools.shell");

export interface CommandResult {
  command: string;
  exitCode: number | null;
  signal: string | null;
  stdout: string;
  stderr: string;
  truncated: boolean;
  timedOut: boolean;
}

/** Shell binary and arguments for a command line. */
export function buildShellCommand(command: string): { file: string; args: string[] } {
  if (process.platform === "win32") {
    return { file: process.env.ComSpec || "cmd.exe", args: ["/d", "/s", "/c", command] };
  }
  return { file: "/bin/sh", args: ["-c", command] };
}

class OutputBuffer {
  text = "";
  truncated = false;

  constructor(private limit: number) {}

  push(chunk: string): void {
    if (this.truncated) return;
    const room = this.limit - this.text.length;
    if (chunk.length > room) {
      this.text += chunk.slice(0, room);
      this.truncated = true;
    } else {
      this.text += chunk;
    }
  }
}

export interface RunCommandOptions {
  cwd: string;
  timeoutMs: number;
  maxOutputChars: number;
  env: Record<string, string | undefined>;
  signal: AbortSignal;
}

export function runCommand(command: string, options: RunCommandOptions): Promise<CommandResult> {
  const { file, args } = buildShellCommand(command);

  return new Promise<CommandResult>((resolve, reject) => {
    if (options.signal.aborted) {
      reject(options.signal.reason);
      return;
    }

    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
      windowsHide: true,
    });
    const stdout = new OutputBuffer(options.maxOutputChars);
    const stderr = new OutputBuffer(options.maxOutputChars);
    let timedOut = false;

    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => stdout.push(chunk));
    child.stderr.on("data", (chunk: string) => stderr.push(chunk));

    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn({ command, timeoutMs: options.timeoutMs }, "command_timed_out");
      child.kill("SIGKILL");
    }, options.timeoutMs);

    const onAbort = (): void => {
      child.kill("SIGKILL");
      reject(options.signal.reason);
    };
    options.signal.addEventListener("abort", onAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timer);
      options.signal.removeEventListener("abort", onAbort);
    };

    child.on("error", (error) => {
      cleanup();
      reject(error);
    });

    child.on("close", (code, signal) => {
      cleanup();
      resolve({
        command,
        exitCode: code,
        signal,
        stdout: stdout.text,
        stderr: stderr.text,
        truncated: stdout.truncated || stderr.truncated,
        timedOut,
      });
    });
  });
}

// ── run_command ────────────────────────────────

/** Longest a command may run, in seconds; leaves the executor room to collect the result. */
export const MAX_COMMAND_SECONDS = (MAX_TOOL_TIMEOUT - 10_000) / 1000;

export function createShellTools(config: ShellConfig): ToolDescriptor[] {
  const defaultTimeout = Math.min(config.timeout, MAX_COMMAND_SECONDS);

  const run_command = defineTool({
    name: "run_command",
    description: "Run a shell command and return its exit code, stdout and stderr. "
      + `Output is capped at ${config.maxOutputChars} characters per stream.`,
    category: ToolCategory.SHELL,
    parameters: [
      required("command", "string", "Command line to run with the system shell"),
      optional("cwd", "string", "Working directory (defaults to the tool working directory)"),
      optional(
        "timeout",
        "number",
        `Timeout in seconds (default ${defaultTimeout}, at most ${MAX_COMMAND_SECONDS})`,
      ),
    ],
    // The command's own timer fires first and reports timedOut
    timeout: MAX_TOOL_TIMEOUT,
    async handler(args, context) {
      const a = new ArgReader(args, context.toolName);
      const command = a.string("command");
      if (command.trim() === "") {
        throw new ToolValidationError(context.toolName, "'command' must not be empty");
      }
      const timeout = Math.min(a.positive("timeout") ?? defaultTimeout, MAX_COMMAND_SECONDS);
      const cwdArg = a.optionalString("cwd");

      logger.info({ command, callId: context.callId }, "command_start");
      const result = await runCommand(command, {
        cwd: cwdArg ? normalizePath(cwdArg, context.workdir) : context.workdir,
        timeoutMs: timeout * 1000,
        maxOutputChars: config.maxOutputChars,
        env: context.env,
        signal: context.signal,
      });
      logger.info(
        { command, callId: context.callId, exitCode: result.exitCode, signal: result.signal },
        "command_done",
      );
      return result;
    },
  });

  return [run_command];
}
