/**
 * Unit tests for the run_command tool.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import path from "node:path";
import os from "node:os";
import { mkdtemp, realpath, rm } from "node:fs/promises";
import {
  buildShellCommand,
  createShellTools,
  MAX_COMMAND_SECONDS,
} from "../../../src/tools/builtins/shell-tools.ts";
import { MAX_TOOL_TIMEOUT, ToolExecutor } from "../../../src/tools/executor.ts";
import { ToolRegistry } from "../../../src/tools/registry.ts";
import { FailureKind } from "../../../src/tools/types.ts";

let workdir: string;

function executorWith(
  config = { timeout: 60, maxOutputChars: 50_000 },
  timeout?: number,
): ToolExecutor {
  const registry = new ToolRegistry();
  registry.registerMany(createShellTools(config));
  return new ToolExecutor(registry, {
    workdir,
    timeout,
    env: { PATH: process.env.PATH, GREETING: "hi" },
  });
}

describe("run_command", () => {
  beforeAll(async () => {
    workdir = await realpath(await mkdtemp(path.join(os.tmpdir(), "tooldeck-shell-")));
  });

  afterAll(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  it("captures stdout and the exit code", async () => {
    const result = await executorWith().execute("run_command", { command: "echo hi" });

    expect(result.success && result.result).toEqual({
      command: "echo hi",
      exitCode: 0,
      signal: null,
      stdout: "hi\n",
      stderr: "",
      truncated: false,
      timedOut: false,
    });
  });

  it("treats a non-zero exit as a normal result", async () => {
    const result = await executorWith().execute("run_command", { command: "echo oops >&2; exit 3" });

    expect(result.success).toBe(true);
    expect(result.success && result.result).toMatchObject({ exitCode: 3, stdout: "", stderr: "oops\n" });
  });

  it("runs in the tool working directory with the tool environment", async () => {
    const executor = executorWith();

    const pwd = await executor.execute("run_command", { command: "pwd" });
    const env = await executor.execute("run_command", { command: "echo $GREETING" });

    expect(pwd.success && pwd.result).toMatchObject({ stdout: `${workdir}\n` });
    expect(env.success && env.result).toMatchObject({ stdout: "hi\n" });
  });

  it("truncates long output", async () => {
    const result = await executorWith({ timeout: 60, maxOutputChars: 5 })
      .execute("run_command", { command: "printf 1234567890" });

    expect(result.success && result.result).toMatchObject({ stdout: "12345", truncated: true });
  });

  it("kills the command at its own timeout", async () => {
    const result = await executorWith().execute("run_command", { command: "exec sleep 5", timeout: 0.2 });

    expect(result.success && result.result).toMatchObject({
      exitCode: null,
      signal: "SIGKILL",
      timedOut: true,
    });
  });

  it("uses its own timeout when the executor default is shorter", async () => {
    const result = await executorWith(undefined, 100)
      .execute("run_command", { command: "exec sleep 5", timeout: 0.3 });

    expect(result.success && result.result).toMatchObject({ signal: "SIGKILL", timedOut: true });
  });

  it("caps the requested timeout", () => {
    expect(MAX_COMMAND_SECONDS).toBe(590);
    expect(createShellTools({ timeout: 60, maxOutputChars: 10 })[0]?.timeout).toBe(MAX_TOOL_TIMEOUT);
  });

  it("reports a per-call executor timeout", async () => {
    const result = await executorWith()
      .execute("run_command", { command: "exec sleep 5" }, { timeout: 100 });

    expect(!result.success && result.error).toEqual({
      kind: FailureKind.TIMEOUT,
      message: "Tool execution timed out after 100ms",
    });
  });

  it("stops when the caller cancels", async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort("stop"), 50);

    const result = await executorWith().execute(
      "run_command",
      { command: "exec sleep 5" },
      { signal: controller.signal },
    );

    expect(!result.success && result.error).toEqual({
      kind: FailureKind.CANCELLED,
      message: "Tool execution cancelled: stop",
    });
  });

  it("rejects an empty command", async () => {
    const result = await executorWith().execute("run_command", { command: "   " });

    expect(!result.success && result.error).toEqual({
      kind: FailureKind.INVALID_ARGUMENTS,
      message: "'command' must not be empty",
    });
  });

  it("uses /bin/sh -c", () => {
    expect(buildShellCommand("ls -la")).toEqual({ file: "/bin/sh", args: ["-c", "ls -la"] });
  });
});
