/**
 * Unit tests for file tools.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "node:path";
import os from "node:os";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { fileTools, globToRegex, grep_files } from "../../../src/tools/builtins/file-tools.ts";
import { ToolExecutor } from "../../../src/tools/executor.ts";
import { ToolRegistry } from "../../../src/tools/registry.ts";
import { FailureKind, type ExecutionResult } from "../../../src/tools/types.ts";

let testDir: string;
let executor: ToolExecutor;

async function run(name: string, args: Record<string, unknown>): Promise<unknown> {
  const result = await executor.execute(name, args);
  if (!result.success) throw new Error(`${result.error.kind}: ${result.error.message}`);
  return result.result;
}

function failureOf(result: ExecutionResult): { kind: string; message: string } {
  if (result.success) throw new Error("expected a failure");
  return result.error;
}

describe("file tools", () => {
  beforeEach(async () => {
    testDir = await mkdtemp(path.join(os.tmpdir(), "tooldeck-files-"));
    const registry = new ToolRegistry();
    registry.registerMany(fileTools);
    executor = new ToolExecutor(registry, { workdir: testDir });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("write_file / read_file", () => {
    it("writes relative to the workdir and reads it back", async () => {
      const target = path.join(testDir, "notes", "a.txt");

      expect(await run("write_file", { path: "notes/a.txt", content: "hello" })).toEqual({
        path: target,
        bytesWritten: 5,
        encoding: "utf-8",
      });
      expect(await run("read_file", { path: "notes/a.txt" })).toEqual({
        path: target,
        content: "hello",
        size: 5,
        encoding: "utf-8",
      });
    });

    it("appends when asked", async () => {
      await run("write_file", { path: "log.txt", content: "a" });
      await run("write_file", { path: "log.txt", content: "b", append: true });

      expect(await readFile(path.join(testDir, "log.txt"), "utf-8")).toBe("ab");
    });

    it("reads a window of lines", async () => {
      await writeFile(path.join(testDir, "lines.txt"), "l1\nl2\nl3\nl4");

      expect(await run("read_file", { path: "lines.txt", offset: 1, limit: 2 })).toEqual({
        path: path.join(testDir, "lines.txt"),
        content: "l2\nl3",
        size: 11,
        encoding: "utf-8",
        totalLines: 4,
        offset: 1,
        limit: 2,
        truncated: true,
      });
    });

    it("reports a missing file as an execution error", async () => {
      const error = failureOf(await executor.execute("read_file", { path: "nope.txt" }));

      expect(error.kind).toBe(FailureKind.EXECUTION_ERROR);
      expect(error.message).toContain("ENOENT");
    });

    it("rejects unknown encodings", async () => {
      const error = failureOf(await executor.execute("read_file", { path: "x", encoding: "klingon" }));

      expect(error).toEqual({
        kind: FailureKind.INVALID_ARGUMENTS,
        message: "unsupported encoding 'klingon'",
      });
    });

    it("rejects a non-positive limit", async () => {
      const error = failureOf(await executor.execute("read_file", { path: "x", limit: 0 }));

      expect(error.message).toBe("'limit' must be greater than 0");
    });
  });

  describe("list_files", () => {
    beforeEach(async () => {
      await writeFile(path.join(testDir, "b.txt"), "bb");
      await writeFile(path.join(testDir, "a.ts"), "a");
      await mkdir(path.join(testDir, "sub"));
      await writeFile(path.join(testDir, "sub", "c.ts"), "ccc");
    });

    it("lists files only, sorted, when not recursive", async () => {
      expect(await run("list_files", {})).toEqual({
        path: testDir,
        recursive: false,
        files: [
          { name: "a.ts", path: path.join(testDir, "a.ts"), isDir: false, size: 1 },
          { name: "b.txt", path: path.join(testDir, "b.txt"), isDir: false, size: 2 },
        ],
        count: 2,
      });
    });

    it("recurses and filters by glob", async () => {
      const result = await run("list_files", { recursive: true, pattern: "*.ts" });

      expect(result).toMatchObject({
        count: 3,
        files: [
          { name: "a.ts", isDir: false },
          { name: "sub", isDir: true, size: 0 },
          { name: path.join("sub", "c.ts"), isDir: false, size: 3 },
        ],
      });
    });

    it("lists a missing directory as empty", async () => {
      expect(await run("list_files", { path: "missing" })).toEqual({
        path: path.join(testDir, "missing"),
        recursive: false,
        files: [],
        count: 0,
      });
    });
  });

  describe("delete_file / move_file / get_file_info", () => {
    it("describes files and missing paths", async () => {
      await writeFile(path.join(testDir, "f.txt"), "1234");

      expect(await run("get_file_info", { path: "f.txt" })).toMatchObject({
        path: path.join(testDir, "f.txt"),
        exists: true,
        size: 4,
        isFile: true,
        isDirectory: false,
      });
      expect(await run("get_file_info", { path: "gone.txt" })).toEqual({
        path: path.join(testDir, "gone.txt"),
        exists: false,
      });
    });

    it("deletes files, and deleting a missing path succeeds", async () => {
      await writeFile(path.join(testDir, "f.txt"), "x");

      expect(await run("delete_file", { path: "f.txt" })).toEqual({
        path: path.join(testDir, "f.txt"),
        deleted: true,
      });
      expect(await run("get_file_info", { path: "f.txt" })).toMatchObject({ exists: false });
      expect(await run("delete_file", { path: "f.txt" })).toMatchObject({ deleted: true });
    });

    it("moves into a new directory", async () => {
      await writeFile(path.join(testDir, "a.txt"), "payload");

      expect(await run("move_file", { from: "a.txt", to: "moved/b.txt" })).toEqual({
        from: path.join(testDir, "a.txt"),
        to: path.join(testDir, "moved", "b.txt"),
        moved: true,
      });
      expect(await readFile(path.join(testDir, "moved", "b.txt"), "utf-8")).toBe("payload");
      expect(await run("get_file_info", { path: "a.txt" })).toMatchObject({ exists: false });
    });
  });

  describe("edit_file", () => {
    const file = () => path.join(testDir, "edit.txt");

    it("replaces a unique match literally", async () => {
      await writeFile(file(), "foo bar foo");

      expect(await run("edit_file", { path: "edit.txt", old_string: "bar", new_string: "$& baz" })).toEqual({
        path: file(),
        replacements: 1,
      });
      expect(await readFile(file(), "utf-8")).toBe("foo $& baz foo");
    });

    it("refuses ambiguous matches unless replace_all is set", async () => {
      await writeFile(file(), "foo bar foo");

      const error = failureOf(
        await executor.execute("edit_file", { path: "edit.txt", old_string: "foo", new_string: "x" }),
      );
      expect(error).toEqual({
        kind: FailureKind.EXECUTION_ERROR,
        message: "old_string found 2 times, provide more context or set replace_all",
      });

      expect(
        await run("edit_file", { path: "edit.txt", old_string: "foo", new_string: "x", replace_all: true }),
      ).toEqual({ path: file(), replacements: 2 });
      expect(await readFile(file(), "utf-8")).toBe("x bar x");
    });

    it("reports a missing match", async () => {
      await writeFile(file(), "abc");

      const error = failureOf(
        await executor.execute("edit_file", { path: "edit.txt", old_string: "zzz", new_string: "y" }),
      );
      expect(error.message).toBe("old_string not found in file");
    });

    it("rejects an empty old_string", async () => {
      const error = failureOf(
        await executor.execute("edit_file", { path: "edit.txt", old_string: "", new_string: "y" }),
      );
      expect(error).toEqual({
        kind: FailureKind.INVALID_ARGUMENTS,
        message: "'old_string' must not be empty",
      });
    });
  });

  describe("grep_files", () => {
    beforeEach(async () => {
      await writeFile(path.join(testDir, "a.ts"), "const x = 1\nlet y = 2");
      await writeFile(path.join(testDir, "b.md"), "const z");
    });

    it("finds matching lines in included files", async () => {
      expect(await run("grep_files", { pattern: "const \\w", include: "*.ts" })).toEqual({
        matches: [
          { file: path.join(testDir, "a.ts"), line: "const x = 1", lineNumber: 1, match: "const x" },
        ],
        totalMatches: 1,
        truncated: false,
      });
    });

    it("caps the number of matches", async () => {
      const result = await run("grep_files", { pattern: "const", max_results: 1 });

      expect(result).toMatchObject({ totalMatches: 2, truncated: true });
    });

    it("searches a single file", async () => {
      const result = await run("grep_files", { pattern: "let", path: "a.ts" });

      expect(result).toMatchObject({ totalMatches: 1, matches: [{ lineNumber: 2, line: "let y = 2" }] });
    });

    it("rejects invalid regular expressions", async () => {
      const error = failureOf(await executor.execute("grep_files", { pattern: "(" }));

      expect(error.kind).toBe(FailureKind.INVALID_ARGUMENTS);
      expect(error.message.startsWith("invalid regex pattern: ")).toBe(true);
    });

    it("stops walking once the call is aborted", async () => {
      const pending = Promise.resolve(grep_files.handler({ pattern: "const", path: testDir }, {
        callId: "call-1",
        toolName: "grep_files",
        signal: AbortSignal.abort("stop"),
        workdir: testDir,
        env: {},
      }));

      await expect(pending).rejects.toBe("stop");
    });

    it("reports a missing search path", async () => {
      const error = failureOf(await executor.execute("grep_files", { pattern: "x", path: "nope" }));

      expect(error).toEqual({
        kind: FailureKind.EXECUTION_ERROR,
        message: `Path not found: ${path.join(testDir, "nope")}`,
      });
    });
  });
});

describe("globToRegex", () => {
  it("handles wildcards and alternation", () => {
    const tsOrJs = globToRegex("*.{ts,js}");
    expect(tsOrJs.test("a.ts")).toBe(true);
    expect(tsOrJs.test("a.js")).toBe(true);
    expect(tsOrJs.test("a.tsx")).toBe(false);
    expect(globToRegex("data-?.csv").test("data-1.csv")).toBe(true);
    expect(globToRegex("data-?.csv").test("data-10.csv")).toBe(false);
  });
});
