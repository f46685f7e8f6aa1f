/**
 * File tools - read, write, list, delete, move, inspect, edit and search files.
 *
 * Relative paths resolve against the call's working directory.
 */

import path from "node:path";
import type { Stats } from "node:fs";
import {
  cp,
  mkdir,
  readFile,
  readdir,
  rename,
  rm,
  stat,
  writeFile,
} from "node:fs/promises";
import { defineTool, optional, required } from "../define.ts";
import { ToolCategory, normalizePath } from "../types.ts";
import { ToolValidationError } from "../errors.ts";
import { ArgReader } from "./args.ts";
import { errorToString } from "../../infra/errors.ts";
import { getLogger } from "../../infra/logger.ts";

const logger = getLogger("tools.file");

function resolveEncoding(toolName: string, encoding: string): BufferEncoding {
  if (!Buffer.isEncoding(encoding)) {
    throw new ToolValidationError(toolName, `unsupported encoding '${encoding}'`);
  }
  return encoding;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Convert a simple glob pattern to a regex for filename matching.
 * Supports: *.ts, *.{ts,js}, data-?.csv
 */
export function globToRegex(glob: string): RegExp {
  let pattern = "";
  let inGroup = false;
  for (const char of glob) {
    if (char === "*") pattern += ".*";
    else if (char === "?") pattern += ".";
    else if (char === "{") {
      pattern += "(";
      inGroup = true;
    } else if (char === "}" && inGroup) {
      pattern += ")";
      inGroup = false;
    } else if (char === "," && inGroup) pattern += "|";
    else pattern += char.replace(/[.+^$()|[\]\\{}]/g, (c) => `\\${c}`);
  }
  return new RegExp(`^${pattern}$`);
}

// ── read_file ──────────────────────────────────

export const read_file = defineTool({
  name: "read_file",
  description: "Read content of a file",
  category: ToolCategory.FILE,
  parameters: [
    required("path", "string", "File path to read"),
    optional("encoding", "string", "File encoding", { default: "utf-8" }),
    optional("offset", "integer", "Start reading from this line number (0-based)"),
    optional("limit", "integer", "Maximum number of lines to return"),
  ],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const filePath = normalizePath(a.string("path"), context.workdir);
    const encoding = resolveEncoding(context.toolName, a.string("encoding"));
    const offset = a.optionalNumber("offset");
    const limit = a.positive("limit");
    if (offset !== undefined && offset < 0) {
      throw new ToolValidationError(context.toolName, "'offset' must be 0 or greater");
    }

    const content = await readFile(filePath, { encoding });
    const info = await stat(filePath);

    if (offset === undefined && limit === undefined) {
      return { path: filePath, content, size: info.size, encoding };
    }

    const lines = content.split("\n");
    const totalLines = lines.length;
    const startLine = offset ?? 0;
    const endLine = limit !== undefined ? startLine + limit : totalLines;
    return {
      path: filePath,
      content: lines.slice(startLine, endLine).join("\n"),
      size: info.size,
      encoding,
      totalLines,
      offset: startLine,
      limit: limit ?? null,
      truncated: endLine < totalLines,
    };
  },
});

// ── write_file ─────────────────────────────────

export const write_file = defineTool({
  name: "write_file",
  description: "Write content to a file, creating parent directories as needed",
  category: ToolCategory.FILE,
  parameters: [
    required("path", "string", "File path to write"),
    required("content", "string", "Content to write"),
    optional("encoding", "string", "File encoding", { default: "utf-8" }),
    optional("append", "boolean", "Append instead of overwriting", { default: false }),
  ],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const filePath = normalizePath(a.string("path"), context.workdir);
    const encoding = resolveEncoding(context.toolName, a.string("encoding"));

    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, a.string("content"), {
      encoding,
      flag: a.boolean("append") ? "a" : "w",
    });
    const info = await stat(filePath);

    return { path: filePath, bytesWritten: info.size, encoding };
  },
});

// ── list_files ────────────────────────────────

interface FileEntry {
  name: string;
  path: string;
  isDir: boolean;
  size: number;
}

export const list_files = defineTool({
  name: "list_files",
  description: "List files in a directory (directories too when recursive)",
  category: ToolCategory.FILE,
  parameters: [
    optional("path", "string", "Directory path to list", { default: "." }),
    optional("recursive", "boolean", "List recursively", { default: false }),
    optional("pattern", "string", "Filter file names by glob (e.g., '*.ts')"),
  ],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const dirPath = normalizePath(a.string("path"), context.workdir);
    const recursive = a.boolean("recursive");
    const pattern = a.optionalString("pattern");
    const matcher = pattern ? globToRegex(pattern) : null;
    const files: FileEntry[] = [];

    try {
      await stat(dirPath);
    } catch (error) {
      // A directory that does not exist yet lists as empty
      if (isMissing(error)) return { path: dirPath, recursive, files, count: 0 };
      throw error;
    }

    const scanDir = async (currentPath: string, relativePath: string): Promise<void> => {
      const entries = await readdir(currentPath, { withFileTypes: true });
      entries.sort((x, y) => x.name.localeCompare(y.name));

      for (const entry of entries) {
        const entryPath = path.join(currentPath, entry.name);
        const entryName = relativePath ? path.join(relativePath, entry.name) : entry.name;

        if (entry.isDirectory()) {
          if (!recursive) continue;
          files.push({ name: entryName, path: entryPath, isDir: true, size: 0 });
          await scanDir(entryPath, entryName);
        } else if (entry.isFile()) {
          if (matcher && !matcher.test(entry.name)) continue;
          const info = await stat(entryPath);
          files.push({ name: entryName, path: entryPath, isDir: false, size: info.size });
        }
      }
    };

    await scanDir(dirPath, "");
    return { path: dirPath, recursive, files, count: files.length };
  },
});

// ── delete_file ───────────────────────────────

export const delete_file = defineTool({
  name: "delete_file",
  description: "Delete a file or directory",
  category: ToolCategory.FILE,
  parameters: [required("path", "string", "Path to delete")],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const filePath = normalizePath(a.string("path"), context.workdir);
    await rm(filePath, { recursive: true, force: true });
    return { path: filePath, deleted: true };
  },
});

// ── move_file ─────────────────────────────────

export const move_file = defineTool({
  name: "move_file",
  description: "Move or rename a file or directory",
  category: ToolCategory.FILE,
  parameters: [
    required("from", "string", "Source path"),
    required("to", "string", "Destination path"),
  ],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const from = normalizePath(a.string("from"), context.workdir);
    const to = normalizePath(a.string("to"), context.workdir);

    await mkdir(path.dirname(to), { recursive: true });
    try {
      await rename(from, to);
    } catch (error) {
      // rename cannot cross devices; fall back to copy + delete
      if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) throw error;
      await cp(from, to, { recursive: true });
      await rm(from, { recursive: true, force: true });
    }

    return { from, to, moved: true };
  },
});

// ── get_file_info ─────────────────────────────

export const get_file_info = defineTool({
  name: "get_file_info",
  description: "Get information about a file or directory",
  category: ToolCategory.FILE,
  parameters: [required("path", "string", "Path to get info for")],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const filePath = normalizePath(a.string("path"), context.workdir);

    try {
      const info = await stat(filePath);
      return {
        path: filePath,
        exists: true,
        size: info.size,
        isDirectory: info.isDirectory(),
        isFile: info.isFile(),
        modified: info.mtime.getTime(),
      };
    } catch (error) {
      if (isMissing(error)) return { path: filePath, exists: false };
      throw error;
    }
  },
});

// ── edit_file ──────────────────────────────────

function countOccurrences(content: string, needle: string): number {
  let count = 0;
  let searchFrom = 0;
  while (true) {
    const idx = content.indexOf(needle, searchFrom);
    if (idx === -1) return count;
    count++;
    searchFrom = idx + needle.length;
  }
}

export const edit_file = defineTool({
  name: "edit_file",
  description: "Edit a file by replacing an exact string match with new content. "
    + "The old_string must appear in the file and be unique (unless replace_all is true). "
    + "Include enough surrounding context in old_string to make it unique.",
  category: ToolCategory.FILE,
  parameters: [
    required("path", "string", "File path to edit"),
    required("old_string", "string", "Exact string to find (include surrounding lines for uniqueness)"),
    required("new_string", "string", "Replacement string"),
    optional("replace_all", "boolean", "Replace all occurrences (for renaming)", { default: false }),
  ],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const filePath = normalizePath(a.string("path"), context.workdir);
    const oldString = a.string("old_string");
    const newString = a.string("new_string");
    const replaceAll = a.boolean("replace_all");

    if (oldString === "") {
      throw new ToolValidationError(context.toolName, "'old_string' must not be empty");
    }

    const content = await readFile(filePath, "utf-8");
    const count = countOccurrences(content, oldString);
    if (count === 0) {
      throw new Error("old_string not found in file");
    }
    if (count > 1 && !replaceAll) {
      throw new Error(`old_string found ${count} times, provide more context or set replace_all`);
    }

    // split/join and slicing keep `$` sequences in new_string literal
    const at = content.indexOf(oldString);
    const updated = replaceAll
      ? content.split(oldString).join(newString)
      : content.slice(0, at) + newString + content.slice(at + oldString.length);
    await writeFile(filePath, updated, "utf-8");

    return { path: filePath, replacements: replaceAll ? count : 1 };
  },
});

// ── grep_files ─────────────────────────────────

interface GrepMatch {
  file: string;
  line: string;
  lineNumber: number;
  match: string;
}

export const grep_files = defineTool({
  name: "grep_files",
  description: "Search file contents using a regular expression pattern. "
    + "Returns matching lines with file paths and line numbers.",
  category: ToolCategory.FILE,
  parameters: [
    required("pattern", "string", "Regex pattern to search for"),
    optional("path", "string", "Directory or file to search in", { default: "." }),
    optional("include", "string", "File name pattern to include (e.g. '*.ts')"),
    optional("max_results", "integer", "Maximum matches to return", { default: 50 }),
  ],
  async handler(args, context) {
    const a = new ArgReader(args, context.toolName);
    const pattern = a.string("pattern");
    const searchPath = normalizePath(a.string("path"), context.workdir);
    const include = a.optionalString("include");
    const maxResults = a.positive("max_results") ?? 50;

    let regex: RegExp;
    try {
      regex = new RegExp(pattern);
    } catch (error) {
      throw new ToolValidationError(context.toolName, `invalid regex pattern: ${errorToString(error)}`);
    }
    const includeRegex = include ? globToRegex(include) : null;

    const matches: GrepMatch[] = [];
    let totalMatches = 0;

    const searchFile = async (filePath: string): Promise<void> => {
      let content: string;
      try {
        content = await readFile(filePath, "utf-8");
      } catch (error) {
        logger.debug({ file: filePath, error: errorToString(error) }, "grep_file_skipped");
        return;
      }
      const lines = content.split("\n");
      lines.forEach((line, i) => {
        const m = regex.exec(line);
        if (!m) return;
        totalMatches++;
        if (matches.length < maxResults) {
          matches.push({ file: filePath, line, lineNumber: i + 1, match: m[0] });
        }
      });
    };

    const walkDir = async (dirPath: string): Promise<void> => {
      context.signal.throwIfAborted();
      const entries = await readdir(dirPath, { withFileTypes: true });
      entries.sort((x, y) => x.name.localeCompare(y.name));
      for (const entry of entries) {
        const entryPath = path.join(dirPath, entry.name);
        if (entry.isDirectory()) {
          await walkDir(entryPath);
        } else if (entry.isFile()) {
          if (includeRegex && !includeRegex.test(entry.name)) continue;
          await searchFile(entryPath);
        }
      }
    };

    let info: Stats;
    try {
      info = await stat(searchPath);
    } catch (error) {
      if (isMissing(error)) throw new Error(`Path not found: ${searchPath}`);
      throw error;
    }

    if (info.isDirectory()) {
      await walkDir(searchPath);
    } else {
      await searchFile(searchPath);
    }

    return { matches, totalMatches, truncated: totalMatches > matches.length };
  },
});

export const fileTools = [
  read_file,
  write_file,
  list_files,
  delete_file,
  move_file,
  get_file_info,
  edit_file,
  grep_files,
];
