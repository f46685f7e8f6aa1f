/**
 * Memory tools - user preferences, facts and recent messages kept on disk.
 *
 * Storage layout:
 *   <dataDir>/memory/
 *   ├── 20240102_0304.json   (one file per session, named by its start time)
 *   └── 20240103_1120.json
 *
 * Opening a new session prunes the oldest files down to `maxFiles`.
 * Earlier sessions are reopened by recency (1 = most recent).
 */

import path from "node:path";
import { mkdir, readFile, readdir, unlink, writeFile } from "node:fs/promises";
import { z } from "zod";
import { defineTool, required } from "../define.ts";
import { ToolCategory } from "../types.ts";
import type { ToolDescriptor, ToolValue } from "../types.ts";
import { ToolValidationError } from "../errors.ts";
import { errorToString } from "../../infra/errors.ts";
import { getLogger } from "../../infra/logger.ts";
import { ArgReader } from "./args.ts";

const logger = getLogger("tools.memory");

export const DEFAULT_MAX_MESSAGES = 40;
export const DEFAULT_MAX_FILES = 8;

/** Recent messages included in the context text. */
const CONTEXT_MESSAGES = 10;

const SESSION_FILE_PATTERN = /^\d{8}_\d{4}\.json$/;

const ToolValueSchema: z.ZodType<ToolValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ToolValueSchema),
    z.record(ToolValueSchema),
  ]),
);

const MemoryMessageSchema = z.object({ role: z.string(), content: z.string() });

const MemoryFileSchema = z.object({
  updatedAt: z.number().optional(),
  preferences: z.record(ToolValueSchema).default({}),
  facts: z.record(ToolValueSchema).default({}),
  messages: z.array(MemoryMessageSchema).default([]),
});

export type MemoryMessage = z.infer<typeof MemoryMessageSchema>;

export interface MemorySnapshot {
  preferences: Record<string, ToolValue>;
  facts: Record<string, ToolValue>;
  messages: MemoryMessage[];
}

/** Session file name for a start time, e.g. 20240102_0304.json (local time). */
export function sessionFileName(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}.json`;
}

/** Session files in a memory directory, oldest first. */
export async function listSessionFiles(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
    throw error;
  }
  return names.filter((name) => SESSION_FILE_PATTERN.test(name)).sort();
}

function formatValue(value: ToolValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function formatEntries(entries: Record<string, ToolValue>): string {
  return Object.keys(entries)
    .sort()
    .map((key) => {
      const value = entries[key];
      return `${key}=${value === undefined ? "" : formatValue(value)}`;
    })
    .join(", ");
}

export interface MemoryStoreOptions {
  dir: string;
  /** Existing session file to continue; a new one is named after `now()` otherwise. */
  file?: string;
  maxMessages?: number;
  maxFiles?: number;
  now?: () => Date;
}

/**
 * One memory session. Nothing touches the disk until the first read or write.
 */
export class MemoryStore {
  readonly dir: string;
  readonly file: string;
  private readonly maxMessages: number;
  private readonly maxFiles: number;
  private readonly isNewSession: boolean;
  private preferences: Record<string, ToolValue> = {};
  private facts: Record<string, ToolValue> = {};
  private messages: MemoryMessage[] = [];
  private ready: Promise<void> | null = null;

  constructor(options: MemoryStoreOptions) {
    this.dir = options.dir;
    this.isNewSession = options.file === undefined;
    const now = options.now ?? (() => new Date());
    this.file = options.file ?? path.join(options.dir, sessionFileName(now()));
    this.maxMessages = options.maxMessages ?? DEFAULT_MAX_MESSAGES;
    this.maxFiles = options.maxFiles ?? DEFAULT_MAX_FILES;
  }

  /**
   * Reopen a session by recency (1 = most recent). An index with no session
   * behind it starts a new one.
   */
  static async fromIndex(index: number, options: MemoryStoreOptions): Promise<MemoryStore> {
    const files = await listSessionFiles(options.dir);
    const name = index >= 1 ? files[files.length - index] : undefined;
    if (name === undefined) {
      logger.warn({ index, dir: options.dir }, "memory_session_not_found");
      return new MemoryStore(options);
    }
    const file = path.join(options.dir, name);
    logger.info({ file }, "memory_session_opened");
    return new MemoryStore({ ...options, file });
  }

  private open(): Promise<void> {
    if (!this.ready) {
      this.ready = this.load().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  private async load(): Promise<void> {
    if (this.isNewSession) {
      await this.prune();
    }

    let text: string;
    try {
      text = await readFile(this.file, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return;
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      logger.warn({ file: this.file, error: errorToString(error) }, "memory_load_failed");
      return;
    }
    const parsed = MemoryFileSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn({ file: this.file, error: parsed.error.message }, "memory_load_failed");
      return;
    }
    this.preferences = parsed.data.preferences;
    this.facts = parsed.data.facts;
    this.messages = parsed.data.messages.slice(-this.maxMessages);
  }

  /** Drop the oldest session files so at most `maxFiles` remain. */
  private async prune(): Promise<void> {
    const files = await listSessionFiles(this.dir);
    const excess = files.slice(0, Math.max(0, files.length - this.maxFiles));
    for (const name of excess) {
      const file = path.join(this.dir, name);
      try {
        await unlink(file);
        logger.info({ file }, "memory_file_pruned");
      } catch (error) {
        logger.warn({ file, error: errorToString(error) }, "memory_prune_failed");
      }
    }
  }

  private async save(): Promise<void> {
    await mkdir(path.dirname(this.file), { recursive: true });
    const payload = {
      updatedAt: Math.floor(Date.now() / 1000),
      preferences: this.preferences,
      facts: this.facts,
      messages: this.messages,
    };
    await writeFile(this.file, JSON.stringify(payload, null, 2), "utf-8");
  }

  async setPreference(key: string, value: ToolValue): Promise<void> {
    await this.open();
    this.preferences[key] = value;
    await this.save();
  }

  async setFact(key: string, value: ToolValue): Promise<void> {
    await this.open();
    this.facts[key] = value;
    await this.save();
  }

  /** Append a message; empty content is ignored. Keeps the last `maxMessages`. */
  async push(role: string, content: string): Promise<void> {
    if (!content) return;
    await this.open();
    this.messages.push({ role, content });
    this.messages = this.messages.slice(-this.maxMessages);
    await this.save();
  }

  async snapshot(): Promise<MemorySnapshot> {
    await this.open();
    return structuredClone({
      preferences: this.preferences,
      facts: this.facts,
      messages: this.messages,
    });
  }

  /**
   * Compact text for a model prompt: preferences, facts and the last few messages.
   */
  async context(): Promise<string> {
    await this.open();
    const parts: string[] = [];
    if (Object.keys(this.preferences).length > 0) {
      parts.push(`User preferences: ${formatEntries(this.preferences)}`);
    }
    if (Object.keys(this.facts).length > 0) {
      parts.push(`User facts: ${formatEntries(this.facts)}`);
    }
    if (this.messages.length > 0) {
      const recent = this.messages.slice(-CONTEXT_MESSAGES);
      parts.push(`Recent conversation:\n${recent.map((m) => `${m.role}: ${m.content}`).join("\n")}`);
    }
    return parts.join("\n\n").trim();
  }
}

// ── tools ──────────────────────────────────────

function readEntry(args: Record<string, unknown>, toolName: string): { key: string; value: ToolValue } {
  const a = new ArgReader(args, toolName);
  const key = a.string("key").trim();
  if (key === "") {
    throw new ToolValidationError(toolName, "'key' must not be empty");
  }
  const value = ToolValueSchema.safeParse(a.value("value"));
  if (!value.success) {
    throw new ToolValidationError(toolName, "'value' must be a JSON value");
  }
  return { key, value: value.data };
}

export function createMemoryTools(store: MemoryStore): ToolDescriptor[] {
  const memory_set_preference = defineTool({
    name: "memory_set_preference",
    description: "Remember a user preference (e.g. language, units) for later calls",
    category: ToolCategory.MEMORY,
    parameters: [
      required("key", "string", "Preference name"),
      required("value", "any", "Preference value"),
    ],
    async handler(args, context) {
      const entry = readEntry(args, context.toolName);
      await store.setPreference(entry.key, entry.value);
      return entry;
    },
  });

  const memory_set_fact = defineTool({
    name: "memory_set_fact",
    description: "Remember a fact about the user for later calls",
    category: ToolCategory.MEMORY,
    parameters: [
      required("key", "string", "Fact name"),
      required("value", "any", "Fact value"),
    ],
    async handler(args, context) {
      const entry = readEntry(args, context.toolName);
      await store.setFact(entry.key, entry.value);
      return entry;
    },
  });

  const memory_context = defineTool({
    name: "memory_context",
    description: "Recall remembered preferences, facts and the recent conversation as text",
    category: ToolCategory.MEMORY,
    parameters: [],
    async handler() {
      return { context: await store.context() };
    },
  });

  return [memory_set_preference, memory_set_fact, memory_context];
}
