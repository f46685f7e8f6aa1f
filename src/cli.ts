/**
 * CLI - list, describe and run tools from a terminal.
 *
 *   tooldeck list
 *   tooldeck describe [--format json|openai|anthropic]
 *   tooldeck run <tool> ['{"arg": "value"}']
 *   tooldeck                 (interactive REPL)
 */
import { createInterface } from "node:readline";
import { pathToFileURL } from "node:url";
import { createToolkit, type Toolkit } from "./tools/toolkit.ts";
import { parseToolArguments } from "./planner/arguments.ts";
import { serializeResult, undecodableArguments } from "./planner/results.ts";
import { toOpenAITools } from "./planner/openai.ts";
import { toAnthropicTools } from "./planner/anthropic.ts";
import { getSettings } from "./infra/config.ts";
import { errorToString } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";

const logger = getLogger("cli");

export const DESCRIBE_FORMATS = ["json", "openai", "anthropic"] as const;
export type DescribeFormat = (typeof DESCRIBE_FORMATS)[number];

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export const USAGE = [
  "Usage:",
  "  tooldeck list                                   List registered tools",
  "  tooldeck describe [--format json|openai|anthropic]",
  "                                                  Print tool descriptions",
  "  tooldeck run <tool> [json-args]                 Execute a tool",
  "  tooldeck                                        Start the interactive REPL",
].join("\n");

function isDescribeFormat(value: string): value is DescribeFormat {
  return DESCRIBE_FORMATS.some((f) => f === value);
}

function parseFormat(args: string[]): DescribeFormat | { error: string } {
  let format = "json";
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--format") {
      format = args[i + 1] ?? "";
      i++;
    } else if (arg.startsWith("--format=")) {
      format = arg.slice("--format=".length);
    } else {
      return { error: `unexpected argument '${arg}'` };
    }
  }
  return isDescribeFormat(format)
    ? format
    : { error: `unknown format '${format}' (expected ${DESCRIBE_FORMATS.join(", ")})` };
}

export function describeTools(toolkit: Toolkit, format: DescribeFormat): unknown {
  switch (format) {
    case "openai":
      return toOpenAITools(toolkit.catalog);
    case "anthropic":
      return toAnthropicTools(toolkit.catalog);
    case "json":
      return toolkit.catalog.describeAll();
  }
}

export function listTools(toolkit: Toolkit): { name: string; category: string; description: string }[] {
  return toolkit.registry.list().map((tool) => ({
    name: tool.name,
    category: tool.category,
    description: tool.description,
  }));
}

/**
 * Run one tool and print its result envelope. Returns the exit code.
 */
export async function runTool(
  toolkit: Toolkit,
  toolName: string,
  rawArgs: string | undefined,
  io: CliIO,
): Promise<number> {
  const parsed = parseToolArguments(rawArgs);
  const result = parsed.ok
    ? await toolkit.executor.execute(toolName, parsed.args)
    : undecodableArguments(toolName, "cli", parsed.error);

  io.out(serializeResult(result, 2));
  return result.success ? 0 : 1;
}

/**
 * Execute a CLI command line (without the program name). Returns the exit code.
 */
export async function runCli(argv: string[], toolkit: Toolkit, io: CliIO = consoleIO): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case "list":
      io.out(JSON.stringify(listTools(toolkit), null, 2));
      return 0;

    case "describe": {
      const format = parseFormat(rest);
      if (typeof format !== "string") {
        io.err(`tooldeck describe: ${format.error}`);
        return 2;
      }
      io.out(JSON.stringify(describeTools(toolkit, format), null, 2));
      return 0;
    }

    case "run": {
      const [toolName, ...argParts] = rest;
      if (!toolName) {
        io.err("tooldeck run: missing tool name");
        io.err(USAGE);
        return 2;
      }
      const rawArgs = argParts.length > 0 ? argParts.join(" ") : undefined;
      return runTool(toolkit, toolName, rawArgs, io);
    }

    case "help":
    case "--help":
    case "-h":
      io.out(USAGE);
      return 0;

    default:
      io.err(`tooldeck: unknown command '${command ?? ""}'`);
      io.err(USAGE);
      return 2;
  }
}

// ── REPL ──────────────────────────────────────

const REPL_HELP = [
  "  <tool> [json-args]   Run a tool, e.g. calculate {\"expression\": \"2 + 3 * 4\"}",
  "  /list                List tools",
  "  /describe [format]   Print tool descriptions (json, openai, anthropic)",
  "  /help                Show this help message",
  "  /exit                Exit the REPL",
].join("\n");

/**
 * Handle one REPL line. Returns "exit" when the user asks to leave.
 */
export async function handleReplLine(line: string, toolkit: Toolkit, io: CliIO): Promise<"exit" | void> {
  const trimmed = line.trim();
  if (!trimmed) return;

  if (trimmed.startsWith("/")) {
    const [cmd = "", ...args] = trimmed.slice(1).split(/\s+/);
    switch (cmd.toLowerCase()) {
      case "exit":
      case "quit":
        return "exit";
      case "help":
        io.out(REPL_HELP);
        return;
      case "list":
        await runCli(["list"], toolkit, io);
        return;
      case "describe":
        await runCli(["describe", ...(args[0] ? ["--format", args[0]] : [])], toolkit, io);
        return;
      default:
        io.err(`Unknown command /${cmd}. Type /help for commands.`);
        return;
    }
  }

  const space = trimmed.search(/\s/);
  const toolName = space === -1 ? trimmed : trimmed.slice(0, space);
  const rawArgs = space === -1 ? undefined : trimmed.slice(space + 1);
  await runTool(toolkit, toolName, rawArgs, io);
}

export function startRepl(toolkit: Toolkit, io: CliIO = consoleIO): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  io.out(`tooldeck: ${toolkit.registry.size} tools. Type /help for commands, /exit to quit.`);
  rl.setPrompt("> ");

  return new Promise<void>((resolve) => {
    // Lines are handled one at a time so tool calls never overlap.
    let queue = Promise.resolve();

    rl.on("line", (line) => {
      queue = queue
        .then(async () => {
          if ((await handleReplLine(line, toolkit, io)) === "exit") {
            rl.close();
            return;
          }
          rl.prompt();
        })
        .catch((err: unknown) => {
          logger.error({ error: errorToString(err) }, "repl_error");
          io.err(`[Error] ${errorToString(err)}`);
          rl.prompt();
        });
    });

    rl.on("close", () => resolve());
    rl.prompt();
  });
}

async function main(): Promise<void> {
  const settings = getSettings();
  const toolkit = createToolkit(settings);
  const argv = process.argv.slice(2);

  if (argv.length === 0) {
    await startRepl(toolkit);
    return;
  }
  process.exitCode = await runCli(argv, toolkit);
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((err: unknown) => {
    logger.error({ error: errorToString(err) }, "cli_failed");
    console.error(`tooldeck: ${errorToString(err)}`);
    process.exitCode = 1;
  });
}
