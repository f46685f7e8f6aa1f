/**
 * Anthropic tool-use adapter.
 */

import type Anthropic from "@anthropic-ai/sdk";
import type { ToolCatalog } from "../tools/catalog.ts";
import type { ToolExecutor } from "../tools/executor.ts";
import { parseToolArguments } from "./arguments.ts";
import { serializeResult, undecodableArguments } from "./results.ts";
import type { RunToolCallsOptions } from "./openai.ts";

/** The parts of a `tool_use` content block the adapter reads. */
export interface AnthropicToolUse {
  id: string;
  name: string;
  input: unknown;
}

export function toAnthropicTools(catalog: ToolCatalog): Anthropic.Tool[] {
  return catalog.toFunctionDefinitions().map((def) => ({
    name: def.name,
    description: def.description,
    input_schema: def.parameters,
  }));
}

/**
 * Execute tool_use blocks one after another; failures come back with `is_error`.
 */
export async function runAnthropicToolUses(
  executor: ToolExecutor,
  blocks: readonly AnthropicToolUse[],
  options: RunToolCallsOptions = {},
): Promise<Anthropic.ToolResultBlockParam[]> {
  const results: Anthropic.ToolResultBlockParam[] = [];

  for (const block of blocks) {
    const parsed = parseToolArguments(block.input);
    const result = parsed.ok
      ? await executor.execute(block.name, parsed.args, { callId: block.id, signal: options.signal })
      : undecodableArguments(block.name, block.id, parsed.error);

    results.push({
      type: "tool_result",
      tool_use_id: block.id,
      content: serializeResult(result),
      is_error: !result.success,
    });
  }

  return results;
}
