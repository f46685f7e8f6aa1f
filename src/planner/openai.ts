/**
 * OpenAI function-calling adapter.
 *
 *   const tools = toOpenAITools(catalog);
 *   const completion = await client.chat.completions.create({ model, messages, tools });
 *   const calls = completion.choices[0]?.message.tool_calls ?? [];
 *   messages.push(...await runOpenAIToolCalls(executor, calls));
 */

import type OpenAI from "openai";
import type { ToolCatalog } from "../tools/catalog.ts";
import type { ToolExecutor } from "../tools/executor.ts";
import { parseToolArguments } from "./arguments.ts";
import { serializeResult, undecodableArguments } from "./results.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("planner.openai");

/** The parts of an assistant tool call the adapter reads. */
export interface OpenAIToolCall {
  id: string;
  type?: string;
  function?: { name: string; arguments: string };
}

export interface RunToolCallsOptions {
  signal?: AbortSignal;
}

export function toOpenAITools(catalog: ToolCatalog): OpenAI.Chat.ChatCompletionTool[] {
  return catalog.toFunctionDefinitions().map((def) => ({
    type: "function",
    function: {
      name: def.name,
      description: def.description,
      parameters: def.parameters,
    },
  }));
}

/**
 * Execute tool calls one after another and answer each with a tool message
 * whose content is the JSON ExecutionResult.
 */
export async function runOpenAIToolCalls(
  executor: ToolExecutor,
  toolCalls: readonly OpenAIToolCall[],
  options: RunToolCallsOptions = {},
): Promise<OpenAI.Chat.ChatCompletionToolMessageParam[]> {
  const messages: OpenAI.Chat.ChatCompletionToolMessageParam[] = [];

  for (const call of toolCalls) {
    if (!call.function) {
      logger.warn({ callId: call.id, type: call.type }, "unsupported_tool_call_type");
      messages.push({
        role: "tool",
        tool_call_id: call.id,
        content: serializeResult(
          undecodableArguments(call.type ?? "unknown", call.id, `unsupported tool call type '${call.type ?? "unknown"}'`),
        ),
      });
      continue;
    }

    const name = call.function.name;
    const parsed = parseToolArguments(call.function.arguments);
    const result = parsed.ok
      ? await executor.execute(name, parsed.args, { callId: call.id, signal: options.signal })
      : undecodableArguments(name, call.id, parsed.error);

    messages.push({
      role: "tool",
      tool_call_id: call.id,
      content: serializeResult(result),
    });
  }

  return messages;
}
