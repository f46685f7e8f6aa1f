export { parseToolArguments, type ParsedArguments } from "./arguments.ts";
export { serializeResult, undecodableArguments } from "./results.ts";
export { toOpenAITools, runOpenAIToolCalls, type OpenAIToolCall, type RunToolCallsOptions } from "./openai.ts";
export { toAnthropicTools, runAnthropicToolUses, type AnthropicToolUse } from "./anthropic.ts";
