/**
 * Helpers shared by the planner adapters.
 */

import type { ExecutionResult } from "../tools/types.ts";
import { FailureKind } from "../tools/types.ts";
import { errorToString } from "../infra/errors.ts";

/**
 * Result for a call whose arguments could not be decoded; the tool is never invoked.
 */
export function undecodableArguments(toolName: string, callId: string, message: string): ExecutionResult {
  const now = Date.now();
  return {
    success: false,
    error: { kind: FailureKind.INVALID_ARGUMENTS, message: `${toolName}: ${message}` },
    callId,
    toolName,
    startedAt: now,
    completedAt: now,
    durationMs: 0,
  };
}

/**
 * JSON text for a result envelope. Values JSON cannot encode (BigInt,
 * cycles) are sent as their string form instead.
 */
export function serializeResult(result: ExecutionResult, indent?: number): string {
  try {
    return JSON.stringify(result, null, indent);
  } catch (error) {
    if (!result.success) throw error;
    return JSON.stringify({ ...result, result: errorToString(result.result) }, null, indent);
  }
}
