/**
 * Tool error types.
 *
 * Handlers throw these to pick the failure kind the executor reports;
 * anything else they throw becomes an execution_error.
 */

import { TooldeckError } from "../infra/errors.ts";

// ── ToolError ───────────────────────────────────

export class ToolError extends TooldeckError {
  constructor(
    public toolName: string,
    message: string,
    public override cause?: unknown,
  ) {
    super(message);
    this.name = "ToolError";
  }
}

// ── ToolNotFoundError ───────────────────────────

export class ToolNotFoundError extends ToolError {
  constructor(toolName: string) {
    super(toolName, `tool '${toolName}' not registered`);
    this.name = "ToolNotFoundError";
  }
}

// ── ToolValidationError ──────────────────────

export class ToolValidationError extends ToolError {
  constructor(
    toolName: string,
    message: string,
    public issues: string[] = [message],
  ) {
    super(toolName, message);
    this.name = "ToolValidationError";
  }
}

// ── MissingConfigurationError ────────────────

export class MissingConfigurationError extends ToolError {
  constructor(
    toolName: string,
    public setting: string,
    hint?: string,
  ) {
    super(toolName, `${toolName} requires ${setting}${hint ? ` (${hint})` : ""}`);
    this.name = "MissingConfigurationError";
  }
}

// ── ToolTimeoutError ──────────────────────────

export class ToolTimeoutError extends ToolError {
  constructor(toolName: string, timeout: number) {
    super(toolName, `Tool execution timed out after ${timeout}ms`);
    this.name = "ToolTimeoutError";
  }
}

// ── ToolCancelledError ────────────────────────

export class ToolCancelledError extends ToolError {
  constructor(toolName: string, reason?: string) {
    super(toolName, reason ? `Tool execution cancelled: ${reason}` : "Tool execution cancelled");
    this.name = "ToolCancelledError";
  }
}

// ── Registration errors ─────────────────────────

export class InvalidToolDefinitionError extends ToolError {
  constructor(toolName: string, message: string) {
    super(toolName, `Invalid tool definition "${toolName}": ${message}`);
    this.name = "InvalidToolDefinitionError";
  }
}

export class DuplicateToolError extends ToolError {
  constructor(toolName: string) {
    super(toolName, `Tool "${toolName}" already registered`);
    this.name = "DuplicateToolError";
  }
}

export class RegistrySealedError extends ToolError {
  constructor(toolName: string) {
    super(toolName, `Cannot register "${toolName}": registry is sealed`);
    this.name = "RegistrySealedError";
  }
}
