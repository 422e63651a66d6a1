/**
 * Error taxonomy for tool execution.
 *
 * Tools throw these; `toErrorToolResult` turns them into text the calling
 * agent can relay. The one exception that reaches the runtime is
 * `InlineAgentError`, raised when an agent run inside a tool fails.
 */

import type { ZodIssue } from "zod";
import type { ToolResult } from "./capabilities/types";

export type ErrorCategory =
  | "not_found"
  | "precondition"
  | "store"
  | "no_data"
  | "invalid_arguments"
  | "unavailable"
  | "unexpected";

export class HealthAssistantError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HealthAssistantError";
  }
}

export class NotFoundError extends HealthAssistantError {
  constructor(public readonly userId: number) {
    super(`User ID ${userId} not found.`, "not_found");
    this.name = "NotFoundError";
  }
}

export class PreconditionError extends HealthAssistantError {
  constructor(message = "User ID is not available. Please verify your identity first.") {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

export class StoreError extends HealthAssistantError {
  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Database error while trying to ${operation}: ${describeCause(cause)}`, "store", { cause });
    this.name = "StoreError";
  }
}

/**
 * A valid query with an empty result. Not a failure.
 */
export class NoDataError extends HealthAssistantError {
  constructor(message: string) {
    super(message, "no_data");
    this.name = "NoDataError";
  }
}

export class ToolArgumentError extends HealthAssistantError {
  constructor(
    public readonly toolName: string,
    public readonly issues: ZodIssue[]
  ) {
    super(
      `Invalid arguments for ${toolName}: ${issues
        .map((issue) => `${issue.path.join(".") || "input"} ${issue.message.toLowerCase()}`)
        .join("; ")}`,
      "invalid_arguments"
    );
    this.name = "ToolArgumentError";
  }
}

/**
 * An agent run inside a tool call (HealthQnA behind `answer_health_question`)
 * failed or was cancelled. The turn fails with it instead of the tool
 * reporting an error.
 */
export class InlineAgentError extends Error {
  constructor(
    public readonly agent: string,
    cause: unknown
  ) {
    super(`${agent} did not finish: ${describeCause(cause)}`, { cause });
    this.name = "InlineAgentError";
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

export function toErrorToolResult(error: unknown, toolName: string): ToolResult {
  if (error instanceof NoDataError) {
    return {
      displayText: error.message,
      outcome: { kind: "no_data" },
    };
  }

  if (error instanceof HealthAssistantError) {
    return {
      displayText: `Error: ${error.message}`,
      outcome: { kind: "error", category: error.category },
    };
  }

  return {
    displayText: `Error: An unexpected error occurred while running ${toolName}: ${describeCause(error)}`,
    outcome: { kind: "error", category: "unexpected" },
  };
}
