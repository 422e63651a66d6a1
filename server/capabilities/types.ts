import type OpenAI from "openai";
import type { ErrorCategory } from "../errors";
import type { InteractionContext } from "../context";
import type { HealthStore } from "../db";

export type GlucoseBand = "low" | "normal" | "high";

/**
 * Structured effect of a tool call. The runtime drives handoffs from these,
 * never from the display text.
 */
export type ToolOutcome =
  | { kind: "verified"; userId: number; name: string }
  | { kind: "not_found"; userId: number }
  | { kind: "mood_recorded"; mood: string }
  | { kind: "glucose_recorded"; value: number; band: GlucoseBand }
  | { kind: "glucose_history"; latest: number; average3Days: number | null; average7Days: number | null }
  | { kind: "meal_plan"; glucoseStatus: GlucoseBand }
  | { kind: "information" }
  | { kind: "no_data" }
  | { kind: "error"; category: ErrorCategory };

export interface ToolResult {
  displayText: string;
  outcome: ToolOutcome;
  // Applied by the runtime once the tool has returned
  contextMutation?: (context: InteractionContext) => void;
}

export interface ToolInvocation {
  context: InteractionContext;
  store: HealthStore;
  // Runs the HealthQnA agent inline; supplied by the runtime
  answerHealthQuestion?: (question: string) => Promise<string>;
}

export type ToolDefinition = OpenAI.Chat.ChatCompletionTool;
