import type { AgentName } from "../agents";
import type { ToolDefinition } from "../capabilities/types";

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type HistoryEntry =
  | { role: "user"; content: string }
  | { role: "assistant"; agent: AgentName; content: string | null; toolCalls?: ToolCall[] }
  | { role: "tool"; callId: string; name: string; content: string }
  | { role: "handoff"; from: AgentName; to: AgentName }
  | { role: "system"; content: string };

export interface AgentSpec {
  name: AgentName;
  instructions: string;
  tools: ToolDefinition[];
  handoffs: Array<{ target: AgentName; description: string }>;
}

export interface DecisionRequest {
  agent: AgentSpec;
  history: readonly HistoryEntry[];
}

/**
 * What the active agent wants to do next. `handoff.target` is whatever the
 * engine produced; the runtime decides whether it is allowed.
 */
export type Decision =
  | { type: "tool_calls"; calls: ToolCall[]; message?: string }
  | { type: "handoff"; target: string; message?: string }
  | { type: "final"; message: string };

export interface InferenceEngine {
  decide(request: DecisionRequest, signal?: AbortSignal): Promise<Decision>;
}
