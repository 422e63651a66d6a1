import type { ToolOutcome } from "../capabilities/types";

export const agentNames = [
  "IdentityVerifier",
  "MoodRecorder",
  "CGMCollector",
  "MealPlanner",
  "HealthQnA",
] as const;

export type AgentName = typeof agentNames[number];

export function isAgentName(value: string): value is AgentName {
  return agentNames.some((name) => name === value);
}

/**
 * A one-way transfer of control, allowed once a tool outcome satisfies `when`.
 */
export interface HandoffEdge {
  target: AgentName;
  description: string;
  when: (outcome: ToolOutcome) => boolean;
}

export interface AgentDefinition {
  name: AgentName;
  instructions: string;
  tools: string[];
  handoffs: HandoffEdge[];
}
