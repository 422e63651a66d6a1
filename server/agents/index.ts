import { identityVerifierAgent } from "./identityVerifier";
import { moodRecorderAgent } from "./moodRecorder";
import { cgmCollectorAgent } from "./cgmCollector";
import { mealPlannerAgent } from "./mealPlanner";
import { healthQnaAgent } from "./healthQna";
import type { AgentDefinition, AgentName, HandoffEdge } from "./types";

export { agentNames, isAgentName } from "./types";
export type { AgentDefinition, AgentName, HandoffEdge } from "./types";

export const INITIAL_AGENT: AgentName = "IdentityVerifier";

export const agents: Record<AgentName, AgentDefinition> = {
  IdentityVerifier: identityVerifierAgent,
  MoodRecorder: moodRecorderAgent,
  CGMCollector: cgmCollectorAgent,
  MealPlanner: mealPlannerAgent,
  HealthQnA: healthQnaAgent,
};

export function getAgent(name: AgentName): AgentDefinition {
  return agents[name];
}

export function findHandoff(from: AgentName, target: AgentName): HandoffEdge | undefined {
  return agents[from].handoffs.find((edge) => edge.target === target);
}
