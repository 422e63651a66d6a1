import {
  identityToolDefinitions,
  executeIdentityTool,
  identityToolNames,
} from "./capabilities/identity";
import {
  moodToolDefinitions,
  executeMoodTool,
  moodToolNames,
} from "./capabilities/mood";
import {
  glucoseToolDefinitions,
  executeGlucoseTool,
  glucoseToolNames,
} from "./capabilities/glucose";
import {
  profileToolDefinitions,
  executeProfileTool,
  profileToolNames,
} from "./capabilities/profile";
import {
  healthInfoToolDefinitions,
  healthQuestionToolDefinitions,
  executeHealthInfoTool,
  healthInfoToolNames,
} from "./capabilities/healthInfo";
import {
  mealPlanToolDefinitions,
  executeMealPlanTool,
  mealPlanToolNames,
} from "./capabilities/mealPlan";
import type { ToolDefinition, ToolInvocation, ToolResult } from "./capabilities/types";
import { InlineAgentError, toErrorToolResult } from "./errors";
import { log, logWarn } from "./logger";

export type { ToolDefinition, ToolInvocation, ToolResult, ToolOutcome } from "./capabilities/types";

export const allToolDefinitions: ToolDefinition[] = [
  ...identityToolDefinitions,
  ...moodToolDefinitions,
  ...glucoseToolDefinitions,
  ...profileToolDefinitions,
  ...healthInfoToolDefinitions,
  ...healthQuestionToolDefinitions,
  ...mealPlanToolDefinitions,
];

const definitionsByName = new Map(allToolDefinitions.map((tool) => [tool.function.name, tool]));

export function getToolDefinition(toolName: string): ToolDefinition {
  const definition = definitionsByName.get(toolName);
  if (!definition) {
    throw new Error(`Unknown tool: ${toolName}`);
  }
  return definition;
}

/**
 * Runs one tool call. Tool failures come back as a ToolResult whose text
 * explains what went wrong; only an `InlineAgentError` is rethrown.
 */
export async function executeTool(
  toolName: string,
  args: Record<string, unknown>,
  invocation: ToolInvocation
): Promise<ToolResult> {
  log(`Executing tool: ${toolName}`, "tools", { args });

  let result: ToolResult | null = null;

  try {
    if (identityToolNames.includes(toolName)) {
      result = await executeIdentityTool(toolName, args, invocation);
    } else if (moodToolNames.includes(toolName)) {
      result = await executeMoodTool(toolName, args, invocation);
    } else if (glucoseToolNames.includes(toolName)) {
      result = await executeGlucoseTool(toolName, args, invocation);
    } else if (profileToolNames.includes(toolName)) {
      result = await executeProfileTool(toolName, args, invocation);
    } else if (healthInfoToolNames.includes(toolName)) {
      result = await executeHealthInfoTool(toolName, args, invocation);
    } else if (mealPlanToolNames.includes(toolName)) {
      result = await executeMealPlanTool(toolName, args, invocation);
    }
  } catch (error) {
    if (error instanceof InlineAgentError) {
      logWarn(`Inline agent failed during ${toolName}`, "tools", { agent: error.agent });
      throw error;
    }
    result = toErrorToolResult(error, toolName);
  }

  if (result === null) {
    result = {
      displayText: `Error: Unknown tool: ${toolName}`,
      outcome: { kind: "error", category: "unexpected" },
    };
  }

  log(`Tool result: ${result.outcome.kind}`, "tools", { tool: toolName });
  return result;
}
