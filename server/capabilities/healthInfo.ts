import { z } from "zod";
import healthTopicsData from "../data/health-topics.json";
import { HealthAssistantError, InlineAgentError } from "../errors";
import { logDebug } from "../logger";
import { parseToolArgs } from "./args";
import { executeProfileTool } from "./profile";
import type { ToolDefinition, ToolInvocation, ToolResult } from "./types";

const healthTopics = z.record(z.string(), z.string()).parse(healthTopicsData);

export const HEALTH_TOPICS = Object.keys(healthTopics);

export const healthInfoToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "get_health_information",
      description: `Look up general information about a health topic. Known topics: ${HEALTH_TOPICS.join(", ")}.`,
      parameters: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description: "The health topic or question from the user",
          },
        },
        required: ["query"],
      },
    },
  },
];

// Exposed on the check-in agents; runs the HealthQnA agent and returns its answer
export const healthQuestionToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "answer_health_question",
      description: "Answers health-related questions from the user. Control returns to you afterwards.",
      parameters: {
        type: "object",
        properties: {
          question: {
            type: "string",
            description: "The user's health question, in their own words",
          },
        },
        required: ["question"],
      },
    },
  },
];

const healthInformationArgs = z.object({
  query: z.string().min(1),
});

const healthQuestionArgs = z.object({
  question: z.string().min(1),
});

export function findHealthTopic(query: string): string | undefined {
  const normalized = query.toLowerCase();
  return HEALTH_TOPICS.find((topic) => normalized.includes(topic));
}

export async function executeHealthInfoTool(
  toolName: string,
  args: Record<string, unknown>,
  invocation: ToolInvocation
): Promise<ToolResult | null> {
  switch (toolName) {
    case "get_health_information": {
      const { query } = parseToolArgs(healthInformationArgs, toolName, args);
      const topic = findHealthTopic(query);

      if (topic) {
        return {
          displayText: healthTopics[topic],
          outcome: { kind: "information" },
        };
      }

      // Fall back to the user's profile so the answer can still be personal
      const profile = await executeProfileTool("get_user_health_profile", {}, invocation).catch((error: unknown) => {
        logDebug("Profile unavailable for health information fallback", "tools", {
          reason: error instanceof Error ? error.message : String(error),
        });
        return null;
      });

      if (profile && profile.outcome.kind === "information") {
        return {
          displayText:
            `I don't have specific information about '${query}' in my knowledge base. ` +
            `Here's what I know about you based on your profile:\n\n${profile.displayText}\n\n` +
            `For specific health questions about ${query}, I recommend consulting with your healthcare ` +
            `provider who knows your medical history and can provide personalized advice.`,
          outcome: { kind: "information" },
        };
      }

      return {
        displayText:
          `I don't have specific information about '${query}' in my knowledge base. ` +
          `For specific health questions, I recommend consulting with a healthcare provider ` +
          `who can provide personalized advice based on your medical history.`,
        outcome: { kind: "information" },
      };
    }

    case "answer_health_question": {
      const { question } = parseToolArgs(healthQuestionArgs, toolName, args);
      if (!invocation.answerHealthQuestion) {
        throw new HealthAssistantError("Health questions cannot be answered right now.", "unavailable");
      }

      let answer: string;
      try {
        answer = await invocation.answerHealthQuestion(question);
      } catch (error) {
        throw new InlineAgentError("HealthQnA", error);
      }
      return {
        displayText: answer,
        outcome: { kind: "information" },
      };
    }

    default:
      return null;
  }
}

export const healthInfoToolNames = [
  "get_health_information",
  "answer_health_question",
];
