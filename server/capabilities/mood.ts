import { z } from "zod";
import { parseToolArgs } from "./args";
import { requireUserId } from "./profile";
import type { ToolDefinition, ToolInvocation, ToolResult } from "./types";

export const moodToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "record_mood",
      description: "Record the user's current mood in their wellbeing log.",
      parameters: {
        type: "object",
        properties: {
          mood: {
            type: "string",
            description: "The mood keyword or short phrase extracted from the user's reply (e.g., 'happy', 'tired', 'bit lazy', 'stressed out'). Never the whole reply.",
          },
        },
        required: ["mood"],
      },
    },
  },
];

const recordMoodArgs = z.object({
  mood: z
    .string()
    .max(100, "must be a short word or phrase")
    .refine((value) => value.trim().length > 0, "must not be empty"),
});

export async function executeMoodTool(
  toolName: string,
  args: Record<string, unknown>,
  { context, store }: ToolInvocation
): Promise<ToolResult | null> {
  switch (toolName) {
    case "record_mood": {
      const userId = requireUserId(context);
      const { mood } = parseToolArgs(recordMoodArgs, toolName, args);

      // Stored exactly as extracted
      store.insertMoodLog(userId, mood);

      return {
        displayText: `Successfully recorded your mood as '${mood}'.`,
        outcome: { kind: "mood_recorded", mood },
      };
    }

    default:
      return null;
  }
}

export const moodToolNames = [
  "record_mood",
];
