import { z } from "zod";
import { parseToolArgs } from "./args";
import { fullName } from "./profile";
import type { ToolDefinition, ToolInvocation, ToolResult } from "./types";

// Kept stable for anything that still reads the text; the runtime uses the outcome
export const VERIFICATION_SUCCESS_PREFIX = "Verification successful.";

export const identityToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "verify_identity",
      description: "Verify the user's identity by looking up their numeric user ID. Returns a welcome message with the user's name when the ID exists.",
      parameters: {
        type: "object",
        properties: {
          user_id: {
            type: "integer",
            description: "The numeric user ID the user provided (e.g., 7, 42). Pass only the number.",
          },
        },
        required: ["user_id"],
      },
    },
  },
];

const verifyIdentityArgs = z.object({
  user_id: z.union([
    z.number().int().nonnegative(),
    z.string().trim().regex(/^\d+$/, "must be a whole number").transform(Number),
  ]),
});

export async function executeIdentityTool(
  toolName: string,
  args: Record<string, unknown>,
  { store }: ToolInvocation
): Promise<ToolResult | null> {
  switch (toolName) {
    case "verify_identity": {
      const { user_id: userId } = parseToolArgs(verifyIdentityArgs, toolName, args);
      const user = store.findUserById(userId);

      if (!user) {
        return {
          displayText: `User ID ${userId} not found. Please provide a valid ID.`,
          outcome: { kind: "not_found", userId },
        };
      }

      const name = fullName(user);
      return {
        displayText: `${VERIFICATION_SUCCESS_PREFIX} Welcome, ${name}!`,
        outcome: { kind: "verified", userId: user.id, name },
        contextMutation: (context) => context.setUserId(user.id),
      };
    }

    default:
      return null;
  }
}

export const identityToolNames = [
  "verify_identity",
];
