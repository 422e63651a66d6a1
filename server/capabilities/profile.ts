import type { User } from "@shared/schema";
import { NotFoundError, PreconditionError } from "../errors";
import type { InteractionContext } from "../context";
import type { ToolDefinition, ToolInvocation, ToolResult } from "./types";

export const profileToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "get_user_health_profile",
      description: "Retrieve the verified user's health profile: dietary preference, medical conditions and physical limitations. Use it to personalise answers and meal plans.",
      parameters: {
        type: "object",
        properties: {},
        required: [],
      },
    },
  },
];

export function requireUserId(context: InteractionContext): number {
  const userId = context.getUserId();
  if (userId === null) {
    throw new PreconditionError();
  }
  return userId;
}

export function loadVerifiedUser({ context, store }: ToolInvocation): User {
  const userId = requireUserId(context);
  const user = store.findUserById(userId);
  if (!user) {
    throw new NotFoundError(userId);
  }
  return user;
}

export function fullName(user: User): string {
  return `${user.firstName} ${user.lastName}`;
}

function orNone(value: string): string {
  return value.trim() === "" ? "none reported" : value;
}

export function formatHealthProfile(user: User): string {
  return [
    `User Profile for ${fullName(user)}:`,
    `- Dietary Preference: ${user.dietaryPreference}`,
    `- Medical Conditions: ${orNone(user.medicalConditions)}`,
    `- Physical Limitations: ${orNone(user.physicalLimitations)}`,
  ].join("\n");
}

export async function executeProfileTool(
  toolName: string,
  _args: Record<string, unknown>,
  invocation: ToolInvocation
): Promise<ToolResult | null> {
  switch (toolName) {
    case "get_user_health_profile": {
      const user = loadVerifiedUser(invocation);
      return {
        displayText: formatHealthProfile(user),
        outcome: { kind: "information" },
      };
    }

    default:
      return null;
  }
}

export const profileToolNames = [
  "get_user_health_profile",
];
