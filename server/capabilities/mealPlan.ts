import { z } from "zod";
import mealSuggestionsData from "../data/meal-suggestions.json";
import { parseToolArgs } from "./args";
import { loadVerifiedUser } from "./profile";
import type { ToolDefinition, ToolInvocation, ToolResult } from "./types";

const mealsSchema = z.tuple([z.string(), z.string(), z.string()]);
const dietMealsSchema = z.object({
  vegetarian: mealsSchema,
  vegan: mealsSchema,
  "non-vegetarian": mealsSchema,
});
const mealSuggestions = z
  .object({ low: dietMealsSchema, normal: dietMealsSchema, high: dietMealsSchema })
  .parse(mealSuggestionsData);

const MEAL_LABELS = ["Next Meal", "Following Meal", "Later Meal"] as const;

export const CLOSING_LINE = "Thank you for using the Health Assistant! The session will now end.";

export const mealPlanToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "generate_meal_plan",
      description: "Generate a personalized plan for the next three meals from the user's glucose status, dietary preference and medical conditions. Ends the session once delivered.",
      parameters: {
        type: "object",
        properties: {
          glucose_status: {
            type: "string",
            enum: ["low", "normal", "high"],
            description: "The status of the user's glucose levels: 'low' (below 70 mg/dL), 'normal' (70-140 mg/dL) or 'high' (above 140 mg/dL)",
          },
        },
        required: ["glucose_status"],
      },
    },
  },
];

const generateMealPlanArgs = z.object({
  glucose_status: z.preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["low", "normal", "high"])
  ),
});

export async function executeMealPlanTool(
  toolName: string,
  args: Record<string, unknown>,
  invocation: ToolInvocation
): Promise<ToolResult | null> {
  switch (toolName) {
    case "generate_meal_plan": {
      const user = loadVerifiedUser(invocation);
      const { glucose_status: glucoseStatus } = parseToolArgs(generateMealPlanArgs, toolName, args);

      const byDiet = mealSuggestions[glucoseStatus];
      const meals = byDiet[user.dietaryPreference] ?? byDiet.vegetarian;
      const conditions = user.medicalConditions.trim() === "" ? "none reported" : user.medicalConditions;

      const lines = [
        `Based on your glucose status (${glucoseStatus}), dietary preference (${user.dietaryPreference}), ` +
          `and medical conditions (${conditions}), here's your personalized meal plan:`,
        "",
        "Meal Plan for the Next 3 Meals:",
        "",
        ...meals.map((meal, index) => `${index + 1}. ${MEAL_LABELS[index]}: ${meal}`),
        "",
        CLOSING_LINE,
      ];

      return {
        displayText: lines.join("\n"),
        outcome: { kind: "meal_plan", glucoseStatus },
        contextMutation: (context) => context.requestExit(),
      };
    }

    default:
      return null;
  }
}

export const mealPlanToolNames = [
  "generate_meal_plan",
];
