import { z } from "zod";
import { NoDataError } from "../errors";
import { parseToolArgs } from "./args";
import { requireUserId } from "./profile";
import type { GlucoseBand, ToolDefinition, ToolInvocation, ToolResult } from "./types";

// Normal band in mg/dL, inclusive at both ends
export const NORMAL_MIN_GLUCOSE = 70;
export const NORMAL_MAX_GLUCOSE = 140;

const DAY_MS = 24 * 60 * 60 * 1000;

export function classifyGlucose(value: number): GlucoseBand {
  if (value < NORMAL_MIN_GLUCOSE) return "low";
  if (value > NORMAL_MAX_GLUCOSE) return "high";
  return "normal";
}

const BAND_FEEDBACK: Record<GlucoseBand, string> = {
  normal: "Great job! Your glucose level is within the normal range.",
  low: "Your glucose level is below the normal range. Consider having a snack or meal soon.",
  high: "Your glucose level is above the normal range. Please follow your healthcare provider's recommendations for high glucose levels.",
};

export const glucoseToolDefinitions: ToolDefinition[] = [
  {
    type: "function",
    function: {
      name: "record_glucose",
      description: "Record the user's current glucose (blood sugar) reading and report whether it is low, normal or high.",
      parameters: {
        type: "object",
        properties: {
          glucose_level: {
            type: "number",
            description: "The glucose reading in mg/dL as a plain number (e.g., 95.5, 120, 83). No units or surrounding text.",
          },
        },
        required: ["glucose_level"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "get_glucose_history",
      description: "Get the user's most recent glucose reading with their 3-day and 7-day average readings.",
      parameters: {
        type: "object",
        properties: {},
        required: [],
      },
    },
  },
];

const recordGlucoseArgs = z.object({
  glucose_level: z.number().finite(),
});

function formatAverage(average: number | null): string {
  return average === null ? "no readings in this window" : `${average.toFixed(1)} mg/dL`;
}

export async function executeGlucoseTool(
  toolName: string,
  args: Record<string, unknown>,
  { context, store }: ToolInvocation
): Promise<ToolResult | null> {
  switch (toolName) {
    case "record_glucose": {
      const userId = requireUserId(context);
      const { glucose_level: value } = parseToolArgs(recordGlucoseArgs, toolName, args);

      store.insertGlucoseReading(userId, value);
      const band = classifyGlucose(value);

      return {
        displayText: `Your glucose reading of ${value} mg/dL has been recorded. ${BAND_FEEDBACK[band]}`,
        outcome: { kind: "glucose_recorded", value, band },
      };
    }

    case "get_glucose_history": {
      const userId = requireUserId(context);
      const latest = store.latestGlucoseReading(userId);
      if (!latest) {
        throw new NoDataError("No glucose readings found for this user.");
      }

      const now = Date.now();
      const average3Days = store.averageGlucose(userId, new Date(now - 3 * DAY_MS));
      const average7Days = store.averageGlucose(userId, new Date(now - 7 * DAY_MS));

      return {
        displayText: [
          "Glucose Reading History:",
          `- Last Reading: ${latest.value} mg/dL (${latest.timestamp})`,
          `- Average (Last 3 Days): ${formatAverage(average3Days)}`,
          `- Average (Last 7 Days): ${formatAverage(average7Days)}`,
          `- Normal Range: ${NORMAL_MIN_GLUCOSE}-${NORMAL_MAX_GLUCOSE} mg/dL`,
        ].join("\n"),
        outcome: { kind: "glucose_history", latest: latest.value, average3Days, average7Days },
      };
    }

    default:
      return null;
  }
}

export const glucoseToolNames = [
  "record_glucose",
  "get_glucose_history",
];
