/**
 * Centralized Environment Configuration
 *
 * Fail-fast Zod validation for the assistant's environment variables.
 * Import this module early to catch bad config before the chat loop starts.
 */

import { z } from "zod";

const AppEnvSchema = z.enum(["development", "staging", "production"]);
const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const EnvSchema = z.object({
  APP_NAME: z.string().min(1).default("Health Assistant"),
  APP_ENV: AppEnvSchema.default("development"),
  NODE_ENV: z.string().default("development"),

  LOG_LEVEL: LogLevelSchema.default("info"),

  DATABASE_PATH: z.string().min(1).default("db/health_assistant.db"),

  // Only required once the OpenAI engine is constructed
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_MODEL: z.string().min(1).default("gpt-4.1-mini"),

  MAX_AGENT_STEPS: z.coerce.number().int().positive().default(10),
  PERSIST_CONVERSATION: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

export type Env = z.infer<typeof EnvSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LOG_LEVELS = LogLevelSchema.options;

let _env: Env | null = null;

export function parseEnv(source: Record<string, string | undefined>) {
  return EnvSchema.safeParse(source);
}

function validateEnv(): Env {
  const result = parseEnv(process.env);

  if (!result.success) {
    const invalidVars = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );

    console.error(
      `\n${"=".repeat(60)}\nENVIRONMENT CONFIGURATION ERROR\n${"=".repeat(60)}\n\nInvalid environment variables:\n  - ${invalidVars.join("\n  - ")}\n${"=".repeat(60)}\n`
    );
    process.exit(1);
  }

  return result.data;
}

export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

export function resetEnvCache(): void {
  _env = null;
}

export function requireEnv(key: "OPENAI_API_KEY"): string {
  const value = getEnv()[key];
  if (!value) {
    throw new Error(`${key} is not configured. Add it to your environment before starting a chat.`);
  }
  return value;
}
