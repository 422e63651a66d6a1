import type { z } from "zod";
import { ToolArgumentError } from "../errors";

export function parseToolArgs<T extends z.ZodTypeAny>(
  schema: T,
  toolName: string,
  args: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    throw new ToolArgumentError(toolName, result.error.issues);
  }
  return result.data;
}
