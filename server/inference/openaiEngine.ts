import OpenAI from "openai";
import { z } from "zod";
import { createInferenceBreaker, wrapInference, type CircuitBreaker } from "../../lib/reliability";
import { getEnv, requireEnv } from "../src/config/env";
import { logDebug, logWarn } from "../logger";
import type { Decision, DecisionRequest, HistoryEntry, InferenceEngine, ToolCall } from "./types";

export const HANDOFF_TOOL_PREFIX = "transfer_to_";

const EMPTY_RESPONSE = "I apologize, but I couldn't generate a response. Please try again.";

const toolArgumentsSchema = z.record(z.string(), z.unknown());

export function handoffToolName(target: string): string {
  return `${HANDOFF_TOOL_PREFIX}${target}`;
}

function parseToolArguments(raw: string): Record<string, unknown> {
  try {
    const parsed = toolArgumentsSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
  } catch {
    // fall through to empty arguments; the tool's own validation reports it
  }
  logWarn("Unparseable tool arguments from model", "inference", { raw });
  return {};
}

function toChatMessage(entry: HistoryEntry): OpenAI.Chat.ChatCompletionMessageParam {
  switch (entry.role) {
    case "user":
      return { role: "user", content: entry.content };
    case "assistant":
      if (entry.toolCalls && entry.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: entry.content,
          tool_calls: entry.toolCalls.map((call) => ({
            id: call.id,
            type: "function" as const,
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      }
      return { role: "assistant", content: entry.content ?? "" };
    case "tool":
      return { role: "tool", tool_call_id: entry.callId, content: entry.content };
    case "handoff":
      return { role: "system", content: `Control was transferred from ${entry.from} to ${entry.to}.` };
    case "system":
      return { role: "system", content: entry.content };
  }
}

export function buildChatRequest(
  model: string,
  request: DecisionRequest
): OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming {
  const { agent, history } = request;

  const handoffTools: OpenAI.Chat.ChatCompletionTool[] = agent.handoffs.map((handoff) => ({
    type: "function" as const,
    function: {
      name: handoffToolName(handoff.target),
      description: handoff.description,
      parameters: { type: "object", properties: {}, required: [] },
    },
  }));
  const tools = [...agent.tools, ...handoffTools];

  return {
    model,
    messages: [
      { role: "system", content: agent.instructions },
      ...history.map(toChatMessage),
    ],
    ...(tools.length > 0 ? { tools, tool_choice: "auto" as const } : {}),
  };
}

export function parseDecision(message: OpenAI.Chat.ChatCompletionMessage | undefined): Decision {
  if (!message) {
    return { type: "final", message: EMPTY_RESPONSE };
  }

  const calls: ToolCall[] = [];
  let handoffTarget: string | undefined;

  for (const toolCall of message.tool_calls ?? []) {
    if (toolCall.type !== "function") continue;
    const name = toolCall.function.name;
    if (name.startsWith(HANDOFF_TOOL_PREFIX)) {
      handoffTarget ??= name.slice(HANDOFF_TOOL_PREFIX.length);
    } else {
      calls.push({ id: toolCall.id, name, arguments: parseToolArguments(toolCall.function.arguments) });
    }
  }

  const content = message.content ?? undefined;

  // Real work first; a handoff requested alongside it is asked for again later
  if (calls.length > 0) {
    return { type: "tool_calls", calls, message: content };
  }
  if (handoffTarget !== undefined) {
    return { type: "handoff", target: handoffTarget, message: content };
  }
  return { type: "final", message: content || EMPTY_RESPONSE };
}

/**
 * Chat-completions backed engine. One request per decision, with retries and
 * a circuit breaker around it. Each engine owns its breaker.
 */
export class OpenAIInferenceEngine implements InferenceEngine {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    readonly breaker: CircuitBreaker = createInferenceBreaker()
  ) {}

  static fromEnv(): OpenAIInferenceEngine {
    const client = new OpenAI({ apiKey: requireEnv("OPENAI_API_KEY") });
    return new OpenAIInferenceEngine(client, getEnv().OPENAI_MODEL);
  }

  async decide(request: DecisionRequest, signal?: AbortSignal): Promise<Decision> {
    const params = buildChatRequest(this.model, request);
    const response = await wrapInference(
      () => this.client.chat.completions.create(params, { signal }),
      this.breaker,
      signal
    );

    const choice = response.choices[0];
    logDebug("Model decision", "inference", {
      agent: request.agent.name,
      finish_reason: choice?.finish_reason,
      tool_calls: choice?.message.tool_calls?.length ?? 0,
      usage: response.usage,
    });

    return parseDecision(choice?.message);
  }
}
