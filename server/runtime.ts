/**
 * Turn driver for one chat session.
 *
 * Each turn hands the user's text to the active agent through the inference
 * engine, runs the tool calls it asks for, and moves control along the
 * handoff table when a tool outcome allows it. Turns run strictly one after
 * another; the session stops accepting input once the context asks to exit.
 */

import type { ConversationRole } from "@shared/schema";
import { INITIAL_AGENT, findHandoff, getAgent, isAgentName } from "./agents";
import type { AgentDefinition, AgentName } from "./agents";
import { InteractionContext } from "./context";
import type { HealthStore } from "./db";
import type { AgentSpec, HistoryEntry, InferenceEngine, ToolCall } from "./inference/types";
import { log, logError, logWarn } from "./logger";
import { executeTool, getToolDefinition } from "./tools";
import type { ToolOutcome, ToolResult } from "./tools";

export const EXIT_COMMANDS = new Set(["quit", "exit"]);

export const MESSAGES = {
  emptyInput: "Please provide some input.",
  goodbye: "Goodbye!",
  sessionEnded: "This session has ended.",
  cancelled: "Request cancelled.",
  stepLimit: "I encountered an issue processing your request. Please try again.",
  inferenceFailed:
    "Sorry, I couldn't reach the assistant service. Please check your connection and OPENAI_API_KEY, then try again.",
} as const;

export type TurnStatus = "ok" | "ended" | "error" | "cancelled";

export interface HandoffRecord {
  from: AgentName;
  to: AgentName;
}

export interface ToolCallRecord {
  agent: AgentName;
  name: string;
  outcome: ToolOutcome;
}

export interface TurnResult {
  status: TurnStatus;
  message: string;
  activeAgent: AgentName;
  exitRequested: boolean;
  handoffs: HandoffRecord[];
  toolCalls: ToolCallRecord[];
}

export interface RuntimeOptions {
  engine: InferenceEngine;
  store: HealthStore;
  context?: InteractionContext;
  maxSteps?: number;
  persistConversation?: boolean;
}

interface TurnState {
  handoffs: HandoffRecord[];
  toolCalls: ToolCallRecord[];
}

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.has(input.trim().toLowerCase());
}

function describeAgent(agent: AgentDefinition): AgentSpec {
  return {
    name: agent.name,
    instructions: agent.instructions,
    tools: agent.tools.map(getToolDefinition),
    handoffs: agent.handoffs.map(({ target, description }) => ({ target, description })),
  };
}

export class AgentRuntime {
  readonly context: InteractionContext;
  private readonly engine: InferenceEngine;
  private readonly store: HealthStore;
  private readonly maxSteps: number;
  private readonly persistConversation: boolean;

  private activeAgent: AgentName = INITIAL_AGENT;
  private readonly history: HistoryEntry[] = [];
  // Outcomes seen since the active agent took over; handoff guards read these
  private outcomesSinceActivation: ToolOutcome[] = [];
  private closedByUser = false;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: RuntimeOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.context = options.context ?? new InteractionContext();
    this.maxSteps = options.maxSteps ?? 10;
    this.persistConversation = options.persistConversation ?? false;
  }

  get currentAgent(): AgentName {
    return this.activeAgent;
  }

  getHistory(): readonly HistoryEntry[] {
    return this.history;
  }

  isOver(): boolean {
    return this.closedByUser || this.context.exitRequested();
  }

  /**
   * Queues a turn behind any turn still in flight.
   */
  runTurn(input: string, signal?: AbortSignal): Promise<TurnResult> {
    const turn = this.queue.then(() => this.executeTurn(input, signal));
    // Keep the chain alive; the caller still sees the rejection through `turn`
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async executeTurn(input: string, signal?: AbortSignal): Promise<TurnResult> {
    const state: TurnState = { handoffs: [], toolCalls: [] };

    if (this.isOver()) {
      return this.result("ended", MESSAGES.sessionEnded, state);
    }
    if (isExitCommand(input)) {
      this.closedByUser = true;
      log("Session closed by exit command", "runtime", { sessionId: this.context.sessionId });
      return this.result("ended", MESSAGES.goodbye, state);
    }
    if (input.trim() === "") {
      return this.result("ok", MESSAGES.emptyInput, state);
    }

    this.history.push({ role: "user", content: input });
    this.persist("user", input);

    try {
      const message = await this.driveAgents(state, signal);
      this.persist("agent", message);
      if (this.context.exitRequested()) {
        log("Exit requested; session will end after this turn", "runtime", { sessionId: this.context.sessionId });
      }
      return this.result("ok", message, state);
    } catch (error) {
      if (signal?.aborted) {
        log("Turn cancelled", "runtime", { agent: this.activeAgent });
        return this.result("cancelled", MESSAGES.cancelled, state);
      }
      logError("Inference engine failed", "runtime", error, { agent: this.activeAgent });
      return this.result("error", MESSAGES.inferenceFailed, state);
    }
  }

  private async driveAgents(state: TurnState, signal?: AbortSignal): Promise<string> {
    for (let step = 0; step < this.maxSteps; step++) {
      signal?.throwIfAborted();
      const agent = getAgent(this.activeAgent);
      const decision = await this.engine.decide({ agent: describeAgent(agent), history: this.history }, signal);

      switch (decision.type) {
        case "final":
          this.history.push({ role: "assistant", agent: agent.name, content: decision.message });
          return decision.message;

        case "handoff":
          this.requestHandoff(decision.target, state);
          break;

        case "tool_calls":
          this.history.push({
            role: "assistant",
            agent: agent.name,
            content: decision.message ?? null,
            toolCalls: decision.calls,
          });
          await this.runToolCalls(agent, decision.calls, state, signal);
          break;
      }
    }

    logWarn("Step limit reached without a final reply", "runtime", { agent: this.activeAgent, maxSteps: this.maxSteps });
    this.history.push({ role: "assistant", agent: this.activeAgent, content: MESSAGES.stepLimit });
    return MESSAGES.stepLimit;
  }

  private async runToolCalls(
    agent: AgentDefinition,
    calls: ToolCall[],
    state: TurnState,
    signal?: AbortSignal
  ): Promise<void> {
    for (let index = 0; index < calls.length; index++) {
      const call = calls[index];

      if (signal?.aborted) {
        // Every call needs a result entry before the abort surfaces
        this.skipCalls(calls.slice(index));
        signal.throwIfAborted();
      }

      let result: ToolResult;
      try {
        result = await this.invokeTool(agent, call, signal);
      } catch (error) {
        this.skipCalls([call], "Not completed.");
        this.skipCalls(calls.slice(index + 1));
        throw error;
      }
      this.history.push({ role: "tool", callId: call.id, name: call.name, content: result.displayText });

      // A result that lands after cancellation is recorded but not applied
      if (signal?.aborted) {
        this.skipCalls(calls.slice(index + 1));
        signal.throwIfAborted();
      }

      result.contextMutation?.(this.context);
      state.toolCalls.push({ agent: agent.name, name: call.name, outcome: result.outcome });

      if (this.activeAgent === agent.name) {
        this.outcomesSinceActivation.push(result.outcome);
        const edge = agent.handoffs.find((candidate) => candidate.when(result.outcome));
        if (edge) {
          this.transition(edge.target, state);
        }
      }
    }
  }

  private skipCalls(calls: ToolCall[], content = "Cancelled before execution."): void {
    for (const call of calls) {
      this.history.push({ role: "tool", callId: call.id, name: call.name, content });
    }
  }

  private async invokeTool(agent: AgentDefinition, call: ToolCall, signal?: AbortSignal): Promise<ToolResult> {
    if (!agent.tools.includes(call.name)) {
      logWarn("Tool call outside the agent's tool set", "runtime", { agent: agent.name, tool: call.name });
      return {
        displayText: `Error: ${call.name} is not available to ${agent.name}.`,
        outcome: { kind: "error", category: "unavailable" },
      };
    }

    return executeTool(call.name, call.arguments, {
      context: this.context,
      store: this.store,
      answerHealthQuestion:
        agent.name === "HealthQnA" ? undefined : (question) => this.answerHealthQuestion(question, signal),
    });
  }

  /**
   * Runs the HealthQnA agent on one question with its own scratch history.
   * The active agent does not change.
   */
  private async answerHealthQuestion(question: string, signal?: AbortSignal): Promise<string> {
    const agent = getAgent("HealthQnA");
    const spec = describeAgent(agent);
    const history: HistoryEntry[] = [{ role: "user", content: question }];

    for (let step = 0; step < this.maxSteps; step++) {
      signal?.throwIfAborted();
      const decision = await this.engine.decide({ agent: spec, history }, signal);

      if (decision.type === "final") {
        return decision.message;
      }

      if (decision.type === "handoff") {
        logWarn("Handoff anomaly: HealthQnA cannot hand off", "runtime", { target: decision.target });
        history.push({ role: "system", content: `Transfer to ${decision.target} is not available. Answer the question directly.` });
        continue;
      }

      history.push({ role: "assistant", agent: agent.name, content: decision.message ?? null, toolCalls: decision.calls });
      for (const call of decision.calls) {
        const result = await this.invokeTool(agent, call, signal);
        signal?.throwIfAborted();
        result.contextMutation?.(this.context);
        history.push({ role: "tool", callId: call.id, name: call.name, content: result.displayText });
      }
    }

    logWarn("HealthQnA step limit reached", "runtime", { maxSteps: this.maxSteps });
    return MESSAGES.stepLimit;
  }

  private requestHandoff(target: string, state: TurnState): void {
    const from = this.activeAgent;
    const edge = isAgentName(target) ? findHandoff(from, target) : undefined;

    if (!edge) {
      logWarn("Handoff anomaly: target not declared", "runtime", { from, target });
      this.history.push({ role: "system", content: `Transfer to ${target} is not available. Continue with your current task.` });
      return;
    }

    if (!this.outcomesSinceActivation.some(edge.when)) {
      logWarn("Handoff anomaly: transfer conditions not met", "runtime", { from, target });
      this.history.push({ role: "system", content: `Transfer to ${target} is not available yet. Finish your current task first.` });
      return;
    }

    this.transition(edge.target, state);
  }

  private transition(to: AgentName, state: TurnState): void {
    const from = this.activeAgent;
    this.activeAgent = to;
    this.outcomesSinceActivation = [];
    this.history.push({ role: "handoff", from, to });
    state.handoffs.push({ from, to });
    log(`Handoff ${from} -> ${to}`, "runtime", { sessionId: this.context.sessionId });
  }

  private persist(role: ConversationRole, message: string): void {
    const userId = this.context.getUserId();
    if (!this.persistConversation || userId === null) return;

    try {
      this.store.insertConversationTurn({
        userId,
        sessionId: this.context.sessionId,
        role,
        message,
        metadata: JSON.stringify({ agent: this.activeAgent }),
      });
    } catch (error) {
      logError("Failed to persist conversation turn", "runtime", error);
    }
  }

  private result(status: TurnStatus, message: string, state: TurnState): TurnResult {
    return {
      status,
      message,
      activeAgent: this.activeAgent,
      exitRequested: this.context.exitRequested(),
      handoffs: state.handoffs,
      toolCalls: state.toolCalls,
    };
  }
}
