import type { AgentName } from "../../agents";
import type { Decision, DecisionRequest, InferenceEngine, ToolCall } from "../../inference/types";

type Step = Decision | ((request: DecisionRequest, signal?: AbortSignal) => Decision | Promise<Decision>);

let callCounter = 0;

export function call(name: string, args: Record<string, unknown> = {}): ToolCall {
  callCounter++;
  return { id: `call_${callCounter}`, name, arguments: args };
}

export function toolCalls(...calls: ToolCall[]): Decision {
  return { type: "tool_calls", calls };
}

export function reply(message: string): Decision {
  return { type: "final", message };
}

export function handoff(target: string): Decision {
  return { type: "handoff", target };
}

/**
 * Plays back decisions in order and records which agent asked for each one.
 */
export class ScriptedEngine implements InferenceEngine {
  readonly requests: DecisionRequest[] = [];
  private readonly steps: Step[];

  constructor(steps: Step[] = [], private readonly fallback?: Step) {
    this.steps = [...steps];
  }

  enqueue(...steps: Step[]): this {
    this.steps.push(...steps);
    return this;
  }

  get agentsSeen(): AgentName[] {
    return this.requests.map((request) => request.agent.name);
  }

  get remaining(): number {
    return this.steps.length;
  }

  async decide(request: DecisionRequest, signal?: AbortSignal): Promise<Decision> {
    this.requests.push({ agent: request.agent, history: [...request.history] });
    const step = this.steps.shift() ?? this.fallback;
    if (!step) {
      throw new Error(`No scripted decision left for ${request.agent.name}`);
    }
    return typeof step === "function" ? step(request, signal) : step;
  }
}
