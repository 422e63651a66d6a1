import readline from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";
import { getEnv } from "./src/config/env";
import { closeStore, getStore } from "./db";
import { OpenAIInferenceEngine } from "./inference/openaiEngine";
import { AgentRuntime, isExitCommand } from "./runtime";
import { logError } from "./logger";

const OPENING_PROMPT = "Hello! Please provide your user ID to start verification.";

async function main(): Promise<void> {
  const env = getEnv();
  const runtime = new AgentRuntime({
    engine: OpenAIInferenceEngine.fromEnv(),
    store: getStore(),
    maxSteps: env.MAX_AGENT_STEPS,
    persistConversation: env.PERSIST_CONVERSATION,
  });

  const rl = readline.createInterface({ input, output });
  let inFlight: AbortController | null = null;
  let closed = false;

  rl.on("SIGINT", () => {
    if (inFlight) {
      inFlight.abort();
      return;
    }
    closed = true;
    rl.close();
  });
  rl.on("close", () => {
    closed = true;
  });

  console.log(`\nWelcome to the ${env.APP_NAME}!\n`);
  console.log(`Agent: ${OPENING_PROMPT}`);

  while (!closed && !runtime.isOver()) {
    let line: string;
    try {
      line = await rl.question("\nYou: ");
    } catch {
      // question() rejects once the interface closes
      break;
    }

    inFlight = new AbortController();
    const turn = await runtime.runTurn(line, inFlight.signal);
    inFlight = null;

    const speaker = turn.status === "ok" ? `Agent (${turn.activeAgent})` : "Agent";
    console.log(`${speaker}: ${turn.message}`);

    if (isExitCommand(line) || turn.exitRequested) break;
  }

  console.log("\nSession ended.");
  rl.close();
  closeStore();
}

main().catch((error) => {
  logError("Chat loop crashed", "cli", error);
  closeStore();
  process.exit(1);
});
