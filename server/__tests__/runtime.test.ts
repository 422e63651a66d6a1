/**
 * Agent Runtime Tests
 *
 * Drives whole conversations through a scripted inference engine and an
 * in-memory store.
 *
 * Run with: npx vitest server/__tests__/runtime.test.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { AgentRuntime, MESSAGES, isExitCommand } from "../runtime";
import { InteractionContext } from "../context";
import type { HealthStore } from "../db";
import type { Decision } from "../inference/types";
import { createTestStore } from "./support/fixtures";
import { ScriptedEngine, call, handoff, reply, toolCalls } from "./support/scriptedEngine";

describe("AgentRuntime", () => {
  let store: HealthStore;
  let engine: ScriptedEngine;
  let runtime: AgentRuntime;

  beforeEach(() => {
    store = createTestStore();
    engine = new ScriptedEngine();
    runtime = new AgentRuntime({ engine, store, context: new InteractionContext("runtime-session") });
  });

  afterEach(() => {
    store.close();
  });

  async function verifyUser(userId = 7): Promise<void> {
    engine.enqueue(toolCalls(call("verify_identity", { user_id: userId })), reply("How are you feeling today?"));
    await runtime.runTurn(String(userId));
  }

  async function recordMood(mood = "tired"): Promise<void> {
    engine.enqueue(toolCalls(call("record_mood", { mood })), reply("What is your current glucose reading?"));
    await runtime.runTurn(`I feel ${mood}`);
  }

  describe("Check-in flow", () => {
    it("should walk a user from verification to a meal plan and end the session", async () => {
      engine.enqueue(
        toolCalls(call("verify_identity", { user_id: 7 })),
        reply("Welcome, Daniel Okafor! How are you feeling today?")
      );
      const first = await runtime.runTurn("7");

      expect(first.status).toBe("ok");
      expect(first.message).toBe("Welcome, Daniel Okafor! How are you feeling today?");
      expect(first.activeAgent).toBe("MoodRecorder");
      expect(first.handoffs).toEqual([{ from: "IdentityVerifier", to: "MoodRecorder" }]);
      expect(first.toolCalls).toEqual([
        {
          agent: "IdentityVerifier",
          name: "verify_identity",
          outcome: { kind: "verified", userId: 7, name: "Daniel Okafor" },
        },
      ]);
      expect(runtime.context.getUserId()).toBe(7);

      engine.enqueue(toolCalls(call("record_mood", { mood: "tired" })), reply("What is your glucose reading?"));
      const second = await runtime.runTurn("Honestly I'm pretty tired");

      expect(second.activeAgent).toBe("CGMCollector");
      expect(second.handoffs).toEqual([{ from: "MoodRecorder", to: "CGMCollector" }]);
      expect(store.getMoodLogs(7).map((entry) => entry.mood)).toEqual(["tired"]);

      engine.enqueue(
        toolCalls(call("record_glucose", { glucose_level: 185 })),
        toolCalls(call("get_user_health_profile"), call("get_glucose_history")),
        toolCalls(call("generate_meal_plan", { glucose_status: "high" })),
        reply("Here is your meal plan. Take care!")
      );
      const third = await runtime.runTurn("185");

      expect(third.status).toBe("ok");
      expect(third.message).toBe("Here is your meal plan. Take care!");
      expect(third.activeAgent).toBe("MealPlanner");
      expect(third.exitRequested).toBe(true);
      expect(third.handoffs).toEqual([{ from: "CGMCollector", to: "MealPlanner" }]);
      expect(third.toolCalls.map((record) => [record.agent, record.name])).toEqual([
        ["CGMCollector", "record_glucose"],
        ["MealPlanner", "get_user_health_profile"],
        ["MealPlanner", "get_glucose_history"],
        ["MealPlanner", "generate_meal_plan"],
      ]);
      expect(third.toolCalls[3].outcome).toEqual({ kind: "meal_plan", glucoseStatus: "high" });

      expect(engine.agentsSeen).toEqual([
        "IdentityVerifier",
        "MoodRecorder",
        "MoodRecorder",
        "CGMCollector",
        "CGMCollector",
        "MealPlanner",
        "MealPlanner",
        "MealPlanner",
      ]);
      expect(runtime.isOver()).toBe(true);

      const after = await runtime.runTurn("thanks");
      expect(after).toMatchObject({ status: "ended", message: MESSAGES.sessionEnded, exitRequested: true });
      expect(engine.requests).toHaveLength(8);
    });

    it("should keep an unknown id at verification", async () => {
      engine.enqueue(
        toolCalls(call("verify_identity", { user_id: 9999 })),
        reply("That ID is not in our records. Could you double-check it?")
      );

      const result = await runtime.runTurn("9999");

      expect(result.activeAgent).toBe("IdentityVerifier");
      expect(result.handoffs).toEqual([]);
      expect(result.toolCalls[0].outcome).toEqual({ kind: "not_found", userId: 9999 });
      expect(runtime.context.getUserId()).toBeNull();
    });

    it("should stay with the glucose collector after a normal reading", async () => {
      await verifyUser();
      await recordMood();

      engine.enqueue(toolCalls(call("record_glucose", { glucose_level: 95 })), reply("Great job!"));
      const result = await runtime.runTurn("95");

      expect(result.activeAgent).toBe("CGMCollector");
      expect(result.handoffs).toEqual([]);
      expect(result.exitRequested).toBe(false);
      expect(store.latestGlucoseReading(7)?.value).toBe(95);
    });

    it("should hand a low reading to the meal planner", async () => {
      await verifyUser(12);
      await recordMood("calm");

      engine.enqueue(toolCalls(call("record_glucose", { glucose_level: 62 })), reply("Let's plan your meals."));
      const result = await runtime.runTurn("62");

      expect(result.activeAgent).toBe("MealPlanner");
      expect(result.handoffs).toEqual([{ from: "CGMCollector", to: "MealPlanner" }]);
    });
  });

  describe("Handoff requests from the engine", () => {
    it("should refuse a target the active agent does not declare", async () => {
      engine.enqueue(handoff("MealPlanner"), reply("Please share your user ID."));

      const result = await runtime.runTurn("hi");

      expect(result.activeAgent).toBe("IdentityVerifier");
      expect(result.handoffs).toEqual([]);
      expect(runtime.getHistory()).toEqual([
        { role: "user", content: "hi" },
        { role: "system", content: "Transfer to MealPlanner is not available. Continue with your current task." },
        { role: "assistant", agent: "IdentityVerifier", content: "Please share your user ID." },
      ]);
    });

    it("should refuse a target that is not an agent", async () => {
      engine.enqueue(handoff("Nobody"), reply("Please share your user ID."));

      await runtime.runTurn("hi");

      expect(runtime.getHistory()[1]).toEqual({
        role: "system",
        content: "Transfer to Nobody is not available. Continue with your current task.",
      });
    });

    it("should refuse a declared transfer before its condition is met", async () => {
      engine.enqueue(handoff("MoodRecorder"), reply("Please share your user ID first."));

      const result = await runtime.runTurn("let's skip ahead");

      expect(result.activeAgent).toBe("IdentityVerifier");
      expect(runtime.getHistory()[1]).toEqual({
        role: "system",
        content: "Transfer to MoodRecorder is not available yet. Finish your current task first.",
      });
      expect(engine.agentsSeen).toEqual(["IdentityVerifier", "IdentityVerifier"]);
    });
  });

  describe("Tool calls", () => {
    it("should reject a tool outside the active agent's set", async () => {
      engine.enqueue(toolCalls(call("record_mood", { mood: "happy" })), reply("Please share your user ID."));

      const result = await runtime.runTurn("I'm happy");

      expect(result.toolCalls).toEqual([
        { agent: "IdentityVerifier", name: "record_mood", outcome: { kind: "error", category: "unavailable" } },
      ]);
      expect(runtime.getHistory()[2]).toMatchObject({
        role: "tool",
        name: "record_mood",
        content: "Error: record_mood is not available to IdentityVerifier.",
      });
      expect(store.countMoodLogs()).toBe(0);
    });

    it("should feed tool errors back to the agent instead of failing the turn", async () => {
      await verifyUser();
      engine.enqueue(toolCalls(call("record_mood", { mood: "  " })), reply("Could you describe your mood?"));

      const result = await runtime.runTurn("...");

      expect(result.status).toBe("ok");
      expect(result.activeAgent).toBe("MoodRecorder");
      expect(result.toolCalls[0].outcome).toEqual({ kind: "error", category: "invalid_arguments" });
    });
  });

  describe("Health questions", () => {
    it("should answer inline and keep the active agent", async () => {
      await verifyUser();

      engine.enqueue(
        toolCalls(call("answer_health_question", { question: "What is diabetes?" })),
        toolCalls(call("get_health_information", { query: "diabetes" })),
        reply("Diabetes affects how your body uses glucose."),
        reply("Now, how are you feeling today?")
      );
      const result = await runtime.runTurn("What is diabetes?");

      expect(result.activeAgent).toBe("MoodRecorder");
      expect(result.handoffs).toEqual([]);
      expect(result.message).toBe("Now, how are you feeling today?");
      expect(result.toolCalls).toEqual([
        { agent: "MoodRecorder", name: "answer_health_question", outcome: { kind: "information" } },
      ]);
      expect(engine.agentsSeen.slice(2)).toEqual(["MoodRecorder", "HealthQnA", "HealthQnA", "MoodRecorder"]);

      const nested = engine.requests[4].history;
      expect(nested[0]).toEqual({ role: "user", content: "What is diabetes?" });
      const lookup = nested[2];
      expect(lookup.role === "tool" && lookup.content.startsWith("Diabetes is a chronic condition")).toBe(true);

      const mainHistory = runtime.getHistory();
      expect(mainHistory[mainHistory.length - 2]).toMatchObject({
        role: "tool",
        name: "answer_health_question",
        content: "Diabetes affects how your body uses glucose.",
      });
    });
  });

  describe("Failures and cancellation", () => {
    it("should report an engine failure and accept the next turn", async () => {
      engine.enqueue(() => {
        throw new Error("503 Service Unavailable");
      });

      const failed = await runtime.runTurn("7");
      expect(failed.status).toBe("error");
      expect(failed.message).toBe(MESSAGES.inferenceFailed);

      engine.enqueue(toolCalls(call("verify_identity", { user_id: 7 })), reply("Welcome back!"));
      const retried = await runtime.runTurn("7");
      expect(retried.status).toBe("ok");
      expect(retried.activeAgent).toBe("MoodRecorder");
    });

    it("should cancel while waiting on the engine", async () => {
      const controller = new AbortController();
      engine.enqueue((_request, signal) => {
        controller.abort();
        signal?.throwIfAborted();
        return reply("never delivered");
      });

      const result = await runtime.runTurn("7", controller.signal);

      expect(result.status).toBe("cancelled");
      expect(result.message).toBe(MESSAGES.cancelled);
      expect(result.activeAgent).toBe("IdentityVerifier");
    });

    it("should skip tool calls once cancelled and leave no partial state", async () => {
      const controller = new AbortController();
      engine.enqueue((): Decision => {
        controller.abort();
        return toolCalls(call("verify_identity", { user_id: 7 }));
      });

      const result = await runtime.runTurn("7", controller.signal);

      expect(result.status).toBe("cancelled");
      expect(result.toolCalls).toEqual([]);
      expect(runtime.context.getUserId()).toBeNull();
      const history = runtime.getHistory();
      expect(history[history.length - 1]).toMatchObject({
        role: "tool",
        name: "verify_identity",
        content: "Cancelled before execution.",
      });
    });

    it("should not apply a tool result that returns after cancellation", async () => {
      const controller = new AbortController();
      const findUserById = store.findUserById.bind(store);
      vi.spyOn(store, "findUserById").mockImplementation((id: number) => {
        controller.abort();
        return findUserById(id);
      });
      engine.enqueue(toolCalls(call("verify_identity", { user_id: 7 }), call("verify_identity", { user_id: 12 })));

      const result = await runtime.runTurn("7", controller.signal);

      expect(result.status).toBe("cancelled");
      expect(result.activeAgent).toBe("IdentityVerifier");
      expect(result.handoffs).toEqual([]);
      expect(result.toolCalls).toEqual([]);
      expect(runtime.context.getUserId()).toBeNull();
      expect(store.findUserById).toHaveBeenCalledTimes(1);
      expect(runtime.getHistory().slice(-2)).toMatchObject([
        { role: "tool", name: "verify_identity", content: "Verification successful. Welcome, Daniel Okafor!" },
        { role: "tool", name: "verify_identity", content: "Cancelled before execution." },
      ]);
    });

    it("should fail the turn when the inline health agent fails", async () => {
      await verifyUser();
      engine.enqueue(toolCalls(call("answer_health_question", { question: "Is fruit okay?" })), () => {
        throw new Error("503 Service Unavailable");
      });

      const failed = await runtime.runTurn("Is fruit okay?");

      expect(failed.status).toBe("error");
      expect(failed.message).toBe(MESSAGES.inferenceFailed);
      expect(failed.activeAgent).toBe("MoodRecorder");
      expect(failed.toolCalls).toEqual([]);
      const history = runtime.getHistory();
      expect(history[history.length - 1]).toMatchObject({
        role: "tool",
        name: "answer_health_question",
        content: "Not completed.",
      });

      engine.enqueue(reply("How are you feeling today?"));
      const next = await runtime.runTurn("Never mind");
      expect(next.status).toBe("ok");
      expect(next.activeAgent).toBe("MoodRecorder");
    });

    it("should cancel the turn while the inline health agent is running", async () => {
      await verifyUser();
      const controller = new AbortController();
      engine.enqueue(
        toolCalls(call("answer_health_question", { question: "Is fruit okay?" })),
        (_request, signal) => {
          controller.abort();
          signal?.throwIfAborted();
          return reply("never delivered");
        }
      );

      const result = await runtime.runTurn("Is fruit okay?", controller.signal);

      expect(result.status).toBe("cancelled");
      expect(result.message).toBe(MESSAGES.cancelled);
      expect(result.activeAgent).toBe("MoodRecorder");
      expect(engine.agentsSeen.slice(-1)).toEqual(["HealthQnA"]);
    });

    it("should stop after the step limit", async () => {
      const looping = new ScriptedEngine([], handoff("MealPlanner"));
      const stuck = new AgentRuntime({ engine: looping, store, maxSteps: 3 });

      const result = await stuck.runTurn("hello");

      expect(result.status).toBe("ok");
      expect(result.message).toBe(MESSAGES.stepLimit);
      expect(looping.requests).toHaveLength(3);
      expect(stuck.currentAgent).toBe("IdentityVerifier");
    });
  });

  describe("Turn handling", () => {
    it("should run queued turns one at a time", async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      engine.enqueue(async () => {
        await gate;
        return reply("first");
      }, reply("second"));

      const first = runtime.runTurn("hello");
      const second = runtime.runTurn("again");
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(engine.requests).toHaveLength(1);
      release();

      const results = await Promise.all([first, second]);
      expect(results.map((result) => result.message)).toEqual(["first", "second"]);
      expect(engine.requests[1].history).toEqual([
        { role: "user", content: "hello" },
        { role: "assistant", agent: "IdentityVerifier", content: "first" },
        { role: "user", content: "again" },
      ]);
    });

    it("should answer blank input without calling the engine", async () => {
      const result = await runtime.runTurn("   ");

      expect(result).toMatchObject({ status: "ok", message: "Please provide some input." });
      expect(engine.requests).toHaveLength(0);
      expect(runtime.getHistory()).toEqual([]);
    });

    it("should close the session on an exit command", async () => {
      const result = await runtime.runTurn(" QUIT ");

      expect(result).toMatchObject({ status: "ended", message: "Goodbye!", exitRequested: false });
      expect(runtime.isOver()).toBe(true);
      expect((await runtime.runTurn("7")).message).toBe(MESSAGES.sessionEnded);
      expect(engine.requests).toHaveLength(0);
    });

    it("should recognise exit commands", () => {
      expect(isExitCommand("exit")).toBe(true);
      expect(isExitCommand("Quit ")).toBe(true);
      expect(isExitCommand("quit now")).toBe(false);
    });
  });

  describe("Conversation logging", () => {
    it("should log turns only once the user is verified", async () => {
      const logging = new AgentRuntime({
        engine,
        store,
        context: new InteractionContext("logged-session"),
        persistConversation: true,
      });

      engine.enqueue(toolCalls(call("verify_identity", { user_id: 7 })), reply("How are you feeling today?"));
      await logging.runTurn("7");
      engine.enqueue(toolCalls(call("record_mood", { mood: "happy" })), reply("Glucose reading, please."));
      await logging.runTurn("happy");

      const logs = store.getConversationLogs("logged-session");
      expect(logs.map((entry) => [entry.role, entry.message])).toEqual([
        ["agent", "How are you feeling today?"],
        ["user", "happy"],
        ["agent", "Glucose reading, please."],
      ]);
      expect(logs.every((entry) => entry.userId === 7)).toBe(true);
      expect(logs.map((entry) => entry.metadata)).toEqual([
        '{"agent":"MoodRecorder"}',
        '{"agent":"MoodRecorder"}',
        '{"agent":"CGMCollector"}',
      ]);
    });

    it("should not log when persistence is off", async () => {
      await verifyUser();

      expect(store.getConversationLogs("runtime-session")).toEqual([]);
    });
  });
});
