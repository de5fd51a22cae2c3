import test from "node:test";
import assert from "node:assert/strict";
import {
  ASSISTANT_REPLIES,
  AssistantBackend,
  AssistantOrchestrator,
  AssistantRun,
  AssistantTurn,
  RunStatus,
} from "../src/services/assistant.js";
import { StatsCollector } from "../src/services/session-stats.js";

class ScriptedBackend implements AssistantBackend {
  readonly provider = "openai" as const;
  readonly cancelled: string[] = [];
  readonly queries: string[] = [];
  retrieveCalls = 0;
  failOnCreateThread = false;
  onRetrieve?: () => void;
  private readonly statuses: RunStatus[];
  private readonly turns: AssistantTurn[];

  constructor(statuses: RunStatus[], turns: AssistantTurn[] = []) {
    this.statuses = statuses;
    this.turns = turns;
  }

  async describe(): Promise<string> {
    return "scripted";
  }

  async createThread(): Promise<string> {
    if (this.failOnCreateThread) {
      throw new Error("network down");
    }
    return "thread_1";
  }

  async addUserMessage(_threadId: string, text: string): Promise<void> {
    this.queries.push(text);
  }

  async createRun(): Promise<AssistantRun> {
    return { id: "run_1", status: this.statuses[0] };
  }

  async retrieveRun(_threadId: string, runId: string): Promise<AssistantRun> {
    this.retrieveCalls += 1;
    this.onRetrieve?.();
    const index = Math.min(this.retrieveCalls, this.statuses.length - 1);
    return { id: runId, status: this.statuses[index], lastError: "server_error: boom" };
  }

  async listMessages(): Promise<AssistantTurn[]> {
    return this.turns;
  }

  async cancelRun(_threadId: string, runId: string): Promise<void> {
    this.cancelled.push(runId);
  }
}

const noSleep = async (): Promise<void> => {};

test("assistant returns the newest assistant message once the run completes", async () => {
  const backend = new ScriptedBackend(
    ["queued", "in_progress", "completed"],
    [
      { role: "assistant", text: "Hello there" },
      { role: "user", text: "hi" },
    ]
  );
  const orchestrator = new AssistantOrchestrator(backend, { sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("hi");
  assert.deepEqual(reply, { text: "Hello there", outcome: "completed" });
  assert.deepEqual(backend.queries, ["hi"]);
  assert.equal(backend.retrieveCalls, 2);
});

test("assistant maps an expired run to the retry text without counting an error", async () => {
  const stats = new StatsCollector();
  const backend = new ScriptedBackend(["queued", "expired"]);
  const orchestrator = new AssistantOrchestrator(backend, { stats, sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("slow question");
  assert.equal(reply.text, ASSISTANT_REPLIES.expired);
  assert.equal(reply.outcome, "expired");
  assert.equal(stats.snapshot().errors, 0);
});

test("assistant maps a failed run to the failure text", async () => {
  const backend = new ScriptedBackend(["in_progress", "failed"]);
  const orchestrator = new AssistantOrchestrator(backend, { sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("question");
  assert.deepEqual(reply, { text: ASSISTANT_REPLIES.failed, outcome: "failed" });
});

test("assistant cancels a run that exceeds the wait limit", async () => {
  let clock = 0;
  const backend = new ScriptedBackend(["in_progress"]);
  const orchestrator = new AssistantOrchestrator(backend, {
    pollIntervalMs: 1000,
    maxWaitMs: 3000,
    now: () => clock,
    sleep: async (ms) => {
      clock += ms;
    },
  });

  const reply = await orchestrator.ask("question");
  assert.deepEqual(reply, { text: ASSISTANT_REPLIES.expired, outcome: "timeout" });
  assert.deepEqual(backend.cancelled, ["run_1"]);
  assert.equal(backend.retrieveCalls, 3);
});

test("assistant stops waiting when the signal is aborted", async () => {
  const controller = new AbortController();
  controller.abort();
  const backend = new ScriptedBackend(["in_progress"]);
  const orchestrator = new AssistantOrchestrator(backend, { sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("question", controller.signal);
  assert.deepEqual(reply, { text: "", outcome: "cancelled" });
  assert.deepEqual(backend.cancelled, ["run_1"]);
});

test("assistant drops an answer that completes after shutdown was requested", async () => {
  const controller = new AbortController();
  const backend = new ScriptedBackend(["in_progress", "completed"], [{ role: "assistant", text: "late answer" }]);
  backend.onRetrieve = () => controller.abort();
  const orchestrator = new AssistantOrchestrator(backend, { sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("question", controller.signal);
  assert.deepEqual(reply, { text: "", outcome: "cancelled" });
  assert.deepEqual(backend.cancelled, []);
});

test("assistant turns thrown errors into the generic reply and counts them", async () => {
  const stats = new StatsCollector();
  const backend = new ScriptedBackend(["completed"]);
  backend.failOnCreateThread = true;
  const orchestrator = new AssistantOrchestrator(backend, { stats, sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("question");
  assert.deepEqual(reply, { text: ASSISTANT_REPLIES.error, outcome: "error" });
  assert.equal(stats.snapshot().errors, 1);
});

test("assistant falls back when the completed run has no answer", async () => {
  const backend = new ScriptedBackend(["completed"], [{ role: "user", text: "question" }]);
  const orchestrator = new AssistantOrchestrator(backend, { sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("question");
  assert.deepEqual(reply, { text: ASSISTANT_REPLIES.empty, outcome: "empty" });
});

test("assistant truncates long answers to the chat limit", async () => {
  const backend = new ScriptedBackend(["completed"], [{ role: "assistant", text: "a".repeat(300) }]);
  const orchestrator = new AssistantOrchestrator(backend, { sleep: noSleep, now: () => 0 });

  const reply = await orchestrator.ask("question");
  assert.equal(reply.text.length, 200);
  assert.equal(reply.text, `${"a".repeat(197)}...`);
});
