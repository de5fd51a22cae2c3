import { AssistantProvider } from "../types/runtime.js";
import { DEFAULT_MAX_MESSAGE_LENGTH, SleepFn, sleep as defaultSleep, truncateForChat } from "../utils/text.js";
import { StatsCollector } from "./session-stats.js";

export type RunStatus = "queued" | "in_progress" | "completed" | "failed" | "expired";

export interface AssistantRun {
  id: string;
  status: RunStatus;
  lastError?: string | null;
}

export interface AssistantTurn {
  role: "user" | "assistant";
  text: string;
}

/**
 * 어시스턴트 서비스 공통 인터페이스 (thread → message → run → poll)
 * listMessages는 최신 메시지가 먼저 온다.
 */
export interface AssistantBackend {
  readonly provider: AssistantProvider;
  describe(): Promise<string>;
  createThread(): Promise<string>;
  addUserMessage(threadId: string, text: string): Promise<void>;
  createRun(threadId: string): Promise<AssistantRun>;
  retrieveRun(threadId: string, runId: string): Promise<AssistantRun>;
  listMessages(threadId: string): Promise<AssistantTurn[]>;
  cancelRun?(threadId: string, runId: string): Promise<void>;
}

export const ASSISTANT_REPLIES = {
  failed: "Sorry, I had a problem processing your question.",
  expired: "Sorry, the response took too long. Please try again.",
  empty: "I couldn't come up with an answer to your question.",
  error: "Sorry, something went wrong while processing your question.",
} as const;

export type AssistantOutcome =
  | "completed"
  | "empty"
  | "failed"
  | "expired"
  | "timeout"
  | "cancelled"
  | "error";

export interface AssistantReply {
  text: string;
  outcome: AssistantOutcome;
}

export interface AssistantOrchestratorOptions {
  stats?: StatsCollector;
  maxMessageLength?: number;
  pollIntervalMs?: number;
  maxWaitMs?: number;
  sleep?: SleepFn;
  now?: () => number;
}

const DEFAULT_POLL_INTERVAL_MS = 1000;
const DEFAULT_MAX_WAIT_MS = 60_000;

export class AssistantOrchestrator {
  private readonly backend: AssistantBackend;
  private readonly stats?: StatsCollector;
  private readonly maxMessageLength: number;
  private readonly pollIntervalMs: number;
  private readonly maxWaitMs: number;
  private readonly sleep: SleepFn;
  private readonly now: () => number;

  constructor(backend: AssistantBackend, options: AssistantOrchestratorOptions = {}) {
    this.backend = backend;
    this.stats = options.stats;
    this.maxMessageLength = options.maxMessageLength ?? DEFAULT_MAX_MESSAGE_LENGTH;
    this.pollIntervalMs = Math.max(0, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    this.maxWaitMs = Math.max(0, options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async ask(query: string, signal?: AbortSignal): Promise<AssistantReply> {
    try {
      const threadId = await this.backend.createThread();
      await this.backend.addUserMessage(threadId, query);

      let run = await this.backend.createRun(threadId);
      const deadline = this.now() + this.maxWaitMs;

      while (run.status !== "completed") {
        if (run.status === "failed") {
          console.error(`[ASSISTANT] 실행 실패: ${run.lastError || "unknown"}`);
          return this.reply(ASSISTANT_REPLIES.failed, "failed");
        }
        if (run.status === "expired") {
          console.error("[ASSISTANT] 실행 만료");
          return this.reply(ASSISTANT_REPLIES.expired, "expired");
        }
        if (signal?.aborted) {
          await this.cancelRun(threadId, run.id);
          return { text: "", outcome: "cancelled" };
        }
        if (this.now() >= deadline) {
          console.error(`[ASSISTANT] ${this.maxWaitMs}ms 대기 초과, 실행 취소`);
          await this.cancelRun(threadId, run.id);
          return this.reply(ASSISTANT_REPLIES.expired, "timeout");
        }

        await this.sleep(this.pollIntervalMs, signal);
        if (signal?.aborted) continue;
        run = await this.backend.retrieveRun(threadId, run.id);
      }

      // 종료 요청 후 완료된 응답은 전송하지 않는다
      if (signal?.aborted) {
        return { text: "", outcome: "cancelled" };
      }

      const turns = await this.backend.listMessages(threadId);
      const latest = turns.find((turn) => turn.role === "assistant");
      if (!latest || !latest.text) {
        return this.reply(ASSISTANT_REPLIES.empty, "empty");
      }
      return this.reply(latest.text, "completed");
    } catch (error) {
      console.error(`[ASSISTANT] 응답 생성 실패: ${(error as Error).message}`);
      this.stats?.recordError();
      return this.reply(ASSISTANT_REPLIES.error, "error");
    }
  }

  private async cancelRun(threadId: string, runId: string): Promise<void> {
    if (!this.backend.cancelRun) return;
    try {
      await this.backend.cancelRun(threadId, runId);
    } catch (error) {
      console.log(`[ASSISTANT] 실행 취소 실패: ${(error as Error).message}`);
    }
  }

  private reply(text: string, outcome: AssistantOutcome): AssistantReply {
    return { text: truncateForChat(text, this.maxMessageLength), outcome };
  }
}
