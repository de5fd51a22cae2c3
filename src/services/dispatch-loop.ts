import { describeError } from "../errors.js";
import { ChatMessage, ChatPage, SessionStats } from "../types/chat.js";
import { BotConfig, BotMode, ObservabilityRuntimeSettings } from "../types/runtime.js";
import { SleepFn, sleep as defaultSleep } from "../utils/text.js";
import { AssistantReply } from "./assistant.js";
import { DedupCache } from "./dedup-cache.js";
import { classifyMessage, formatReply } from "./mention-detector.js";
import { QuotaTracker } from "./quota-tracker.js";
import {
  StatsCollector,
  buildSessionSummaryEvent,
  emitSessionSummary,
  formatSessionSummary,
} from "./session-stats.js";

export type LoopState = "idle" | "polling" | "stopped";

const DEFAULT_TICK_MS = 500;

/**
 * 한 세션 동안 루프가 단독으로 소유하는 상태 묶음
 */
export interface SessionContext {
  config: Pick<BotConfig, "botName" | "botChannelName" | "pollIntervalSeconds" | "economyIntervalSeconds">;
  quota: QuotaTracker;
  stats: StatsCollector;
  dedup: DedupCache;
}

export interface DispatchCollaborators {
  poller: { poll(liveChatId: string): Promise<ChatPage> };
  assistant: { ask(query: string, signal?: AbortSignal): Promise<AssistantReply> };
  publisher: { publish(text: string): Promise<string | null> };
}

export interface DispatchLoopOptions {
  observability?: ObservabilityRuntimeSettings;
  sleep?: SleepFn;
  now?: () => number;
  tickMs?: number;
}

export interface CycleResult {
  fetched: number;
  received: number;
  responded: number;
  chatEnded: boolean;
}

export class DispatchLoop {
  private readonly context: SessionContext;
  private readonly liveChatId: string;
  private readonly collaborators: DispatchCollaborators;
  private readonly observability?: ObservabilityRuntimeSettings;
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly tickMs: number;
  private loopState: LoopState = "idle";
  private mode: BotMode;
  private lastPollAt: number;
  private intervalMs: number;
  private lastBotMessage: string | null = null;

  constructor(
    context: SessionContext,
    liveChatId: string,
    collaborators: DispatchCollaborators,
    options: DispatchLoopOptions = {}
  ) {
    this.context = context;
    this.liveChatId = liveChatId;
    this.collaborators = collaborators;
    this.observability = options.observability;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.tickMs = Math.max(1, options.tickMs ?? DEFAULT_TICK_MS);
    this.mode = context.quota.currentMode();
    this.intervalMs = this.intervalFor(this.mode);
    this.lastPollAt = this.now();
  }

  get state(): LoopState {
    return this.loopState;
  }

  get currentIntervalMs(): number {
    return this.intervalMs;
  }

  get lastBotMessageId(): string | null {
    return this.lastBotMessage;
  }

  /**
   * signal이 abort될 때까지 채팅 감시. 종료 시 세션 통계를 출력하고 반환한다.
   */
  async run(signal: AbortSignal): Promise<SessionStats> {
    if (this.loopState !== "idle") {
      throw new Error(`dispatch loop cannot start from state "${this.loopState}"`);
    }

    const { stats, config } = this.context;
    this.loopState = "polling";
    stats.start();

    console.log(
      this.mode === "economy"
        ? `[LOOP] 이코노미 모드! 간격: ${this.intervalMs / 1000}s`
        : `[LOOP] 확인 간격: ${this.intervalMs / 1000}s`
    );
    console.log("💬 채팅 모니터링 시작");
    console.log(`📢 '${config.botName}' 이름이 언급되거나 '!'로 시작하는 메시지에 응답`);
    console.log("📢 Ctrl+C로 종료");

    try {
      while (!signal.aborted) {
        const ready = await this.waitForNextPoll(signal);
        if (!ready) break;

        const cycle = await this.runCycle(signal);
        if (cycle.chatEnded) {
          console.log("[LOOP] 라이브 채팅이 종료되어 모니터링을 멈춤");
          break;
        }
      }
      if (signal.aborted) {
        console.log("\n🛑 사용자 요청으로 모니터링 중단");
      }
    } catch (error) {
      console.error(`[LOOP] 채팅 모니터링 오류: ${describeError(error)}`);
      stats.recordError();
    } finally {
      this.loopState = "stopped";
      this.report(stats.finish());
    }

    return stats.snapshot();
  }

  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    this.lastPollAt = this.now();
    const page = await this.collaborators.poller.poll(this.liveChatId);
    const result: CycleResult = {
      fetched: page.messages.length,
      received: 0,
      responded: 0,
      chatEnded: page.chatEnded,
    };

    for (const message of page.messages) {
      if (signal?.aborted) break;
      try {
        await this.handleMessage(message, result, signal);
      } catch (error) {
        console.error(`[LOOP] 메시지 처리 실패 (${message.id}): ${describeError(error)}`);
        this.context.stats.recordError();
      }
    }

    return result;
  }

  private async handleMessage(message: ChatMessage, result: CycleResult, signal?: AbortSignal): Promise<void> {
    const { dedup, stats, config } = this.context;
    if (dedup.seen(message.id)) return;

    dedup.markSeen(message.id);
    stats.recordReceived();
    result.received += 1;

    const classification = classifyMessage(message, config);
    if (classification.kind === "self-echo") {
      this.lastBotMessage = message.id;
      return;
    }
    if (classification.kind === "reply-to-bot") return;

    console.log(`💬 ${message.authorName}: ${message.text}`);
    if (classification.kind !== "trigger") return;

    console.log(`🤔 어시스턴트에 질문 전달: ${classification.query}`);
    const reply = await this.collaborators.assistant.ask(classification.query, signal);
    if (reply.outcome === "cancelled") return;

    const formatted = formatReply(message.authorName, reply.text);
    const publishedId = await this.collaborators.publisher.publish(formatted);
    if (!publishedId) return;

    this.lastBotMessage = publishedId;
    stats.recordResponded();
    result.responded += 1;
    console.log(`🤖 응답 전송: ${formatted}`);
  }

  private async waitForNextPoll(signal: AbortSignal): Promise<boolean> {
    this.refreshInterval();
    while (!signal.aborted) {
      const elapsed = this.now() - this.lastPollAt;
      if (elapsed >= this.intervalMs) return true;
      await this.sleep(Math.min(this.tickMs, this.intervalMs - elapsed), signal);
    }
    return false;
  }

  private refreshInterval(): void {
    const mode = this.context.quota.currentMode();
    if (mode !== this.mode) {
      this.mode = mode;
      console.log(`[LOOP] 모드 변경: ${mode}, 간격 ${this.intervalFor(mode) / 1000}s`);
    }
    this.intervalMs = this.intervalFor(mode);
  }

  private intervalFor(mode: BotMode): number {
    const { pollIntervalSeconds, economyIntervalSeconds } = this.context.config;
    const seconds = mode === "economy" ? economyIntervalSeconds : pollIntervalSeconds;
    return Math.max(1, seconds) * 1000;
  }

  private report(finalStats: SessionStats): void {
    const quota = this.context.quota.snapshot();
    for (const line of formatSessionSummary(finalStats, quota)) {
      console.log(line);
    }
    if (this.observability) {
      emitSessionSummary(buildSessionSummaryEvent(finalStats, quota), this.observability);
    }
  }
}
