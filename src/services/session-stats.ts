import fs from "fs";
import path from "path";
import { SessionStats } from "../types/chat.js";
import { ObservabilityRuntimeSettings } from "../types/runtime.js";
import { QuotaState } from "./quota-tracker.js";

export class StatsCollector {
  private readonly now: () => Date;
  private readonly stats: SessionStats = {
    messagesReceived: 0,
    messagesResponded: 0,
    apiCalls: 0,
    errors: 0,
    startedAt: null,
    endedAt: null,
  };

  constructor(options?: { now?: () => Date }) {
    this.now = typeof options?.now === "function" ? options.now : () => new Date();
  }

  start(): void {
    this.stats.startedAt = this.now();
    this.stats.endedAt = null;
  }

  finish(): SessionStats {
    this.stats.endedAt = this.now();
    return this.snapshot();
  }

  recordReceived(): void {
    this.stats.messagesReceived += 1;
  }

  recordResponded(): void {
    this.stats.messagesResponded += 1;
  }

  recordApiCall(): void {
    this.stats.apiCalls += 1;
  }

  recordError(): void {
    this.stats.errors += 1;
  }

  snapshot(): SessionStats {
    return { ...this.stats };
  }
}

export interface SessionSummaryEvent {
  type: "session_summary";
  timestamp: string;
  startedAt: string | null;
  endedAt: string | null;
  durationMinutes: number;
  messagesReceived: number;
  messagesResponded: number;
  apiCalls: number;
  errors: number;
  quota: {
    date: string;
    usage: number;
    dailyBudget: number;
    economyMode: boolean;
  };
}

export function getDurationMinutes(stats: SessionStats): number {
  if (!stats.startedAt || !stats.endedAt) return 0;
  const minutes = (stats.endedAt.getTime() - stats.startedAt.getTime()) / 60_000;
  return Math.max(0, Math.round(minutes * 10) / 10);
}

export function formatSessionSummary(stats: SessionStats, quota: QuotaState): string[] {
  return [
    "===== 세션 통계 =====",
    `Duration: ${getDurationMinutes(stats).toFixed(1)} min`,
    `Messages received: ${stats.messagesReceived}`,
    `Responses sent: ${stats.messagesResponded}`,
    `API calls: ${stats.apiCalls}`,
    `Errors: ${stats.errors}`,
    `Quota used: ${quota.usage}/${quota.dailyBudget} units`,
    "=====================",
  ];
}

export function buildSessionSummaryEvent(
  stats: SessionStats,
  quota: QuotaState,
  timestamp: Date = new Date()
): SessionSummaryEvent {
  return {
    type: "session_summary",
    timestamp: timestamp.toISOString(),
    startedAt: stats.startedAt ? stats.startedAt.toISOString() : null,
    endedAt: stats.endedAt ? stats.endedAt.toISOString() : null,
    durationMinutes: getDurationMinutes(stats),
    messagesReceived: stats.messagesReceived,
    messagesResponded: stats.messagesResponded,
    apiCalls: stats.apiCalls,
    errors: stats.errors,
    quota: {
      date: quota.date,
      usage: quota.usage,
      dailyBudget: quota.dailyBudget,
      economyMode: quota.economyMode,
    },
  };
}

export function emitSessionSummary(
  event: SessionSummaryEvent,
  settings: ObservabilityRuntimeSettings
): void {
  if (!settings.enabled) return;
  if (settings.stdoutJson) {
    console.log(`[METRIC] ${JSON.stringify(event)}`);
  }
  appendObservabilityEvent(settings.eventLogPath, event);
}

function appendObservabilityEvent(eventLogPath: string, event: SessionSummaryEvent): void {
  const normalized = String(eventLogPath || "").trim();
  if (!normalized) return;

  const targetPath = path.isAbsolute(normalized)
    ? normalized
    : path.join(process.cwd(), normalized);

  try {
    fs.mkdirSync(path.dirname(targetPath), { recursive: true });
    fs.appendFileSync(targetPath, `${JSON.stringify(event)}\n`);
  } catch (error) {
    console.log(`[METRIC] 이벤트 파일 저장 실패: ${(error as Error).message}`);
  }
}
