import cron from "node-cron";
import { RuntimeConfig, persistEconomyMode, validateRuntimeConfig } from "../config/runtime.js";
import { VERSION } from "../config/cli.js";
import { AuthError, ConfigError, describeError } from "../errors.js";
import { SessionStats } from "../types/chat.js";
import { AssistantOrchestrator } from "./assistant.js";
import { createAssistantBackend } from "./assistant-backends.js";
import { DedupCache } from "./dedup-cache.js";
import { DispatchLoop, SessionContext } from "./dispatch-loop.js";
import { acquireRuntimeLock } from "./process-lock.js";
import { QuotaTracker, normalizeTimezone } from "./quota-tracker.js";
import { StatsCollector } from "./session-stats.js";
import {
  ChatPoller,
  ChatPublisher,
  YouTubeCredentials,
  createYouTubeLiveChatApi,
  initYouTubeClient,
  resolveLiveChatId,
} from "./youtube.js";

type Env = Record<string, string | undefined>;

export interface BotCredentials {
  youtube: YouTubeCredentials;
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

export function printStartupBanner(config: RuntimeConfig): void {
  console.log(`▶ LiveChat Assistant Bot v${VERSION}`);
  console.log("=====================================");
  console.log(`  Bot: ${config.botName} | Assistant: ${config.assistant.provider}`);
  console.log(`  Quota: ${config.dailyQuota} units/day (reserve ${config.quotaReserve})`);
  if (config.dryRun) {
    console.log("  [TEST MODE] 실제 채팅 전송 안 함");
  }
  if (config.economyMode) {
    console.log("  [ECONOMY] 이코노미 모드로 시작");
  }
  console.log("=====================================\n");
}

// 환경 변수 검증
export function validateEnvironment(config: RuntimeConfig, env: Env = process.env): BotCredentials {
  const required = ["YOUTUBE_CLIENT_ID", "YOUTUBE_CLIENT_SECRET", "YOUTUBE_REFRESH_TOKEN"];
  required.push(config.assistant.provider === "claude" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY");

  const missing = required.filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    console.log("📝 .env 파일을 확인해주세요.");
    throw new AuthError(`필수 환경 변수가 누락되었습니다: ${missing.join(", ")}`);
  }

  console.log("✅ 환경 변수 검증 완료");
  return {
    youtube: {
      clientId: String(env.YOUTUBE_CLIENT_ID).trim(),
      clientSecret: String(env.YOUTUBE_CLIENT_SECRET).trim(),
      refreshToken: String(env.YOUTUBE_REFRESH_TOKEN).trim(),
    },
    openaiApiKey: env.OPENAI_API_KEY?.trim(),
    anthropicApiKey: env.ANTHROPIC_API_KEY?.trim(),
  };
}

// 이코노미 모드 전환/해제를 설정 파일에 기록하는 쿼터 추적기
export function createQuotaTracker(config: RuntimeConfig, now?: () => Date): QuotaTracker {
  return new QuotaTracker({
    dailyBudget: config.dailyQuota,
    reserve: config.quotaReserve,
    economyMode: config.economyMode,
    resetEconomyOnNewDay: config.resetEconomyOnNewDay,
    economyPinned: config.economyForced,
    timezone: config.timezone,
    dataPath: config.quotaUsagePath,
    now,
    onEconomyActivated: () => persistEconomyMode(config.configPath, true),
    onEconomyCleared: () => persistEconomyMode(config.configPath, false),
  });
}

/**
 * 설정 검증 → 인증 → 채팅 ID 조회 → 모니터링 루프.
 * 시작 전 오류는 BotError로 던지고, 루프가 끝나면 세션 통계를 반환한다.
 */
export async function runBot(config: RuntimeConfig, env: Env = process.env): Promise<SessionStats> {
  printStartupBanner(config);
  validateRuntimeConfig(config);
  const credentials = validateEnvironment(config, env);

  const lock = acquireRuntimeLock(config.lockPath, config.streamId);
  if (!lock.acquired) {
    throw new ConfigError(lock.reason || "[LOCK] 실행 lock 획득 실패");
  }

  try {
    const timezone = normalizeTimezone(config.timezone);
    const stats = new StatsCollector();
    const quota = createQuotaTracker(config);

    const backend = createAssistantBackend(config.assistant, {
      assistantId: config.assistantId,
      openaiApiKey: credentials.openaiApiKey,
      anthropicApiKey: credentials.anthropicApiKey,
    });
    try {
      const assistantName = await backend.describe();
      console.log(`[OK] 어시스턴트 확인: ${assistantName}`);
    } catch (error) {
      throw new AuthError(`어시스턴트 인증 실패: ${describeError(error)}`, { cause: error });
    }

    const api = createYouTubeLiveChatApi(initYouTubeClient(credentials.youtube));
    console.log("[OK] YouTube 클라이언트 준비됨");
    const liveChatId = await resolveLiveChatId(api, config.streamId, quota);

    const context: SessionContext = {
      config,
      quota,
      stats,
      dedup: new DedupCache(config.dedupCapacity),
    };
    const loop = new DispatchLoop(
      context,
      liveChatId,
      {
        poller: new ChatPoller(api, quota, stats),
        assistant: new AssistantOrchestrator(backend, {
          stats,
          maxMessageLength: config.maxMessageLength,
          pollIntervalMs: config.assistant.pollIntervalMs,
          maxWaitMs: config.assistant.maxWaitMs,
        }),
        publisher: new ChatPublisher(api, liveChatId, quota, stats, {
          maxMessageLength: config.maxMessageLength,
          dryRun: config.dryRun,
        }),
      },
      { observability: config.observability }
    );

    const controller = new AbortController();
    const stop = () => controller.abort();
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);

    // 자정마다 쿼터 카운터 교체 (호출이 없어도 날짜 경계에서 로그 남김)
    const rolloverTask = cron.schedule("0 0 * * *", () => {
      quota.rollover();
    }, { timezone });

    try {
      return await loop.run(controller.signal);
    } finally {
      rolloverTask.stop();
      process.off("SIGINT", stop);
      process.off("SIGTERM", stop);
    }
  } finally {
    lock.release();
  }
}
