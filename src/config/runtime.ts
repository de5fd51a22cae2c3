import fs from "fs";
import path from "path";
import { ConfigError } from "../errors.js";
import {
  AssistantProvider,
  AssistantRuntimeSettings,
  BotConfig,
  ObservabilityRuntimeSettings,
} from "../types/runtime.js";

export interface RuntimeConfig extends BotConfig {
  configPath: string;
  quotaUsagePath: string;
  timezone: string;
  lockPath: string;
  dryRun: boolean;
  // -e/--economy로 강제된 이코노미 모드
  economyForced: boolean;
  assistant: AssistantRuntimeSettings;
  observability: ObservabilityRuntimeSettings;
}

export interface CliOverrides {
  streamId?: string;
  pollIntervalSeconds?: number;
  economyMode?: boolean;
  configPath?: string;
  dryRun?: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_CONFIG_PATH = "config.json";
const DEFAULT_QUOTA_USAGE_PATH = "data/quota-usage.json";
const DEFAULT_LOCK_PATH = "data/livechat-bot.lock";
const DEFAULT_OBSERVABILITY_EVENT_LOG_PATH = "data/session-events.ndjson";

export const DEFAULT_BOT_CONFIG: BotConfig = {
  botName: "Janete",
  streamId: "",
  assistantId: "",
  botChannelName: "",
  pollIntervalSeconds: 10,
  economyMode: false,
  economyIntervalSeconds: 20,
  dailyQuota: 10_000,
  quotaReserve: 1000,
  maxMessageLength: 200,
  dedupCapacity: 500,
  resetEconomyOnNewDay: false,
};

export const DEFAULT_ASSISTANT_SETTINGS: AssistantRuntimeSettings = {
  provider: "openai",
  claudeModel: "",
  instructions: "",
  pollIntervalMs: 1000,
  maxWaitMs: 60_000,
};

export const DEFAULT_OBSERVABILITY_SETTINGS: ObservabilityRuntimeSettings = {
  enabled: true,
  stdoutJson: false,
  eventLogPath: DEFAULT_OBSERVABILITY_EVENT_LOG_PATH,
};

function parseIntInRange(
  raw: string | undefined,
  fallback: number,
  min: number,
  max: number
): number {
  const parsed = Number.parseInt(raw || "", 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(max, Math.max(min, parsed));
}

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false") return false;
  return fallback;
}

function parseNonEmptyString(raw: string | undefined, fallback: string, maxLength: number = 200): string {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim();
  if (!normalized) return fallback;
  return normalized.slice(0, maxLength);
}

function parseAssistantProvider(raw: string | undefined, fallback: AssistantProvider): AssistantProvider {
  if (typeof raw !== "string") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === "openai" || normalized === "claude") {
    return normalized;
  }
  if (normalized === "anthropic") {
    return "claude";
  }
  return fallback;
}

// 환경 변수가 있으면 우선, 없으면 설정 파일 값
function pickRaw(fileValue: unknown, envValue: string | undefined): string | undefined {
  if (typeof envValue === "string" && envValue.trim()) return envValue;
  if (typeof fileValue === "string" || typeof fileValue === "number" || typeof fileValue === "boolean") {
    return String(fileValue);
  }
  return undefined;
}

/**
 * 설정 파일(JSON) 읽기. 없거나 깨진 파일이면 빈 객체 → 기본값 사용
 */
export function readBotConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    console.warn(`[CONFIG] ${configPath} 파일 없음. 기본 설정 사용`);
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      console.error(`[CONFIG] ${configPath} 형식 오류 (객체 아님). 기본 설정 사용`);
      return {};
    }
    console.log(`[CONFIG] ${configPath}에서 설정 로드`);
    return Object.fromEntries(Object.entries(parsed));
  } catch (error) {
    console.error(`[CONFIG] 설정 로드 실패: ${(error as Error).message}`);
    return {};
  }
}

export function resolveBotConfig(file: Record<string, unknown>, env: Env): BotConfig {
  const defaults = DEFAULT_BOT_CONFIG;
  const dailyQuota = parseIntInRange(
    pickRaw(file.dailyQuota, env.DAILY_QUOTA),
    defaults.dailyQuota,
    1,
    100_000_000
  );

  return {
    botName: parseNonEmptyString(pickRaw(file.botName, env.BOT_NAME), defaults.botName, 80),
    streamId: parseNonEmptyString(pickRaw(file.streamId, env.STREAM_ID), defaults.streamId),
    assistantId: parseNonEmptyString(pickRaw(file.assistantId, env.ASSISTANT_ID), defaults.assistantId),
    botChannelName: parseNonEmptyString(
      pickRaw(file.botChannelName, env.BOT_CHANNEL_NAME),
      defaults.botChannelName
    ),
    pollIntervalSeconds: parseIntInRange(
      pickRaw(file.pollIntervalSeconds, env.POLL_INTERVAL_SECONDS),
      defaults.pollIntervalSeconds,
      1,
      3600
    ),
    economyMode: parseBoolean(pickRaw(file.economyMode, env.ECONOMY_MODE), defaults.economyMode),
    economyIntervalSeconds: parseIntInRange(
      pickRaw(file.economyIntervalSeconds, env.ECONOMY_INTERVAL_SECONDS),
      defaults.economyIntervalSeconds,
      1,
      3600
    ),
    dailyQuota,
    quotaReserve: parseIntInRange(
      pickRaw(file.quotaReserve, env.QUOTA_RESERVE),
      Math.min(defaults.quotaReserve, dailyQuota),
      0,
      dailyQuota
    ),
    maxMessageLength: parseIntInRange(
      pickRaw(file.maxMessageLength, env.MAX_MESSAGE_LENGTH),
      defaults.maxMessageLength,
      10,
      200
    ),
    dedupCapacity: parseIntInRange(
      pickRaw(file.dedupCapacity, env.DEDUP_CAPACITY),
      defaults.dedupCapacity,
      10,
      100_000
    ),
    resetEconomyOnNewDay: parseBoolean(
      pickRaw(file.resetEconomyOnNewDay, env.RESET_ECONOMY_ON_NEW_DAY),
      defaults.resetEconomyOnNewDay
    ),
  };
}

export function loadRuntimeConfig(overrides: CliOverrides = {}, env: Env = process.env): RuntimeConfig {
  const configPath = path.resolve(
    overrides.configPath || parseNonEmptyString(env.BOT_CONFIG_PATH, DEFAULT_CONFIG_PATH, 500)
  );
  const bot = resolveBotConfig(readBotConfigFile(configPath), env);

  if (overrides.streamId) {
    bot.streamId = overrides.streamId.trim();
    console.log(`[CONFIG] 인자로 스트림 ID 지정: ${bot.streamId}`);
  }
  if (typeof overrides.pollIntervalSeconds === "number" && Number.isFinite(overrides.pollIntervalSeconds)) {
    bot.pollIntervalSeconds = Math.min(3600, Math.max(1, Math.floor(overrides.pollIntervalSeconds)));
    console.log(`[CONFIG] 인자로 확인 간격 지정: ${bot.pollIntervalSeconds}s`);
  }
  if (overrides.economyMode) {
    bot.economyMode = true;
    console.log("[CONFIG] 인자로 이코노미 모드 활성화");
  }

  return {
    ...bot,
    configPath,
    quotaUsagePath: path.resolve(parseNonEmptyString(env.QUOTA_USAGE_PATH, DEFAULT_QUOTA_USAGE_PATH, 500)),
    timezone: parseNonEmptyString(env.QUOTA_TIMEZONE, ""),
    lockPath: path.resolve(parseNonEmptyString(env.RUNTIME_LOCK_PATH, DEFAULT_LOCK_PATH, 500)),
    dryRun: overrides.dryRun === true || parseBoolean(env.TEST_MODE, false),
    economyForced: overrides.economyMode === true,
    assistant: {
      provider: parseAssistantProvider(env.ASSISTANT_PROVIDER, DEFAULT_ASSISTANT_SETTINGS.provider),
      claudeModel: parseNonEmptyString(env.ANTHROPIC_MODEL, DEFAULT_ASSISTANT_SETTINGS.claudeModel),
      instructions: parseNonEmptyString(
        env.ASSISTANT_INSTRUCTIONS,
        DEFAULT_ASSISTANT_SETTINGS.instructions,
        4000
      ),
      pollIntervalMs: parseIntInRange(
        env.ASSISTANT_POLL_INTERVAL_MS,
        DEFAULT_ASSISTANT_SETTINGS.pollIntervalMs,
        100,
        30_000
      ),
      maxWaitMs: parseIntInRange(
        env.ASSISTANT_MAX_WAIT_MS,
        DEFAULT_ASSISTANT_SETTINGS.maxWaitMs,
        1000,
        10 * 60_000
      ),
    },
    observability: {
      enabled: parseBoolean(env.OBSERVABILITY_ENABLED, DEFAULT_OBSERVABILITY_SETTINGS.enabled),
      stdoutJson: parseBoolean(env.OBSERVABILITY_STDOUT_JSON, DEFAULT_OBSERVABILITY_SETTINGS.stdoutJson),
      eventLogPath: parseNonEmptyString(
        env.OBSERVABILITY_EVENT_LOG_PATH,
        DEFAULT_OBSERVABILITY_SETTINGS.eventLogPath,
        500
      ),
    },
  };
}

/**
 * 루프 시작 전 필수 설정 확인
 */
export function validateRuntimeConfig(config: RuntimeConfig): void {
  if (!config.streamId) {
    throw new ConfigError("스트림 ID가 설정되지 않음 (config.json streamId, STREAM_ID 또는 -t)");
  }
  if (config.assistant.provider === "openai" && !config.assistantId) {
    throw new ConfigError("어시스턴트 ID가 설정되지 않음 (config.json assistantId 또는 ASSISTANT_ID)");
  }
}

/**
 * 이코노미 모드 전환을 설정 파일에 기록. 파일의 다른 키는 그대로 둔다.
 */
export function persistEconomyMode(configPath: string, enabled: boolean): void {
  const current = fs.existsSync(configPath) ? readBotConfigFile(configPath) : {};
  const next = { ...current, economyMode: enabled };
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(next, null, 4));
  console.log(`[CONFIG] ${configPath}에 설정 저장`);
}
