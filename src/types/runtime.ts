export type AssistantProvider = "openai" | "claude";
export type BotMode = "normal" | "economy";

/**
 * Settings persisted in the bot's JSON config file.
 * `economyMode` is written back when the quota reserve is reached.
 */
export interface BotConfig {
  botName: string;
  streamId: string;
  assistantId: string;
  botChannelName: string;
  pollIntervalSeconds: number;
  economyMode: boolean;
  economyIntervalSeconds: number;
  dailyQuota: number;
  quotaReserve: number;
  maxMessageLength: number;
  dedupCapacity: number;
  resetEconomyOnNewDay: boolean;
}

export interface AssistantRuntimeSettings {
  provider: AssistantProvider;
  claudeModel: string;
  instructions: string;
  pollIntervalMs: number;
  maxWaitMs: number;
}

export interface ObservabilityRuntimeSettings {
  enabled: boolean;
  stdoutJson: boolean;
  eventLogPath: string;
}
