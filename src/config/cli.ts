import { Command, InvalidArgumentError } from "commander";
import { CliOverrides } from "./runtime.js";

export const VERSION = "1.0.0";

interface CliOptions {
  stream?: string;
  interval?: number;
  economy?: boolean;
  config?: string;
  dryRun?: boolean;
}

function parseSeconds(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new InvalidArgumentError("1 이상의 정수(초)여야 합니다.");
  }
  return parsed;
}

export function buildCli(): Command {
  return new Command()
    .name("livechat-assistant-bot")
    .description("YouTube 라이브 채팅 ↔ AI 어시스턴트 봇")
    .version(VERSION)
    .option("-t, --stream <id>", "YouTube 라이브 영상 ID")
    .option("-i, --interval <seconds>", "채팅 확인 간격 (초)", parseSeconds)
    .option("-e, --economy", "쿼터 이코노미 모드로 시작")
    .option("-c, --config <path>", "설정 파일 경로 (기본 config.json)")
    .option("--dry-run", "채팅에 실제로 전송하지 않음");
}

// 사용자 인자만 받는다 (process.argv.slice(2))
export function parseCliArgs(args: string[]): CliOverrides {
  const program = buildCli();
  program.parse(args, { from: "user" });
  const options = program.opts<CliOptions>();
  return {
    streamId: options.stream,
    pollIntervalSeconds: options.interval,
    economyMode: options.economy === true,
    configPath: options.config,
    dryRun: options.dryRun === true,
  };
}
