#!/usr/bin/env node
import "dotenv/config";
import { parseCliArgs } from "./config/cli.js";
import { loadRuntimeConfig } from "./config/runtime.js";
import { BotError, describeError } from "./errors.js";
import { runBot } from "./services/runtime.js";

async function main(): Promise<void> {
  const overrides = parseCliArgs(process.argv.slice(2));
  const config = loadRuntimeConfig(overrides);
  await runBot(config);
  console.log("▶ 봇 종료.");
}

main().catch((error: unknown) => {
  if (error instanceof BotError) {
    console.error(`❌ [${error.kind}] ${error.message}`);
  } else {
    console.error(`❌ 예기치 않은 오류: ${describeError(error)}`);
  }
  process.exitCode = 1;
});
