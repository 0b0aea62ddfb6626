import type { DestinationStream } from "pino";

import { loadSmokeConfig, type SmokeConfig } from "./config/Config";
import { ChatCompletionClient, type FetchFn } from "./client/ChatCompletionClient";
import { createLogger, isLogLevel } from "./logging";
import { toError } from "./smoke/errors";
import { ToolCallSmokeTest } from "./smoke/ToolCallSmokeTest";

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  configPath?: string;
  fetch?: FetchFn;
  print?: (line: string) => void;
  logDestination?: DestinationStream;
}

/** Runs the smoke test once and returns the process exit code. */
export async function main(options: MainOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const print = options.print ?? ((line: string) => console.log(line));
  const bootLevel = env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info";
  const logger = createLogger(bootLevel, options.logDestination);

  let config: SmokeConfig;
  try {
    config = loadSmokeConfig({ env, cwd: options.cwd, configPath: options.configPath, logger });
  } catch (err) {
    const error = toError(err);
    logger.error({ err: error }, "invalid configuration");
    print(`\n💥 ERROR: ${error.message}`);
    return 1;
  }
  logger.level = config.logLevel;
  logger.debug({ url: config.url, model: config.model, source: config.source ?? "defaults" }, "configuration resolved");

  const client = new ChatCompletionClient({ url: config.url, apiKey: config.apiKey, fetch: options.fetch });
  const smoke = new ToolCallSmokeTest({ client, model: config.model, logger, print });
  const result = await smoke.run();
  return result.passed ? 0 : 1;
}

export { ChatCompletionClient } from "./client/ChatCompletionClient";
export type { ChatCompletionTransport, FetchFn } from "./client/ChatCompletionClient";
export { loadSmokeConfig } from "./config/Config";
export type { SmokeConfig } from "./config/Config";
export { ToolCallSmokeTest } from "./smoke/ToolCallSmokeTest";
export type { SmokeTestResult } from "./smoke/ToolCallSmokeTest";
export { buildToolCallRequest, WEATHER_TOOL } from "./smoke/ToolCallRequest";
export * from "./smoke/errors";
