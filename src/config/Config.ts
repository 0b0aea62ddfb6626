import fs from "fs";
import path from "path";
import { parse as parseYaml } from "yaml";
import type { Logger } from "pino";

import { ConfigError } from "../smoke/errors";
import { isLogLevel } from "../logging";
import { isRecord } from "../utils/json";

export const DEFAULT_API_BASE = "http://localhost:8000";
export const DEFAULT_MODEL = "gemma-3-1b-it";
export const DEFAULT_LOG_LEVEL = "info";
export const CHAT_COMPLETIONS_PATH = "/v1/chat/completions";

export interface SmokeConfigFile {
  apiBase?: string; // e.g. http://localhost:8000, without the /v1 suffix
  model?: string;
  apiKey?: string;
  logLevel?: string;
}

export interface SmokeConfig {
  apiBase: string;
  url: string;
  model: string;
  apiKey?: string;
  logLevel: string;
  source?: string; // config file the values came from, if any
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

const FILE_KEYS = ["apiBase", "model", "apiKey", "logLevel"] as const;

type Candidate = { path: string; explicit: boolean };

function candidatePaths(options: LoadConfigOptions): Candidate[] {
  const baseDir = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const named = [options.configPath, env.SMOKE_CONFIG?.trim()]
    .filter((p): p is string => !!p)
    .map(p => ({ path: path.resolve(baseDir, p), explicit: true }));
  const discovered = ["smoke.config.yaml", "smoke.config.yml", "smoke.config.json"]
    .map(name => ({ path: path.resolve(baseDir, name), explicit: false }));
  return [...named, ...discovered];
}

export function readSmokeConfigFile(file: string): SmokeConfigFile {
  const raw = fs.readFileSync(file, "utf-8");
  const parsed: unknown = /\.ya?ml$/i.test(file) ? parseYaml(raw) : JSON.parse(raw);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) throw new ConfigError(`${file} must contain a mapping`);
  const out: SmokeConfigFile = {};
  for (const key of FILE_KEYS) {
    const value = parsed[key];
    if (value === undefined || value === null) continue;
    if (typeof value !== "string") throw new ConfigError(`${key} in ${file} must be a string`);
    out[key] = value;
  }
  return out;
}

function fromEnv(env: NodeJS.ProcessEnv): SmokeConfigFile {
  return {
    apiBase: env.CHAT_API_BASE?.trim() || env.VLLM_API_BASE?.trim() || undefined,
    model: env.CHAT_MODEL?.trim() || undefined,
    apiKey: env.CHAT_API_KEY?.trim() || env.VLLM_API_KEY?.trim() || undefined,
    logLevel: env.LOG_LEVEL?.trim() || undefined,
  };
}

export function chatCompletionsUrl(apiBase: string): string {
  let parsed: URL;
  try {
    parsed = new URL(apiBase);
  } catch (err) {
    throw new ConfigError(`apiBase is not a valid URL: ${apiBase}`, { cause: err });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ConfigError(`apiBase must use http or https: ${apiBase}`);
  }
  return apiBase.replace(/\/+$/, "") + CHAT_COMPLETIONS_PATH;
}

/**
 * Resolves the smoke test configuration. Later sources win:
 * defaults, then the first readable config file, then environment variables.
 * A config file that cannot be read is skipped with a warning. A file named
 * through `configPath` or `SMOKE_CONFIG` must exist.
 */
export function loadSmokeConfig(options: LoadConfigOptions = {}): SmokeConfig {
  let file: SmokeConfigFile = {};
  let source: string | undefined;
  for (const { path: p, explicit } of candidatePaths(options)) {
    if (!fs.existsSync(p)) {
      if (explicit) throw new ConfigError(`config file not found: ${p}`);
      continue;
    }
    try {
      file = readSmokeConfigFile(p);
      source = p;
      break;
    } catch (err) {
      options.logger?.warn({ err, path: p }, "skipping unreadable config file");
    }
  }

  const env = fromEnv(options.env ?? process.env);
  const apiBase = env.apiBase ?? file.apiBase ?? DEFAULT_API_BASE;
  const logLevel = env.logLevel ?? file.logLevel ?? DEFAULT_LOG_LEVEL;
  if (!isLogLevel(logLevel)) throw new ConfigError(`unknown log level: ${logLevel}`);

  return {
    apiBase,
    url: chatCompletionsUrl(apiBase),
    model: env.model ?? file.model ?? DEFAULT_MODEL,
    apiKey: env.apiKey ?? file.apiKey,
    logLevel,
    source,
  };
}
