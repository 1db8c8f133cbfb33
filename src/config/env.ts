import { readFileSync } from "node:fs";
import path from "node:path";
import { parse as parseDotenv } from "dotenv";
import { MissingCredentialError } from "../core/errors.js";
import type { ProviderType, ResolvedModelCandidate } from "../types/model.js";

/**
 * 파일 목적:
 * - env 파일과 프로세스 환경에서 앱 설정을 한 번 읽어 명시적인 AppConfig 로 만든다.
 * - 선택된 provider 의 API 키가 없으면 창을 띄우기 전에 MissingCredentialError 를 던진다.
 *
 * 역의존성:
 * - src/cli/chat.ts, src/cli/chat-tui.ts
 */

const DEFAULT_GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

type Env = NodeJS.ProcessEnv;

function getNumberEnv(env: Env, name: string, fallback: number, min = 0): number {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= min ? parsed : fallback;
}

function getOptionalPositiveIntEnv(env: Env, name: string): number | undefined {
  const value = Math.floor(getNumberEnv(env, name, 0));
  return value > 0 ? value : undefined;
}

function getBooleanEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw || !raw.trim()) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

function getStringEnv(env: Env, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

function parseProvider(raw: string | undefined): ProviderType {
  return raw?.trim().toLowerCase() === "openai-compatible" ? "openai-compatible" : "gemini";
}

/**
 * env 파일의 값을 이미 설정되지 않은 키에만 채운다.
 * 파일이 없으면 false 를 돌려주고, 그 외 읽기 오류는 그대로 던진다.
 */
function hydrateEnvFromFile(envFile: string, env: Env): boolean {
  let raw: string;
  try {
    raw = readFileSync(envFile, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }

  const parsed = parseDotenv(raw);
  for (const [key, value] of Object.entries(parsed)) {
    if (!env[key]) {
      env[key] = value;
    }
  }
  return true;
}

export interface AppConfig {
  envFile: string;
  envFileLoaded: boolean;
  candidate: ResolvedModelCandidate;
  systemPrompt?: string;
  stream: boolean;
  contextMaxTurns: number;
  historyFile?: string;
  assistantName: string;
  debugLlmRequests: boolean;
}

export interface LoadConfigOptions {
  env?: Env;
  envFile?: string;
}

function resolveCandidate(env: Env, envFile: string): ResolvedModelCandidate {
  const provider = parseProvider(env.CHAT_PROVIDER);
  const temperature = getNumberEnv(env, "CHAT_TEMPERATURE", 0.2);
  const maxTokens = getOptionalPositiveIntEnv(env, "CHAT_MAX_TOKENS");

  if (provider === "openai-compatible") {
    const apiKey = getStringEnv(env, "OPENAI_API_KEY");
    if (!apiKey) {
      throw new MissingCredentialError("OPENAI_API_KEY", envFile);
    }
    return {
      id: "openai-compatible-env",
      provider,
      baseUrl: (getStringEnv(env, "OPENAI_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL).replace(/\/$/, ""),
      apiKey,
      model: getStringEnv(env, "OPENAI_MODEL") ?? DEFAULT_OPENAI_MODEL,
      temperature,
      maxTokens,
    };
  }

  const apiKey = getStringEnv(env, "GEMINI_API_KEY");
  if (!apiKey) {
    throw new MissingCredentialError("GEMINI_API_KEY", envFile);
  }
  return {
    id: "gemini-env",
    provider,
    baseUrl: (getStringEnv(env, "GEMINI_BASE_URL") ?? DEFAULT_GEMINI_BASE_URL).replace(/\/$/, ""),
    apiKey,
    model: getStringEnv(env, "GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL,
    temperature,
    maxTokens,
  };
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const envFile = path.resolve(options.envFile ?? getStringEnv(env, "ENV_FILE") ?? ".env");
  const envFileLoaded = hydrateEnvFromFile(envFile, env);

  const historyFile = getStringEnv(env, "HISTORY_FILE");

  return {
    envFile,
    envFileLoaded,
    candidate: resolveCandidate(env, envFile),
    systemPrompt: getStringEnv(env, "SYSTEM_PROMPT"),
    stream: getBooleanEnv(env, "CHAT_STREAM", true),
    contextMaxTurns: Math.floor(getNumberEnv(env, "CONTEXT_MAX_TURNS", 0)),
    historyFile: historyFile ? path.resolve(historyFile) : undefined,
    assistantName: getStringEnv(env, "ASSISTANT_NAME") ?? "fox",
    debugLlmRequests: getBooleanEnv(env, "DEBUG_LLM_REQUESTS", false),
  };
}
