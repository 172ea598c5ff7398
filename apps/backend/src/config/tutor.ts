import type { LlmProviderName } from "@polyglot-tutor/shared/tutor";
import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

export interface HostedProviderConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export interface LocalProviderConfig {
  serverUrl: string;
  modelPath: string;
  maxConcurrency: number;
  maxQueue: number;
  queueTimeoutMs: number;
}

export interface TutorConfig {
  host: string;
  port: number;
  llmProvider: LlmProviderName;
  groq: HostedProviderConfig;
  local: LocalProviderConfig;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  contextLength: number;
  embeddingModel: string;
  embeddingUrl: string | null;
  vectorStoreDir: string;
  assetsDir: string;
  dataDir: string;
  modelsDir: string;
  logDir: string | null;
  trainingCommand: string | null;
  autoCollectTraining: boolean;
}

const DEFAULT_PORT = 8000;
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_GROQ_MODEL = "llama-3.3-70b-versatile";
const DEFAULT_GROQ_BASE_URL = "https://api.groq.com/openai/v1";
const DEFAULT_LOCAL_URL = "http://127.0.0.1:8080";
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;
const DEFAULT_CONTEXT_LENGTH = 8192;
const DEFAULT_LOCAL_QUEUE = 4;
const DEFAULT_QUEUE_TIMEOUT_MS = 30_000;

function parseNumber(envValue: string | undefined, fallback: number): number {
  if (!envValue) {
    return fallback;
  }

  const parsed = Number(envValue);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

// Zero is meaningful for retries and queue depth.
function parseCount(envValue: string | undefined, fallback: number): number {
  if (!envValue) {
    return fallback;
  }

  const parsed = Number.parseInt(envValue, 10);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
}

function parseBoolean(envValue: string | undefined, fallback: boolean): boolean {
  const normalized = envValue?.trim().toLowerCase();
  if (!normalized) {
    return fallback;
  }

  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return fallback;
}

function parseProvider(envValue: string | undefined): LlmProviderName {
  return envValue?.trim().toLowerCase() === "local" ? "local" : "groq";
}

/**
 * Directory holding the bundled JSON data (seed documents, exercise topics,
 * base models). Defaults to `apps/backend/data`, found relative to this module
 * or to the working directory.
 */
export function resolveAssetsDir(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.ASSETS_DIR?.trim();
  if (configured) {
    return path.resolve(configured);
  }

  const candidates = [
    fileURLToPath(new URL("../../data", import.meta.url)),
    path.resolve(process.cwd(), "apps/backend/data"),
    path.resolve(process.cwd(), "data"),
  ];
  return candidates.find((candidate) => existsSync(path.join(candidate, "exercise-topics.json"))) ?? candidates[0];
}

function optionalString(envValue: string | undefined): string | null {
  return envValue?.trim() || null;
}

export function loadTutorConfig(env: NodeJS.ProcessEnv = process.env): TutorConfig {
  return {
    host: env.HOST?.trim() || DEFAULT_HOST,
    port: parseNumber(env.PORT, DEFAULT_PORT),
    llmProvider: parseProvider(env.LLM_PROVIDER),
    groq: {
      apiKey: env.GROQ_API_KEY?.trim() ?? "",
      model: env.GROQ_MODEL?.trim() || DEFAULT_GROQ_MODEL,
      baseUrl: env.GROQ_BASE_URL?.trim() || DEFAULT_GROQ_BASE_URL,
    },
    local: {
      serverUrl: env.LOCAL_LLM_URL?.trim() || DEFAULT_LOCAL_URL,
      modelPath: env.LOCAL_MODEL_PATH?.trim() || "./models/model.gguf",
      maxConcurrency: parseNumber(env.LOCAL_MAX_CONCURRENCY, 1),
      maxQueue: parseCount(env.LOCAL_MAX_QUEUE, DEFAULT_LOCAL_QUEUE),
      queueTimeoutMs: parseNumber(env.LOCAL_QUEUE_TIMEOUT_MS, DEFAULT_QUEUE_TIMEOUT_MS),
    },
    requestTimeoutMs: parseNumber(env.LLM_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    maxRetries: parseCount(env.LLM_MAX_RETRIES, DEFAULT_MAX_RETRIES),
    retryBaseDelayMs: parseNumber(env.LLM_RETRY_BASE_DELAY_MS, DEFAULT_RETRY_BASE_DELAY_MS),
    contextLength: parseNumber(env.CONTEXT_LENGTH, DEFAULT_CONTEXT_LENGTH),
    embeddingModel: env.EMBEDDING_MODEL?.trim() || "hashing-256",
    embeddingUrl: optionalString(env.EMBEDDING_URL),
    vectorStoreDir: env.VECTOR_STORE_DIR?.trim() || "./chroma_db",
    assetsDir: resolveAssetsDir(env),
    dataDir: env.DATA_DIR?.trim() || "./data",
    modelsDir: env.MODELS_DIR?.trim() || "./models",
    logDir: optionalString(env.LOG_DIR),
    trainingCommand: optionalString(env.TRAINING_COMMAND),
    autoCollectTraining: parseBoolean(env.TRAINING_AUTO_COLLECT, false),
  };
}
