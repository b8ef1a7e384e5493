import {
  type LlmRequestMode,
  SUPPORTED_PROVIDERS,
  type SupportedLlmProvider,
  defaultRequestMode,
} from "../classifier/remote-category-client.js";

export type CategoryLlmConfig = {
  provider: SupportedLlmProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  requestMode: LlmRequestMode;
  extraHeaders: Record<string, string>;
  timeoutMs: number;
};

export type PipelineConfig = {
  primaryOcrTimeoutMs: number;
  retryBackoffMs: number;
  remoteOcrTimeoutMs: number;
  classificationDeadlineMs: number;
  ocrApiKey?: string;
  ocrBaseUrl?: string;
  ocrLanguage: string;
  tesseractLang: string;
  tesseractLangPath?: string;
  defaultCurrency: string;
  autoAcceptThreshold: number;
  enhancedRules: boolean;
  /** Null when the selected provider needs a key and none is set. */
  categoryLlm: CategoryLlmConfig | null;
};

export function readPipelineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return {
    primaryOcrTimeoutMs: readPositiveInt(env, "RECEIPT_PIPELINE_PRIMARY_OCR_TIMEOUT_MS", 8000),
    retryBackoffMs: readNonNegativeInt(env, "RECEIPT_PIPELINE_RETRY_BACKOFF_MS", 500),
    remoteOcrTimeoutMs: readPositiveInt(env, "RECEIPT_PIPELINE_REMOTE_OCR_TIMEOUT_MS", 30_000),
    classificationDeadlineMs: readPositiveInt(
      env,
      "RECEIPT_PIPELINE_CLASSIFICATION_DEADLINE_MS",
      3000,
    ),
    ocrApiKey: env.RECEIPT_PIPELINE_OCR_API_KEY?.trim() || undefined,
    ocrBaseUrl: env.RECEIPT_PIPELINE_OCR_BASE_URL?.trim() || undefined,
    ocrLanguage: env.RECEIPT_PIPELINE_OCR_LANGUAGE?.trim() || "eng",
    tesseractLang: env.RECEIPT_PIPELINE_TESSERACT_LANG?.trim() || "eng",
    tesseractLangPath: env.RECEIPT_PIPELINE_TESSERACT_LANG_PATH?.trim() || undefined,
    defaultCurrency: readCurrency(env),
    autoAcceptThreshold: readRatio(env, "RECEIPT_PIPELINE_AUTO_ACCEPT_THRESHOLD", 0.8),
    enhancedRules: readFlag(env, "RECEIPT_PIPELINE_ENHANCED_RULES"),
    categoryLlm: resolveCategoryLlmConfigFromEnv(env),
  };
}

export function resolveCategoryLlmConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): CategoryLlmConfig | null {
  const provider = parseProvider(env.RECEIPT_PIPELINE_LLM_PROVIDER);
  const apiKey = resolveProviderApiKey(provider, env);
  const requiresApiKey =
    provider === "openai" || provider === "openrouter" || provider === "gemini";
  if (requiresApiKey && !apiKey) {
    return null;
  }

  return {
    provider,
    model: env.RECEIPT_PIPELINE_LLM_MODEL?.trim() || defaultModel(provider),
    apiKey,
    baseUrl: env.RECEIPT_PIPELINE_LLM_BASE_URL?.trim() || undefined,
    requestMode: resolveRequestMode(env.RECEIPT_PIPELINE_LLM_REQUEST_MODE, provider),
    extraHeaders: resolveProviderHeaders(provider, env),
    timeoutMs: readPositiveInt(env, "RECEIPT_PIPELINE_CLASSIFIER_TIMEOUT_MS", 2000),
  };
}

function parseProvider(value: string | undefined): SupportedLlmProvider {
  const lowered = value?.trim().toLowerCase();
  if (!lowered) {
    return "openai";
  }

  const matched = SUPPORTED_PROVIDERS.find((provider) => provider === lowered);
  if (!matched) {
    throw new Error(
      `invalid RECEIPT_PIPELINE_LLM_PROVIDER: ${value}; expected one of ${SUPPORTED_PROVIDERS.join(", ")}`,
    );
  }
  return matched;
}

function resolveRequestMode(
  value: string | undefined,
  provider: SupportedLlmProvider,
): LlmRequestMode {
  const trimmed = value?.trim();
  if (trimmed === "responses" || trimmed === "chat_completions") {
    return trimmed;
  }
  return defaultRequestMode(provider);
}

function resolveProviderApiKey(
  provider: SupportedLlmProvider,
  env: NodeJS.ProcessEnv,
): string | undefined {
  const explicit = env.RECEIPT_PIPELINE_LLM_API_KEY?.trim();
  if (explicit) {
    return explicit;
  }

  switch (provider) {
    case "openrouter":
      return env.OPENROUTER_API_KEY?.trim() || undefined;
    case "gemini":
      return env.GEMINI_API_KEY?.trim() || env.GOOGLE_API_KEY?.trim() || undefined;
    case "openai":
      return env.OPENAI_API_KEY?.trim() || undefined;
    case "lmstudio":
    case "openai-compatible":
    default:
      return undefined;
  }
}

function resolveProviderHeaders(
  provider: SupportedLlmProvider,
  env: NodeJS.ProcessEnv,
): Record<string, string> {
  if (provider !== "openrouter") {
    return {};
  }

  const referer =
    env.RECEIPT_PIPELINE_OPENROUTER_SITE_URL?.trim() || env.OPENROUTER_HTTP_REFERER?.trim();
  const appName =
    env.RECEIPT_PIPELINE_OPENROUTER_APP_NAME?.trim() || env.OPENROUTER_APP_NAME?.trim();
  const headers: Record<string, string> = {};

  if (referer) {
    headers["HTTP-Referer"] = referer;
  }
  if (appName) {
    headers["X-Title"] = appName;
  }

  return headers;
}

function defaultModel(provider: SupportedLlmProvider): string {
  switch (provider) {
    case "gemini":
      return "gemini-2.5-flash";
    case "openrouter":
      return "openai/gpt-4o-mini";
    case "lmstudio":
    case "openai-compatible":
      return "local-model";
    case "openai":
    default:
      return "gpt-4o-mini";
  }
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = readInt(env, name, fallback);
  if (value <= 0) {
    throw new Error(`invalid ${name}: ${env[name]}`);
  }
  return value;
}

function readNonNegativeInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = readInt(env, name, fallback);
  if (value < 0) {
    throw new Error(`invalid ${name}: ${env[name]}`);
  }
  return value;
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return Number.parseInt(raw, 10);
}

function readRatio(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`invalid ${name}: ${raw}`);
  }
  return value;
}

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

function readCurrency(env: NodeJS.ProcessEnv): string {
  const raw = env.RECEIPT_PIPELINE_DEFAULT_CURRENCY?.trim().toUpperCase();
  if (!raw) {
    return "USD";
  }
  if (!/^[A-Z]{3}$/.test(raw)) {
    throw new Error(`invalid RECEIPT_PIPELINE_DEFAULT_CURRENCY: ${raw}`);
  }
  return raw;
}
