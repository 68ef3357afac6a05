import { z } from 'zod';
import type { ProviderName } from './providers/index.js';
import type { CacheLayerOptions } from './services/cache-layer.js';
import type { ModelTable } from './services/model-resolver.js';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);
const optionalString = z
  .string()
  .optional()
  .transform(value => value?.trim() || undefined);
const modelId = (fallback: string) => z.string().trim().min(1).default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3000),
  HOST: z.string().default('0.0.0.0'),

  PROVIDER_ORDER: z
    .string()
    .default('groq,cerebras,sambanova')
    .transform(value =>
      value
        .split(',')
        .map(name => name.trim().toLowerCase())
        .filter(name => name.length > 0)
    ),
  GROQ_API_KEY: optionalString,
  CEREBRAS_API_KEY: optionalString,
  SAMBANOVA_API_KEY: optionalString,

  MODEL_LARGE: modelId('llama-3.3-70b-versatile'),
  MODEL_SMALL: modelId('llama-3.1-8b-instant'),
  CEREBRAS_MODEL_LARGE: modelId('llama-3.3-70b'),
  CEREBRAS_MODEL_SMALL: modelId('llama3.1-8b'),
  SAMBANOVA_MODEL_LARGE: modelId('Meta-Llama-3.3-70B-Instruct'),
  SAMBANOVA_MODEL_SMALL: modelId('Meta-Llama-3.1-8B-Instruct'),

  MAX_ATTEMPTS: positiveInt(2),
  BACKOFF_MS: nonNegativeInt(1000),
  PROVIDER_TIMEOUT_MS: positiveInt(30000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().optional(),

  RATE_LIMIT_MAX: positiveInt(10),
  RATE_LIMIT_WINDOW: positiveInt(60),
  GROUP_COOLDOWN_SECONDS: nonNegativeInt(3),
  CACHE_TTL_SECONDS: positiveInt(3600),
  COMMON_CACHE_TTL_SECONDS: positiveInt(86400),
  CACHE_COMMON_RESPONSES: z
    .string()
    .default('true')
    .transform(value => value.trim().toLowerCase() === 'true'),
  CACHE_SWEEP_INTERVAL_SECONDS: positiveInt(300),

  SMALL_TALK_MAX_TOKENS: nonNegativeInt(4),
  HISTORY_LIMIT: nonNegativeInt(6),
  MAX_HISTORY_STORED: positiveInt(20),
  BOT_USERNAME: optionalString.transform(value => value?.replace(/^@/, '')),
  BOT_NAME: optionalString,
});

export interface AppConfig {
  port: number;
  host: string;
  providerOrder: string[];
  credentials: Partial<Record<ProviderName, string>>;
  models: ModelTable;
  fallback: {
    maxAttempts: number;
    backoffMs: number;
    providerTimeoutMs: number;
  };
  cache: CacheLayerOptions;
  chat: {
    cacheCommonResponses: boolean;
    smallTalkMaxTokens: number;
    historyLimit: number;
    maxHistoryStored: number;
    generationTimeoutMs?: number;
    botUsername?: string;
    botName?: string;
  };
}

/**
 * Read configuration from the environment. Missing credentials are not an
 * error here; the provider chain simply leaves those vendors out.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    providerOrder: parsed.PROVIDER_ORDER,
    credentials: {
      groq: parsed.GROQ_API_KEY,
      cerebras: parsed.CEREBRAS_API_KEY,
      sambanova: parsed.SAMBANOVA_API_KEY,
    },
    models: {
      default: { large: parsed.MODEL_LARGE, small: parsed.MODEL_SMALL },
      groq: { large: parsed.MODEL_LARGE, small: parsed.MODEL_SMALL },
      cerebras: { large: parsed.CEREBRAS_MODEL_LARGE, small: parsed.CEREBRAS_MODEL_SMALL },
      sambanova: { large: parsed.SAMBANOVA_MODEL_LARGE, small: parsed.SAMBANOVA_MODEL_SMALL },
    },
    fallback: {
      maxAttempts: parsed.MAX_ATTEMPTS,
      backoffMs: parsed.BACKOFF_MS,
      providerTimeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    },
    cache: {
      rateLimitMax: parsed.RATE_LIMIT_MAX,
      rateLimitWindowMs: parsed.RATE_LIMIT_WINDOW * 1000,
      cooldownSeconds: parsed.GROUP_COOLDOWN_SECONDS,
      responseTtlMs: parsed.CACHE_TTL_SECONDS * 1000,
      commonTtlMs: parsed.COMMON_CACHE_TTL_SECONDS * 1000,
      sweepIntervalMs: parsed.CACHE_SWEEP_INTERVAL_SECONDS * 1000,
    },
    chat: {
      cacheCommonResponses: parsed.CACHE_COMMON_RESPONSES,
      smallTalkMaxTokens: parsed.SMALL_TALK_MAX_TOKENS,
      historyLimit: parsed.HISTORY_LIMIT,
      maxHistoryStored: parsed.MAX_HISTORY_STORED,
      generationTimeoutMs: parsed.GENERATION_TIMEOUT_MS,
      botUsername: parsed.BOT_USERNAME,
      botName: parsed.BOT_NAME,
    },
  };
}
