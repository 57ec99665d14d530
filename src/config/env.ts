import dotenv from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_LLM_API_URL,
  DEFAULT_LLM_MODEL,
  DEFAULT_SENTINEL_TOPIC,
  HTTP_MAX_BACKOFF_MS,
  HTTP_MAX_RETRY_ATTEMPTS,
  HTTP_RETRY_ATTEMPTS,
  HTTP_RETRY_BACKOFF_MS,
  HTTP_TIMEOUT_MS
} from './index.js';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Parse a comma-separated backoff schedule ("0,500,1500").
 * The schedule must be non-decreasing and every step bounded.
 */
export const BackoffScheduleSchema = z
  .string()
  .transform((s) => s.split(',').map((x) => x.trim()).filter((x) => x.length > 0).map(Number))
  .refine((arr) => arr.length > 0, { message: 'backoff schedule must have at least one number' })
  .refine((arr) => arr.every((n) => Number.isFinite(n) && n >= 0 && n <= HTTP_MAX_BACKOFF_MS), {
    message: `backoff values must be between 0 and ${HTTP_MAX_BACKOFF_MS}ms`
  })
  .refine((arr) => arr.every((n, i) => i === 0 || n >= (arr[i - 1] ?? 0)), {
    message: 'backoff schedule must be non-decreasing'
  });

const EnvSchema = z.object({
  LLM_API_KEY: z.string().default(''),
  LLM_API_URL: z.string().url().default(DEFAULT_LLM_API_URL),
  LLM_DEFAULT_MODEL: z.string().trim().min(1).default(DEFAULT_LLM_MODEL),
  HTTP_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(HTTP_MAX_RETRY_ATTEMPTS).default(HTTP_RETRY_ATTEMPTS),
  HTTP_RETRY_BACKOFF_MS: BackoffScheduleSchema.default(HTTP_RETRY_BACKOFF_MS.join(',')),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(HTTP_TIMEOUT_MS),
  SENTINEL_ACCOUNT_ID: z.string().default(''),
  SENTINEL_TOPIC: z.string().trim().min(1).default(DEFAULT_SENTINEL_TOPIC),
  TOPIC_PROMPTS_FILE: z.string().optional()
});

export interface Settings {
  llm: {
    apiKey: string;
    apiUrl: string;
    defaultModel: string;
  };
  http: {
    retryAttempts: number;
    backoffMs: number[];
    timeoutMs: number;
  };
  sentinel: {
    accountId: string;
    topic: string;
  };
  topicPromptsFile: string | undefined;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

/**
 * Load settings from environment variables.
 * Empty strings count as unset so `.env` placeholders fall back to defaults.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse({
    LLM_API_KEY: emptyToUndefined(env.LLM_API_KEY) ?? emptyToUndefined(env.CHUTES_API_KEY),
    LLM_API_URL: emptyToUndefined(env.LLM_API_URL),
    LLM_DEFAULT_MODEL: emptyToUndefined(env.LLM_DEFAULT_MODEL),
    HTTP_RETRY_ATTEMPTS: emptyToUndefined(env.HTTP_RETRY_ATTEMPTS),
    HTTP_RETRY_BACKOFF_MS: emptyToUndefined(env.HTTP_RETRY_BACKOFF_MS),
    HTTP_TIMEOUT_MS: emptyToUndefined(env.HTTP_TIMEOUT_MS),
    SENTINEL_ACCOUNT_ID: emptyToUndefined(env.SENTINEL_ACCOUNT_ID),
    SENTINEL_TOPIC: emptyToUndefined(env.SENTINEL_TOPIC),
    TOPIC_PROMPTS_FILE: emptyToUndefined(env.TOPIC_PROMPTS_FILE)
  });

  if (!parsed.success) {
    const issues = parsed.error.flatten().fieldErrors;
    throw new ConfigError(`Invalid configuration: ${JSON.stringify(issues)}`);
  }

  const data = parsed.data;
  return {
    llm: {
      apiKey: data.LLM_API_KEY,
      apiUrl: data.LLM_API_URL,
      defaultModel: data.LLM_DEFAULT_MODEL
    },
    http: {
      retryAttempts: data.HTTP_RETRY_ATTEMPTS,
      backoffMs: data.HTTP_RETRY_BACKOFF_MS,
      timeoutMs: data.HTTP_TIMEOUT_MS
    },
    sentinel: {
      accountId: data.SENTINEL_ACCOUNT_ID,
      topic: data.SENTINEL_TOPIC
    },
    topicPromptsFile: data.TOPIC_PROMPTS_FILE
  };
}

let cachedSettings: Settings | null = null;

/**
 * Cached settings (loaded once, reused on subsequent calls)
 */
export function getSettings(): Settings {
  if (!cachedSettings) {
    cachedSettings = loadSettings();
  }
  return cachedSettings;
}

/**
 * Clear cache (for testing purposes)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}

/**
 * Report settings that are missing but not fatal.
 * Returns the list of warnings so callers can log them.
 */
export function validateConfig(settings: Settings = getSettings()): string[] {
  const warnings: string[] = [];
  if (!settings.llm.apiKey) {
    warnings.push('LLM_API_KEY is not set - requests to the LLM endpoint will be rejected');
  }
  if (!settings.sentinel.accountId) {
    warnings.push('SENTINEL_ACCOUNT_ID is not set - quote-tweet sentinel topic is disabled');
  }
  return warnings;
}
