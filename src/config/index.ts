/**
 * Centralized defaults for the tagger.
 * Values here are fallbacks; deployments override them through the
 * environment (see env.ts).
 */

// === LLM Endpoint ===

/** Chat-completions endpoint used for every topic check. */
export const DEFAULT_LLM_API_URL = 'https://llm.chutes.ai/v1/chat/completions';

/** Model used when neither the caller nor the environment names one. */
export const DEFAULT_LLM_MODEL = 'Qwen/Qwen3-8B';

export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_TEMPERATURE = 0.0;
export const DEFAULT_TOP_P = 0.5;

// === HTTP Retry Settings ===

/** Total attempts per request (first try included). */
export const HTTP_RETRY_ATTEMPTS = 3;

/** Delay before each attempt; index 0 is the first try. */
export const HTTP_RETRY_BACKOFF_MS = [0, 500, 1500];

/** Upper bounds accepted from configuration. */
export const HTTP_MAX_RETRY_ATTEMPTS = 10;
export const HTTP_MAX_BACKOFF_MS = 60_000;

/** Per-attempt timeout for the LLM endpoint. */
export const HTTP_TIMEOUT_MS = 30_000;

// === Topic Tagging ===

/** Topic appended when a post quotes the project's own account. */
export const DEFAULT_SENTINEL_TOPIC = 'nuance_sharing';

/** Placeholder name the topic prompt templates use for the post text. */
export const PROMPT_CONTENT_FIELD = 'tweet_text';
