/**
 * LLM Service
 *
 * Process-wide client for the chat-completions endpoint. Built once, on
 * first demand, under a lock; every later caller reuses the same instance.
 */

import { logger } from '../lib/logger/structured-logger.js';
import { LazySingleton } from '../lib/concurrency/async-lock.js';
import { HttpRetryClient } from '../lib/http/http-retry-client.js';
import { getSettings } from '../config/env.js';
import { DEFAULT_MAX_TOKENS, DEFAULT_TEMPERATURE, DEFAULT_TOP_P } from '../config/index.js';
import {
    ChatCompletionResponseSchema,
    LLMResponseError,
    type ChatCompletionRequest,
    type CredentialProvider,
    type LlmQueryFn,
    type QueryOptions
} from './types.js';

/**
 * Init options. Only the first (initializing) caller's options apply.
 */
export interface LLMServiceOptions {
    modelName?: string;
    apiUrl?: string;
    apiKey?: string;
    httpClient?: HttpRetryClient;
}

export class LLMService {
    private static readonly singleton = new LazySingleton<LLMService, LLMServiceOptions>(async (options) => {
        const service = new LLMService();
        await service.initialize(options);
        return service;
    });

    private modelName = '';
    private apiUrl = '';
    private apiKey = '';
    private httpClient: HttpRetryClient | null = null;

    private constructor() {}

    static getInstance(options: LLMServiceOptions = {}): Promise<LLMService> {
        return LLMService.singleton.get(options);
    }

    static get state(): 'UNINITIALIZED' | 'INITIALIZING' | 'READY' {
        return LLMService.singleton.state;
    }

    get defaultModel(): string {
        return this.modelName;
    }

    private async initialize(options: LLMServiceOptions): Promise<void> {
        const settings = getSettings();
        this.modelName = options.modelName ?? settings.llm.defaultModel;
        this.apiUrl = options.apiUrl ?? settings.llm.apiUrl;
        this.apiKey = options.apiKey ?? settings.llm.apiKey;
        this.httpClient = options.httpClient ?? new HttpRetryClient({
            maxAttempts: settings.http.retryAttempts,
            backoffMs: settings.http.backoffMs,
            timeoutMs: settings.http.timeoutMs
        });

        logger.info({ model: this.modelName }, '[LLM] Service initialized');
    }

    /**
     * Send a single-turn prompt and return the first choice's text.
     * HTTP failures propagate as-is; this layer adds no retries.
     */
    async query(prompt: string, opts: QueryOptions = {}): Promise<string> {
        const httpClient = this.requireHttpClient();

        // opts.credential is accepted for callers that sign requests; the endpoint itself uses the bearer key
        const payload: ChatCompletionRequest = {
            model: opts.model ?? this.modelName,
            messages: [{ role: 'user', content: prompt }],
            stream: false,
            max_tokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
            temperature: opts.temperature ?? DEFAULT_TEMPERATURE,
            top_p: opts.topP ?? DEFAULT_TOP_P
        };

        const data = await httpClient.request('POST', this.apiUrl, {
            headers: {
                Authorization: `Bearer ${this.apiKey}`,
                'Content-Type': 'application/json'
            },
            body: payload
        });

        logger.debug({ payload }, '[LLM] Payload sent to model');
        logger.debug({ response: data }, '[LLM] Response received from model');

        const parsed = ChatCompletionResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new LLMResponseError(
                `Unexpected completion response shape: ${parsed.error.issues.map(i => i.path.join('.') || i.message).join(', ')}`,
                { cause: parsed.error }
            );
        }

        logger.info({ model: payload.model }, '[LLM] Received response from model');
        // min(1) on choices guarantees the first entry
        const content = parsed.data.choices[0]?.message.content ?? '';
        logger.debug({ content }, '[LLM] Completion text');
        return content;
    }

    private requireHttpClient(): HttpRetryClient {
        if (!this.httpClient) {
            throw new Error('LLMService used before initialization');
        }
        return this.httpClient;
    }
}

/**
 * Build a query function bound to the shared service. When the caller
 * passes no credential and a provider is given, the provider supplies one.
 */
export function createLlmQuery(credentials?: CredentialProvider): LlmQueryFn {
    return async (prompt, opts = {}) => {
        const credential = opts.credential ?? (credentials ? await credentials.getCredential() : undefined);
        const service = await LLMService.getInstance();
        return service.query(prompt, { ...opts, credential });
    };
}

/**
 * Convenience query against the shared service, without a credential provider.
 */
export const queryLLM: LlmQueryFn = createLlmQuery();
