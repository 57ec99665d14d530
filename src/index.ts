export { LLMService, createLlmQuery, queryLLM, type LLMServiceOptions } from './llm/llm.service.js';
export { stripReasoning, isAffirmativeVerdict } from './llm/response-sanitizer.js';
export { LLMResponseError, type CredentialProvider, type LlmQueryFn, type QueryOptions, type SigningCredential } from './llm/types.js';
export { HttpRetryClient, type HttpRetryClientConfig, type HttpMethod, type FetchFn } from './lib/http/http-retry-client.js';
export { HttpRequestError, type HttpFailureKind } from './lib/http/http-errors.js';
export { withTimeout, TimeoutError } from './lib/reliability/timeout-guard.js';
export { TopicTagger, type TopicTaggerDeps, type SentinelConfig, type SentinelOutcome } from './processing/topic-tagger.js';
export { Processor, type ProcessingResult, type ProcessingStatus } from './processing/processor.js';
export { renderPromptTemplate, PromptTemplateError } from './processing/prompt-template.js';
export type { PostDiscovery, DiscoveredPost, TopicPromptSource, TopicPromptMap } from './processing/ports.js';
export { FileTopicPromptStore, StaticTopicPromptStore } from './constitution/topic-prompt.store.js';
export { PostSchema, PlatformTypeSchema, type Post, type PlatformType } from './models/post.js';
export { getSettings, loadSettings, validateConfig, ConfigError, type Settings } from './config/env.js';
export { logger } from './lib/logger/structured-logger.js';
export { createTopicTagger, type CreateTopicTaggerOptions } from './processing/topic-tagger.factory.js';
