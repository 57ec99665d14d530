import { ConfigError, getSettings, validateConfig } from '../config/env.js';
import { FileTopicPromptStore } from '../constitution/topic-prompt.store.js';
import { logger } from '../lib/logger/structured-logger.js';
import { createLlmQuery } from '../llm/llm.service.js';
import type { CredentialProvider } from '../llm/types.js';
import type { PostDiscovery, TopicPromptSource } from './ports.js';
import { TopicTagger } from './topic-tagger.js';

export interface CreateTopicTaggerOptions {
  discovery: PostDiscovery;
  credentials?: CredentialProvider;
  /** Defaults to a FileTopicPromptStore over TOPIC_PROMPTS_FILE */
  topicPrompts?: TopicPromptSource;
}

/**
 * Wire a TopicTagger from environment settings.
 */
export function createTopicTagger(options: CreateTopicTaggerOptions): TopicTagger {
  const settings = getSettings();
  for (const warning of validateConfig(settings)) {
    logger.warn({ warning }, '[Config] Incomplete configuration');
  }

  let topicPrompts = options.topicPrompts;
  if (!topicPrompts) {
    if (!settings.topicPromptsFile) {
      throw new ConfigError('TOPIC_PROMPTS_FILE is not set and no topic prompt source was given');
    }
    topicPrompts = new FileTopicPromptStore(settings.topicPromptsFile);
  }

  return new TopicTagger({
    topicPrompts,
    discovery: options.discovery,
    query: createLlmQuery(options.credentials),
    sentinel: settings.sentinel
  });
}
