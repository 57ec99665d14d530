/**
 * Topic Tagger
 *
 * Tags a post with every configured topic the LLM answers "true" for, one
 * topic at a time in prompt-map order. Twitter posts quoting the project's
 * own account also get the sentinel topic, without an LLM call.
 */

import { logger } from '../lib/logger/structured-logger.js';
import { getSettings } from '../config/env.js';
import { PROMPT_CONTENT_FIELD } from '../config/index.js';
import { queryLLM } from '../llm/llm.service.js';
import { isAffirmativeVerdict } from '../llm/response-sanitizer.js';
import type { LlmQueryFn } from '../llm/types.js';
import { getQuotedStatusId, type Post } from '../models/post.js';
import { Processor, type ProcessingResult } from './processor.js';
import { renderPromptTemplate } from './prompt-template.js';
import type { DiscoveredPost, PostDiscovery, TopicPromptSource } from './ports.js';

export interface SentinelConfig {
  /** Account whose posts, when quoted, earn the sentinel topic */
  accountId: string;
  topic: string;
}

export interface TopicTaggerDeps {
  topicPrompts: TopicPromptSource;
  discovery: PostDiscovery;
  query?: LlmQueryFn;
  sentinel?: SentinelConfig;
}

export type QuotedPostLookup =
  | { ok: true; post: DiscoveredPost }
  | { ok: false; error: Error };

export type SentinelOutcome = 'matched' | 'not_matched' | 'lookup_failed' | 'not_applicable';

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export class TopicTagger extends Processor<Post> {
  readonly processorName = 'topic_tagger';

  private readonly topicPrompts: TopicPromptSource;
  private readonly discovery: PostDiscovery;
  private readonly query: LlmQueryFn;
  private readonly sentinel: SentinelConfig;

  constructor(deps: TopicTaggerDeps) {
    super();
    this.topicPrompts = deps.topicPrompts;
    this.discovery = deps.discovery;
    this.query = deps.query ?? queryLLM;
    this.sentinel = deps.sentinel ?? getSettings().sentinel;
  }

  async process(post: Post): Promise<ProcessingResult<Post>> {
    const postId = post.postId;

    try {
      // Topics missing from the prompt map are simply not considered
      const topicPrompts = await this.topicPrompts.getTopicPrompts();
      const identifiedTopics: string[] = [];

      for (const [topic, template] of Object.entries(topicPrompts)) {
        if (await this.isAboutTopic(post, template)) {
          logger.info({ postId, topic }, '[TopicTagger] Post matches topic');
          identifiedTopics.push(topic);
        } else {
          logger.debug({ postId, topic }, '[TopicTagger] Post does not match topic');
        }
      }

      if (await this.checkSentinel(post) === 'matched') {
        identifiedTopics.push(this.sentinel.topic);
      }

      post.topics = identifiedTopics;

      // Zero topics is still an accepted result
      logger.info({ postId, topicCount: identifiedTopics.length }, '[TopicTagger] Post tagged');
      return this.accepted(post, {
        topics: identifiedTopics,
        topic_count: identifiedTopics.length
      });
    } catch (err: unknown) {
      const error = toError(err);
      logger.error({ postId, error: error.message }, '[TopicTagger] Error tagging topics');
      return this.failed(post, `Error tagging topics: ${error.message}`);
    }
  }

  private async isAboutTopic(post: Post, template: string): Promise<boolean> {
    const prompt = renderPromptTemplate(template, { [PROMPT_CONTENT_FIELD]: post.content });
    const response = await this.query(prompt, { temperature: 0.0 });
    return isAffirmativeVerdict(response);
  }

  /**
   * Quote-tweet check. Never throws: any failure in the step, from malformed
   * extraData to the lookup itself, resolves to 'lookup_failed'.
   */
  async checkSentinel(post: Post): Promise<SentinelOutcome> {
    const postId = post.postId;
    if (post.platformType !== 'twitter') {
      return 'not_applicable';
    }

    try {
      return await this.matchQuotedAccount(post);
    } catch (err: unknown) {
      logger.warn({ postId, error: toError(err).message }, '[TopicTagger] Quote tweet check failed');
      return 'lookup_failed';
    }
  }

  private async matchQuotedAccount(post: Post): Promise<SentinelOutcome> {
    const postId = post.postId;
    const quotedStatusId = getQuotedStatusId(post);
    if (!quotedStatusId) {
      logger.debug({ postId }, '[TopicTagger] Not a quote tweet with a quoted status id');
      return 'not_applicable';
    }

    logger.debug({ postId, quotedStatusId }, '[TopicTagger] Post is a quote tweet');
    const lookup = await this.lookupQuotedPost(quotedStatusId);

    if (!lookup.ok) {
      logger.warn({ postId, quotedStatusId, error: lookup.error.message }, '[TopicTagger] Quoted post lookup failed');
      return 'lookup_failed';
    }

    const { accountId } = lookup.post;
    if (this.sentinel.accountId !== '' && accountId === this.sentinel.accountId) {
      logger.info({ postId, quotedStatusId, topic: this.sentinel.topic }, '[TopicTagger] Post quotes the sentinel account');
      return 'matched';
    }

    logger.debug({ postId, quotedStatusId, accountId }, '[TopicTagger] Quoted post is from another account');
    return 'not_matched';
  }

  private async lookupQuotedPost(quotedStatusId: string): Promise<QuotedPostLookup> {
    try {
      const post = await this.discovery.getPost(quotedStatusId);
      if (typeof post?.accountId !== 'string') {
        return { ok: false, error: new Error(`Quoted post ${quotedStatusId} has no account id`) };
      }
      return { ok: true, post };
    } catch (err: unknown) {
      return { ok: false, error: toError(err) };
    }
  }
}
