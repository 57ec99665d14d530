/**
 * Topic prompt stores
 *
 * The constitution maps topic names to yes/no prompt templates. File-backed
 * stores read a JSON object once and keep it for the process lifetime.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from '../lib/logger/structured-logger.js';
import type { TopicPromptMap, TopicPromptSource } from '../processing/ports.js';

// Integer-like keys would be enumerated ahead of the others, breaking map order
const TopicNameSchema = z.string().min(1).refine(
  (name) => !/^(0|[1-9]\d*)$/.test(name),
  { message: 'Topic names must not be integer-like' }
);

export const TopicPromptMapSchema = z.record(TopicNameSchema, z.string().min(1));

export class FileTopicPromptStore implements TopicPromptSource {
  private loading: Promise<TopicPromptMap> | null = null;

  constructor(private readonly filePath: string) {}

  getTopicPrompts(): Promise<TopicPromptMap> {
    if (!this.loading) {
      this.loading = this.load().catch((err: unknown) => {
        // Allow the next call to retry the read
        this.loading = null;
        throw err;
      });
    }
    return this.loading;
  }

  private async load(): Promise<TopicPromptMap> {
    const raw = await readFile(this.filePath, 'utf-8');
    const parsed = TopicPromptMapSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid topic prompts in ${this.filePath}: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
    }
    logger.info({ file: this.filePath, topics: Object.keys(parsed.data) }, '[Constitution] Topic prompts loaded');
    return parsed.data;
  }
}

export class StaticTopicPromptStore implements TopicPromptSource {
  private readonly prompts: TopicPromptMap;

  constructor(prompts: TopicPromptMap) {
    this.prompts = TopicPromptMapSchema.parse(prompts);
  }

  async getTopicPrompts(): Promise<TopicPromptMap> {
    return { ...this.prompts };
  }
}
