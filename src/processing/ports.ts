/**
 * Collaborators the topic tagger depends on. Implementations live outside
 * this package (discovery clients, constitution store).
 */

export type TopicPromptMap = Record<string, string>;

export interface TopicPromptSource {
  /** topic name -> prompt template with a `{tweet_text}` placeholder */
  getTopicPrompts(): Promise<TopicPromptMap>;
}

export interface DiscoveredPost {
  accountId: string;
}

export interface PostDiscovery {
  /** May reject (network failure, not found) */
  getPost(postId: string): Promise<DiscoveredPost>;
}
