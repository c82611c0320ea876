/**
 * Prompt cache domain entities
 */
export interface CacheEntry {
  prompt: string;
  model: string;
  response: string;
  createdAt: Date;
}

export interface PromptCacheRecord {
  prompt: string;
  model: string;
  response: string;
  created_at: number;
}

export interface PromptCacheStatistics {
  totalEntries: number;
  expiredEntries: number;
  ttlSeconds: number;
}
