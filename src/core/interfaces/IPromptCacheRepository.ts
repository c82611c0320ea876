import { CacheEntry, PromptCacheStatistics } from '../entities/PromptCache.js';

/**
 * Interface for prompt/response cache persistence
 */
export interface IPromptCacheRepository {
  /**
   * Remove every entry older than the TTL
   */
  cleanupExpired(): number;

  /**
   * Exact (prompt, model) lookup; expired entries are never returned
   */
  get(prompt: string, model: string): string | undefined;

  store(prompt: string, model: string, response: string): void;

  clear(): void;

  getEntry(prompt: string, model: string): CacheEntry | undefined;

  getStatistics(): PromptCacheStatistics;
}
