import Database from 'better-sqlite3';
import { IPromptCacheRepository } from '../../../core/interfaces/IPromptCacheRepository.js';
import {
  CacheEntry,
  PromptCacheRecord,
  PromptCacheStatistics,
} from '../../../core/entities/PromptCache.js';

/**
 * SQLite implementation of the prompt/response cache.
 * An entry is valid while `now - created_at < ttl`.
 */
export class PromptCacheRepository implements IPromptCacheRepository {
  private readonly ttlMs: number;

  constructor(
    private db: Database.Database,
    private ttlSeconds: number = 86400,
    private now: () => number = Date.now
  ) {
    this.ttlMs = ttlSeconds * 1000;
  }

  private cutoff(): number {
    return this.now() - this.ttlMs;
  }

  cleanupExpired(): number {
    const result = this.db
      .prepare('DELETE FROM prompt_cache WHERE created_at <= ?')
      .run(this.cutoff());
    return result.changes;
  }

  get(prompt: string, model: string): string | undefined {
    return this.getEntry(prompt, model)?.response;
  }

  getEntry(prompt: string, model: string): CacheEntry | undefined {
    const row = this.db
      .prepare<[string, string, number], PromptCacheRecord>(
        'SELECT prompt, model, response, created_at FROM prompt_cache WHERE prompt = ? AND model = ? AND created_at > ?'
      )
      .get(prompt, model, this.cutoff());

    if (!row) return undefined;

    return {
      prompt: row.prompt,
      model: row.model,
      response: row.response,
      createdAt: new Date(row.created_at),
    };
  }

  store(prompt: string, model: string, response: string): void {
    this.db
      .prepare(
        `
      INSERT INTO prompt_cache (prompt, model, response, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(prompt, model) DO UPDATE SET
        response = excluded.response,
        created_at = excluded.created_at
    `
      )
      .run(prompt, model, response, this.now());
  }

  clear(): void {
    this.db.prepare('DELETE FROM prompt_cache').run();
  }

  getStatistics(): PromptCacheStatistics {
    const row = this.db
      .prepare<[number], { total: number; expired: number | null }>(
        `
      SELECT
        COUNT(*) as total,
        SUM(CASE WHEN created_at <= ? THEN 1 ELSE 0 END) as expired
      FROM prompt_cache
    `
      )
      .get(this.cutoff());

    return {
      totalEntries: row?.total ?? 0,
      expiredEntries: row?.expired ?? 0,
      ttlSeconds: this.ttlSeconds,
    };
  }
}
