import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { PromptCacheRepository } from '../src/infrastructure/database/repositories/PromptCacheRepository.js';

describe('PromptCacheRepository', () => {
  let connection: DatabaseConnection;
  let clock: number;
  let cache: PromptCacheRepository;

  beforeEach(() => {
    // Use in-memory database for tests
    connection = new DatabaseConnection(':memory:');
    clock = 1_700_000_000_000;
    cache = new PromptCacheRepository(connection.getDatabase(), 60, () => clock);
  });

  afterEach(() => {
    connection.close();
  });

  test('should return a stored response', () => {
    cache.store('prompt', 'gpt-4o', '0.5');
    expect(cache.get('prompt', 'gpt-4o')).toBe('0.5');
  });

  test('should key entries by prompt and model', () => {
    cache.store('prompt', 'gpt-4o', '0.5');
    expect(cache.get('prompt', 'gpt-4o-mini')).toBeUndefined();
    expect(cache.get('other prompt', 'gpt-4o')).toBeUndefined();
  });

  test('should overwrite an existing entry and refresh its timestamp', () => {
    cache.store('prompt', 'gpt-4o', '0.5');
    clock += 50_000;
    cache.store('prompt', 'gpt-4o', '0.7');
    clock += 50_000;

    expect(cache.get('prompt', 'gpt-4o')).toBe('0.7');
    expect(cache.getEntry('prompt', 'gpt-4o')?.createdAt.getTime()).toBe(1_700_000_050_000);
  });

  test('should still return an entry just before the TTL elapses', () => {
    cache.store('prompt', 'gpt-4o', '0.5');
    clock += 59_999;
    expect(cache.get('prompt', 'gpt-4o')).toBe('0.5');
  });

  test('should not return an entry once the TTL has elapsed', () => {
    cache.store('prompt', 'gpt-4o', '0.5');
    clock += 60_001;
    expect(cache.get('prompt', 'gpt-4o')).toBeUndefined();
  });

  test('should purge only expired entries on cleanup', () => {
    cache.store('old', 'gpt-4o', '0.1');
    clock += 30_000;
    cache.store('new', 'gpt-4o', '0.2');
    clock += 31_000;

    expect(cache.cleanupExpired()).toBe(1);
    expect(cache.getStatistics()).toEqual({ totalEntries: 1, expiredEntries: 0, ttlSeconds: 60 });
    expect(cache.get('new', 'gpt-4o')).toBe('0.2');
  });

  test('should tolerate cleanup on an empty store', () => {
    expect(cache.cleanupExpired()).toBe(0);
    expect(cache.getStatistics().totalEntries).toBe(0);
  });

  test('should clear every entry', () => {
    cache.store('a', 'gpt-4o', '0.1');
    cache.store('b', 'gpt-4o', '0.2');
    cache.clear();

    expect(cache.get('a', 'gpt-4o')).toBeUndefined();
    expect(cache.get('b', 'gpt-4o')).toBeUndefined();
    expect(cache.getStatistics().totalEntries).toBe(0);
  });

  test('should count expired entries before cleanup', () => {
    cache.store('a', 'gpt-4o', '0.1');
    clock += 61_000;
    cache.store('b', 'gpt-4o', '0.2');

    expect(cache.getStatistics()).toEqual({ totalEntries: 2, expiredEntries: 1, ttlSeconds: 60 });
  });

  test('should handle special characters and long prompts', () => {
    const prompt = `Background "quoted" 'single' <tags> & symbols\n${'a'.repeat(10000)}`;
    cache.store(prompt, 'gpt-4o', '1');
    expect(cache.get(prompt, 'gpt-4o')).toBe('1');
  });
});
