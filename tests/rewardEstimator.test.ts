import { DatabaseConnection } from '../src/infrastructure/database/DatabaseConnection.js';
import { PromptCacheRepository } from '../src/infrastructure/database/repositories/PromptCacheRepository.js';
import {
  RewardEstimator,
  clampReward,
  parseRewardValue,
} from '../src/application/services/RewardEstimator.js';
import { REWARD_SYSTEM_PROMPT, buildRewardMessage, buildRewardPrompt } from '../src/core/templates/RewardPrompt.js';
import { FakeCompletionClient, silenceConsole } from './helpers/fakes.js';

describe('parseRewardValue', () => {
  it('should parse plain decimals with surrounding whitespace', () => {
    expect(parseRewardValue(' 0.75\n')).toBe(0.75);
    expect(parseRewardValue('-2')).toBe(-2);
    expect(parseRewardValue('.5')).toBe(0.5);
    expect(parseRewardValue('1e-1')).toBe(0.1);
  });

  it('should reject anything that is not a bare number', () => {
    expect(parseRewardValue('')).toBeUndefined();
    expect(parseRewardValue('0.5 USD')).toBeUndefined();
    expect(parseRewardValue('about 0.5')).toBeUndefined();
    expect(parseRewardValue('NaN')).toBeUndefined();
    expect(parseRewardValue('infinite')).toBeUndefined();
  });

  it('should read overflowing values and infinities as signed infinities', () => {
    expect(parseRewardValue('1e999')).toBe(Infinity);
    expect(parseRewardValue('-1e999')).toBe(-Infinity);
    expect(parseRewardValue('inf')).toBe(Infinity);
    expect(parseRewardValue(' -Infinity ')).toBe(-Infinity);
  });
});

describe('clampReward', () => {
  it('should clamp into [0, max]', () => {
    expect(clampReward(-3, 1)).toBe(0);
    expect(clampReward(7, 5)).toBe(5);
    expect(clampReward(0.4, 1)).toBe(0.4);
  });
});

describe('buildRewardMessage', () => {
  it('should print whole rewards with one decimal place', () => {
    expect(buildRewardMessage(1)).toBe('Estimated reward value: 1.0');
    expect(buildRewardMessage(0)).toBe('Estimated reward value: 0.0');
  });

  it('should print fractional rewards as they are', () => {
    expect(buildRewardMessage(0.75)).toBe('Estimated reward value: 0.75');
  });
});

describe('buildRewardPrompt', () => {
  it('should be identical for identical inputs', () => {
    expect(buildRewardPrompt('bg', 'user: hi', 2)).toBe(buildRewardPrompt('bg', 'user: hi', 2));
  });

  it('should only include the conversation when one is given', () => {
    expect(buildRewardPrompt('bg', undefined, 1)).not.toContain('Conversation history:');
    expect(buildRewardPrompt('bg', 'user: hi', 1)).toContain('Conversation history:\nuser: hi');
  });

  it('should embed the maximum value', () => {
    const prompt = buildRewardPrompt('bg', undefined, 2.5);
    expect(prompt.split('\n')[0]).toBe(
      'Evaluate the quality of work and determine a reward between 0 and 2.5.'
    );
  });
});

describe('RewardEstimator', () => {
  let connection: DatabaseConnection;
  let cache: PromptCacheRepository;
  let client: FakeCompletionClient;
  let estimator: RewardEstimator;
  let clock: number;

  beforeEach(() => {
    silenceConsole();
    connection = new DatabaseConnection(':memory:');
    clock = 1_700_000_000_000;
    cache = new PromptCacheRepository(connection.getDatabase(), 3600, () => clock);
    client = new FakeCompletionClient();
    estimator = new RewardEstimator(cache, client, { model: 'gpt-4o', temperature: 0.3 });
  });

  afterEach(() => {
    connection.close();
  });

  it('should call the provider with the evaluator persona and low temperature', async () => {
    client.enqueue('0.6');

    const reward = await estimator.estimateReward('fix bug', 'user: please', 1);

    expect(reward).toBe(0.6);
    expect(client.requests).toEqual([
      {
        model: 'gpt-4o',
        systemPrompt: REWARD_SYSTEM_PROMPT,
        prompt: buildRewardPrompt('fix bug', 'user: please', 1),
        temperature: 0.3,
      },
    ]);
  });

  const clampCases: Array<[string, number, number]> = [
    ['5', 1, 1],
    ['-0.5', 1, 0],
    ['0.25', 1, 0.25],
    ['12', 10, 10],
    ['1e999', 1, 1],
    ['-inf', 1, 0],
  ];

  it.each(clampCases)('should clamp provider answer %s into [0, %d]', async (answer, max, expected) => {
    client.enqueue(answer);
    await expect(estimator.estimateReward('bg', undefined, max)).resolves.toBe(expected);
  });

  it('should store the clamped value in the cache', async () => {
    client.enqueue('3');
    await estimator.estimateReward('bg', undefined, 2);

    expect(cache.get(buildRewardPrompt('bg', undefined, 2), 'gpt-4o')).toBe('2');
  });

  it('should reuse the cached reward without a second provider call', async () => {
    client.enqueue('0.42');

    const first = await estimator.estimateReward('bg', 'user: hi', 1);
    const second = await estimator.estimateReward('bg', 'user: hi', 1);

    expect(first).toBe(0.42);
    expect(second).toBe(0.42);
    expect(client.requests).toHaveLength(1);
  });

  it('should call the provider again once the cached entry expired', async () => {
    client.enqueue('0.42', '0.9');

    await estimator.estimateReward('bg', undefined, 1);
    clock += 3600 * 1000 + 1;
    const reward = await estimator.estimateReward('bg', undefined, 1);

    expect(reward).toBe(0.9);
    expect(client.requests).toHaveLength(2);
  });

  it('should return 0 and cache nothing for a non-numeric answer', async () => {
    client.enqueue('I think about 0.5');

    const reward = await estimator.estimateReward('bg', undefined, 1);

    expect(reward).toBe(0);
    expect(cache.getStatistics().totalEntries).toBe(0);
  });

  it('should return 0 when the provider call fails', async () => {
    client.enqueue(new Error('socket hang up'));
    await expect(estimator.estimateReward('bg', undefined, 1)).resolves.toBe(0);
  });

  it('should clear the whole cache and ask again when a cached entry is poisoned', async () => {
    const prompt = buildRewardPrompt('bg', undefined, 1);
    cache.store(prompt, 'gpt-4o', 'not a number');
    cache.store('unrelated prompt', 'gpt-4o', '0.3');
    client.enqueue('0.8');

    const reward = await estimator.estimateReward('bg', undefined, 1);

    expect(reward).toBe(0.8);
    expect(client.requests).toHaveLength(1);
    expect(cache.get('unrelated prompt', 'gpt-4o')).toBeUndefined();
    expect(cache.get(prompt, 'gpt-4o')).toBe('0.8');
  });
});
