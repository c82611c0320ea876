import { IPromptCacheRepository } from '../../core/interfaces/IPromptCacheRepository.js';
import { ICompletionClient } from '../../core/interfaces/ICompletionClient.js';
import {
  REWARD_SYSTEM_PROMPT,
  buildRewardPrompt,
} from '../../core/templates/RewardPrompt.js';
import { logError } from '../../utils/retry.js';

export interface RewardEstimatorOptions {
  model: string;
  temperature: number;
}

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(inity)?$/i;

/**
 * Strict decimal parse: surrounding whitespace is allowed, anything else is not.
 * Overflowing values and "inf" come back as signed infinities for the clamp.
 */
export function parseRewardValue(text: string): number | undefined {
  const trimmed = text.trim();
  const infinity = INFINITY_PATTERN.exec(trimmed);
  if (infinity) {
    return infinity[1] === '-' ? -Infinity : Infinity;
  }
  if (!NUMBER_PATTERN.test(trimmed)) return undefined;
  return Number(trimmed);
}

export function clampReward(value: number, maxValue: number): number {
  return Math.min(Math.max(0, value), maxValue);
}

/**
 * Estimates a reward for finished work. Never rejects: every failure
 * resolves to 0.
 */
export class RewardEstimator {
  constructor(
    private cache: IPromptCacheRepository,
    private completionClient: ICompletionClient,
    private options: RewardEstimatorOptions
  ) {}

  async estimateReward(
    background: string,
    chatMessages?: string,
    maxValue: number = 1.0
  ): Promise<number> {
    try {
      this.cache.cleanupExpired();

      const prompt = buildRewardPrompt(background, chatMessages, maxValue);

      const cached = this.cache.get(prompt, this.options.model);
      if (cached !== undefined) {
        const cachedValue = parseRewardValue(cached);
        if (cachedValue !== undefined) {
          console.error('[RewardEstimator] Using cached response');
          return clampReward(cachedValue, maxValue);
        }
        console.error(`[RewardEstimator] Invalid cached response format: ${JSON.stringify(cached)}, clearing cache`);
        this.cache.clear();
      }

      const answer = await this.completionClient.complete({
        model: this.options.model,
        systemPrompt: REWARD_SYSTEM_PROMPT,
        prompt,
        temperature: this.options.temperature,
      });

      const result = answer.trim();
      const value = parseRewardValue(result);
      if (value === undefined) {
        logError('RewardEstimator', `Invalid response format from provider: ${result}`);
        return 0;
      }

      const reward = clampReward(value, maxValue);
      this.cache.store(prompt, this.options.model, String(reward));
      return reward;
    } catch (error) {
      logError('RewardEstimator', error, undefined, 'HIGH');
      return 0;
    }
  }
}
