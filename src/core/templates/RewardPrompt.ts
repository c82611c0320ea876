/**
 * Reward evaluation prompt.
 * Output depends only on the arguments, so identical inputs hit the same cache entry.
 */

export const REWARD_SYSTEM_PROMPT =
  'You are an AI that evaluates provider work quality and determines appropriate rewards.';

export function buildRewardPrompt(
  background: string,
  chatMessages: string | undefined,
  maxValue: number
): string {
  const parts = [
    `Evaluate the quality of work and determine a reward between 0 and ${maxValue}.`,
    'Consider:',
    '- Completeness of the solution',
    '- Code quality and best practices',
    '- Communication clarity',
    '- Problem-solving approach',
    '',
    'Background context:',
    background,
  ];

  if (chatMessages) {
    parts.push('', 'Conversation history:', chatMessages);
  }

  parts.push(
    '',
    `Provide ONLY a single float number between 0 and ${maxValue}.`,
    'Do not include any other text or explanations.'
  );

  return parts.join('\n');
}

/**
 * Whole rewards keep one decimal place ("1.0", "0.0") so the message always reads as a float
 */
export function formatReward(reward: number): string {
  return Number.isInteger(reward) ? reward.toFixed(1) : String(reward);
}

export function buildRewardMessage(reward: number): string {
  return `Estimated reward value: ${formatReward(reward)}`;
}
