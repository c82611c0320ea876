import { NO_RESPONSE_NEEDED, ReviewContext } from '../entities/Review.js';

export const REVIEWER_SYSTEM_PROMPT = [
  'You are a meticulous code reviewer acting for the person who requested this work.',
  'Review the changes in the pull request against the task description.',
  'Either reply with concrete review feedback and questions for the provider,',
  `or, if the work needs nothing further, reply with exactly "${NO_RESPONSE_NEEDED}".`,
].join('\n');

export const CLEANUP_SYSTEM_PROMPT =
  'You condense code-review feedback so the author only receives requests they have not seen before.';

/**
 * Instruction handed to the code-modification agent
 */
export function buildReviewInstruction(
  background: string,
  messagesHistory: string | undefined,
  context: ReviewContext
): string {
  const parts = [REVIEWER_SYSTEM_PROMPT, '', 'Task description:', background];

  if (context.prUrl) {
    parts.push('', `Pull request: ${context.prUrl}`);
  }
  if (context.filesUrl) {
    parts.push(`Changed files: ${context.filesUrl}`);
  }
  if (context.issueLink) {
    parts.push(`Related issue: ${context.issueLink}`);
  }
  if (messagesHistory) {
    parts.push('', 'Conversation so far:', messagesHistory);
  }

  return parts.join('\n');
}

/**
 * Prompt for the pass that drops feedback already present in the conversation
 */
export function buildCleanupPrompt(rawResponse: string, messagesHistory: string | undefined): string {
  return [
    'Below is a draft code review and the conversation that preceded it.',
    'Extract only the new, substantive code-change requests that are NOT already',
    'present in the conversation. Leave out any remarks about commits, commit',
    'messages, branches or pull-request housekeeping.',
    `If nothing new remains, reply with exactly "${NO_RESPONSE_NEEDED}".`,
    'Otherwise reply with the cleaned review message only.',
    '',
    'Conversation:',
    messagesHistory ?? '(no previous messages)',
    '',
    'Draft review:',
    rawResponse,
  ].join('\n');
}
