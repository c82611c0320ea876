import { ICodeAgent } from '../../core/interfaces/ICodeAgent.js';
import { ICompletionClient } from '../../core/interfaces/ICompletionClient.js';
import { IPullRequestPageClient } from '../../core/interfaces/IPullRequestPageClient.js';
import { InstanceToSolve } from '../../core/entities/Marketplace.js';
import { NO_RESPONSE_NEEDED, ReviewContext } from '../../core/entities/Review.js';
import {
  CLEANUP_SYSTEM_PROMPT,
  buildCleanupPrompt,
  buildReviewInstruction,
} from '../../core/templates/ReviewPrompt.js';
import {
  extractForkCoordinates,
  extractIssueLink,
  filesUrlFor,
  findPullRequestUrl,
} from '../../utils/pullRequest.js';
import { errorMessage, logError } from '../../utils/retry.js';

export interface CodeReviewResponderOptions {
  agentModel: string;
  cleanupModel: string;
}

function needsNoResponse(text: string | undefined): boolean {
  return !text || text.trim().length === 0 || text.includes(NO_RESPONSE_NEEDED);
}

/**
 * Produces code-review replies through the code-modification agent and
 * strips out anything the conversation already covered.
 */
export class CodeReviewResponder {
  constructor(
    private agent: ICodeAgent,
    private completionClient: ICompletionClient,
    private pullRequestPages: IPullRequestPageClient,
    private options: CodeReviewResponderOptions
  ) {}

  /**
   * Best-effort enrichment from the pull request mentioned in the transcript.
   * Whatever cannot be found is simply left out.
   */
  async gatherContext(messagesHistory: string | undefined, instanceId?: string): Promise<ReviewContext> {
    const prUrl = messagesHistory ? findPullRequestUrl(messagesHistory) : undefined;
    if (!prUrl) {
      return {};
    }

    const context: ReviewContext = { prUrl, filesUrl: filesUrlFor(prUrl) };

    let html: string;
    try {
      html = await this.pullRequestPages.fetchPage(prUrl);
    } catch (error) {
      console.error(`[CodeReviewResponder] ⚠️ Could not fetch ${prUrl}: ${errorMessage(error)}`);
      return context;
    }

    const issueLink = extractIssueLink(html);
    if (issueLink) {
      context.issueLink = issueLink;
    } else {
      console.error(`[CodeReviewResponder] ⚠️ No issue link found on ${prUrl} (instance ${instanceId ?? '?'})`);
    }

    const coordinates = extractForkCoordinates(html);
    if (coordinates) {
      context.coordinates = coordinates;
    } else {
      console.error(`[CodeReviewResponder] ⚠️ No fork/branch found on ${prUrl} (instance ${instanceId ?? '?'})`);
    }

    return context;
  }

  /**
   * Resolves to the message to send, or undefined when no reply is owed
   */
  async solveInstance(record: InstanceToSolve): Promise<string | undefined> {
    const instanceId = record.instance.id;
    console.error(`[CodeReviewResponder] Solving instance id: ${instanceId}`);

    let rawResponse: string | undefined;
    try {
      const context = await this.gatherContext(record.messagesHistory, instanceId);
      const instruction = buildReviewInstruction(
        record.instance.background,
        record.messagesHistory,
        context
      );

      rawResponse = await this.agent.run({
        model: this.options.agentModel,
        instruction,
        coordinates: context.coordinates,
      });
    } catch (error) {
      logError('CodeReviewResponder', error, instanceId);
      return undefined;
    }

    if (rawResponse === undefined || needsNoResponse(rawResponse)) {
      console.error(`[CodeReviewResponder] No response needed for instance ${instanceId}`);
      return undefined;
    }

    return this.removeRepeatedContent(rawResponse, record.messagesHistory, instanceId);
  }

  /**
   * Keeps only requests that are new relative to the transcript.
   * Falls back to the raw response if the cleanup call fails.
   */
  async removeRepeatedContent(
    rawResponse: string,
    messagesHistory: string | undefined,
    instanceId?: string
  ): Promise<string | undefined> {
    let cleaned: string;
    try {
      cleaned = await this.completionClient.complete({
        model: this.options.cleanupModel,
        systemPrompt: CLEANUP_SYSTEM_PROMPT,
        prompt: buildCleanupPrompt(rawResponse, messagesHistory),
      });
    } catch (error) {
      logError('CodeReviewResponder', error, instanceId);
      return rawResponse.trim();
    }

    if (needsNoResponse(cleaned)) {
      return undefined;
    }
    return cleaned.trim();
  }
}
