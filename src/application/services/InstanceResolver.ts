import { IMarketplaceClient } from '../../core/interfaces/IMarketplaceClient.js';
import {
  ChatMessage,
  Instance,
  InstanceToSolve,
  SolverMode,
  StatusCode,
  sameStatus,
} from '../../core/entities/Marketplace.js';
import { formatTranscript, sortMessages } from '../../utils/transcript.js';
import { logError } from '../../utils/retry.js';

export interface InstanceResolverOptions {
  mode: SolverMode;
  resolvedInstanceCode: StatusCode;
  counterpartyRole: string;
  maxConversationMessages: number;
  debug?: boolean;
}

/**
 * Assemble the per-cycle record from an instance and its raw transcript
 */
export function buildInstanceToSolve(
  instance: Instance,
  messages: readonly ChatMessage[],
  counterpartyRole: string,
  maxConversationMessages: number
): InstanceToSolve {
  if (messages.length === 0) {
    return { instance, messageCount: 0, providerNeedsResponse: false };
  }

  const sorted = sortMessages(messages);
  const last = sorted[sorted.length - 1];

  return {
    instance,
    messagesHistory: formatTranscript(sorted),
    messageCount: sorted.length,
    // Caps the back-and-forth between the responder and a human
    providerNeedsResponse:
      last.sender === counterpartyRole && sorted.length < maxConversationMessages,
  };
}

/**
 * Fetches an instance and its chat and decides whether it is eligible this cycle
 */
export class InstanceResolver {
  constructor(
    private marketplace: IMarketplaceClient,
    private options: InstanceResolverOptions
  ) {}

  private debugLog(message: string): void {
    if (this.options.debug) {
      console.error(`[DEBUG] [InstanceResolver] ${message}`);
    }
  }

  isEligible(instance: Instance): boolean {
    if (!sameStatus(instance.status, this.options.resolvedInstanceCode)) {
      this.debugLog(`Instance ${instance.id} has status ${String(instance.status)}, skipping`);
      return false;
    }

    if (
      this.options.mode === 'reward' &&
      (instance.reward_estimation_id === null || instance.reward_estimation_id === undefined)
    ) {
      this.debugLog(`Instance ${instance.id} has no reward estimation id, skipping`);
      return false;
    }

    return true;
  }

  async resolve(instanceId: string): Promise<InstanceToSolve | undefined> {
    try {
      const instanceResult = await this.marketplace.getInstance(instanceId);
      if (!instanceResult.ok) {
        logError('InstanceResolver', instanceResult.reason, instanceId);
        return undefined;
      }

      const instance = instanceResult.value;
      if (!this.isEligible(instance)) {
        return undefined;
      }

      const chatResult = await this.marketplace.getChat(instanceId);
      if (!chatResult.ok) {
        if (chatResult.kind === 'rejected') {
          this.debugLog(`Chat for ${instanceId} unavailable: ${chatResult.reason}`);
        } else {
          logError('InstanceResolver', chatResult.reason, instanceId);
        }
        return undefined;
      }

      return buildInstanceToSolve(
        instance,
        chatResult.value,
        this.options.counterpartyRole,
        this.options.maxConversationMessages
      );
    } catch (error) {
      logError('InstanceResolver', error, instanceId);
      return undefined;
    }
  }
}
