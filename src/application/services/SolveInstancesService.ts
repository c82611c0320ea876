import { IMarketplaceClient } from '../../core/interfaces/IMarketplaceClient.js';
import {
  InstanceToSolve,
  Proposal,
  StatusCode,
  sameStatus,
} from '../../core/entities/Marketplace.js';
import { buildRewardMessage } from '../../core/templates/RewardPrompt.js';
import { InstanceResolver } from './InstanceResolver.js';
import { RewardEstimator } from './RewardEstimator.js';
import { CodeReviewResponder } from './CodeReviewResponder.js';
import { logError } from '../../utils/retry.js';
import { parseMarketTimestamp } from '../../utils/timestamps.js';

export type InstanceOutcome = 'skipped' | 'responded' | 'submitted' | 'failed';

export interface CycleReport {
  startedAt: Date;
  aborted: boolean;
  proposals: number;
  outcomes: Array<{ instanceId: string; outcome: InstanceOutcome }>;
}

/**
 * Which responder this deployment runs
 */
export type Responder =
  | { mode: 'reward'; estimator: RewardEstimator }
  | { mode: 'review'; responder: CodeReviewResponder };

export interface SolveInstancesOptions {
  awardedProposalCode: StatusCode;
  proposalWindowHours: number;
  maxCreditPerInstance: number;
}

const HOUR_MS = 60 * 60 * 1000;

/**
 * Awarded proposals created strictly inside the trailing window
 */
export function filterAwardedProposals(
  proposals: readonly Proposal[],
  awardedProposalCode: StatusCode,
  windowHours: number,
  now: number
): Proposal[] {
  const windowStart = now - windowHours * HOUR_MS;

  return proposals.filter((proposal) => {
    if (!sameStatus(proposal.status, awardedProposalCode)) return false;
    const created = parseMarketTimestamp(proposal.creation_date);
    if (Number.isNaN(created)) {
      console.error(
        `[SolveInstances] Ignoring proposal for ${proposal.instance_id}: bad creation_date ${proposal.creation_date}`
      );
      return false;
    }
    return created > windowStart;
  });
}

/**
 * One polling cycle: list awarded proposals, resolve each instance and answer it.
 * Instances are handled one after another; a failure only affects its own instance.
 */
export class SolveInstancesService {
  constructor(
    private marketplace: IMarketplaceClient,
    private resolver: InstanceResolver,
    private responder: Responder,
    private options: SolveInstancesOptions,
    private now: () => number = Date.now
  ) {}

  async getAwardedProposals(now: number): Promise<Proposal[] | undefined> {
    const result = await this.marketplace.getProposals();
    if (!result.ok) {
      logError('SolveInstances', `Failed to get awarded proposals: ${result.reason}`, undefined, 'HIGH');
      return undefined;
    }

    const awarded = filterAwardedProposals(
      result.value,
      this.options.awardedProposalCode,
      this.options.proposalWindowHours,
      now
    );
    console.error(
      `[SolveInstances] Found ${awarded.length} awarded proposals in the last ${this.options.proposalWindowHours} hours`
    );
    return awarded;
  }

  async runCycle(): Promise<CycleReport> {
    const startedAt = this.now();
    const report: CycleReport = {
      startedAt: new Date(startedAt),
      aborted: false,
      proposals: 0,
      outcomes: [],
    };

    const proposals = await this.getAwardedProposals(startedAt);
    if (!proposals) {
      report.aborted = true;
      return report;
    }
    report.proposals = proposals.length;

    for (const proposal of proposals) {
      const instanceId = proposal.instance_id;
      let outcome: InstanceOutcome;
      try {
        outcome = await this.handleProposal(instanceId);
      } catch (error) {
        logError('SolveInstances', error, instanceId);
        outcome = 'failed';
      }
      report.outcomes.push({ instanceId, outcome });
    }

    const counts = report.outcomes.reduce<Record<InstanceOutcome, number>>(
      (acc, { outcome }) => {
        acc[outcome]++;
        return acc;
      },
      { skipped: 0, responded: 0, submitted: 0, failed: 0 }
    );
    console.error(
      `[SolveInstances] Cycle done: ${report.proposals} proposals, ${counts.submitted} submitted, ${counts.responded} responded, ${counts.skipped} skipped, ${counts.failed} failed`
    );

    return report;
  }

  private async handleProposal(instanceId: string): Promise<InstanceOutcome> {
    const record = await this.resolver.resolve(instanceId);
    if (!record) {
      return 'skipped';
    }

    if (this.responder.mode === 'reward') {
      return this.answerWithReward(record, this.responder.estimator);
    }
    return this.answerWithReview(record, this.responder.responder);
  }

  private async answerWithReward(
    record: InstanceToSolve,
    estimator: RewardEstimator
  ): Promise<InstanceOutcome> {
    const instanceId = record.instance.id;
    console.error(`[SolveInstances] Solving instance id: ${instanceId}`);

    const reward = await estimator.estimateReward(
      record.instance.background,
      record.messagesHistory,
      this.options.maxCreditPerInstance
    );

    if (reward < 0) {
      console.error(`[SolveInstances] Negative reward value for ${instanceId}, skipping instance`);
      return 'skipped';
    }

    const sent = await this.marketplace.sendMessage(instanceId, buildRewardMessage(reward));
    if (!sent.ok) {
      logError('SolveInstances', `Failed to send message: ${sent.reason}`, instanceId);
      return 'failed';
    }
    console.error(`[SolveInstances] Sent message to instance ${instanceId}`);

    const submitted = await this.marketplace.reportReward(instanceId, reward);
    if (!submitted.ok) {
      logError('SolveInstances', `Failed to submit reward: ${submitted.reason}`, instanceId);
      return 'responded';
    }
    console.error(`[SolveInstances] Submitted reward ${reward} for instance ${instanceId}`);
    return 'submitted';
  }

  private async answerWithReview(
    record: InstanceToSolve,
    responder: CodeReviewResponder
  ): Promise<InstanceOutcome> {
    const instanceId = record.instance.id;
    if (!record.providerNeedsResponse) {
      return 'skipped';
    }

    const message = await responder.solveInstance(record);
    if (!message) {
      return 'skipped';
    }

    const sent = await this.marketplace.sendMessage(instanceId, message);
    if (!sent.ok) {
      logError('SolveInstances', `Failed to send message: ${sent.reason}`, instanceId);
      return 'failed';
    }
    console.error(`[SolveInstances] Sent review message to instance ${instanceId}`);
    return 'responded';
  }
}
