import { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { PromptCacheRepository } from '../infrastructure/database/repositories/PromptCacheRepository.js';
import { MarketplaceApiClient } from '../infrastructure/http/MarketplaceApiClient.js';
import { CompletionApiClient } from '../infrastructure/http/CompletionApiClient.js';
import { PullRequestPageClient } from '../infrastructure/http/PullRequestPageClient.js';
import { ProcessCodeAgent } from '../infrastructure/agent/ProcessCodeAgent.js';
import { CircuitBreaker } from '../utils/retry.js';
import { RewardEstimator } from './services/RewardEstimator.js';
import { CodeReviewResponder } from './services/CodeReviewResponder.js';
import { InstanceResolver } from './services/InstanceResolver.js';
import { CycleReport, Responder, SolveInstancesService } from './services/SolveInstancesService.js';

/**
 * Wires configuration into the services and drives the polling loop
 */
export class SolverApp {
  private dbConnection: DatabaseConnection;
  private cacheRepo: PromptCacheRepository;
  private service: SolveInstancesService;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<CycleReport> | null = null;
  private stopped = false;

  constructor(private config: Config) {
    this.dbConnection = new DatabaseConnection(config.cache.dbPath);
    this.cacheRepo = new PromptCacheRepository(
      this.dbConnection.getDatabase(),
      config.cache.ttlSeconds
    );

    const marketplace = new MarketplaceApiClient(
      config.market.url,
      config.market.apiKey,
      config.market.requestTimeoutMs
    );
    const completionClient = new CompletionApiClient(
      config.completion.apiUrl,
      config.completion.apiKey,
      config.completion.timeoutMs,
      new CircuitBreaker(5, 60000)
    );

    const responder: Responder =
      config.solver.mode === 'reward'
        ? {
            mode: 'reward',
            estimator: new RewardEstimator(this.cacheRepo, completionClient, {
              model: config.completion.rewardModel,
              temperature: config.completion.temperature,
            }),
          }
        : {
            mode: 'review',
            responder: new CodeReviewResponder(
              new ProcessCodeAgent({
                command: config.agent.command,
                args: config.agent.args,
                timeoutMs: config.agent.timeoutMs,
                workdir: config.agent.workdir,
              }),
              completionClient,
              new PullRequestPageClient(config.market.requestTimeoutMs),
              {
                agentModel: config.agent.model,
                cleanupModel: config.completion.cleanupModel,
              }
            ),
          };

    const resolver = new InstanceResolver(marketplace, {
      mode: config.solver.mode,
      resolvedInstanceCode: config.market.resolvedInstanceCode,
      counterpartyRole: config.market.counterpartyRole,
      maxConversationMessages: config.market.maxConversationMessages,
      debug: config.solver.debug,
    });

    this.service = new SolveInstancesService(marketplace, resolver, responder, {
      awardedProposalCode: config.market.awardedProposalCode,
      proposalWindowHours: config.market.proposalWindowHours,
      maxCreditPerInstance: config.market.maxCreditPerInstance,
    });
  }

  printStats(): void {
    const stats = this.cacheRepo.getStatistics();
    console.error(
      `📊 Prompt cache: ${stats.totalEntries} entries (${stats.expiredEntries} expired), ${(this.dbConnection.getDatabaseSize() / 1024).toFixed(2)} KB`
    );
  }

  runCycle(): Promise<CycleReport> {
    console.error('[SolverApp] Solve instances handler');
    const cycle = this.service.runCycle().finally(() => {
      this.running = null;
    });
    this.running = cycle;
    return cycle;
  }

  /**
   * Run cycles back to back, waiting `pollIntervalSeconds` between the end of
   * one cycle and the start of the next
   */
  async start(): Promise<void> {
    if (this.config.solver.runOnce) {
      await this.runCycle();
      return;
    }

    const loop = async (): Promise<void> => {
      if (this.stopped) return;
      try {
        await this.runCycle();
      } catch (error) {
        console.error('[SolverApp] Cycle failed:', error);
      }
      if (!this.stopped) {
        this.timer = setTimeout(() => {
          void loop();
        }, this.config.solver.pollIntervalSeconds * 1000);
      }
    };

    await loop();
  }

  /**
   * Graceful shutdown: stop scheduling, let the current cycle finish, close the cache
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.running) {
      await this.running.catch((error: unknown) => {
        console.error('[SolverApp] Cycle failed during shutdown:', error);
      });
    }
    this.dbConnection.close();
  }
}
