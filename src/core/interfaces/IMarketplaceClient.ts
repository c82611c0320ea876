import { ChatMessage, Instance, MarketResult, Proposal } from '../entities/Marketplace.js';

/**
 * Interface for the marketplace HTTP API.
 * Implementations never reject; every failure is a `MarketResult` with `ok: false`.
 */
export interface IMarketplaceClient {
  getProposals(): Promise<MarketResult<Proposal[]>>;

  getInstance(instanceId: string): Promise<MarketResult<Instance>>;

  getChat(instanceId: string): Promise<MarketResult<ChatMessage[]>>;

  sendMessage(instanceId: string, message: string): Promise<MarketResult<true>>;

  reportReward(instanceId: string, reward: number): Promise<MarketResult<unknown>>;
}
