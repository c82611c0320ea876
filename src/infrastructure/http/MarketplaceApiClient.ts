import fetch from 'node-fetch';
import { z } from 'zod';
import { IMarketplaceClient } from '../../core/interfaces/IMarketplaceClient.js';
import {
  ChatErrorSchema,
  ChatMessage,
  ChatMessageListSchema,
  Instance,
  InstanceSchema,
  MarketResult,
  Proposal,
  ProposalListSchema,
  marketFailure,
  marketOk,
} from '../../core/entities/Marketplace.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, errorMessage, withTimeout } from '../../utils/retry.js';
import { MarketplaceError } from '../../utils/errors.js';
import { FetchFn } from './types.js';

type HttpMethod = 'GET' | 'POST' | 'PUT';

/**
 * Marketplace API client
 *
 * Every call is bounded by a fixed timeout and never retried. Non-2xx
 * answers, transport errors and payloads that do not match the expected
 * shape all come back as `{ ok: false }`.
 */
export class MarketplaceApiClient implements IMarketplaceClient {
  constructor(
    private baseUrl: string,
    private apiKey: string,
    private timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
    private fetchFn: FetchFn = fetch
  ) {}

  getProposals(): Promise<MarketResult<Proposal[]>> {
    return this.request('GET', '/v1/proposals/', ProposalListSchema);
  }

  getInstance(instanceId: string): Promise<MarketResult<Instance>> {
    return this.request('GET', `/v1/instances/${encodeURIComponent(instanceId)}`, InstanceSchema);
  }

  async getChat(instanceId: string): Promise<MarketResult<ChatMessage[]>> {
    const result = await this.request(
      'GET',
      `/v1/chat/${encodeURIComponent(instanceId)}`,
      z.unknown()
    );
    if (!result.ok) return result;

    const payload = result.value;
    if (payload === null || payload === undefined) {
      return marketOk([]);
    }

    const messages = ChatMessageListSchema.safeParse(payload);
    if (messages.success) {
      return marketOk(messages.data);
    }

    const errorPayload = ChatErrorSchema.safeParse(payload);
    if (errorPayload.success && errorPayload.data.detail) {
      return marketFailure('rejected', `chat error payload: ${JSON.stringify(errorPayload.data.detail)}`);
    }

    return marketFailure('invalid', 'unexpected chat payload');
  }

  async sendMessage(instanceId: string, message: string): Promise<MarketResult<true>> {
    const result = await this.request(
      'POST',
      `/v1/chat/send-message/${encodeURIComponent(instanceId)}`,
      z.unknown(),
      { message }
    );
    return result.ok ? marketOk<true>(true) : result;
  }

  reportReward(instanceId: string, reward: number): Promise<MarketResult<unknown>> {
    return this.request(
      'PUT',
      `/v1/instances/${encodeURIComponent(instanceId)}/report-reward`,
      z.unknown(),
      { gen_reward: reward }
    );
  }

  private async request<S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    schema: S,
    body?: Record<string, unknown>
  ): Promise<MarketResult<z.output<S>>> {
    const url = `${this.baseUrl}${path}`;

    try {
      const payload = await withTimeout(
        async (signal) => {
          const headers: Record<string, string> = {
            'x-api-key': this.apiKey,
            Accept: 'application/json',
          };
          if (body) {
            headers['Content-Type'] = 'application/json';
          }

          const res = await this.fetchFn(url, {
            method,
            headers,
            body: body ? JSON.stringify(body) : undefined,
            signal,
          });

          if (!res.ok) {
            throw new MarketplaceError(`HTTP error! status: ${res.status}`, path, res.status);
          }

          const text = await res.text();
          const data: unknown = text.length > 0 ? JSON.parse(text) : null;
          return data;
        },
        this.timeoutMs,
        `${method} ${path}`
      );

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        return marketFailure('invalid', `invalid payload from ${method} ${path}: ${parsed.error.message}`);
      }
      return marketOk(parsed.data);
    } catch (error) {
      const status = error instanceof MarketplaceError ? error.status : undefined;
      return marketFailure('transport', `${method} ${path} failed: ${errorMessage(error)}`, status);
    }
  }
}
