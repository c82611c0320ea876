import fetch from 'node-fetch';
import { z } from 'zod';
import { ICompletionClient } from '../../core/interfaces/ICompletionClient.js';
import { CompletionMessage, CompletionRequest } from '../../core/entities/Completion.js';
import { CircuitBreaker, withTimeout } from '../../utils/retry.js';
import { CompletionError } from '../../utils/errors.js';
import { FetchFn } from './types.js';

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string(),
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

/**
 * OpenAI-compatible chat-completions client
 */
export class CompletionApiClient implements ICompletionClient {
  private circuitBreaker: CircuitBreaker;

  constructor(
    private apiUrl: string,
    private apiKey: string,
    private timeoutMs: number = 60000,
    circuitBreaker?: CircuitBreaker,
    private fetchFn: FetchFn = fetch
  ) {
    this.circuitBreaker = circuitBreaker || new CircuitBreaker(5, 60000);
  }

  async complete(request: CompletionRequest): Promise<string> {
    const messages: CompletionMessage[] = [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.prompt },
    ];

    const body: Record<string, unknown> = {
      model: request.model,
      messages,
    };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }

    return this.circuitBreaker.execute(() =>
      withTimeout(
        async (signal) => {
          const res = await this.fetchFn(`${this.apiUrl}/chat/completions`, {
            method: 'POST',
            headers: {
              'Content-Type': 'application/json',
              Authorization: `Bearer ${this.apiKey}`,
            },
            body: JSON.stringify(body),
            signal,
          });

          if (!res.ok) {
            throw new CompletionError(`HTTP error! status: ${res.status}`, request.model, res.status);
          }

          const data: unknown = await res.json();
          const parsed = ChatCompletionSchema.safeParse(data);
          if (!parsed.success) {
            throw new CompletionError('Unexpected completion payload', request.model);
          }

          return (parsed.data.choices[0].message.content ?? '').trim();
        },
        this.timeoutMs,
        `completion ${request.model}`
      )
    );
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }
}
