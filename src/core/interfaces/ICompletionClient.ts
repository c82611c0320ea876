import { CompletionRequest } from '../entities/Completion.js';

/**
 * Interface for the AI completion provider
 */
export interface ICompletionClient {
  /**
   * Single request/response completion. Rejects on transport or provider errors.
   */
  complete(request: CompletionRequest): Promise<string>;
}
