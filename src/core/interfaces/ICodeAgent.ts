import { AgentRequest } from '../entities/Review.js';

/**
 * Interface for the external code-modification agent
 */
export interface ICodeAgent {
  /**
   * Ask the agent to act on a repository and report back.
   * Resolves to undefined when the agent produced nothing.
   */
  run(request: AgentRequest): Promise<string | undefined>;
}
