/**
 * Error types raised by the HTTP and process clients.
 * Services catch these and turn them into log records.
 */

export class MarketplaceError extends Error {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'MarketplaceError';
  }
}

export class CompletionError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export class AgentError extends Error {
  constructor(
    message: string,
    public readonly exitCode?: number | null
  ) {
    super(message);
    this.name = 'AgentError';
  }
}
