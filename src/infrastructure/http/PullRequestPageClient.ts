import fetch from 'node-fetch';
import { IPullRequestPageClient } from '../../core/interfaces/IPullRequestPageClient.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, withTimeout } from '../../utils/retry.js';
import { FetchFn } from './types.js';

/**
 * Fetches the rendered HTML of a pull-request page
 */
export class PullRequestPageClient implements IPullRequestPageClient {
  constructor(
    private timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS,
    private fetchFn: FetchFn = fetch
  ) {}

  fetchPage(prUrl: string): Promise<string> {
    return withTimeout(
      async (signal) => {
        const res = await this.fetchFn(prUrl, {
          method: 'GET',
          headers: { Accept: 'text/html' },
          signal,
        });
        if (!res.ok) {
          throw new Error(`HTTP error! status: ${res.status}`);
        }
        return res.text();
      },
      this.timeoutMs,
      `GET ${prUrl}`
    );
  }
}
