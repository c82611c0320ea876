/**
 * Interface for fetching the rendered HTML of a hosted pull request
 */
export interface IPullRequestPageClient {
  fetchPage(prUrl: string): Promise<string>;
}
