/**
 * Repository coordinates scraped from a pull-request page
 */
export interface RepositoryCoordinates {
  repoUrl: string;
  branch: string;
}

/**
 * Context gathered for a code review. Each field is independent and may be
 * missing when the page did not reveal it.
 */
export interface ReviewContext {
  prUrl?: string;
  filesUrl?: string;
  issueLink?: string;
  coordinates?: RepositoryCoordinates;
}

export interface AgentRequest {
  model: string;
  instruction: string;
  coordinates?: RepositoryCoordinates;
}

export const NO_RESPONSE_NEEDED = 'NO_RESPONSE_NEEDED';
