import { RepositoryCoordinates } from '../core/entities/Review.js';

const PR_URL_PATTERN = /https:\/\/github\.com\/[\w.-]+\/[\w.-]+\/pull\/\d+/g;
const ISSUE_URL_PATTERN = /https:\/\/github\.com\/[\w.-]+\/[\w.-]+\/issues\/\d+/;
// <span title="owner/repo:branch" class="commit-ref head-ref">
const HEAD_REF_PATTERN =
  /title="([\w.-]+)\/([\w.-]+):([^"\s]+)"[^>]*class="[^"]*head-ref/;
const HEAD_REF_PATTERN_REVERSED =
  /class="[^"]*head-ref[^"]*"[^>]*title="([\w.-]+)\/([\w.-]+):([^"\s]+)"/;

/**
 * Last pull-request URL mentioned in the text, if any
 */
export function findPullRequestUrl(text: string): string | undefined {
  const matches = text.match(PR_URL_PATTERN);
  if (!matches || matches.length === 0) return undefined;
  return matches[matches.length - 1];
}

export function filesUrlFor(prUrl: string): string {
  return `${prUrl}/files`;
}

export function extractIssueLink(html: string): string | undefined {
  const match = html.match(ISSUE_URL_PATTERN);
  return match ? match[0] : undefined;
}

/**
 * Fork owner, repository and branch from the PR page head-ref marker
 */
export function extractForkCoordinates(html: string): RepositoryCoordinates | undefined {
  const match = html.match(HEAD_REF_PATTERN) ?? html.match(HEAD_REF_PATTERN_REVERSED);
  if (!match) return undefined;

  const [, owner, repo, branch] = match;
  return {
    repoUrl: `https://github.com/${owner}/${repo}`,
    branch: decodeHtmlEntities(branch),
  };
}

function decodeHtmlEntities(value: string): string {
  return value
    .replace(/&amp;/g, '&')
    .replace(/&#39;/g, "'")
    .replace(/&quot;/g, '"')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>');
}
