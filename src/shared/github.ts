/**
 * GitHub API client wrapper
 * Issue listing, pull request creation and repository lookups used by triage and fix attempts
 */

import { getOctokit } from '@actions/github';
import { ConfigError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { GOOD_FIRST_ISSUE_QUERY_LABELS } from '../triage/labels.js';
import type { RawIssue } from '../triage/index.js';

const log = createLogger('github');

export type IssueState = 'open' | 'closed' | 'all';

export interface ListIssuesOptions {
  labels?: string[];
  state?: IssueState;
  limit?: number;
}

// Pull request creation parameters
export interface CreatePRParams {
  title: string;
  body: string;
  head: string;
  base: string;
}

export interface CreatedPullRequest {
  number: number;
  url: string;
  title: string;
}

export interface IssueDetails {
  number: number;
  title: string;
  body: string;
  state: string;
  labels: string[];
}

export interface ForkedRepository {
  fullName: string;
  cloneUrl: string;
  htmlUrl: string;
}

/**
 * Code-hosting platform used to find issues and publish fixes
 */
export interface PlatformClient {
  listIssues(owner: string, repo: string, options?: ListIssuesOptions): Promise<RawIssue[]>;
  listGoodFirstIssues(owner: string, repo: string, limit?: number): Promise<RawIssue[]>;
  getIssue(owner: string, repo: string, issueNumber: number): Promise<IssueDetails>;
  createPullRequest(owner: string, repo: string, params: CreatePRParams): Promise<CreatedPullRequest>;
  /** Login of the authenticated user */
  getCurrentUser(): Promise<string>;
  /** Login of the repository's owner */
  getRepositoryOwner(owner: string, repo: string): Promise<string>;
}

export const DEFAULT_ISSUE_LIMIT = 30;
const MAX_PAGE_SIZE = 100;

type IssueLabel = string | { name?: string | null };

function labelNames(labels: IssueLabel[]): string[] {
  return labels
    .map(label => (typeof label === 'string' ? label : label.name ?? ''))
    .filter(name => name.length > 0);
}

/**
 * GitHub API client
 */
export class GitHubClient implements PlatformClient {
  private octokit: ReturnType<typeof getOctokit>;
  private cachedLogin?: string;

  /**
   * @param token - GitHub token (PAT or workflow token)
   */
  constructor(token: string) {
    if (!token) {
      throw new ConfigError('GITHUB_TOKEN is required for GitHub operations');
    }
    this.octokit = getOctokit(token);
  }

  /**
   * List issues, pull requests excluded
   * @returns At most `limit` issues; fewer when pull requests were among the first `limit` results
   */
  async listIssues(owner: string, repo: string, options: ListIssuesOptions = {}): Promise<RawIssue[]> {
    const limit = options.limit ?? DEFAULT_ISSUE_LIMIT;
    try {
      const { data } = await this.octokit.rest.issues.listForRepo({
        owner,
        repo,
        state: options.state ?? 'open',
        labels: options.labels && options.labels.length > 0 ? options.labels.join(',') : undefined,
        per_page: Math.min(Math.max(limit, 1), MAX_PAGE_SIZE)
      });

      return data
        .slice(0, limit)
        .filter(issue => !issue.pull_request)
        .map(issue => ({
          number: issue.number,
          title: issue.title,
          body: issue.body || '',
          labels: labelNames(issue.labels),
          url: issue.html_url,
          comments: issue.comments,
          assignees: (issue.assignees ?? []).map(assignee => assignee.login),
          createdAt: issue.created_at
        }));
    } catch (error) {
      throw new Error(`Failed to list issues for ${owner}/${repo}: ${errorMessage(error)}`);
    }
  }

  /**
   * Issues carrying a beginner label, one query per label, de-duplicated by number.
   * A label whose query fails is skipped.
   */
  async listGoodFirstIssues(owner: string, repo: string, limit = 10): Promise<RawIssue[]> {
    const seen = new Set<number>();
    const result: RawIssue[] = [];
    for (const label of GOOD_FIRST_ISSUE_QUERY_LABELS) {
      let issues: RawIssue[];
      try {
        issues = await this.listIssues(owner, repo, { labels: [label], limit });
      } catch (error) {
        log.warn(`Skipping label "${label}": ${errorMessage(error)}`);
        continue;
      }
      for (const issue of issues) {
        if (!seen.has(issue.number)) {
          seen.add(issue.number);
          result.push(issue);
        }
      }
    }
    return result.slice(0, limit);
  }

  /**
   * Get issue details
   */
  async getIssue(owner: string, repo: string, issueNumber: number): Promise<IssueDetails> {
    try {
      const { data } = await this.octokit.rest.issues.get({
        owner,
        repo,
        issue_number: issueNumber
      });

      return {
        number: data.number,
        title: data.title,
        body: data.body || '',
        state: data.state,
        labels: labelNames(data.labels)
      };
    } catch (error) {
      throw new Error(`Failed to get issue #${issueNumber}: ${errorMessage(error)}`);
    }
  }

  async createPullRequest(owner: string, repo: string, params: CreatePRParams): Promise<CreatedPullRequest> {
    try {
      const { data } = await this.octokit.rest.pulls.create({
        owner,
        repo,
        title: params.title,
        body: params.body,
        head: params.head,
        base: params.base
      });

      return { number: data.number, url: data.html_url, title: data.title };
    } catch (error) {
      throw new Error(
        `Failed to create PR from ${params.head} to ${params.base}: ${errorMessage(error)}`
      );
    }
  }

  async getCurrentUser(): Promise<string> {
    if (this.cachedLogin) {
      return this.cachedLogin;
    }
    try {
      const { data } = await this.octokit.rest.users.getAuthenticated();
      this.cachedLogin = data.login;
      return data.login;
    } catch (error) {
      throw new Error(`Failed to get authenticated user: ${errorMessage(error)}`);
    }
  }

  async getRepositoryOwner(owner: string, repo: string): Promise<string> {
    try {
      const { data } = await this.octokit.rest.repos.get({ owner, repo });
      return data.owner.login;
    } catch (error) {
      throw new Error(`Failed to get repository ${owner}/${repo}: ${errorMessage(error)}`);
    }
  }

  /**
   * Fork a repository into the authenticated user's account
   */
  async forkRepository(owner: string, repo: string): Promise<ForkedRepository> {
    try {
      const { data } = await this.octokit.rest.repos.createFork({ owner, repo });
      return { fullName: data.full_name, cloneUrl: data.clone_url, htmlUrl: data.html_url };
    } catch (error) {
      throw new Error(`Failed to fork ${owner}/${repo}: ${errorMessage(error)}`);
    }
  }

  async getCloneUrl(owner: string, repo: string, useSsh = false): Promise<string> {
    try {
      const { data } = await this.octokit.rest.repos.get({ owner, repo });
      return useSsh ? data.ssh_url : data.clone_url;
    } catch (error) {
      throw new Error(`Failed to get repository ${owner}/${repo}: ${errorMessage(error)}`);
    }
  }
}
