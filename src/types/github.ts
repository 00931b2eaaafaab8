/**
 * Type definitions for GitHub repository enumeration
 */

export interface FeedConfig {
  githubToken?: string;
  baseUrl?: string;
  userAgent?: string;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  // Injected fetch implementation, used by tests to stay in process
  fetch?: typeof globalThis.fetch;
}

/**
 * Flattened metadata for one public repository, one CSV row
 */
export interface RepositoryRecord {
  id: number;
  node_id: string | null;
  name: string;
  full_name: string;
  owner: string;
  owner_type: string | null;
  private: boolean;
  visibility: string | null;
  description: string | null;
  fork: boolean;
  homepage: string | null;
  language: string | null;
  default_branch: string | null;
  topics: string[];
  license: string | null;
  archived: boolean | null;
  disabled: boolean | null;
  is_template: boolean | null;
  has_issues: boolean | null;
  has_projects: boolean | null;
  has_wiki: boolean | null;
  has_pages: boolean | null;
  has_downloads: boolean | null;
  has_discussions: boolean | null;
  forks_count: number | null;
  stargazers_count: number | null;
  watchers_count: number | null;
  subscribers_count: number | null;
  network_count: number | null;
  open_issues_count: number | null;
  size: number | null;
  created_at: string | null;
  updated_at: string | null;
  pushed_at: string | null;
  html_url: string;
  url: string;
  clone_url: string | null;
  git_url: string | null;
  ssh_url: string | null;
  svn_url: string | null;
  mirror_url: string | null;
}

export type RepositoryColumn = keyof RepositoryRecord;

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: number;
  used: number;
}

export interface SessionInfo {
  login: string | null;
  rateLimit: RateLimitInfo;
}

/**
 * Paginated "list all repositories after id X" capability
 */
export interface RepositoryFeed {
  pages(since: number | null, signal?: AbortSignal): AsyncIterable<unknown[]>;
  fetchRepository(id: number, signal?: AbortSignal): Promise<unknown | null>;
}
