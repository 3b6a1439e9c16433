/**
 * Core type definitions for gh-graft
 *
 * @module types
 */

/**
 * Utility type representing a value that may be null
 */
export type Maybe<T> = T | null;

/**
 * A repository reference split into its owner and name
 */
export interface RepoPath {
  owner: string;
  name: string;
}

/**
 * Pull request state accepted by the `pullRequests(states:)` connection
 */
export type PullRequestState = 'OPEN' | 'CLOSED' | 'MERGED';

/**
 * Read-only view of one pull request and the files it changes.
 *
 * `changedFiles` holds at most the first 100 paths; longer PRs are reported
 * with a warning when the page is mapped.
 */
export interface PrInfo {
  title: string;
  url: string;
  changedFiles: string[];
}

/**
 * Resolved tip of a branch together with the repository it lives in.
 * Either half is null when GitHub returns a null relation.
 */
export interface BranchInfo {
  repositoryId: Maybe<string>;
  tipOid: Maybe<string>;
  /** Messages of any GraphQL errors returned by the lookup */
  errors: string[];
}

/**
 * Repository settings that the `set` command can patch, in REST field names
 */
export interface RepoSettingsPatch {
  allow_squash_merge?: boolean;
  allow_rebase_merge?: boolean;
  allow_merge_commit?: boolean;
  default_branch?: string;
}
