import { z } from 'zod';
import type { BranchInfo } from '../../types';
import { ApiError } from '../../lib/errors';
import { find, findExisting } from '../../lib/find';
import type { Logger } from '../../lib/logger';
import { parseRepoPath } from '../../lib/parse';
import { DEFAULT_SOURCE_BRANCH, REPOS_PAGE_SIZE } from '../../config/constants';
import type { GraphQLClient } from './client';
import { fromApiResponse, mapPage, type Page, type PagedQuery } from './pagination';
import { BRANCH_INFO_QUERY, USER_REPOS_QUERY, VIEWER_LOGIN_QUERY } from './queries';

const RepoNodeSchema = z.object({
  nameWithOwner: z.string(),
  isArchived: z.boolean(),
  defaultBranchRef: z.object({ name: z.string() }).nullable()
});

export type RepoListNode = z.infer<typeof RepoNodeSchema>;

export interface RepoListOptions {
  user: string;
  /** Keep repositories whatever their default branch is */
  anyBranch?: boolean;
  /** Default branch a repository must still have to be listed */
  sourceBranch?: string;
}

/**
 * Decides whether a repository node belongs in the listing.
 * Archived repositories never do; otherwise the default branch must be
 * `sourceBranch` unless `anyBranch` is set.
 */
export function shouldListRepo(
  repo: RepoListNode,
  options: { anyBranch: boolean; sourceBranch: string }
): boolean {
  if (repo.isArchived) return false;
  return options.anyBranch || repo.defaultBranchRef?.name === options.sourceBranch;
}

/**
 * Lists `nameWithOwner` of the repositories a user owns (forks excluded)
 * that still use the source branch as their default branch.
 *
 * @example
 * ```typescript
 * const query = new RepoListQuery(client, logger, { user: 'octocat' });
 * for await (const repo of paginate(query)) console.log(repo);
 * ```
 */
export class RepoListQuery implements PagedQuery<string> {
  private readonly user: string;
  private readonly anyBranch: boolean;
  private readonly sourceBranch: string;

  constructor(
    private readonly client: GraphQLClient,
    private readonly logger: Logger,
    options: RepoListOptions
  ) {
    this.user = options.user;
    this.anyBranch = options.anyBranch ?? false;
    this.sourceBranch = options.sourceBranch ?? DEFAULT_SOURCE_BRANCH;
  }

  async fetchPage(cursor: string | null): Promise<Page<string>> {
    this.logger.debug('Fetching repositories page', { user: this.user, cursor });
    const res = await this.client.query(USER_REPOS_QUERY, {
      who: this.user,
      first: REPOS_PAGE_SIZE,
      curs: cursor
    });
    const page = fromApiResponse('user.repositories.pageInfo', res, this.logger);

    return mapPage(page, (results) =>
      results.flatMap((data) => {
        const repos = z.array(RepoNodeSchema).parse(findExisting('user.repositories.nodes', data));
        if (repos.length === 0) {
          this.logger.debug('Repositories page is empty', { user: this.user });
        }
        const filter = { anyBranch: this.anyBranch, sourceBranch: this.sourceBranch };
        return repos.filter((repo) => shouldListRepo(repo, filter)).map((repo) => repo.nameWithOwner);
      })
    );
  }
}

/**
 * Fetches the login of the authenticated user
 *
 * @throws {ApiError} If the response carries GraphQL errors
 * @throws {MissingPathError} If the login is missing from the response
 */
export async function getViewerLogin(client: GraphQLClient, logger: Logger): Promise<string> {
  logger.debug('Fetching viewer login');
  const res = await client.query(VIEWER_LOGIN_QUERY);
  if (res.errors && res.errors.length > 0) {
    throw new ApiError('Failed to fetch viewer login', res.errors.map((e) => e.message));
  }
  const login = z.string().parse(findExisting('viewer.login', res.data));
  logger.debug(`Fetched viewer login: ${login}`);
  return login;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/**
 * Returns the opaque repository ID and the tip commit of `branch`.
 *
 * `branch` does not need to be fully qualified. Either field is null when
 * GitHub can't resolve it (unknown repository, no such branch); GraphQL
 * error messages are returned in `errors` for the caller to report.
 *
 * @param repoPath - Repository in `owner/name` form
 */
export async function getBranchInfo(
  client: GraphQLClient,
  repoPath: string,
  branch: string,
  logger?: Logger
): Promise<BranchInfo> {
  const { owner, name } = parseRepoPath(repoPath);
  const res = await client.query(BRANCH_INFO_QUERY, {
    owner,
    repoName: name,
    branch
  });
  for (const error of res.errors ?? []) {
    logger?.debug('Branch lookup returned an error', { repoPath, branch, error: error.message });
  }
  return {
    repositoryId: optionalString(find('repository.id', res.data)),
    tipOid: optionalString(find('repository.ref.target.oid', res.data)),
    errors: (res.errors ?? []).map((e) => e.message)
  };
}
