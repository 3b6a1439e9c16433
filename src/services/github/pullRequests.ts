import { z } from 'zod';
import type { PrInfo, PullRequestState } from '../../types';
import { InputError } from '../../lib/errors';
import { findExisting } from '../../lib/find';
import type { Logger } from '../../lib/logger';
import { PR_FILES_PAGE_SIZE, PULL_REQUESTS_PAGE_SIZE } from '../../config/constants';
import type { GraphQLClient } from './client';
import { fromApiResponse, mapPage, paginate, type Page, type PagedQuery } from './pagination';
import { PR_FILES_QUERY } from './queries';

const PrNodeSchema = z.object({
  title: z.string(),
  url: z.string(),
  files: z.object({
    nodes: z.array(z.object({ path: z.string() })),
    pageInfo: z.object({ hasNextPage: z.boolean() })
  })
});

/** Tests a single changed file path */
export type Matcher = (file: string) => boolean;

/** Tests the full list of files a PR changes */
export type FilesMatcher = (files: readonly string[]) => boolean;

export type MatchMode = 'simple' | 're';

export type StatusFilter = 'open' | 'closed' | 'merged' | 'any';

const STATUS_MAP: Record<StatusFilter, PullRequestState[]> = {
  open: ['OPEN'],
  closed: ['CLOSED'],
  merged: ['MERGED'],
  any: ['OPEN', 'CLOSED', 'MERGED']
};

/**
 * Maps `--status` values to PR states. Nothing selected means open PRs only.
 */
export function statesFor(statuses: readonly StatusFilter[]): PullRequestState[] {
  const states = new Set<PullRequestState>();
  for (const status of statuses) {
    for (const state of STATUS_MAP[status]) states.add(state);
  }
  return states.size > 0 ? [...states] : ['OPEN'];
}

/** Exact path match; a leading `/` on the pattern is ignored */
export function matchSimple(pattern: string): Matcher {
  const wanted = pattern.startsWith('/') ? pattern.slice(1) : pattern;
  return (file) => file === wanted;
}

/**
 * Unanchored regular expression search
 *
 * @throws {InputError} If the pattern doesn't compile
 */
export function matchRegex(pattern: string): Matcher {
  let re: RegExp;
  try {
    re = new RegExp(pattern);
  } catch (error) {
    throw new InputError(`Invalid regular expression '${pattern}': ${error instanceof Error ? error.message : String(error)}`);
  }
  return (file) => re.test(file);
}

const MATCHERS: Record<MatchMode, (pattern: string) => Matcher> = {
  simple: matchSimple,
  re: matchRegex
};

export function makeMatcher(mode: MatchMode, pattern: string): Matcher {
  return MATCHERS[mode](pattern);
}

/**
 * A PR matches when at least one of its files satisfies every matcher.
 */
export function matchAllOnAnyFile(matchers: readonly Matcher[]): FilesMatcher {
  return (files) => files.some((file) => matchers.every((m) => m(file)));
}

export interface PrFilesOptions {
  owner: string;
  name: string;
  states: readonly PullRequestState[];
}

/**
 * Lists pull requests of a repository with the first 100 files each one changes.
 */
export class PrFilesQuery implements PagedQuery<PrInfo> {
  constructor(
    private readonly client: GraphQLClient,
    private readonly logger: Logger,
    private readonly options: PrFilesOptions
  ) {}

  async fetchPage(cursor: string | null): Promise<Page<PrInfo>> {
    const { owner, name, states } = this.options;
    const res = await this.client.query(PR_FILES_QUERY, {
      name,
      owner,
      after: cursor,
      states: [...states],
      first: PULL_REQUESTS_PAGE_SIZE,
      filesFirst: PR_FILES_PAGE_SIZE
    });
    const page = fromApiResponse('repository.pullRequests.pageInfo', res, this.logger);

    return mapPage(page, (results) =>
      results.flatMap((data) =>
        z.array(PrNodeSchema)
          .parse(findExisting('repository.pullRequests.nodes', data))
          .map((pr) => this.toPrInfo(pr))
      )
    );
  }

  private toPrInfo(pr: z.infer<typeof PrNodeSchema>): PrInfo {
    const info: PrInfo = {
      title: pr.title,
      url: pr.url,
      changedFiles: pr.files.nodes.map((f) => f.path)
    };
    if (pr.files.pageInfo.hasNextPage) {
      this.logger.warn(
        `Processed PR with >${PR_FILES_PAGE_SIZE} files, some will not be considered: '${info.title}' ${info.url}`
      );
    }
    return info;
  }
}

/**
 * Streams the pull requests of `owner/name` whose changed files satisfy `matcher`
 */
export async function* findPrsFor(
  client: GraphQLClient,
  logger: Logger,
  options: PrFilesOptions,
  matcher: FilesMatcher
): AsyncGenerator<PrInfo, void, undefined> {
  for await (const pr of paginate(new PrFilesQuery(client, logger, options))) {
    if (matcher(pr.changedFiles)) yield pr;
  }
}
