import { z } from 'zod';
import { ApiError } from '../../lib/errors';
import { findExisting } from '../../lib/find';
import type { Logger } from '../../lib/logger';
import type { GraphQLResponse } from './client';

/**
 * One page of results plus the cursor for the next one.
 * `cursor` is null when there are no further pages; an empty cursor also
 * ends the walk.
 */
export interface Page<T> {
  readonly results: readonly T[];
  readonly cursor: string | null;
}

/**
 * Anything that can fetch one page given the previous page's cursor.
 * Implementations keep no iteration state of their own.
 */
export interface PagedQuery<T> {
  fetchPage(cursor: string | null): Promise<Page<T>>;
}

const PageInfoSchema = z.object({
  hasNextPage: z.boolean(),
  endCursor: z.string().nullable()
});

export function mapPage<T, U>(page: Page<T>, f: (results: readonly T[]) => U[]): Page<U> {
  return { results: f(page.results), cursor: page.cursor };
}

/**
 * Builds a raw page from a GraphQL response.
 *
 * Any `errors` in the response abort the listing, even when page info is
 * present. The single raw result is the whole `data` object; the concrete
 * query maps it to its own item type with {@link mapPage}.
 *
 * @param pageInfoPath - Dot path of the `pageInfo` object inside `data`
 * @throws {ApiError} If the response carries GraphQL errors
 * @throws {MissingPathError} If `data` or the page info is missing
 */
export function fromApiResponse(
  pageInfoPath: string,
  response: GraphQLResponse,
  logger: Logger
): Page<unknown> {
  const errors = response.errors ?? [];
  if (errors.length > 0) {
    for (const error of errors) {
      logger.error(`Error in GraphQL response: ${error.message}`);
    }
    throw new ApiError('Errors in GraphQL response', errors.map((e) => e.message));
  }

  const data = findExisting('data', response);
  const pageInfo = PageInfoSchema.parse(findExisting(pageInfoPath, data));
  logger.debug('pageInfo', pageInfo);

  return {
    results: [data],
    cursor: pageInfo.hasNextPage ? pageInfo.endCursor : null
  };
}

/**
 * Walks every page of a query, yielding items in API order.
 *
 * Exactly one page is requested at a time, and the next request only goes
 * out once the consumer has taken every item of the current page. The
 * returned generator is single-use.
 *
 * @example
 * ```typescript
 * for await (const repo of paginate(new RepoListQuery(client, logger, { user: 'octocat' }))) {
 *   console.log(repo);
 * }
 * ```
 */
export async function* paginate<T>(query: PagedQuery<T>): AsyncGenerator<T, void, undefined> {
  let cursor: string | null = null;
  do {
    const page: Page<T> = await query.fetchPage(cursor);
    yield* page.results;
    cursor = page.cursor;
  } while (cursor);
}

/**
 * Drains an async iterable into an array
 */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}
