import type { Maybe } from '../../types';
import type { GraphQLClient, GraphQLResponse } from './client';
import { CREATE_REF_MUTATION } from './queries';

/**
 * Creates a new git ref pointing at an existing commit.
 *
 * The response is returned as-is; the caller decides what to do with any
 * `errors` (the `fix` command logs them and moves on).
 *
 * @param repositoryId - Opaque repository ID from `getBranchInfo`
 * @param qualifiedBranch - Fully qualified branch name, i.e. `refs/heads/...`
 * @param oid - Object ID of the commit the new branch starts at
 * @example
 * ```typescript
 * const res = await createRef(client, info.repositoryId, 'refs/heads/main', info.tipOid);
 * res.errors?.forEach((e) => logger.error(e.message));
 * ```
 */
export async function createRef(
  client: GraphQLClient,
  repositoryId: Maybe<string>,
  qualifiedBranch: string,
  oid: Maybe<string>
): Promise<GraphQLResponse> {
  return client.query(CREATE_REF_MUTATION, {
    repoId: repositoryId,
    branch: qualifiedBranch,
    newSha: oid
  });
}
