import type { RepoSettingsPatch } from '../../types';
import { API_BASE, REST_ACCEPT, USER_AGENT } from '../../config/constants';
import { parseRepoPath } from '../../lib/parse';

/**
 * Partially updates a repository's settings using GitHub REST API
 *
 * The GraphQL API can't change the default branch or merge settings, so this
 * goes through `PATCH /repos/{owner}/{repo}`. The raw response is returned
 * and a non-200 status is not thrown; callers report it.
 *
 * @param token - GitHub personal access token with repo scope
 * @param repoPath - Repository in `owner/name` form
 * @param body - Fields to change
 * @example
 * ```typescript
 * const res = await patchRepository(token, 'octocat/hello-world', { allow_squash_merge: false });
 * if (res.status !== 200) console.error(await describeFailure(res));
 * ```
 */
export async function patchRepository(
  token: string,
  repoPath: string,
  body: RepoSettingsPatch
): Promise<Response> {
  const { owner, name } = parseRepoPath(repoPath);
  const url = `${API_BASE}/repos/${owner}/${name}`;

  return fetch(url, {
    method: 'PATCH',
    headers: {
      'Authorization': `token ${token}`,
      'Accept': REST_ACCEPT,
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT
    },
    body: JSON.stringify(body)
  });
}

/**
 * Sets the default branch of a repository.
 *
 * `branch` must be the short name (`main`, not `refs/heads/main`); GitHub
 * misbehaves when given a fully qualified ref here.
 */
export async function setDefaultBranch(
  token: string,
  repoPath: string,
  branch: string
): Promise<Response> {
  return patchRepository(token, repoPath, { default_branch: branch });
}

/**
 * Releases the connection behind a response whose body is not needed
 */
export async function discardBody(res: Response): Promise<void> {
  await res.body?.cancel();
}

/**
 * Best-effort description of a failed REST response for logging
 */
export async function describeFailure(res: Response): Promise<string> {
  let detail = '';
  try {
    const text = await res.text();
    try {
      const body: unknown = JSON.parse(text);
      detail = typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string'
        ? body.message
        : text;
    } catch {
      detail = text;
    }
  } catch (error) {
    detail = `<unreadable body: ${error instanceof Error ? error.message : String(error)}>`;
  }
  return detail ? `status ${res.status}: ${detail}` : `status ${res.status}`;
}
