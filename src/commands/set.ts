import type { RepoSettingsPatch } from '../types';
import { InputError } from '../lib/errors';
import { describeFailure, discardBody, patchRepository } from '../services/github';
import type { BatchSummary, CommandContext } from './context';

export interface SetOptions {
  allowSquashMerge?: boolean;
  allowRebaseMerge?: boolean;
  allowMergeCommit?: boolean;
}

/**
 * Builds the REST body from the flags that were given; unset flags are left out.
 *
 * @throws {InputError} If no setting was given
 */
export function buildSettingsPatch(options: SetOptions): RepoSettingsPatch {
  const body: RepoSettingsPatch = {};
  if (options.allowSquashMerge !== undefined) body.allow_squash_merge = options.allowSquashMerge;
  if (options.allowRebaseMerge !== undefined) body.allow_rebase_merge = options.allowRebaseMerge;
  if (options.allowMergeCommit !== undefined) body.allow_merge_commit = options.allowMergeCommit;
  if (Object.keys(body).length === 0) {
    throw new InputError('Nothing to set, pass at least one of --allow-squash-merge, --allow-rebase-merge, --allow-merge-commit');
  }
  return body;
}

/**
 * Applies the same settings patch to every repository, one after another.
 */
export async function runSet(
  ctx: CommandContext,
  repoPaths: readonly string[],
  body: RepoSettingsPatch
): Promise<BatchSummary> {
  const summary: BatchSummary = { processed: 0, failed: [] };
  for (const repoPath of repoPaths) {
    ctx.logger.info(`PATCH repo ${repoPath} with ${JSON.stringify(body)}`);
    const res = await patchRepository(ctx.token, repoPath, body);
    summary.processed++;
    if (res.status !== 200) {
      ctx.logger.error(`Got error updating settings in ${repoPath}: ${await describeFailure(res)}`);
      summary.failed.push(repoPath);
    } else {
      await discardBody(res);
    }
  }
  return summary;
}
