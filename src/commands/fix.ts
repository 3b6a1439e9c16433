import { createRef, describeFailure, discardBody, getBranchInfo, setDefaultBranch } from '../services/github';
import type { BatchSummary, CommandContext } from './context';

/**
 * Renames the default branch of one repository: branch `newBranch` off the
 * tip of the source branch, then make it the default.
 *
 * API-level failures are logged and the remaining steps still run.
 *
 * @returns Whether every step succeeded
 */
export async function fixRepository(
  ctx: CommandContext,
  repoPath: string,
  newBranch: string
): Promise<boolean> {
  const { client, logger, settings, token } = ctx;
  const sourceBranch = settings.sourceBranch;
  let ok = true;

  logger.info(`Processing ${repoPath}`);

  const info = await getBranchInfo(client, repoPath, sourceBranch, logger);
  logger.info(`>> ${repoPath} ${sourceBranch} is ${info.tipOid ?? 'unresolved'}`);
  if (info.repositoryId === null || info.tipOid === null) {
    const reason = info.errors.length > 0 ? ` (${info.errors.join('; ')})` : '';
    logger.warn(`Could not resolve ${sourceBranch} in ${repoPath}${reason}, the following steps will likely fail`, {
      repositoryId: info.repositoryId,
      tipOid: info.tipOid
    });
  }

  const refRes = await createRef(client, info.repositoryId, `refs/heads/${newBranch}`, info.tipOid);
  for (const error of refRes.errors ?? []) {
    logger.error(`Error making a new branch in ${repoPath}: ${error.message}`);
    ok = false;
  }

  const patchRes = await setDefaultBranch(token, repoPath, newBranch);
  if (patchRes.status !== 200) {
    logger.error(`Got error updating default branch in ${repoPath}: ${await describeFailure(patchRes)}`);
    ok = false;
  } else {
    await discardBody(patchRes);
  }

  logger.info(`Done ${repoPath}`);
  return ok;
}

/**
 * Runs {@link fixRepository} over every repository, one after another.
 * A failure in one repository doesn't stop the rest.
 */
export async function runFix(
  ctx: CommandContext,
  repoPaths: readonly string[],
  newBranch: string = ctx.settings.newBranch
): Promise<BatchSummary> {
  const summary: BatchSummary = { processed: 0, failed: [] };
  for (const repoPath of repoPaths) {
    const ok = await fixRepository(ctx, repoPath, newBranch);
    summary.processed++;
    if (!ok) summary.failed.push(repoPath);
  }
  if (summary.failed.length > 0) {
    ctx.logger.warn(`${summary.failed.length} of ${summary.processed} repositories had errors`, {
      failed: summary.failed
    });
  }
  return summary;
}
