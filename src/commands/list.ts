import { getViewerLogin, paginate, RepoListQuery } from '../services/github';
import type { CommandContext } from './context';

export interface ListOptions {
  user?: string;
  all?: boolean;
}

/**
 * Prints the non-archived repositories of `user` (the viewer by default)
 * whose default branch is still the source branch, or all of them with `all`.
 *
 * @returns Number of repositories printed
 */
export async function runList(ctx: CommandContext, options: ListOptions): Promise<number> {
  const user = options.user || (await getViewerLogin(ctx.client, ctx.logger));
  const query = new RepoListQuery(ctx.client, ctx.logger, {
    user,
    anyBranch: options.all ?? false,
    sourceBranch: ctx.settings.sourceBranch
  });

  let count = 0;
  for await (const repo of paginate(query)) {
    ctx.print(repo);
    count++;
  }
  ctx.logger.debug('Listed repositories', { user, count });
  return count;
}
