import chalk from 'chalk';
import type { PrInfo } from '../types';
import { parseRepoPath } from '../lib/parse';
import {
  findPrsFor,
  makeMatcher,
  matchAllOnAnyFile,
  statesFor,
  type MatchMode,
  type StatusFilter
} from '../services/github';
import type { CommandContext } from './context';

export interface FindPrOptions {
  repo: string;
  files: string[];
  mode: MatchMode;
  status: StatusFilter[];
}

/**
 * Renders a matched PR: blank line, bold title, URL, then one `- path` per file
 */
export function formatPrInfo(pr: PrInfo): string {
  const filesBlock = pr.changedFiles.map((file) => `- ${file}`).join('\n');
  return `\n${chalk.bold(pr.title)}\n${pr.url}\n${filesBlock}`;
}

/**
 * Prints pull requests of `repo` touching the given files.
 *
 * Patterns and the repository path are validated before anything is fetched.
 *
 * @returns Number of pull requests printed
 */
export async function runFindPr(ctx: CommandContext, options: FindPrOptions): Promise<number> {
  const { owner, name } = parseRepoPath(options.repo);
  const matcher = matchAllOnAnyFile(options.files.map((pattern) => makeMatcher(options.mode, pattern)));
  const states = statesFor(options.status);
  ctx.logger.debug('Searching pull requests', { owner, name, states, mode: options.mode });

  let count = 0;
  for await (const pr of findPrsFor(ctx.client, ctx.logger, { owner, name, states }, matcher)) {
    ctx.print(formatPrInfo(pr));
    count++;
  }
  return count;
}
