import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { getAuthToken, getConfigPath, readConfig, resolveSettings, type Env, type Settings } from './config/config';
import { EXIT_INPUT, exitCodeFor, InputError, sanitizeError } from './lib/errors';
import { Logger } from './lib/logger';
import { parseBool, readRepoPaths } from './lib/parse';
import { createGraphQLClient, type GraphQLClient, type MatchMode, type StatusFilter } from './services/github';
import type { CommandContext } from './commands/context';
import { runList } from './commands/list';
import { runFix } from './commands/fix';
import { runFindPr } from './commands/findPr';
import { buildSettingsPatch, runSet } from './commands/set';

const STATUS_CHOICES: readonly StatusFilter[] = ['open', 'closed', 'merged', 'any'];

/**
 * Process-level collaborators, swapped out in tests
 */
export interface CliDeps {
  env: Env;
  stdin: NodeJS.ReadableStream;
  /** Command output */
  stdout: (text: string) => void;
  /** Log and error output */
  stderr: (text: string) => void;
  configFile?: string;
  createClient?: (token: string) => GraphQLClient;
}

function booleanOption(value: string): boolean {
  try {
    return parseBool(value);
  } catch (error) {
    if (error instanceof InputError) throw new InvalidArgumentError(error.message);
    throw error;
  }
}

function isStatus(value: string): value is StatusFilter {
  return STATUS_CHOICES.some((status) => status === value);
}

function collectStatus(value: string, previous: StatusFilter[]): StatusFilter[] {
  if (!isStatus(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${STATUS_CHOICES.join(', ')}.`);
  }
  return [...previous, value];
}

/**
 * Exit status shared between the command actions and {@link run}
 */
export interface RunStatus {
  exitCode: number;
}

/**
 * Builds the gh-graft command tree.
 *
 * Config, logger, token and client are created when a command runs, so
 * argument errors are reported before any of them is needed.
 */
export function createProgram(deps: CliDeps, status: RunStatus = { exitCode: 0 }): Command {
  const program = new Command();

  const makeContext = (): CommandContext => {
    const { verbose } = program.opts<{ verbose?: boolean }>();
    const bootLogger = new Logger({ name: 'gh-graft', level: verbose ? 'debug' : 'info', write: deps.stderr });
    const config = readConfig(deps.configFile ?? getConfigPath(), bootLogger.child('config'));
    const resolved = resolveSettings(deps.env, config);
    const settings: Settings = verbose ? { ...resolved, logLevel: 'debug' } : resolved;
    const logger = new Logger({ name: 'gh-graft', level: settings.logLevel, write: deps.stderr });
    const token = getAuthToken(deps.env, config);
    const client = deps.createClient ? deps.createClient(token) : createGraphQLClient(token);
    return { client, token, logger, settings, print: (line) => deps.stdout(`${line}\n`) };
  };

  program
    .name('gh-graft')
    .description('Bulk maintenance for GitHub repositories: list, rename default branches, find PRs, patch settings')
    .version('0.1.0')
    .option('-v, --verbose', 'Log debug output')
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr })
    .exitOverride()
    .showHelpAfterError();

  program
    .command('list')
    .description('List non-archived repositories that still use the source default branch')
    .argument('[user]', 'User to find repos of (defaults to the authenticated user)')
    .option('-a, --all', 'List repos with any default branch')
    .action(async (user: string | undefined, options: { all?: boolean }) => {
      await runList(makeContext(), { user, all: options.all });
    });

  program
    .command('fix')
    .description('Rename the default branch for a list of repos read from stdin')
    .argument('[new_branch]', 'New branch name (defaults to config newBranch, then main)')
    .action(async (newBranch: string | undefined) => {
      const ctx = makeContext();
      const repoPaths = await readRepoPaths(deps.stdin);
      const summary = await runFix(ctx, repoPaths, newBranch ?? ctx.settings.newBranch);
      if (summary.failed.length > 0) status.exitCode = 1;
    });

  program
    .command('find_pr')
    .description('Find pull requests touching the specified files')
    .argument('<repo>', 'Repo to find PRs on, as owner/name')
    .argument('[files...]', 'Files touched by the PR')
    .addOption(
      new Option('-m, --mode <mode>', 'Match mode')
        .choices(['simple', 're'])
        .default('simple')
    )
    .addOption(
      new Option('-s, --status <status>', 'PR status, repeatable: open, closed, merged, any')
        .argParser(collectStatus)
        .default([])
    )
    .action(async (repo: string, files: string[], options: { mode: MatchMode; status: StatusFilter[] }) => {
      await runFindPr(makeContext(), { repo, files, mode: options.mode, status: options.status });
    });

  program
    .command('set')
    .description('Set merge settings on a list of repos read from stdin')
    .option('--allow-squash-merge <bool>', 'Permit squash merge on this repo', booleanOption)
    .option('--allow-rebase-merge <bool>', 'Permit rebase merge on this repo', booleanOption)
    .option('--allow-merge-commit <bool>', 'Permit merge commits on this repo', booleanOption)
    .action(async (options: { allowSquashMerge?: boolean; allowRebaseMerge?: boolean; allowMergeCommit?: boolean }) => {
      const body = buildSettingsPatch(options);
      const ctx = makeContext();
      const repoPaths = await readRepoPaths(deps.stdin);
      const summary = await runSet(ctx, repoPaths, body);
      if (summary.failed.length > 0) status.exitCode = 1;
    });

  return program;
}

/**
 * Parses argv and runs the selected command, turning any error into a
 * message on stderr and an exit code.
 *
 * @returns The exit code to terminate with
 */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
  const status: RunStatus = { exitCode: 0 };
  const program = createProgram(deps, status);
  try {
    await program.parseAsync(argv);
    return status.exitCode;
  } catch (error) {
    // commander has already printed its own message (or help/version)
    if (error instanceof CommanderError) {
      return error.code === 'commander.invalidArgument' ? EXIT_INPUT : error.exitCode;
    }
    deps.stderr(`${chalk.red('✖')} ${sanitizeError(error)}\n`);
    return exitCodeFor(error);
  }
}
