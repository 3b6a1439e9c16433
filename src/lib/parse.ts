import readline from 'readline';
import type { RepoPath } from '../types';
import { InputError } from './errors';

const TRUE_WORDS = new Set(['y', 'yes', 'true', 'on']);
const FALSE_WORDS = new Set(['n', 'no', 'false', 'off']);

/**
 * Splits `owner/name` into its parts.
 *
 * @throws {InputError} If there is not exactly one `/` or either side is empty
 */
export function parseRepoPath(input: string): RepoPath {
  const [owner, name, ...rest] = input.split('/');
  if (rest.length !== 0 || !owner || !name) {
    throw new InputError(`Provided owner/repo has the wrong number of fields: '${input}'`);
  }
  return { owner, name };
}

export function parseBool(input: string): boolean {
  const word = input.toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  throw new InputError(
    `Could not parse '${input}' as boolean, try yes/y/true/on or no/n/false/off`
  );
}

/**
 * Reads repository paths, one per line, from a stream such as stdin.
 *
 * Trailing whitespace is dropped and blank lines are skipped. Every line is
 * validated before anything is returned, so a bad line fails the whole batch
 * before any request goes out.
 */
export async function readRepoPaths(input: NodeJS.ReadableStream): Promise<string[]> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const paths: string[] = [];
  for await (const line of rl) {
    const trimmed = line.trimEnd();
    if (trimmed.length === 0) continue;
    parseRepoPath(trimmed);
    paths.push(trimmed);
  }
  return paths;
}
