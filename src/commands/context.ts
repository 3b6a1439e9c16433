import type { Settings } from '../config/config';
import type { Logger } from '../lib/logger';
import type { GraphQLClient } from '../services/github';

/**
 * Everything a command needs, built once by the CLI entry point
 */
export interface CommandContext {
  client: GraphQLClient;
  token: string;
  logger: Logger;
  settings: Settings;
  /** Writes one line of command output (stdout in the CLI) */
  print: (line: string) => void;
}

/**
 * Outcome of a per-repository batch command
 */
export interface BatchSummary {
  processed: number;
  failed: string[];
}
