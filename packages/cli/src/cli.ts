#!/usr/bin/env node

/**
 * jira-branch-checker: report the Jira status of every ticket named in git branches.
 *
 * Usage: jira-branch-checker [--jira-url <url>] [--username <name>] [--format table|csv] ...
 */

import { Command, Option, type OptionValues } from 'commander';
import {
  CancelledError,
  GitCommandError,
  OUTPUT_FORMATS,
  SORT_MODES,
  exitCodeFor,
  getErrorMessage,
  loadEnv,
  type OutputFormat,
  type SortMode,
} from '@jira-branch-checker/shared';
import { runCheck, type CheckOptions } from './checker.js';
import { normalizeBaseUrl, resolveAppConfig, type AppConfig } from './config.js';
import { CredentialStore } from './credential-store.js';
import { createGit } from './git-branches.js';
import { Logger } from './output.js';
import { TerminalPrompter } from './prompter.js';

export const VERSION = '1.0.0';

const CANCELLED_MESSAGE = '\n\nOperation cancelled by user. Exiting...';

export interface CliOptions extends CheckOptions {
  repo: string;
}

export function createProgram(config: AppConfig): Command {
  return new Command()
    .name('jira-branch-checker')
    .description('Check Jira tickets in git branches')
    .version(VERSION)
    .option('--username <username>', 'Jira username/email', config.defaultUsername)
    .option('--jira-url <url>', 'Jira base URL', config.defaultJiraUrl)
    .option('--no-auth', 'Skip authentication (only for non-default Jira servers)')
    .option('--clear-token', 'Clear any saved token before running', false)
    .addOption(
      new Option('--format <format>', 'Output format').choices([...OUTPUT_FORMATS]).default('table')
    )
    .option('--no-progress', 'Disable progress indicator')
    .addOption(
      new Option('--sort <mode>', 'Sort results by status or ticket number')
        .choices([...SORT_MODES])
        .default('status')
    )
    .option('--repo <path>', 'Git working directory', '.');
}

/**
 * Narrow commander's untyped option bag
 */
export function toCliOptions(opts: OptionValues): CliOptions {
  const format: unknown = opts.format;
  const sort: unknown = opts.sort;
  const jiraUrl: unknown = opts.jiraUrl;
  const username: unknown = opts.username;
  const repo: unknown = opts.repo;

  if (!isOutputFormat(format)) {
    throw new Error(`Unsupported format: ${String(format)}`);
  }
  if (!isSortMode(sort)) {
    throw new Error(`Unsupported sort mode: ${String(sort)}`);
  }
  if (typeof jiraUrl !== 'string' || !jiraUrl.trim()) {
    throw new Error('A Jira URL is required');
  }

  return {
    jiraUrl: normalizeBaseUrl(jiraUrl),
    username: typeof username === 'string' && username ? username : undefined,
    noAuth: opts.auth === false,
    clearToken: opts.clearToken === true,
    format,
    sort,
    progress: opts.progress !== false,
    repo: typeof repo === 'string' ? repo : '.',
  };
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isSortMode(value: unknown): value is SortMode {
  return SORT_MODES.some((mode) => mode === value);
}

/**
 * Print a fatal error the way the run expects and return the exit code
 */
export function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof CancelledError) {
    logger.info(CANCELLED_MESSAGE);
  } else if (error instanceof GitCommandError) {
    logger.error(`Error getting git branches: ${error.stderr || error.message}`);
  } else {
    logger.error(`\nError: ${getErrorMessage(error)}`);
  }
  return exitCodeFor(error);
}

export async function main(argv: string[] = process.argv): Promise<number> {
  loadEnv(process.cwd());
  const config = resolveAppConfig();
  const options = toCliOptions(createProgram(config).parse(argv).opts());

  const logger = new Logger();
  const prompter = new TerminalPrompter();
  const store = new CredentialStore({ tokenFile: config.tokenFile, prompter, logger });

  try {
    await runCheck(options, { git: createGit(options.repo), store, logger });
    return 0;
  } catch (error) {
    return reportFailure(error, logger);
  } finally {
    prompter.close();
  }
}

if (require.main === module) {
  process.on('SIGINT', () => {
    new Logger().info(CANCELLED_MESSAGE);
    process.exit(0);
  });

  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Error: ${getErrorMessage(error)}`);
      process.exit(1);
    });
}
