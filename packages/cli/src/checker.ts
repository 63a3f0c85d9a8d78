import {
  AuthenticationError,
  type JiraAuth,
  type OutputFormat,
  type SortMode,
  type TicketResult,
} from '@jira-branch-checker/shared';
import { DEFAULT_JIRA_URL } from './config.js';
import type { CredentialStore } from './credential-store.js';
import { listBranches, type GitRunner } from './git-branches.js';
import { JiraClient } from './jira-client.js';
import { Logger } from './output.js';
import { renderReport, sortResults } from './reporter.js';
import { extractTickets } from './ticket-extractor.js';

export const MAX_AUTH_ATTEMPTS = 3;
const PROGRESS_CLEAR_WIDTH = 50;

export interface CheckOptions {
  jiraUrl: string;
  username?: string;
  noAuth: boolean;
  clearToken: boolean;
  format: OutputFormat;
  sort: SortMode;
  progress: boolean;
}

export interface CheckDependencies {
  git: GitRunner;
  store: CredentialStore;
  logger: Logger;
}

export interface CheckOutcome {
  tickets: string[];
  results: TicketResult[];
}

/**
 * One full run: branches -> tickets -> credentials -> statuses -> report.
 * Fatal conditions surface as thrown CheckerErrors.
 */
export async function runCheck(options: CheckOptions, deps: CheckDependencies): Promise<CheckOutcome> {
  const { logger, store } = deps;

  if (options.clearToken && store.clear(options.jiraUrl)) {
    logger.info(`Cleared saved token for ${options.jiraUrl}`);
  }

  const tickets = extractTickets(await listBranches(deps.git));
  if (tickets.length === 0) {
    logger.info('No Jira tickets found in branch names.');
    return { tickets, results: [] };
  }

  const auth = await authenticate(options, store, logger);
  const client = new JiraClient({ baseUrl: options.jiraUrl, auth });

  const results = await fetchStatuses(client, tickets, options.progress, logger);

  for (const line of renderReport(sortResults(results, options.sort), options.format)) {
    logger.line(line);
  }

  return { tickets, results };
}

export function requiresAuth(options: Pick<CheckOptions, 'jiraUrl' | 'noAuth'>): boolean {
  return !options.noAuth || options.jiraUrl === DEFAULT_JIRA_URL;
}

async function authenticate(
  options: CheckOptions,
  store: CredentialStore,
  logger: Logger
): Promise<JiraAuth | undefined> {
  if (!requiresAuth(options)) {
    return undefined;
  }

  for (let attempt = 0; attempt < MAX_AUTH_ATTEMPTS; attempt++) {
    if (attempt > 0) {
      logger.info(`Authentication attempt ${attempt + 1}/${MAX_AUTH_ATTEMPTS}`);
    }
    const auth = await store.resolveAuth(options.jiraUrl, options.username);
    if (auth) {
      return auth;
    }
  }

  if (options.jiraUrl === DEFAULT_JIRA_URL) {
    throw new AuthenticationError('Authentication is required for the default Jira server');
  }
  // Other servers may allow anonymous reads
  return undefined;
}

async function fetchStatuses(
  client: JiraClient,
  tickets: string[],
  progress: boolean,
  logger: Logger
): Promise<TicketResult[]> {
  const results: TicketResult[] = [];

  logger.info('Checking ticket statuses...');
  for (const [index, ticket] of tickets.entries()) {
    if (progress) {
      logger.progress(`\r[${index + 1}/${tickets.length}] Checking ${ticket}...`);
    }
    const status = await client.getTicketStatus(ticket);
    results.push({ ticket, status, link: client.browseLink(ticket) });
  }

  if (progress) {
    logger.progress(`\r${' '.repeat(PROGRESS_CLEAR_WIDTH)}\r`);
  }

  return results;
}
