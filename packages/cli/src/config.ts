import os from 'os';
import path from 'path';
import { getEnv } from '@jira-branch-checker/shared';

/** Hosted Jira instance used when no --jira-url is given. It always requires authentication. */
export const DEFAULT_JIRA_URL = 'https://ephocks.atlassian.net';

export const TOKEN_FILE_NAME = 'tokens.toml';

export interface AppConfig {
  defaultJiraUrl: string;
  defaultUsername?: string;
  tokenFile: string;
}

/**
 * Resolve runtime configuration once at startup.
 * JIRA_BASE_URL and JIRA_USERNAME provide flag defaults;
 * JIRA_BRANCH_CHECKER_CONFIG_DIR relocates the token file.
 */
export function resolveAppConfig(env: NodeJS.ProcessEnv = process.env, homeDir: string = os.homedir()): AppConfig {
  const configDir = getEnv(
    'JIRA_BRANCH_CHECKER_CONFIG_DIR',
    path.join(homeDir, '.config', 'jira-branch-checker'),
    env
  );
  const username = getEnv('JIRA_USERNAME', '', env);

  return {
    defaultJiraUrl: normalizeBaseUrl(getEnv('JIRA_BASE_URL', DEFAULT_JIRA_URL, env)),
    defaultUsername: username || undefined,
    tokenFile: path.join(configDir, TOKEN_FILE_NAME),
  };
}

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '');
}
