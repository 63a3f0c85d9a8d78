/**
 * @jira-branch-checker/shared
 * Shared utilities and types for jira-branch-checker
 */

// Environment utilities
export {
  loadEnv,
  findProjectRoot,
  getEnv,
  type EnvLoaderOptions,
} from './env-loader.js';

// Types
export {
  type JiraAuth,
  type JiraConfig,
  type StoredCredentials,
  type OutputFormat,
  type SortMode,
  type TicketResult,
  OUTPUT_FORMATS,
  SORT_MODES,
} from './types.js';

// Error handling
export {
  CheckerError,
  ValidationError,
  AuthenticationError,
  ConfigurationError,
  GitCommandError,
  CancelledError,
  getErrorMessage,
  exitCodeFor,
} from './errors.js';
