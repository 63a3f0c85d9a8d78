/**
 * Shared type definitions for jira-branch-checker
 */

// ============================================
// API Configuration Types
// ============================================

/**
 * Credential pair used for HTTP Basic auth against Jira
 */
export interface JiraAuth {
  username: string;
  token: string;
}

/**
 * Jira client configuration. `auth` is absent for anonymous access.
 */
export interface JiraConfig {
  baseUrl: string;
  auth?: JiraAuth;
}

/**
 * Credentials as read back from the token file; either field may be missing
 */
export interface StoredCredentials {
  username?: string;
  token?: string;
}

// ============================================
// Report Types
// ============================================

export type OutputFormat = 'table' | 'csv';

export type SortMode = 'status' | 'ticket';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'csv'];

export const SORT_MODES: readonly SortMode[] = ['status', 'ticket'];

/**
 * One report row
 */
export interface TicketResult {
  ticket: string;
  /** Status name, "status: resolution", or an "Error: ..." placeholder */
  status: string;
  link: string;
}
