import axios, { type AxiosInstance } from 'axios';
import {
  AuthenticationError,
  getErrorMessage,
  type JiraConfig,
} from '@jira-branch-checker/shared';
import { DEFAULT_JIRA_URL } from './config.js';

/** Timeout for the credential probe. Ticket fetches are not time-bounded. */
export const CONNECTION_TEST_TIMEOUT_MS = 10000;

export class JiraClient {
  private client: AxiosInstance;
  private config: JiraConfig;

  constructor(config: JiraConfig) {
    this.config = config;

    this.client = axios.create({
      baseURL: `${config.baseUrl}/rest/api/2`,
      auth: config.auth
        ? { username: config.auth.username, password: config.auth.token }
        : undefined,
      headers: {
        'Accept': 'application/json'
      },
      // Status codes are interpreted by the callers
      validateStatus: () => true,
      // Bodies are parsed by hand so malformed JSON surfaces as an error
      responseType: 'text',
    });
  }

  /**
   * Probe /myself with the configured credentials.
   * Resolves false on any non-200 reply; transport failures reject.
   */
  async testConnection(): Promise<boolean> {
    const response = await this.client.get('/myself', { timeout: CONNECTION_TEST_TIMEOUT_MS });
    return response.status === 200;
  }

  /**
   * Resolve a ticket's status text: "Status", "Status: Resolution" or "Error: ...".
   * Throws AuthenticationError when the server rejects the credentials.
   */
  async getTicketStatus(ticket: string): Promise<string> {
    if (!this.config.auth && this.config.baseUrl === DEFAULT_JIRA_URL) {
      throw new AuthenticationError('Authentication is required for the default Jira server');
    }

    let status: number;
    let body: unknown;
    try {
      const response = await this.client.get<string>(`/issue/${encodeURIComponent(ticket)}`);
      status = response.status;
      body = response.data;
    } catch (error) {
      return `Error: ${getErrorMessage(error)}`;
    }

    if (status === 401) {
      throw new AuthenticationError(`Authentication failed for ${this.config.baseUrl}`);
    }
    if (status !== 200) {
      return `Error: ${status}`;
    }

    try {
      return describeIssueStatus(typeof body === 'string' ? JSON.parse(body) : body);
    } catch (error) {
      return `Error: ${getErrorMessage(error)}`;
    }
  }

  browseLink(ticket: string): string {
    return `${this.config.baseUrl}/browse/${ticket}`;
  }
}

/**
 * Compose status text from an issue payload's fields.status / fields.resolution
 */
export function describeIssueStatus(issue: unknown): string {
  const fields = readObject(issue, 'fields');
  const statusName = readString(readObject(fields, 'status'), 'name') ?? 'Unknown';
  const resolutionName = readString(readObject(fields, 'resolution'), 'name');

  return resolutionName ? `${statusName}: ${resolutionName}` : statusName;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function readObject(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

function readString(value: unknown, key: string): string | undefined {
  const field = readObject(value, key);
  return typeof field === 'string' ? field : undefined;
}
