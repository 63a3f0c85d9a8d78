import fs from 'fs';
import path from 'path';
import { parse, stringify } from 'smol-toml';
import {
  ConfigurationError,
  ValidationError,
  getErrorMessage,
  type JiraAuth,
  type StoredCredentials,
} from '@jira-branch-checker/shared';
import { JiraClient } from './jira-client.js';
import { Logger } from './output.js';
import type { Prompter } from './prompter.js';

/** Token file contents: one table per Jira base URL */
type TokenFile = Record<string, StoredCredentials>;

export interface CredentialStoreOptions {
  /** Absolute path of the TOML token file */
  tokenFile: string;
  prompter: Prompter;
  logger?: Logger;
}

/**
 * Per-server username/token persistence plus interactive credential resolution.
 * The token file is only ever readable by its owner (mode 0600).
 */
export class CredentialStore {
  readonly tokenFile: string;
  private readonly prompter: Prompter;
  private readonly logger: Logger;

  constructor(options: CredentialStoreOptions) {
    this.tokenFile = options.tokenFile;
    this.prompter = options.prompter;
    this.logger = options.logger ?? new Logger();
  }

  /**
   * Saved credentials for a server, or null when the file or its table is absent
   */
  load(serverUrl: string): StoredCredentials | null {
    const file = this.read();
    return Object.hasOwn(file, serverUrl) ? file[serverUrl] : null;
  }

  save(serverUrl: string, username: string, token: string): void {
    const file = this.read();
    file[serverUrl] = { username, token };
    this.write(file);
  }

  /**
   * Remove a server's table. Returns false when there was nothing to remove.
   */
  clear(serverUrl: string): boolean {
    const file = this.read();
    if (!Object.hasOwn(file, serverUrl)) {
      return false;
    }
    delete file[serverUrl];
    this.write(file);
    return true;
  }

  /**
   * Credentials for this run: a saved token that still passes /myself,
   * otherwise whatever the user types in. Null when none could be obtained.
   */
  async resolveAuth(serverUrl: string, providedUsername?: string): Promise<JiraAuth | null> {
    try {
      return await this.resolve(serverUrl, providedUsername);
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.error(`Error: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async resolve(serverUrl: string, providedUsername?: string): Promise<JiraAuth | null> {
    const saved = this.load(serverUrl);
    let username = providedUsername || saved?.username;
    let token: string | undefined;

    if (saved?.token && username && (!providedUsername || providedUsername === saved.username)) {
      this.logger.info(`Using saved credentials for ${username} at ${serverUrl}`);
      if (await this.validate(serverUrl, { username, token: saved.token })) {
        token = saved.token;
      }
    }

    if (!token) {
      if (!username) {
        username = await this.prompter.ask(`Enter your Jira username for ${serverUrl}: `);
        if (!username.trim()) {
          throw new ValidationError('Username cannot be empty');
        }
      }

      token = await this.prompter.askHidden(`Enter your Jira API token for ${username}: `);
      if (!token.trim()) {
        throw new ValidationError('Token cannot be empty');
      }

      const choice = await this.prompter.ask('Save this token for future use? (y/n): ');
      if (choice.trim().toLowerCase() === 'y') {
        this.save(serverUrl, username, token);
        this.logger.success(`Token saved to ${this.tokenFile}`);
      }
    }

    return username && token ? { username, token } : null;
  }

  private async validate(serverUrl: string, auth: JiraAuth): Promise<boolean> {
    try {
      if (await new JiraClient({ baseUrl: serverUrl, auth }).testConnection()) {
        return true;
      }
      this.logger.warn('Saved token appears to be invalid. Please enter a new one.');
    } catch (error) {
      this.logger.warn(`Error testing saved token: ${getErrorMessage(error)}`);
    }
    return false;
  }

  private read(): TokenFile {
    if (!fs.existsSync(this.tokenFile)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = parse(fs.readFileSync(this.tokenFile, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `Could not read token file ${this.tokenFile}: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    const file: TokenFile = {};
    if (!isTable(parsed)) {
      return file;
    }
    for (const [serverUrl, section] of Object.entries(parsed)) {
      if (isTable(section)) {
        file[serverUrl] = {
          username: typeof section.username === 'string' ? section.username : undefined,
          token: typeof section.token === 'string' ? section.token : undefined,
        };
      }
    }
    return file;
  }

  private write(file: TokenFile): void {
    const document: Record<string, Record<string, string>> = {};
    for (const [serverUrl, credentials] of Object.entries(file)) {
      const section: Record<string, string> = {};
      if (credentials.username !== undefined) section.username = credentials.username;
      if (credentials.token !== undefined) section.token = credentials.token;
      document[serverUrl] = section;
    }

    fs.mkdirSync(path.dirname(this.tokenFile), { recursive: true, mode: 0o700 });
    fs.writeFileSync(this.tokenFile, stringify(document), { encoding: 'utf8', mode: 0o600 });
    // writeFileSync only applies the mode when it creates the file
    fs.chmodSync(this.tokenFile, 0o600);
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value) && !(value instanceof Date);
}
