/**
 * Shared environment loading utilities
 * Loads the .env file found at or above the working directory
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Options for loading environment variables
 */
export interface EnvLoaderOptions {
  /** Custom path to .env file (overrides default resolution) */
  envPath?: string;
  /** Whether to throw an error if .env file is not found (default: false) */
  required?: boolean;
}

/**
 * Find the project root by looking for a .env file or the workspace package.json
 */
export function findProjectRoot(startDir: string): string {
  let currentDir = path.resolve(startDir);

  // Walk up the directory tree looking for markers
  while (currentDir !== path.dirname(currentDir)) {
    // Check for .env file (our primary marker)
    if (fs.existsSync(path.join(currentDir, '.env'))) {
      return currentDir;
    }
    // Also check for a root-level package.json with workspaces
    const pkgPath = path.join(currentDir, 'package.json');
    if (fs.existsSync(pkgPath) && hasWorkspaces(pkgPath)) {
      return currentDir;
    }
    currentDir = path.dirname(currentDir);
  }

  return path.resolve(startDir);
}

function hasWorkspaces(pkgPath: string): boolean {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf8'));
    return !!pkg && typeof pkg === 'object' && 'workspaces' in pkg;
  } catch {
    // Unreadable package.json is not a root marker
    return false;
  }
}

/**
 * Load environment variables from .env file
 *
 * @param startDir - Directory to start searching from (usually process.cwd())
 * @returns The resolved path to the .env file (or null if not found)
 *
 * @example
 * ```typescript
 * import { loadEnv } from '@jira-branch-checker/shared';
 *
 * loadEnv(process.cwd());
 * ```
 */
export function loadEnv(startDir: string, options: EnvLoaderOptions = {}): string | null {
  let envPath: string;
  if (options.envPath) {
    envPath = options.envPath;
  } else {
    const projectRoot = findProjectRoot(startDir);
    envPath = path.resolve(projectRoot, '.env');
  }

  if (!fs.existsSync(envPath)) {
    if (options.required) {
      throw new Error(`Required .env file not found at: ${envPath}`);
    }
    return null;
  }

  dotenv.config({ path: envPath });

  return envPath;
}

/**
 * Get optional environment variable with default
 */
export function getEnv(name: string, defaultValue: string = '', env: NodeJS.ProcessEnv = process.env): string {
  const value = env[name];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.trim().replace(/\r\n?/g, '');
}
