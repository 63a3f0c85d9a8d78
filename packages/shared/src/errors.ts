/**
 * Shared error handling utilities for jira-branch-checker
 * Provides the error taxonomy and exit-code mapping used by the CLI
 */

/**
 * Base error class for checker operations
 */
export class CheckerError extends Error {
  constructor(
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CheckerError';
  }

  /**
   * Process exit code when this error ends a run
   */
  get exitCode(): number {
    return 1;
  }
}

/**
 * Error for rejected user input (empty username or token)
 */
export class ValidationError extends CheckerError {
  constructor(message: string, cause?: Error) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error for authentication failures
 */
export class AuthenticationError extends CheckerError {
  constructor(message: string, cause?: Error) {
    super(message, 'AUTH_ERROR', cause);
    this.name = 'AuthenticationError';
  }
}

/**
 * Error for configuration issues
 */
export class ConfigurationError extends CheckerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error raised when the git executable fails or is missing.
 * `stderr` holds whatever git wrote to its error stream.
 */
export class GitCommandError extends CheckerError {
  constructor(
    message: string,
    public readonly stderr: string = '',
    cause?: Error
  ) {
    super(message, 'GIT_ERROR', cause);
    this.name = 'GitCommandError';
  }
}

/**
 * User interrupt (Ctrl+C). Ends the run with a zero exit code.
 */
export class CancelledError extends CheckerError {
  constructor(message: string = 'Operation cancelled by user') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }

  get exitCode(): number {
    return 0;
  }
}

// ============================================
// Error Handling Utilities
// ============================================

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Map any thrown value to the process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CheckerError) {
    return error.exitCode;
  }
  return 1;
}
