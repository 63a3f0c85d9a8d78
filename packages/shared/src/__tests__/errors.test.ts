/**
 * Error Taxonomy Unit Tests
 */

import {
  AuthenticationError,
  CancelledError,
  CheckerError,
  ConfigurationError,
  GitCommandError,
  ValidationError,
  exitCodeFor,
  getErrorMessage,
} from '../errors';

describe('error classes', () => {
  it('should carry a code and a name', () => {
    const cases: Array<[CheckerError, string, string]> = [
      [new ValidationError('Token cannot be empty'), 'VALIDATION_ERROR', 'ValidationError'],
      [new AuthenticationError('denied'), 'AUTH_ERROR', 'AuthenticationError'],
      [new ConfigurationError('bad file'), 'CONFIG_ERROR', 'ConfigurationError'],
      [new GitCommandError('git branch failed'), 'GIT_ERROR', 'GitCommandError'],
      [new CancelledError(), 'CANCELLED', 'CancelledError'],
    ];

    for (const [error, code, name] of cases) {
      expect(error).toBeInstanceOf(CheckerError);
      expect(error.code).toBe(code);
      expect(error.name).toBe(name);
    }
  });

  it('should keep the git error output', () => {
    expect(new GitCommandError('git branch failed', 'fatal: bad object').stderr).toBe('fatal: bad object');
  });

  it('should keep the cause', () => {
    const cause = new Error('EACCES');
    expect(new ConfigurationError('unreadable', cause).cause).toBe(cause);
  });
});

describe('exitCodeFor', () => {
  it('should exit 0 only for cancellation', () => {
    expect(exitCodeFor(new CancelledError())).toBe(0);
    expect(exitCodeFor(new AuthenticationError('denied'))).toBe(1);
    expect(exitCodeFor(new GitCommandError('git branch failed'))).toBe(1);
    expect(exitCodeFor(new Error('unexpected'))).toBe(1);
    expect(exitCodeFor('thrown string')).toBe(1);
  });
});

describe('getErrorMessage', () => {
  it('should read messages from errors, strings and message-like objects', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 'from object' })).toBe('from object');
    expect(getErrorMessage(42)).toBe('42');
  });
});
