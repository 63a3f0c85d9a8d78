/**
 * Console output for the checker, colored with Chalk.
 *
 * Chalk honours NO_COLOR, FORCE_COLOR and TERM=dumb on its own.
 * Report lines go through `line()` uncolored so table and CSV output stay machine-readable.
 */

import chalk from 'chalk';

export interface OutputStreams {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export interface LoggerOptions {
  /** Force colors on or off; defaults to Chalk's terminal detection */
  color?: boolean;
}

export class Logger {
  private readonly chalk: chalk.Chalk;

  constructor(
    private readonly streams: OutputStreams = { stdout: process.stdout, stderr: process.stderr },
    options: LoggerOptions = {}
  ) {
    this.chalk = options.color === undefined
      ? chalk
      : new chalk.Instance({ level: options.color ? 1 : 0 });
  }

  /** Plain informational line on stdout */
  info(msg: string): void {
    this.line(msg);
  }

  /** Green check + message */
  success(msg: string): void {
    this.line(`${this.chalk.green.bold('✓')} ${this.chalk.green(msg)}`);
  }

  /** Yellow ! + message */
  warn(msg: string): void {
    this.line(`${this.chalk.yellow.bold('!')} ${this.chalk.yellow(msg)}`);
  }

  /** Red message. Always to stderr. */
  error(msg: string): void {
    this.streams.stderr.write(`${this.chalk.red(msg)}\n`);
  }

  /** Uncolored line on stdout */
  line(text: string = ''): void {
    this.streams.stdout.write(`${text}\n`);
  }

  /** Raw write with no newline, used for in-place progress */
  progress(text: string): void {
    this.streams.stdout.write(text);
  }
}
