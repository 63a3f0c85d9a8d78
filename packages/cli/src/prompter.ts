import readline from 'readline';
import { Writable } from 'stream';
import { CancelledError, CheckerError } from '@jira-branch-checker/shared';

/**
 * Interactive input used while resolving credentials
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  /** Ask without echoing what is typed */
  askHidden(question: string): Promise<string>;
  close(): void;
}

export class InputClosedError extends CheckerError {
  constructor(message: string = 'Input closed before an answer was given') {
    super(message, 'INPUT_CLOSED');
    this.name = 'InputClosedError';
  }
}

/**
 * Output stream that forwards to the terminal unless muted
 */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (!this.muted) {
      this.target.write(chunk);
    }
    callback();
  }
}

interface PendingAnswer {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

/**
 * Prompter over a readline interface that lives for the whole run.
 * Lines that arrive before they are asked for (piped input) are queued;
 * once the input ends every further question rejects with InputClosedError.
 */
export class TerminalPrompter implements Prompter {
  private rl?: readline.Interface;
  private readonly output: MutableOutput;
  private readonly lines: string[] = [];
  private pending?: PendingAnswer;
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly target: NodeJS.WritableStream = process.stdout
  ) {
    this.output = new MutableOutput(target);
  }

  ask(question: string): Promise<string> {
    this.output.muted = false;
    this.target.write(question);
    return this.nextLine();
  }

  async askHidden(question: string): Promise<string> {
    this.target.write(question);
    this.output.muted = true;
    try {
      return await this.nextLine();
    } finally {
      this.output.muted = false;
      this.target.write('\n');
    }
  }

  close(): void {
    this.rl?.close();
  }

  private nextLine(): Promise<string> {
    this.open();

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.ended) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  private open(): void {
    if (this.rl || this.ended) {
      return;
    }

    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal: 'isTTY' in this.input && this.input.isTTY === true,
    });
    rl.on('line', (line) => {
      const pending = this.pending;
      this.pending = undefined;
      if (pending) {
        pending.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    // Ctrl+C while readline owns the terminal arrives here, not as a process signal
    rl.on('SIGINT', () => this.fail(new CancelledError()));
    rl.on('close', () => {
      this.ended = true;
      this.fail(new InputClosedError());
    });

    this.rl = rl;
  }

  private fail(error: Error): void {
    const pending = this.pending;
    this.pending = undefined;
    pending?.reject(error);
  }
}

/**
 * Prompter that answers from a fixed list, in order
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    return this.next(question);
  }

  async askHidden(question: string): Promise<string> {
    return this.next(question);
  }

  close(): void {}

  private next(question: string): string {
    this.asked.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new InputClosedError(`No scripted answer for prompt: ${question}`);
    }
    return answer;
  }
}
