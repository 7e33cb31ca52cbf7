import { createInterface, Interface } from 'node:readline';
import { Readable, Writable } from 'node:stream';

// Terminal seam for the CLI command; tests pass a scripted fake.
export interface CommandIo {
  /** Report output */
  write(text: string): void;
  /** Messages aimed at the person typing, kept apart from the report */
  notify(text: string): void;
  ask(question: string): Promise<string>;
}

export interface ConsoleIoStreams {
  input: Readable;
  output: Writable;
  prompts: Writable;               // prompts and notices
}

// Reads answers line by line from a single reader, so piped input can
// answer several questions in a row.
export class ConsoleIo implements CommandIo {
  private reader?: Interface;
  private lines?: AsyncIterator<string>;

  constructor(
    private readonly streams: ConsoleIoStreams = {
      input: process.stdin,
      output: process.stdout,
      prompts: process.stdout,
    },
  ) {}

  write(text: string): void {
    this.streams.output.write(`${text}\n`);
  }

  notify(text: string): void {
    this.streams.prompts.write(`${text}\n`);
  }

  /** @throws Error when input ends before an answer arrives */
  async ask(question: string): Promise<string> {
    this.streams.prompts.write(question);
    const next = await this.nextLines().next();
    if (next.done) {
      throw new Error('Input closed before an answer was entered');
    }
    return next.value;
  }

  close(): void {
    this.reader?.close();
  }

  // Opened on first use so a run with --amount never touches stdin.
  private nextLines(): AsyncIterator<string> {
    if (!this.lines) {
      this.reader = createInterface({ input: this.streams.input, terminal: false });
      this.lines = this.reader[Symbol.asyncIterator]();
    }
    return this.lines;
  }
}
