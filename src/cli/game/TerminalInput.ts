import * as readline from 'readline';

/**
 * The one line reader over the terminal. Every human player in a game reads
 * from the same instance, so a line is consumed by exactly one prompt no
 * matter whose turn it is.
 */
export class TerminalInput {
  private readonly rl: readline.Interface;
  /** Buffers lines typed (or piped) before a prompt asks for them. */
  private readonly lines: AsyncIterator<string>;
  private closed = false;

  constructor(input: NodeJS.ReadableStream) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  /**
   * Resolves with the next input line, or null once input has ended or the
   * reader was closed.
   */
  public async nextLine(): Promise<string | null> {
    if (this.closed) {
      return null;
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  public close(): void {
    if (!this.closed) {
      this.closed = true;
      this.rl.close();
    }
  }
}
