import { Interface, createInterface } from "readline";

/**
 * Source of the answers typed by the user.
 */
export interface Prompter {
  /**
   * Shows `question` and waits for one line of input.
   * @returns The line without its terminator, or `undefined` at the end of input.
   */
  ask(question: string): Promise<string | undefined>;
  close(): void;
}

/**
 * Reads answers line by line from a stream, stdin by default.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly pending: string[] = [];
  private readonly waiting: ((line: string | undefined) => void)[] = [];
  private ended = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on("line", (line: string) => {
      const resolve = this.waiting.shift();
      if (resolve) {
        resolve(line);
      } else {
        this.pending.push(line);
      }
    });
    this.rl.on("close", () => {
      this.ended = true;
      this.waiting.splice(0).forEach((resolve) => resolve(undefined));
    });
  }

  ask(question: string): Promise<string | undefined> {
    this.output.write(question);
    const line = this.pending.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.ended) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  close(): void {
    this.rl.close();
  }
}
