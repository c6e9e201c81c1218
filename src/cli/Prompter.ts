import * as readline from "readline";

/**
 * Line-oriented terminal input
 */
export interface Prompter {
  /** Resolves with the entered line, or null once input has ended */
  ask(prompt: string): Promise<string | null>;
  /**
   * Route Ctrl+C to `listener` until the returned function is called.
   * Without a listener Ctrl+C ends input.
   */
  onInterrupt(listener: () => void): () => void;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly pending: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;
  private interruptListeners: Array<() => void> = [];
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });

    this.rl.on("line", (line) => {
      const resolve = this.waiting;
      if (resolve) {
        this.waiting = null;
        resolve(line);
      } else {
        this.pending.push(line);
      }
    });

    this.rl.on("close", () => {
      this.closed = true;
      const resolve = this.waiting;
      this.waiting = null;
      resolve?.(null);
    });

    this.rl.on("SIGINT", () => {
      const listener = this.interruptListeners[this.interruptListeners.length - 1];
      if (listener) {
        listener();
      } else {
        this.output.write("\n");
        this.rl.close();
      }
    });
  }

  ask(prompt: string): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) {
      this.output.write(prompt + queued + "\n");
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    this.output.write(prompt);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  onInterrupt(listener: () => void): () => void {
    this.interruptListeners.push(listener);
    return () => {
      this.interruptListeners = this.interruptListeners.filter((l) => l !== listener);
    };
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
