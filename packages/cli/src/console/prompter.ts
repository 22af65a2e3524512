// ─── Prompter ──────────────────────────────────────────────────────
// Line-oriented terminal I/O for interactive seats. The human policy
// only talks to this interface, so tests can script the answers.

import { createInterface, type Interface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

export interface Prompter {
  /** Shows `question` and resolves with the next line of input. */
  ask(question: string): Promise<string>;
  /** Shows one line of output. */
  say(line: string): void;
}

/** Input ended (Ctrl-D, closed pipe) while a seat was waiting for a move. */
export class InputClosedError extends Error {
  constructor() {
    super("Input closed while waiting for a move");
    this.name = "InputClosedError";
  }
}

/** Reads from stdin; the readline interface is only opened on the first question. */
export class ReadlinePrompter implements Prompter {
  private rl: Interface | null = null;
  private readonly closed = new AbortController();

  constructor(
    private readonly input: NodeJS.ReadableStream = stdin,
    private readonly output: NodeJS.WritableStream = stdout
  ) {}

  async ask(question: string): Promise<string> {
    if (this.closed.signal.aborted) {
      throw new InputClosedError();
    }
    try {
      return await this.open().question(question, { signal: this.closed.signal });
    } catch (err) {
      if (this.closed.signal.aborted) throw new InputClosedError();
      throw err;
    }
  }

  say(line: string): void {
    console.log(line);
  }

  close(): void {
    this.rl?.close();
  }

  private open(): Interface {
    if (this.rl === null) {
      this.rl = createInterface({ input: this.input, output: this.output });
      this.rl.once("close", () => this.closed.abort());
    }
    return this.rl;
  }
}
