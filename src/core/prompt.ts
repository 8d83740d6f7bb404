/**
 * Interactive operator input.
 */
import { Writable } from "node:stream";
import { createInterface } from "node:readline/promises";

export interface Prompter {
  /** Ask for a line of text; resolves to the trimmed answer. */
  ask(question: string): Promise<string>;
  /** Ask for a secret without echoing it. */
  secret(question: string): Promise<string>;
}

/** Prompter bound to the process terminal. */
export class TerminalPrompter implements Prompter {
  private input: NodeJS.ReadableStream;
  private output: NodeJS.WritableStream;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.input = input;
    this.output = output;
  }

  async ask(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return (await rl.question(question)).trim();
    } finally {
      rl.close();
    }
  }

  async secret(question: string): Promise<string> {
    let muted = false;
    const out = this.output;
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) out.write(chunk);
        callback();
      },
    });
    const rl = createInterface({ input: this.input, output: sink, terminal: true });
    try {
      const answer = rl.question(question);
      muted = true;
      return await answer;
    } finally {
      muted = false;
      rl.close();
      out.write("\n");
    }
  }
}

/** Prompter for non-interactive runs: every question is an error. */
export class NoPrompter implements Prompter {
  async ask(question: string): Promise<string> {
    throw new Error(`Input required but prompting is disabled: ${question.trim()}`);
  }

  async secret(question: string): Promise<string> {
    throw new Error(`Input required but prompting is disabled: ${question.trim()}`);
  }
}
