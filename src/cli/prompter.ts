/**
 * Line-based prompting over stdin/stdout
 */

import { createInterface } from "node:readline";
import { PromptInterruptedError } from "../errors.ts";

/** Ask a question, get the typed line back */
export interface Prompter {
  /** Rejects with PromptInterruptedError on Ctrl+C or end of input */
  ask(question: string): Promise<string>;
  close(): void;
}

/** One line of user-facing output */
export type Writer = (line: string) => void;

export const consoleWriter: Writer = (line) => console.log(line);

/**
 * Prompter over a readline interface
 * Lines that arrive before a question is asked are queued, so piped input works too.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const terminal = input === process.stdin && process.stdin.isTTY === true;
  const rl = createInterface({ input, output, terminal });
  const queued: string[] = [];
  let waiting: { resolve: (line: string) => void; reject: (error: Error) => void } | null = null;
  let closed = false;

  rl.on("line", (line) => {
    if (waiting) {
      const { resolve } = waiting;
      waiting = null;
      resolve(line);
    } else {
      queued.push(line);
    }
  });

  rl.on("close", () => {
    closed = true;
    if (waiting) {
      const { reject } = waiting;
      waiting = null;
      reject(new PromptInterruptedError());
    }
  });

  // Ctrl+C ends the session instead of killing the process
  rl.on("SIGINT", () => rl.close());

  return {
    async ask(question) {
      const next = queued.shift();
      if (next !== undefined) {
        output.write(`${question}${next}\n`);
        return next;
      }
      if (closed) throw new PromptInterruptedError();
      rl.setPrompt(question);
      rl.prompt();
      return new Promise<string>((resolve, reject) => {
        waiting = { resolve, reject };
      });
    },
    close() {
      rl.close();
    },
  };
}
