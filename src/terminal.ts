import { createInterface, type Interface } from "node:readline";
import { AppError } from "./errors.js";

export type Style =
  | "plain"
  | "title"
  | "heading"
  | "option"
  | "exercise"
  | "prompt"
  | "info"
  | "success"
  | "error";

/** Turns a message into the text actually written to the screen. */
export type Presenter = (message: string, style: Style) => string;

/** Line-oriented console used by the prompts and the session loop. */
export interface Terminal {
  ask(question: string): Promise<string>;
  say(message: string, style?: Style): void;
  close(): void;
}

const ANSI: Record<Style, string | null> = {
  plain: null,
  prompt: null,
  title: "\x1b[95m",
  heading: "\x1b[96m",
  option: "\x1b[93m",
  exercise: "\x1b[94m",
  info: "\x1b[96m",
  success: "\x1b[92m",
  error: "\x1b[91m",
};
const RESET = "\x1b[0m";

export const ansiPresenter: Presenter = (message, style) => {
  const code = ANSI[style];
  return code ? `${code}${message}${RESET}` : message;
};

export const plainPresenter: Presenter = (message) => message;

export function inputClosedError(): AppError {
  return new AppError("Input stream closed", { code: "INPUT_CLOSED", exitCode: 0 });
}

type PendingRead = { resolve: (line: string) => void; reject: (err: Error) => void };

/**
 * Terminal over a readable/writable pair (stdin/stdout in the CLI).
 * Lines that arrive before anyone asks are kept, so piped answers
 * are not lost between prompts.
 */
export class ReadlineTerminal implements Terminal {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly present: Presenter;
  private readonly buffered: string[] = [];
  private pending: PendingRead | null = null;
  private closed = false;

  constructor(opts: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream; present: Presenter }) {
    this.output = opts.output;
    this.present = opts.present;
    this.rl = createInterface({ input: opts.input, crlfDelay: Infinity });

    this.rl.on("line", (line) => {
      const waiting = this.pending;
      if (waiting) {
        this.pending = null;
        waiting.resolve(line);
      } else {
        this.buffered.push(line);
      }
    });

    this.rl.on("close", () => {
      this.closed = true;
      const waiting = this.pending;
      if (waiting) {
        this.pending = null;
        waiting.reject(inputClosedError());
      }
    });
  }

  ask(question: string): Promise<string> {
    this.output.write(this.present(question, "prompt"));
    const next = this.buffered.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.reject(inputClosedError());
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  say(message: string, style: Style = "plain"): void {
    this.output.write(`${this.present(message, style)}\n`);
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}
