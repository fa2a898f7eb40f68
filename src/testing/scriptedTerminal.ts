import { inputClosedError, type Style, type Terminal } from "../terminal.js";

/** In-memory terminal for tests: answers come from a fixed script. */
export class ScriptedTerminal implements Terminal {
  readonly questions: string[] = [];
  readonly messages: Array<{ message: string; style: Style }> = [];
  private readonly answers: string[];
  closed = false;

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const next = this.answers.shift();
    if (next === undefined) throw inputClosedError();
    return next;
  }

  say(message: string, style: Style = "plain"): void {
    this.messages.push({ message, style });
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.answers.length;
  }

  /** Printed messages with the given style, in order. */
  said(style: Style): string[] {
    return this.messages.filter((m) => m.style === style).map((m) => m.message);
  }
}
