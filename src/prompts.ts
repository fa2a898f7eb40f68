// prompts.ts
// Retry-until-valid prompts built on one combinator.

import { AppError } from "./errors.js";
import type { Terminal } from "./terminal.js";
import {
  menuIndexSchema,
  PositiveFloatSchema,
  PositiveIntSchema,
  validate,
  YesNoSchema,
  type ValidationResult,
} from "./validation.js";

export interface PromptOptions {
  /** Give up after this many rejected answers. Unbounded by default. */
  maxAttempts?: number;
}

/**
 * Asks `question` until `parse` accepts the answer. Each rejected answer
 * prints the parser's message before asking again.
 */
export async function promptUntilValid<T>(
  io: Terminal,
  question: string,
  parse: (text: string) => ValidationResult<T>,
  opts: PromptOptions = {}
): Promise<T> {
  const limit = opts.maxAttempts ?? Number.POSITIVE_INFINITY;
  for (let attempt = 1; ; attempt++) {
    const result = parse(await io.ask(question));
    if (result.success) return result.data;
    io.say(result.error, "error");
    if (attempt >= limit) {
      throw new AppError(`No valid answer after ${attempt} attempts`, {
        code: "RETRY_LIMIT_EXCEEDED",
        details: { question },
      });
    }
  }
}

export function promptPositiveFloat(io: Terminal, question: string, opts?: PromptOptions): Promise<number> {
  return promptUntilValid(io, question, (text) => validate(PositiveFloatSchema, text), opts);
}

export function promptPositiveInt(io: Terminal, question: string, opts?: PromptOptions): Promise<number> {
  return promptUntilValid(io, question, (text) => validate(PositiveIntSchema, text), opts);
}

export function promptYesNo(io: Terminal, message: string, opts?: PromptOptions): Promise<boolean> {
  return promptUntilValid(io, `${message} (yes/y or no/n): `, (text) => validate(YesNoSchema, text), opts);
}

/** 1-based menu pick; what to do with a bad pick is up to the caller. */
export function parseMenuSelection(text: string, itemCount: number): ValidationResult<number> {
  return validate(menuIndexSchema(itemCount), text);
}
