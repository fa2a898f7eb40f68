// session.ts
// Interactive collection: body parts -> exercises -> weight/reps/sets,
// and the outer loop that saves each pass.

import { buildUserProfile, describeBmi, type UserProfile } from "./bmi.js";
import { BODY_PARTS, type BodyPart, type ExerciseCatalog } from "./catalog.js";
import {
  parseMenuSelection,
  promptPositiveFloat,
  promptPositiveInt,
  promptYesNo,
  type PromptOptions,
} from "./prompts.js";
import type { Clock, ExerciseRecord, RecordStore } from "./recordStore.js";
import type { Terminal } from "./terminal.js";

/** Everything a session needs; built once at startup and passed down. */
export interface SessionContext {
  readonly profile: UserProfile;
  readonly catalog: ExerciseCatalog;
  readonly terminal: Terminal;
  readonly store: RecordStore;
  readonly now: Clock;
  readonly prompt: PromptOptions;
}

export interface BodyPartSelection {
  /** 1-based, deduplicated, ascending */
  indices: number[];
  /** rejected tokens in input order */
  invalid: string[];
}

export async function collectUserProfile(io: Terminal, opts: PromptOptions = {}): Promise<UserProfile> {
  const heightCm = await promptPositiveFloat(io, "Enter your height in cm: ", opts);
  const weightKg = await promptPositiveFloat(io, "Enter your weight in kg: ", opts);
  const profile = buildUserProfile(heightCm, weightKg);
  io.say(describeBmi(profile), "info");
  return profile;
}

/**
 * Splits "3,1,1,5" style input. Bad tokens are reported back and dropped
 * one by one; they never discard the rest of the selection.
 */
export function parseBodyPartSelection(text: string, partCount: number): BodyPartSelection {
  const picked = new Set<number>();
  const invalid: string[] = [];
  for (const raw of text.split(",")) {
    const token = raw.trim();
    const result = parseMenuSelection(token, partCount);
    if (result.success) picked.add(result.data);
    else if (!invalid.includes(token)) invalid.push(token);
  }
  return { indices: [...picked].sort((a, b) => a - b), invalid };
}

async function collectExercisesFor(ctx: SessionContext, part: BodyPart): Promise<ExerciseRecord[]> {
  const io = ctx.terminal;
  const exercises = ctx.catalog[part];
  const records: ExerciseRecord[] = [];

  for (;;) {
    io.say("");
    io.say(`--- Select Exercises for ${part} ---`, "heading");
    exercises.forEach((name, i) => io.say(`${i + 1}. ${name}`, "exercise"));

    // an invalid pick ends entry for this body part, no retry
    const pick = parseMenuSelection(
      await io.ask("Enter the number of the exercise you performed: "),
      exercises.length
    );
    if (!pick.success) break;

    const exerciseName = exercises[pick.data - 1];
    const weightKg = await promptPositiveFloat(io, "Enter the weight used (in kg): ", ctx.prompt);
    const reps = await promptPositiveInt(io, "Enter the number of reps: ", ctx.prompt);
    const sets = await promptPositiveInt(io, "Enter the number of sets: ", ctx.prompt);

    records.push(Object.freeze({ timestamp: ctx.now(), bodyPart: part, exerciseName, weightKg, reps, sets }));

    const more = await promptYesNo(io, "Add another exercise for the same body part?", ctx.prompt);
    if (!more) break;
  }

  return records;
}

/** One pass through body-part and exercise selection. May return nothing. */
export async function collectSession(ctx: SessionContext): Promise<ExerciseRecord[]> {
  const io = ctx.terminal;
  io.say("");
  io.say("--- Select Body Parts You Trained ---", "title");
  BODY_PARTS.forEach((part, i) => io.say(`${i + 1}. ${part}`, "option"));

  const answer = await io.ask("Enter the numbers of the body parts you trained, separated by commas: ");
  const { indices, invalid } = parseBodyPartSelection(answer, BODY_PARTS.length);
  for (const token of invalid) {
    io.say(`Invalid body part selection: "${token}". Skipping.`, "error");
  }

  const records: ExerciseRecord[] = [];
  for (const index of indices) {
    records.push(...(await collectExercisesFor(ctx, BODY_PARTS[index - 1])));
  }
  return records;
}

/**
 * Repeats collection until the user is done. Each non-empty pass is saved
 * before asking whether to go on. Resolves to the number of rows written.
 */
export async function runSessions(ctx: SessionContext): Promise<number> {
  const io = ctx.terminal;
  let saved = 0;

  for (;;) {
    const records = await collectSession(ctx);
    if (!records.length) {
      io.say("Something went wrong, please start over.", "error");
      continue;
    }

    const filePath = await ctx.store.appendRecords(records, ctx.profile);
    saved += records.length;
    io.say(`Data successfully saved to: ${filePath}`, "success");

    const another = await promptYesNo(io, "Would you like to enter exercises for another set of body parts?", ctx.prompt);
    if (!another) return saved;
  }
}
