// catalog.ts
// Body parts and the exercises offered for each of them.
// The list order is the 1-based number shown in the menus.

import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { AppError } from "./errors.js";
import { describeIssues } from "./validation.js";

export const BODY_PARTS = ["Chest", "Back", "Arms", "Shoulders", "Legs"] as const;

export type BodyPart = (typeof BODY_PARTS)[number];

export type ExerciseCatalog = Readonly<Record<BodyPart, readonly string[]>>;

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "../data/exerciseCatalog.json");

const exerciseList = z.array(z.string().trim().min(1)).min(1);

const CatalogSchema = z
  .object({
    Chest: exerciseList,
    Back: exerciseList,
    Arms: exerciseList,
    Shoulders: exerciseList,
    Legs: exerciseList,
  })
  .strict();

export function parseExerciseCatalog(raw: unknown): ExerciseCatalog {
  const parsed = CatalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new AppError("Exercise catalog is malformed", {
      code: "INVALID_CATALOG",
      details: describeIssues(parsed.error),
    });
  }
  return Object.freeze(parsed.data);
}

export async function loadExerciseCatalog(
  filePath: string = DEFAULT_CATALOG_PATH,
  opts: { verbose?: boolean } = {}
): Promise<ExerciseCatalog> {
  const text = await readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new AppError(`Exercise catalog is not valid JSON: ${filePath}`, {
      code: "INVALID_CATALOG",
      details: err instanceof Error ? err.message : String(err),
    });
  }
  const catalog = parseExerciseCatalog(raw);
  if (opts.verbose) {
    const total = BODY_PARTS.reduce((sum, part) => sum + catalog[part].length, 0);
    console.log(`Catalog: ${total} exercises loaded from ${filePath}`);
  }
  return catalog;
}
