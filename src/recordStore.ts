// recordStore.ts
// Append-only daily log: one comma-delimited file per calendar date.

import { mkdir, open, stat } from "node:fs/promises";
import path from "node:path";
import type { UserProfile } from "./bmi.js";
import type { BodyPart } from "./catalog.js";

export type FileExtension = "csv" | "xls";

export type Clock = () => Date;

export interface ExerciseRecord {
  readonly timestamp: Date;
  readonly bodyPart: BodyPart;
  readonly exerciseName: string;
  readonly weightKg: number;
  readonly reps: number;
  readonly sets: number;
}

export const LOG_HEADER = [
  "Date",
  "Height (cm)",
  "Weight (kg)",
  "BMI",
  "BMI Category",
  "Trained Body Part",
  "Exercise",
  "Weight (kg)",
  "Reps",
  "Sets",
] as const;

const ROW_END = "\r\n";

const pad2 = (n: number) => String(n).padStart(2, "0");

/** Local calendar date, YYYY-MM-DD. */
export function formatDate(value: Date): string {
  return `${value.getFullYear()}-${pad2(value.getMonth() + 1)}-${pad2(value.getDate())}`;
}

/** Local time, YYYY-MM-DD HH:mm:ss. */
export function formatTimestamp(value: Date): string {
  return `${formatDate(value)} ${pad2(value.getHours())}:${pad2(value.getMinutes())}:${pad2(value.getSeconds())}`;
}

export function dailyLogFileName(date: Date, ext: FileExtension): string {
  return `${formatDate(date)}.${ext}`;
}

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsvLine(values: ReadonlyArray<string | number>): string {
  return values.map(csvField).join(",") + ROW_END;
}

export function toLogRow(record: ExerciseRecord, profile: UserProfile): Array<string | number> {
  return [
    formatTimestamp(record.timestamp),
    profile.heightCm,
    profile.weightKg,
    profile.bmi,
    profile.bmiCategory,
    record.bodyPart,
    record.exerciseName,
    record.weightKg,
    record.reps,
    record.sets,
  ];
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return false;
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/** Creates the log directory if needed; true when it had to be created. */
export async function ensureLogDirectory(dir: string): Promise<boolean> {
  const created = await mkdir(dir, { recursive: true });
  return created !== undefined;
}

export interface RecordStore {
  pathFor(date: Date): string;
  /** Appends the records to today's file and resolves to its path. */
  appendRecords(records: readonly ExerciseRecord[], profile: UserProfile): Promise<string>;
}

export interface RecordStoreOptions {
  dir: string;
  fileExtension: FileExtension;
  now?: Clock;
  verbose?: boolean;
}

export function createRecordStore(opts: RecordStoreOptions): RecordStore {
  const now = opts.now ?? (() => new Date());

  const pathFor = (date: Date) => path.join(opts.dir, dailyLogFileName(date, opts.fileExtension));

  async function appendRecords(records: readonly ExerciseRecord[], profile: UserProfile): Promise<string> {
    const filePath = pathFor(now());
    if (!records.length) return filePath;

    const exists = await fileExists(filePath);
    let body = exists ? "" : toCsvLine(LOG_HEADER);
    for (const record of records) body += toCsvLine(toLogRow(record, profile));

    const handle = await open(filePath, "a");
    try {
      await handle.write(body);
    } finally {
      await handle.close();
    }

    if (opts.verbose) {
      console.log(`Store: appended ${records.length} row(s) to ${filePath}${exists ? "" : " (new file)"}`);
    }
    return filePath;
  }

  return { pathFor, appendRecords };
}
