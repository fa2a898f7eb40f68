// src/config.ts
import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_CATALOG_PATH } from "./catalog.js";
import { AppError } from "./errors.js";
import type { FileExtension } from "./recordStore.js";
import { describeIssues } from "./validation.js";

dotenv.config();

export interface Config {
  logDir: string;
  fileExtension: FileExtension;
  catalogPath: string;
  maxAttempts?: number;
  color: boolean;
  nodeEnv: "development" | "production" | "test";
}

export interface HostInfo {
  platform: NodeJS.Platform;
  homeDir: string;
  isTTY: boolean;
}

const blank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);
const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blank, schema.optional());

const EnvSchema = z.object({
  GYM_LOG_DIR: optional(z.string().trim()),
  GYM_LOG_FILE_EXTENSION: optional(z.string().trim().toLowerCase().pipe(z.enum(["csv", "xls"]))),
  GYM_LOG_CATALOG: optional(z.string().trim()),
  GYM_LOG_MAX_ATTEMPTS: optional(z.coerce.number().int().positive()),
  NO_COLOR: optional(z.string()),
  NODE_ENV: optional(z.enum(["development", "production", "test"])),
});

export function defaultLogDir(homeDir: string): string {
  return path.join(homeDir, "Documents", "Gym Progress");
}

/** Spreadsheet-friendly extension on Windows, plain csv elsewhere. */
export function defaultFileExtension(platform: NodeJS.Platform): FileExtension {
  return platform === "win32" ? "xls" : "csv";
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  host: HostInfo = { platform: process.platform, homeDir: os.homedir(), isTTY: Boolean(process.stdout.isTTY) }
): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError("Invalid environment configuration", {
      code: "INVALID_CONFIG",
      details: describeIssues(parsed.error),
    });
  }
  const e = parsed.data;

  return {
    logDir: path.resolve(e.GYM_LOG_DIR ?? defaultLogDir(host.homeDir)),
    fileExtension: e.GYM_LOG_FILE_EXTENSION ?? defaultFileExtension(host.platform),
    catalogPath: e.GYM_LOG_CATALOG ? path.resolve(e.GYM_LOG_CATALOG) : DEFAULT_CATALOG_PATH,
    maxAttempts: e.GYM_LOG_MAX_ATTEMPTS,
    color: host.isTTY && e.NO_COLOR === undefined,
    nodeEnv: e.NODE_ENV ?? "production",
  };
}
