// Input validation with zod
import { z } from "zod";

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: string };

const NUMBER_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;
const DIGITS_RE = /^\d+$/;

export const PositiveFloatSchema = z
  .string()
  .trim()
  .regex(NUMBER_RE, "Invalid input. Please enter a valid number.")
  .transform(Number)
  .pipe(z.number().finite("Invalid input. Please enter a valid number.").positive("Please enter a positive number."));

export const PositiveIntSchema = z
  .string()
  .trim()
  .regex(INTEGER_RE, "Invalid input. Please enter a valid whole number.")
  .transform(Number)
  .pipe(z.number().int().positive("Please enter a positive whole number.").safe("Please enter a smaller whole number."));

export const YesNoSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["yes", "y", "no", "n"], {
    errorMap: () => ({ message: "Invalid input. Please enter 'yes', 'y', 'no', or 'n'." }),
  }))
  .transform((answer) => answer === "yes" || answer === "y");

/** 1-based index into a menu of `itemCount` entries. */
export function menuIndexSchema(itemCount: number) {
  return z
    .string()
    .trim()
    .regex(DIGITS_RE, "Please select a valid number.")
    .transform(Number)
    .pipe(z.number().int().min(1, "Please select a valid number.").max(itemCount, "Please select a valid number."));
}

export function validate<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(data);
  if (parsed.success) return { success: true, data: parsed.data };
  return { success: false, error: formatIssues(parsed.error) };
}

/** First message only: prompts show one line per rejected answer. */
function formatIssues(error: z.ZodError): string {
  const [first] = error.errors;
  return first ? first.message : "Validation failed";
}

export function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join("; ");
}
