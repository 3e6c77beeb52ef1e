// ─── Variable Bindings ─────────────────────────────────────────────
// Parses `--vars` files and `--var name=value` flags into engine values.
// This is the parse boundary for user-supplied variables.

import { formatZodIssues, fromJson, type JsonValue, type Value } from "@logex/core";
import { z } from "zod";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.boolean(), z.number(), z.string(), z.array(JsonValueSchema)])
);

export const VariablesFileSchema = z.record(z.string().min(1), JsonValueSchema);

export type VariablesFile = z.infer<typeof VariablesFileSchema>;

/** Raised for a malformed `--var` flag or an unreadable variables file. */
export class VariableBindingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VariableBindingError";
  }
}

/**
 * Parses the text of a variables file (a JSON object).
 *
 * @throws {VariableBindingError} if the text is not JSON, or holds anything
 * but variable bindings.
 */
export function parseVariablesFile(text: string): Record<string, Value> {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new VariableBindingError("Variables file is not valid JSON.", { cause: error });
  }

  const result = VariablesFileSchema.safeParse(json);
  if (!result.success) {
    throw new VariableBindingError(formatZodIssues("variables file", result.error.issues), {
      cause: result.error,
    });
  }
  return Object.fromEntries(
    Object.entries(result.data).map(([name, value]) => [name, fromJson(value)])
  );
}

/**
 * Parses a `name=value` flag. The value is read as JSON when it parses to
 * a boolean, number, string or array of those; anything else is taken as
 * a plain string: `n=42` binds a Number, `s=hello` a String.
 *
 * @throws {VariableBindingError} when there is no `=` or no name.
 */
export function parseVariableFlag(flag: string): [string, Value] {
  const separator = flag.indexOf("=");
  const name = separator === -1 ? "" : flag.slice(0, separator).trim();
  if (name.length === 0) {
    throw new VariableBindingError(`Invalid variable '${flag}', expected name=value`);
  }

  const raw = flag.slice(separator + 1);
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    json = raw;
  }

  const parsed = JsonValueSchema.safeParse(json);
  return [name, fromJson(parsed.success ? parsed.data : raw)];
}
