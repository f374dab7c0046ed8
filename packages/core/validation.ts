import { BracketUsageError, type UsageErrorCode } from "./errors.ts";

export type ValidationError = {
  code: UsageErrorCode;
  message: string;
  suggestion?: string;
  details?: Record<string, unknown>;
};

export type ValidationResult =
  | { valid: true }
  | { valid: false; errors: readonly ValidationError[] };

const suggestions: Record<string, string> = {
  acquire: "Pass a zero-argument function returning ok(resource) or err(e)",
  release: "Pass a function that frees the resource it receives",
  use: "Pass a function that operates on the resource it receives",
};

/**
 * Checks that every named callback is callable. Untyped callers (plain
 * JavaScript, values read from config) reach the bracket through here.
 */
export const validateCallbacks = (
  callbacks: Record<string, unknown>,
): ValidationResult => {
  const errors: ValidationError[] = [];

  for (const [name, value] of Object.entries(callbacks)) {
    if (typeof value === "function") continue;
    errors.push({
      code: "NOT_CALLABLE",
      message: `'${name}' must be a function, received ${describeType(value)}`,
      suggestion: suggestions[name],
      details: { name },
    });
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true };
};

export const assertValidCallbacks = (
  callbacks: Record<string, unknown>,
): void => {
  const result = validateCallbacks(callbacks);
  if (result.valid) return;

  const lines = result.errors.map((e) =>
    e.suggestion ? `${e.message}. ${e.suggestion}` : e.message
  );
  throw new BracketUsageError(
    "NOT_CALLABLE",
    `Invalid bracket call:\n${lines.join("\n")}`,
  );
};

const describeType = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
};
