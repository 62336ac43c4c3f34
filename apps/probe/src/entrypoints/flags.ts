import { z } from "zod";
import { httpUrl } from "@maximize-probe/config";

// =============================================================================
// Command line flags
// =============================================================================
// Every bad flag surfaces as UsageError, which the entrypoints exit 2 on.
// =============================================================================

const timeoutFlag = z.coerce.number().int().positive();

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isParseArgsError(error: unknown): error is TypeError & { code: string } {
  return (
    error instanceof TypeError &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("ERR_PARSE_ARGS_")
  );
}

/**
 * Run a `parseArgs` call, turning its unknown-option and missing-value
 * errors into UsageError
 */
export function parseFlags<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    if (isParseArgsError(error)) {
      throw new UsageError(error.message);
    }
    throw error;
  }
}

function flag<T>(schema: z.ZodType<T>, name: string, value: string | undefined): T | undefined {
  if (value === undefined) return undefined;
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UsageError(`Invalid --${name}: ${result.error.issues[0]?.message ?? value}`);
  }
  return result.data;
}

export function parseUrlFlag(name: string, value: string | undefined): string | undefined {
  return flag(httpUrl, name, value);
}

export function parseTimeoutFlag(name: string, value: string | undefined): number | undefined {
  return flag(timeoutFlag, name, value);
}

export function parseApiKeyFlag(name: string, value: string | undefined): string | undefined {
  if (value === "") {
    throw new UsageError(`Invalid --${name}: must not be empty`);
  }
  return value;
}

export function exitCodeForError(error: unknown): 1 | 2 {
  return error instanceof UsageError ? 2 : 1;
}
