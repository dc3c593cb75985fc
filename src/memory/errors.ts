export type MemoryErrorCode =
  | "not_found"
  | "invalid_argument"
  | "already_exists"
  | "unavailable"
  | "internal";

export class MemoryError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MemoryError";
    this.code = code;
  }
}

export function isMemoryError(error: unknown, code?: MemoryErrorCode): error is MemoryError {
  if (!(error instanceof MemoryError)) return false;
  return code === undefined || error.code === code;
}

function sqliteCode(error: unknown): string | null {
  if (!(error instanceof Error) || !("code" in error)) return null;
  return typeof error.code === "string" ? error.code : null;
}

export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteCode(error);
  return code === "SQLITE_CONSTRAINT_UNIQUE" || code === "SQLITE_CONSTRAINT_PRIMARYKEY";
}

/**
 * Maps a better-sqlite3 failure onto the engine's error kinds. Errors that are
 * already MemoryErrors pass through untouched.
 */
export function toMemoryError(error: unknown, context: string): MemoryError {
  if (error instanceof MemoryError) return error;
  const code = sqliteCode(error) ?? "";
  const detail = error instanceof Error ? error.message : String(error);
  if (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED")) {
    return new MemoryError("unavailable", `${context}: database is busy (${detail})`, { cause: error });
  }
  if (isUniqueViolation(error)) {
    return new MemoryError("already_exists", `${context}: ${detail}`, { cause: error });
  }
  return new MemoryError("internal", `${context}: ${detail}`, { cause: error });
}
