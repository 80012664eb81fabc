const UNDEFINED_TABLE = "42P01";

function codeOf(err: unknown): unknown {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return err.code;
}

/**
 * True when `err`, or the error it wraps, is Postgres' undefined_table.
 */
export function isUndefinedTableError(err: unknown): boolean {
  if (codeOf(err) === UNDEFINED_TABLE) return true;
  if (err instanceof Error && err.cause !== undefined) {
    return codeOf(err.cause) === UNDEFINED_TABLE;
  }
  return false;
}
