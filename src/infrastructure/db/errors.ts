const UNIQUE_FAILED = /UNIQUE constraint failed: ([\w.]+)/

/** `table.column` named by a failed UNIQUE constraint, or null for any other error. */
export function uniqueViolationColumn(err: unknown): string | null {
  if (!(err instanceof Error)) return null
  const match = UNIQUE_FAILED.exec(err.message)
  if (match) return match[1]
  return err.cause === undefined ? null : uniqueViolationColumn(err.cause)
}
