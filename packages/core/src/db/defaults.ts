/**
 * Safe session defaults for query execution.
 */

export const SAFE_DEFAULTS = {
  /** LIMIT appended to queries missing one */
  defaultLimit: 200,
  /** Largest LIMIT a query may carry before it is clamped */
  maxLimit: 10_000,
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
} as const;
