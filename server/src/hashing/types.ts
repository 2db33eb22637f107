/**
 * Hashing Types
 */

// ============================================
// RESULT STORE
// ============================================

export type LookupResult =
  | { status: "found"; value: string }
  | { status: "pending" }
  | { status: "out_of_range" };

// ============================================
// RETRIEVAL
// ============================================

export type RetrieveErrorCode = "missing_id" | "invalid_id" | "out_of_range" | "not_ready";

export type RetrieveResult =
  | { ok: true; value: string }
  | { ok: false; code: RetrieveErrorCode; message: string };

export const RETRIEVE_ERROR_MESSAGES: Record<RetrieveErrorCode, string> = {
  missing_id: "Missing hash id parameter.",
  invalid_id: "Invalid hash id.",
  out_of_range: "Index out of range.",
  not_ready: "Hash not generated yet.",
};

// ============================================
// STATS
// ============================================

export type StatsSnapshot = {
  /** Number of recorded submissions */
  total: number;
  /** Truncated mean of the recorded durations, in microseconds */
  average: number;
};
