/**
 * Coinvest Constants
 */

// ============================================
// ACCOUNTING LIMITS
// ============================================

/** Largest value an amount, share count or timestamp may hold (2^64 - 1) */
export const U64_MAX = 18_446_744_073_709_551_615n;

// ============================================
// CLUB ENGINE DEFAULTS
// ============================================
export const CLUB_DEFAULTS = {
  // Off: adding the same identity twice replaces the mapping entry
  enforceUniqueMembership: false,

  // Off: a second obligation for the same payer replaces the first
  enforceSingleObligation: false,

  // A pending obligation becomes overdue once now - due exceeds this
  overdueGraceMs: 0n,

  // Status given to obligations when the caller does not name one
  initialInvestmentStatus: "pending",
} as const;

// ============================================
// TIME CONSTANTS
// ============================================
export const TIME = {
  SECOND_MS: 1000n,
  MINUTE_MS: 60n * 1000n,
  HOUR_MS: 60n * 60n * 1000n,
  DAY_MS: 24n * 60n * 60n * 1000n,
} as const;
