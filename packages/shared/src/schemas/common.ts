/**
 * Common Schema Primitives
 * Shared types used across all schemas
 */

import { z } from "zod";
import { U64_MAX } from "../constants/index.js";

// ============================================
// SCHEMA VERSIONING
// ============================================

export const CURRENT_SCHEMA_VERSION = "1.0.0";

export const schemaVersionSchema = z.string().regex(
  /^\d+\.\d+\.\d+$/,
  "Schema version must be in semver format (e.g., 1.0.0)"
);

// ============================================
// PRIMITIVE SCHEMAS
// ============================================

/**
 * Unsigned 64-bit amount in the smallest accounting unit
 */
export const u64Schema = z
  .bigint()
  .min(0n, "Value must not be negative")
  .max(U64_MAX, "Value exceeds the unsigned 64-bit range");

/** Milliseconds since the epoch, as handed in by the caller's clock */
export const timestampSchema = u64Schema;

/** Opaque participant identity (address, account id, ...) */
export const participantIdSchema = z
  .string()
  .min(1, "Participant identity must not be empty");

/** UUID validation */
export const uuidSchema = z.string().uuid();

/**
 * Decimal string of digits, converted to bigint. Used for environment values.
 */
export const u64StringSchema = z
  .string()
  .regex(/^\d+$/, "Value must be a numeric string")
  .transform((v) => BigInt(v))
  .pipe(u64Schema);

// ============================================
// COMMON ENUMS
// ============================================

/**
 * Closed two-valued tag. Extending it is a modelling change, not a fix.
 */
export const genderSchema = z.enum(["male", "female"]);
export type Gender = z.infer<typeof genderSchema>;

export const investmentStatusSchema = z.enum(["pending", "paid", "overdue"]);
export type InvestmentStatus = z.infer<typeof investmentStatusSchema>;
