/**
 * Coinvest Zod Schemas
 * Validation schemas for requests and environment
 *
 * @version 1.0.0
 */

import { z } from "zod";
import { CLUB_DEFAULTS } from "../constants/index.js";
import { u64StringSchema } from "./common.js";

// ============================================
// RE-EXPORT ALL SCHEMAS
// ============================================

// Common primitives
export * from "./common.js";

// Domain schemas
export * from "./domain.js";

// ============================================
// ENVIRONMENT SCHEMA
// ============================================

export const envSchema = z.object({
  // Club engine
  ENFORCE_UNIQUE_MEMBERSHIP: z
    .string()
    .transform((v) => v === "true")
    .default(String(CLUB_DEFAULTS.enforceUniqueMembership)),
  ENFORCE_SINGLE_OBLIGATION: z
    .string()
    .transform((v) => v === "true")
    .default(String(CLUB_DEFAULTS.enforceSingleObligation)),
  OVERDUE_GRACE_MS: u64StringSchema.default(CLUB_DEFAULTS.overdueGraceMs.toString()),

  // Logging
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("json"),

  // Node
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
});

export type EnvConfig = z.infer<typeof envSchema>;
