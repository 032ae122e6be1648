/**
 * Club Engine Configuration
 */

import { z } from "zod";
import { envSchema, u64Schema } from "@coinvest/shared";
import type { ClubEngineConfig } from "./types.js";

// ============================================
// CLUB ENGINE CONFIG SCHEMA
// ============================================

const clubEngineConfigSchema = z.object({
  enforceUniqueMembership: z.boolean(),
  enforceSingleObligation: z.boolean(),
  overdueGraceMs: u64Schema,
});

// ============================================
// LOAD CONFIGURATION
// ============================================

export function loadClubEngineConfig(
  source: Record<string, string | undefined> = process.env
): ClubEngineConfig {
  const env = envSchema.parse(source);

  const config: ClubEngineConfig = {
    enforceUniqueMembership: env.ENFORCE_UNIQUE_MEMBERSHIP,
    enforceSingleObligation: env.ENFORCE_SINGLE_OBLIGATION,
    overdueGraceMs: env.OVERDUE_GRACE_MS,
  };

  return clubEngineConfigSchema.parse(config);
}
