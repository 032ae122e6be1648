/**
 * Club Domain Schemas
 * Request shapes accepted by the club engine service.
 *
 * These check representability only (strings, unsigned 64-bit bigints,
 * closed enums). Business rules belong to the engine.
 *
 * Schema Version: 1.0.0
 */

import { z } from "zod";
import { CLUB_DEFAULTS } from "../constants/index.js";
import {
  genderSchema,
  investmentStatusSchema,
  participantIdSchema,
  timestampSchema,
  u64Schema,
  uuidSchema,
} from "./common.js";

// ============================================
// 1. CLUB
// ============================================

export const createClubInputSchema = z.object({
  name: z.string(),
  /** Free-form type tag ("savings", "equity", ...) */
  clubType: z.string(),
  rules: z.string(),
  description: z.string(),
  active: z.boolean(),
});

export type CreateClubInput = z.infer<typeof createClubInputSchema>;

// ============================================
// 2. MEMBER
// ============================================

export const addMemberInputSchema = z.object({
  memberId: participantIdSchema,
  name: z.string(),
  gender: genderSchema,
  contact: z.string(),
  /** Multiplier applied to every base amount scheduled for this member */
  shares: u64Schema,
});

export type AddMemberInput = z.infer<typeof addMemberInputSchema>;

// ============================================
// 3. INVESTMENT OBLIGATION
// ============================================

export const generateInvestmentRequestSchema = z.object({
  clubId: uuidSchema,
  memberId: participantIdSchema,
  payerId: participantIdSchema,
  baseAmount: u64Schema,
  status: investmentStatusSchema.default(CLUB_DEFAULTS.initialInvestmentStatus),
  /** Milliseconds from `now` until the obligation falls due */
  offset: u64Schema,
  now: timestampSchema,
});

export type GenerateInvestmentRequest = z.input<typeof generateInvestmentRequestSchema>;

export const payInvestmentRequestSchema = z.object({
  clubId: uuidSchema,
  payerId: participantIdSchema,
  memberId: participantIdSchema,
  amount: u64Schema,
  now: timestampSchema,
});

export type PayInvestmentRequest = z.infer<typeof payInvestmentRequestSchema>;

export const statusQueryRequestSchema = z.object({
  clubId: uuidSchema,
  memberId: participantIdSchema,
  payerId: participantIdSchema,
});

export type StatusQueryRequest = z.infer<typeof statusQueryRequestSchema>;
