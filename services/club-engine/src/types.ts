/**
 * Club Engine Types
 *
 * Types for the investment club lifecycle:
 * - Club, Member and Investment records
 * - Settlement receipts and withdrawn funds
 * - Engine configuration
 * - Error classes
 */

import {
  CLUB_DEFAULTS,
  type Gender,
  type InvestmentStatus,
} from "@coinvest/shared";

export type { Gender, InvestmentStatus };

/**
 * Opaque participant identity. The engine never interprets it.
 */
export type ParticipantId = string;

// ============================================
// CLUB
// ============================================

export interface Club {
  readonly id: string;
  name: string;
  clubType: string;
  rules: string;
  description: string;
  readonly foundedAt: bigint;
  active: boolean;

  // Keyed by participant identity
  readonly members: Map<ParticipantId, Member>;
  // Keyed by the identity expected to pay, which may differ from the member
  readonly investments: Map<ParticipantId, Investment>;

  /** Pooled treasury, u64 in the smallest accounting unit */
  balance: bigint;
}

/**
 * Read-only view of a club handed out by the service facade. Mutation goes
 * through the service so that it stays serialized and checked.
 */
export type ClubView = Readonly<Omit<Club, "members" | "investments">> & {
  readonly members: ReadonlyMap<ParticipantId, Readonly<Member>>;
  readonly investments: ReadonlyMap<ParticipantId, Investment>;
};

// ============================================
// MEMBER
// ============================================

export interface Member {
  readonly id: ParticipantId;
  readonly clubId: string;
  name: string;
  gender: Gender;
  contact: string;
  shares: bigint;
  paid: boolean;
  readonly joinedAt: bigint;
}

// ============================================
// INVESTMENT OBLIGATION
// ============================================

/**
 * Investment values are immutable; status changes produce a new value
 * through transitionInvestment.
 */
export interface Investment {
  readonly memberId: ParticipantId;
  readonly amountPayable: bigint;
  readonly due: bigint;
  readonly status: InvestmentStatus;
}

/**
 * Result of a successful settlement. The investment is detached from the
 * club and carries status "paid".
 */
export interface SettlementReceipt {
  clubId: string;
  payerId: ParticipantId;
  investment: Investment;
  amount: bigint;
  newBalance: bigint;
  settledAt: bigint;
}

/**
 * Funds released by a full treasury withdrawal
 */
export interface Funds {
  clubId: string;
  amount: bigint;
}

export interface MemberInvestmentStatus {
  paid: boolean;
  status: InvestmentStatus;
}

// ============================================
// CONFIGURATION
// ============================================

export interface ClubEngineConfig {
  enforceUniqueMembership: boolean;
  enforceSingleObligation: boolean;
  overdueGraceMs: bigint;
}

export const DEFAULT_CLUB_ENGINE_CONFIG: ClubEngineConfig = {
  enforceUniqueMembership: CLUB_DEFAULTS.enforceUniqueMembership,
  enforceSingleObligation: CLUB_DEFAULTS.enforceSingleObligation,
  overdueGraceMs: CLUB_DEFAULTS.overdueGraceMs,
};

// ============================================
// ERRORS
// ============================================

export type ClubEngineErrorCode =
  | "ACCESS_DENIED"
  | "ALREADY_SETTLED"
  | "PAYMENT_WINDOW_CLOSED"
  | "AMOUNT_MISMATCH"
  | "ARITHMETIC_OVERFLOW"
  | "INVALID_STATUS_TRANSITION"
  | "CLUB_NOT_FOUND"
  | "MEMBER_NOT_FOUND"
  | "OBLIGATION_NOT_FOUND"
  | "DUPLICATE_MEMBER"
  | "OBLIGATION_OUTSTANDING"
  | "INVALID_INPUT";

export class ClubEngineError extends Error {
  constructor(
    message: string,
    public readonly code: ClubEngineErrorCode
  ) {
    super(message);
    this.name = "ClubEngineError";
  }
}

export class AccessDeniedError extends ClubEngineError {
  constructor(
    message: string,
    public readonly clubId: string,
    public readonly tokenClubId: string
  ) {
    super(message, "ACCESS_DENIED");
    this.name = "AccessDeniedError";
  }
}

export class AlreadySettledError extends ClubEngineError {
  constructor(
    message: string,
    public readonly payerId: ParticipantId,
    public readonly status: InvestmentStatus
  ) {
    super(message, "ALREADY_SETTLED");
    this.name = "AlreadySettledError";
  }
}

export class PaymentWindowClosedError extends ClubEngineError {
  constructor(
    message: string,
    public readonly due: bigint,
    public readonly currentTime: bigint
  ) {
    super(message, "PAYMENT_WINDOW_CLOSED");
    this.name = "PaymentWindowClosedError";
  }
}

export class AmountMismatchError extends ClubEngineError {
  constructor(
    message: string,
    public readonly expected: bigint,
    public readonly received: bigint
  ) {
    super(message, "AMOUNT_MISMATCH");
    this.name = "AmountMismatchError";
  }
}

export class ArithmeticOverflowError extends ClubEngineError {
  constructor(
    message: string,
    public readonly operation: "add" | "mul",
    public readonly left: bigint,
    public readonly right: bigint
  ) {
    super(message, "ARITHMETIC_OVERFLOW");
    this.name = "ArithmeticOverflowError";
  }
}

export class InvalidStatusTransitionError extends ClubEngineError {
  constructor(
    message: string,
    public readonly from: InvestmentStatus,
    public readonly to: InvestmentStatus
  ) {
    super(message, "INVALID_STATUS_TRANSITION");
    this.name = "InvalidStatusTransitionError";
  }
}

export class ClubNotFoundError extends ClubEngineError {
  constructor(message: string, public readonly clubId: string) {
    super(message, "CLUB_NOT_FOUND");
    this.name = "ClubNotFoundError";
  }
}

export class MemberNotFoundError extends ClubEngineError {
  constructor(
    message: string,
    public readonly clubId: string,
    public readonly memberId: ParticipantId
  ) {
    super(message, "MEMBER_NOT_FOUND");
    this.name = "MemberNotFoundError";
  }
}

export class ObligationNotFoundError extends ClubEngineError {
  constructor(
    message: string,
    public readonly clubId: string,
    public readonly payerId: ParticipantId
  ) {
    super(message, "OBLIGATION_NOT_FOUND");
    this.name = "ObligationNotFoundError";
  }
}

export class DuplicateMemberError extends ClubEngineError {
  constructor(
    message: string,
    public readonly clubId: string,
    public readonly memberId: ParticipantId
  ) {
    super(message, "DUPLICATE_MEMBER");
    this.name = "DuplicateMemberError";
  }
}

export class ObligationOutstandingError extends ClubEngineError {
  constructor(
    message: string,
    public readonly clubId: string,
    public readonly payerId: ParticipantId,
    public readonly status: InvestmentStatus
  ) {
    super(message, "OBLIGATION_OUTSTANDING");
    this.name = "ObligationOutstandingError";
  }
}

export class InvalidInputError extends ClubEngineError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message, "INVALID_INPUT");
    this.name = "InvalidInputError";
  }
}
