/**
 * Investment Scheduler
 *
 * Records payment obligations for members:
 * - amount payable = base amount x member shares (checked u64)
 * - due = now + offset (checked u64)
 * - keyed by the identity expected to pay
 *
 * Both operations require the club's capability token.
 */

import { clubEngineLogger as logger } from "@coinvest/shared";
import { authorize, type CapabilityToken } from "./capability-token.js";
import { checkedAdd, checkedMul } from "./checked-math.js";
import { isPayable, transitionInvestment } from "./investment-status.js";
import type {
  Club,
  ClubEngineConfig,
  Investment,
  InvestmentStatus,
  Member,
  ParticipantId,
} from "./types.js";
import {
  DEFAULT_CLUB_ENGINE_CONFIG,
  ObligationOutstandingError,
} from "./types.js";

const schedulerLogger = logger.child({ component: "investment-scheduler" });

// ============================================
// INVESTMENT SCHEDULER
// ============================================

export class InvestmentScheduler {
  private readonly config: ClubEngineConfig;

  constructor(config?: Partial<ClubEngineConfig>) {
    this.config = { ...DEFAULT_CLUB_ENGINE_CONFIG, ...config };

    schedulerLogger.info({
      enforceSingleObligation: this.config.enforceSingleObligation,
      overdueGraceMs: this.config.overdueGraceMs.toString(),
    }, "InvestmentScheduler initialized");
  }

  /**
   * Compute and store an obligation for `member`, payable by `payerId`.
   * Everything is computed before the club is touched.
   */
  generateInvestment(
    token: CapabilityToken,
    club: Club,
    member: Member,
    payerId: ParticipantId,
    baseAmount: bigint,
    status: InvestmentStatus,
    offset: bigint,
    now: bigint
  ): Investment {
    authorize(token, club);

    const amountPayable = checkedMul(baseAmount, member.shares);
    const due = checkedAdd(now, offset);

    const existing = club.investments.get(payerId);
    if (existing && isPayable(existing.status)) {
      if (this.config.enforceSingleObligation) {
        throw new ObligationOutstandingError(
          `Payer ${payerId} already has an outstanding obligation in club ${club.id}`,
          club.id,
          payerId,
          existing.status
        );
      }
      schedulerLogger.warn({
        clubId: club.id,
        payerId,
        replacedAmount: existing.amountPayable.toString(),
        replacedDue: existing.due.toString(),
      }, "Overwriting outstanding obligation");
    }

    const investment: Investment = {
      memberId: member.id,
      amountPayable,
      due,
      status,
    };
    club.investments.set(payerId, investment);

    schedulerLogger.info({
      clubId: club.id,
      memberId: member.id,
      payerId,
      amountPayable: amountPayable.toString(),
      due: due.toString(),
      status,
    }, "Investment generated");

    return investment;
  }

  /**
   * Move every pending obligation whose due date has passed by more than
   * the grace period to overdue. Returns the payer identities marked.
   */
  markOverdue(token: CapabilityToken, club: Club, now: bigint): ParticipantId[] {
    authorize(token, club);

    const marked: ParticipantId[] = [];
    for (const [payerId, investment] of club.investments) {
      if (investment.status !== "pending" || now <= investment.due) {
        continue;
      }
      if (now - investment.due <= this.config.overdueGraceMs) {
        continue;
      }
      club.investments.set(payerId, transitionInvestment(investment, "overdue"));
      marked.push(payerId);
    }

    if (marked.length > 0) {
      schedulerLogger.info({
        clubId: club.id,
        count: marked.length,
      }, "Obligations marked overdue");
    }

    return marked;
  }
}

/**
 * Factory function
 */
export function createInvestmentScheduler(
  config?: Partial<ClubEngineConfig>
): InvestmentScheduler {
  return new InvestmentScheduler(config);
}
