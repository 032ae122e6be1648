/**
 * Payment Processor
 *
 * Settles the obligation stored under a payer's identity. Open to any caller
 * holding a matching obligation and the exact amount; no capability needed.
 *
 * Checks, in order (first failure wins, nothing is mutated):
 * 1. obligation exists for the payer
 * 2. status is pending or overdue
 * 3. now >= due (no early settlement)
 * 4. amount equals amount payable
 * 5. balance + amount fits in u64
 */

import { logSettlement } from "@coinvest/shared";
import { checkedAdd } from "./checked-math.js";
import { isPayable, transitionInvestment } from "./investment-status.js";
import type { Club, Member, ParticipantId, SettlementReceipt } from "./types.js";
import {
  AlreadySettledError,
  AmountMismatchError,
  ObligationNotFoundError,
  PaymentWindowClosedError,
} from "./types.js";

// ============================================
// PAYMENT PROCESSOR
// ============================================

export class PaymentProcessor {
  /**
   * The receipt is the only record of the settlement the engine produces;
   * the club keeps the balance increase and the member's paid flag.
   * `member` is flagged as given; it is not matched against the
   * obligation's memberId.
   */
  payInvestment(
    club: Club,
    payerId: ParticipantId,
    member: Member,
    paymentAmount: bigint,
    now: bigint
  ): SettlementReceipt {
    const investment = club.investments.get(payerId);
    if (!investment) {
      throw new ObligationNotFoundError(
        `No obligation for payer ${payerId} in club ${club.id}`,
        club.id,
        payerId
      );
    }

    if (!isPayable(investment.status)) {
      throw new AlreadySettledError(
        `Obligation for payer ${payerId} is already ${investment.status}`,
        payerId,
        investment.status
      );
    }

    if (now < investment.due) {
      throw new PaymentWindowClosedError(
        `Obligation for payer ${payerId} is not due until ${investment.due}`,
        investment.due,
        now
      );
    }

    if (paymentAmount !== investment.amountPayable) {
      throw new AmountMismatchError(
        `Payment of ${paymentAmount} does not match amount payable ${investment.amountPayable}`,
        investment.amountPayable,
        paymentAmount
      );
    }

    const newBalance = checkedAdd(club.balance, paymentAmount);
    const settled = transitionInvestment(investment, "paid");

    club.investments.delete(payerId);
    club.balance = newBalance;
    member.paid = true;

    logSettlement("info", "investment_settled", {
      clubId: club.id,
      payerId,
      memberId: member.id,
      amount: paymentAmount,
      newBalance,
    }, "Investment settled");

    return {
      clubId: club.id,
      payerId,
      investment: settled,
      amount: paymentAmount,
      newBalance,
      settledAt: now,
    };
  }
}

/**
 * Factory function
 */
export function createPaymentProcessor(): PaymentProcessor {
  return new PaymentProcessor();
}
