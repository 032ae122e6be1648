/**
 * Treasury Ledger
 *
 * Reads and withdraws the pooled club balance:
 * - withdrawal is capability-gated and all-or-nothing
 * - balance reads are open
 *
 * The balance only ever grows through settlements (see PaymentProcessor)
 * and only ever shrinks here, to zero.
 */

import { audit, clubEngineLogger as logger } from "@coinvest/shared";
import { authorize, type CapabilityToken } from "./capability-token.js";
import type { Club, Funds } from "./types.js";

const treasuryLogger = logger.child({ component: "treasury-ledger" });

// ============================================
// TREASURY LEDGER
// ============================================

export class TreasuryLedger {
  /**
   * Zero the balance and hand the whole prior balance to the caller
   */
  withdrawFunds(token: CapabilityToken, club: Club): Funds {
    authorize(token, club);

    const amount = club.balance;
    club.balance = 0n;

    audit({
      action: "funds_withdrawn",
      entityType: "club",
      entityId: club.id,
      actor: token.id,
      details: { amount: amount.toString() },
    });

    treasuryLogger.info({
      clubId: club.id,
      amount: amount.toString(),
    }, "Treasury withdrawn");

    return { clubId: club.id, amount };
  }

  getBalance(club: Club): bigint {
    return club.balance;
  }
}

/**
 * Factory function
 */
export function createTreasuryLedger(): TreasuryLedger {
  return new TreasuryLedger();
}
