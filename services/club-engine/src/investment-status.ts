/**
 * Investment status machine
 *
 * STATES:
 * - pending: scheduled, not yet settled
 * - overdue: pending past its due date plus grace, still payable
 * - paid: settled (terminal)
 */

import type { Investment, InvestmentStatus } from "./types.js";
import { InvalidStatusTransitionError } from "./types.js";

export const INVESTMENT_TRANSITIONS: Record<InvestmentStatus, readonly InvestmentStatus[]> = {
  pending: ["paid", "overdue"],
  overdue: ["paid"],
  paid: [], // Terminal
};

export const PAYABLE_STATUSES: readonly InvestmentStatus[] = ["pending", "overdue"];

export function canTransition(from: InvestmentStatus, to: InvestmentStatus): boolean {
  return INVESTMENT_TRANSITIONS[from].includes(to);
}

export function isPayable(status: InvestmentStatus): boolean {
  return PAYABLE_STATUSES.includes(status);
}

/**
 * Returns a copy of the investment in the target status.
 */
export function transitionInvestment(
  investment: Investment,
  to: InvestmentStatus
): Investment {
  if (!canTransition(investment.status, to)) {
    throw new InvalidStatusTransitionError(
      `Invalid investment transition: ${investment.status} -> ${to}`,
      investment.status,
      to
    );
  }
  return { ...investment, status: to };
}
