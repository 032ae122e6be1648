import type { Investment, Member, MemberInvestmentStatus } from "./types.js";

/**
 * Pure read of a member's paid flag and an obligation's status.
 */
export function checkMemberAndInvestmentStatus(
  member: Member,
  investment: Investment
): MemberInvestmentStatus {
  return { paid: member.paid, status: investment.status };
}
