/**
 * Payment Processor Tests
 *
 * Validation order: existence, status, payment window, exact amount,
 * balance range. Every failure leaves club and member unchanged.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { U64_MAX } from "@coinvest/shared";
import {
  createClubRegistry,
  createInvestmentScheduler,
  createPaymentProcessor,
  AlreadySettledError,
  AmountMismatchError,
  ArithmeticOverflowError,
  ObligationNotFoundError,
  PaymentWindowClosedError,
  type CapabilityToken,
  type Club,
  type InvestmentScheduler,
  type Member,
  type PaymentProcessor,
} from "../index.js";

const T = 1_700_000_000_000n;

describe("PaymentProcessor", () => {
  let scheduler: InvestmentScheduler;
  let processor: PaymentProcessor;
  let club: Club;
  let token: CapabilityToken;
  let alice: Member;

  beforeEach(() => {
    const registry = createClubRegistry();
    scheduler = createInvestmentScheduler();
    processor = createPaymentProcessor();
    ({ club, token } = registry.createClub({
      name: "Acme Invest",
      clubType: "equity",
      rules: "",
      description: "",
      active: true,
    }, T));
    alice = registry.addMember(club.id, {
      memberId: "alice",
      name: "Alice",
      gender: "female",
      contact: "alice@example.test",
      shares: 3n,
    }, T);
  });

  function schedule(status: "pending" | "paid" | "overdue" = "pending"): void {
    scheduler.generateInvestment(token, club, alice, "alice", 100n, status, 1000n, T);
  }

  function expectUnchanged(): void {
    expect(club.balance).toBe(0n);
    expect(alice.paid).toBe(false);
    expect(club.investments.has("alice")).toBe(true);
  }

  // ============================================
  // SUCCESSFUL SETTLEMENT
  // ============================================

  describe("settlement", () => {
    it("should settle at the due date with the exact amount", () => {
      schedule();
      const receipt = processor.payInvestment(club, "alice", alice, 300n, T + 1000n);

      expect(club.balance).toBe(300n);
      expect(alice.paid).toBe(true);
      expect(club.investments.has("alice")).toBe(false);
      expect(receipt).toEqual({
        clubId: club.id,
        payerId: "alice",
        investment: {
          memberId: "alice",
          amountPayable: 300n,
          due: T + 1000n,
          status: "paid",
        },
        amount: 300n,
        newBalance: 300n,
        settledAt: T + 1000n,
      });
    });

    it("should settle an overdue obligation", () => {
      schedule("overdue");
      processor.payInvestment(club, "alice", alice, 300n, T + 5000n);

      expect(club.balance).toBe(300n);
      expect(alice.paid).toBe(true);
    });

    it("should add to an existing balance", () => {
      club.balance = 50n;
      schedule();
      const receipt = processor.payInvestment(club, "alice", alice, 300n, T + 1000n);

      expect(club.balance).toBe(350n);
      expect(receipt.newBalance).toBe(350n);
    });

    it("should change no other club or member field", () => {
      schedule();
      const clubBefore = { ...club, investments: undefined };
      const memberBefore = { ...alice };

      processor.payInvestment(club, "alice", alice, 300n, T + 1000n);

      expect({ ...club, investments: undefined, balance: clubBefore.balance })
        .toEqual(clubBefore);
      expect({ ...alice, paid: false }).toEqual(memberBefore);
    });

    it("should not keep the settled obligation anywhere in the club", () => {
      schedule();
      processor.payInvestment(club, "alice", alice, 300n, T + 1000n);

      expect(club.investments.size).toBe(0);
      expect(() => processor.payInvestment(club, "alice", alice, 300n, T + 1000n))
        .toThrow(ObligationNotFoundError);
    });
  });

  // ============================================
  // REJECTIONS
  // ============================================

  describe("rejections", () => {
    it("should fail ObligationNotFound when the payer has no obligation", () => {
      expect(() => processor.payInvestment(club, "alice", alice, 300n, T + 1000n))
        .toThrow(ObligationNotFoundError);
      expect(club.balance).toBe(0n);
      expect(alice.paid).toBe(false);
    });

    it("should fail AlreadySettled when status is paid", () => {
      schedule("paid");

      expect(() => processor.payInvestment(club, "alice", alice, 300n, T + 1000n))
        .toThrow(AlreadySettledError);
      expectUnchanged();
    });

    it("should check status before the payment window", () => {
      schedule("paid");

      expect(() => processor.payInvestment(club, "alice", alice, 1n, T))
        .toThrow(AlreadySettledError);
    });

    it("should fail PaymentWindowClosed before the due date", () => {
      schedule();

      expect(() => processor.payInvestment(club, "alice", alice, 300n, T + 999n))
        .toThrow(PaymentWindowClosedError);
      expectUnchanged();
    });

    it("should fail PaymentWindowClosed before due for an overdue status too", () => {
      schedule("overdue");

      expect(() => processor.payInvestment(club, "alice", alice, 300n, T))
        .toThrow(PaymentWindowClosedError);
      expectUnchanged();
    });

    it("should check the payment window before the amount", () => {
      schedule();

      expect(() => processor.payInvestment(club, "alice", alice, 1n, T))
        .toThrow(PaymentWindowClosedError);
    });

    it("should fail AmountMismatch on underpayment", () => {
      schedule();

      expect(() => processor.payInvestment(club, "alice", alice, 299n, T + 1000n))
        .toThrow(AmountMismatchError);
      expectUnchanged();
    });

    it("should fail AmountMismatch on overpayment", () => {
      schedule();

      expect(() => processor.payInvestment(club, "alice", alice, 301n, T + 1000n))
        .toThrow(AmountMismatchError);
      expectUnchanged();
    });

    it("should report expected and received amounts", () => {
      schedule();

      try {
        processor.payInvestment(club, "alice", alice, 299n, T + 1000n);
        expect.unreachable("payInvestment should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(AmountMismatchError);
        if (error instanceof AmountMismatchError) {
          expect(error.expected).toBe(300n);
          expect(error.received).toBe(299n);
        }
      }
    });

    it("should never lower the balance with a negative payment", () => {
      schedule();
      club.balance = 1000n;

      expect(() => processor.payInvestment(club, "alice", alice, -300n, T + 1000n))
        .toThrow(AmountMismatchError);
      expect(club.balance).toBe(1000n);
      expect(alice.paid).toBe(false);
    });

    it("should fail ArithmeticOverflow when the balance would leave u64", () => {
      schedule();
      club.balance = U64_MAX - 299n;

      expect(() => processor.payInvestment(club, "alice", alice, 300n, T + 1000n))
        .toThrow(ArithmeticOverflowError);
      expect(club.balance).toBe(U64_MAX - 299n);
      expect(alice.paid).toBe(false);
      expect(club.investments.has("alice")).toBe(true);
    });
  });
});
