/**
 * Capability Token Tests
 *
 * A token authorizes exactly the club it was issued with.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  createClubRegistry,
  authorize,
  isAuthorized,
  AccessDeniedError,
  type ClubRegistry,
  type CapabilityToken,
} from "../index.js";

const clubInput = {
  name: "Acme Invest",
  clubType: "equity",
  rules: "Monthly contribution",
  description: "Test club",
  active: true,
};

describe("CapabilityToken", () => {
  let registry: ClubRegistry;

  beforeEach(() => {
    registry = createClubRegistry();
  });

  it("should be bound to the club it was created with", () => {
    const { club, token } = registry.createClub(clubInput, 1000n);

    expect(token.clubId).toBe(club.id);
    expect(isAuthorized(token, club)).toBe(true);
    expect(() => authorize(token, club)).not.toThrow();
  });

  it("should reject a token bound to another club", () => {
    const first = registry.createClub(clubInput, 1000n);
    const second = registry.createClub({ ...clubInput, name: "Other" }, 1000n);

    expect(isAuthorized(second.token, first.club)).toBe(false);
    expect(() => authorize(second.token, first.club)).toThrow(AccessDeniedError);
  });

  it("should report both club ids on denial", () => {
    const first = registry.createClub(clubInput, 1000n);
    const second = registry.createClub(clubInput, 1000n);

    try {
      authorize(second.token, first.club);
      expect.unreachable("authorize should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(AccessDeniedError);
      if (error instanceof AccessDeniedError) {
        expect(error.code).toBe("ACCESS_DENIED");
        expect(error.clubId).toBe(first.club.id);
        expect(error.tokenClubId).toBe(second.club.id);
      }
    }
  });

  it("should reject a look-alike object that was never issued", () => {
    const { club, token } = registry.createClub(clubInput, 1000n);
    const copy: CapabilityToken = Object.create(Object.getPrototypeOf(token));
    Object.assign(copy, { id: token.id, clubId: club.id });

    expect(isAuthorized(copy, club)).toBe(false);
    expect(() => authorize(copy, club)).toThrow(AccessDeniedError);
  });

  it("should issue a distinct token per club", () => {
    const first = registry.createClub(clubInput, 1000n);
    const second = registry.createClub(clubInput, 1000n);

    expect(first.token.id).not.toBe(second.token.id);
  });
});
