/**
 * Club Engine Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { DEFAULT_CLUB_ENGINE_CONFIG, loadClubEngineConfig } from "../index.js";

describe("loadClubEngineConfig", () => {
  it("should fall back to the defaults for an empty environment", () => {
    expect(loadClubEngineConfig({})).toEqual(DEFAULT_CLUB_ENGINE_CONFIG);
  });

  it("should read the enforcement flags and grace period", () => {
    const config = loadClubEngineConfig({
      ENFORCE_UNIQUE_MEMBERSHIP: "true",
      ENFORCE_SINGLE_OBLIGATION: "true",
      OVERDUE_GRACE_MS: "86400000",
    });

    expect(config).toEqual({
      enforceUniqueMembership: true,
      enforceSingleObligation: true,
      overdueGraceMs: 86_400_000n,
    });
  });

  it("should treat any value other than true as off", () => {
    const config = loadClubEngineConfig({ ENFORCE_UNIQUE_MEMBERSHIP: "yes" });

    expect(config.enforceUniqueMembership).toBe(false);
  });

  it("should reject a grace period that is not an unsigned integer", () => {
    expect(() => loadClubEngineConfig({ OVERDUE_GRACE_MS: "-5" })).toThrow(ZodError);
    expect(() => loadClubEngineConfig({ OVERDUE_GRACE_MS: "18446744073709551616" }))
      .toThrow(ZodError);
  });
});
