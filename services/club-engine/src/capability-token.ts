/**
 * Capability Token
 *
 * Credential bound to exactly one club. Holding the token that matches a
 * club is the only admission check for privileged operations; there is a
 * single admin tier.
 *
 * Tokens can only be issued through issueCapabilityToken, which the
 * registry calls once per club. authorize also rejects objects that merely
 * look like a token.
 */

import { clubEngineLogger, logSecurityEvent } from "@coinvest/shared";
import * as crypto from "crypto";
import type { Club } from "./types.js";
import { AccessDeniedError } from "./types.js";

const capabilityLogger = clubEngineLogger.child({ component: "capability-token" });

const issuedTokens = new WeakSet<CapabilityToken>();

// ============================================
// CAPABILITY TOKEN
// ============================================

export class CapabilityToken {
  readonly id: string;
  readonly clubId: string;

  private constructor(clubId: string) {
    this.id = crypto.randomUUID();
    this.clubId = clubId;
  }

  /** @internal registry use only */
  static issue(clubId: string): CapabilityToken {
    const token = new CapabilityToken(clubId);
    issuedTokens.add(token);
    return token;
  }
}

export function issueCapabilityToken(clubId: string): CapabilityToken {
  const token = CapabilityToken.issue(clubId);
  capabilityLogger.debug({ tokenId: token.id, clubId }, "Capability token issued");
  return token;
}

// ============================================
// AUTHORIZATION
// ============================================

export function isAuthorized(token: CapabilityToken, club: Club): boolean {
  return issuedTokens.has(token) && token.clubId === club.id;
}

/**
 * Throws AccessDeniedError unless the token is bound to this club.
 * Call before touching any club state.
 */
export function authorize(token: CapabilityToken, club: Club): void {
  if (isAuthorized(token, club)) {
    return;
  }

  logSecurityEvent("warn", "capability_denied", {
    clubId: club.id,
    tokenClubId: token.clubId,
    tokenId: token.id,
  }, "Capability token rejected");

  throw new AccessDeniedError(
    `Capability token is not valid for club ${club.id}`,
    club.id,
    token.clubId
  );
}
