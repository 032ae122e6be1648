/**
 * Club Registry
 *
 * Creates clubs (each paired with its capability token) and members, and
 * owns the membership mappings.
 *
 * Inputs are taken as given: name, rules and share counts are not checked
 * against business rules here.
 */

import { clubEngineLogger as logger, type AddMemberInput, type CreateClubInput } from "@coinvest/shared";
import * as crypto from "crypto";
import { type CapabilityToken, issueCapabilityToken } from "./capability-token.js";
import type { Club, ClubEngineConfig, Member, ParticipantId } from "./types.js";
import {
  ClubNotFoundError,
  DEFAULT_CLUB_ENGINE_CONFIG,
  DuplicateMemberError,
  MemberNotFoundError,
} from "./types.js";

const registryLogger = logger.child({ component: "club-registry" });

export interface CreatedClub {
  club: Club;
  token: CapabilityToken;
}

// ============================================
// CLUB REGISTRY
// ============================================

export class ClubRegistry {
  private readonly config: ClubEngineConfig;
  private readonly clubs: Map<string, Club> = new Map();

  constructor(config?: Partial<ClubEngineConfig>) {
    this.config = { ...DEFAULT_CLUB_ENGINE_CONFIG, ...config };

    registryLogger.info({
      enforceUniqueMembership: this.config.enforceUniqueMembership,
    }, "ClubRegistry initialized");
  }

  /**
   * Create a club with zero balance and its capability token
   */
  createClub(input: CreateClubInput, now: bigint): CreatedClub {
    const club: Club = {
      id: crypto.randomUUID(),
      name: input.name,
      clubType: input.clubType,
      rules: input.rules,
      description: input.description,
      foundedAt: now,
      active: input.active,
      members: new Map(),
      investments: new Map(),
      balance: 0n,
    };
    const token = issueCapabilityToken(club.id);

    this.clubs.set(club.id, club);

    registryLogger.info({
      clubId: club.id,
      name: club.name,
      clubType: club.clubType,
    }, "Club created");

    return { club, token };
  }

  /**
   * Add a member with paid = false.
   *
   * Unless enforceUniqueMembership is set, an existing record under the same
   * identity is replaced in the mapping; the earlier Member value is not
   * touched.
   */
  addMember(clubId: string, input: AddMemberInput, now: bigint): Member {
    const club = this.requireClub(clubId);
    const existing = club.members.get(input.memberId);

    if (existing) {
      if (this.config.enforceUniqueMembership) {
        throw new DuplicateMemberError(
          `Member ${input.memberId} already belongs to club ${clubId}`,
          clubId,
          input.memberId
        );
      }
      registryLogger.warn({
        clubId,
        memberId: input.memberId,
      }, "Duplicate membership record, replacing mapping entry");
    }

    const member: Member = {
      id: input.memberId,
      clubId,
      name: input.name,
      gender: input.gender,
      contact: input.contact,
      shares: input.shares,
      paid: false,
      joinedAt: now,
    };
    club.members.set(member.id, member);

    registryLogger.info({
      clubId,
      memberId: member.id,
      shares: member.shares.toString(),
    }, "Member added");

    return member;
  }

  getClub(clubId: string): Club | undefined {
    return this.clubs.get(clubId);
  }

  requireClub(clubId: string): Club {
    const club = this.clubs.get(clubId);
    if (!club) {
      throw new ClubNotFoundError(`Club not found: ${clubId}`, clubId);
    }
    return club;
  }

  listClubs(): Club[] {
    return Array.from(this.clubs.values());
  }

  getMember(clubId: string, memberId: ParticipantId): Member | undefined {
    return this.clubs.get(clubId)?.members.get(memberId);
  }

  requireMember(clubId: string, memberId: ParticipantId): Member {
    const member = this.requireClub(clubId).members.get(memberId);
    if (!member) {
      throw new MemberNotFoundError(
        `Member ${memberId} not found in club ${clubId}`,
        clubId,
        memberId
      );
    }
    return member;
  }
}

/**
 * Factory function
 */
export function createClubRegistry(config?: Partial<ClubEngineConfig>): ClubRegistry {
  return new ClubRegistry(config);
}
