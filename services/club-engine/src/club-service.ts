/**
 * Club Service
 *
 * Entry point for hosts. Validates request shapes, resolves clubs and
 * members, serializes every mutation per club and publishes an event for
 * each successful operation.
 */

import { EventEmitter } from "eventemitter3";
import type { z } from "zod";
import {
  addMemberInputSchema,
  clubEngineLogger as logger,
  createClubInputSchema,
  generateInvestmentRequestSchema,
  logError,
  payInvestmentRequestSchema,
  statusQueryRequestSchema,
  timestampSchema,
  uuidSchema,
  withTiming,
  type AddMemberInput,
  type CreateClubInput,
  type GenerateInvestmentRequest,
  type PayInvestmentRequest,
  type StatusQueryRequest,
} from "@coinvest/shared";
import type { CapabilityToken } from "./capability-token.js";
import { ClubLock } from "./club-lock.js";
import { ClubRegistry } from "./club-registry.js";
import { InvestmentScheduler } from "./investment-scheduler.js";
import { PaymentProcessor } from "./payment-processor.js";
import { checkMemberAndInvestmentStatus } from "./status-query.js";
import { TreasuryLedger } from "./treasury-ledger.js";
import type {
  ClubEngineConfig,
  ClubView,
  Funds,
  Investment,
  Member,
  MemberInvestmentStatus,
  ParticipantId,
  SettlementReceipt,
} from "./types.js";
import {
  ClubEngineError,
  DEFAULT_CLUB_ENGINE_CONFIG,
  InvalidInputError,
  ObligationNotFoundError,
} from "./types.js";

const serviceLogger = logger.child({ component: "club-service" });

// ============================================
// EVENTS
// ============================================

export interface ClubServiceEvents {
  "club:created": (clubId: string) => void;
  "member:added": (member: Readonly<Member>) => void;
  "investment:generated": (clubId: string, payerId: ParticipantId, investment: Investment) => void;
  "investment:settled": (receipt: SettlementReceipt) => void;
  "investments:overdue": (clubId: string, payerIds: ParticipantId[]) => void;
  "funds:withdrawn": (funds: Funds) => void;
}

export interface CreatedClubView {
  club: ClubView;
  token: CapabilityToken;
}

// ============================================
// CLUB SERVICE
// ============================================

export class ClubService extends EventEmitter<ClubServiceEvents> {
  private readonly config: ClubEngineConfig;
  private readonly registry: ClubRegistry;
  private readonly scheduler: InvestmentScheduler;
  private readonly processor: PaymentProcessor;
  private readonly treasury: TreasuryLedger;
  private readonly lock: ClubLock;

  constructor(config?: Partial<ClubEngineConfig>) {
    super();
    this.config = { ...DEFAULT_CLUB_ENGINE_CONFIG, ...config };
    this.registry = new ClubRegistry(this.config);
    this.scheduler = new InvestmentScheduler(this.config);
    this.processor = new PaymentProcessor();
    this.treasury = new TreasuryLedger();
    this.lock = new ClubLock();

    serviceLogger.info("ClubService initialized");
  }

  // ============================================
  // REGISTRY
  // ============================================

  async createClub(input: CreateClubInput, now: bigint): Promise<CreatedClubView> {
    const parsed = parseRequest(createClubInputSchema, input);
    const at = parseRequest(timestampSchema, now);
    const created = await this.execute("createClub", async () =>
      this.registry.createClub(parsed, at)
    );
    this.emit("club:created", created.club.id);
    return created;
  }

  async addMember(clubId: string, input: AddMemberInput, now: bigint): Promise<Readonly<Member>> {
    const id = parseRequest(uuidSchema, clubId);
    const parsed = parseRequest(addMemberInputSchema, input);
    const at = parseRequest(timestampSchema, now);
    const member = await this.locked(id, "addMember", () =>
      this.registry.addMember(id, parsed, at)
    );
    this.emit("member:added", member);
    return member;
  }

  async getClub(clubId: string): Promise<ClubView> {
    const id = parseRequest(uuidSchema, clubId);
    return this.execute("getClub", async () => this.registry.requireClub(id));
  }

  // ============================================
  // OBLIGATIONS
  // ============================================

  async generateInvestment(
    token: CapabilityToken,
    request: GenerateInvestmentRequest
  ): Promise<Investment> {
    const req = parseRequest(generateInvestmentRequestSchema, request);
    const investment = await this.locked(req.clubId, "generateInvestment", () => {
      const club = this.registry.requireClub(req.clubId);
      const member = this.registry.requireMember(req.clubId, req.memberId);
      return this.scheduler.generateInvestment(
        token,
        club,
        member,
        req.payerId,
        req.baseAmount,
        req.status,
        req.offset,
        req.now
      );
    });
    this.emit("investment:generated", req.clubId, req.payerId, investment);
    return investment;
  }

  async markOverdue(token: CapabilityToken, clubId: string, now: bigint): Promise<ParticipantId[]> {
    const id = parseRequest(uuidSchema, clubId);
    const at = parseRequest(timestampSchema, now);
    const marked = await this.locked(id, "markOverdue", () =>
      this.scheduler.markOverdue(token, this.registry.requireClub(id), at)
    );
    if (marked.length > 0) {
      this.emit("investments:overdue", id, marked);
    }
    return marked;
  }

  /**
   * Settles the obligation held under `payerId` and flags `memberId` as
   * paid. The two are resolved independently: the member flagged is the one
   * named in the request, not the obligation's own memberId.
   */
  async payInvestment(request: PayInvestmentRequest): Promise<SettlementReceipt> {
    const req = parseRequest(payInvestmentRequestSchema, request);
    const receipt = await this.locked(req.clubId, "payInvestment", () => {
      const club = this.registry.requireClub(req.clubId);
      const member = this.registry.requireMember(req.clubId, req.memberId);
      return this.processor.payInvestment(club, req.payerId, member, req.amount, req.now);
    });
    this.emit("investment:settled", receipt);
    return receipt;
  }

  async checkStatus(request: StatusQueryRequest): Promise<MemberInvestmentStatus> {
    const req = parseRequest(statusQueryRequestSchema, request);
    return this.execute("checkStatus", async () => {
      const member = this.registry.requireMember(req.clubId, req.memberId);
      const investment = this.registry.requireClub(req.clubId).investments.get(req.payerId);
      if (!investment) {
        throw new ObligationNotFoundError(
          `No obligation for payer ${req.payerId} in club ${req.clubId}`,
          req.clubId,
          req.payerId
        );
      }
      return checkMemberAndInvestmentStatus(member, investment);
    });
  }

  // ============================================
  // TREASURY
  // ============================================

  async withdrawFunds(token: CapabilityToken, clubId: string): Promise<Funds> {
    const id = parseRequest(uuidSchema, clubId);
    const funds = await this.locked(id, "withdrawFunds", () =>
      this.treasury.withdrawFunds(token, this.registry.requireClub(id))
    );
    this.emit("funds:withdrawn", funds);
    return funds;
  }

  async getBalance(clubId: string): Promise<bigint> {
    const id = parseRequest(uuidSchema, clubId);
    return this.execute("getBalance", async () =>
      this.treasury.getBalance(this.registry.requireClub(id))
    );
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private locked<T>(clubId: string, operation: string, task: () => T): Promise<T> {
    return this.execute(operation, () => this.lock.run(clubId, task));
  }

  /**
   * Engine errors are expected outcomes and logged at warn; anything else
   * is logged as an error. Both are rethrown.
   */
  private async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTiming(operation, fn);
    } catch (error) {
      if (error instanceof ClubEngineError) {
        serviceLogger.warn({
          operation,
          code: error.code,
          error: error.message,
        }, "Club operation rejected");
      } else if (error instanceof Error) {
        logError(error, { operation });
      }
      throw error;
    }
  }
}

function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new InvalidInputError(`Invalid request: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Factory function
 */
export function createClubService(config?: Partial<ClubEngineConfig>): ClubService {
  return new ClubService(config);
}
