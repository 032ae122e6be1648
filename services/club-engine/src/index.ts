/**
 * Club Engine Exports
 *
 * Investment club lifecycle and treasury accounting:
 * - Club and member registry
 * - Capability-gated obligation scheduling
 * - Time- and amount-gated settlement
 * - All-or-nothing treasury withdrawal
 * - Per-club serialized service facade
 */

// Types and errors
export * from "./types.js";

// Configuration
export { loadClubEngineConfig } from "./config.js";

// Capability token (issuing stays with the registry)
export { authorize, isAuthorized, type CapabilityToken } from "./capability-token.js";

// Arithmetic and status machine
export { checkedAdd, checkedMul } from "./checked-math.js";
export {
  INVESTMENT_TRANSITIONS,
  PAYABLE_STATUSES,
  canTransition,
  isPayable,
  transitionInvestment,
} from "./investment-status.js";

// Components
export * from "./club-registry.js";
export * from "./investment-scheduler.js";
export * from "./payment-processor.js";
export * from "./treasury-ledger.js";
export * from "./status-query.js";
export * from "./club-lock.js";

// Main service
export * from "./club-service.js";
