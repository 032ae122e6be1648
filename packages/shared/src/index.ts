/**
 * @coinvest/shared
 * Shared logger, schemas and constants for the club engine
 */

// Export schemas (includes type definitions)
export * from "./schemas/index.js";

// Export constants (includes U64_MAX, CLUB_DEFAULTS, TIME)
export * from "./constants/index.js";

// Export logger
export {
  logger,
  createServiceLogger,
  clubEngineLogger,
  logSettlement,
  logSecurityEvent,
  audit,
  logError,
  createTimer,
  withTiming,
} from "./logger/index.js";
