/**
 * Coinvest Logger
 * Structured logging with Pino
 */

import { pino, type Logger, type LoggerOptions } from "pino";

// ============================================
// LOGGER CONFIGURATION
// ============================================

const isDevelopment = process.env.NODE_ENV === "development";
const logLevel = process.env.LOG_LEVEL || "info";
const logFormat = process.env.LOG_FORMAT || "json";

const baseOptions: LoggerOptions = {
  level: logLevel,
  base: {
    service: "coinvest",
    env: process.env.NODE_ENV || "production",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      host: bindings.hostname,
      service: bindings.service,
      env: bindings.env,
    }),
  },
  redact: {
    // Member contact details and capability material stay out of log sinks
    paths: [
      "*.contact",
      "*.token",
      "*.secret",
      "*.password",
    ],
    censor: "[REDACTED]",
  },
};

const devOptions: LoggerOptions = {
  ...baseOptions,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
      messageFormat: "{msg}",
    },
  },
};

// ============================================
// LOGGER INSTANCE
// ============================================

export const logger: Logger =
  isDevelopment && logFormat === "pretty"
    ? pino(devOptions)
    : pino(baseOptions);

// ============================================
// CHILD LOGGERS FOR SERVICES
// ============================================

export function createServiceLogger(serviceName: string): Logger {
  return logger.child({ service: serviceName });
}

export const clubEngineLogger = createServiceLogger("club-engine");

// ============================================
// STRUCTURED LOG HELPERS
// ============================================

interface SettlementLogContext {
  clubId: string;
  payerId: string;
  memberId: string;
  amount: bigint;
  newBalance: bigint;
}

/**
 * Logs a settled obligation. Amounts are written as strings.
 */
export function logSettlement(
  level: "info" | "warn" | "error",
  event: string,
  context: SettlementLogContext,
  message?: string
): void {
  clubEngineLogger[level](
    {
      event,
      settlement: {
        clubId: context.clubId,
        payerId: context.payerId,
        memberId: context.memberId,
        amount: context.amount.toString(),
        newBalance: context.newBalance.toString(),
      },
    },
    message || event
  );
}

/**
 * Logs a security event (denied capability checks and the like)
 */
export function logSecurityEvent(
  level: "info" | "warn" | "error",
  event: string,
  details: Record<string, unknown>,
  message?: string
): void {
  logger[level](
    {
      event,
      security: true,
      ...details,
    },
    message || event
  );
}

// ============================================
// AUDIT LOGGING
// ============================================

interface AuditLogEntry {
  action: string;
  entityType: string;
  entityId?: string;
  actor: string;
  details?: Record<string, unknown>;
}

/**
 * Creates an audit log entry for treasury withdrawals
 */
export function audit(entry: AuditLogEntry): void {
  logger.info(
    {
      audit: true,
      ...entry,
    },
    `AUDIT: ${entry.action} on ${entry.entityType}${entry.entityId ? ` (${entry.entityId})` : ""} by ${entry.actor}`
  );
}

// ============================================
// ERROR LOGGING
// ============================================

/**
 * Logs an error with stack trace and context
 */
export function logError(
  error: Error,
  context?: Record<string, unknown>,
  message?: string
): void {
  logger.error(
    {
      err: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    message || error.message
  );
}

// ============================================
// PERFORMANCE LOGGING
// ============================================

/**
 * Creates a timer for measuring operation duration
 */
export function createTimer(operationName: string): () => void {
  const start = performance.now();

  return () => {
    const duration = performance.now() - start;
    logger.debug(
      {
        operation: operationName,
        durationMs: duration.toFixed(2),
      },
      `${operationName} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Wraps an async function with timing
 */
export async function withTiming<T>(
  operationName: string,
  fn: () => Promise<T>
): Promise<T> {
  const done = createTimer(operationName);
  try {
    const result = await fn();
    done();
    return result;
  } catch (error) {
    done();
    throw error;
  }
}
