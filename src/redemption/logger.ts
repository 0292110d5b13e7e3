// src/redemption/logger.ts — Structured Redemption Logger
//
// Structured JSON logger for redemption flow operations.
// Outputs timestamped JSON lines to console for observability.

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Canonical redemption flow operations */
export type RedemptionOperation =
  | "entry"
  | "recheck"
  | "identity_upsert"
  | "button_lookup"
  | "ledger_append"
  | "subscription_check"
  | "session"
  | "publish"
  | "settings"
  | "update"

/** Structured log entry shape */
export interface RedemptionLogEntry {
  timestamp: string
  operation: RedemptionOperation
  platform_id: number
  level?: "warn"
  latency_ms?: number
  [key: string]: unknown
}

/** Structured error log entry shape */
export interface RedemptionErrorLogEntry {
  timestamp: string
  operation: RedemptionOperation
  platform_id: number
  error: string
  error_name?: string
  [key: string]: unknown
}

/** Logger interface for redemption flow observability */
export interface RedemptionLogger {
  /** Log a redemption operation with optional metadata and latency */
  log(
    operation: RedemptionOperation,
    platformId: number,
    metadata?: Record<string, unknown>,
    latencyMs?: number,
  ): void

  /** Log a degraded-but-expected condition */
  warn(
    operation: RedemptionOperation,
    platformId: number,
    metadata?: Record<string, unknown>,
  ): void

  /** Log an error during a redemption operation */
  logError(
    operation: RedemptionOperation,
    platformId: number,
    error: unknown,
    metadata?: Record<string, unknown>,
  ): void
}

// ---------------------------------------------------------------------------
// Default Implementation
// ---------------------------------------------------------------------------

class ConsoleRedemptionLogger implements RedemptionLogger {
  log(
    operation: RedemptionOperation,
    platformId: number,
    metadata?: Record<string, unknown>,
    latencyMs?: number,
  ): void {
    const entry: RedemptionLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      platform_id: platformId,
      ...(latencyMs !== undefined ? { latency_ms: latencyMs } : {}),
      ...(metadata ?? {}),
    }
    console.log(JSON.stringify(entry))
  }

  warn(
    operation: RedemptionOperation,
    platformId: number,
    metadata?: Record<string, unknown>,
  ): void {
    const entry: RedemptionLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      platform_id: platformId,
      level: "warn",
      ...(metadata ?? {}),
    }
    console.warn(JSON.stringify(entry))
  }

  logError(
    operation: RedemptionOperation,
    platformId: number,
    error: unknown,
    metadata?: Record<string, unknown>,
  ): void {
    const entry: RedemptionErrorLogEntry = {
      timestamp: new Date().toISOString(),
      operation,
      platform_id: platformId,
      error: error instanceof Error ? error.message : String(error),
      ...(error instanceof Error ? { error_name: error.name } : {}),
      ...(metadata ?? {}),
    }
    console.error(JSON.stringify(entry))
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a RedemptionLogger instance.
 * Default implementation writes JSON lines to the console.
 */
export function createRedemptionLogger(): RedemptionLogger {
  return new ConsoleRedemptionLogger()
}
