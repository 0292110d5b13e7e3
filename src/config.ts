// src/config.ts — Configuration loader from environment variables

export interface MagnetConfig {
  // Gateway
  port: number
  host: string

  /** Telegram Bot API access */
  telegram: {
    botToken: string
    /** Username used in deep links; empty means "resolve via getMe at boot" */
    botUsername: string
    apiBaseUrl: string
    webhookUrl: string
    webhookSecret: string
    requestTimeoutMs: number
    maxRetries: number
  }

  /** Subscription gate */
  subscription: {
    /** Static fallback when no subscription_channel setting is stored */
    defaultChannel: string
    /** Lifetime of a staged reward awaiting subscription */
    stagedRewardTtlSeconds: number
  }

  /** Admin REST surface */
  admin: {
    bearerToken: string
    userIds: number[]
  }

  /** PostgreSQL database (magnet schema) */
  postgres: {
    enabled: boolean
    connectionString: string
    maxConnections: number
  }

  /** Redis backend for staged rewards */
  redis: {
    enabled: boolean
    url: string
    connectTimeoutMs: number
    commandTimeoutMs: number
  }
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

/** Comma-separated Telegram ids; non-numeric entries are dropped. */
export function parseAdminIds(raw: string | undefined): number[] {
  return (raw ?? "")
    .split(",")
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map((part) => Number(part))
}

export function loadConfig(): MagnetConfig {
  const botToken = process.env.TELEGRAM_BOT_TOKEN
  if (!botToken) {
    throw new Error("TELEGRAM_BOT_TOKEN is required")
  }

  const postgresEnabled = process.env.MAGNET_POSTGRES_ENABLED !== "false"
  const connectionString = process.env.DATABASE_URL ?? ""
  if (postgresEnabled && !connectionString) {
    throw new Error("DATABASE_URL is required (set MAGNET_POSTGRES_ENABLED=false for in-memory dev mode)")
  }

  return {
    port: parseIntEnv("PORT", "3000"),
    host: process.env.HOST ?? "0.0.0.0",

    telegram: {
      botToken,
      botUsername: (process.env.TELEGRAM_BOT_USERNAME ?? "").replace(/^@/, ""),
      apiBaseUrl: process.env.TELEGRAM_API_BASE_URL ?? "https://api.telegram.org",
      webhookUrl: process.env.TELEGRAM_WEBHOOK_URL ?? "",
      webhookSecret: process.env.TELEGRAM_WEBHOOK_SECRET ?? "",
      requestTimeoutMs: parseIntEnv("TELEGRAM_TIMEOUT_MS", "10000"),
      maxRetries: parseIntEnv("TELEGRAM_MAX_RETRIES", "2"),
    },

    subscription: {
      defaultChannel: process.env.CHANNEL_USERNAME ?? "@leadmagnet_channel",
      stagedRewardTtlSeconds: parseIntEnv("STAGED_REWARD_TTL_SECONDS", "86400"),
    },

    admin: {
      bearerToken: process.env.MAGNET_ADMIN_TOKEN ?? "",
      userIds: parseAdminIds(process.env.ADMIN_USER_IDS),
    },

    postgres: {
      enabled: postgresEnabled,
      connectionString,
      maxConnections: parseIntEnv("DB_POOL_SIZE", "5"),
    },

    redis: {
      enabled: process.env.REDIS_ENABLED === "true",
      url: process.env.REDIS_URL ?? "redis://localhost:6379",
      connectTimeoutMs: parseIntEnv("REDIS_CONNECT_TIMEOUT_MS", "5000"),
      commandTimeoutMs: parseIntEnv("REDIS_COMMAND_TIMEOUT_MS", "3000"),
    },
  }
}
