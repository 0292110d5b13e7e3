// src/index.ts — magnet-gate entry point
// Boot sequence: config → storage → redis → telegram → wiring → serve → webhook

import { serve } from "@hono/node-server"
import { loadConfig } from "./config.js"
import { openDatabase } from "./drizzle/db.js"
import { validateDatabase } from "./drizzle/validate.js"
import { createApp } from "./gateway/server.js"
import { UpdateHandler } from "./bot/update-handler.js"
import { PostPublisher } from "./publishing/publisher.js"
import { RedisStateBackend, DEFAULT_REDIS_CONFIG } from "./redis/client.js"
import { createIoredisFactory } from "./redis/ioredis-factory.js"
import { InMemoryButtonRegistry, type ButtonRegistry } from "./redemption/button-registry.js"
import { RedemptionCoordinator } from "./redemption/coordinator.js"
import { InMemoryIdentityStore, type IdentityStore } from "./redemption/identity-store.js"
import { InMemoryRedemptionLedger, type RedemptionLedger } from "./redemption/ledger.js"
import { createRedemptionLogger } from "./redemption/logger.js"
import { SubscriptionOracle } from "./redemption/oracle.js"
import { PgButtonRegistry } from "./redemption/pg-button-registry.js"
import { PgIdentityStore } from "./redemption/pg-identity-store.js"
import { PgRedemptionLedger } from "./redemption/pg-ledger.js"
import { PgSettingsStore } from "./redemption/pg-settings-store.js"
import {
  InMemoryStagedRewardStore,
  RedisStagedRewardStore,
  type StagedRewardStore,
} from "./redemption/session-store.js"
import { InMemorySettingsStore, SubscriptionChannelSetting, type SettingsStore } from "./redemption/settings.js"
import { ResilientHttpClient } from "./shared/http-client.js"
import { SystemTimeProvider } from "./shared/time-provider.js"
import { TelegramBotClient } from "./telegram/client.js"

interface Stores {
  identities: IdentityStore
  registry: ButtonRegistry
  ledger: RedemptionLedger
  settings: SettingsStore
  close: () => Promise<void>
}

async function main() {
  const bootStart = Date.now()
  console.log("[magnet] booting magnet-gate...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[magnet] config loaded: port=${config.port}, default channel=${config.subscription.defaultChannel}`)

  const time = new SystemTimeProvider()
  const logger = createRedemptionLogger()

  // 2. Durable stores — Postgres, or in-memory in dev mode
  let stores: Stores
  if (config.postgres.enabled) {
    const { db, sql, close } = openDatabase(config.postgres)
    await validateDatabase(sql)
    stores = {
      identities: new PgIdentityStore(db),
      registry: new PgButtonRegistry(db),
      ledger: new PgRedemptionLedger(db),
      settings: new PgSettingsStore(db),
      close,
    }
  } else {
    console.warn("[magnet] MAGNET_POSTGRES_ENABLED=false: using in-memory stores, data is lost on restart")
    stores = {
      identities: new InMemoryIdentityStore(time),
      registry: new InMemoryButtonRegistry(time),
      ledger: new InMemoryRedemptionLedger(time),
      settings: new InMemorySettingsStore(),
      close: async () => {},
    }
  }

  // 3. Staged rewards — Redis when enabled
  let redis: RedisStateBackend | undefined
  let sessions: StagedRewardStore
  if (config.redis.enabled) {
    redis = new RedisStateBackend(
      {
        ...DEFAULT_REDIS_CONFIG,
        url: config.redis.url,
        connectTimeoutMs: config.redis.connectTimeoutMs,
        commandTimeoutMs: config.redis.commandTimeoutMs,
      },
      createIoredisFactory(),
    )
    await redis.connect()
    console.log(`[magnet] redis: ${redis.state}`)
    sessions = new RedisStagedRewardStore(redis, config.subscription.stagedRewardTtlSeconds)
  } else {
    sessions = new InMemoryStagedRewardStore(time, config.subscription.stagedRewardTtlSeconds)
    console.log("[magnet] redis disabled: staged rewards kept in process memory")
  }

  // 4. Telegram client
  const http = new ResilientHttpClient({
    maxRetries: config.telegram.maxRetries,
    baseDelayMs: 500,
    timeoutMs: config.telegram.requestTimeoutMs,
  })
  const client = new TelegramBotClient(
    { botToken: config.telegram.botToken, apiBaseUrl: config.telegram.apiBaseUrl },
    http,
  )
  let botUsername = config.telegram.botUsername
  if (!botUsername) {
    const me = await client.getMe()
    botUsername = me.username
  }
  console.log(`[magnet] telegram bot: @${botUsername}`)

  // 5. Wire components
  const channelSetting = new SubscriptionChannelSetting(stores.settings, config.subscription.defaultChannel, logger)
  const oracle = new SubscriptionOracle(client, channelSetting, logger)
  const coordinator = new RedemptionCoordinator({
    identities: stores.identities,
    registry: stores.registry,
    ledger: stores.ledger,
    oracle,
    logger,
  })
  const publisher = new PostPublisher(client, stores.registry, botUsername, logger)
  const updates = new UpdateHandler({ client, coordinator, sessions, channelSetting, logger })

  const redisBackend = redis
  const { app } = createApp(config, {
    updates,
    admin: {
      registry: stores.registry,
      ledger: stores.ledger,
      publisher,
      channelSetting,
      client,
      adminIds: config.admin.userIds,
    },
    storage: config.postgres.enabled ? "postgres" : "in-memory",
    ...(redisBackend ? { redisState: () => redisBackend.state } : {}),
  })

  // 6. Serve
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    const bootDuration = Date.now() - bootStart
    console.log(`[magnet] serving on ${config.host}:${info.port} (boot: ${bootDuration}ms)`)
  })

  // 7. Register webhook
  if (config.telegram.webhookUrl) {
    await client.setWebhook(config.telegram.webhookUrl, config.telegram.webhookSecret || undefined)
    console.log("[magnet] webhook registered")
  } else {
    console.warn("[magnet] TELEGRAM_WEBHOOK_URL not set, webhook not registered")
  }

  // 8. Graceful shutdown
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    console.log(`[magnet] ${signal} received, shutting down...`)
    const start = Date.now()

    server.close()

    if (redisBackend) {
      await redisBackend.disconnect()
    }
    try {
      await stores.close()
    } catch (err) {
      console.error("[magnet] database close error:", err)
    }

    console.log(`[magnet] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error("[magnet] forced shutdown after 10s timeout")
      process.exit(1)
    }, 10_000).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[magnet] shutdown error:", err)
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[magnet] fatal:", err)
  process.exit(1)
})
