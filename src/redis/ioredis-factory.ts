// src/redis/ioredis-factory.ts — ioredis adapter
//
// Bridges the RedisClientFactory port interface with the actual ioredis library.

import { Redis } from "ioredis"
import type { RedisConfig, RedisClientFactory, RedisEventClient } from "./client.js"

/** Create a RedisClientFactory backed by ioredis. */
export function createIoredisFactory(): RedisClientFactory {
  return {
    createCommandClient(config: RedisConfig): RedisEventClient {
      const client = new Redis(config.url, {
        connectTimeout: config.connectTimeoutMs,
        commandTimeout: config.commandTimeoutMs,
        maxRetriesPerRequest: config.maxRetriesPerRequest,
        enableOfflineQueue: config.enableOfflineQueue,
        lazyConnect: true,
      })

      // ioredis connect() is lazy — trigger it; failures surface through the "error" event
      client.connect().catch((err: unknown) => {
        console.warn("[redis] connect failed:", err instanceof Error ? err.message : String(err))
      })

      return {
        get: (key) => client.get(key),
        setex: (key, seconds, value) => client.setex(key, seconds, value),
        del: (...keys) => client.del(...keys),
        ping: () => client.ping(),
        quit: () => client.quit(),
        on: (event, handler) => {
          client.on(event, handler)
        },
      }
    },
  }
}
