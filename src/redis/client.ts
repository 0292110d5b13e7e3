// src/redis/client.ts — Redis state backend
//
// Redis client for the staged-reward store. Uses a port interface
// so the actual Redis library (ioredis) is injected at boot time.

// --- Types ---

export type RedisConnectionState = "connecting" | "connected" | "disconnected"

export interface RedisConfig {
  url: string                    // redis://localhost:6379
  keyPrefix: string              // Default: "magnet"
  connectTimeoutMs: number       // Default: 5000
  commandTimeoutMs: number       // Default: 3000
  maxRetriesPerRequest: number   // Default: 1 (fail fast)
  enableOfflineQueue: boolean    // Default: false (reject when disconnected)
}

export const DEFAULT_REDIS_CONFIG: Omit<RedisConfig, "url"> = {
  keyPrefix: "magnet",
  connectTimeoutMs: 5000,
  commandTimeoutMs: 3000,
  maxRetriesPerRequest: 1,
  enableOfflineQueue: false,
}

/** Minimal Redis command interface (subset of ioredis API) */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>
  setex(key: string, seconds: number, value: string): Promise<string>
  del(...keys: string[]): Promise<number>
  ping(): Promise<string>
  quit(): Promise<string>
}

export type RedisEventClient = RedisCommandClient & {
  on(event: "connect" | "error" | "close" | "reconnecting", handler: (...args: unknown[]) => void): void
}

/** Factory to create the Redis command client */
export interface RedisClientFactory {
  createCommandClient(config: RedisConfig): RedisEventClient
}

// --- RedisStateBackend ---

/**
 * Redis state backend.
 *
 * Connection State (tri-state):
 *   - CONNECTING: initial connection attempt in progress
 *   - CONNECTED: Redis is reachable, commands succeed
 *   - DISCONNECTED: Redis is unreachable, commands will fail
 *
 * Failure Mode:
 *   Redis unavailability is not fatal at boot. Staged-reward reads then fail
 *   and the update handler treats the session as empty.
 */
export class RedisStateBackend {
  private client: RedisEventClient | null = null
  private _state: RedisConnectionState = "connecting"
  private waiters: Array<() => void> = []

  constructor(
    private config: RedisConfig,
    private factory: RedisClientFactory,
  ) {}

  /**
   * Connect to Redis and await initial connection (bounded).
   *
   * Waits up to connectTimeoutMs for the first successful connection.
   * If connection fails within timeout: state = "disconnected", logged as warning.
   */
  async connect(): Promise<void> {
    this._state = "connecting"

    const client = this.factory.createCommandClient(this.config)
    this.client = client

    client.on("connect", () => {
      this._state = "connected"
      for (const wake of this.waiters) wake()
      this.waiters = []
    })

    client.on("error", () => {
      if (this._state === "connected") {
        this._state = "disconnected"
      }
    })

    client.on("close", () => {
      this._state = "disconnected"
    })

    client.on("reconnecting", () => {
      this._state = "connecting"
    })

    try {
      await this.waitUntilReady(this.config.connectTimeoutMs)
    } catch {
      this._state = "disconnected"
      console.warn("[redis] initial connection failed, state = DISCONNECTED")
    }
  }

  /** Wait for Redis to be in CONNECTED state, with timeout. */
  async waitUntilReady(timeoutMs: number): Promise<void> {
    if (this._state === "connected") return

    return new Promise<void>((resolve, reject) => {
      const wake = () => {
        clearTimeout(timer)
        resolve()
      }
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== wake)
        reject(new Error(`Redis not ready within ${timeoutMs}ms`))
      }, timeoutMs)

      this.waiters.push(wake)
    })
  }

  /** Key helper — applies prefix + component namespace */
  key(component: string, ...parts: string[]): string {
    return `${this.config.keyPrefix}:${component}:${parts.join(":")}`
  }

  /** Raw command client access */
  getClient(): RedisCommandClient {
    if (!this.client) throw new Error("Redis not connected — call connect() first")
    return this.client
  }

  /** Connection state for health reporting */
  get state(): RedisConnectionState {
    return this._state
  }

  /** Graceful disconnect */
  async disconnect(): Promise<void> {
    if (this.client) {
      try {
        await this.client.quit()
      } catch (err) {
        console.warn("[redis] quit failed:", err instanceof Error ? err.message : String(err))
      }
    }
    this._state = "disconnected"
    this.client = null
  }
}
