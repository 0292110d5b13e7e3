// src/redemption/session-store.ts — Staged reward store
//
// Holds the per-identity SessionContext between the entry event and the
// subscription re-check. Entries lapse after a TTL; an empty context is
// stored as "no entry".

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { RedisStateBackend } from "../redis/client.js"
import type { TimeProvider } from "../shared/time-provider.js"
import { EMPTY_SESSION, RewardKind, stagedReward, type SessionContext } from "./types.js"

export interface StagedRewardStore {
  load(platformId: number): Promise<SessionContext>
  save(platformId: number, session: SessionContext): Promise<void>
}

const StoredSessionSchema = Type.Object({
  stagedLink: Type.String(),
  stagedKind: Type.Union([Type.Literal(RewardKind.BOT_ACCESS), Type.Literal(RewardKind.EXTERNAL_LINK)]),
})

// ---------------------------------------------------------------------------
// Redis
// ---------------------------------------------------------------------------

export class RedisStagedRewardStore implements StagedRewardStore {
  constructor(
    private readonly redis: RedisStateBackend,
    private readonly ttlSeconds: number,
  ) {}

  async load(platformId: number): Promise<SessionContext> {
    const raw = await this.redis.getClient().get(this.key(platformId))
    if (raw === null) return EMPTY_SESSION

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      console.warn(`[staged-reward] discarding unreadable entry for ${platformId}`)
      return EMPTY_SESSION
    }
    if (!Value.Check(StoredSessionSchema, parsed)) {
      console.warn(`[staged-reward] discarding malformed entry for ${platformId}`)
      return EMPTY_SESSION
    }
    return { stagedLink: parsed.stagedLink, stagedKind: parsed.stagedKind }
  }

  async save(platformId: number, session: SessionContext): Promise<void> {
    const client = this.redis.getClient()
    const reward = stagedReward(session)
    if (!reward) {
      await client.del(this.key(platformId))
      return
    }
    await client.setex(
      this.key(platformId),
      this.ttlSeconds,
      JSON.stringify({ stagedLink: reward.link, stagedKind: reward.kind }),
    )
  }

  private key(platformId: number): string {
    return this.redis.key("staged", String(platformId))
  }
}

// ---------------------------------------------------------------------------
// In-memory (dev mode and tests)
// ---------------------------------------------------------------------------

export class InMemoryStagedRewardStore implements StagedRewardStore {
  private readonly entries = new Map<number, { session: SessionContext; expiresAt: number }>()

  constructor(
    private readonly time: TimeProvider,
    private readonly ttlSeconds: number,
  ) {}

  async load(platformId: number): Promise<SessionContext> {
    const entry = this.entries.get(platformId)
    if (!entry) return EMPTY_SESSION
    if (this.time.now() >= entry.expiresAt) {
      this.entries.delete(platformId)
      return EMPTY_SESSION
    }
    return entry.session
  }

  async save(platformId: number, session: SessionContext): Promise<void> {
    if (!stagedReward(session)) {
      this.entries.delete(platformId)
      return
    }
    this.entries.set(platformId, {
      session: { ...session },
      expiresAt: this.time.now() + this.ttlSeconds * 1000,
    })
  }
}
