// src/redemption/identity-store.ts — Identity Store port + in-memory implementation

import type { Identity, IdentityProfile } from "./types.js"
import { SystemTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export interface IdentityStore {
  /**
   * Lookup-or-create by platform id. An existing identity gets its
   * last-activity refreshed, and handle/first name when provided.
   */
  upsert(profile: IdentityProfile): Promise<Identity>
}

export class InMemoryIdentityStore implements IdentityStore {
  private readonly byPlatformId = new Map<number, Identity>()
  private nextId = 1

  constructor(private readonly time: TimeProvider = new SystemTimeProvider()) {}

  async upsert(profile: IdentityProfile): Promise<Identity> {
    const now = new Date(this.time.now())
    const existing = this.byPlatformId.get(profile.platformId)

    if (existing) {
      const updated: Identity = {
        ...existing,
        handle: profile.handle ?? existing.handle,
        firstName: profile.firstName ?? existing.firstName,
        lastActivityAt: now,
      }
      this.byPlatformId.set(profile.platformId, updated)
      return { ...updated }
    }

    const created: Identity = {
      id: this.nextId++,
      platformId: profile.platformId,
      handle: profile.handle ?? null,
      firstName: profile.firstName ?? null,
      registeredAt: now,
      lastActivityAt: now,
    }
    this.byPlatformId.set(profile.platformId, created)
    return { ...created }
  }

  get size(): number {
    return this.byPlatformId.size
  }
}
