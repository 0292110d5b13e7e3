// src/redemption/ledger.ts — Redemption Ledger port + in-memory implementation
//
// Append-only: no update or delete is exposed.

import type { ButtonClickStats, NewRedemptionEvent, RedemptionEvent } from "./types.js"
import { SystemTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export interface RedemptionLedger {
  append(event: NewRedemptionEvent): Promise<RedemptionEvent>
  countClicks(buttonId: number): Promise<number>
  countUniqueIdentities(buttonId: number): Promise<number>
  /** One entry per requested id, in request order; zero counts for buttons without events */
  statsForButtons(buttonIds: number[]): Promise<ButtonClickStats[]>
}

export class InMemoryRedemptionLedger implements RedemptionLedger {
  private readonly events: RedemptionEvent[] = []
  private nextId = 1

  constructor(private readonly time: TimeProvider = new SystemTimeProvider()) {}

  async append(event: NewRedemptionEvent): Promise<RedemptionEvent> {
    const stored: RedemptionEvent = Object.freeze({
      ...event,
      id: this.nextId++,
      clickedAt: new Date(this.time.now()),
    })
    this.events.push(stored)
    return stored
  }

  async countClicks(buttonId: number): Promise<number> {
    return this.events.filter((e) => e.buttonId === buttonId).length
  }

  async countUniqueIdentities(buttonId: number): Promise<number> {
    return new Set(
      this.events.filter((e) => e.buttonId === buttonId).map((e) => e.platformId),
    ).size
  }

  async statsForButtons(buttonIds: number[]): Promise<ButtonClickStats[]> {
    const stats: ButtonClickStats[] = []
    for (const buttonId of buttonIds) {
      stats.push({
        buttonId,
        clicks: await this.countClicks(buttonId),
        uniqueIdentities: await this.countUniqueIdentities(buttonId),
      })
    }
    return stats
  }

  /** Snapshot of every event, oldest first */
  all(): readonly RedemptionEvent[] {
    return this.events.slice()
  }
}
