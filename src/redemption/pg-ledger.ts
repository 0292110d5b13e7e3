// src/redemption/pg-ledger.ts — Postgres-backed RedemptionLedger

import { count, countDistinct, eq, inArray } from "drizzle-orm"
import type { Db } from "../drizzle/db.js"
import { magnetRedemptionEvents } from "../drizzle/schema.js"
import type { RedemptionLedger } from "./ledger.js"
import type { ButtonClickStats, NewRedemptionEvent, RedemptionEvent } from "./types.js"

export class PgRedemptionLedger implements RedemptionLedger {
  constructor(private readonly db: Db) {}

  async append(event: NewRedemptionEvent): Promise<RedemptionEvent> {
    const rows = await this.db
      .insert(magnetRedemptionEvents)
      .values(event)
      .returning()

    const row = rows[0]
    if (!row) throw new Error(`Ledger insert returned no row for ${event.platformId}`)
    return row
  }

  async countClicks(buttonId: number): Promise<number> {
    const rows = await this.db
      .select({ value: count() })
      .from(magnetRedemptionEvents)
      .where(eq(magnetRedemptionEvents.buttonId, buttonId))

    return rows[0]?.value ?? 0
  }

  async countUniqueIdentities(buttonId: number): Promise<number> {
    const rows = await this.db
      .select({ value: countDistinct(magnetRedemptionEvents.platformId) })
      .from(magnetRedemptionEvents)
      .where(eq(magnetRedemptionEvents.buttonId, buttonId))

    return rows[0]?.value ?? 0
  }

  async statsForButtons(buttonIds: number[]): Promise<ButtonClickStats[]> {
    if (buttonIds.length === 0) return []

    const e = magnetRedemptionEvents
    const rows = await this.db
      .select({
        buttonId: e.buttonId,
        clicks: count(),
        uniqueIdentities: countDistinct(e.platformId),
      })
      .from(e)
      .where(inArray(e.buttonId, buttonIds))
      .groupBy(e.buttonId)

    const byButton = new Map<number, ButtonClickStats>()
    for (const row of rows) {
      if (row.buttonId === null) continue
      byButton.set(row.buttonId, {
        buttonId: row.buttonId,
        clicks: row.clicks,
        uniqueIdentities: row.uniqueIdentities,
      })
    }

    return buttonIds.map((buttonId) => byButton.get(buttonId) ?? { buttonId, clicks: 0, uniqueIdentities: 0 })
  }
}
