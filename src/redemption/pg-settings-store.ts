// src/redemption/pg-settings-store.ts — Postgres-backed SettingsStore

import { eq } from "drizzle-orm"
import type { Db } from "../drizzle/db.js"
import { magnetSettings } from "../drizzle/schema.js"
import type { SettingsStore, StoredSetting } from "./settings.js"

export class PgSettingsStore implements SettingsStore {
  constructor(private readonly db: Db) {}

  async get(key: string): Promise<StoredSetting | null> {
    const rows = await this.db
      .select()
      .from(magnetSettings)
      .where(eq(magnetSettings.key, key))

    return rows.length === 0 ? null : rows[0]
  }

  async set(key: string, value: string, updatedBy: number): Promise<StoredSetting> {
    const updatedAt = new Date()
    const rows = await this.db
      .insert(magnetSettings)
      .values({ key, value, updatedBy, updatedAt })
      .onConflictDoUpdate({
        target: magnetSettings.key,
        set: { value, updatedBy, updatedAt },
      })
      .returning()

    const row = rows[0]
    if (!row) throw new Error(`Settings upsert returned no row for ${key}`)
    return row
  }
}
