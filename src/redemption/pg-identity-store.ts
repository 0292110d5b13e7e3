// src/redemption/pg-identity-store.ts — Postgres-backed IdentityStore
//
// Single-statement upsert: INSERT … ON CONFLICT (platform_id) DO UPDATE,
// so concurrent first interactions of one user converge on one row.

import { sql } from "drizzle-orm"
import type { Db } from "../drizzle/db.js"
import { magnetIdentities } from "../drizzle/schema.js"
import type { IdentityStore } from "./identity-store.js"
import type { Identity, IdentityProfile } from "./types.js"

export class PgIdentityStore implements IdentityStore {
  constructor(private readonly db: Db) {}

  async upsert(profile: IdentityProfile): Promise<Identity> {
    const rows = await this.db
      .insert(magnetIdentities)
      .values({
        platformId: profile.platformId,
        handle: profile.handle ?? null,
        firstName: profile.firstName ?? null,
      })
      .onConflictDoUpdate({
        target: magnetIdentities.platformId,
        set: {
          handle: sql`COALESCE(excluded.handle, ${magnetIdentities.handle})`,
          firstName: sql`COALESCE(excluded.first_name, ${magnetIdentities.firstName})`,
          lastActivityAt: new Date(),
        },
      })
      .returning()

    const row = rows[0]
    if (!row) throw new Error(`Identity upsert returned no row for ${profile.platformId}`)

    return {
      id: row.id,
      platformId: row.platformId,
      handle: row.handle,
      firstName: row.firstName,
      registeredAt: row.registeredAt,
      lastActivityAt: row.lastActivityAt,
    }
  }
}
