// src/drizzle/validate.ts — Database startup validation gate
// On boot (when MAGNET_POSTGRES_ENABLED is not "false"), verify required tables exist.
// A missing table fails boot.

import type { Sql } from "postgres"

export const REQUIRED_TABLES = [
  "magnet_identities",
  "magnet_button_definitions",
  "magnet_redemption_events",
  "magnet_settings",
] as const

/** Tables from REQUIRED_TABLES absent from the given list. */
export function findMissingTables(existing: Iterable<string>): string[] {
  const present = new Set(existing)
  return REQUIRED_TABLES.filter((t) => !present.has(t))
}

/**
 * Validate that all required tables exist in the magnet schema.
 * Throws if any table is missing.
 */
export async function validateDatabase(sql: Sql): Promise<void> {
  const result = await sql<{ table_name: string }[]>`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'magnet'
      AND table_type = 'BASE TABLE'
  `

  const missing = findMissingTables(result.map((row) => row.table_name))

  if (missing.length > 0) {
    throw new Error(
      `Required tables missing from magnet schema: ${missing.join(", ")}. Run migrations first: npm run db:migrate`,
    )
  }

  console.log(`[magnet] database validated: ${REQUIRED_TABLES.length} tables present in magnet schema`)
}
