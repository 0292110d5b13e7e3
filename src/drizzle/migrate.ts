// src/drizzle/migrate.ts — `npm run db:migrate`
// Applies the drizzle-kit migrations under ./drizzle, then runs the same
// table check the server runs at boot.

import { fileURLToPath } from "node:url"
import { migrate } from "drizzle-orm/postgres-js/migrator"
import { openDatabase } from "./db.js"
import { validateDatabase } from "./validate.js"

// Resolves to <root>/drizzle from both src/drizzle and dist/drizzle
const MIGRATIONS_FOLDER = fileURLToPath(new URL("../../drizzle", import.meta.url))

async function runMigrations(): Promise<void> {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    throw new Error("DATABASE_URL is required")
  }

  const { db, sql, close } = openDatabase({ connectionString, maxConnections: 1 })
  try {
    console.log(`[magnet-migrate] applying migrations from ${MIGRATIONS_FOLDER}`)
    await migrate(db, { migrationsFolder: MIGRATIONS_FOLDER })
    await validateDatabase(sql)
  } finally {
    await close()
  }
}

runMigrations().catch((err: unknown) => {
  console.error("[magnet-migrate] failed:", err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
