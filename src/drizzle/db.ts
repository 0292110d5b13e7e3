// src/drizzle/db.ts — Postgres pool + Drizzle handle for the magnet schema

import { drizzle } from "drizzle-orm/postgres-js"
import postgres from "postgres"
import type { MagnetConfig } from "../config.js"
import * as schema from "./schema.js"

/** Reported to Postgres as application_name, visible in pg_stat_activity */
export const APPLICATION_NAME = "magnet-gate"

/** Seconds the pool waits for in-flight queries on close */
const CLOSE_TIMEOUT_SECONDS = 5

export type DatabaseOptions = Pick<MagnetConfig["postgres"], "connectionString" | "maxConnections">

/**
 * Open the pool. The returned `sql` client runs raw checks (validate.ts);
 * `close` drains it on shutdown.
 */
export function openDatabase(options: DatabaseOptions) {
  const sql = postgres(options.connectionString, {
    max: options.maxConnections,
    idle_timeout: 20,
    connect_timeout: 10,
    connection: { application_name: APPLICATION_NAME },
  })
  const db = drizzle(sql, { schema })

  return {
    db,
    sql,
    close: () => sql.end({ timeout: CLOSE_TIMEOUT_SECONDS }),
  }
}

export type Db = ReturnType<typeof openDatabase>["db"]
