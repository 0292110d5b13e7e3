// src/gateway/server.ts — Hono HTTP server with routes

import { Hono } from "hono"
import type { MagnetConfig } from "../config.js"
import type { RedisConnectionState } from "../redis/client.js"
import { adminAuthMiddleware, webhookSecretMiddleware } from "./auth.js"
import { createAdminRoutes, type AdminRouteDeps } from "./routes/admin.js"
import { createWebhookHandler, type UpdateSink } from "./routes/webhook.js"

export interface AppOptions {
  updates: UpdateSink
  admin: AdminRouteDeps
  /** "postgres" or "in-memory" */
  storage: string
  /** Absent when Redis is disabled */
  redisState?: () => RedisConnectionState
}

export function createApp(config: MagnetConfig, options: AppOptions) {
  const app = new Hono()

  // Health endpoint (no auth required)
  app.get("/health", (c) => {
    const redis = options.redisState ? options.redisState() : "disabled"
    return c.json({
      status: redis === "disconnected" ? "degraded" : "healthy",
      uptime: process.uptime(),
      checks: {
        storage: options.storage,
        redis,
      },
    })
  })

  // Telegram webhook — secret header checked when configured
  app.post(
    "/telegram/webhook",
    webhookSecretMiddleware(config.telegram.webhookSecret),
    createWebhookHandler(options.updates),
  )

  // Admin API — only mounted with a bearer token configured
  if (config.admin.bearerToken) {
    const adminApp = new Hono()
    adminApp.use("*", adminAuthMiddleware(config.admin.bearerToken))
    adminApp.route("/", createAdminRoutes(options.admin))
    app.route("/admin", adminApp)
  } else {
    console.warn("[magnet] MAGNET_ADMIN_TOKEN not set, admin API disabled")
  }

  app.onError((err, c) => {
    console.error(`[api] ${c.req.method} ${c.req.path} failed:`, err.message)
    return c.json({ error: "Internal error", code: "INTERNAL" }, 500)
  })

  return { app }
}
