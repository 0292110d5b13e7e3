// src/gateway/auth.ts — Admin bearer auth and webhook secret check

import { createHash, timingSafeEqual } from "node:crypto"
import type { Context, Next } from "hono"

export const WEBHOOK_SECRET_HEADER = "X-Telegram-Bot-Api-Secret-Token"

/** Timing-safe string comparison (constant-time even for different lengths) */
export function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

/** Bearer token auth middleware for the admin API */
export function adminAuthMiddleware(bearerToken: string) {
  return async (c: Context, next: Next) => {
    const authHeader = c.req.header("Authorization")
    if (!authHeader?.startsWith("Bearer ")) {
      return c.json({ error: "Unauthorized", code: "AUTH_REQUIRED" }, 401)
    }

    const token = authHeader.slice(7)
    if (!safeCompare(token, bearerToken)) {
      return c.json({ error: "Unauthorized", code: "AUTH_INVALID" }, 401)
    }

    return next()
  }
}

/** Telegram echoes the secret given to setWebhook in every delivery. Empty secret disables the check. */
export function webhookSecretMiddleware(secret: string) {
  return async (c: Context, next: Next) => {
    if (!secret) return next()

    const provided = c.req.header(WEBHOOK_SECRET_HEADER)
    if (!provided || !safeCompare(provided, secret)) {
      return c.json({ error: "Unauthorized", code: "WEBHOOK_SECRET_INVALID" }, 401)
    }

    return next()
  }
}
