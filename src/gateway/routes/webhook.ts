// src/gateway/routes/webhook.ts — Telegram webhook endpoint
//
// Telegram redelivers any update answered with a non-2xx status, so a
// well-formed update is always acknowledged; handling failures are logged.

import type { Context } from "hono"
import { Value } from "@sinclair/typebox/value"
import { TelegramUpdateSchema, type TelegramUpdate } from "../../telegram/types.js"

export interface UpdateSink {
  handle(update: TelegramUpdate): Promise<void>
}

export function createWebhookHandler(sink: UpdateSink) {
  return async (c: Context) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch {
      return c.json({ error: "Invalid JSON", code: "INVALID_UPDATE" }, 400)
    }

    if (!Value.Check(TelegramUpdateSchema, body)) {
      return c.json({ error: "Invalid update", code: "INVALID_UPDATE" }, 400)
    }

    try {
      await sink.handle(body)
    } catch (err) {
      console.error(`[webhook] update ${body.update_id} failed:`, err instanceof Error ? err.message : String(err))
    }

    return c.json({ ok: true })
  }
}
