// src/gateway/routes/admin.ts — Admin REST endpoints
//
// Bearer-authenticated (see server.ts). Mutating requests carry `admin_id`,
// which must be listed in ADMIN_USER_IDS.
//
// - GET /buttons                     → recent button definitions with click stats
// - GET /buttons/:id                 → one definition with stats
// - POST /posts                      → publish a post with a reward button
// - GET /subscription-channel        → active gate channel and its source
// - PUT /subscription-channel        → validate and store the gate channel

import { Hono, type Context } from "hono"
import { Type, type Static } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { PostPublisher, PublishRequest } from "../../publishing/publisher.js"
import { DEFAULT_LIST_LIMIT, type ButtonRegistry } from "../../redemption/button-registry.js"
import type { RedemptionLedger } from "../../redemption/ledger.js"
import { normalizeChannel, type SubscriptionChannelSetting } from "../../redemption/settings.js"
import { RewardKind, type ButtonClickStats, type ButtonDefinition } from "../../redemption/types.js"
import { describeForAdmin } from "../../telegram/errors.js"
import type { MessagingPlatformClient } from "../../telegram/types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AdminRouteDeps {
  registry: ButtonRegistry
  ledger: RedemptionLedger
  publisher: PostPublisher
  channelSetting: SubscriptionChannelSetting
  client: Pick<MessagingPlatformClient, "getChat">
  adminIds: readonly number[]
}

const MAX_LIST_LIMIT = 200

const PublishPostBody = Type.Object({
  admin_id: Type.Integer(),
  channel: Type.String({ minLength: 1 }),
  text: Type.String(),
  photo_file_id: Type.Optional(Type.String({ minLength: 1 })),
  button_text: Type.String({ minLength: 1, maxLength: 64 }),
  reward_kind: Type.Union([Type.Literal(RewardKind.BOT_ACCESS), Type.Literal(RewardKind.EXTERNAL_LINK)]),
  link: Type.Optional(Type.String()),
})

const SetChannelBody = Type.Object({
  admin_id: Type.Integer(),
  channel: Type.String({ minLength: 1 }),
})

type PublishPostBody = Static<typeof PublishPostBody>

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function serializeButton(button: ButtonDefinition, stats?: ButtonClickStats) {
  return {
    id: button.id,
    channel_id: button.channelId,
    post_message_id: button.postMessageId,
    post_title: button.postTitle,
    button_text: button.buttonText,
    reward_kind: button.rewardKind,
    link: button.link,
    created_at: button.createdAt.toISOString(),
    created_by: button.createdBy,
    clicks: stats?.clicks ?? 0,
    unique_users: stats?.uniqueIdentities ?? 0,
  }
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch {
    return null
  }
}

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export function createAdminRoutes(deps: AdminRouteDeps): Hono {
  const app = new Hono()
  const isAdmin = (id: number) => deps.adminIds.includes(id)

  // GET /buttons — newest first, with clicks and unique users
  app.get("/buttons", async (c) => {
    const limitParam = c.req.query("limit")
    let limit = DEFAULT_LIST_LIMIT
    if (limitParam !== undefined) {
      const parsed = parseInt(limitParam, 10)
      if (Number.isNaN(parsed) || parsed < 1) {
        return c.json({ error: "limit must be a positive integer", code: "INVALID_REQUEST" }, 400)
      }
      limit = Math.min(parsed, MAX_LIST_LIMIT)
    }

    const buttons = await deps.registry.listRecent(limit)
    const stats = await deps.ledger.statsForButtons(buttons.map((b) => b.id))
    const byId = new Map(stats.map((s) => [s.buttonId, s]))

    return c.json({
      buttons: buttons.map((b) => serializeButton(b, byId.get(b.id))),
      total_clicks: stats.reduce((sum, s) => sum + s.clicks, 0),
    })
  })

  // GET /buttons/:id
  app.get("/buttons/:id", async (c) => {
    const id = Number(c.req.param("id"))
    if (!Number.isSafeInteger(id) || id < 1) {
      return c.json({ error: "id must be a positive integer", code: "INVALID_REQUEST" }, 400)
    }

    const button = await deps.registry.findById(id)
    if (!button) {
      return c.json({ error: "Button not found", code: "BUTTON_NOT_FOUND" }, 404)
    }

    const [stats] = await deps.ledger.statsForButtons([button.id])
    return c.json(serializeButton(button, stats))
  })

  // POST /posts — publish a post carrying a reward button
  app.post("/posts", async (c) => {
    const body = await readJson(c)
    if (!Value.Check(PublishPostBody, body)) {
      return c.json({ error: "Invalid request body", code: "INVALID_REQUEST" }, 400)
    }
    if (!isAdmin(body.admin_id)) {
      return c.json({ error: "Forbidden", code: "NOT_AN_ADMIN" }, 403)
    }

    const channel = normalizeChannel(body.channel)
    if (!channel) {
      return c.json({ error: "Invalid channel", code: "INVALID_CHANNEL" }, 400)
    }

    const result = await deps.publisher.publish(toPublishRequest(body, channel))
    if (result.status === "failed") {
      return c.json({
        error: result.reason,
        code: "PUBLISH_FAILED",
        stage: result.stage,
        ...(result.messageId !== undefined ? { message_id: result.messageId } : {}),
      }, result.stage === "validate" ? 400 : 502)
    }

    return c.json({ button: serializeButton(result.button), warnings: result.warnings }, 201)
  })

  // GET /subscription-channel
  app.get("/subscription-channel", async (c) => {
    const active = await deps.channelSetting.resolve()
    return c.json({ channel: active.channel, source: active.source })
  })

  // PUT /subscription-channel — the bot must see the chat, and it must be a channel
  app.put("/subscription-channel", async (c) => {
    const body = await readJson(c)
    if (!Value.Check(SetChannelBody, body)) {
      return c.json({ error: "Invalid request body", code: "INVALID_REQUEST" }, 400)
    }
    if (!isAdmin(body.admin_id)) {
      return c.json({ error: "Forbidden", code: "NOT_AN_ADMIN" }, 403)
    }

    const channel = normalizeChannel(body.channel)
    if (!channel) {
      return c.json({ error: "Invalid channel", code: "INVALID_CHANNEL" }, 400)
    }

    try {
      const chat = await deps.client.getChat(channel)
      if (chat.type !== "channel" && chat.type !== "supergroup") {
        return c.json({ error: `${channel} is a ${chat.type}, not a channel`, code: "INVALID_CHANNEL" }, 400)
      }
    } catch (err) {
      return c.json({ error: describeForAdmin(err), code: "CHANNEL_UNREACHABLE" }, 502)
    }

    const stored = await deps.channelSetting.update(channel, body.admin_id)
    return c.json({
      channel: stored.value,
      source: "setting",
      updated_by: stored.updatedBy,
      updated_at: stored.updatedAt.toISOString(),
    })
  })

  return app
}

function toPublishRequest(body: PublishPostBody, channel: string): PublishRequest {
  return {
    channel,
    text: body.text,
    buttonText: body.button_text,
    rewardKind: body.reward_kind,
    adminId: body.admin_id,
    ...(body.photo_file_id !== undefined ? { photoFileId: body.photo_file_id } : {}),
    ...(body.link !== undefined ? { link: body.link } : {}),
  }
}
