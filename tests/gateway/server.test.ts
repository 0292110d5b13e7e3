// tests/gateway/server.test.ts — Health, Telegram webhook and admin API routes

import { describe, it, expect, beforeEach, vi } from "vitest"
import type { MagnetConfig } from "../../src/config.js"
import { createApp } from "../../src/gateway/server.js"
import { WEBHOOK_SECRET_HEADER } from "../../src/gateway/auth.js"
import type { RedisConnectionState } from "../../src/redis/client.js"
import { PostPublisher } from "../../src/publishing/publisher.js"
import { InMemoryButtonRegistry } from "../../src/redemption/button-registry.js"
import { InMemoryRedemptionLedger } from "../../src/redemption/ledger.js"
import { InMemorySettingsStore, SubscriptionChannelSetting } from "../../src/redemption/settings.js"
import { RewardKind } from "../../src/redemption/types.js"
import { MockTimeProvider } from "../../src/shared/time-provider.js"
import { PlatformError, PlatformErrorKind } from "../../src/telegram/errors.js"
import type { TelegramUpdate } from "../../src/telegram/types.js"
import { FakeBotClient, RecordingLogger } from "../helpers/fakes.js"

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

const ADMIN_TOKEN = "test-admin-token"
const WEBHOOK_SECRET = "test-secret"
const CREATED_AT = Date.UTC(2026, 0, 1)

function makeConfig(overrides: { bearerToken?: string; webhookSecret?: string } = {}): MagnetConfig {
  return {
    port: 3000,
    host: "127.0.0.1",
    telegram: {
      botToken: "test-token",
      botUsername: "magnet_test_bot",
      apiBaseUrl: "https://api.test",
      webhookUrl: "",
      webhookSecret: overrides.webhookSecret ?? WEBHOOK_SECRET,
      requestTimeoutMs: 1000,
      maxRetries: 0,
    },
    subscription: { defaultChannel: "@gate_channel", stagedRewardTtlSeconds: 3600 },
    admin: { bearerToken: overrides.bearerToken ?? ADMIN_TOKEN, userIds: [7] },
    postgres: { enabled: false, connectionString: "", maxConnections: 1 },
    redis: { enabled: false, url: "", connectTimeoutMs: 100, commandTimeoutMs: 100 },
  }
}

function setup(config = makeConfig(), redisState?: () => RedisConnectionState) {
  const client = new FakeBotClient()
  client.chats.set("@gate_channel", { id: -1001, type: "channel", title: "Gate" })
  client.chats.set("@new_gate", { id: -1003, type: "supergroup", title: "New gate" })
  client.chats.set("@some_group", { id: -1004, type: "group", title: "Group" })
  const logger = new RecordingLogger()
  const registry = new InMemoryButtonRegistry(new MockTimeProvider(CREATED_AT))
  const ledger = new InMemoryRedemptionLedger(new MockTimeProvider(CREATED_AT))
  const channelSetting = new SubscriptionChannelSetting(new InMemorySettingsStore(), "@gate_channel", logger)
  const publisher = new PostPublisher(client, registry, "magnet_test_bot", logger)
  const handled: TelegramUpdate[] = []
  const updates = { handle: vi.fn(async (update: TelegramUpdate) => { handled.push(update) }) }

  const { app } = createApp(config, {
    updates,
    admin: { registry, ledger, publisher, channelSetting, client, adminIds: config.admin.userIds },
    storage: "in-memory",
    ...(redisState ? { redisState } : {}),
  })
  return { app, client, registry, ledger, channelSetting, updates, handled }
}

type ButtonJson = Record<string, unknown> & { id: number }

interface ButtonListJson {
  buttons: ButtonJson[]
  total_clicks: number
}

interface PublishJson {
  button: ButtonJson
  warnings: string[]
}

const adminHeaders = {
  Authorization: `Bearer ${ADMIN_TOKEN}`,
  "Content-Type": "application/json",
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

describe("GET /health", () => {
  it("reports storage and a disabled Redis", async () => {
    const { app } = setup()
    const res = await app.request("/health")
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body).toMatchObject({ status: "healthy", checks: { storage: "in-memory", redis: "disabled" } })
  })

  it("is degraded while Redis is disconnected", async () => {
    const { app } = setup(makeConfig(), () => "disconnected")
    const body = await (await app.request("/health")).json()
    expect(body).toMatchObject({ status: "degraded", checks: { redis: "disconnected" } })
  })
})

// ---------------------------------------------------------------------------
// Webhook
// ---------------------------------------------------------------------------

describe("POST /telegram/webhook", () => {
  const update = { update_id: 5, message: { message_id: 1, chat: { id: 42, type: "private" }, text: "/start" } }

  it("dispatches a valid update", async () => {
    const { app, handled } = setup()

    const res = await app.request("/telegram/webhook", {
      method: "POST",
      headers: { [WEBHOOK_SECRET_HEADER]: WEBHOOK_SECRET, "Content-Type": "application/json" },
      body: JSON.stringify(update),
    })

    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ ok: true })
    expect(handled).toEqual([update])
  })

  it("rejects a wrong or missing secret", async () => {
    const { app, updates } = setup()

    const wrong = await app.request("/telegram/webhook", {
      method: "POST",
      headers: { [WEBHOOK_SECRET_HEADER]: "not-the-secret" },
      body: JSON.stringify(update),
    })
    const missing = await app.request("/telegram/webhook", { method: "POST", body: JSON.stringify(update) })

    expect(wrong.status).toBe(401)
    expect(missing.status).toBe(401)
    expect(updates.handle).not.toHaveBeenCalled()
  })

  it("skips the secret check when none is configured", async () => {
    const { app } = setup(makeConfig({ webhookSecret: "" }))
    const res = await app.request("/telegram/webhook", { method: "POST", body: JSON.stringify(update) })
    expect(res.status).toBe(200)
  })

  it("rejects a malformed update", async () => {
    const { app, updates } = setup()
    const headers = { [WEBHOOK_SECRET_HEADER]: WEBHOOK_SECRET }

    const notJson = await app.request("/telegram/webhook", { method: "POST", headers, body: "{oops" })
    const wrongShape = await app.request("/telegram/webhook", {
      method: "POST",
      headers,
      body: JSON.stringify({ update_id: "five" }),
    })

    expect(notJson.status).toBe(400)
    expect(wrongShape.status).toBe(400)
    expect(await wrongShape.json()).toEqual({ error: "Invalid update", code: "INVALID_UPDATE" })
    expect(updates.handle).not.toHaveBeenCalled()
  })

  it("acknowledges an update whose handling failed", async () => {
    const { app, updates } = setup()
    updates.handle.mockRejectedValueOnce(new Error("boom"))
    const error = vi.spyOn(console, "error").mockImplementation(() => {})

    const res = await app.request("/telegram/webhook", {
      method: "POST",
      headers: { [WEBHOOK_SECRET_HEADER]: WEBHOOK_SECRET },
      body: JSON.stringify(update),
    })

    expect(res.status).toBe(200)
    expect(error).toHaveBeenCalledWith("[webhook] update 5 failed:", "boom")
    error.mockRestore()
  })
})

// ---------------------------------------------------------------------------
// Admin API
// ---------------------------------------------------------------------------

describe("admin API", () => {
  let ctx: ReturnType<typeof setup>

  beforeEach(() => {
    ctx = setup()
  })

  it("requires the bearer token", async () => {
    const none = await ctx.app.request("/admin/buttons")
    const wrong = await ctx.app.request("/admin/buttons", { headers: { Authorization: "Bearer nope" } })

    expect(none.status).toBe(401)
    expect(await none.json()).toEqual({ error: "Unauthorized", code: "AUTH_REQUIRED" })
    expect(wrong.status).toBe(401)
    expect(await wrong.json()).toEqual({ error: "Unauthorized", code: "AUTH_INVALID" })
  })

  it("is not mounted without a configured token", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {})
    const { app } = setup(makeConfig({ bearerToken: "" }))
    const res = await app.request("/admin/buttons", { headers: { Authorization: "Bearer " } })
    expect(res.status).toBe(404)
    warn.mockRestore()
  })

  it("lists buttons newest first with click stats", async () => {
    const { registry, ledger, app } = ctx
    const first = await registry.create({
      channelId: "@gate_channel", postMessageId: 10, postTitle: "First", buttonText: "One",
      rewardKind: RewardKind.BOT_ACCESS, link: "https://t.me/magnet_test_bot?start=channel_button_10", createdBy: 7,
    })
    const second = await registry.create({
      channelId: "@gate_channel", postMessageId: 11, postTitle: "Second", buttonText: "Two",
      rewardKind: RewardKind.EXTERNAL_LINK, link: "https://example.com", createdBy: 7,
    })
    await ledger.append({ identityId: 1, platformId: 42, buttonId: first.id, sourceToken: "channel_button_10", postId: 10 })
    await ledger.append({ identityId: 1, platformId: 42, buttonId: first.id, sourceToken: "channel_button_10", postId: 10 })
    await ledger.append({ identityId: 2, platformId: 43, buttonId: first.id, sourceToken: "channel_button_10", postId: 10 })

    const res = await app.request("/admin/buttons", { headers: adminHeaders })
    const body = await res.json() as ButtonListJson

    expect(res.status).toBe(200)
    expect(body.total_clicks).toBe(3)
    expect(body.buttons.map((b) => b.id)).toEqual([second.id, first.id])
    expect(body.buttons[1]).toEqual({
      id: first.id,
      channel_id: "@gate_channel",
      post_message_id: 10,
      post_title: "First",
      button_text: "One",
      reward_kind: "bot-access",
      link: "https://t.me/magnet_test_bot?start=channel_button_10",
      created_at: new Date(CREATED_AT).toISOString(),
      created_by: 7,
      clicks: 3,
      unique_users: 2,
    })
    expect(body.buttons[0]).toMatchObject({ clicks: 0, unique_users: 0 })
  })

  it("rejects a bad limit", async () => {
    const res = await ctx.app.request("/admin/buttons?limit=0", { headers: adminHeaders })
    expect(res.status).toBe(400)
  })

  it("returns one button or 404", async () => {
    const created = await ctx.registry.create({
      channelId: "@gate_channel", postMessageId: 10, postTitle: "First", buttonText: "One",
      rewardKind: RewardKind.BOT_ACCESS, link: "https://t.me/magnet_test_bot?start=channel_button_10", createdBy: 7,
    })

    const found = await ctx.app.request(`/admin/buttons/${created.id}`, { headers: adminHeaders })
    const missing = await ctx.app.request("/admin/buttons/99", { headers: adminHeaders })
    const invalid = await ctx.app.request("/admin/buttons/abc", { headers: adminHeaders })

    expect(found.status).toBe(200)
    expect(await found.json()).toMatchObject({ id: created.id, clicks: 0, unique_users: 0 })
    expect(missing.status).toBe(404)
    expect(invalid.status).toBe(400)
  })

  it("publishes a post for a listed admin", async () => {
    const res = await ctx.app.request("/admin/posts", {
      method: "POST",
      headers: adminHeaders,
      body: JSON.stringify({
        admin_id: 7,
        channel: "gate_channel",
        text: "Free checklist",
        button_text: "Get it",
        reward_kind: "bot-access",
      }),
    })
    const body = await res.json() as PublishJson

    expect(res.status).toBe(201)
    expect(body.warnings).toEqual([])
    expect(body.button).toMatchObject({
      channel_id: "@gate_channel",
      post_message_id: 100,
      link: "https://t.me/magnet_test_bot?start=channel_button_100",
      created_by: 7,
    })
  })

  it("forbids admin ids that are not listed", async () => {
    const res = await ctx.app.request("/admin/posts", {
      method: "POST",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 8, channel: "@gate_channel", text: "x", button_text: "Get it", reward_kind: "bot-access" }),
    })

    expect(res.status).toBe(403)
    expect(ctx.client.published).toHaveLength(0)
  })

  it("validates the publish body", async () => {
    const res = await ctx.app.request("/admin/posts", {
      method: "POST",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 7, channel: "@gate_channel", text: "x", button_text: "Get it", reward_kind: "paid" }),
    })
    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ error: "Invalid request body", code: "INVALID_REQUEST" })
  })

  it("reports a publish failure with its stage", async () => {
    ctx.client.publishError = new PlatformError(PlatformErrorKind.NOT_ENOUGH_RIGHTS, "sendMessage", "Forbidden")

    const res = await ctx.app.request("/admin/posts", {
      method: "POST",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 7, channel: "@gate_channel", text: "x", button_text: "Get it", reward_kind: "bot-access" }),
    })

    expect(res.status).toBe(502)
    expect(await res.json()).toEqual({
      error: "bot is not an admin of the channel or lacks the right to post",
      code: "PUBLISH_FAILED",
      stage: "publish",
    })
  })

  it("reads and updates the subscription channel", async () => {
    const before = await (await ctx.app.request("/admin/subscription-channel", { headers: adminHeaders })).json()
    expect(before).toEqual({ channel: "@gate_channel", source: "default" })

    const res = await ctx.app.request("/admin/subscription-channel", {
      method: "PUT",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 7, channel: "new_gate" }),
    })
    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ channel: "@new_gate", source: "setting", updated_by: 7 })
    expect(await ctx.channelSetting.resolve()).toEqual({ channel: "@new_gate", source: "setting" })
  })

  it("refuses a channel that is a plain group or unreachable", async () => {
    const group = await ctx.app.request("/admin/subscription-channel", {
      method: "PUT",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 7, channel: "@some_group" }),
    })
    expect(group.status).toBe(400)

    ctx.client.chatError = new PlatformError(PlatformErrorKind.CHAT_NOT_FOUND, "getChat", "Bad Request: chat not found")
    const unreachable = await ctx.app.request("/admin/subscription-channel", {
      method: "PUT",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 7, channel: "@missing" }),
    })
    expect(unreachable.status).toBe(502)
    expect(await unreachable.json()).toEqual({
      error: "channel not found: check the username and that the bot was added to it",
      code: "CHANNEL_UNREACHABLE",
    })
    expect(await ctx.channelSetting.resolve()).toEqual({ channel: "@gate_channel", source: "default" })
  })

  it("forbids channel updates from unlisted admins", async () => {
    const res = await ctx.app.request("/admin/subscription-channel", {
      method: "PUT",
      headers: adminHeaders,
      body: JSON.stringify({ admin_id: 99, channel: "@new_gate" }),
    })
    expect(res.status).toBe(403)
  })
})
