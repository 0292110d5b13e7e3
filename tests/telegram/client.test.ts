// tests/telegram/client.test.ts — Bot API client: requests, results, error kinds

import { describe, it, expect } from "vitest"
import { HttpTimeoutError } from "../../src/shared/http-client.js"
import { TelegramBotClient } from "../../src/telegram/client.js"
import {
  PlatformError,
  classifyApiError,
  describeForAdmin,
  isPlatformError,
} from "../../src/telegram/errors.js"
import { ScriptedHttpClient, apiError, apiOk, type HttpStep } from "../helpers/fakes.js"

function setup(...steps: HttpStep[]) {
  const http = new ScriptedHttpClient(steps)
  const client = new TelegramBotClient({ botToken: "test-token", apiBaseUrl: "https://api.test/" }, http)
  return { http, client }
}

async function platformErrorOf(promise: Promise<unknown>): Promise<PlatformError> {
  const err = await promise.catch((e: unknown) => e)
  if (!isPlatformError(err)) throw new Error(`expected PlatformError, got ${String(err)}`)
  return err
}

describe("TelegramBotClient requests", () => {
  it("posts JSON to the method URL", async () => {
    const { http, client } = setup(apiOk({ status: "member", user: { id: 42 } }))

    expect(await client.getMembershipStatus("@gate", 42)).toBe("member")
    expect(http.requests[0]).toMatchObject({
      url: "https://api.test/bottest-token/getChatMember",
      method: "POST",
      headers: { "Content-Type": "application/json" },
    })
    expect(http.bodyOf(0)).toEqual({ chat_id: "@gate", user_id: 42 })
  })

  it("publishes a text post with one URL button", async () => {
    const { http, client } = setup(apiOk({ message_id: 501, chat: { id: -100 } }))

    const messageId = await client.publishPost("@gate", { text: "New guide" }, { text: "Get it", url: "https://t.me/bot?start=channel_button" })

    expect(messageId).toBe(501)
    expect(http.requests[0].url).toBe("https://api.test/bottest-token/sendMessage")
    expect(http.bodyOf(0)).toEqual({
      chat_id: "@gate",
      text: "New guide",
      reply_markup: { inline_keyboard: [[{ text: "Get it", url: "https://t.me/bot?start=channel_button" }]] },
    })
  })

  it("publishes a photo post with the text as caption", async () => {
    const { http, client } = setup(apiOk({ message_id: 502 }))

    await client.publishPost("@gate", { text: "Cover", photoFileId: "file-1" }, { text: "Get it", url: "https://example.com" })

    expect(http.requests[0].url).toBe("https://api.test/bottest-token/sendPhoto")
    expect(http.bodyOf(0)).toMatchObject({ photo: "file-1", caption: "Cover" })
  })

  it("serializes callback buttons and omits an absent keyboard", async () => {
    const { http, client } = setup(apiOk({ message_id: 1 }), apiOk({ message_id: 2 }))

    await client.sendMessage(42, "Subscribe first", [[{ text: "✅ Check", callbackData: "subscription:check" }]])
    await client.sendMessage(42, "Welcome")

    expect(http.bodyOf(0)).toEqual({
      chat_id: 42,
      text: "Subscribe first",
      reply_markup: { inline_keyboard: [[{ text: "✅ Check", callback_data: "subscription:check" }]] },
    })
    expect(http.bodyOf(1)).toEqual({ chat_id: 42, text: "Welcome" })
  })

  it("accepts both result shapes of an edit", async () => {
    const { client } = setup(apiOk(true), apiOk({ message_id: 7 }))

    await expect(client.patchButton("@gate", 7, { text: "Get it", url: "https://t.me/bot" })).resolves.toBeUndefined()
    await expect(client.editMessageText(42, 7, "Updated")).resolves.toBeUndefined()
  })

  it("registers the webhook for messages and callbacks", async () => {
    const { http, client } = setup(apiOk(true))

    await client.setWebhook("https://magnet.test/telegram/webhook", "test-secret")

    expect(http.bodyOf(0)).toEqual({
      url: "https://magnet.test/telegram/webhook",
      allowed_updates: ["message", "callback_query"],
      drop_pending_updates: true,
      secret_token: "test-secret",
    })
  })

  it("reads the bot identity and chat info", async () => {
    const { client } = setup(
      apiOk({ id: 9, is_bot: true, username: "magnet_test_bot", first_name: "Magnet" }),
      apiOk({ id: -1001, type: "channel", title: "Gate", username: "gate" }),
    )

    expect(await client.getMe()).toEqual({ id: 9, username: "magnet_test_bot" })
    expect(await client.getChat("@gate")).toMatchObject({ id: -1001, type: "channel", title: "Gate" })
  })
})

describe("TelegramBotClient errors", () => {
  it("classifies an inaccessible member list", async () => {
    const { client } = setup(apiError(400, "Bad Request: member list is inaccessible"))

    const err = await platformErrorOf(client.getMembershipStatus("@gate", 42))

    expect(err.kind).toBe("member_list_inaccessible")
    expect(err.method).toBe("getChatMember")
    expect(err.code).toBe(400)
    expect(err.message).toBe("[telegram] getChatMember member_list_inaccessible: Bad Request: member list is inaccessible")
  })

  it("carries retry_after on rate limits", async () => {
    const { client } = setup(apiError(429, "Too Many Requests: retry after 5", 5))

    const err = await platformErrorOf(client.sendMessage(42, "hi"))

    expect(err.kind).toBe("rate_limited")
    expect(err.retryAfterSeconds).toBe(5)
  })

  it("maps a transport timeout to the timeout kind", async () => {
    const { client } = setup(new HttpTimeoutError("https://api.test", 10_000))
    expect((await platformErrorOf(client.getMe())).kind).toBe("timeout")
  })

  it("maps other transport failures to the network kind", async () => {
    const { client } = setup(new TypeError("fetch failed"))
    expect((await platformErrorOf(client.getMe())).kind).toBe("network")
  })

  it("rejects a non-JSON body", async () => {
    const { client } = setup({ status: 502, body: "<html>Bad Gateway</html>" })

    const err = await platformErrorOf(client.getMe())

    expect(err.kind).toBe("unknown")
    expect(err.code).toBe(502)
  })

  it("rejects a result of the wrong shape", async () => {
    const { client } = setup(apiOk({ status: "owner" }))

    const err = await platformErrorOf(client.getMembershipStatus("@gate", 42))

    expect(err.kind).toBe("unknown")
    expect(err.message).toBe("[telegram] getChatMember unknown: unexpected result shape")
  })
})

describe("classifyApiError", () => {
  it.each([
    [400, "Bad Request: member list is inaccessible", "member_list_inaccessible"],
    [400, "Bad Request: chat not found", "chat_not_found"],
    [400, "Bad Request: message is not modified: specified new message content is the same", "message_not_modified"],
    [403, "Forbidden: bot was blocked by the user", "bot_blocked"],
    [403, "Forbidden: user is deactivated", "bot_blocked"],
    [400, "Bad Request: not enough rights to send text messages to the chat", "not_enough_rights"],
    [403, "Forbidden: bot is not a member of the channel chat", "not_enough_rights"],
    [403, "Forbidden: something new", "not_enough_rights"],
    [400, "Bad Request: message text is empty", "bad_request"],
    [429, "Too Many Requests: retry after 3", "rate_limited"],
    [500, "Internal Server Error", "unknown"],
  ])("(%i, %j) → %s", (code, description, kind) => {
    expect(classifyApiError(code, description)).toBe(kind)
  })
})

describe("describeForAdmin", () => {
  it("explains a missing admin right in plain words", () => {
    const err = new PlatformError("member_list_inaccessible", "getChatMember", "Bad Request: member list is inaccessible")
    expect(describeForAdmin(err)).toBe("bot is not an admin of the channel")
  })

  it("hides unexpected errors", () => {
    expect(describeForAdmin(new Error("secret internals"))).toBe("unexpected error")
  })
})
