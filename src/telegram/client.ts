// src/telegram/client.ts — Telegram Bot API client
//
// JSON-over-POST calls through the resilient HTTP client. Every failure
// leaves this module as a PlatformError with a classified kind.

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { HttpTimeoutError, type HttpResponse, type IHttpClient } from "../shared/http-client.js"
import { PlatformError, PlatformErrorKind, classifyApiError } from "./errors.js"
import {
  ChatMemberStatusSchema,
  ChatTypeSchema,
  type BotApiClient,
  type BotIdentity,
  type ChatInfo,
  type ChatMemberStatus,
  type InlineKeyboard,
  type PostContent,
  type UrlButton,
} from "./types.js"

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const ApiResponseSchema = Type.Object({
  ok: Type.Boolean(),
  result: Type.Optional(Type.Unknown()),
  description: Type.Optional(Type.String()),
  error_code: Type.Optional(Type.Integer()),
  parameters: Type.Optional(Type.Object({
    retry_after: Type.Optional(Type.Integer()),
  })),
})

const ChatMemberResult = Type.Object({ status: ChatMemberStatusSchema })
const MessageResult = Type.Object({ message_id: Type.Integer() })
const EditResult = Type.Union([Type.Boolean(), MessageResult])
const TrueResult = Type.Boolean()
const BotUserResult = Type.Object({ id: Type.Integer(), username: Type.String() })
const ChatResult = Type.Object({
  id: Type.Integer(),
  type: ChatTypeSchema,
  title: Type.Optional(Type.String()),
  username: Type.Optional(Type.String()),
})

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TelegramClientConfig {
  botToken: string
  apiBaseUrl: string
}

type ReplyMarkup = {
  inline_keyboard: Array<Array<{ text: string; url: string } | { text: string; callback_data: string }>>
}

export function toReplyMarkup(keyboard: InlineKeyboard): ReplyMarkup {
  return {
    inline_keyboard: keyboard.map((row) =>
      row.map((button) =>
        "url" in button
          ? { text: button.text, url: button.url }
          : { text: button.text, callback_data: button.callbackData },
      ),
    ),
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class TelegramBotClient implements BotApiClient {
  private readonly baseUrl: string

  constructor(
    private readonly config: TelegramClientConfig,
    private readonly http: IHttpClient,
  ) {
    this.baseUrl = config.apiBaseUrl.replace(/\/+$/, "")
  }

  async getMembershipStatus(channel: string, userId: number): Promise<ChatMemberStatus> {
    const member = await this.call("getChatMember", { chat_id: channel, user_id: userId }, ChatMemberResult)
    return member.status
  }

  async publishPost(channel: string, content: PostContent, button: UrlButton): Promise<number> {
    const reply_markup = toReplyMarkup([[button]])
    const message = content.photoFileId
      ? await this.call("sendPhoto", {
          chat_id: channel,
          photo: content.photoFileId,
          caption: content.text,
          reply_markup,
        }, MessageResult)
      : await this.call("sendMessage", {
          chat_id: channel,
          text: content.text,
          reply_markup,
        }, MessageResult)
    return message.message_id
  }

  async patchButton(channel: string, messageId: number, button: UrlButton): Promise<void> {
    await this.call("editMessageReplyMarkup", {
      chat_id: channel,
      message_id: messageId,
      reply_markup: toReplyMarkup([[button]]),
    }, EditResult)
  }

  async getChat(chatId: string): Promise<ChatInfo> {
    return this.call("getChat", { chat_id: chatId }, ChatResult)
  }

  async getMe(): Promise<BotIdentity> {
    const me = await this.call("getMe", {}, BotUserResult)
    return { id: me.id, username: me.username }
  }

  async sendMessage(chatId: number, text: string, keyboard?: InlineKeyboard): Promise<number> {
    const message = await this.call("sendMessage", {
      chat_id: chatId,
      text,
      ...(keyboard ? { reply_markup: toReplyMarkup(keyboard) } : {}),
    }, MessageResult)
    return message.message_id
  }

  async editMessageText(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await this.call("editMessageText", {
      chat_id: chatId,
      message_id: messageId,
      text,
      ...(keyboard ? { reply_markup: toReplyMarkup(keyboard) } : {}),
    }, EditResult)
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call("answerCallbackQuery", {
      callback_query_id: callbackQueryId,
      ...(text !== undefined ? { text } : {}),
    }, TrueResult)
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call("setWebhook", {
      url,
      allowed_updates: ["message", "callback_query"],
      drop_pending_updates: true,
      ...(secretToken ? { secret_token: secretToken } : {}),
    }, TrueResult)
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  private async call<S extends TSchema>(
    method: string,
    params: Record<string, unknown>,
    resultSchema: S,
  ): Promise<Static<S>> {
    let response: HttpResponse
    try {
      response = await this.http.request({
        url: `${this.baseUrl}/bot${this.config.botToken}/${method}`,
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(params),
      })
    } catch (err) {
      const kind = err instanceof HttpTimeoutError ? PlatformErrorKind.TIMEOUT : PlatformErrorKind.NETWORK
      throw new PlatformError(kind, method, err instanceof Error ? err.message : String(err))
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(response.body)
    } catch {
      throw new PlatformError(PlatformErrorKind.UNKNOWN, method, `non-JSON response (HTTP ${response.status})`, {
        code: response.status,
      })
    }

    if (!Value.Check(ApiResponseSchema, parsed)) {
      throw new PlatformError(PlatformErrorKind.UNKNOWN, method, `malformed response (HTTP ${response.status})`, {
        code: response.status,
      })
    }

    if (!parsed.ok) {
      const code = parsed.error_code ?? response.status
      const description = parsed.description ?? `HTTP ${response.status}`
      throw new PlatformError(classifyApiError(code, description), method, description, {
        code,
        retryAfterSeconds: parsed.parameters?.retry_after,
      })
    }

    const result: unknown = parsed.result
    if (!Value.Check(resultSchema, result)) {
      throw new PlatformError(PlatformErrorKind.UNKNOWN, method, "unexpected result shape")
    }
    return result
  }
}
