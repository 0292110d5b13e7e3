// src/telegram/types.ts — Telegram Bot API subset: schemas and client ports
//
// Only the fields this service reads are declared; TypeBox objects accept
// additional properties, so full Bot API payloads validate.

import { Type, type Static } from "@sinclair/typebox"

// ---------------------------------------------------------------------------
// Inbound update (webhook)
// ---------------------------------------------------------------------------

export const TelegramUserSchema = Type.Object({
  id: Type.Integer(),
  is_bot: Type.Optional(Type.Boolean()),
  username: Type.Optional(Type.String()),
  first_name: Type.Optional(Type.String()),
})

export const TelegramChatSchema = Type.Object({
  id: Type.Integer(),
  type: Type.String(),
  title: Type.Optional(Type.String()),
  username: Type.Optional(Type.String()),
})

export const TelegramMessageSchema = Type.Object({
  message_id: Type.Integer(),
  from: Type.Optional(TelegramUserSchema),
  chat: TelegramChatSchema,
  text: Type.Optional(Type.String()),
})

export const TelegramCallbackQuerySchema = Type.Object({
  id: Type.String(),
  from: TelegramUserSchema,
  data: Type.Optional(Type.String()),
  message: Type.Optional(Type.Object({
    message_id: Type.Integer(),
    chat: TelegramChatSchema,
  })),
})

export const TelegramUpdateSchema = Type.Object({
  update_id: Type.Integer(),
  message: Type.Optional(TelegramMessageSchema),
  callback_query: Type.Optional(TelegramCallbackQuerySchema),
})

export type TelegramUser = Static<typeof TelegramUserSchema>
export type TelegramMessage = Static<typeof TelegramMessageSchema>
export type TelegramCallbackQuery = Static<typeof TelegramCallbackQuerySchema>
export type TelegramUpdate = Static<typeof TelegramUpdateSchema>

// ---------------------------------------------------------------------------
// Bot API results
// ---------------------------------------------------------------------------

export const ChatMemberStatusSchema = Type.Union([
  Type.Literal("creator"),
  Type.Literal("administrator"),
  Type.Literal("member"),
  Type.Literal("restricted"),
  Type.Literal("left"),
  Type.Literal("kicked"),
])

export type ChatMemberStatus = Static<typeof ChatMemberStatusSchema>

export const ChatTypeSchema = Type.Union([
  Type.Literal("private"),
  Type.Literal("group"),
  Type.Literal("supergroup"),
  Type.Literal("channel"),
])

export interface ChatInfo {
  id: number
  type: Static<typeof ChatTypeSchema>
  title?: string
  username?: string
}

export interface BotIdentity {
  id: number
  username: string
}

// ---------------------------------------------------------------------------
// Keyboards and content
// ---------------------------------------------------------------------------

export interface UrlButton {
  text: string
  url: string
}

export interface CallbackButton {
  text: string
  callbackData: string
}

export type InlineButton = UrlButton | CallbackButton
export type InlineKeyboard = InlineButton[][]

export interface PostContent {
  text: string
  /** Telegram file_id of a photo; text becomes its caption */
  photoFileId?: string
}

// ---------------------------------------------------------------------------
// Client ports
// ---------------------------------------------------------------------------

/** Calls the redemption core and publisher depend on */
export interface MessagingPlatformClient {
  getMembershipStatus(channel: string, userId: number): Promise<ChatMemberStatus>
  /** @returns message id of the published post */
  publishPost(channel: string, content: PostContent, button: UrlButton): Promise<number>
  patchButton(channel: string, messageId: number, button: UrlButton): Promise<void>
  getChat(chatId: string): Promise<ChatInfo>
}

/** Full client surface used by the gateway and boot */
export interface BotApiClient extends MessagingPlatformClient {
  getMe(): Promise<BotIdentity>
  sendMessage(chatId: number, text: string, keyboard?: InlineKeyboard): Promise<number>
  editMessageText(chatId: number, messageId: number, text: string, keyboard?: InlineKeyboard): Promise<void>
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>
  setWebhook(url: string, secretToken?: string): Promise<void>
}
