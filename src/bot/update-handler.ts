// src/bot/update-handler.ts — Telegram update dispatch
//
// /start [token]         → RedemptionCoordinator.handleEntry
// callback subscription:check → RedemptionCoordinator.recheck
//
// The staged-reward context is loaded before and saved after each call.
// Users never see raw errors: a failed interaction gets the retry reply.

import type { RedemptionCoordinator } from "../redemption/coordinator.js"
import type { RedemptionLogger } from "../redemption/logger.js"
import type { StagedRewardStore } from "../redemption/session-store.js"
import type { SubscriptionChannelSetting } from "../redemption/settings.js"
import { EMPTY_SESSION, type SessionContext } from "../redemption/types.js"
import { isPlatformError, PlatformErrorKind } from "../telegram/errors.js"
import type {
  BotApiClient,
  TelegramCallbackQuery,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from "../telegram/types.js"
import {
  CHECK_SUBSCRIPTION_CALLBACK,
  CHECKING_TEXT,
  presentOutcome,
  retryReply,
  type Reply,
} from "./presenter.js"

// Only the first argument is the deep-link token; trailing words are ignored
const START_COMMAND = /^\/start(?:@\w+)?(?:\s+(\S+).*)?$/s

/** Deep-link parameter of a /start command, or null when the text is not one. */
export function parseStartCommand(text: string | undefined): { token?: string } | null {
  if (text === undefined) return null
  const match = START_COMMAND.exec(text.trim())
  if (!match) return null
  return match[1] !== undefined ? { token: match[1] } : {}
}

export interface UpdateHandlerDeps {
  client: BotApiClient
  coordinator: RedemptionCoordinator
  sessions: StagedRewardStore
  channelSetting: SubscriptionChannelSetting
  logger: RedemptionLogger
}

export class UpdateHandler {
  constructor(private readonly deps: UpdateHandlerDeps) {}

  async handle(update: TelegramUpdate): Promise<void> {
    if (update.message) {
      await this.onMessage(update.message)
      return
    }
    if (update.callback_query) {
      await this.onCallback(update.callback_query)
    }
  }

  // -------------------------------------------------------------------------
  // /start
  // -------------------------------------------------------------------------

  private async onMessage(message: TelegramMessage): Promise<void> {
    const user = message.from
    if (!user || user.is_bot || message.chat.type !== "private") return

    const command = parseStartCommand(message.text)
    if (!command) return

    try {
      const session = await this.loadSession(user.id)
      const result = await this.deps.coordinator.handleEntry({
        platformId: user.id,
        ...profileOf(user),
        ...(command.token !== undefined ? { sourceToken: command.token } : {}),
      }, session)
      await this.saveSession(user.id, session, result.session)
      await this.send(message.chat.id, presentOutcome(result.outcome))
    } catch (err) {
      this.deps.logger.logError("update", user.id, err, { kind: "start" })
      await this.sendRetry(message.chat.id, user.id)
    }
  }

  // -------------------------------------------------------------------------
  // Re-check callback
  // -------------------------------------------------------------------------

  private async onCallback(query: TelegramCallbackQuery): Promise<void> {
    const userId = query.from.id

    if (query.data !== CHECK_SUBSCRIPTION_CALLBACK) {
      await this.answer(query.id, userId)
      return
    }
    await this.answer(query.id, userId, CHECKING_TEXT)

    try {
      const session = await this.loadSession(userId)
      const result = await this.deps.coordinator.recheck(userId, session)
      await this.saveSession(userId, session, result.session)
      await this.respond(query, presentOutcome(result.outcome))
    } catch (err) {
      this.deps.logger.logError("update", userId, err, { kind: "recheck" })
      try {
        const { channel } = await this.deps.channelSetting.resolve()
        await this.respond(query, retryReply(channel))
      } catch (replyErr) {
        this.deps.logger.logError("update", userId, replyErr, { kind: "retry_reply" })
      }
    }
  }

  /** Edit the message carrying the button; fall back to a new message. */
  private async respond(query: TelegramCallbackQuery, reply: Reply): Promise<void> {
    if (!query.message) {
      await this.send(query.from.id, reply)
      return
    }
    try {
      await this.deps.client.editMessageText(query.message.chat.id, query.message.message_id, reply.text, reply.keyboard)
    } catch (err) {
      if (isPlatformError(err, PlatformErrorKind.MESSAGE_NOT_MODIFIED)) return
      throw err
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private async send(chatId: number, reply: Reply): Promise<void> {
    await this.deps.client.sendMessage(chatId, reply.text, reply.keyboard)
  }

  private async sendRetry(chatId: number, userId: number): Promise<void> {
    try {
      await this.send(chatId, retryReply())
    } catch (err) {
      this.deps.logger.logError("update", userId, err, { kind: "retry_reply" })
    }
  }

  private async answer(callbackQueryId: string, userId: number, text?: string): Promise<void> {
    try {
      await this.deps.client.answerCallbackQuery(callbackQueryId, text)
    } catch (err) {
      this.deps.logger.logError("update", userId, err, { kind: "answer_callback" })
    }
  }

  /** An unreadable store means no staged reward, not a failed interaction. */
  private async loadSession(platformId: number): Promise<SessionContext> {
    try {
      return await this.deps.sessions.load(platformId)
    } catch (err) {
      this.deps.logger.logError("session", platformId, err, { action: "load" })
      // Fresh object, so a later empty session still clears whatever is stored
      return { ...EMPTY_SESSION }
    }
  }

  /** Writes only a changed session; rewriting an unchanged one would restart its TTL. */
  private async saveSession(platformId: number, loaded: SessionContext, session: SessionContext): Promise<void> {
    if (session === loaded) return
    try {
      await this.deps.sessions.save(platformId, session)
    } catch (err) {
      this.deps.logger.logError("session", platformId, err, { action: "save" })
    }
  }
}

function profileOf(user: TelegramUser): { handle?: string; firstName?: string } {
  return {
    ...(user.username !== undefined ? { handle: user.username } : {}),
    ...(user.first_name !== undefined ? { firstName: user.first_name } : {}),
  }
}
