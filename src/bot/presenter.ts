// src/bot/presenter.ts — Coordinator outcomes → chat replies

import type { RedemptionOutcome } from "../redemption/types.js"
import { RewardKind } from "../redemption/types.js"
import type { InlineKeyboard } from "../telegram/types.js"

export const CHECK_SUBSCRIPTION_CALLBACK = "subscription:check"

export interface Reply {
  text: string
  keyboard?: InlineKeyboard
}

export const WELCOME_TEXT = [
  "👋 Welcome!",
  "",
  "This bot hands out lead magnets through buttons in our channel.",
  "",
  "Tap a button under a channel post to get the material.",
].join("\n")

export const RETRY_TEXT = "❌ Something went wrong while checking your subscription. Please try again later."

export const CHECKING_TEXT = "Checking your subscription..."

/** Public URL for a `@name` channel; numeric chat ids have none. */
export function channelUrl(channel: string): string | null {
  if (!channel.startsWith("@")) return null
  return `https://t.me/${channel.slice(1)}`
}

export function subscriptionKeyboard(channel: string): InlineKeyboard {
  const url = channelUrl(channel)
  const check = { text: "✅ I've subscribed", callbackData: CHECK_SUBSCRIPTION_CALLBACK }
  return url ? [[{ text: "📢 Subscribe to the channel", url }, check]] : [[check]]
}

export function presentOutcome(outcome: RedemptionOutcome): Reply {
  switch (outcome.type) {
    case "plain_welcome":
      return { text: WELCOME_TEXT }

    case "subscription_required":
      return {
        text: [
          "🔒 This material is for channel subscribers.",
          "",
          `1. 📢 Subscribe to ${outcome.channel}`,
          "2. ✅ Tap \"I've subscribed\" to check again",
        ].join("\n"),
        keyboard: subscriptionKeyboard(outcome.channel),
      }

    case "reward_granted":
      if (outcome.kind === RewardKind.EXTERNAL_LINK) {
        return {
          text: "✅ Subscription confirmed!\n\nYour link is ready. Tap the button below to open it.",
          keyboard: [[{ text: "🔗 Get access", url: outcome.link }]],
        }
      }
      // No button: the bot-access link is this bot's own /start deep link
      return { text: "✅ Subscription confirmed!\n\nBot access granted." }

    case "subscription_confirmed_no_reward":
      return { text: "✅ Subscription confirmed!\n\nThanks for subscribing." }
  }
}

export function retryReply(channel?: string): Reply {
  return channel ? { text: RETRY_TEXT, keyboard: subscriptionKeyboard(channel) } : { text: RETRY_TEXT }
}
