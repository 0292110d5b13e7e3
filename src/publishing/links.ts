// src/publishing/links.ts — Deep links into the bot

import { buildSourceToken } from "../redemption/source-token.js"

/** `https://t.me/<bot>?start=channel_button[_<postId>]` */
export function buildBotLink(botUsername: string, postId?: number): string {
  const username = botUsername.replace(/^@/, "")
  return `https://t.me/${username}?start=${buildSourceToken(postId)}`
}

export function isHttpUrl(value: string): boolean {
  return value.startsWith("http://") || value.startsWith("https://")
}
