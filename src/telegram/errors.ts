// src/telegram/errors.ts — Typed Bot API error kinds
//
// The Bot API reports failures as (error_code, description). They are
// classified once here; callers branch on `kind`, never on message text.

export const PlatformErrorKind = {
  MEMBER_LIST_INACCESSIBLE: "member_list_inaccessible",
  CHAT_NOT_FOUND: "chat_not_found",
  NOT_ENOUGH_RIGHTS: "not_enough_rights",
  BOT_BLOCKED: "bot_blocked",
  MESSAGE_NOT_MODIFIED: "message_not_modified",
  RATE_LIMITED: "rate_limited",
  TIMEOUT: "timeout",
  NETWORK: "network",
  BAD_REQUEST: "bad_request",
  UNKNOWN: "unknown",
} as const

export type PlatformErrorKind = (typeof PlatformErrorKind)[keyof typeof PlatformErrorKind]

export class PlatformError extends Error {
  readonly name = "PlatformError"
  readonly kind: PlatformErrorKind
  readonly method: string
  readonly code?: number
  readonly retryAfterSeconds?: number

  constructor(
    kind: PlatformErrorKind,
    method: string,
    message: string,
    details: { code?: number; retryAfterSeconds?: number } = {},
  ) {
    super(`[telegram] ${method} ${kind}: ${message}`)
    this.kind = kind
    this.method = method
    this.code = details.code
    this.retryAfterSeconds = details.retryAfterSeconds
  }
}

export function isPlatformError(err: unknown, kind?: PlatformErrorKind): err is PlatformError {
  return err instanceof PlatformError && (kind === undefined || err.kind === kind)
}

const DESCRIPTION_RULES: Array<[RegExp, PlatformErrorKind]> = [
  [/member list is inaccessible/i, PlatformErrorKind.MEMBER_LIST_INACCESSIBLE],
  [/chat not found/i, PlatformErrorKind.CHAT_NOT_FOUND],
  [/message is not modified/i, PlatformErrorKind.MESSAGE_NOT_MODIFIED],
  [/bot was blocked|user is deactivated/i, PlatformErrorKind.BOT_BLOCKED],
  [/not enough rights|need administrator rights|chat_admin_required|bot is not a member/i, PlatformErrorKind.NOT_ENOUGH_RIGHTS],
]

export function classifyApiError(errorCode: number, description: string): PlatformErrorKind {
  if (errorCode === 429) return PlatformErrorKind.RATE_LIMITED

  for (const [pattern, kind] of DESCRIPTION_RULES) {
    if (pattern.test(description)) return kind
  }

  if (errorCode === 403) return PlatformErrorKind.NOT_ENOUGH_RIGHTS
  if (errorCode === 400) return PlatformErrorKind.BAD_REQUEST
  return PlatformErrorKind.UNKNOWN
}

const ADMIN_DIAGNOSTICS: Record<PlatformErrorKind, string> = {
  member_list_inaccessible: "bot is not an admin of the channel",
  chat_not_found: "channel not found: check the username and that the bot was added to it",
  not_enough_rights: "bot is not an admin of the channel or lacks the right to post",
  bot_blocked: "bot was blocked by the recipient",
  message_not_modified: "message already up to date",
  rate_limited: "Telegram rate limit hit, retry later",
  timeout: "Telegram did not answer in time, retry later",
  network: "could not reach Telegram, retry later",
  bad_request: "Telegram rejected the request",
  unknown: "unexpected Telegram error",
}

/** Admin-facing explanation of a failed platform call. */
export function describeForAdmin(err: unknown): string {
  if (err instanceof PlatformError) return ADMIN_DIAGNOSTICS[err.kind]
  return "unexpected error"
}
