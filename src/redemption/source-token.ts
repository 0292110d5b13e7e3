// src/redemption/source-token.ts — Deep-link source token parsing
//
// Recognized shapes:
//   channel_button_<digits>  → button-scoped, carries the post message id
//   channel_button           → bare, no post id
// Anything else (absent included) carries no button context.

export const BUTTON_TOKEN_PREFIX = "channel_button"

const POST_TOKEN_PATTERN = /^channel_button_(\d+)$/

export type SourceTokenRef =
  | { kind: "none" }
  | { kind: "bare" }
  | { kind: "post"; postId: number }

export function parseSourceToken(token: string | undefined): SourceTokenRef {
  if (token === undefined) return { kind: "none" }
  if (token === BUTTON_TOKEN_PREFIX) return { kind: "bare" }

  const match = POST_TOKEN_PATTERN.exec(token)
  if (!match) return { kind: "none" }

  const postId = Number(match[1])
  if (!Number.isSafeInteger(postId)) return { kind: "none" }

  return { kind: "post", postId }
}

/** Inverse of parseSourceToken for the two recognized shapes. */
export function buildSourceToken(postId?: number): string {
  return postId === undefined ? BUTTON_TOKEN_PREFIX : `${BUTTON_TOKEN_PREFIX}_${postId}`
}
