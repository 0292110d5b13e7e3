// src/redemption/types.ts — Redemption domain types
//
// Identity, ButtonDefinition, RedemptionEvent, session context and the
// outcomes the coordinator hands to the presentation layer.

// ---------------------------------------------------------------------------
// Reward Kind
// ---------------------------------------------------------------------------

export const RewardKind = {
  BOT_ACCESS: "bot-access",
  EXTERNAL_LINK: "external-link",
} as const

export type RewardKind = (typeof RewardKind)[keyof typeof RewardKind]

export function isRewardKind(value: unknown): value is RewardKind {
  return value === RewardKind.BOT_ACCESS || value === RewardKind.EXTERNAL_LINK
}

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

export interface Identity {
  id: number
  /** Telegram user id — unique, immutable */
  platformId: number
  handle: string | null
  firstName: string | null
  registeredAt: Date
  lastActivityAt: Date
}

export interface IdentityProfile {
  platformId: number
  handle?: string
  firstName?: string
}

// ---------------------------------------------------------------------------
// Button Definition
// ---------------------------------------------------------------------------

export interface ButtonDefinition {
  id: number
  channelId: string
  postMessageId: number
  postTitle: string
  buttonText: string
  rewardKind: RewardKind
  link: string
  createdAt: Date
  createdBy: number
}

export type NewButtonDefinition = Omit<ButtonDefinition, "id" | "createdAt">

// ---------------------------------------------------------------------------
// Redemption Event (append-only)
// ---------------------------------------------------------------------------

export interface RedemptionEvent {
  id: number
  identityId: number
  platformId: number
  buttonId: number | null
  clickedAt: Date
  sourceToken: string | null
  postId: number | null
}

export type NewRedemptionEvent = Omit<RedemptionEvent, "id" | "clickedAt">

export interface ButtonClickStats {
  buttonId: number
  clicks: number
  uniqueIdentities: number
}

// ---------------------------------------------------------------------------
// Entry events and session context
// ---------------------------------------------------------------------------

export interface EntryEvent {
  platformId: number
  handle?: string
  firstName?: string
  /** Raw deep-link parameter, if any */
  sourceToken?: string
}

/**
 * Per-identity staged reward, owned by the caller between the entry event
 * and the subscription re-check. Both fields are set or both are null.
 */
export interface SessionContext {
  stagedLink: string | null
  stagedKind: RewardKind | null
}

export const EMPTY_SESSION: SessionContext = Object.freeze({
  stagedLink: null,
  stagedKind: null,
})

export function stagedReward(session: SessionContext): { link: string; kind: RewardKind } | null {
  if (session.stagedLink === null || session.stagedKind === null) return null
  return { link: session.stagedLink, kind: session.stagedKind }
}

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export type RedemptionOutcome =
  | { type: "plain_welcome" }
  | { type: "subscription_required"; channel: string }
  | { type: "reward_granted"; link: string; kind: RewardKind }
  | { type: "subscription_confirmed_no_reward" }

export interface RedemptionResult {
  outcome: RedemptionOutcome
  session: SessionContext
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type RegistryErrorCode =
  | "BUTTON_NOT_FOUND"
  | "LINK_ALREADY_PATCHED"

export class RegistryError extends Error {
  constructor(
    public readonly code: RegistryErrorCode,
    message: string,
  ) {
    super(message)
    this.name = "RegistryError"
  }
}
