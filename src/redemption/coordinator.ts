// src/redemption/coordinator.ts — Redemption Coordinator
//
// Decides what a user sees on entry and whether a reward link is released.
//
// Per-identity state machine:
//   NEW_ENTRY → NO_BUTTON | BUTTON_NO_STAKE                 (terminal)
//   NEW_ENTRY → PENDING_SUBSCRIPTION ⇄ PENDING_SUBSCRIPTION → GRANTED
//
// The staged reward travels in and out as SessionContext; storing it between
// the two entry points is the caller's job. Identity, lookup and ledger
// failures are logged and never fail the interaction.

import type { ButtonRegistry } from "./button-registry.js"
import type { IdentityStore } from "./identity-store.js"
import type { RedemptionLedger } from "./ledger.js"
import type { RedemptionLogger } from "./logger.js"
import type { SubscriptionOracle } from "./oracle.js"
import { parseSourceToken } from "./source-token.js"
import {
  EMPTY_SESSION,
  stagedReward,
  type ButtonDefinition,
  type EntryEvent,
  type Identity,
  type RedemptionResult,
  type RewardKind,
  type SessionContext,
} from "./types.js"

export interface RedemptionCoordinatorDeps {
  identities: IdentityStore
  registry: ButtonRegistry
  ledger: RedemptionLedger
  oracle: SubscriptionOracle
  logger: RedemptionLogger
}

export class RedemptionCoordinator {
  private readonly identities: IdentityStore
  private readonly registry: ButtonRegistry
  private readonly ledger: RedemptionLedger
  private readonly oracle: SubscriptionOracle
  private readonly logger: RedemptionLogger

  constructor(deps: RedemptionCoordinatorDeps) {
    this.identities = deps.identities
    this.registry = deps.registry
    this.ledger = deps.ledger
    this.oracle = deps.oracle
    this.logger = deps.logger
  }

  async handleEntry(event: EntryEvent, session: SessionContext): Promise<RedemptionResult> {
    const start = Date.now()
    const ref = parseSourceToken(event.sourceToken)

    if (ref.kind === "none") {
      this.logger.log("entry", event.platformId, { token: "none", outcome: "plain_welcome" }, Date.now() - start)
      return { outcome: { type: "plain_welcome" }, session }
    }

    const postId = ref.kind === "post" ? ref.postId : null
    const identity = await this.resolveIdentity(event)
    const button = postId !== null ? await this.lookupButton(event.platformId, postId) : null

    if (identity) {
      await this.appendEvent(identity, event, button, postId)
    }

    if (!button) {
      this.logger.log("entry", event.platformId, {
        token: ref.kind,
        post_id: postId,
        outcome: "plain_welcome",
      }, Date.now() - start)
      return { outcome: { type: "plain_welcome" }, session }
    }

    const check = await this.oracle.check(event.platformId)
    if (check.subscribed) {
      this.logger.log("entry", event.platformId, {
        token: ref.kind,
        button_id: button.id,
        outcome: "reward_granted",
      }, Date.now() - start)
      return {
        outcome: { type: "reward_granted", link: button.link, kind: button.rewardKind },
        session: EMPTY_SESSION,
      }
    }

    this.logger.log("entry", event.platformId, {
      token: ref.kind,
      button_id: button.id,
      outcome: "subscription_required",
      channel: check.channel,
    }, Date.now() - start)
    return {
      outcome: { type: "subscription_required", channel: check.channel },
      session: stage(button.link, button.rewardKind),
    }
  }

  async recheck(platformId: number, session: SessionContext): Promise<RedemptionResult> {
    const start = Date.now()
    await this.resolveIdentity({ platformId })

    const check = await this.oracle.check(platformId)
    const reward = stagedReward(session)

    if (!check.subscribed) {
      this.logger.log("recheck", platformId, {
        staged: reward !== null,
        outcome: "subscription_required",
        channel: check.channel,
      }, Date.now() - start)
      return { outcome: { type: "subscription_required", channel: check.channel }, session }
    }

    if (!reward) {
      this.logger.log("recheck", platformId, { staged: false, outcome: "subscription_confirmed_no_reward" }, Date.now() - start)
      return { outcome: { type: "subscription_confirmed_no_reward" }, session: EMPTY_SESSION }
    }

    this.logger.log("recheck", platformId, { staged: true, outcome: "reward_granted", kind: reward.kind }, Date.now() - start)
    return {
      outcome: { type: "reward_granted", link: reward.link, kind: reward.kind },
      session: EMPTY_SESSION,
    }
  }

  // -------------------------------------------------------------------------
  // Best-effort steps
  // -------------------------------------------------------------------------

  private async resolveIdentity(event: EntryEvent): Promise<Identity | null> {
    try {
      return await this.identities.upsert({
        platformId: event.platformId,
        handle: event.handle,
        firstName: event.firstName,
      })
    } catch (err) {
      this.logger.logError("identity_upsert", event.platformId, err)
      return null
    }
  }

  private async lookupButton(platformId: number, postId: number): Promise<ButtonDefinition | null> {
    try {
      const button = await this.registry.findByPost(postId)
      if (!button) {
        this.logger.log("button_lookup", platformId, { post_id: postId, found: false })
      }
      return button
    } catch (err) {
      this.logger.logError("button_lookup", platformId, err, { post_id: postId })
      return null
    }
  }

  private async appendEvent(
    identity: Identity,
    event: EntryEvent,
    button: ButtonDefinition | null,
    postId: number | null,
  ): Promise<void> {
    try {
      await this.ledger.append({
        identityId: identity.id,
        platformId: event.platformId,
        buttonId: button?.id ?? null,
        sourceToken: event.sourceToken ?? null,
        postId,
      })
    } catch (err) {
      this.logger.logError("ledger_append", event.platformId, err, {
        button_id: button?.id ?? null,
        post_id: postId,
      })
    }
  }
}

function stage(link: string, kind: RewardKind): SessionContext {
  return { stagedLink: link, stagedKind: kind }
}
