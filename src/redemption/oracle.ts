// src/redemption/oracle.ts — Subscription Oracle
//
// "Is identity X a member of channel Y". Fails closed: every platform error
// answers false, so an indeterminate check never releases a reward.

import { isPlatformError, PlatformErrorKind } from "../telegram/errors.js"
import type { ChatMemberStatus, MessagingPlatformClient } from "../telegram/types.js"
import type { RedemptionLogger } from "./logger.js"
import type { SubscriptionChannelSetting } from "./settings.js"

const SUBSCRIBED_STATUSES: ReadonlySet<ChatMemberStatus> = new Set(["creator", "administrator", "member"])

export function isSubscribedStatus(status: ChatMemberStatus): boolean {
  return SUBSCRIBED_STATUSES.has(status)
}

export interface SubscriptionCheck {
  subscribed: boolean
  /** Channel the check ran against */
  channel: string
}

export class SubscriptionOracle {
  constructor(
    private readonly client: Pick<MessagingPlatformClient, "getMembershipStatus">,
    private readonly channelSetting: SubscriptionChannelSetting,
    private readonly logger: RedemptionLogger,
  ) {}

  /** Never rejects. */
  async isSubscribed(platformId: number, channel?: string): Promise<boolean> {
    const result = await this.check(platformId, channel)
    return result.subscribed
  }

  /** Like isSubscribed, also reporting the gate channel that was resolved. */
  async check(platformId: number, channel?: string): Promise<SubscriptionCheck> {
    const gate = channel ?? (await this.channelSetting.resolve()).channel
    const start = Date.now()

    try {
      const status = await this.client.getMembershipStatus(gate, platformId)
      const subscribed = isSubscribedStatus(status)
      this.logger.log("subscription_check", platformId, { channel: gate, status, subscribed }, Date.now() - start)
      return { subscribed, channel: gate }
    } catch (err) {
      if (isPlatformError(err, PlatformErrorKind.MEMBER_LIST_INACCESSIBLE)) {
        this.logger.warn("subscription_check", platformId, {
          channel: gate,
          error_kind: err.kind,
          hint: "bot lacks admin rights on the gate channel",
        })
      } else {
        this.logger.logError("subscription_check", platformId, err, {
          channel: gate,
          ...(isPlatformError(err) ? { error_kind: err.kind } : {}),
        })
      }
      return { subscribed: false, channel: gate }
    }
  }
}
