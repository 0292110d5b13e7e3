// src/publishing/publisher.ts — Two-phase post publisher
//
// publish post → register button → (bot-access) patch link with the real
// message id and re-render the button. The bot-access link embeds the post's
// message id, which is only known after the post is live.

import type { ButtonRegistry } from "../redemption/button-registry.js"
import type { RedemptionLogger } from "../redemption/logger.js"
import { RewardKind, type ButtonDefinition } from "../redemption/types.js"
import { describeForAdmin } from "../telegram/errors.js"
import type { MessagingPlatformClient } from "../telegram/types.js"
import { buildBotLink, isHttpUrl } from "./links.js"

export const POST_TITLE_MAX_LENGTH = 100

export interface PublishRequest {
  channel: string
  text: string
  photoFileId?: string
  buttonText: string
  rewardKind: RewardKind
  /** Destination for external-link rewards; ignored for bot-access */
  link?: string
  adminId: number
}

export type PublishStage = "validate" | "channel" | "publish" | "register" | "patch_link"

export type PublishResult =
  | { status: "published"; button: ButtonDefinition; warnings: string[] }
  | { status: "failed"; stage: PublishStage; reason: string; messageId?: number }

/** Post title shown in statistics: leading text, or a message-id label. */
export function derivePostTitle(text: string, messageId: number): string {
  const trimmed = text.trim()
  if (trimmed === "") return `Post ${messageId}`
  if (trimmed.length <= POST_TITLE_MAX_LENGTH) return trimmed
  return `${trimmed.slice(0, POST_TITLE_MAX_LENGTH)}...`
}

export class PostPublisher {
  constructor(
    private readonly client: MessagingPlatformClient,
    private readonly registry: ButtonRegistry,
    private readonly botUsername: string,
    private readonly logger: RedemptionLogger,
  ) {}

  async publish(request: PublishRequest): Promise<PublishResult> {
    const buttonText = request.buttonText.trim()
    if (buttonText === "") {
      return this.fail(request, "validate", "button text must not be empty")
    }

    let link: string
    if (request.rewardKind === RewardKind.EXTERNAL_LINK) {
      const target = request.link?.trim() ?? ""
      if (!isHttpUrl(target)) {
        return this.fail(request, "validate", "link must start with http:// or https://")
      }
      link = target
    } else {
      link = buildBotLink(this.botUsername)
    }

    try {
      const chat = await this.client.getChat(request.channel)
      if (chat.type !== "channel" && chat.type !== "supergroup") {
        return this.fail(request, "channel", `chat ${request.channel} is a ${chat.type}, not a channel`)
      }
    } catch (err) {
      return this.fail(request, "channel", describeForAdmin(err), err)
    }

    const text = request.text.trim() === "" ? `🔘 ${buttonText}` : request.text
    let messageId: number
    try {
      messageId = await this.client.publishPost(
        request.channel,
        { text, ...(request.photoFileId ? { photoFileId: request.photoFileId } : {}) },
        { text: buttonText, url: link },
      )
    } catch (err) {
      return this.fail(request, "publish", describeForAdmin(err), err)
    }

    let button: ButtonDefinition
    try {
      button = await this.registry.create({
        channelId: request.channel,
        postMessageId: messageId,
        postTitle: derivePostTitle(request.text, messageId),
        buttonText,
        rewardKind: request.rewardKind,
        link,
        createdBy: request.adminId,
      })
    } catch (err) {
      return this.fail(request, "register", "post was published but its button could not be saved", err, messageId)
    }

    const warnings: string[] = []
    if (request.rewardKind === RewardKind.BOT_ACCESS) {
      const finalLink = buildBotLink(this.botUsername, messageId)
      try {
        button = await this.registry.patchLink(button.id, finalLink)
      } catch (err) {
        return this.fail(request, "patch_link", "post was published but its button link could not be finalized", err, messageId)
      }

      try {
        await this.client.patchButton(request.channel, messageId, { text: buttonText, url: finalLink })
      } catch (err) {
        warnings.push(`button on the post still points to the generic link: ${describeForAdmin(err)}`)
        this.logger.warn("publish", request.adminId, {
          stage: "patch_button",
          message_id: messageId,
          error: err instanceof Error ? err.message : String(err),
        })
      }
    }

    this.logger.log("publish", request.adminId, {
      channel: request.channel,
      message_id: messageId,
      button_id: button.id,
      reward_kind: button.rewardKind,
      warnings: warnings.length,
    })
    return { status: "published", button, warnings }
  }

  private fail(
    request: PublishRequest,
    stage: PublishStage,
    reason: string,
    err?: unknown,
    messageId?: number,
  ): PublishResult {
    const metadata = { stage, channel: request.channel, ...(messageId !== undefined ? { message_id: messageId } : {}) }
    if (err !== undefined) {
      this.logger.logError("publish", request.adminId, err, metadata)
    } else {
      this.logger.warn("publish", request.adminId, { ...metadata, reason })
    }
    return { status: "failed", stage, reason, ...(messageId !== undefined ? { messageId } : {}) }
  }
}
