// src/redemption/button-registry.ts — Button Registry port + in-memory implementation
//
// Definitions are immutable once created, except for a single link patch
// right after publish (the bot-access link embeds the real message id).

import {
  type ButtonDefinition,
  type NewButtonDefinition,
  RegistryError,
} from "./types.js"
import { SystemTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export interface ButtonRegistry {
  create(definition: NewButtonDefinition): Promise<ButtonDefinition>
  /**
   * Lookup by post message id. Without a channel, the most recent definition
   * carrying that message id in any channel.
   */
  findByPost(postMessageId: number, channelId?: string): Promise<ButtonDefinition | null>
  findById(id: number): Promise<ButtonDefinition | null>
  /** Newest first */
  listRecent(limit?: number): Promise<ButtonDefinition[]>
  /**
   * Replace the placeholder link. Succeeds once per definition.
   * @throws RegistryError BUTTON_NOT_FOUND | LINK_ALREADY_PATCHED
   */
  patchLink(id: number, link: string): Promise<ButtonDefinition>
}

export const DEFAULT_LIST_LIMIT = 50

interface StoredDefinition {
  definition: ButtonDefinition
  linkPatched: boolean
}

export class InMemoryButtonRegistry implements ButtonRegistry {
  private readonly rows: StoredDefinition[] = []
  private nextId = 1

  constructor(private readonly time: TimeProvider = new SystemTimeProvider()) {}

  async create(definition: NewButtonDefinition): Promise<ButtonDefinition> {
    const duplicate = this.rows.find(
      (r) => r.definition.channelId === definition.channelId
        && r.definition.postMessageId === definition.postMessageId,
    )
    if (duplicate) {
      throw new Error(
        `Button already registered for ${definition.channelId}/${definition.postMessageId}`,
      )
    }

    const created: ButtonDefinition = {
      ...definition,
      id: this.nextId++,
      createdAt: new Date(this.time.now()),
    }
    this.rows.push({ definition: created, linkPatched: false })
    return { ...created }
  }

  async findByPost(postMessageId: number, channelId?: string): Promise<ButtonDefinition | null> {
    for (let i = this.rows.length - 1; i >= 0; i--) {
      const { definition } = this.rows[i]
      if (definition.postMessageId !== postMessageId) continue
      if (channelId !== undefined && definition.channelId !== channelId) continue
      return { ...definition }
    }
    return null
  }

  async findById(id: number): Promise<ButtonDefinition | null> {
    const row = this.rows.find((r) => r.definition.id === id)
    return row ? { ...row.definition } : null
  }

  async listRecent(limit = DEFAULT_LIST_LIMIT): Promise<ButtonDefinition[]> {
    return this.rows
      .slice()
      .reverse()
      .slice(0, limit)
      .map((r) => ({ ...r.definition }))
  }

  async patchLink(id: number, link: string): Promise<ButtonDefinition> {
    const row = this.rows.find((r) => r.definition.id === id)
    if (!row) {
      throw new RegistryError("BUTTON_NOT_FOUND", `No button definition with id ${id}`)
    }
    if (row.linkPatched) {
      throw new RegistryError("LINK_ALREADY_PATCHED", `Link of button ${id} was already patched`)
    }
    row.definition = { ...row.definition, link }
    row.linkPatched = true
    return { ...row.definition }
  }
}
