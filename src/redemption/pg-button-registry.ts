// src/redemption/pg-button-registry.ts — Postgres-backed ButtonRegistry
//
// The post-publish link patch is a conditional UPDATE … WHERE link_patched_at IS NULL,
// so a second patch can never overwrite the first.

import { and, desc, eq, isNull } from "drizzle-orm"
import type { Db } from "../drizzle/db.js"
import { magnetButtonDefinitions } from "../drizzle/schema.js"
import { DEFAULT_LIST_LIMIT, type ButtonRegistry } from "./button-registry.js"
import {
  type ButtonDefinition,
  type NewButtonDefinition,
  type RewardKind,
  RegistryError,
  isRewardKind,
} from "./types.js"

type ButtonRow = typeof magnetButtonDefinitions.$inferSelect

/** Rows written before the kind rename store "bot" / "external". */
const LEGACY_KINDS: ReadonlyMap<string, RewardKind> = new Map<string, RewardKind>([
  ["bot", "bot-access"],
  ["external", "external-link"],
])

export function toRewardKind(raw: string): RewardKind {
  if (isRewardKind(raw)) return raw
  const legacy = LEGACY_KINDS.get(raw)
  if (legacy) return legacy
  throw new Error(`Unknown reward kind in button definition: "${raw}"`)
}

function toDefinition(row: ButtonRow): ButtonDefinition {
  return {
    id: row.id,
    channelId: row.channelId,
    postMessageId: row.postMessageId,
    postTitle: row.postTitle,
    buttonText: row.buttonText,
    rewardKind: toRewardKind(row.rewardKind),
    link: row.link,
    createdAt: row.createdAt,
    createdBy: row.createdBy,
  }
}

export class PgButtonRegistry implements ButtonRegistry {
  constructor(private readonly db: Db) {}

  async create(definition: NewButtonDefinition): Promise<ButtonDefinition> {
    const rows = await this.db
      .insert(magnetButtonDefinitions)
      .values(definition)
      .returning()

    const row = rows[0]
    if (!row) throw new Error(`Button insert returned no row for ${definition.channelId}/${definition.postMessageId}`)
    return toDefinition(row)
  }

  async findByPost(postMessageId: number, channelId?: string): Promise<ButtonDefinition | null> {
    const t = magnetButtonDefinitions
    const condition = channelId === undefined
      ? eq(t.postMessageId, postMessageId)
      : and(eq(t.postMessageId, postMessageId), eq(t.channelId, channelId))

    const rows = await this.db
      .select()
      .from(t)
      .where(condition)
      .orderBy(desc(t.createdAt), desc(t.id))
      .limit(1)

    return rows.length === 0 ? null : toDefinition(rows[0])
  }

  async findById(id: number): Promise<ButtonDefinition | null> {
    const rows = await this.db
      .select()
      .from(magnetButtonDefinitions)
      .where(eq(magnetButtonDefinitions.id, id))

    return rows.length === 0 ? null : toDefinition(rows[0])
  }

  async listRecent(limit = DEFAULT_LIST_LIMIT): Promise<ButtonDefinition[]> {
    const rows = await this.db
      .select()
      .from(magnetButtonDefinitions)
      .orderBy(desc(magnetButtonDefinitions.createdAt), desc(magnetButtonDefinitions.id))
      .limit(limit)

    return rows.map(toDefinition)
  }

  async patchLink(id: number, link: string): Promise<ButtonDefinition> {
    const t = magnetButtonDefinitions
    const rows = await this.db
      .update(t)
      .set({ link, linkPatchedAt: new Date() })
      .where(and(eq(t.id, id), isNull(t.linkPatchedAt)))
      .returning()

    if (rows.length > 0) return toDefinition(rows[0])

    // 0 rows: either unknown id or already patched
    const existing = await this.findById(id)
    if (!existing) {
      throw new RegistryError("BUTTON_NOT_FOUND", `No button definition with id ${id}`)
    }
    throw new RegistryError("LINK_ALREADY_PATCHED", `Link of button ${id} was already patched`)
  }
}
