// src/drizzle/schema.ts — magnet database schema
// All tables live in the `magnet` schema, isolated from other services.

import { pgSchema, text, timestamp, bigint, integer, index, uniqueIndex, serial } from "drizzle-orm/pg-core"

export const magnetSchema = pgSchema("magnet")

// --- magnet_identities ---
// One row per Telegram user, created lazily on first interaction.
export const magnetIdentities = magnetSchema.table("magnet_identities", {
  id: serial("id").primaryKey(),
  platformId: bigint("platform_id", { mode: "number" }).notNull(),   // Telegram user id
  handle: text("handle"),                                            // @username without the @
  firstName: text("first_name"),
  registeredAt: timestamp("registered_at", { withTimezone: true }).notNull().defaultNow(),
  lastActivityAt: timestamp("last_activity_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  uniqueIndex("idx_identities_platform_id").on(table.platformId),
])

// --- magnet_button_definitions ---
// Reward-granting buttons attached to channel posts.
// link_patched_at is set by the single post-publish link patch.
export const magnetButtonDefinitions = magnetSchema.table("magnet_button_definitions", {
  id: serial("id").primaryKey(),
  channelId: text("channel_id").notNull(),                           // @username or numeric chat id
  postMessageId: bigint("post_message_id", { mode: "number" }).notNull(),
  postTitle: text("post_title").notNull(),
  buttonText: text("button_text").notNull(),
  rewardKind: text("reward_kind").notNull(),                         // bot-access | external-link
  link: text("link").notNull(),
  linkPatchedAt: timestamp("link_patched_at", { withTimezone: true }),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  createdBy: bigint("created_by", { mode: "number" }).notNull(),     // admin Telegram id
}, (table) => [
  uniqueIndex("idx_button_definitions_channel_post").on(table.channelId, table.postMessageId),
  index("idx_button_definitions_post").on(table.postMessageId),
  index("idx_button_definitions_created").on(table.createdAt),
])

// --- magnet_redemption_events ---
// Append-only click ledger. button_id is best-effort (null for unknown/legacy links).
export const magnetRedemptionEvents = magnetSchema.table("magnet_redemption_events", {
  id: serial("id").primaryKey(),
  identityId: integer("identity_id").notNull().references(() => magnetIdentities.id),
  platformId: bigint("platform_id", { mode: "number" }).notNull(),   // denormalized Telegram id
  buttonId: integer("button_id").references(() => magnetButtonDefinitions.id),
  clickedAt: timestamp("clicked_at", { withTimezone: true }).notNull().defaultNow(),
  sourceToken: text("source_token"),                                 // raw deep-link parameter
  postId: bigint("post_id", { mode: "number" }),                     // post id from the deep link
}, (table) => [
  index("idx_redemption_events_button").on(table.buttonId),
  index("idx_redemption_events_platform").on(table.platformId),
  index("idx_redemption_events_post").on(table.postId),
  index("idx_redemption_events_clicked").on(table.clickedAt),
])

// --- magnet_settings ---
// Process-wide key/value settings (subscription_channel).
export const magnetSettings = magnetSchema.table("magnet_settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedBy: bigint("updated_by", { mode: "number" }).notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
})
