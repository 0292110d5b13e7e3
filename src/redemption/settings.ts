// src/redemption/settings.ts — Settings store + subscription channel resolution
//
// SubscriptionChannelSetting is the `subscription_channel` key. At most one
// value is active; readers fall back to the configured static default.

import type { RedemptionLogger } from "./logger.js"

export const SUBSCRIPTION_CHANNEL_KEY = "subscription_channel"

export interface StoredSetting {
  key: string
  value: string
  updatedBy: number
  updatedAt: Date
}

export interface SettingsStore {
  get(key: string): Promise<StoredSetting | null>
  /** Insert or overwrite */
  set(key: string, value: string, updatedBy: number): Promise<StoredSetting>
}

export class InMemorySettingsStore implements SettingsStore {
  private readonly values = new Map<string, StoredSetting>()

  async get(key: string): Promise<StoredSetting | null> {
    const setting = this.values.get(key)
    return setting ? { ...setting } : null
  }

  async set(key: string, value: string, updatedBy: number): Promise<StoredSetting> {
    const setting: StoredSetting = { key, value, updatedBy, updatedAt: new Date() }
    this.values.set(key, setting)
    return { ...setting }
  }
}

export interface ActiveChannel {
  channel: string
  source: "setting" | "default"
}

/**
 * Normalize admin channel input: `name` → `@name`, `@name` kept,
 * numeric chat ids (`-100…`) kept as-is. Returns null for empty or
 * whitespace-containing input.
 */
export function normalizeChannel(input: string): string | null {
  const trimmed = input.trim()
  if (trimmed === "" || /\s/.test(trimmed)) return null
  if (/^-?\d+$/.test(trimmed)) return trimmed
  if (trimmed.startsWith("@")) return trimmed.length > 1 ? trimmed : null
  return `@${trimmed}`
}

export class SubscriptionChannelSetting {
  constructor(
    private readonly store: SettingsStore,
    private readonly defaultChannel: string,
    private readonly logger: RedemptionLogger,
  ) {}

  /** Active gate channel; a failed settings read falls back to the default. */
  async resolve(): Promise<ActiveChannel> {
    try {
      const setting = await this.store.get(SUBSCRIPTION_CHANNEL_KEY)
      if (setting) return { channel: setting.value, source: "setting" }
    } catch (err) {
      this.logger.logError("settings", 0, err, { key: SUBSCRIPTION_CHANNEL_KEY })
    }
    return { channel: this.defaultChannel, source: "default" }
  }

  async update(channel: string, adminId: number): Promise<StoredSetting> {
    const stored = await this.store.set(SUBSCRIPTION_CHANNEL_KEY, channel, adminId)
    this.logger.log("settings", adminId, { key: SUBSCRIPTION_CHANNEL_KEY, value: channel })
    return stored
  }
}
