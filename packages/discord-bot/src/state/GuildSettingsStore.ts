/**
 * @description: Per-guild settings used by text ingest and hooks (custom prefix, channel blacklist).
 * @scope: state
 * @module: GuildSettingsStore
 * @risk: low - Lost settings fall back to the default prefix and an empty blacklist.
 */

/**
 * Storage contract for guild settings. Async so a persistent backend can slot in.
 */
export interface GuildSettingsStore {
  getPrefix(guildId: string): Promise<string | null>;
  /** A null prefix restores the default */
  setPrefix(guildId: string, prefix: string | null): Promise<void>;
  isChannelBlacklisted(guildId: string, channelId: string): Promise<boolean>;
  setChannelBlacklisted(guildId: string, channelId: string, blacklisted: boolean): Promise<void>;
  listBlacklistedChannels(guildId: string): Promise<string[]>;
}

interface GuildSettings {
  prefix: string | null;
  blacklistedChannels: Set<string>;
}

/**
 * Process-local store. Settings are lost on restart.
 * @class InMemoryGuildSettingsStore
 */
export class InMemoryGuildSettingsStore implements GuildSettingsStore {
  private readonly guilds = new Map<string, GuildSettings>();

  async getPrefix(guildId: string): Promise<string | null> {
    return this.guilds.get(guildId)?.prefix ?? null;
  }

  async setPrefix(guildId: string, prefix: string | null): Promise<void> {
    this.settingsFor(guildId).prefix = prefix;
  }

  async isChannelBlacklisted(guildId: string, channelId: string): Promise<boolean> {
    return this.guilds.get(guildId)?.blacklistedChannels.has(channelId) ?? false;
  }

  async setChannelBlacklisted(guildId: string, channelId: string, blacklisted: boolean): Promise<void> {
    const channels = this.settingsFor(guildId).blacklistedChannels;
    if (blacklisted) {
      channels.add(channelId);
    } else {
      channels.delete(channelId);
    }
  }

  async listBlacklistedChannels(guildId: string): Promise<string[]> {
    return [...(this.guilds.get(guildId)?.blacklistedChannels ?? [])];
  }

  private settingsFor(guildId: string): GuildSettings {
    let settings = this.guilds.get(guildId);
    if (!settings) {
      settings = { prefix: null, blacklistedChannels: new Set() };
      this.guilds.set(guildId, settings);
    }
    return settings;
  }
}
