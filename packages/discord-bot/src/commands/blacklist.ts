/**
 * @description: Toggles whether commands can be used in a channel.
 * @scope: commands
 * @module: BlacklistCommand
 * @risk: moderate - Blacklisting the wrong channel silences the bot there.
 */

import { defineCommand } from './BaseCommand.js';
import type { CommandDescriptor } from './BaseCommand.js';
import { restrictedHook } from '../hooks/restricted.js';
import type { GuildSettingsStore } from '../state/GuildSettingsStore.js';

/**
 * Reads a channel reference from a text argument: `<#id>` or a bare id.
 */
export function parseChannelReference(value: string): string | null {
  const match = /^(?:<#(\d+)>|(\d+))$/.exec(value.trim());
  return match ? match[1] ?? match[2] ?? null : null;
}

export function createBlacklistCommand(settings: GuildSettingsStore): CommandDescriptor {
  return defineCommand({
    names: ['blacklist'],
    description: 'Disables or re-enables commands in a channel',
    examples: ['blacklist', 'blacklist #general'],
    group: 'Settings',
    args: [
      { name: 'channel', description: 'Channel to toggle (defaults to this one)', kind: 'channel', required: false }
    ],
    canBlacklist: false,
    supportsDm: false,
    hooks: [restrictedHook],
    execute: async (invoke, options) => {
      const guildId = invoke.guildId;
      const textArgs = options.args?.trim() ?? '';
      const channelId = options.getChannelId('channel')
        ?? (textArgs.length > 0 ? parseChannelReference(textArgs) : invoke.channelId);

      if (guildId === null || channelId === null) {
        await invoke.respond({ content: 'Name a channel of this server, e.g. `#general`.', ephemeral: true });
        return;
      }

      const blacklisted = !(await settings.isChannelBlacklisted(guildId, channelId));
      await settings.setChannelBlacklisted(guildId, channelId, blacklisted);
      await invoke.respond({
        content: blacklisted
          ? `Commands are now disabled in <#${channelId}>.`
          : `Commands are enabled again in <#${channelId}>.`
      });
    }
  });
}
