/**
 * @description: Global hook refusing blacklistable commands in blacklisted channels.
 * @scope: hooks
 * @module: BlacklistHook
 * @risk: low - Worst case a command runs in a channel moderators wanted quiet.
 */

import { createHook } from '../framework/hooks.js';
import type { Hook } from '../framework/hooks.js';
import type { GuildSettingsStore } from '../state/GuildSettingsStore.js';

export function createBlacklistHook(settings: GuildSettingsStore): Hook {
  return createHook('blacklist', async (invoke, _options, command) => {
    const { guildId, channelId } = invoke;
    if (!command.canBlacklist || guildId === null || channelId === null) {
      return 'continue';
    }

    if (!(await settings.isChannelBlacklisted(guildId, channelId))) {
      return 'continue';
    }

    // Text triggers get no answer: replying would post in the blacklisted channel.
    if (invoke.kind !== 'text') {
      await invoke.respond({ content: 'Commands are disabled in this channel.', ephemeral: true });
    }
    return 'halt';
  });
}
