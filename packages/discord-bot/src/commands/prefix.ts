/**
 * @description: Shows or changes the text-command prefix for a guild.
 * @scope: commands
 * @module: PrefixCommand
 * @risk: moderate - A bad prefix makes text commands unreachable until it is changed back via slash.
 */

import { defineCommand } from './BaseCommand.js';
import type { CommandDescriptor } from './BaseCommand.js';
import { restrictedHook } from '../hooks/restricted.js';
import type { GuildSettingsStore } from '../state/GuildSettingsStore.js';

export const MAX_PREFIX_LENGTH = 5;

/**
 * @returns an error message, or null when the prefix is acceptable
 */
export function validatePrefix(prefix: string): string | null {
  if (prefix.length > MAX_PREFIX_LENGTH) {
    return `A prefix can be at most ${MAX_PREFIX_LENGTH} characters long.`;
  }
  if (/\s/.test(prefix)) {
    return 'A prefix cannot contain whitespace.';
  }
  return null;
}

export function createPrefixCommand(settings: GuildSettingsStore, defaultPrefix: string): CommandDescriptor {
  return defineCommand({
    names: ['prefix'],
    description: 'Shows or changes the prefix for text commands in this server',
    examples: ['prefix', 'prefix !'],
    group: 'Settings',
    args: [
      { name: 'prefix', description: `New prefix, up to ${MAX_PREFIX_LENGTH} characters`, kind: 'string', required: false }
    ],
    supportsDm: false,
    hooks: [restrictedHook],
    execute: async (invoke, options) => {
      const guildId = invoke.guildId;
      if (guildId === null) {
        await invoke.respond({ content: 'This command only works in servers.', ephemeral: true });
        return;
      }

      const requested = (options.getString('prefix') ?? options.args ?? '').trim();
      if (requested.length === 0) {
        const current = await settings.getPrefix(guildId) ?? defaultPrefix;
        await invoke.respond({ content: `The prefix in this server is \`${current}\`.` });
        return;
      }

      const problem = validatePrefix(requested);
      if (problem) {
        await invoke.respond({ content: problem, ephemeral: true });
        return;
      }

      await settings.setPrefix(guildId, requested === defaultPrefix ? null : requested);
      await invoke.respond({ content: `The prefix in this server is now \`${requested}\`.` });
    }
  });
}
