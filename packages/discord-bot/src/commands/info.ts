/**
 * @description: Reports basic runtime information about the bot.
 * @scope: commands
 * @module: InfoCommand
 * @risk: low - Read-only.
 */

import { EmbedBuilder } from 'discord.js';
import { formatDuration, intervalToDuration } from 'date-fns';
import { defineCommand } from './BaseCommand.js';
import type { CommandDescriptor } from './BaseCommand.js';
import type { CommandRegistry } from '../framework/CommandRegistry.js';

export function formatUptime(uptimeMs: number | null): string {
  if (uptimeMs === null) {
    return 'offline';
  }
  const formatted = formatDuration(intervalToDuration({ start: 0, end: uptimeMs }));
  return formatted.length > 0 ? formatted : 'just started';
}

export function createInfoCommand(getRegistry: () => CommandRegistry): CommandDescriptor {
  return defineCommand({
    names: ['info', 'about'],
    description: 'Shows information about the bot',
    group: 'General',
    execute: async (invoke) => {
      const client = invoke.client;
      const embed = new EmbedBuilder()
        .setTitle(client.user.username)
        .setThumbnail(client.user.displayAvatarURL())
        .addFields(
          { name: 'Servers', value: String(client.guilds.cache.size), inline: true },
          { name: 'Commands', value: String(getRegistry().commands.length), inline: true },
          { name: 'Uptime', value: formatUptime(client.uptime), inline: true }
        );
      await invoke.respond({ embeds: [embed] });
    }
  });
}
