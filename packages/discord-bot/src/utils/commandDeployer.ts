/**
 * @module: CommandDeployer
 * @risk: high
 * @scope: core
 *
 * @description: Uploads the slash-command catalog to Discord.
 *
 * @impact
 * Risk: A failed upload leaves users with a stale command list; the dispatcher aborts on names it no longer knows.
 */

import { REST, Routes } from 'discord.js';
import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import { logger } from './logger.js';

const deployLogger = logger.child({ module: 'commandDeployer' });

/**
 * Registers the catalog with Discord's API.
 * @param token - Discord bot token
 * @param clientId - Discord application id
 * @param catalog - Slash-command JSON bodies
 * @param guildId - Registers guild commands instead of global ones when set
 * @returns The number of commands Discord reports back
 * @throws {Error} If registration fails
 */
export async function deployCommands(
  token: string,
  clientId: string,
  catalog: readonly RESTPostAPIChatInputApplicationCommandsJSONBody[],
  guildId?: string
): Promise<number> {
  try {
    const rest = new REST({ version: '10' }).setToken(token);
    for (const entry of catalog) {
      deployLogger.debug(`Registering command: ${entry.name}`);
    }

    const route = guildId
      ? Routes.applicationGuildCommands(clientId, guildId)
      : Routes.applicationCommands(clientId);

    deployLogger.debug(`Starting to refresh ${guildId ? `guild ${guildId}` : 'application'} commands...`);
    const data = await rest.put(route, { body: catalog });
    const count = Array.isArray(data) ? data.length : 0;

    deployLogger.info(`Successfully reloaded ${count} ${guildId ? 'guild' : 'global'} commands.`);
    return count;
  } catch (error) {
    deployLogger.error('Failed to register commands:', error);
    throw error;
  }
}
