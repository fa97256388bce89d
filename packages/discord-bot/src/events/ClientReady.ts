/**
 * @description: Announces readiness, sets presence and publishes the slash-command catalog.
 * @scope: core
 * @module: ClientReady
 * @risk: high - A failed catalog upload leaves stale commands registered.
 */

import { ActivityType, Events } from 'discord.js';
import type { Client, RESTPostAPIChatInputApplicationCommandsJSONBody } from 'discord.js';
import { Event } from './Event.js';
import { logger } from '../utils/logger.js';
import { deployCommands } from '../utils/commandDeployer.js';

export interface ClientReadyDependencies {
  token: string;
  clientId: string;
  catalog: readonly RESTPostAPIChatInputApplicationCommandsJSONBody[];
  /** Publish to this guild only (instant updates while developing) */
  debugGuildId?: string;
  deploy?: typeof deployCommands;
}

/**
 * @class ClientReady
 * @extends {Event}
 */
export class ClientReady extends Event<Events.ClientReady> {
  constructor(private readonly dependencies: ClientReadyDependencies) {
    super({ name: Events.ClientReady, once: true });
  }

  public async execute(client: Client<true>): Promise<void> {
    logger.info(`Logged in as ${client.user.tag}`);
    client.user.setPresence({
      activities: [{ name: 'for /help', type: ActivityType.Watching }],
      status: 'online'
    });

    const { token, clientId, catalog, debugGuildId } = this.dependencies;
    const deploy = this.dependencies.deploy ?? deployCommands;
    await deploy(token, clientId, catalog, debugGuildId);
  }
}
