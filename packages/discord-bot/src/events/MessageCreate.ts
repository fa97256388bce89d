/**
 * @module: MessageCreate
 * @risk: high
 * @scope: core
 *
 * @description
 * Handles the 'messageCreate' event: filters out messages the bot must not act on, looks up the
 * guild's prefix and hands the message to the dispatcher as a text trigger.
 *
 * @impact
 * Risk: A loose filter lets the bot answer itself or other bots in a loop.
 */

import { Events } from 'discord.js';
import type { Message } from 'discord.js';
import { Event } from './Event.js';
import { logger } from '../utils/logger.js';
import type { Dispatcher } from '../framework/Dispatcher.js';
import type { GuildSettingsStore } from '../state/GuildSettingsStore.js';

const messageLogger = logger.child({ module: 'messageCreate' });

export interface MessageCreateDependencies {
  dispatcher: Dispatcher;
  settings: GuildSettingsStore;
  /** Skip messages written by bots */
  ignoreBots: boolean;
  /** Accept text commands in direct messages */
  dmEnabled: boolean;
}

/**
 * @class MessageCreate
 * @extends {Event}
 */
export class MessageCreate extends Event<Events.MessageCreate> {
  constructor(private readonly dependencies: MessageCreateDependencies) {
    super({ name: Events.MessageCreate });
  }

  public async execute(message: Message): Promise<void> {
    const { dispatcher, settings, ignoreBots, dmEnabled } = this.dependencies;

    if (message.author.id === message.client.user.id) {
      return;
    }
    if (ignoreBots && message.author.bot) {
      return;
    }
    if (message.guildId === null && !dmEnabled) {
      return;
    }

    const guildPrefix = message.guildId !== null ? await settings.getPrefix(message.guildId) : null;

    try {
      const outcome = await dispatcher.dispatchMessage(message, guildPrefix);
      if (outcome !== 'unmatched') {
        messageLogger.debug(`Text dispatch for message ${message.id}: ${outcome}`);
      }
    } catch (error) {
      messageLogger.error(`Error handling message ${message.id}:`, error);
    }
  }
}
