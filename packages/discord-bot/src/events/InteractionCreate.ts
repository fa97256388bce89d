/**
 * @module: InteractionCreate
 * @risk: critical
 * @scope: core
 *
 * @description
 * Routes interactions: chat-input commands to the dispatcher, message components to the
 * component router. Everything else is ignored.
 *
 * @impact
 * Risk: An unknown slash command means the published catalog and the registry disagree;
 * the process is aborted rather than left answering with the wrong command set.
 */

import { Events } from 'discord.js';
import type { Interaction } from 'discord.js';
import { Event } from './Event.js';
import { logger } from '../utils/logger.js';
import type { ComponentRouter } from '../framework/ComponentRouter.js';
import type { Dispatcher } from '../framework/Dispatcher.js';
import { UnknownCommandError } from '../framework/errors.js';

const interactionLogger = logger.child({ module: 'interactionCreate' });

export interface InteractionCreateDependencies {
  dispatcher: Dispatcher;
  router: ComponentRouter;
  /** Called after an unknown command is logged. Defaults to exiting the process. */
  abort?: (error: UnknownCommandError) => void;
}

/**
 * @class InteractionCreate
 * @extends {Event}
 */
export class InteractionCreate extends Event<Events.InteractionCreate> {
  private readonly abort: (error: UnknownCommandError) => void;

  constructor(private readonly dependencies: InteractionCreateDependencies) {
    super({ name: Events.InteractionCreate });
    this.abort = dependencies.abort ?? (() => process.exit(1));
  }

  public async execute(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      try {
        const outcome = await this.dependencies.dispatcher.dispatchInteraction(interaction);
        interactionLogger.debug(`Slash dispatch for /${interaction.commandName}: ${outcome}`);
      } catch (error) {
        if (error instanceof UnknownCommandError) {
          interactionLogger.error(`${error.message}; the registered catalog is out of date`);
          this.abort(error);
          return;
        }
        interactionLogger.error(`Error executing command ${interaction.commandName}:`, error);
      }
      return;
    }

    if (interaction.isMessageComponent()) {
      try {
        await this.dependencies.router.route(interaction);
      } catch (error) {
        interactionLogger.error(`Error handling component ${interaction.customId}:`, error);
      }
    }
  }
}
