/**
 * @module: ComponentRouter
 * @risk: moderate
 * @scope: core
 *
 * @description
 * Routes message-component interactions (buttons, select menus) to handlers by custom-id prefix.
 * Handlers receive a component invocation handle, so they respond through the same state machine
 * as commands.
 */

import type { MessageComponentInteraction } from 'discord.js';
import { logger } from '../utils/logger.js';
import { CommandInvoke } from './CommandInvoke.js';

const routerLogger = logger.child({ module: 'componentRouter' });

export type ComponentHandler = (invoke: CommandInvoke, customId: string) => Promise<void>;

/**
 * @class ComponentRouter
 */
export class ComponentRouter {
  private readonly routes = new Map<string, ComponentHandler>();

  /**
   * @throws {Error} When the prefix is already taken
   */
  register(prefix: string, handler: ComponentHandler): this {
    if (this.routes.has(prefix)) {
      throw new Error(`Component prefix "${prefix}" is already registered`);
    }
    this.routes.set(prefix, handler);
    return this;
  }

  /**
   * Runs the handler with the longest matching prefix.
   * @returns false when no handler claims the custom id
   */
  async route(interaction: MessageComponentInteraction): Promise<boolean> {
    const { customId } = interaction;
    let matched: string | null = null;
    for (const prefix of this.routes.keys()) {
      if (customId.startsWith(prefix) && (matched === null || prefix.length > matched.length)) {
        matched = prefix;
      }
    }

    const handler = matched === null ? undefined : this.routes.get(matched);
    if (!handler) {
      routerLogger.debug(`No component handler for custom id: ${customId}`);
      return false;
    }

    await handler(CommandInvoke.component(interaction), customId);
    return true;
  }
}
