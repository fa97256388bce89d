/**
 * @description Base event class for Discord.js events with error handling and registration.
 * @scope interface
 * @module EventBase
 * @risk: moderate - Event wiring issues can prevent handlers from firing.
 */

import type { Client, ClientEvents } from 'discord.js';
import { logger } from '../utils/logger.js';

/**
 * Abstract base class for Discord.js event handlers.
 * Provides consistent error handling and event registration.
 * @abstract
 * @class Event
 */
export abstract class Event<K extends keyof ClientEvents = keyof ClientEvents> {
  /** The name of the Discord.js event to listen for */
  public readonly name: K;

  /** Whether the event should only be handled once */
  public readonly once: boolean;

  /**
   * @param options.name - The name of the Discord.js event
   * @param options.once - If true, the event will only be handled once
   */
  constructor(options: { name: K; once?: boolean }) {
    this.name = options.name;
    this.once = options.once ?? false;
  }

  /**
   * Main execution method to be implemented by subclasses.
   */
  public abstract execute(...args: ClientEvents[K]): Promise<void> | void;

  /**
   * Registers the event with the Discord.js client.
   */
  public register(client: Client): void {
    const listener = (...args: ClientEvents[K]) => this._execute(...args);
    if (this.once) {
      client.once(this.name, listener);
    } else {
      client.on(this.name, listener);
    }
    logger.debug(`Registered event: ${this.name} (${this.once ? 'once' : 'on'})`);
  }

  /**
   * Wraps the execute method with error handling. Never rejects: the client has no one to report to.
   */
  private async _execute(...args: ClientEvents[K]): Promise<void> {
    try {
      await this.execute(...args);
    } catch (error) {
      logger.error(`Error in event ${this.name}:`, error);
    }
  }
}
