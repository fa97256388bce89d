/**
 * @module: CommandRegistry
 * @risk: high
 * @scope: core
 *
 * @description
 * Collects command descriptors and global hooks at boot through an explicit builder, then
 * freezes them together with the compiled text matcher. Nothing is discovered at runtime;
 * the command list is the one assembled in the bot's startup code.
 *
 * @impact
 * Risk: Registration mistakes (duplicate names, late registration) surface here at startup
 * rather than as misrouted commands later.
 */

import { logger } from '../utils/logger.js';
import { primaryName } from '../commands/BaseCommand.js';
import type { CommandDescriptor } from '../commands/BaseCommand.js';
import { isSameHook } from './hooks.js';
import type { Hook } from './hooks.js';
import { TextMatcher } from './TextMatcher.js';
import { RegistryFrozenError } from './errors.js';

const registryLogger = logger.child({ module: 'commandRegistry' });

export interface CommandRegistryOptions {
  /** The bot's user id, for mention triggers */
  clientId: string;
  defaultPrefix: string;
  caseInsensitive?: boolean;
}

/**
 * Read-only view of the registered commands. Safe to share across concurrent dispatches.
 * @class CommandRegistry
 */
export class CommandRegistry {
  constructor(
    private readonly byName: ReadonlyMap<string, CommandDescriptor>,
    public readonly commands: readonly CommandDescriptor[],
    public readonly hooks: readonly Hook[],
    public readonly matcher: TextMatcher,
    public readonly defaultPrefix: string,
    public readonly caseInsensitive: boolean = true
  ) {}

  /**
   * Resolves a primary name or alias; case-insensitively unless the registry was built case-sensitive.
   */
  get(name: string): CommandDescriptor | undefined {
    return this.byName.get(this.caseInsensitive ? name.toLowerCase() : name);
  }

  /**
   * Commands bucketed by their help group, in registration order.
   */
  groups(): Map<string, CommandDescriptor[]> {
    const grouped = new Map<string, CommandDescriptor[]>();
    for (const command of this.commands) {
      const bucket = grouped.get(command.group) ?? [];
      bucket.push(command);
      grouped.set(command.group, bucket);
    }
    return grouped;
  }
}

/**
 * Accumulates commands and hooks, then compiles them once with {@link build}.
 * @class CommandRegistryBuilder
 */
export class CommandRegistryBuilder {
  private readonly commands: CommandDescriptor[] = [];
  private readonly byName = new Map<string, CommandDescriptor>();
  private readonly hooks: Hook[] = [];
  private built = false;

  private readonly caseInsensitive: boolean;

  constructor(private readonly options: CommandRegistryOptions) {
    this.caseInsensitive = options.caseInsensitive ?? true;
  }

  addCommand(command: CommandDescriptor): this {
    if (this.built) {
      throw new RegistryFrozenError(primaryName(command));
    }

    if (this.commands.includes(command)) {
      return this;
    }

    this.commands.push(command);
    for (const name of command.names) {
      const key = this.caseInsensitive ? name.toLowerCase() : name;
      const existing = this.byName.get(key);
      if (existing && existing !== command) {
        registryLogger.warn(`Name "${key}" of /${primaryName(command)} shadows /${primaryName(existing)}`);
      }
      this.byName.set(key, command);
    }

    return this;
  }

  /**
   * Appends a global hook. Global hooks run after every command's own hooks.
   */
  addHook(hook: Hook): this {
    if (this.built) {
      throw new RegistryFrozenError(`hook:${hook.name}`);
    }

    if (this.hooks.some((registered) => isSameHook(registered, hook))) {
      registryLogger.warn(`Skipping duplicate registration for hook: ${hook.name}`);
      return this;
    }

    this.hooks.push(hook);
    return this;
  }

  build(): CommandRegistry {
    if (this.built) {
      throw new Error('Command registry is already built');
    }
    this.built = true;

    const names = [...this.byName.keys()];
    const dmNames = [...this.byName.entries()]
      .filter(([, command]) => command.supportsDm)
      .map(([name]) => name);

    const matcher = new TextMatcher(names, dmNames, {
      clientId: this.options.clientId,
      defaultPrefix: this.options.defaultPrefix,
      caseInsensitive: this.caseInsensitive
    });

    registryLogger.info(`Command names: ${names.join('|') || '(none)'}`);
    registryLogger.debug(`DM command names: ${dmNames.join('|') || '(none)'}`);

    return new CommandRegistry(
      new Map(this.byName),
      Object.freeze([...this.commands]),
      Object.freeze([...this.hooks]),
      matcher,
      this.options.defaultPrefix,
      this.caseInsensitive
    );
  }
}
