/**
 * @module: Dispatcher
 * @risk: critical
 * @scope: core
 *
 * @description
 * Turns a trigger into at most one command execution: resolve the descriptor, normalize
 * options, run the hook chain, pass the admission guard, run the body, release the guard.
 *
 * @impact
 * Risk: Every command flows through here. An unknown slash command is a catalog/registry
 * divergence and is thrown, not swallowed. Dropped and halted dispatches leave no response.
 */

import type { ChatInputCommandInteraction, Message } from 'discord.js';
import { logger } from '../utils/logger.js';
import { primaryName } from '../commands/BaseCommand.js';
import type { CommandDescriptor } from '../commands/BaseCommand.js';
import type { AdmissionGuard } from './AdmissionGuard.js';
import { CommandInvoke } from './CommandInvoke.js';
import { CommandOptions } from './CommandOptions.js';
import type { CommandRegistry } from './CommandRegistry.js';
import { UnknownCommandError } from './errors.js';
import { runHookChain } from './hooks.js';

const dispatchLogger = logger.child({ module: 'dispatcher' });

/**
 * - executed: the command body ran (it may still have thrown)
 * - halted: a hook stopped the dispatch
 * - dropped: the admission guard refused a concurrent dispatch for the same user
 * - ignored: the trigger is not eligible in this context (e.g. DM-only restrictions)
 * - unmatched: text that does not address the bot
 */
export type DispatchOutcome = 'executed' | 'halted' | 'dropped' | 'ignored' | 'unmatched';

export type ReplayOutcome = Extract<DispatchOutcome, 'executed' | 'halted'>;

/**
 * Composes registry, hook chain and admission guard into one execution contract.
 * @class Dispatcher
 */
export class Dispatcher {
  constructor(
    private readonly registry: CommandRegistry,
    private readonly guard: AdmissionGuard
  ) {}

  /**
   * Dispatches a slash command interaction.
   * @throws {UnknownCommandError} When the interaction names a command absent from the registry
   */
  async dispatchInteraction(interaction: ChatInputCommandInteraction): Promise<DispatchOutcome> {
    const command = this.resolve(interaction.commandName);

    if (interaction.guildId === null && !command.supportsDm) {
      dispatchLogger.debug(`Ignoring /${primaryName(command)} outside a guild`);
      return 'ignored';
    }

    const options = CommandOptions.fromInteraction(primaryName(command), interaction.options.data);
    return this.dispatch(CommandInvoke.slash(interaction), command, options);
  }

  /**
   * Dispatches a text message if it addresses the bot.
   * @param guildPrefix - The guild's configured prefix, when it has one
   */
  async dispatchMessage(message: Message, guildPrefix?: string | null): Promise<DispatchOutcome> {
    const matcher = this.registry.matcher;
    const match = message.guildId !== null
      ? matcher.matchGuild(message.content, guildPrefix)
      : matcher.matchDm(message.content);

    if (!match) {
      return 'unmatched';
    }

    const command = this.resolve(match.command);
    const options = CommandOptions.fromText(primaryName(command), match.args);
    return this.dispatch(CommandInvoke.text(message), command, options);
  }

  /**
   * Hook chain → admission guard → body → release.
   * Body errors propagate once the guard has been released.
   */
  async dispatch(invoke: CommandInvoke, command: CommandDescriptor, options: CommandOptions): Promise<DispatchOutcome> {
    const hooks = [...command.hooks, ...this.registry.hooks];
    if (await runHookChain(hooks, invoke, options, command) === 'halt') {
      return 'halted';
    }

    const userId = invoke.authorId;
    if (!this.guard.tryAcquire(userId)) {
      dispatchLogger.debug(`Dropping /${options.command} for user ${userId}: another command is still running`);
      return 'dropped';
    }

    dispatchLogger.debug(`Executing /${options.command} (${invoke.kind}) for user ${userId}`);
    try {
      await command.execute(invoke, options);
    } finally {
      this.guard.release(userId);
    }

    return 'executed';
  }

  /**
   * Runs a stored invocation inside an already-admitted dispatch. The command's own hooks
   * still apply, so a replay cannot bypass a permission check; global hooks and the
   * admission guard are skipped.
   * @throws {UnknownCommandError} When the stored command no longer exists
   */
  async runFromOptions(invoke: CommandInvoke, options: CommandOptions): Promise<ReplayOutcome> {
    const command = this.resolve(options.command);
    if (await runHookChain(command.hooks, invoke, options, command) === 'halt') {
      return 'halted';
    }
    await command.execute(invoke, options);
    return 'executed';
  }

  private resolve(name: string): CommandDescriptor {
    const command = this.registry.get(name);
    if (!command) {
      throw new UnknownCommandError(name);
    }
    return command;
  }
}
