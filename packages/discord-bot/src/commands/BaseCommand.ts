/**
 * @description: Defines the command descriptor contract shared by text and slash triggers.
 * @scope: interface
 * @module: BaseCommand
 * @risk: low - Incorrect typing can break command registration or execution wiring.
 */
import type { ArgSpec } from '../framework/types.js';
import type { Hook } from '../framework/hooks.js';
import type { CommandInvoke } from '../framework/CommandInvoke.js';
import type { CommandOptions } from '../framework/CommandOptions.js';

export type CommandBody = (invoke: CommandInvoke, options: CommandOptions) => Promise<void>;

/**
 * Immutable description of one command. The first name is the primary (slash) name;
 * the rest are text aliases.
 */
export interface CommandDescriptor {
  readonly names: readonly [string, ...string[]];
  readonly description: string;
  readonly examples: readonly string[];
  /** Help-page grouping */
  readonly group: string;
  readonly args: readonly ArgSpec[];
  /** False makes the command usable in blacklisted channels */
  readonly canBlacklist: boolean;
  readonly supportsDm: boolean;
  /** Run before the global hooks, in order */
  readonly hooks: readonly Hook[];
  readonly execute: CommandBody;
}

export type CommandDefinition = Pick<CommandDescriptor, 'names' | 'description' | 'execute'>
  & Partial<Omit<CommandDescriptor, 'names' | 'description' | 'execute'>>;

/**
 * Fills in descriptor defaults and freezes the result.
 */
export function defineCommand(definition: CommandDefinition): CommandDescriptor {
  return Object.freeze({
    examples: [],
    group: 'Other',
    args: [],
    canBlacklist: true,
    supportsDm: true,
    hooks: [],
    ...definition
  });
}

export function primaryName(command: CommandDescriptor): string {
  return command.names[0];
}
