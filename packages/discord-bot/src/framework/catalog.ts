/**
 * @description: Derives the slash-command catalog from registered command descriptors.
 * @scope: core
 * @module: CommandCatalog
 * @risk: moderate - A catalog that drifts from the registry makes the dispatcher abort on unknown commands.
 */

import { ApplicationCommandOptionType, ApplicationCommandType } from 'discord.js';
import type {
  APIApplicationCommandBasicOption,
  APIApplicationCommandOption,
  APIApplicationCommandSubcommandGroupOption,
  APIApplicationCommandSubcommandOption,
  RESTPostAPIChatInputApplicationCommandsJSONBody
} from 'discord.js';
import { primaryName } from '../commands/BaseCommand.js';
import type { CommandDescriptor } from '../commands/BaseCommand.js';
import type { ArgSpec } from './types.js';

function describeNesting(arg: ArgSpec, parent: string): string {
  return `Argument "${arg.name}" (${arg.kind}) cannot be nested under ${parent}`;
}

/**
 * Leaf options. Grouping kinds are rejected here: they only appear above leaves.
 */
export function toBasicOption(arg: ArgSpec, parent: string): APIApplicationCommandBasicOption {
  const base = { name: arg.name, description: arg.description, required: arg.required };

  switch (arg.kind) {
    case 'string':
      return { ...base, type: ApplicationCommandOptionType.String };
    case 'integer':
      return { ...base, type: ApplicationCommandOptionType.Integer };
    case 'boolean':
      return { ...base, type: ApplicationCommandOptionType.Boolean };
    case 'user':
      return { ...base, type: ApplicationCommandOptionType.User };
    case 'channel':
      return { ...base, type: ApplicationCommandOptionType.Channel };
    case 'role':
      return { ...base, type: ApplicationCommandOptionType.Role };
    case 'mentionable':
      return { ...base, type: ApplicationCommandOptionType.Mentionable };
    case 'number':
      return { ...base, type: ApplicationCommandOptionType.Number };
    case 'attachment':
      return { ...base, type: ApplicationCommandOptionType.Attachment };
    case 'subcommand':
    case 'subcommand-group':
      throw new Error(describeNesting(arg, parent));
  }
}

function toSubcommand(arg: ArgSpec): APIApplicationCommandSubcommandOption {
  return {
    type: ApplicationCommandOptionType.Subcommand,
    name: arg.name,
    description: arg.description,
    options: (arg.options ?? []).map((child) => toBasicOption(child, `subcommand "${arg.name}"`))
  };
}

function toSubcommandGroup(arg: ArgSpec): APIApplicationCommandSubcommandGroupOption {
  return {
    type: ApplicationCommandOptionType.SubcommandGroup,
    name: arg.name,
    description: arg.description,
    options: (arg.options ?? []).map((child) => {
      if (child.kind !== 'subcommand') {
        throw new Error(describeNesting(child, `subcommand group "${arg.name}"`));
      }
      return toSubcommand(child);
    })
  };
}

/**
 * Top-level option of a command.
 */
export function toCatalogOption(arg: ArgSpec, commandName: string): APIApplicationCommandOption {
  switch (arg.kind) {
    case 'subcommand':
      return toSubcommand(arg);
    case 'subcommand-group':
      return toSubcommandGroup(arg);
    default:
      return toBasicOption(arg, `command "${commandName}"`);
  }
}

/**
 * Slash-command JSON for one descriptor. Aliases are text-only and not published.
 */
export function toCatalogEntry(command: CommandDescriptor): RESTPostAPIChatInputApplicationCommandsJSONBody {
  const name = primaryName(command);
  return {
    type: ApplicationCommandType.ChatInput,
    name,
    description: command.description,
    options: command.args.map((arg) => toCatalogOption(arg, name)),
    dm_permission: command.supportsDm
  };
}

export function buildCatalog(commands: readonly CommandDescriptor[]): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return commands.map(toCatalogEntry);
}
