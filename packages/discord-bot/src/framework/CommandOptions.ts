/**
 * @module: CommandOptions
 * @risk: moderate
 * @scope: core
 *
 * @description
 * Normalizes both trigger shapes into one invocation payload. Slash-command option trees are
 * flattened into a name → value map (recording the subcommand and group on the way down);
 * text triggers keep their argument tail verbatim.
 *
 * @impact
 * Risk: A missed leaf silently changes what a command body sees. Unknown option kinds are
 * dropped on purpose and never raise.
 */

import { ApplicationCommandOptionType } from 'discord.js';
import type { CommandInteractionOption } from 'discord.js';
import { logger } from '../utils/logger.js';
import type { ArgKind, OptionValue } from './types.js';

const optionsLogger = logger.child({ module: 'commandOptions' });

/**
 * JSON shape of a {@link CommandOptions}, used when invocations are stored (macros).
 */
export interface SerializedCommandOptions {
  command: string;
  subcommand: string | null;
  subcommandGroup: string | null;
  options: Record<string, OptionValue>;
  args: string | null;
}

/**
 * Maps the platform's option type onto our closed {@link ArgKind} union.
 * Returns null for types this framework does not know about.
 */
export function argKindOf(type: ApplicationCommandOptionType): ArgKind | null {
  switch (type) {
    case ApplicationCommandOptionType.Subcommand:
      return 'subcommand';
    case ApplicationCommandOptionType.SubcommandGroup:
      return 'subcommand-group';
    case ApplicationCommandOptionType.String:
      return 'string';
    case ApplicationCommandOptionType.Integer:
      return 'integer';
    case ApplicationCommandOptionType.Boolean:
      return 'boolean';
    case ApplicationCommandOptionType.User:
      return 'user';
    case ApplicationCommandOptionType.Channel:
      return 'channel';
    case ApplicationCommandOptionType.Role:
      return 'role';
    case ApplicationCommandOptionType.Mentionable:
      return 'mentionable';
    case ApplicationCommandOptionType.Number:
      return 'number';
    case ApplicationCommandOptionType.Attachment:
      return 'attachment';
    default:
      return null;
  }
}

function snowflakeOf(option: CommandInteractionOption): string | undefined {
  return typeof option.value === 'string' && option.value.length > 0 ? option.value : undefined;
}

/**
 * Extracts the value of a leaf option. Returns undefined when the payload is missing,
 * has the wrong primitive type, or the kind carries no value we keep.
 */
function extractLeaf(kind: Exclude<ArgKind, 'subcommand' | 'subcommand-group'>, option: CommandInteractionOption): OptionValue | undefined {
  switch (kind) {
    case 'string':
      return typeof option.value === 'string' ? { kind: 'string', value: option.value } : undefined;
    case 'integer':
      return typeof option.value === 'number' && Number.isInteger(option.value)
        ? { kind: 'integer', value: option.value }
        : undefined;
    case 'boolean':
      return typeof option.value === 'boolean' ? { kind: 'boolean', value: option.value } : undefined;
    case 'number':
      return typeof option.value === 'number' ? { kind: 'number', value: option.value } : undefined;
    case 'user': {
      const id = option.user?.id ?? snowflakeOf(option);
      return id ? { kind: 'user', id } : undefined;
    }
    case 'channel': {
      const id = option.channel?.id ?? snowflakeOf(option);
      return id ? { kind: 'channel', id } : undefined;
    }
    case 'role': {
      const id = option.role?.id ?? snowflakeOf(option);
      return id ? { kind: 'role', id } : undefined;
    }
    case 'mentionable': {
      const id = snowflakeOf(option);
      return id ? { kind: 'mentionable', id } : undefined;
    }
    case 'attachment':
      // Attachments are not part of OptionValue; command bodies read them off the interaction.
      return undefined;
    default: {
      const unhandled: never = kind;
      return unhandled;
    }
  }
}

/**
 * Uniform invocation payload shared by slash and text triggers.
 * @class CommandOptions
 */
export class CommandOptions {
  public subcommand: string | null = null;
  public subcommandGroup: string | null = null;
  public readonly options = new Map<string, OptionValue>();
  /** Verbatim argument tail for text triggers; null for structured triggers */
  public args: string | null = null;

  /**
   * @param command - Primary name of the invoked command
   */
  constructor(public readonly command: string) {}

  /**
   * Builds options from a slash-command option tree (`interaction.options.data`).
   */
  static fromInteraction(command: string, data: readonly CommandInteractionOption[]): CommandOptions {
    const result = new CommandOptions(command);
    for (const option of data) {
      result.populate(option);
    }
    return result;
  }

  /**
   * Builds options for a text trigger. The tail is kept as-is; nothing is parsed out of it.
   */
  static fromText(command: string, args: string | undefined): CommandOptions {
    const result = new CommandOptions(command);
    result.args = args ?? '';
    return result;
  }

  static fromJSON(data: SerializedCommandOptions): CommandOptions {
    const result = new CommandOptions(data.command);
    result.subcommand = data.subcommand;
    result.subcommandGroup = data.subcommandGroup;
    result.args = data.args;
    for (const [name, value] of Object.entries(data.options)) {
      result.options.set(name, value);
    }
    return result;
  }

  private populate(option: CommandInteractionOption): void {
    const kind = argKindOf(option.type);

    if (kind === null) {
      optionsLogger.debug(`Skipping option "${option.name}" with unsupported type ${option.type}`);
      return;
    }

    if (kind === 'subcommand' || kind === 'subcommand-group') {
      if (kind === 'subcommand') {
        this.subcommand = option.name;
      } else {
        this.subcommandGroup = option.name;
      }
      for (const child of option.options ?? []) {
        this.populate(child);
      }
      return;
    }

    const value = extractLeaf(kind, option);
    if (value === undefined) {
      optionsLogger.debug(`Omitting option "${option.name}" (${kind}) without a usable value`);
      return;
    }
    this.options.set(option.name, value);
  }

  get(name: string): OptionValue | undefined {
    return this.options.get(name);
  }

  getString(name: string): string | undefined {
    const option = this.options.get(name);
    return option?.kind === 'string' ? option.value : undefined;
  }

  getInteger(name: string): number | undefined {
    const option = this.options.get(name);
    return option?.kind === 'integer' ? option.value : undefined;
  }

  getBoolean(name: string): boolean | undefined {
    const option = this.options.get(name);
    return option?.kind === 'boolean' ? option.value : undefined;
  }

  getChannelId(name: string): string | undefined {
    const option = this.options.get(name);
    return option?.kind === 'channel' ? option.id : undefined;
  }

  toJSON(): SerializedCommandOptions {
    return {
      command: this.command,
      subcommand: this.subcommand,
      subcommandGroup: this.subcommandGroup,
      options: Object.fromEntries(this.options),
      args: this.args
    };
  }
}
