/**
 * @description: Closed unions describing command arguments and the values extracted for them.
 * @scope: interface
 * @module: FrameworkTypes
 * @risk: low - Type drift shows up at compile time in the normalizer and catalog.
 */

/**
 * Every argument kind a command can declare. Grouping kinds (`subcommand`,
 * `subcommand-group`) only ever appear above leaves.
 */
export type ArgKind =
  | 'subcommand'
  | 'subcommand-group'
  | 'string'
  | 'integer'
  | 'boolean'
  | 'user'
  | 'channel'
  | 'role'
  | 'mentionable'
  | 'number'
  | 'attachment';

/**
 * One node of a command's argument tree.
 * Depth is at most three: command → subcommand group → subcommand → leaf.
 */
export interface ArgSpec {
  readonly name: string;
  readonly description: string;
  readonly kind: ArgKind;
  readonly required: boolean;
  readonly options?: readonly ArgSpec[];
}

/**
 * A leaf option value. Snowflake references stay strings, they exceed
 * `Number.MAX_SAFE_INTEGER`.
 */
export type OptionValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'user'; readonly id: string }
  | { readonly kind: 'channel'; readonly id: string }
  | { readonly kind: 'role'; readonly id: string }
  | { readonly kind: 'mentionable'; readonly id: string }
  | { readonly kind: 'number'; readonly value: number };

export type OptionValueKind = OptionValue['kind'];

/**
 * Plain-text rendering of an option value, used when echoing recorded invocations.
 */
export function formatOptionValue(option: OptionValue): string {
  switch (option.kind) {
    case 'string':
      return option.value;
    case 'integer':
    case 'number':
      return String(option.value);
    case 'boolean':
      return option.value ? 'true' : 'false';
    case 'user':
      return `<@${option.id}>`;
    case 'channel':
      return `<#${option.id}>`;
    case 'role':
      return `<@&${option.id}>`;
    case 'mentionable':
      return option.id;
  }
}
