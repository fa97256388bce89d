/**
 * @module: TextMatcher
 * @risk: high
 * @scope: core
 *
 * @description
 * Compiles the registered command names into the regular expressions that recognize text
 * triggers: one for guild channels (mention or prefix), one for DMs (dm-eligible names only,
 * prefix optional), and a bare form used with per-guild custom prefixes.
 *
 * @impact
 * Risk: Alternation order decides which command a message resolves to. Names are tried longest
 * first so an alias like "r" can never swallow "remind".
 */

export interface TextMatch {
  /** The matched command token, lower-cased when matching is case-insensitive */
  command: string;
  /** Everything after the token and its separating whitespace, verbatim */
  args: string;
}

export interface TextMatcherOptions {
  clientId: string;
  defaultPrefix: string;
  caseInsensitive: boolean;
}

/** Alternation that never matches; used when there are no names to offer */
const MATCH_NOTHING = '(?!)';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Sorts names longest first (ties alphabetically) and joins them into an alternation.
 */
export function buildNameAlternation(names: Iterable<string>): string {
  const unique = [...new Set(names)];
  if (unique.length === 0) {
    return MATCH_NOTHING;
  }

  return unique
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map(escapeRegExp)
    .join('|');
}

/**
 * Compiled text-trigger patterns. Built once by the registry, read-only afterwards.
 * @class TextMatcher
 */
export class TextMatcher {
  public readonly guildPattern: RegExp;
  public readonly dmPattern: RegExp;
  private readonly barePattern: RegExp;
  private readonly defaultPrefix: string;
  private readonly caseInsensitive: boolean;

  /**
   * @param names - Every registered name and alias
   * @param dmNames - Names and aliases of dm-eligible commands
   */
  constructor(names: Iterable<string>, dmNames: Iterable<string>, options: TextMatcherOptions) {
    const flags = options.caseInsensitive ? 'is' : 's';
    const id = escapeRegExp(options.clientId);
    const prefix = escapeRegExp(options.defaultPrefix);
    const commands = buildNameAlternation(names);
    const dmCommands = buildNameAlternation(dmNames);
    const tail = '(?:$|\\s+(?<args>.*))$';

    this.guildPattern = new RegExp(
      `^(?:<@${id}>\\s*|<@!${id}>\\s*|${prefix})(?<cmd>${commands})${tail}`,
      flags
    );
    this.dmPattern = new RegExp(
      `^(?:<@${id}>\\s+|<@!${id}>\\s+|${prefix}|)(?<cmd>${dmCommands})${tail}`,
      flags
    );
    this.barePattern = new RegExp(`^(?<cmd>${commands})${tail}`, flags);
    this.defaultPrefix = options.defaultPrefix;
    this.caseInsensitive = options.caseInsensitive;
  }

  /**
   * Matches a guild message. The mention and default-prefix forms always apply; a guild
   * prefix different from the default is accepted in addition.
   */
  public matchGuild(content: string, guildPrefix?: string | null): TextMatch | null {
    const direct = this.toMatch(this.guildPattern.exec(content));
    if (direct) {
      return direct;
    }

    if (guildPrefix && guildPrefix !== this.defaultPrefix && content.startsWith(guildPrefix)) {
      return this.toMatch(this.barePattern.exec(content.slice(guildPrefix.length)));
    }

    return null;
  }

  public matchDm(content: string): TextMatch | null {
    return this.toMatch(this.dmPattern.exec(content));
  }

  private toMatch(result: RegExpExecArray | null): TextMatch | null {
    const groups = result?.groups;
    if (!groups?.cmd) {
      return null;
    }

    return {
      command: this.caseInsensitive ? groups.cmd.toLowerCase() : groups.cmd,
      args: groups.args ?? ''
    };
  }
}
