/**
 * @description: Pre-dispatch interceptors and the ordered chain that runs them.
 * @scope: core
 * @module: HookChain
 * @risk: moderate - A hook that halts by mistake blocks every command it is attached to.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../utils/logger.js';
import type { CommandDescriptor } from '../commands/BaseCommand.js';
import type { CommandInvoke } from './CommandInvoke.js';
import type { CommandOptions } from './CommandOptions.js';

const hookLogger = logger.child({ module: 'hooks' });

export type HookResult = 'continue' | 'halt';

export type HookFn = (
  invoke: CommandInvoke,
  options: CommandOptions,
  command: CommandDescriptor
) => Promise<HookResult>;

/**
 * A registered interceptor. Hooks compare by `id`, never by function identity.
 */
export interface Hook {
  readonly id: string;
  readonly name: string;
  readonly run: HookFn;
}

export function createHook(name: string, run: HookFn): Hook {
  return Object.freeze({ id: randomUUID(), name, run });
}

export function isSameHook(a: Hook, b: Hook): boolean {
  return a.id === b.id;
}

/**
 * Runs hooks in order and stops at the first halt.
 * @returns 'halt' when any hook halted, otherwise 'continue'
 */
export async function runHookChain(
  hooks: readonly Hook[],
  invoke: CommandInvoke,
  options: CommandOptions,
  command: CommandDescriptor
): Promise<HookResult> {
  for (const hook of hooks) {
    const result = await hook.run(invoke, options, command);
    if (result === 'halt') {
      hookLogger.debug(`Hook "${hook.name}" halted /${options.command} for user ${invoke.authorId}`);
      return 'halt';
    }
  }
  return 'continue';
}
