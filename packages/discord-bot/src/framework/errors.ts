/**
 * @description: Error types raised by the command framework.
 * @scope: utility
 * @module: FrameworkErrors
 * @risk: low - Error classes only.
 */

/**
 * A trigger named a command the in-process registry does not know. This means the published
 * slash-command catalog and the registry have diverged; it is not recoverable at runtime.
 */
export class UnknownCommandError extends Error {
  constructor(public readonly commandName: string) {
    super(`Received invalid command: ${commandName}`);
    this.name = 'UnknownCommandError';
  }
}

/**
 * Thrown when a command is registered after the registry has been built.
 */
export class RegistryFrozenError extends Error {
  constructor(commandName: string) {
    super(`Cannot register "${commandName}": the command registry is already built`);
    this.name = 'RegistryFrozenError';
  }
}
