/**
 * @file AdmissionGuard.ts
 * @description Per-user single-flight guard for command dispatch.
 * A user holding a fresh record cannot start another command; a record older than the
 * debounce window no longer blocks. Records are cleared when any dispatch for the user finishes.
 */

export interface AdmissionGuardOptions {
  debounceMs: number; // Age after which a record stops blocking new dispatches
  now?: () => number; // Clock, injectable for tests
}

/**
 * Process-wide map from user id to the time their current dispatch started.
 * Created once at startup and handed to the dispatcher by reference.
 * @class AdmissionGuard
 */
export class AdmissionGuard {
  private readonly executing: Map<string, number> = new Map();
  private readonly debounceMs: number;
  private readonly now: () => number;

  constructor(options: AdmissionGuardOptions) {
    this.debounceMs = options.debounceMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Whether the user holds a record younger than the debounce window.
   */
  public isExecuting(userId: string): boolean {
    const startedAt = this.executing.get(userId);
    return startedAt !== undefined && this.now() - startedAt < this.debounceMs;
  }

  /**
   * Check-and-set in one synchronous step, so no other dispatch can interleave.
   * @returns false when the dispatch must be dropped
   */
  public tryAcquire(userId: string): boolean {
    if (this.isExecuting(userId)) {
      return false;
    }
    this.executing.set(userId, this.now());
    return true;
  }

  /**
   * Removes the user's record, whichever dispatch set it.
   * A fast dispatch finishing can therefore clear a slower one's record early.
   */
  public release(userId: string): void {
    this.executing.delete(userId);
  }

  public get size(): number {
    return this.executing.size;
  }
}
