/**
 * PlayTask - the pending result of one awaitable play request
 *
 * A task is settled exactly once, either by the backend completion callback
 * or by the context itself when the request never reached the backend. The
 * outcome promise never rejects; `wait()` turns a failure into a rejection
 * only for the caller that asks for it.
 */

import type { SoundError } from '../types/errors';

export type PlayTaskOutcome = { ok: true } | { ok: false; error: SoundError };

export class PlayTask {
  private outcome: PlayTaskOutcome | null = null;
  private readonly settled: Promise<PlayTaskOutcome>;
  private resolveOutcome: (outcome: PlayTaskOutcome) => void = () => undefined;

  constructor(
    /** Request id the backend knows this play by */
    public readonly id: number,
    private readonly owner: object,
    public readonly signal?: AbortSignal
  ) {
    this.settled = new Promise<PlayTaskOutcome>((resolve) => {
      this.resolveOutcome = resolve;
    });
  }

  get completed(): boolean {
    return this.outcome !== null;
  }

  /**
   * Stored error, or null while pending or after success
   */
  get error(): SoundError | null {
    return this.outcome !== null && !this.outcome.ok ? this.outcome.error : null;
  }

  isOwnedBy(owner: object): boolean {
    return this.owner === owner;
  }

  /**
   * Record the outcome. Later calls are ignored and return false.
   */
  settle(error: SoundError | null = null): boolean {
    if (this.outcome !== null) {
      return false;
    }
    this.outcome = error === null ? { ok: true } : { ok: false, error };
    this.resolveOutcome(this.outcome);
    return true;
  }

  /**
   * Resolves once settled
   */
  outcomePromise(): Promise<PlayTaskOutcome> {
    return this.settled;
  }

  /**
   * Resolves on success, rejects with the stored error
   */
  async wait(): Promise<void> {
    const outcome = await this.settled;
    if (!outcome.ok) {
      throw outcome.error;
    }
  }
}
