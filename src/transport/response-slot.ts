/**
 * Single-slot response inbox for one domain.
 *
 * Notifications arrive asynchronously from the bearer. The slot holds at
 * most one waiter, keyed by the command ID it expects; the bearer callback
 * resolves it directly when a matching frame arrives. Frames are never
 * buffered, so nothing received before a request can satisfy it.
 */

import { CommandTimeoutError } from '../exceptions';

interface PendingWaiter {
  commandId: number;
  resolve: (frame: Uint8Array) => void;
  reject: (error: Error) => void;
  timeoutId: ReturnType<typeof setTimeout>;
}

/**
 * Handle to an armed slot, returned by {@link ResponseSlot.arm}.
 */
export interface ResponseWait {
  readonly commandId: number;
  readonly response: Promise<Uint8Array>;
  /**
   * Drop this waiter without settling it. No-op once it has settled.
   */
  release(): void;
}

export class ResponseSlot {
  private pending: PendingWaiter | null = null;

  /**
   * Command ID being awaited, or `null` when idle.
   */
  get pendingCommandId(): number | null {
    return this.pending?.commandId ?? null;
  }

  get isAwaiting(): boolean {
    return this.pending !== null;
  }

  /**
   * Arm the slot for `commandId`.
   *
   * The returned promise resolves with the first frame whose echoed ID
   * matches, or rejects with {@link CommandTimeoutError} after `timeoutMs`.
   *
   * @throws {Error} If the slot is already armed
   */
  arm(commandId: number, timeoutMs: number): ResponseWait {
    if (this.pending) {
      throw new Error(
        `Response slot already awaiting command 0x${this.pending.commandId.toString(16)}`
      );
    }

    let waiter: PendingWaiter | undefined;
    const response = new Promise<Uint8Array>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        if (this.pending === waiter) {
          this.pending = null;
          reject(new CommandTimeoutError(commandId, timeoutMs));
        }
      }, timeoutMs);
      waiter = { commandId, resolve, reject, timeoutId };
      this.pending = waiter;
    });

    return {
      commandId,
      response,
      release: () => {
        if (waiter && this.pending === waiter) {
          clearTimeout(waiter.timeoutId);
          this.pending = null;
        }
      },
    };
  }

  /**
   * Offer an inbound frame.
   *
   * @returns true if the frame matched the waiter and resolved it
   */
  offer(frame: Uint8Array): boolean {
    const pending = this.pending;
    if (!pending || frame.length < 2 || frame[1] !== pending.commandId) {
      return false;
    }
    clearTimeout(pending.timeoutId);
    this.pending = null;
    pending.resolve(frame);
    return true;
  }

  /**
   * Reject the waiter, if any.
   *
   * @param makeError - Builds the rejection from the awaited command ID
   * @returns true if a waiter was rejected
   */
  fail(makeError: (commandId: number) => Error): boolean {
    const pending = this.pending;
    if (!pending) {
      return false;
    }
    clearTimeout(pending.timeoutId);
    this.pending = null;
    pending.reject(makeError(pending.commandId));
    return true;
  }
}
