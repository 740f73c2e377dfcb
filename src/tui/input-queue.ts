import type { InputEvent } from './keys.js';

interface Waiter {
  resolve: (event: InputEvent) => void;
  reject: (error: Error) => void;
}

/**
 * Turns listener callbacks into an awaitable stream of events.
 *
 * Events come out in arrival order. Once failed, every read rejects with the
 * failure, including events already queued: a broken input source ends the
 * loop rather than replaying stale keys.
 */
export class InputQueue {
  private readonly events: InputEvent[] = [];
  private waiter: Waiter | null = null;
  private error: Error | null = null;

  push(event: InputEvent): void {
    if (this.error) return;
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve(event);
      return;
    }
    this.events.push(event);
  }

  fail(error: Error): void {
    if (this.error) return;
    this.error = error;
    this.events.length = 0;
    if (this.waiter) {
      const { reject } = this.waiter;
      this.waiter = null;
      reject(error);
    }
  }

  /**
   * Resolves with the next event, waiting as long as it takes
   */
  next(): Promise<InputEvent> {
    if (this.error) {
      return Promise.reject(this.error);
    }
    const event = this.events.shift();
    if (event) {
      return Promise.resolve(event);
    }
    if (this.waiter) {
      return Promise.reject(new Error('Only one read may wait for input at a time'));
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  get pending(): number {
    return this.events.length;
  }
}
