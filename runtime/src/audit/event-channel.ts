/**
 * Buffered, replayable stream of one audit's events.
 *
 * @module
 */

import { isTerminalEvent, type AuditEvent } from './types.js';

/**
 * Every subscriber sees the full event sequence from the start, then waits
 * for new events until a terminal event closes the channel.
 */
export class AuditEventChannel {
  private readonly events: AuditEvent[] = [];
  private waiters: Array<() => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.events.length;
  }

  /** Append an event. Events after the terminal one are dropped. */
  push(event: AuditEvent): boolean {
    if (this.closed) return false;
    this.events.push(event);
    if (isTerminalEvent(event)) {
      this.closed = true;
    }
    this.notify();
    return true;
  }

  snapshot(): AuditEvent[] {
    return [...this.events];
  }

  async *subscribe(): AsyncIterable<AuditEvent> {
    let index = 0;
    while (true) {
      if (index < this.events.length) {
        yield this.events[index];
        index += 1;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }
}
