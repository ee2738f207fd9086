import { CancelledError } from '../errors/categories.js';
import type { Clock } from '../resilience/clock.js';

/**
 * Clock that only moves when told to. Sleeping advances it immediately
 * and records the requested delay.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];
  private current: number;

  constructor(start = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError();
    }
    this.sleeps.push(ms);
    this.current += ms;
  }
}
