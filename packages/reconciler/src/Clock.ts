import { setTimeout as sleep } from 'node:timers/promises';

/** Source of time for polling loops */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
  /** Signal that aborts once `ms` have passed on this clock */
  timeout(ms: number): AbortSignal;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms);
  },
  timeout: (ms) => AbortSignal.timeout(Math.max(ms, 0)),
};

/**
 * Clock that only advances when slept on. Sleeping resolves immediately and
 * moves `now()` forward by the requested amount. Timeout signals abort once
 * `now()` reaches their deadline.
 */
export class ManualClock implements Clock {
  private current: number;
  private timers: { at: number; controller: AbortController }[] = [];
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.advance(ms);
  }

  timeout(ms: number): AbortSignal {
    const controller = new AbortController();
    this.timers.push({ at: this.current + ms, controller });
    this.fireDueTimers();
    return controller.signal;
  }

  advance(ms: number): void {
    this.current += ms;
    this.fireDueTimers();
  }

  private fireDueTimers(): void {
    const due = this.timers.filter((timer) => timer.at <= this.current);
    this.timers = this.timers.filter((timer) => timer.at > this.current);
    for (const { controller } of due) controller.abort();
  }
}
