/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Minimum-interval throttle for calls to a rate-limited service
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface ThrottleClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

const systemClock: ThrottleClock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

/**
 * Runs tasks one at a time, starting each at least `minIntervalMs` after the
 * previous one started. A failed task does not hold up the queue.
 */
export class MinIntervalThrottle {
  private readonly clock: ThrottleClock;
  private lastStart: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly minIntervalMs: number,
    clock: Partial<ThrottleClock> = {}
  ) {
    this.clock = { ...systemClock, ...clock };
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await this.waitTurn();
      return task();
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async waitTurn(): Promise<void> {
    if (this.lastStart !== null) {
      const wait = this.lastStart + this.minIntervalMs - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait);
      }
    }
    this.lastStart = this.clock.now();
  }
}
