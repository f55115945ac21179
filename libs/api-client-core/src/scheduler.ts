import { setTimeout as sleep } from 'timers/promises';
import type { Scheduler } from './types';

/** Wall-clock scheduler backed by Node timers. */
export const systemScheduler: Scheduler = {
  now: () => new Date(),
  sleep: async (seconds: number) => {
    if (seconds > 0) {
      await sleep(seconds * 1000);
    }
  },
};

export function elapsedSeconds(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / 1000;
}
