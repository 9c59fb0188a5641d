import { setTimeout as delay } from 'node:timers/promises';
import type { Clock } from '../../domain/ports/Clock.js';

/** Wall-clock time; sleeping suspends on a timer without blocking the event loop. */
export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}
