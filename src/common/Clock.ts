import { delay } from './utils';

/**
 * Time source used by every polling loop and retry delay.
 *
 * Production code runs on `SystemClock`; tests hand in a `VirtualClock` so
 * that a 5 second retry delay or a 30 second leader discovery budget elapses
 * instantly.
 */
export interface Clock {
  /** Milliseconds since an arbitrary origin */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  sleep(ms: number): Promise<void> {
    return delay(ms);
  }
}

export class VirtualClock implements Clock {
  private current: number;
  private readonly sleeps: number[] = [];

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  /**
   * Advances virtual time by `ms` and yields to the event loop once, so
   * other pending promise callbacks get a chance to run.
   */
  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    await new Promise<void>(resolve => setImmediate(resolve));
  }

  advance(ms: number): void {
    this.current += ms;
  }

  /** Every sleep requested so far, in order */
  getSleeps(): number[] {
    return [...this.sleeps];
  }

  get totalSlept(): number {
    return this.sleeps.reduce((sum, ms) => sum + ms, 0);
  }
}

export const systemClock: Clock = new SystemClock();
