import { EventEmitter } from 'events';
import { Clock, systemClock } from './Clock';

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  /** Fixed delay between attempts */
  delay?: number;
  retryCondition?: (error: unknown, attempt: number) => boolean;
  name?: string;
  clock?: Clock;
}

export interface RetryAttempt {
  attempt: number;
  error?: unknown;
  timestamp: number;
  totalElapsed: number;
}

export interface AttemptFailureEvent {
  operation: string;
  attempt: number;
  maxAttempts: number;
  error: unknown;
  willRetry: boolean;
}

/**
 * Attempt-limited retry with a fixed delay.
 *
 * Errors rejected by `retryCondition`, and the error of the last attempt,
 * are rethrown unmodified.
 *
 * Events: `attempt-failure` (AttemptFailureEvent), `retry-scheduled`
 * ({ operation, attempt, delay }), `operation-success` ({ operation, attempts }).
 */
export class RetryManager extends EventEmitter {
  private readonly options: Required<RetryOptions>;
  private lastAttempts: RetryAttempt[] = [];

  constructor(options: RetryOptions = {}) {
    super();

    this.options = {
      maxAttempts: options.maxAttempts ?? 3,
      delay: options.delay ?? 1000,
      retryCondition: options.retryCondition ?? (() => true),
      name: options.name ?? 'operation',
      clock: options.clock ?? systemClock
    };

    if (this.options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be at least 1, got ${this.options.maxAttempts}`);
    }
  }

  async execute<T>(operation: () => Promise<T>, name: string = this.options.name): Promise<T> {
    const { maxAttempts, delay, retryCondition, clock } = this.options;
    const startTime = clock.now();
    const attempts: RetryAttempt[] = [];
    this.lastAttempts = attempts;

    for (let attempt = 1; ; attempt++) {
      const timestamp = clock.now();
      const attemptInfo: RetryAttempt = { attempt, timestamp, totalElapsed: timestamp - startTime };
      attempts.push(attemptInfo);

      try {
        const result = await operation();
        this.emit('operation-success', { operation: name, attempts: attempt });
        return result;
      } catch (error) {
        attemptInfo.error = error;

        if (!retryCondition(error, attempt)) {
          throw error;
        }

        const willRetry = attempt < maxAttempts;
        const failure: AttemptFailureEvent = { operation: name, attempt, maxAttempts, error, willRetry };
        this.emit('attempt-failure', failure);

        if (!willRetry) {
          throw error;
        }

        this.emit('retry-scheduled', { operation: name, attempt, delay });
        await clock.sleep(delay);
      }
    }
  }

  /**
   * Attempts made by the most recent `execute` call
   */
  getLastAttempts(): RetryAttempt[] {
    return [...this.lastAttempts];
  }

  getOptions(): Readonly<Required<RetryOptions>> {
    return this.options;
  }
}
