import { OperationAbortedException, throwIfAborted } from '../../utils/exceptions';

export interface ThrottleClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/**
 * Abort-aware setTimeout sleep.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAbortedException('sleep'));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationAbortedException('sleep'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: ThrottleClock = {
  now: () => Date.now(),
  sleep,
};

/**
 * Reject as soon as the signal fires, otherwise settle with the promise.
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new OperationAbortedException(operation));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Minimum-interval request throttle.
 *
 * One instance per provider; every request to that provider goes through
 * `schedule`, including requests from unrelated concurrent callers. Turns are
 * granted first-come first-served and request starts are spaced at least
 * `minIntervalMs` apart. A caller whose signal fires leaves the queue without
 * consuming a turn.
 */
export class RequestThrottle {
  private tail: Promise<void> = Promise.resolve();
  private lastStartedAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: ThrottleClock = systemClock
  ) {}

  async schedule<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const turn = this.tail.then(() => this.takeTurn(signal));
    // The next waiter queues behind this turn whether it is granted or abandoned
    this.tail = turn.then(
      () => undefined,
      () => undefined
    );

    await (signal ? raceAbort(turn, signal, 'throttle') : turn);
    return task();
  }

  private async takeTurn(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal, 'throttle');
    const waitMs = this.lastStartedAt + this.minIntervalMs - this.clock.now();
    if (waitMs > 0) {
      await this.clock.sleep(waitMs, signal);
    }
    throwIfAborted(signal, 'throttle');
    this.lastStartedAt = this.clock.now();
  }
}
