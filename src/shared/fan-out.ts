import { logger } from '../config/logger.config';
import { metrics } from '../services/metrics.service';
import {
  OperationAbortedException,
  TransportFailureException,
  throwIfAborted,
} from '../utils/exceptions';

export interface Fulfilled<T> {
  status: 'fulfilled';
  label: string;
  value: T;
}

export interface Failed {
  status: 'failed';
  label: string;
  error: unknown;
}

export type Settled<T> = Fulfilled<T> | Failed;

export interface Branch<T> {
  label: string;
  /** Failure counter name when the label carries a per-request id */
  metric?: string;
  task: () => Promise<T>;
}

function logFailure(label: string, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof OperationAbortedException) {
    logger.debug('Fan-out branch aborted', { branch: label });
  } else if (error instanceof TransportFailureException) {
    logger.warn('Fan-out branch degraded', {
      branch: label,
      source: error.source,
      errorCode: error.errorCode,
      error: message,
    });
  } else {
    logger.error('Fan-out branch failed', { branch: label, error: message });
  }
}

/**
 * Run one branch and report its outcome as a value. A failed branch is
 * logged under its label, counted under `metric`, and contributes nothing to
 * the caller.
 */
export async function settle<T>(label: string, task: () => Promise<T>, metric = label): Promise<Settled<T>> {
  try {
    return { status: 'fulfilled', label, value: await task() };
  } catch (error) {
    logFailure(label, error);
    metrics.increment('fanout.failed');
    metrics.increment(`fanout.failed.${metric}`);
    return { status: 'failed', label, error };
  }
}

/**
 * Run every branch concurrently and join. Outcomes come back in branch
 * order. When the caller's signal has fired by the time every branch has
 * settled, the join rejects with OperationAbortedException instead.
 */
export async function settleAll<T>(
  branches: readonly Branch<T>[],
  signal?: AbortSignal,
  operation = 'fan-out'
): Promise<Settled<T>[]> {
  throwIfAborted(signal, operation);
  const outcomes = await Promise.all(branches.map((branch) => settle(branch.label, branch.task, branch.metric)));
  throwIfAborted(signal, operation);
  return outcomes;
}

export function fulfilledValues<T>(outcomes: readonly Settled<T>[]): T[] {
  return outcomes.flatMap((outcome) => (outcome.status === 'fulfilled' ? [outcome.value] : []));
}
