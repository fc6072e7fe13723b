/**
 * @file Async Utilities
 * @description Sleep, FIFO sequencing and bounded polling
 * @depends cancellation
 */

import { CancellationError, CancellationToken } from './cancellation';

/**
 * Creates a promise that resolves after a delay.
 */
export function timeout(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============ Sequencer ============

/**
 * Runs queued tasks one after another in submission order. A rejected task
 * does not block the ones queued after it.
 *
 * @example
 * ```typescript
 * const sequencer = new Sequencer();
 * signal.on('SyncSource', (payload) => sequencer.queue(() => handle(payload)));
 * ```
 */
export class Sequencer {
  private current: Promise<unknown> = Promise.resolve(null);

  queue<T>(promiseTask: () => Promise<T>): Promise<T> {
    const next = this.current.then(
      () => promiseTask(),
      () => promiseTask()
    );
    this.current = next;
    return next;
  }

  /** Resolves once everything queued so far has settled */
  async drain(): Promise<void> {
    let observed: Promise<unknown>;
    do {
      observed = this.current;
      await observed.catch(() => undefined);
    } while (observed !== this.current);
  }
}

// ============ Polling ============

export interface PollOptions {
  /** Delay between two checks */
  intervalMs: number;
  /** Give up once this much time has passed since the first check */
  timeoutMs: number;
  token?: CancellationToken;
  /** Clock, replaceable under test */
  now?: () => number;
  /** Sleep, replaceable under test */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Run `check` until it yields a value or the deadline passes.
 *
 * The check always runs at least once, and once more at the deadline, so a
 * registration that lands during the last interval is still seen.
 *
 * @returns the value found, or undefined on timeout
 * @throws {CancellationError} when the token is cancelled between checks
 */
export async function pollUntil<T>(
  check: () => Promise<T | null | undefined>,
  options: PollOptions
): Promise<T | undefined> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? timeout;
  const token = options.token ?? CancellationToken.None;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    if (token.isCancellationRequested) {
      throw new CancellationError();
    }

    const value = await check();
    if (value !== null && value !== undefined) {
      return value;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      return undefined;
    }
    await sleep(Math.min(options.intervalMs, remaining));
  }
}
