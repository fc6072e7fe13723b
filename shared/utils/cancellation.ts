/**
 * @file Cancellation Token
 * @description Cooperative cancellation for the coordinator's waits (viewer registration, signal listening)
 * @depends event, lifecycle
 */

import { Emitter, type IEvent } from './event';
import { Disposable, type IDisposable } from './lifecycle';

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly onCancellationRequested: IEvent<void>;
}

export namespace CancellationToken {
  export const None: CancellationToken = Object.freeze({
    isCancellationRequested: false,
    onCancellationRequested: () => Disposable.None,
  });

  export const Cancelled: CancellationToken = Object.freeze({
    isCancellationRequested: true,
    onCancellationRequested: () => Disposable.None,
  });
}

/**
 * Owns one token. SIGINT and SIGTERM both end up in `cancel()`.
 *
 * @example
 * ```typescript
 * const source = new CancellationTokenSource();
 * process.once('SIGINT', () => source.cancel());
 * await bridge.run(request, source.token);
 * ```
 */
export class CancellationTokenSource implements IDisposable {
  private cancelled = false;
  private readonly emitter = new Emitter<void>();
  readonly token: CancellationToken;

  constructor() {
    const source = this;
    this.token = {
      get isCancellationRequested() {
        return source.cancelled;
      },
      onCancellationRequested: this.emitter.event,
    };
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.emitter.fire(undefined);
    this.emitter.dispose();
  }

  dispose(): void {
    this.emitter.dispose();
  }
}

export class CancellationError extends Error {
  constructor(message = 'Cancelled') {
    super(message);
    this.name = 'CancellationError';
  }
}

export function isCancellationError(error: unknown): error is CancellationError {
  return (
    error instanceof CancellationError ||
    (error instanceof Error && error.name === 'CancellationError')
  );
}

/**
 * Resolve once the token is cancelled (immediately if it already is)
 */
export function whenCancelled(token: CancellationToken): Promise<void> {
  if (token.isCancellationRequested) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const listener = token.onCancellationRequested(() => {
      listener.dispose();
      resolve();
    });
  });
}
