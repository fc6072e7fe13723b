/**
 * @file Event Utilities
 * @description Typed emitters for bridge state changes and viewer signals
 * @depends lifecycle
 */

import { Disposable, type IDisposable } from './lifecycle';

// ============ Types ============

/** Subscribe to an event; dispose the result to unsubscribe. */
export type IEvent<T> = (listener: (e: T) => unknown) => IDisposable;

export interface EmitterOptions {
  /** Called instead of console.error when a listener throws */
  onListenerError?: (error: unknown, event: unknown) => void;
}

// ============ Emitter ============

/**
 * @example
 * ```typescript
 * class SessionWatcher {
 *   private readonly _onDidRegister = new Emitter<string>();
 *   readonly onDidRegister = this._onDidRegister.event;
 * }
 * ```
 */
export class Emitter<T> implements IDisposable {
  private readonly listeners = new Set<(e: T) => unknown>();
  private disposed = false;

  constructor(private readonly options: EmitterOptions = {}) {}

  readonly event: IEvent<T> = (listener) => {
    if (this.disposed) {
      return Disposable.None;
    }
    // wrap so the same function can subscribe twice
    const entry = (e: T) => listener(e);
    this.listeners.add(entry);
    return { dispose: () => this.listeners.delete(entry) };
  };

  /** A throwing listener does not keep the event from the others. */
  fire(event: T): void {
    if (this.disposed) return;

    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (e) {
        if (this.options.onListenerError) {
          this.options.onListenerError(e, event);
        } else {
          console.error('[Emitter] Listener threw error:', e);
        }
      }
    }
  }

  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }
}

// ============ Event Namespace ============

export namespace Event {
  /** Resolve with the next value the event fires. */
  export function toPromise<T>(event: IEvent<T>): Promise<T> {
    return new Promise((resolve) => {
      const subscription = event((e) => {
        subscription.dispose();
        resolve(e);
      });
    });
  }
}
