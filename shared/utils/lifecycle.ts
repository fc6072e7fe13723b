/**
 * @file Lifecycle Management
 * @description Disposable pattern for bus subscriptions, signal handlers and cached sessions
 * @depends None (base dependency for other utilities)
 */

/**
 * Disposable resource interface
 */
export interface IDisposable {
  dispose(): void;
}

export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

/**
 * Convert a function to a Disposable
 */
export function toDisposable(fn: () => void): IDisposable {
  let disposed = false;
  return {
    dispose() {
      if (disposed) return;
      disposed = true;
      fn();
    },
  };
}

/**
 * Holds several disposables and releases them together.
 * A failing dispose() does not stop the remaining ones from being released.
 */
export class DisposableStore implements IDisposable {
  private _isDisposed = false;
  private _toDispose = new Set<IDisposable>();

  get isDisposed(): boolean {
    return this._isDisposed;
  }

  add<T extends IDisposable>(disposable: T): T {
    if (this._isDisposed) {
      disposable.dispose();
      return disposable;
    }
    this._toDispose.add(disposable);
    return disposable;
  }

  clear(): void {
    const errors: unknown[] = [];
    for (const d of this._toDispose) {
      try {
        d.dispose();
      } catch (e) {
        errors.push(e);
      }
    }
    this._toDispose.clear();

    if (errors.length > 0) {
      console.error(`[DisposableStore] ${errors.length} error(s) during dispose:`, errors);
    }
  }

  dispose(): void {
    if (this._isDisposed) return;
    this._isDisposed = true;
    this.clear();
  }
}

/**
 * Base class for services that own disposables
 */
export abstract class Disposable implements IDisposable {
  static None = Object.freeze<IDisposable>({ dispose() {} });

  protected readonly _store = new DisposableStore();

  public dispose(): void {
    this._store.dispose();
  }

  protected _register<T extends IDisposable>(t: T): T {
    if (t === (this as IDisposable)) {
      throw new Error('Cannot register a disposable on itself!');
    }
    return this._store.add(t);
  }
}

/**
 * Holds at most one disposable; replacing the value disposes the old one
 */
export class MutableDisposable<T extends IDisposable> implements IDisposable {
  private _value?: T;
  private _isDisposed = false;

  get value(): T | undefined {
    return this._isDisposed ? undefined : this._value;
  }

  set value(value: T | undefined) {
    if (this._isDisposed) {
      value?.dispose();
      return;
    }
    if (this._value !== value) {
      this._value?.dispose();
      this._value = value;
    }
  }

  clear(): void {
    this.value = undefined;
  }

  dispose(): void {
    this._isDisposed = true;
    this._value?.dispose();
    this._value = undefined;
  }
}
