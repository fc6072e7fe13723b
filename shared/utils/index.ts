/**
 * @file Shared Utility Library - Entry Point
 * @depends lifecycle, event, cancellation, async, result
 */

// ====== Lifecycle Management ======

export {
  type IDisposable,
  Disposable,
  DisposableStore,
  MutableDisposable,
  isDisposable,
  toDisposable,
} from './lifecycle';

// ====== Event System ======

export { type IEvent, type EmitterOptions, Emitter, Event } from './event';

// ====== Cancellation ======

export {
  CancellationTokenSource,
  CancellationError,
  CancellationToken,
  isCancellationError,
  whenCancelled,
} from './cancellation';

// ====== Async Utilities ======

export { type PollOptions, Sequencer, pollUntil, timeout } from './async';

// ====== Result Type ======

export { type Ok, type Err, type Result, ok, err } from './result';
