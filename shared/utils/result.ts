/**
 * @file Result Type
 * @description Result<T, E> for operations whose failure is reported but must not abort the caller
 * @depends None (pure type definitions and utility functions)
 *
 * @example
 * const build = await buildSupervisor.startContinuousBuild(source);
 * if (!build.ok) {
 *   Logger.warning(build.error.message);
 * }
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
