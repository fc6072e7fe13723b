/**
 * @file ServiceContainer - Lightweight dependency injection container
 * @description Typed service registry with lifecycle management.
 *   - Singleton: Created on first access, shared afterwards
 *   - Transient: New instance per request
 */

import { isDisposable, type IDisposable } from '../../shared/utils';

/** Service lifecycle policy. */
export type ServiceLifetime = 'singleton' | 'transient';

/** Service factory function. */
export type ServiceFactory<S, K extends keyof S> = (container: ServiceContainer<S>) => S[K];

interface ServiceRegistration<S, K extends keyof S> {
  factory: ServiceFactory<S, K>;
  lifetime: ServiceLifetime;
  instance?: S[K];
}

type Registrations<S> = { [K in keyof S]?: ServiceRegistration<S, K> };

/** Lightweight dependency injection container keyed by a service map. */
export class ServiceContainer<S> {
  private registrations: Registrations<S> = {};
  private disposables: Set<IDisposable> = new Set();

  registerSingleton<K extends keyof S>(name: K, factory: ServiceFactory<S, K>): this {
    this.registrations[name] = { factory, lifetime: 'singleton' };
    return this;
  }

  /** Register a transient service (new instance per request). */
  registerTransient<K extends keyof S>(name: K, factory: ServiceFactory<S, K>): this {
    this.registrations[name] = { factory, lifetime: 'transient' };
    return this;
  }

  /** Register an existing instance, replacing any earlier registration. */
  registerInstance<K extends keyof S>(name: K, instance: S[K]): this {
    this.registrations[name] = { factory: () => instance, lifetime: 'singleton', instance };

    if (isDisposable(instance)) {
      this.disposables.add(instance);
    }

    return this;
  }

  /**
   * @throws Error when service is not registered.
   */
  get<K extends keyof S>(name: K): S[K] {
    const registration = this.registrations[name];

    if (!registration) {
      throw new Error(`Service not registered: ${String(name)}`);
    }

    if (registration.lifetime === 'singleton' && registration.instance !== undefined) {
      return registration.instance;
    }

    const instance = registration.factory(this);

    if (registration.lifetime === 'singleton') {
      registration.instance = instance;
    }

    if (isDisposable(instance)) {
      this.disposables.add(instance);
    }

    return instance;
  }

  has(name: keyof S): boolean {
    return this.registrations[name] !== undefined;
  }

  getRegisteredServices(): string[] {
    return Object.keys(this.registrations);
  }

  /** Dispose created services in reverse creation order and clear registrations. */
  dispose(): void {
    const created = Array.from(this.disposables).reverse();
    this.disposables.clear();

    const errors: unknown[] = [];
    for (const disposable of created) {
      try {
        disposable.dispose();
      } catch (error) {
        errors.push(error);
      }
    }

    this.registrations = {};

    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, 'Errors while disposing services');
    }
  }
}
