/**
 * @fileoverview Dependency injection container for service registration and resolution.
 *
 * Provides a typed, token-based dependency injection container that supports
 * singleton registration, lazy initialization, and scoped containers.
 *
 * Each {@link ServiceToken} carries the type of the service it names and keeps
 * its own bindings per container, so resolution is typed end to end.
 *
 * @module core/container
 */

/** Factory function type for creating service instances. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

/** Service registration information. */
export interface ServiceRegistration<T> {
  factory: ServiceFactory<T>;
  isSingleton: boolean;
  instance?: { value: T };
}

/**
 * Typed identifier for a service.
 *
 * @example
 * ```typescript
 * export const IClock = new ServiceToken<IClock>('IClock');
 * container.registerSingleton(IClock, () => new SystemClock());
 * const clock = container.resolve(IClock); // typed as IClock
 * ```
 */
export class ServiceToken<T> {
  private readonly bindings = new WeakMap<ServiceContainer, ServiceRegistration<T>>();

  constructor(readonly description: string) {}

  bind(container: ServiceContainer, registration: ServiceRegistration<T>): void {
    this.bindings.set(container, registration);
  }

  lookup(container: ServiceContainer): ServiceRegistration<T> | undefined {
    return this.bindings.get(container);
  }

  toString(): string {
    return `ServiceToken(${this.description})`;
  }
}

/**
 * Dependency injection container.
 *
 * Supports service registration, lazy initialization, singleton pattern,
 * and scoped containers that inherit from parent containers.
 */
export class ServiceContainer {
  private readonly parent?: ServiceContainer;

  constructor(parent?: ServiceContainer) {
    this.parent = parent;
  }

  /**
   * Register a service factory. Creates a new instance on each resolve() call.
   */
  register<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void {
    token.bind(this, { factory, isSingleton: false });
  }

  /**
   * Register a singleton service factory. Creates only one instance, cached after first resolve().
   */
  registerSingleton<T>(token: ServiceToken<T>, factory: ServiceFactory<T>): void {
    token.bind(this, { factory, isSingleton: true });
  }

  /**
   * Resolve a service instance.
   *
   * Factories run against the container that resolves, so a scope's
   * overrides are visible to services its parent registered.
   */
  resolve<T>(token: ServiceToken<T>): T {
    for (let container: ServiceContainer | undefined = this; container; container = container.parent) {
      const registration = token.lookup(container);
      if (registration) {
        return this.createInstance(registration);
      }
    }
    throw new Error(`Service not registered: ${token.description}`);
  }

  /**
   * Create a scoped child container.
   *
   * The child inherits all parent registrations and can override them.
   * Singleton instances are shared between parent and child unless overridden.
   */
  createScope(): ServiceContainer {
    return new ServiceContainer(this);
  }

  /**
   * Check if a service is registered in this container or its parents.
   */
  isRegistered<T>(token: ServiceToken<T>): boolean {
    return token.lookup(this) !== undefined || (this.parent?.isRegistered(token) ?? false);
  }

  /** Create an instance from a service registration. */
  private createInstance<T>(registration: ServiceRegistration<T>): T {
    if (registration.isSingleton && registration.instance) {
      return registration.instance.value;
    }

    const value = registration.factory(this);

    if (registration.isSingleton) {
      registration.instance = { value };
    }

    return value;
  }
}
