/**
 * @fileoverview Dependency injection container for service registration and resolution.
 * 
 * Provides a typed, token-based dependency injection container that supports
 * singleton registration, lazy initialization, and scoped containers.
 * 
 * @module core/container
 */

/** Factory function type for creating service instances. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

/** Service registration information. */
export interface ServiceRegistration<T> {
  factory: ServiceFactory<T>;
  isSingleton: boolean;
  instance?: T;
}

/**
 * Typed key for a service.
 * 
 * The token keeps each container's registration for its own service type,
 * so resolving through a token always yields that type.
 */
export class ServiceToken<T> {
  private readonly registrations = new WeakMap<ServiceContainer, ServiceRegistration<T>>();

  constructor(readonly description: string) {}

  /** @internal */
  bind(container: ServiceContainer, registration: ServiceRegistration<T>): void {
    this.registrations.set(container, registration);
  }

  /** @internal */
  lookup(container: ServiceContainer): ServiceRegistration<T> | undefined {
    return this.registrations.get(container);
  }

  toString(): string {
    return `ServiceToken(${this.description})`;
  }
}

/**
 * Dependency injection container with typed tokens.
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
   * For regular services, creates a new instance each time.
   * For singletons, returns the cached instance or creates it on first call.
   */
  resolve<T>(token: ServiceToken<T>): T {
    const registration = token.lookup(this);
    if (registration) {
      return this.createInstance(registration);
    }

    if (this.parent) {
      return this.parent.resolve(token);
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
    if (registration.isSingleton && registration.instance !== undefined) {
      return registration.instance;
    }

    const instance = registration.factory(this);

    if (registration.isSingleton) {
      registration.instance = instance;
    }

    return instance;
  }
}
