/**
 * @fileoverview Dependency injection container for service registration and resolution.
 *
 * Provides a Symbol-based container with lazily built singletons. Services
 * that would otherwise be process-wide globals (the exclusivity controller,
 * the default work queue) are registered here by the composition root
 * instead.
 *
 * @module core/container
 */

/** Factory function type for creating service instances. */
export type ServiceFactory<T> = (container: ServiceContainer) => T;

/** Service registration information. */
interface ServiceRegistration<T> {
  factory: ServiceFactory<T>;
  /** Cached singleton, boxed so that `undefined` is a valid instance */
  cached?: { value: T };
}

/**
 * Dependency injection container with Symbol-based tokens.
 */
export class ServiceContainer {
  private readonly services = new Map<symbol, ServiceRegistration<unknown>>();

  /**
   * Register a singleton service factory. Creates only one instance, cached after first resolve().
   */
  registerSingleton<T>(token: symbol, factory: ServiceFactory<T>): void {
    this.services.set(token, { factory });
  }

  /**
   * Resolve a service instance, building it on first call.
   */
  resolve<T>(token: symbol): T {
    const registration = this.services.get(token);
    if (!registration) {
      throw new Error(`Service not registered: ${token.toString()}`);
    }
    // Tokens are registered and resolved with the same T by convention
    return this.createInstance(registration as ServiceRegistration<T>);
  }

  /**
   * Check if a service is registered.
   */
  isRegistered(token: symbol): boolean {
    return this.services.has(token);
  }

  /**
   * Instances created so far, in registration order.
   */
  createdSingletons(): unknown[] {
    const instances: unknown[] = [];
    for (const registration of this.services.values()) {
      if (registration.cached) {
        instances.push(registration.cached.value);
      }
    }
    return instances;
  }

  /** Create an instance from a service registration. */
  private createInstance<T>(registration: ServiceRegistration<T>): T {
    if (registration.cached) {
      return registration.cached.value;
    }
    const instance = registration.factory(this);
    registration.cached = { value: instance };
    return instance;
  }
}
