/**
 * Dependency Injection Container
 *
 * Holds services and use cases under names declared by the registry type.
 */
export class DIContainer<S extends object> {
  private services: Partial<S> = {};

  /**
   * Register a service
   */
  register<K extends keyof S>(name: K, service: S[K]): void {
    this.services[name] = service;
  }

  /**
   * Resolve a service
   */
  resolve<K extends keyof S>(name: K): S[K] {
    const service: S[K] | undefined = this.services[name];
    if (service === undefined) {
      throw new Error(`Service not found: ${String(name)}`);
    }
    return service;
  }
}
