/**
 * Dependency Injection Container
 *
 * Provides service registration and resolution with singleton pattern
 * and type safety for dependency management. `Services` maps each key to
 * the type its factory produces.
 */

export type ServiceFactory<T> = () => T;

type Resolvers<Services> = {
  [K in keyof Services]?: () => Services[K];
};

export class Container<Services extends object> {
  private resolvers: Resolvers<Services> = {};
  private readonly keys: (keyof Services)[] = [];

  /**
   * Register a service factory with the container
   * @param key - Unique service identifier
   * @param factory - Function that creates the service instance
   */
  register<K extends keyof Services>(key: K, factory: ServiceFactory<Services[K]>): void {
    if (this.resolvers[key]) {
      throw new Error(`Service ${String(key)} is already registered`);
    }

    let instance: { value: Services[K] } | undefined;
    this.resolvers[key] = () => {
      if (!instance) {
        instance = { value: factory() };
      }
      return instance.value;
    };
    this.keys.push(key);
  }

  /**
   * Get a service instance (singleton pattern)
   * @param key - Service identifier
   */
  get<K extends keyof Services>(key: K): Services[K] {
    const resolve = this.resolvers[key];
    if (!resolve) {
      throw new Error(`Service ${String(key)} not registered`);
    }

    try {
      return resolve();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to create service ${String(key)}: ${errorMessage}`, { cause: error });
    }
  }

  /**
   * Check if a service is registered
   */
  has(key: keyof Services): boolean {
    return this.resolvers[key] !== undefined;
  }

  /**
   * Clear all services and factories (useful for testing)
   */
  clear(): void {
    this.resolvers = {};
    this.keys.length = 0;
  }

  /**
   * Get all registered service keys
   */
  getRegisteredKeys(): (keyof Services)[] {
    return [...this.keys];
  }
}
