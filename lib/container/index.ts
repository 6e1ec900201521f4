/**
 * Container Module Exports
 *
 * Provides dependency injection container functionality
 * with service registration and type-safe resolution.
 */

export { Container, type ServiceFactory } from './container.ts';
export {
  registerServices,
  initializeContainer,
  validateServiceRegistration,
  ServiceKeys,
  type AppContainer,
  type AppServices,
  type ServiceKey,
  type ServiceRegistryConfig,
} from './registry.ts';
