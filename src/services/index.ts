/**
 * Services module for dependency injection
 */

export {
  ServiceContainer,
  getContainer,
  createContainer,
  resetContainer,
  type Services,
  type ServiceConfig,
  type ServiceFactories,
} from './container.js';
