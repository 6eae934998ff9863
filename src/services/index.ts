/**
 * Services module for dependency injection
 */

export {
  ServiceContainer,
  getContainer,
  createContainer,
  resetContainer,
  type Services,
  type ServiceFactories,
  type QuestionBank,
} from './container.js';
