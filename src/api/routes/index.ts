export { registerValidationRoutes } from './validation';
