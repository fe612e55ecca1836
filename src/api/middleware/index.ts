export { errorHandler, createError, ApiError } from './errorHandler';
