export { ValidationPipe, flattenValidationErrors } from './validation.pipe';
