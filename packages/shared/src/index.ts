export * from './types/events.js';
export { EventValidationError } from './errors.js';
