export { DivisionByZeroError, UnknownOperationError } from './errors.js';
export * from './operations/index.js';
export * from './calculation/index.js';
export * from './calculator/index.js';
