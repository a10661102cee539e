export { DIVISION_PRECISION, MAX_EXPONENT, Operand } from './operand.js';
export {
  OPERATIONS,
  OPERATION_NAMES,
  OPERATION_SYMBOLS,
  add,
  divide,
  isOperationName,
  multiply,
  subtract,
  type Operation,
  type OperationName,
} from './operation-set.js';
