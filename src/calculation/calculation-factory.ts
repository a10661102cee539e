import { UnknownOperationError } from '../errors.js';
import { OPERATIONS, OPERATION_NAMES, type Operand, type OperationName, isOperationName } from '../operations/index.js';
import { Calculation } from './calculation.js';

/**
 * Supported operation names, in the order they are listed to the user.
 */
export function getSupportedOperations(): OperationName[] {
  return [...OPERATION_NAMES];
}

export function isSupportedOperation(name: string): name is OperationName {
  return isOperationName(name);
}

/**
 * Build a Calculation for a named operation. The result is computed immediately.
 * @throws UnknownOperationError when `operationName` is not supported
 * @throws DivisionByZeroError when dividing by zero; no Calculation is created
 */
export function createCalculation(operandA: Operand, operandB: Operand, operationName: string): Calculation {
  if (!isSupportedOperation(operationName)) {
    throw new UnknownOperationError(operationName, getSupportedOperations());
  }
  return new Calculation(operandA, operandB, OPERATIONS[operationName], operationName);
}
