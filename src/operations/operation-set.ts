import type { Operand } from './operand.js';

export const OPERATION_NAMES = ['add', 'subtract', 'multiply', 'divide'] as const;

export type OperationName = (typeof OPERATION_NAMES)[number];

export type Operation = (a: Operand, b: Operand) => Operand;

export function add(a: Operand, b: Operand): Operand {
  return a.plus(b);
}

export function subtract(a: Operand, b: Operand): Operand {
  return a.minus(b);
}

export function multiply(a: Operand, b: Operand): Operand {
  return a.times(b);
}

/**
 * @throws DivisionByZeroError when `b` is zero
 */
export function divide(a: Operand, b: Operand): Operand {
  return a.dividedBy(b);
}

/**
 * Name-to-function lookup. A new operation needs a name in {@link OPERATION_NAMES} and an entry here.
 */
export const OPERATIONS: Readonly<Record<OperationName, Operation>> = {
  add,
  subtract,
  multiply,
  divide,
};

export const OPERATION_SYMBOLS: Readonly<Record<OperationName, string>> = {
  add: '+',
  subtract: '-',
  multiply: '*',
  divide: '/',
};

export function isOperationName(name: string): name is OperationName {
  return OPERATION_NAMES.some((operation) => operation === name);
}
