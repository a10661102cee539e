import type { ChalkInstance } from 'chalk';
import { getSupportedOperations } from '../calculation/index.js';

export const ERROR_PREFIX = 'Error:';
export const RESULT_PREFIX = 'Result:';

export const NO_HISTORY = 'No calculations in history.';
export const HISTORY_CLEARED = 'History cleared.';
export const DIVISION_BY_ZERO = `${ERROR_PREFIX} Division by zero is not allowed.`;
export const FAREWELL = 'Goodbye!';

export const WELCOME_BANNER = [
  '================================',
  '   Welcome to the Calculator!',
  '================================',
  "Type 'help' for available commands.",
  "Type 'exit' to quit.",
].join('\n');

export const INVALID_FORMAT = [
  `${ERROR_PREFIX} Invalid format. Please use: <operation> <number1> <number2>`,
  'Example: add 5 3',
  "Type 'help' for available commands.",
].join('\n');

export function unknownOperation(operationName: string): string {
  return [
    `${ERROR_PREFIX} Unknown operation '${operationName}'.`,
    `Available operations: ${getSupportedOperations().join(', ')}`,
    "Type 'help' for more information.",
  ].join('\n');
}

export function invalidNumbers(rawA: string, rawB: string): string {
  return `${ERROR_PREFIX} '${rawA}' and/or '${rawB}' are not valid numbers. Please enter numeric values.`;
}

export function helpText(): string {
  return [
    '=== Calculator Help ===',
    '',
    'Usage: <operation> <number1> <number2>',
    '',
    `Operations: ${getSupportedOperations().join(', ')}`,
    '',
    'Examples:',
    '  add 5 3        => 5 + 3 = 8',
    '  subtract 10 4  => 10 - 4 = 6',
    '  multiply 6 7   => 6 * 7 = 42',
    '  divide 20 4    => 20 / 4 = 5',
    '',
    'Special commands:',
    '  help / ?   - Show this help message',
    '  history    - Show calculation history',
    '  clear      - Clear calculation history',
    '  exit       - Exit the calculator',
  ].join('\n');
}

export function isErrorResponse(response: string): boolean {
  return response.startsWith(ERROR_PREFIX);
}

/**
 * Colour a response for the terminal: errors red, results green, everything else untouched.
 */
export function paintResponse(response: string, colors: ChalkInstance): string {
  if (isErrorResponse(response)) return colors.red(response);
  if (response.startsWith(RESULT_PREFIX)) return colors.green(response);
  return response;
}
