import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';
import { helpText, invalidNumbers, isErrorResponse, paintResponse } from '../../src/calculator/messages.js';

describe('messages', () => {
  it('detects error responses by prefix', () => {
    expect(isErrorResponse('Error: Division by zero is not allowed.')).toBe(true);
    expect(isErrorResponse('Result: 1 + 1 = 2')).toBe(false);
    expect(isErrorResponse('History cleared.')).toBe(false);
  });

  it('colours errors red and results green', () => {
    const colors = new Chalk({ level: 1 });

    expect(paintResponse('Error: nope', colors)).toBe('\u001B[31mError: nope\u001B[39m');
    expect(paintResponse('Result: 1 + 1 = 2', colors)).toBe('\u001B[32mResult: 1 + 1 = 2\u001B[39m');
    expect(paintResponse('History cleared.', colors)).toBe('History cleared.');
  });

  it('quotes both raw operands in the invalid number message', () => {
    expect(invalidNumbers('x', '2')).toBe("Error: 'x' and/or '2' are not valid numbers. Please enter numeric values.");
  });

  it('starts help with a title and usage line', () => {
    expect(helpText().split('\n').slice(0, 3)).toEqual([
      '=== Calculator Help ===',
      '',
      'Usage: <operation> <number1> <number2>',
    ]);
  });
});
