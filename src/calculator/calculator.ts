import {
  type Calculation,
  CalculationHistory,
  createCalculation,
  isSupportedOperation,
} from '../calculation/index.js';
import { DivisionByZeroError, UnknownOperationError } from '../errors.js';
import { Operand, type OperationName } from '../operations/index.js';
import {
  DIVISION_BY_ZERO,
  ERROR_PREFIX,
  HISTORY_CLEARED,
  INVALID_FORMAT,
  NO_HISTORY,
  RESULT_PREFIX,
  helpText,
  invalidNumbers,
  unknownOperation,
} from './messages.js';

type ArithmeticCommand =
  | { valid: true; operationName: OperationName; rawA: string; rawB: string }
  | { valid: false; message: string };

/**
 * Check the shape of `<operation> <number1> <number2>` before any numeric work.
 */
function parseArithmeticCommand(parts: string[]): ArithmeticCommand {
  if (parts.length !== 3) {
    return { valid: false, message: INVALID_FORMAT };
  }

  const [operationName, rawA, rawB] = parts;
  if (!isSupportedOperation(operationName)) {
    return { valid: false, message: unknownOperation(operationName) };
  }

  return { valid: true, operationName, rawA, rawB };
}

/**
 * Interprets one line of input at a time and answers with one line (or block) of text.
 * Owns the history of its session.
 */
export class Calculator {
  constructor(readonly history: CalculationHistory = new CalculationHistory()) {}

  /**
   * Handle a control command (`help`, `?`, `history`, `clear`) or an arithmetic command.
   * User mistakes come back as `Error: ...` strings; only a successful calculation
   * is added to the history, and only `clear` removes from it.
   */
  process(input: string): string {
    const command = input.trim().toLowerCase();

    if (command === 'help' || command === '?') return helpText();
    if (command === 'history') return this.formatHistory();
    if (command === 'clear') {
      this.history.clear();
      return HISTORY_CLEARED;
    }

    const parsed = parseArithmeticCommand(command.split(/\s+/));
    if (!parsed.valid) return parsed.message;

    const { operationName, rawA, rawB } = parsed;
    const operandA = Operand.parse(rawA);
    const operandB = Operand.parse(rawB);
    if (!operandA || !operandB) {
      return invalidNumbers(rawA, rawB);
    }

    let calculation: Calculation;
    try {
      calculation = createCalculation(operandA, operandB, operationName);
    } catch (error) {
      if (error instanceof DivisionByZeroError) return DIVISION_BY_ZERO;
      if (error instanceof UnknownOperationError) return `${ERROR_PREFIX} ${error.message}`;
      throw error;
    }

    const response = `${RESULT_PREFIX} ${calculation}`;
    this.history.add(calculation);
    return response;
  }

  private formatHistory(): string {
    const calculations = this.history.getAll();
    if (calculations.length === 0) return NO_HISTORY;

    const lines = ['=== Calculation History ==='];
    calculations.forEach((calculation, i) => {
      lines.push(`  ${i + 1}. ${calculation}`);
    });
    lines.push('', `Total: ${calculations.length} calculation(s)`);
    return lines.join('\n');
  }
}
