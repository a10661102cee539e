import { type Operand, type Operation, OPERATION_SYMBOLS, isOperationName } from '../operations/index.js';

export interface CalculationJson {
  operandA: string;
  operandB: string;
  operation: string;
  result: string;
}

/**
 * One arithmetic calculation. The result is computed in the constructor and the
 * instance is frozen, so a Calculation with a missing or stale result cannot exist.
 */
export class Calculation {
  readonly result: Operand;

  /**
   * @throws DivisionByZeroError when `operation` is division and `operandB` is zero
   */
  constructor(
    readonly operandA: Operand,
    readonly operandB: Operand,
    operation: Operation,
    readonly operationName: string
  ) {
    this.result = operation(operandA, operandB);
    Object.freeze(this);
  }

  get symbol(): string {
    // Records built outside the factory may carry any name.
    return isOperationName(this.operationName) ? OPERATION_SYMBOLS[this.operationName] : this.operationName;
  }

  /**
   * Debug form, e.g. `Calculation(5, 3, add) = 8`.
   */
  describe(): string {
    return `Calculation(${this.operandA}, ${this.operandB}, ${this.operationName}) = ${this.result}`;
  }

  toString(): string {
    return `${this.operandA} ${this.symbol} ${this.operandB} = ${this.result}`;
  }

  toJSON(): CalculationJson {
    return {
      operandA: this.operandA.toString(),
      operandB: this.operandB.toString(),
      operation: this.operationName,
      result: this.result.toString(),
    };
  }
}
