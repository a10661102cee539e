import type { Calculator } from './calculator.js';
import { isErrorResponse } from './messages.js';

export interface EvaluationEntry {
  input: string;
  output: string;
  ok: boolean;
}

/**
 * Run a batch of lines through one calculator, stopping at the first `exit`.
 * Blank lines are skipped.
 */
export function evaluateLines(calculator: Calculator, lines: readonly string[]): EvaluationEntry[] {
  const entries: EvaluationEntry[] = [];

  for (const line of lines) {
    const input = line.trim();
    if (!input) continue;
    if (input.toLowerCase() === 'exit') break;

    const output = calculator.process(input);
    entries.push({ input, output, ok: !isErrorResponse(output) });
  }

  return entries;
}
