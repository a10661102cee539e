import type { Command } from '@oclif/core';
import type { ChalkInstance } from 'chalk';
import { type EvaluationEntry, paintResponse } from '../../calculator/index.js';

/**
 * Output data as JSON or plain text based on the json flag.
 * @param command The command instance (for this.log)
 * @param json Whether to output as JSON
 * @param data The data to output (for JSON mode)
 * @param plainFn Function to call for plain text output
 */
export function outputJsonOrPlain<T>(command: Command, json: boolean, data: T, plainFn: () => void): void {
  if (json) {
    command.log(JSON.stringify(data, null, 2));
  } else {
    plainFn();
  }
}

/**
 * Log each response of a batch, coloured the way the interactive session colours it.
 */
export function logEvaluation(command: Command, entries: readonly EvaluationEntry[], colors: ChalkInstance): void {
  for (const entry of entries) {
    command.log(paintResponse(entry.output, colors));
  }
}
