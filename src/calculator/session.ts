import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import chalk, { type ChalkInstance } from 'chalk';
import type { Calculator } from './calculator.js';
import { FAREWELL, WELCOME_BANNER, paintResponse } from './messages.js';

export const DEFAULT_PROMPT = '>>> ';

export interface SessionOptions {
  calculator: Calculator;
  input: Readable;
  output: Writable;
  prompt?: string;
  /** Print the welcome banner before the first prompt (default true) */
  banner?: boolean;
  colors?: ChalkInstance;
  /** Treat the streams as a TTY (default: whether `output` is one) */
  terminal?: boolean;
}

/**
 * Read-eval-print loop. Resolves once the user types `exit`, input ends or the
 * interface receives SIGINT.
 */
export async function runSession(options: SessionOptions): Promise<void> {
  const { calculator, input, output, prompt = DEFAULT_PROMPT, banner = true, colors = chalk } = options;

  const write = (text: string): void => {
    output.write(`${text}\n`);
  };

  if (banner) {
    write(colors.bold(WELCOME_BANNER));
  }

  const terminal = options.terminal ?? ('isTTY' in output && output.isTTY === true);
  const rl = readline.createInterface({ input, output, prompt, terminal });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => rl.close());

  rl.prompt();
  try {
    for await (const line of rl) {
      const command = line.trim();
      if (command.toLowerCase() === 'exit') {
        write(FAREWELL);
        return;
      }
      if (command) {
        write(paintResponse(calculator.process(command), colors));
      }
      if (!closed) rl.prompt();
    }
  } finally {
    rl.close();
  }

  write(`\n${FAREWELL}`);
}
