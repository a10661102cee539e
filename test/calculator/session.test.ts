import { PassThrough, Readable, Writable } from 'node:stream';
import { Chalk } from 'chalk';
import { describe, expect, it } from 'vitest';
import { Calculator } from '../../src/calculator/calculator.js';
import { runSession } from '../../src/calculator/session.js';

function collectOutput() {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join('') };
}

const plain = new Chalk({ level: 0 });

describe('runSession', () => {
  it('answers each line and stops at exit', async () => {
    const calculator = new Calculator();
    const { output, text } = collectOutput();

    await runSession({
      calculator,
      input: Readable.from(['add 2 3\nhistory\nexit\nadd 9 9\n']),
      output,
      colors: plain,
    });

    expect(text()).toContain('Welcome to the Calculator!');
    expect(text()).toContain('>>> Result: 2 + 3 = 5\n');
    expect(text()).toContain('  1. 2 + 3 = 5\n');
    expect(text().endsWith('Goodbye!\n')).toBe(true);
    expect(calculator.history.size).toBe(1);
  });

  it('says goodbye when input ends without exit', async () => {
    const { output, text } = collectOutput();

    await runSession({
      calculator: new Calculator(),
      input: Readable.from(['multiply 4 5\n']),
      output,
      colors: plain,
    });

    expect(text()).toContain('Result: 4 * 5 = 20\n');
    expect(text().endsWith('\nGoodbye!\n')).toBe(true);
  });

  it('skips empty lines', async () => {
    const calculator = new Calculator();
    const { output, text } = collectOutput();

    await runSession({
      calculator,
      input: Readable.from(['\n   \nadd 1 1\n']),
      output,
      colors: plain,
    });

    expect(text()).not.toContain('Error:');
    expect(calculator.history.size).toBe(1);
  });

  it('uses a custom prompt and can omit the banner', async () => {
    const { output, text } = collectOutput();

    await runSession({
      calculator: new Calculator(),
      input: Readable.from(['EXIT\n']),
      output,
      prompt: 'calc> ',
      banner: false,
      colors: plain,
    });

    expect(text()).toBe('calc> Goodbye!\n');
  });

  it('colours error responses', async () => {
    const colors = new Chalk({ level: 1 });
    const { output, text } = collectOutput();

    await runSession({
      calculator: new Calculator(),
      input: Readable.from(['divide 1 0\nexit\n']),
      output,
      banner: false,
      colors,
    });

    expect(text()).toContain(`${colors.red('Error: Division by zero is not allowed.')}\n`);
  });

  it('says goodbye when interrupted with Ctrl+C', async () => {
    const calculator = new Calculator();
    const input = new PassThrough();
    const { output, text } = collectOutput();

    const session = runSession({ calculator, input, output, banner: false, colors: plain, terminal: true });
    input.write('\u0003');
    await session;

    expect(text().endsWith('\nGoodbye!\n')).toBe(true);
    expect(calculator.history.size).toBe(0);
  });
});
