import { Args, Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import { Calculator, evaluateLines } from '../calculator/index.js';
import { SharedFlags, logEvaluation, outputJsonOrPlain, readStdin, splitLines } from './_shared/index.js';

export default class Eval extends Command {
  static override description = 'Evaluate calculator commands in one session without prompting';

  static override strict = false;

  static override args = {
    lines: Args.string({
      description: 'Commands to evaluate in order; read from stdin when omitted',
    }),
  };

  static override examples = [
    `<%= config.bin %> eval "add 2 3" "multiply 4 5" history`,
    `printf 'divide 1 3\\nhistory\\n' | <%= config.bin %> eval`,
    '<%= config.bin %> eval "divide 10 0" --json --strict',
  ];

  static override flags = {
    json: SharedFlags.json,
    strict: Flags.boolean({
      description: 'Exit with status 1 if any command fails',
      default: false,
    }),
  };

  public async run(): Promise<void> {
    const { argv, flags } = await this.parse(Eval);

    const args = argv.filter((arg): arg is string => typeof arg === 'string');
    const lines = args.length > 0 ? args : await this.readPipedLines();

    const entries = evaluateLines(new Calculator(), lines);

    outputJsonOrPlain(this, flags.json, entries, () => {
      logEvaluation(this, entries, chalk);
    });

    if (flags.strict && entries.some((entry) => !entry.ok)) {
      this.exit(1);
    }
  }

  private async readPipedLines(): Promise<string[]> {
    try {
      return splitLines(await readStdin());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.error(chalk.red(message));
    }
  }
}
