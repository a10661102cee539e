import { Command } from '@oclif/core';
import { Calculator, runSession } from '../calculator/index.js';
import { SharedFlags } from './_shared/index.js';

export default class Repl extends Command {
  static override description = 'Start an interactive calculator session';

  static override examples = [
    '<%= config.bin %> repl',
    '<%= config.bin %> repl --quiet',
    "<%= config.bin %> repl --prompt 'calc> '",
  ];

  static override flags = {
    prompt: SharedFlags.prompt,
    quiet: SharedFlags.quiet,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Repl);

    await runSession({
      calculator: new Calculator(),
      input: process.stdin,
      output: process.stdout,
      prompt: flags.prompt,
      banner: !flags.quiet,
    });
  }
}
