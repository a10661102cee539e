import { Flags } from '@oclif/core';
import { DEFAULT_PROMPT } from '../../calculator/index.js';

/**
 * Shared flag definitions for consistent CLI experience across commands.
 */
export const SharedFlags = {
  json: Flags.boolean({
    description: 'Output as JSON',
    default: false,
  }),

  prompt: Flags.string({
    description: 'Prompt shown before each line',
    default: DEFAULT_PROMPT,
    env: 'CALCLINE_PROMPT',
  }),

  quiet: Flags.boolean({
    char: 'q',
    description: 'Do not print the welcome banner',
    default: false,
  }),
};
