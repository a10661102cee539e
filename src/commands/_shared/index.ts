export { SharedFlags } from './flags.js';
export { logEvaluation, outputJsonOrPlain } from './output.js';
export { readStdin, splitLines } from './stdin.js';
