export { Calculator } from './calculator.js';
export { evaluateLines, type EvaluationEntry } from './evaluate.js';
export { DEFAULT_PROMPT, runSession, type SessionOptions } from './session.js';
export { isErrorResponse, paintResponse } from './messages.js';
