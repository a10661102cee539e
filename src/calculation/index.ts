export { Calculation, type CalculationJson } from './calculation.js';
export { createCalculation, getSupportedOperations, isSupportedOperation } from './calculation-factory.js';
export { CalculationHistory } from './calculation-history.js';
