export * from './binomial.js';
export * from './categorical.js';
export * from './exponential.js';
export * from './logistic.js';
export * from './log-normal.js';
export * from './normal.js';
export * from './positive-normal.js';
export * from './uniform.js';
export { NAN_PROPERTIES, type BoundsPlan } from './sequence.js';
