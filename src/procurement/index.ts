export * from './domain.js';
export * from './errors.js';
export * from './money.js';
export * from './engineConfig.js';
export * from './logging.js';
export * from './keyedSequencer.js';
export * from './examples.js';
