export * from './plan.js';
export * from './stack.js';
export * from './status.js';
