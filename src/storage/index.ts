export * from './config.js';
export * from './status-store.js';
