export { runCommand, runAllCommand, executeOperation } from './run.js';
export { lsCommand } from './ls.js';
export { graphCommand } from './graph.js';
export { validateCommand } from './validate.js';
export { statusCommand } from './status.js';
export { cleanCommand } from './clean.js';
export { passthroughCommand } from './passthrough.js';
