export * from './types/index.js';
export * from './core/errors.js';
export { locateStacks, type LocateStacksOptions } from './core/stack-locator.js';
export { parseStackDeclaration, readStackDeclaration } from './core/stack-declaration.js';
export {
  buildDependencyGraph,
  detectCycle,
  compareNames,
  type DependencyGraph,
} from './core/dependency-graph.js';
export { computeApplyOrder, createExecutionPlan, directionFor } from './core/scheduler.js';
export {
  resolveVarFiles,
  resolveEnvFiles,
  buildProcessEnv,
  resolveStackEnv,
} from './core/environment.js';
export {
  spawnProcess,
  createDryRunRunner,
  type ProcessRequest,
  type ProcessOutcome,
  type ProcessRunner,
} from './core/process.js';
export { buildProvisionerArgs, executeStack, type ExecutionCallbacks } from './core/executor.js';
export {
  runStacks,
  previewPlan,
  computeExitCode,
  createRunStateMachine,
  type RunStacksOptions,
  type RunCallbacks,
} from './core/coordinator.js';
export { findStack, suggestStackNames, validateStacks } from './core/stack-manager.js';
export { cleanStacks } from './core/cleaner.js';
export * from './storage/index.js';
export { createLogger, createSilentLogger, type Logger, type LogLevel } from './utils/logger.js';
