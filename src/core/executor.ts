import { resolveStackEnv } from './environment.js';
import {
  describeError,
  StackExecutionError,
  type StackExecutionFailure,
} from './errors.js';
import { spawnProcess, type ProcessOutcome, type ProcessRunner } from './process.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { Config } from '../storage/config.js';
import {
  AUTO_APPROVE_OPERATIONS,
  VAR_FILE_OPERATIONS,
  type SkipReason,
  type Stack,
  type StackRunResult,
} from '../types/index.js';

export interface ExecutionCallbacks {
  onStackStart?: (stack: Stack, args: readonly string[]) => void;
  onStackComplete?: (result: StackRunResult) => void;
  onOutput?: (stackName: string, data: string) => void;
}

export type ExecutorConfig = Pick<Config, 'provisionerBin' | 'autoApprove' | 'timeoutMs'>;

export interface StackExecution {
  result: StackRunResult;
  error: StackExecutionError | null;
}

/**
 * Build the provisioner argument vector:
 * operation, -auto-approve, -var-file=..., then forwarded args
 */
export const buildProvisionerArgs = ({
  operation,
  varFiles,
  autoApprove,
  providerArgs = [],
}: {
  operation: string;
  varFiles: readonly string[];
  autoApprove: boolean;
  providerArgs?: readonly string[];
}): string[] => [
  operation,
  ...(autoApprove && AUTO_APPROVE_OPERATIONS.has(operation) ? ['-auto-approve'] : []),
  ...(VAR_FILE_OPERATIONS.has(operation)
    ? varFiles.map((varFile) => `-var-file=${varFile}`)
    : []),
  ...providerArgs,
];

const describeFailure = ({
  outcome,
  provisionerBin,
  timeoutMs,
}: {
  outcome: ProcessOutcome;
  provisionerBin: string;
  timeoutMs: number | null;
}): { message: string; reason: StackExecutionFailure } | null => {
  if (outcome.launchError) {
    return {
      message: `Failed to launch '${provisionerBin}': ${outcome.launchError.message}`,
      reason: 'launch',
    };
  }
  if (outcome.interrupted) return { message: 'Interrupted', reason: 'interrupted' };
  if (outcome.timedOut) {
    return { message: `Timed out after ${timeoutMs ?? 0}ms`, reason: 'timeout' };
  }
  if (outcome.exitCode === 0) return null;
  if (outcome.exitCode === null) {
    return {
      message: `Process terminated by ${outcome.signal ?? 'unknown signal'}`,
      reason: 'exit',
    };
  }
  return { message: `Process exited with code ${outcome.exitCode}`, reason: 'exit' };
};

export const createSkippedResult = ({
  stack,
  operation,
  skipReason,
}: {
  stack: Stack;
  operation: string;
  skipReason: SkipReason;
}): StackRunResult => ({
  stackName: stack.stackName,
  stackPath: stack.stackPath,
  operation,
  outcome: 'skipped',
  exitCode: null,
  durationMs: 0,
  output: '',
  errorMessage: null,
  skipReason,
});

/**
 * Run the provisioner once for one stack.
 *
 * Never throws for process failures; they are returned as a failed result
 * alongside the matching StackExecutionError.
 */
export const executeStack = async ({
  stack,
  operation,
  providerArgs = [],
  config,
  baseEnv = process.env,
  runner = spawnProcess,
  signal,
  callbacks,
  killGraceMs,
  logger = createSilentLogger(),
}: {
  stack: Stack;
  operation: string;
  providerArgs?: readonly string[];
  config: ExecutorConfig;
  baseEnv?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  callbacks?: ExecutionCallbacks;
  killGraceMs?: number;
  logger?: Logger;
}): Promise<StackExecution> => {
  const args = buildProvisionerArgs({
    operation,
    varFiles: stack.varFiles,
    autoApprove: config.autoApprove,
    providerArgs,
  });

  callbacks?.onStackStart?.(stack, args);

  let env: Record<string, string>;
  try {
    env = await resolveStackEnv({ envFiles: stack.envFiles, baseEnv });
  } catch (error) {
    const loadError = new StackExecutionError({
      stackName: stack.stackName,
      message: `Failed to load env files: ${describeError(error)}`,
      exitCode: null,
      reason: 'launch',
      cause: error,
    });
    const result: StackRunResult = {
      stackName: stack.stackName,
      stackPath: stack.stackPath,
      operation,
      outcome: 'failure',
      exitCode: null,
      durationMs: 0,
      output: '',
      errorMessage: loadError.message,
      skipReason: null,
    };
    callbacks?.onStackComplete?.(result);
    return { result, error: loadError };
  }

  logger.debug(
    `Running ${[config.provisionerBin, ...args].join(' ')} in ${stack.workingDirectory}`
  );

  const outcome = await runner({
    command: config.provisionerBin,
    args,
    cwd: stack.workingDirectory,
    env,
    timeoutMs: config.timeoutMs,
    killGraceMs,
    signal,
    onOutput: (data) => callbacks?.onOutput?.(stack.stackName, data),
  });

  const failure = describeFailure({
    outcome,
    provisionerBin: config.provisionerBin,
    timeoutMs: config.timeoutMs,
  });

  const result: StackRunResult = {
    stackName: stack.stackName,
    stackPath: stack.stackPath,
    operation,
    outcome: failure ? 'failure' : 'success',
    exitCode: outcome.exitCode,
    durationMs: outcome.durationMs,
    output: outcome.output,
    errorMessage: failure?.message ?? null,
    skipReason: null,
  };

  callbacks?.onStackComplete?.(result);

  return {
    result,
    error: failure
      ? new StackExecutionError({
          stackName: stack.stackName,
          message: failure.message,
          exitCode: outcome.exitCode,
          reason: failure.reason,
          cause: outcome.launchError ?? undefined,
        })
      : null,
  };
};
