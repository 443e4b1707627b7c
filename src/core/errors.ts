import type { ErrorKind, ErrorSummary } from '../types/index.js';

/**
 * Base class for every error the engine raises on purpose.
 *
 * `kind` is the discriminant used in run summaries; `stackNames` lists the
 * stacks an operator has to look at to fix the problem.
 */
export class StackrunError extends Error {
  readonly kind: ErrorKind;
  readonly stackNames: string[];

  constructor({
    kind,
    message,
    stackNames = [],
    cause,
  }: {
    kind: ErrorKind;
    message: string;
    stackNames?: string[];
    cause?: unknown;
  }) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = kind;
    this.kind = kind;
    this.stackNames = stackNames;
  }

  toSummary(): ErrorSummary {
    return {
      kind: this.kind,
      stackNames: [...this.stackNames],
      message: this.message,
    };
  }
}

export class DiscoveryError extends StackrunError {
  readonly path: string;

  constructor({
    message,
    path,
    cause,
  }: {
    message: string;
    path: string;
    cause?: unknown;
  }) {
    super({ kind: 'DiscoveryError', message, cause });
    this.path = path;
  }
}

export class DuplicateStackNameError extends StackrunError {
  readonly paths: string[];

  constructor({ stackName, paths }: { stackName: string; paths: string[] }) {
    super({
      kind: 'DuplicateStackNameError',
      message: `Duplicate stack name '${stackName}' found at: ${paths.join(', ')}`,
      stackNames: [stackName],
    });
    this.paths = paths;
  }
}

export class UnresolvedDependencyError extends StackrunError {
  readonly stackName: string;
  readonly dependencyName: string;

  constructor({
    stackName,
    dependencyName,
  }: {
    stackName: string;
    dependencyName: string;
  }) {
    super({
      kind: 'UnresolvedDependencyError',
      message: `Stack '${stackName}' depends on unknown stack '${dependencyName}'`,
      stackNames: [stackName],
    });
    this.stackName = stackName;
    this.dependencyName = dependencyName;
  }
}

export class CyclicDependencyError extends StackrunError {
  readonly cycle: string[];

  constructor({ cycle }: { cycle: string[] }) {
    const loop = cycle.length > 0 ? [...cycle, cycle[0]] : cycle;
    super({
      kind: 'CyclicDependencyError',
      message: `Circular dependency detected: ${loop.join(' -> ')}`,
      stackNames: cycle,
    });
    this.cycle = cycle;
  }
}

export type StackExecutionFailure = 'exit' | 'launch' | 'timeout' | 'interrupted';

export class StackExecutionError extends StackrunError {
  readonly stackName: string;
  readonly exitCode: number | null;
  readonly reason: StackExecutionFailure;

  constructor({
    stackName,
    message,
    exitCode,
    reason,
    cause,
  }: {
    stackName: string;
    message: string;
    exitCode: number | null;
    reason: StackExecutionFailure;
    cause?: unknown;
  }) {
    super({
      kind: 'StackExecutionError',
      message,
      stackNames: [stackName],
      cause,
    });
    this.stackName = stackName;
    this.exitCode = exitCode;
    this.reason = reason;
  }
}

export class StackNotFoundError extends StackrunError {
  readonly suggestions: string[];

  constructor({
    stackName,
    suggestions,
  }: {
    stackName: string;
    suggestions: string[];
  }) {
    const hint =
      suggestions.length > 0 ? ` Did you mean: ${suggestions.join(', ')}?` : '';
    super({
      kind: 'StackNotFoundError',
      message: `Stack '${stackName}' not found.${hint}`,
      stackNames: [stackName],
    });
    this.suggestions = suggestions;
  }
}

export class ConfigurationError extends StackrunError {
  constructor({ message, cause }: { message: string; cause?: unknown }) {
    super({ kind: 'ConfigurationError', message, cause });
  }
}

export class RunInterruptedError extends StackrunError {
  constructor({ stackNames = [] }: { stackNames?: string[] } = {}) {
    super({ kind: 'RunInterruptedError', message: 'Run interrupted', stackNames });
  }
}

export class InternalError extends StackrunError {
  constructor({ message, cause }: { message: string; cause?: unknown }) {
    super({ kind: 'InternalError', message, cause });
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Summarize any thrown value; foreign errors become `InternalError`
 */
export const summarizeError = (error: unknown): ErrorSummary =>
  error instanceof StackrunError
    ? error.toSummary()
    : { kind: 'InternalError', stackNames: [], message: describeError(error) };

/**
 * Check whether a Node.js system error carries one of the given codes
 */
export const hasErrorCode = (error: unknown, ...codes: string[]): boolean =>
  error instanceof Error &&
  'code' in error &&
  typeof error.code === 'string' &&
  codes.includes(error.code);
