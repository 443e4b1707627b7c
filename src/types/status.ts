export type StackOutcome = 'success' | 'failure' | 'skipped';

export type SkipReason =
  | 'fail-fast'
  | 'dependency-failed'
  | 'skip-on-destroy'
  | 'interrupted';

export type RunState =
  | 'idle'
  | 'discovering'
  | 'graph-building'
  | 'scheduling'
  | 'executing'
  | 'completed'
  | 'aborted';

export type FinalRunState = Extract<RunState, 'completed' | 'aborted'>;

export type FailurePolicy = 'fail-fast' | 'continue';

export type ErrorKind =
  | 'DiscoveryError'
  | 'DuplicateStackNameError'
  | 'UnresolvedDependencyError'
  | 'CyclicDependencyError'
  | 'StackExecutionError'
  | 'StackNotFoundError'
  | 'ConfigurationError'
  | 'RunInterruptedError'
  | 'InternalError';

export interface ErrorSummary {
  kind: ErrorKind;
  stackNames: string[];
  message: string;
}

export interface StackRunResult {
  stackName: string;
  stackPath: string;
  operation: string;
  outcome: StackOutcome;
  exitCode: number | null;
  durationMs: number;
  output: string;
  errorMessage: string | null;
  skipReason: SkipReason | null;
}

export interface RunReport {
  state: FinalRunState;
  operation: string;
  order: readonly string[];
  results: readonly StackRunResult[];
  error: ErrorSummary | null;
  interrupted: boolean;
  exitCode: number;
}

export interface StackStatusRecord {
  stackName: string;
  operation: string;
  outcome: StackOutcome;
  exitCode: number | null;
  durationMs: number;
  errorMessage: string | null;
  skipReason: SkipReason | null;
  lastExecutedAt: string;
}
