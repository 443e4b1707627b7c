import { buildDependencyGraph, type DependencyGraph } from './dependency-graph.js';
import {
  InternalError,
  RunInterruptedError,
  StackNotFoundError,
  summarizeError,
} from './errors.js';
import {
  createSkippedResult,
  executeStack,
  type ExecutionCallbacks,
} from './executor.js';
import type { ProcessRunner } from './process.js';
import { createExecutionPlan } from './scheduler.js';
import { locateStacks } from './stack-locator.js';
import { suggestStackNames } from './stack-manager.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { Config } from '../storage/config.js';
import type {
  ErrorSummary,
  ExecutionPlan,
  FinalRunState,
  RunReport,
  RunState,
  SkipReason,
  Stack,
  StackRunResult,
} from '../types/index.js';

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['discovering', 'aborted'],
  discovering: ['graph-building', 'aborted'],
  'graph-building': ['scheduling', 'aborted'],
  scheduling: ['executing', 'aborted'],
  executing: ['completed', 'aborted'],
  completed: [],
  aborted: [],
};

export const INTERRUPTED_EXIT_CODE = 130;

export interface RunStateMachine {
  readonly state: RunState;
  transition(next: RunState): void;
}

/**
 * Track the run lifecycle; an illegal transition is an engine bug
 */
export const createRunStateMachine = ({
  onStateChange,
}: {
  onStateChange?: (next: RunState, previous: RunState) => void;
} = {}): RunStateMachine => {
  let state: RunState = 'idle';

  return {
    get state() {
      return state;
    },
    transition(next) {
      if (!TRANSITIONS[state].includes(next)) {
        throw new InternalError({
          message: `Illegal run state transition: ${state} -> ${next}`,
        });
      }
      const previous = state;
      state = next;
      onStateChange?.(next, previous);
    },
  };
};

export const computeExitCode = ({
  state,
  interrupted,
  results,
}: {
  state: FinalRunState;
  interrupted: boolean;
  results: readonly StackRunResult[];
}): number => {
  if (interrupted) return INTERRUPTED_EXIT_CODE;
  if (state === 'aborted') return 1;
  return results.some((result) => result.outcome === 'failure') ? 1 : 0;
};

export interface RunCallbacks extends ExecutionCallbacks {
  onStateChange?: (next: RunState, previous: RunState) => void;
  onPlan?: (plan: ExecutionPlan, graph: DependencyGraph) => void;
  onStackSkipped?: (result: StackRunResult) => void;
}

export interface RunStacksOptions {
  rootPath: string;
  operation: string;
  config: Config;
  environment?: string | null;
  /** Restrict the run to one stack, looked up by name */
  targetStack?: string | null;
  /** Already-discovered stacks; skips the filesystem walk */
  stacks?: readonly Stack[];
  providerArgs?: readonly string[];
  baseEnv?: NodeJS.ProcessEnv;
  runner?: ProcessRunner;
  signal?: AbortSignal;
  killGraceMs?: number;
  callbacks?: RunCallbacks;
  logger?: Logger;
}

const freezeReport = (report: RunReport): RunReport =>
  Object.freeze({ ...report, results: Object.freeze([...report.results]) });

/**
 * Narrow a plan to one stack. The stack still goes through the same
 * skip rules as in a full run.
 */
const selectTarget = ({
  plan,
  graph,
  targetStack,
}: {
  plan: ExecutionPlan;
  graph: DependencyGraph;
  targetStack: string;
}): ExecutionPlan => {
  if (!graph.stacks.has(targetStack)) {
    throw new StackNotFoundError({
      stackName: targetStack,
      suggestions: suggestStackNames({
        stackName: targetStack,
        stackNames: [...graph.stacks.keys()],
      }),
    });
  }
  return { ...plan, order: Object.freeze([targetStack]) };
};

/**
 * Drive a whole run: discover, build the graph, schedule, then execute
 * each stack in plan order.
 *
 * Engine errors never escape; they end the run in the aborted state with
 * the error summarized on the report.
 */
export const runStacks = async ({
  rootPath,
  operation,
  config,
  environment = null,
  targetStack = null,
  stacks: providedStacks,
  providerArgs = [],
  baseEnv = process.env,
  runner,
  signal,
  killGraceMs,
  callbacks,
  logger = createSilentLogger(),
}: RunStacksOptions): Promise<RunReport> => {
  const machine = createRunStateMachine({ onStateChange: callbacks?.onStateChange });
  const results: StackRunResult[] = [];
  let order: readonly string[] = [];
  let interrupted = false;

  const finish = (state: FinalRunState, error: ErrorSummary | null): RunReport => {
    machine.transition(state);
    return freezeReport({
      state,
      operation,
      order,
      results,
      error,
      interrupted,
      exitCode: computeExitCode({ state, interrupted, results }),
    });
  };

  try {
    machine.transition('discovering');
    const stacks =
      providedStacks ??
      (await locateStacks({
        rootPath,
        maxDepth: config.maxDiscoveryDepth,
        stackFileName: config.stackFileName,
        provisionerFiles: config.provisionerFiles,
        environment,
        logger,
      }));

    if (stacks.length === 0) {
      logger.warn(`No stacks found under ${rootPath}`);
    }

    machine.transition('graph-building');
    const graph = buildDependencyGraph({ stacks });

    machine.transition('scheduling');
    const fullPlan = createExecutionPlan({ graph, operation });
    const plan =
      targetStack === null
        ? fullPlan
        : selectTarget({ plan: fullPlan, graph, targetStack });
    order = plan.order;
    callbacks?.onPlan?.(plan, graph);

    machine.transition('executing');

    const failed = new Set<string>();
    let haltReason: SkipReason | null = null;
    let firstError: ErrorSummary | null = null;
    let launchFailed = false;

    const skip = (stack: Stack, skipReason: SkipReason): void => {
      const result = createSkippedResult({ stack, operation, skipReason });
      results.push(result);
      callbacks?.onStackSkipped?.(result);
    };

    for (const stackName of plan.order) {
      const stack = graph.stacks.get(stackName);
      if (!stack) {
        throw new InternalError({ message: `Planned stack '${stackName}' is missing` });
      }

      if (haltReason === null && signal?.aborted) {
        interrupted = true;
        haltReason = 'interrupted';
        firstError = new RunInterruptedError().toSummary();
      }

      if (haltReason !== null) {
        skip(stack, haltReason);
        continue;
      }

      if (plan.direction === 'destroy' && stack.skipOnDestroy) {
        logger.debug(`Skipping ${stackName}: marked skip_on_destroy`);
        skip(stack, 'skip-on-destroy');
        continue;
      }

      if (config.failurePolicy === 'continue') {
        const blockers =
          (plan.direction === 'destroy'
            ? graph.dependents.get(stackName)
            : graph.dependencies.get(stackName)) ?? [];
        const failedBlocker = blockers.find((blocker) => failed.has(blocker));
        if (failedBlocker !== undefined) {
          logger.debug(`Skipping ${stackName}: '${failedBlocker}' did not succeed`);
          failed.add(stackName);
          skip(stack, 'dependency-failed');
          continue;
        }
      }

      const { result, error } = await executeStack({
        stack,
        operation,
        providerArgs,
        config,
        baseEnv,
        runner,
        signal,
        callbacks,
        killGraceMs,
        logger,
      });
      results.push(result);

      if (!error) continue;
      failed.add(stackName);

      if (error.reason === 'interrupted' || signal?.aborted) {
        interrupted = true;
        haltReason = 'interrupted';
        firstError = new RunInterruptedError({ stackNames: [stackName] }).toSummary();
      } else if (error.reason === 'launch') {
        launchFailed = true;
        haltReason = 'fail-fast';
        firstError = error.toSummary();
      } else {
        firstError ??= error.toSummary();
        if (config.failurePolicy === 'fail-fast') haltReason = 'fail-fast';
      }
    }

    return finish(interrupted || launchFailed ? 'aborted' : 'completed', firstError);
  } catch (error) {
    return finish('aborted', summarizeError(error));
  }
};

/**
 * Discover and schedule without executing anything
 */
export const previewPlan = async ({
  rootPath,
  operation,
  config,
  environment = null,
  logger = createSilentLogger(),
}: {
  rootPath: string;
  operation: string;
  config: Config;
  environment?: string | null;
  logger?: Logger;
}): Promise<{ plan: ExecutionPlan; graph: DependencyGraph }> => {
  const stacks = await locateStacks({
    rootPath,
    maxDepth: config.maxDiscoveryDepth,
    stackFileName: config.stackFileName,
    provisionerFiles: config.provisionerFiles,
    environment,
    logger,
  });
  const graph = buildDependencyGraph({ stacks });
  return { plan: createExecutionPlan({ graph, operation }), graph };
};
