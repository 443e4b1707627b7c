import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { basename, join } from 'path';
import {
  computeExitCode,
  createRunStateMachine,
  runStacks,
} from '../../src/core/coordinator.js';
import { InternalError } from '../../src/core/errors.js';
import { createDryRunRunner, type ProcessRunner } from '../../src/core/process.js';
import { DEFAULT_CONFIG, type Config } from '../../src/storage/config.js';
import {
  createFakeRunner,
  createRecordingLogger,
  createTempDir,
  makeStack,
  removeTempDir,
  SUCCESS_OUTCOME,
  writeTree,
} from '../helpers/fixtures.js';
import type { RunState, Stack } from '../../src/types/index.js';

const config: Config = { ...DEFAULT_CONFIG };
const continueConfig: Config = { ...DEFAULT_CONFIG, failurePolicy: 'continue' };

const exampleStacks = (): Stack[] => [
  makeStack({ stackName: 'network' }),
  makeStack({ stackName: 'database', dependsOn: ['network'] }),
  makeStack({ stackName: 'api', dependsOn: ['database'] }),
];

const independentStacks = (): Stack[] =>
  ['a', 'b', 'c'].map((stackName) => makeStack({ stackName }));

const outcomesOf = (report: { results: readonly { stackName: string; outcome: string }[] }) =>
  report.results.map((result) => [result.stackName, result.outcome]);

describe('runStacks', () => {
  it('applies every stack in dependency order', async () => {
    const { runner, launched } = createFakeRunner();
    const states: RunState[] = [];

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config,
      stacks: exampleStacks(),
      runner,
      callbacks: { onStateChange: (next) => states.push(next) },
    });

    expect(report.state).toBe('completed');
    expect(report.order).toEqual(['network', 'database', 'api']);
    expect(launched()).toEqual(['network', 'database', 'api']);
    expect(report.exitCode).toBe(0);
    expect(report.error).toBeNull();
    expect(states).toEqual([
      'discovering',
      'graph-building',
      'scheduling',
      'executing',
      'completed',
    ]);
    expect(Object.isFrozen(report.results)).toBe(true);
  });

  it('skips every later stack after a failure by default', async () => {
    const { runner, launched } = createFakeRunner({ outcomes: { b: { exitCode: 1 } } });

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config,
      stacks: independentStacks(),
      runner,
    });

    expect(launched()).toEqual(['a', 'b']);
    expect(outcomesOf(report)).toEqual([
      ['a', 'success'],
      ['b', 'failure'],
      ['c', 'skipped'],
    ]);
    expect(report.results[2]?.skipReason).toBe('fail-fast');
    expect(report.state).toBe('completed');
    expect(report.exitCode).toBe(1);
    expect(report.error).toEqual({
      kind: 'StackExecutionError',
      stackNames: ['b'],
      message: 'Process exited with code 1',
    });
  });

  it('completes an empty tree with a warning', async () => {
    const { logger, messages } = createRecordingLogger();

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config,
      stacks: [],
      logger,
    });

    expect(report).toMatchObject({
      state: 'completed',
      order: [],
      results: [],
      error: null,
      exitCode: 0,
    });
    expect(messages.warn).toEqual(['No stacks found under /stacks']);
  });

  it('aborts before launching anything on an unresolved dependency', async () => {
    const { runner, calls } = createFakeRunner();

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config,
      stacks: [makeStack({ stackName: 'api', dependsOn: ['cache'] })],
      runner,
    });

    expect(calls).toEqual([]);
    expect(report.state).toBe('aborted');
    expect(report.results).toEqual([]);
    expect(report.exitCode).toBe(1);
    expect(report.error).toEqual({
      kind: 'UnresolvedDependencyError',
      stackNames: ['api'],
      message: "Stack 'api' depends on unknown stack 'cache'",
    });
  });

  it('aborts on a cycle', async () => {
    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config,
      stacks: [
        makeStack({ stackName: 'a', dependsOn: ['b'] }),
        makeStack({ stackName: 'b', dependsOn: ['a'] }),
      ],
      runner: createFakeRunner().runner,
    });

    expect(report.state).toBe('aborted');
    expect(report.error?.kind).toBe('CyclicDependencyError');
    expect(report.error?.stackNames).toEqual(['a', 'b']);
  });

  it('keeps running independent stacks under the continue policy', async () => {
    const { runner, launched } = createFakeRunner({ outcomes: { net: { exitCode: 1 } } });

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config: continueConfig,
      stacks: [
        makeStack({ stackName: 'net' }),
        makeStack({ stackName: 'db', dependsOn: ['net'] }),
        makeStack({ stackName: 'cache' }),
        makeStack({ stackName: 'app', dependsOn: ['db'] }),
      ],
      runner,
    });

    expect(report.order).toEqual(['cache', 'net', 'db', 'app']);
    expect(launched()).toEqual(['cache', 'net']);
    expect(outcomesOf(report)).toEqual([
      ['cache', 'success'],
      ['net', 'failure'],
      ['db', 'skipped'],
      ['app', 'skipped'],
    ]);
    expect(report.results[3]?.skipReason).toBe('dependency-failed');
    expect(report.state).toBe('completed');
    expect(report.exitCode).toBe(1);
  });

  it('blocks on failed dependents when destroying under the continue policy', async () => {
    const { runner, launched } = createFakeRunner({ outcomes: { api: { exitCode: 1 } } });

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'destroy',
      config: continueConfig,
      stacks: exampleStacks(),
      runner,
    });

    expect(launched()).toEqual(['api']);
    expect(outcomesOf(report)).toEqual([
      ['api', 'failure'],
      ['database', 'skipped'],
      ['network', 'skipped'],
    ]);
  });

  it('skips stacks marked skip_on_destroy without failing the run', async () => {
    const { runner, launched } = createFakeRunner();
    const stacks = exampleStacks().map((stack) =>
      stack.stackName === 'network' ? { ...stack, skipOnDestroy: true } : stack
    );

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'destroy',
      config,
      stacks,
      runner,
    });

    expect(launched()).toEqual(['api', 'database']);
    expect(report.results[2]).toMatchObject({
      stackName: 'network',
      outcome: 'skipped',
      skipReason: 'skip-on-destroy',
    });
    expect(report.exitCode).toBe(0);
  });

  it('aborts with exit code 130 when interrupted mid-stack', async () => {
    const controller = new AbortController();
    const launched: string[] = [];
    const runner: ProcessRunner = async (request) => {
      launched.push(basename(request.cwd));
      if (basename(request.cwd) === 'b') {
        controller.abort();
        return { ...SUCCESS_OUTCOME, exitCode: null, signal: 'SIGTERM', interrupted: true };
      }
      return SUCCESS_OUTCOME;
    };

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config,
      stacks: independentStacks(),
      runner,
      signal: controller.signal,
    });

    expect(launched).toEqual(['a', 'b']);
    expect(outcomesOf(report)).toEqual([
      ['a', 'success'],
      ['b', 'failure'],
      ['c', 'skipped'],
    ]);
    expect(report.results[1]?.errorMessage).toBe('Interrupted');
    expect(report.results[2]?.skipReason).toBe('interrupted');
    expect(report.state).toBe('aborted');
    expect(report.interrupted).toBe(true);
    expect(report.exitCode).toBe(130);
    expect(report.error).toEqual({
      kind: 'RunInterruptedError',
      stackNames: ['b'],
      message: 'Run interrupted',
    });
  });

  it('aborts when the provisioner cannot be launched', async () => {
    const { runner, launched } = createFakeRunner({
      outcomes: { b: { exitCode: null, launchError: new Error('spawn terraform EACCES') } },
    });

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'apply',
      config: continueConfig,
      stacks: independentStacks(),
      runner,
    });

    expect(launched()).toEqual(['a', 'b']);
    expect(report.results[1]?.exitCode).toBeNull();
    expect(report.results[2]?.skipReason).toBe('fail-fast');
    expect(report.state).toBe('aborted');
    expect(report.exitCode).toBe(1);
  });

  it('runs only the targeted stack', async () => {
    const { runner, launched } = createFakeRunner();

    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'plan',
      config,
      stacks: exampleStacks(),
      targetStack: 'database',
      runner,
    });

    expect(report.order).toEqual(['database']);
    expect(launched()).toEqual(['database']);
  });

  it('suggests close names for an unknown target', async () => {
    const report = await runStacks({
      rootPath: '/stacks',
      operation: 'plan',
      config,
      stacks: exampleStacks(),
      targetStack: 'netwrk',
      runner: createFakeRunner().runner,
    });

    expect(report.state).toBe('aborted');
    expect(report.error).toEqual({
      kind: 'StackNotFoundError',
      stackNames: ['netwrk'],
      message: "Stack 'netwrk' not found. Did you mean: network?",
    });
  });

  describe('with a real tree', () => {
    let root: string;

    beforeEach(async () => {
      root = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(root);
    });

    it('discovers stacks and records dry-run invocations in order', async () => {
      await writeTree(root, {
        'network/main.tf': '',
        'dev.tfvars': '',
        'database/main.tf': '',
        'database/dependencies.json': '{"dependencies": {"paths": ["../network"]}}',
      });
      const { logger } = createRecordingLogger();
      const { runner, invocations } = createDryRunRunner({ logger });

      const report = await runStacks({
        rootPath: root,
        operation: 'apply',
        config,
        environment: 'dev',
        runner,
      });

      expect(report.exitCode).toBe(0);
      expect(invocations).toEqual([
        {
          command: 'terraform',
          args: ['apply', '-auto-approve', `-var-file=${join(root, 'dev.tfvars')}`],
          cwd: join(root, 'network'),
        },
        {
          command: 'terraform',
          args: ['apply', '-auto-approve', `-var-file=${join(root, 'dev.tfvars')}`],
          cwd: join(root, 'database'),
        },
      ]);
    });

    it('aborts when the root does not exist', async () => {
      const report = await runStacks({
        rootPath: join(root, 'missing'),
        operation: 'plan',
        config,
        runner: createFakeRunner().runner,
      });

      expect(report.state).toBe('aborted');
      expect(report.error?.kind).toBe('DiscoveryError');
    });
  });
});

describe('createRunStateMachine', () => {
  it('rejects illegal transitions', () => {
    const machine = createRunStateMachine();

    expect(() => machine.transition('executing')).toThrow(InternalError);
    expect(machine.state).toBe('idle');
  });

  it('allows aborting from any non-terminal state', () => {
    const machine = createRunStateMachine();
    machine.transition('discovering');
    machine.transition('aborted');

    expect(machine.state).toBe('aborted');
    expect(() => machine.transition('completed')).toThrow(
      'Illegal run state transition: aborted -> completed'
    );
  });
});

describe('computeExitCode', () => {
  const failedResult = {
    stackName: 'a',
    stackPath: '/stacks/a',
    operation: 'apply',
    outcome: 'failure' as const,
    exitCode: 1,
    durationMs: 0,
    output: '',
    errorMessage: 'Process exited with code 1',
    skipReason: null,
  };

  it('prefers the interrupt code', () => {
    expect(computeExitCode({ state: 'aborted', interrupted: true, results: [] })).toBe(130);
  });

  it('fails aborted runs and runs with failures', () => {
    expect(computeExitCode({ state: 'aborted', interrupted: false, results: [] })).toBe(1);
    expect(
      computeExitCode({ state: 'completed', interrupted: false, results: [failedResult] })
    ).toBe(1);
  });

  it('succeeds otherwise', () => {
    expect(computeExitCode({ state: 'completed', interrupted: false, results: [] })).toBe(0);
  });
});
