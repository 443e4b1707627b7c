import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { join } from 'path';
import {
  getStatusDir,
  loadAllStackStatuses,
  loadStackStatus,
  recordStackResults,
} from '../../src/storage/status-store.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { createTempDir, removeTempDir, writeTree } from '../helpers/fixtures.js';
import type { StackRunResult } from '../../src/types/index.js';

const result = (overrides: Partial<StackRunResult>): StackRunResult => ({
  stackName: 'network',
  stackPath: '/stacks/network',
  operation: 'apply',
  outcome: 'success',
  exitCode: 0,
  durationMs: 1200,
  output: 'Apply complete!',
  errorMessage: null,
  skipReason: null,
  ...overrides,
});

describe('status store', () => {
  let root: string;
  const now = new Date('2026-01-02T03:04:05.000Z');

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('records and reloads the outcome of each stack', async () => {
    await recordStackResults({
      rootPath: root,
      now,
      results: [
        result({ stackName: 'network' }),
        result({
          stackName: 'api',
          outcome: 'failure',
          exitCode: 1,
          errorMessage: 'Process exited with code 1',
        }),
      ],
    });

    await expect(loadStackStatus({ rootPath: root, stackName: 'network' })).resolves.toEqual({
      stackName: 'network',
      operation: 'apply',
      outcome: 'success',
      exitCode: 0,
      durationMs: 1200,
      errorMessage: null,
      skipReason: null,
      lastExecutedAt: '2026-01-02T03:04:05.000Z',
    });

    const all = await loadAllStackStatuses({ rootPath: root });
    expect(all.map((record) => [record.stackName, record.outcome])).toEqual([
      ['api', 'failure'],
      ['network', 'success'],
    ]);
  });

  it('encodes stack names into safe file names', async () => {
    await recordStackResults({ rootPath: root, now, results: [result({ stackName: 'team/edge' })] });

    const record = await loadStackStatus({ rootPath: root, stackName: 'team/edge' });

    expect(record?.stackName).toBe('team/edge');
  });

  it('returns nothing for stacks that never ran', async () => {
    await expect(loadStackStatus({ rootPath: root, stackName: 'network' })).resolves.toBeNull();
    await expect(loadAllStackStatuses({ rootPath: root })).resolves.toEqual([]);
  });

  it('rejects a corrupt status file', async () => {
    await writeTree(root, { [join('.stackrun', 'status', 'network.json')]: '{"outcome": 1}' });

    await expect(
      loadStackStatus({ rootPath: root, stackName: 'network' })
    ).rejects.toBeInstanceOf(ConfigurationError);
    expect(getStatusDir({ rootPath: root })).toBe(join(root, '.stackrun', 'status'));
  });
});
