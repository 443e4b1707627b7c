import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { symlink } from 'fs/promises';
import { join } from 'path';
import { locateStacks } from '../../src/core/stack-locator.js';
import { DiscoveryError } from '../../src/core/errors.js';
import {
  createRecordingLogger,
  createTempDir,
  removeTempDir,
  writeTree,
} from '../helpers/fixtures.js';

describe('locateStacks', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('finds stacks by marker files and reads their declarations', async () => {
    await writeTree(root, {
      'main.tf': '',
      'network/main.tf': '',
      'database/main.tf': '',
      'database/dependencies.json': '{"dependencies": {"paths": ["../network"]}}',
      'api/backend.tf': '',
      'api/dependencies.json':
        '{"name": "api-service", "dependencies": ["database"], "skip_on_destroy": true}',
      '.terraform/main.tf': '',
      'docs/readme.md': '',
    });

    const stacks = await locateStacks({ rootPath: root });

    expect(stacks.map((stack) => stack.stackName)).toEqual([
      'api-service',
      'database',
      'network',
    ]);
    expect(stacks[0]).toEqual({
      stackName: 'api-service',
      stackPath: join(root, 'api'),
      relativePath: './api',
      workingDirectory: join(root, 'api'),
      dependsOn: ['database'],
      skipOnDestroy: true,
      varFiles: [],
      envFiles: [],
    });
    expect(stacks[1]?.dependsOn).toEqual(['network']);
  });

  it('treats a directory with only a declaration file as a stack', async () => {
    await writeTree(root, { 'shared/dependencies.json': '{}' });

    const stacks = await locateStacks({ rootPath: root });

    expect(stacks.map((stack) => stack.stackName)).toEqual(['shared']);
  });

  it('stops at the maximum depth', async () => {
    await writeTree(root, { 'a/b/c/d/e/main.tf': '', 'a/b/main.tf': '' });

    const limited = await locateStacks({ rootPath: root });
    const unbounded = await locateStacks({ rootPath: root, maxDepth: null });
    const shallow = await locateStacks({ rootPath: root, maxDepth: 1 });

    expect(limited.map((stack) => stack.stackName)).toEqual(['b']);
    expect(unbounded.map((stack) => stack.stackName)).toEqual(['b', 'e']);
    expect(shallow).toEqual([]);
  });

  it('skips symlinks back into visited directories', async () => {
    await writeTree(root, { 'network/main.tf': '' });
    await symlink(root, join(root, 'network', 'loop'));
    const { logger, messages } = createRecordingLogger();

    const stacks = await locateStacks({ rootPath: root, maxDepth: null, logger });

    expect(stacks.map((stack) => stack.stackName)).toEqual(['network']);
    expect(messages.warn).toEqual([
      `Skipping '${join(root, 'network', 'loop')}': resolves to already visited directory '${root}'`,
    ]);
  });

  it('resolves var files and env files for the selected environment', async () => {
    await writeTree(root, {
      'dev.tfvars': '',
      'globals.tfvars': '',
      '.env.dev': 'SHARED=1',
      'network/main.tf': '',
      'network/tfvars/dev.tfvars': '',
      'network/.env.dev': 'LOCAL=1',
    });

    const [network] = await locateStacks({ rootPath: root, environment: 'dev' });

    expect(network?.varFiles).toEqual([
      join(root, 'dev.tfvars'),
      join(root, 'globals.tfvars'),
      join(root, 'network', 'tfvars', 'dev.tfvars'),
    ]);
    expect(network?.envFiles).toEqual([
      join(root, '.env.dev'),
      join(root, 'network', '.env.dev'),
    ]);
  });

  it('fails on a missing root', async () => {
    const missing = join(root, 'missing');

    await expect(locateStacks({ rootPath: missing })).rejects.toThrow(
      `Root path '${missing}' does not exist`
    );
  });

  it('fails when the root is a file', async () => {
    await writeTree(root, { 'file.txt': '' });
    const filePath = join(root, 'file.txt');

    await expect(locateStacks({ rootPath: filePath })).rejects.toThrow(
      `Root path '${filePath}' is not a directory`
    );
  });

  it('fails on a malformed declaration file', async () => {
    await writeTree(root, { 'network/dependencies.json': '{ broken' });

    await expect(locateStacks({ rootPath: root })).rejects.toBeInstanceOf(DiscoveryError);
  });

  it('returns nothing for an empty tree', async () => {
    await expect(locateStacks({ rootPath: root })).resolves.toEqual([]);
  });
});
