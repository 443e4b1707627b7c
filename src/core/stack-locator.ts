import { readdir, realpath, stat } from 'fs/promises';
import type { Dirent } from 'fs';
import { basename, join, relative, resolve } from 'path';
import { DiscoveryError, describeError, hasErrorCode } from './errors.js';
import { readStackDeclaration } from './stack-declaration.js';
import { resolveEnvFiles, resolveVarFiles } from './environment.js';
import { isFile } from '../utils/fs.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { Stack } from '../types/index.js';

export const DEFAULT_PROVISIONER_FILES: readonly string[] = ['main.tf', 'backend.tf'];
export const DEFAULT_STACK_FILE_NAME = 'dependencies.json';
export const DEFAULT_MAX_DEPTH = 4;

export interface LocateStacksOptions {
  rootPath: string;
  /** null walks the whole tree */
  maxDepth?: number | null;
  stackFileName?: string;
  provisionerFiles?: readonly string[];
  environment?: string | null;
  logger?: Logger;
}

interface PendingDirectory {
  path: string;
  depth: number;
}

const assertRootDirectory = async (rootPath: string): Promise<string> => {
  try {
    const rootStats = await stat(rootPath);
    if (!rootStats.isDirectory()) {
      throw new DiscoveryError({
        message: `Root path '${rootPath}' is not a directory`,
        path: rootPath,
      });
    }
    return await realpath(rootPath);
  } catch (error) {
    if (error instanceof DiscoveryError) throw error;
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) {
      throw new DiscoveryError({
        message: `Root path '${rootPath}' does not exist`,
        path: rootPath,
        cause: error,
      });
    }
    throw new DiscoveryError({
      message: `Cannot read root path '${rootPath}': ${describeError(error)}`,
      path: rootPath,
      cause: error,
    });
  }
};

const readEntries = async ({
  dirPath,
  isRoot,
  logger,
}: {
  dirPath: string;
  isRoot: boolean;
  logger: Logger;
}): Promise<Dirent[]> => {
  try {
    const entries = await readdir(dirPath, { withFileTypes: true });
    return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch (error) {
    if (!isRoot && hasErrorCode(error, 'EACCES', 'EPERM')) {
      logger.warn(`Skipping unreadable directory '${dirPath}'`);
      return [];
    }
    throw new DiscoveryError({
      message: `Cannot read directory '${dirPath}': ${describeError(error)}`,
      path: dirPath,
      cause: error,
    });
  }
};

/**
 * Resolve a directory entry to its canonical path, following symlinks.
 * Returns null for anything that is not (or does not point to) a directory.
 */
const resolveDirectoryEntry = async ({
  entry,
  entryPath,
  logger,
}: {
  entry: Dirent;
  entryPath: string;
  logger: Logger;
}): Promise<string | null> => {
  if (entry.isDirectory()) return realpath(entryPath);
  if (!entry.isSymbolicLink()) return null;

  try {
    const target = await stat(entryPath);
    return target.isDirectory() ? await realpath(entryPath) : null;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ELOOP')) {
      logger.warn(`Skipping broken symlink '${entryPath}'`);
      return null;
    }
    throw error;
  }
};

const isStackDirectory = async ({
  dirPath,
  markerFiles,
}: {
  dirPath: string;
  markerFiles: readonly string[];
}): Promise<boolean> => {
  for (const fileName of markerFiles) {
    if (await isFile(join(dirPath, fileName))) return true;
  }
  return false;
};

const describeStack = async ({
  rootPath,
  walkedPath,
  canonicalPath,
  stackFileName,
  environment,
}: {
  rootPath: string;
  walkedPath: string;
  canonicalPath: string;
  stackFileName: string;
  environment: string | null;
}): Promise<Stack> => {
  const declaration = await readStackDeclaration({
    filePath: join(canonicalPath, stackFileName),
  });

  const [varFiles, envFiles] = await Promise.all([
    resolveVarFiles({ rootPath, stackPath: canonicalPath, environment }),
    resolveEnvFiles({ rootPath, stackPath: canonicalPath, environment }),
  ]);

  return {
    stackName: declaration?.name ?? basename(canonicalPath),
    stackPath: canonicalPath,
    relativePath: `./${relative(rootPath, walkedPath)}`,
    workingDirectory: canonicalPath,
    dependsOn: declaration?.dependsOn ?? [],
    skipOnDestroy: declaration?.skipOnDestroy ?? false,
    varFiles,
    envFiles,
  };
};

/**
 * Walk the tree under rootPath and describe every directory holding
 * provisioner configuration or a stack declaration file.
 *
 * The walk is breadth-first with entries visited in name order. Hidden
 * directories are not entered, and a directory reached a second time through
 * a symlink is skipped with a warning.
 */
export const locateStacks = async ({
  rootPath,
  maxDepth = DEFAULT_MAX_DEPTH,
  stackFileName = DEFAULT_STACK_FILE_NAME,
  provisionerFiles = DEFAULT_PROVISIONER_FILES,
  environment = null,
  logger = createSilentLogger(),
}: LocateStacksOptions): Promise<Stack[]> => {
  const root = await assertRootDirectory(resolve(rootPath));
  const markerFiles = [...provisionerFiles, stackFileName];
  const visited = new Set<string>([root]);
  const stacks: Stack[] = [];
  const queue: PendingDirectory[] = [{ path: root, depth: 0 }];

  logger.debug(`Discovering stacks in ${root}`);

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;

    const depth = current.depth + 1;
    if (maxDepth !== null && depth > maxDepth) continue;

    const entries = await readEntries({
      dirPath: current.path,
      isRoot: current.depth === 0,
      logger,
    });

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;

      const walkedPath = join(current.path, entry.name);
      const canonicalPath = await resolveDirectoryEntry({
        entry,
        entryPath: walkedPath,
        logger,
      });
      if (canonicalPath === null) continue;

      if (visited.has(canonicalPath)) {
        logger.warn(
          `Skipping '${walkedPath}': resolves to already visited directory '${canonicalPath}'`
        );
        continue;
      }
      visited.add(canonicalPath);

      if (await isStackDirectory({ dirPath: canonicalPath, markerFiles })) {
        const stack = await describeStack({
          rootPath: root,
          walkedPath,
          canonicalPath,
          stackFileName,
          environment,
        });
        logger.debug(`Found stack: ${stack.stackName} at ${stack.relativePath}`);
        stacks.push(stack);
      }

      queue.push({ path: walkedPath, depth });
    }
  }

  stacks.sort((a, b) =>
    a.stackPath < b.stackPath ? -1 : a.stackPath > b.stackPath ? 1 : 0
  );

  logger.debug(
    `Discovered ${stacks.length} stacks: ${stacks.map((s) => s.stackName).join(', ')}`
  );

  return stacks;
};
