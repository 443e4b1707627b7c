import { lstat, readdir, rm } from 'fs/promises';
import { join } from 'path';
import { isAbsent } from '../utils/fs.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { Stack } from '../types/index.js';

export const WORKING_FILES: readonly string[] = [
  'terraform.tfstate.backup',
  'crash.log',
  '.terraformrc',
  'terraform.log',
];

export const WORKING_DIRECTORIES: readonly string[] = ['.terraform'];

export const STATE_FILES: readonly string[] = ['terraform.tfstate'];

export interface CleanedEntry {
  stackName: string;
  path: string;
  bytes: number;
}

export interface CleanSummary {
  removed: CleanedEntry[];
  totalBytes: number;
}

const measure = async (targetPath: string): Promise<number> => {
  const stats = await lstat(targetPath);
  if (!stats.isDirectory()) return stats.size;

  const entries = await readdir(targetPath);
  const sizes = await Promise.all(
    entries.map((entry) => measure(join(targetPath, entry)))
  );
  return sizes.reduce((total, size) => total + size, 0);
};

const sizeIfPresent = async (targetPath: string): Promise<number | null> => {
  try {
    return await measure(targetPath);
  } catch (error) {
    if (isAbsent(error)) return null;
    throw error;
  }
};

/**
 * Remove provisioner working files from each stack.
 * The dependency lock file is left alone; state files only go with includeState.
 */
export const cleanStacks = async ({
  stacks,
  includeState = false,
  dryRun = false,
  logger = createSilentLogger(),
}: {
  stacks: readonly Stack[];
  includeState?: boolean;
  dryRun?: boolean;
  logger?: Logger;
}): Promise<CleanSummary> => {
  const targets = [
    ...WORKING_FILES,
    ...WORKING_DIRECTORIES,
    ...(includeState ? STATE_FILES : []),
  ];
  const removed: CleanedEntry[] = [];

  for (const stack of stacks) {
    for (const target of targets) {
      const targetPath = join(stack.stackPath, target);
      const bytes = await sizeIfPresent(targetPath);
      if (bytes === null) continue;

      if (dryRun) {
        logger.info(`[dry-run] would remove ${targetPath}`);
      } else {
        await rm(targetPath, { recursive: true, force: true });
        logger.debug(`Removed ${targetPath}`);
      }

      removed.push({ stackName: stack.stackName, path: targetPath, bytes });
    }
  }

  return {
    removed,
    totalBytes: removed.reduce((total, entry) => total + entry.bytes, 0),
  };
};
