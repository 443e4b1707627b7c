import { join } from 'path';
import fuzzy from 'fuzzy';
import { buildDependencyGraph, compareNames } from './dependency-graph.js';
import { describeError, StackNotFoundError, StackrunError } from './errors.js';
import { locateStacks } from './stack-locator.js';
import { isFile } from '../utils/fs.js';
import { createSilentLogger, type Logger } from '../utils/logger.js';
import type { Config } from '../storage/config.js';
import type { Stack } from '../types/index.js';

const BACKEND_FILE_NAME = 'backend.tf';

/**
 * Closest stack names for a mistyped name, best match first
 */
export const suggestStackNames = ({
  stackName,
  stackNames,
  limit = 3,
}: {
  stackName: string;
  stackNames: readonly string[];
  limit?: number;
}): string[] => {
  const sorted = [...stackNames].sort(compareNames);
  return fuzzy
    .filter(stackName, sorted)
    .slice(0, limit)
    .map((result) => result.original);
};

/**
 * Look up a stack by name, or throw with suggestions
 */
export const findStack = ({
  stacks,
  stackName,
}: {
  stacks: readonly Stack[];
  stackName: string;
}): Stack => {
  const stack = stacks.find((candidate) => candidate.stackName === stackName);

  if (!stack) {
    throw new StackNotFoundError({
      stackName,
      suggestions: suggestStackNames({
        stackName,
        stackNames: stacks.map((candidate) => candidate.stackName),
      }),
    });
  }

  return stack;
};

export interface ValidationReport {
  stacks: Stack[];
  issues: string[];
}

/**
 * Collect configuration problems across the tree without running anything
 */
export const validateStacks = async ({
  rootPath,
  config,
  environment = null,
  logger = createSilentLogger(),
}: {
  rootPath: string;
  config: Config;
  environment?: string | null;
  logger?: Logger;
}): Promise<ValidationReport> => {
  const issues: string[] = [];

  let stacks: Stack[];
  try {
    stacks = await locateStacks({
      rootPath,
      maxDepth: config.maxDiscoveryDepth,
      stackFileName: config.stackFileName,
      provisionerFiles: config.provisionerFiles,
      environment,
      logger,
    });
  } catch (error) {
    if (!(error instanceof StackrunError)) throw error;
    return { stacks: [], issues: [describeError(error)] };
  }

  try {
    buildDependencyGraph({ stacks });
  } catch (error) {
    if (!(error instanceof StackrunError)) throw error;
    issues.push(error.message);
  }

  for (const stack of stacks) {
    if (!(await isFile(join(stack.stackPath, BACKEND_FILE_NAME)))) {
      issues.push(`Stack '${stack.stackName}' has no ${BACKEND_FILE_NAME} (${stack.relativePath})`);
    }
  }

  return { stacks, issues };
};
