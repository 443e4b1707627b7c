import chalk from 'chalk';
import { locateStacks } from '../../core/stack-locator.js';
import type { CommandContext } from '../context.js';
import type { Stack } from '../../types/index.js';

/**
 * Format one stack as a listing line
 */
export const formatStackLine = (stack: Stack): string => {
  const deps =
    stack.dependsOn.length > 0
      ? chalk.dim(` depends on: ${stack.dependsOn.join(', ')}`)
      : '';
  const skip = stack.skipOnDestroy ? chalk.yellow(' [skip on destroy]') : '';
  return `  ${chalk.cyan(stack.stackName)} ${chalk.dim(stack.relativePath)}${deps}${skip}`;
};

/**
 * List all discovered stacks
 */
export const lsCommand = async ({
  context,
}: {
  context: CommandContext;
}): Promise<void> => {
  const { config, rootPath } = context;
  const stacks = await locateStacks({
    rootPath,
    maxDepth: config.maxDiscoveryDepth,
    stackFileName: config.stackFileName,
    provisionerFiles: config.provisionerFiles,
    environment: context.environment,
    logger: context.logger,
  });

  if (stacks.length === 0) {
    console.log(chalk.gray(`No stacks found under ${rootPath}.`));
    return;
  }

  console.log(chalk.bold('Stacks:'));
  console.log();
  stacks.forEach((stack) => console.log(formatStackLine(stack)));
  console.log();
  console.log(chalk.dim(`Total: ${stacks.length} stacks`));
};
