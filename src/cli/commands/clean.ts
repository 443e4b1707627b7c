import chalk from 'chalk';
import { cleanStacks } from '../../core/cleaner.js';
import { locateStacks } from '../../core/stack-locator.js';
import { findStack } from '../../core/stack-manager.js';
import { formatBytes } from '../../utils/format.js';
import type { CommandContext } from '../context.js';

export const cleanCommand = async ({
  context,
  stackName,
  includeState = false,
}: {
  context: CommandContext;
  stackName?: string;
  includeState?: boolean;
}): Promise<void> => {
  const { config, rootPath, logger } = context;
  const stacks = await locateStacks({
    rootPath,
    maxDepth: config.maxDiscoveryDepth,
    stackFileName: config.stackFileName,
    provisionerFiles: config.provisionerFiles,
    logger,
  });

  const targets = stackName ? [findStack({ stacks, stackName })] : stacks;
  const { removed, totalBytes } = await cleanStacks({
    stacks: targets,
    includeState,
    dryRun: context.dryRun,
    logger,
  });

  if (removed.length === 0) {
    console.log(chalk.gray('Nothing to clean.'));
    return;
  }

  const verb = context.dryRun ? 'Would remove' : 'Removed';
  console.log(
    chalk.green(`✓ ${verb} ${removed.length} items (${formatBytes(totalBytes)})`)
  );
};
