import chalk from 'chalk';
import { validateStacks } from '../../core/stack-manager.js';
import type { CommandContext } from '../context.js';

export const validateCommand = async ({
  context,
}: {
  context: CommandContext;
}): Promise<void> => {
  const { stacks, issues } = await validateStacks({
    rootPath: context.rootPath,
    config: context.config,
    environment: context.environment,
    logger: context.logger,
  });

  if (issues.length === 0) {
    console.log(chalk.green(`✓ Configuration is valid (${stacks.length} stacks)`));
    return;
  }

  console.log(chalk.red(`Found ${issues.length} issues:`));
  issues.forEach((issue) => console.log(`  ${chalk.red('✗')} ${issue}`));
  process.exitCode = 1;
};
