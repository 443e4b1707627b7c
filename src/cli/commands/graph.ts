import chalk from 'chalk';
import { previewPlan } from '../../core/coordinator.js';
import type { DependencyGraph } from '../../core/dependency-graph.js';
import type { CommandContext } from '../context.js';
import type { ExecutionPlan } from '../../types/index.js';

/**
 * Render the plan order with each stack's dependencies
 */
export const renderPlan = ({
  plan,
  graph,
}: {
  plan: ExecutionPlan;
  graph: DependencyGraph;
}): string[] => {
  const lines: string[] = [];

  plan.order.forEach((stackName, index) => {
    const dependencies = graph.dependencies.get(stackName) ?? [];
    const skip =
      plan.direction === 'destroy' && graph.stacks.get(stackName)?.skipOnDestroy
        ? chalk.yellow(' [skip on destroy]')
        : '';

    lines.push(`${chalk.dim(`${(index + 1).toString().padStart(3)}.`)} ${stackName}${skip}`);
    if (dependencies.length > 0) {
      lines.push(chalk.dim(`      └─ depends on: ${dependencies.join(', ')}`));
    }
  });

  return lines;
};

export const graphCommand = async ({
  context,
  destroy = false,
}: {
  context: CommandContext;
  destroy?: boolean;
}): Promise<void> => {
  const { plan, graph } = await previewPlan({
    rootPath: context.rootPath,
    operation: destroy ? 'destroy' : 'apply',
    config: context.config,
    environment: context.environment,
    logger: context.logger,
  });

  if (plan.order.length === 0) {
    console.log(chalk.gray('No stacks found.'));
    return;
  }

  console.log(chalk.bold(destroy ? 'Destroy order:' : 'Apply order:'));
  console.log();
  renderPlan({ plan, graph }).forEach((line) => console.log(line));
};
