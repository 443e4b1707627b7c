import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import { previewPlan, runStacks } from '../../core/coordinator.js';
import { createDryRunRunner, type RecordedInvocation } from '../../core/process.js';
import { recordStackResults } from '../../storage/status-store.js';
import { formatDuration } from '../../utils/format.js';
import type { CommandContext } from '../context.js';
import type { RunReport, SkipReason, StackOperation } from '../../types/index.js';

const SKIP_LABELS: Record<SkipReason, string> = {
  'fail-fast': 'skipped after earlier failure',
  'dependency-failed': 'skipped, dependency did not succeed',
  'skip-on-destroy': 'skipped, marked skip_on_destroy',
  interrupted: 'skipped, run interrupted',
};

const printSummary = ({ report }: { report: RunReport }): void => {
  console.log();
  console.log(chalk.dim('─'.repeat(50)));

  const succeeded = report.results.filter((r) => r.outcome === 'success').length;
  const failed = report.results.filter((r) => r.outcome === 'failure').length;
  const skipped = report.results.filter((r) => r.outcome === 'skipped').length;

  if (report.error && report.results.length === 0) {
    console.log(chalk.red(`✗ Run aborted: ${report.error.message}`));
    return;
  }

  if (failed === 0 && report.state === 'completed') {
    console.log(
      chalk.green(`✓ ${report.operation} finished: ${succeeded} succeeded`) +
        (skipped > 0 ? chalk.dim(`, ${skipped} skipped`) : '')
    );
  } else {
    console.log(
      `${chalk.green(`${succeeded} succeeded`)} | ` +
        `${chalk.red(`${failed} failed`)} | ` +
        `${chalk.dim(`${skipped} skipped`)}`
    );
  }

  if (failed > 0) {
    console.log();
    console.log(chalk.red('Failed stacks:'));
    report.results
      .filter((r) => r.outcome === 'failure')
      .forEach((r) => {
        console.log(`  ${chalk.red('✗')} ${r.stackName}`);
        if (r.errorMessage) {
          console.log(chalk.dim(`    ${r.errorMessage}`));
        }
      });
  }

  if (report.interrupted) {
    console.log();
    console.log(chalk.yellow('Run interrupted.'));
  }
};

const printDryRunSummary = ({
  invocations,
}: {
  invocations: readonly RecordedInvocation[];
}): void => {
  console.log();
  console.log(chalk.bold('Dry run: commands that would be executed'));
  console.log();

  invocations.forEach((invocation, index) => {
    console.log(
      `  ${chalk.cyan(`${index + 1}.`)} ${[invocation.command, ...invocation.args].join(' ')}`
    );
    console.log(chalk.dim(`     in ${invocation.cwd}`));
  });

  console.log();
  console.log(chalk.dim(`Total: ${invocations.length} invocations`));
};

/**
 * Run an operation across the tree, or on one stack, with progress output
 */
export const executeOperation = async ({
  context,
  operation,
  targetStack = null,
  providerArgs = [],
}: {
  context: CommandContext;
  operation: StackOperation;
  targetStack?: string | null;
  providerArgs?: readonly string[];
}): Promise<RunReport> => {
  const { config, logger, rootPath } = context;
  const dryRun = context.dryRun ? createDryRunRunner({ logger }) : null;
  const spinner = ora({ spinner: 'dots' });
  const useSpinner = context.quiet && !dryRun;
  const controller = new AbortController();

  const onSignal = (): void => {
    if (useSpinner) spinner.stop();
    logger.warn('Interrupt received, stopping the current stack');
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const report = await runStacks({
      rootPath,
      operation,
      config,
      environment: context.environment,
      targetStack,
      providerArgs,
      runner: dryRun?.runner,
      signal: controller.signal,
      logger,
      callbacks: {
        onPlan: (plan) => {
          logger.info(chalk.bold(`${operation}: ${plan.order.length} stacks`));
          logger.debug(`Order: ${plan.order.join(' -> ')}`);
        },
        onStackStart: (stack) => {
          if (useSpinner) {
            spinner.start(`${operation}: ${stack.stackName}`);
          } else if (!dryRun) {
            logger.info(chalk.cyan(`\n▶ ${operation} ${stack.stackName} (${stack.relativePath})`));
          }
        },
        onOutput: (_stackName, data) => {
          if (!context.quiet) process.stdout.write(data);
        },
        onStackComplete: (result) => {
          const duration = chalk.dim(`(${formatDuration(result.durationMs)})`);
          if (result.outcome === 'success') {
            if (useSpinner) spinner.succeed(`${result.stackName} ${duration}`);
            else logger.success(`${result.stackName} ${duration}`);
          } else {
            const message = `${result.stackName}: ${result.errorMessage ?? 'failed'} ${duration}`;
            if (useSpinner) spinner.fail(message);
            else logger.error(message);
          }
        },
        onStackSkipped: (result) => {
          const label = result.skipReason ? SKIP_LABELS[result.skipReason] : 'skipped';
          if (useSpinner) spinner.warn(`${result.stackName} ${chalk.dim(`(${label})`)}`);
          else logger.info(`${chalk.dim('○')} ${result.stackName} ${chalk.dim(`(${label})`)}`);
        },
      },
    });

    if (dryRun) {
      printDryRunSummary({ invocations: dryRun.invocations });
    } else {
      await recordStackResults({ rootPath, results: report.results });
    }

    printSummary({ report });
    process.exitCode = report.exitCode;
    return report;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (spinner.isSpinning) spinner.stop();
  }
};

/**
 * Run one operation on a single named stack
 */
export const runCommand = async ({
  context,
  operation,
  stackName,
  providerArgs,
}: {
  context: CommandContext;
  operation: StackOperation;
  stackName: string;
  providerArgs: readonly string[];
}): Promise<void> => {
  await executeOperation({ context, operation, targetStack: stackName, providerArgs });
};

/**
 * Ask before destroying everything; the order shown is the destroy order
 */
const confirmDestroy = async ({
  context,
}: {
  context: CommandContext;
}): Promise<boolean> => {
  const { plan } = await previewPlan({
    rootPath: context.rootPath,
    operation: 'destroy',
    config: context.config,
    environment: context.environment,
    logger: context.logger,
  });

  if (plan.order.length === 0) return true;

  console.log(chalk.bold('Stacks will be destroyed in this order:'));
  plan.order.forEach((stackName, index) => {
    console.log(`  ${chalk.cyan(`${index + 1}.`)} ${stackName}`);
  });
  console.log();

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: `Destroy ${plan.order.length} stacks?`,
      default: false,
    },
  ]);

  return proceed;
};

/**
 * Run one operation across every discovered stack
 */
export const runAllCommand = async ({
  context,
  operation,
  confirm = false,
  providerArgs,
}: {
  context: CommandContext;
  operation: StackOperation;
  confirm?: boolean;
  providerArgs: readonly string[];
}): Promise<void> => {
  if (operation === 'destroy' && !confirm && !context.dryRun) {
    const proceed = await confirmDestroy({ context });
    if (!proceed) {
      console.log(chalk.yellow('Destroy cancelled.'));
      return;
    }
  }

  await executeOperation({ context, operation, providerArgs });
};
