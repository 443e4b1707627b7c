import chalk from 'chalk';
import { loadAllStackStatuses, loadStackStatus } from '../../storage/status-store.js';
import { formatDuration } from '../../utils/format.js';
import type { CommandContext } from '../context.js';
import type { StackOutcome, StackStatusRecord } from '../../types/index.js';

const STATUS_COLORS: Record<StackOutcome, (text: string) => string> = {
  success: chalk.green,
  failure: chalk.red,
  skipped: chalk.dim,
};

const printRecord = (record: StackStatusRecord): void => {
  const colorFn = STATUS_COLORS[record.outcome];
  const lastRun = new Date(record.lastExecutedAt);

  console.log(`${colorFn(`[${record.outcome.padEnd(7)}]`)} ${record.stackName}`);
  console.log(
    chalk.dim(
      `          ${record.operation} at ${lastRun.toLocaleString()} (${formatDuration(record.durationMs)})`
    )
  );

  if (record.errorMessage && record.outcome === 'failure') {
    console.log(chalk.red(`          Error: ${record.errorMessage}`));
  }
};

export const statusCommand = async ({
  context,
  stackName,
}: {
  context: CommandContext;
  stackName?: string;
}): Promise<void> => {
  const { rootPath } = context;

  if (stackName) {
    const record = await loadStackStatus({ rootPath, stackName });
    if (!record) {
      console.log(chalk.gray(`No recorded runs for stack '${stackName}'.`));
      return;
    }
    printRecord(record);
    return;
  }

  const records = await loadAllStackStatuses({ rootPath });
  if (records.length === 0) {
    console.log(chalk.gray('No recorded runs.'));
    return;
  }

  console.log(chalk.bold('Last recorded outcomes:'));
  console.log();
  records.forEach(printRecord);

  const count = (outcome: StackOutcome): number =>
    records.filter((record) => record.outcome === outcome).length;

  console.log();
  console.log(chalk.dim('─'.repeat(50)));
  console.log(
    `Total: ${records.length} stacks | ` +
      `${chalk.green(`${count('success')} succeeded`)} | ` +
      `${chalk.red(`${count('failure')} failed`)} | ` +
      `${chalk.dim(`${count('skipped')} skipped`)}`
  );
};
