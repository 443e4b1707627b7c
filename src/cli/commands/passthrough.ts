import { buildProcessEnv } from '../../core/environment.js';
import { INTERRUPTED_EXIT_CODE } from '../../core/coordinator.js';
import { spawnProcess, type ProcessOutcome, type ProcessRunner } from '../../core/process.js';
import type { CommandContext } from '../context.js';

export const passthroughExitCode = (outcome: ProcessOutcome): number => {
  if (outcome.interrupted) return INTERRUPTED_EXIT_CODE;
  if (outcome.launchError || outcome.exitCode === null) return 1;
  return outcome.exitCode;
};

/**
 * Hand an unrecognised command to the provisioner unchanged, once, in the
 * current directory
 */
export const passthroughCommand = async ({
  context,
  args,
  runner = spawnProcess,
}: {
  context: CommandContext;
  args: readonly string[];
  runner?: ProcessRunner;
}): Promise<void> => {
  const { config, logger } = context;
  const controller = new AbortController();
  const onSignal = (): void => controller.abort();
  process.once('SIGINT', onSignal);

  try {
    logger.debug(`Passing through: ${[config.provisionerBin, ...args].join(' ')}`);

    const outcome = await runner({
      command: config.provisionerBin,
      args,
      cwd: process.cwd(),
      env: buildProcessEnv({ baseEnv: process.env }),
      timeoutMs: config.timeoutMs,
      signal: controller.signal,
      onOutput: (data) => process.stdout.write(data),
    });

    if (outcome.launchError) {
      logger.error(`Failed to launch '${config.provisionerBin}': ${outcome.launchError.message}`);
    }

    process.exitCode = passthroughExitCode(outcome);
  } finally {
    process.off('SIGINT', onSignal);
  }
};
