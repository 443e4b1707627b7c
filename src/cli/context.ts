import { resolve } from 'path';
import { StackrunError } from '../core/errors.js';
import {
  loadConfig,
  parseLimit,
  parseTimeoutSeconds,
  type Config,
  type ConfigOverrides,
} from '../storage/config.js';
import { createLogger, type Logger } from '../utils/logger.js';

export type GlobalOptions = {
  env?: string;
  root?: string;
  maxDepth?: string;
  provisionerBin?: string;
  timeout?: string;
  continueOnError?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  quiet?: boolean;
};

export interface CommandContext {
  rootPath: string;
  environment: string | null;
  config: Config;
  logger: Logger;
  dryRun: boolean;
  quiet: boolean;
}

/**
 * Translate global CLI flags into config overrides
 */
export const overridesFromOptions = (options: GlobalOptions): ConfigOverrides => {
  const overrides: ConfigOverrides = {};

  if (options.maxDepth !== undefined) {
    overrides.maxDiscoveryDepth = parseLimit({ name: '--max-depth', value: options.maxDepth });
  }
  if (options.timeout !== undefined) {
    overrides.timeoutMs = parseTimeoutSeconds({ name: '--timeout', value: options.timeout });
  }
  if (options.provisionerBin !== undefined) {
    overrides.provisionerBin = options.provisionerBin;
  }
  if (options.continueOnError) overrides.failurePolicy = 'continue';
  if (options.verbose) overrides.logLevel = 'debug';
  else if (options.quiet) overrides.logLevel = 'warn';

  return overrides;
};

export const createCommandContext = async ({
  options,
  env = process.env,
}: {
  options: GlobalOptions;
  env?: NodeJS.ProcessEnv;
}): Promise<CommandContext> => {
  const rootPath = resolve(options.root ?? process.cwd());
  const config = await loadConfig({
    rootPath,
    env,
    overrides: overridesFromOptions(options),
  });

  return {
    rootPath,
    environment: options.env ?? null,
    config,
    logger: createLogger({ level: config.logLevel }),
    dryRun: options.dryRun ?? false,
    quiet: options.quiet ?? false,
  };
};

/**
 * Print an error at the command boundary and flag the process as failed
 */
export const reportError = ({
  error,
  logger,
}: {
  error: unknown;
  logger: Logger;
}): void => {
  if (error instanceof StackrunError) {
    logger.error(`${error.kind}: ${error.message}`);
    if (error.stackNames.length > 0) {
      logger.error(`Affected stacks: ${error.stackNames.join(', ')}`);
    }
  } else {
    logger.error(error instanceof Error ? error.message : 'Unknown error');
  }
  process.exitCode = 1;
};

/**
 * Build the command context and run a handler, reporting any failure
 */
export const runWithContext = async ({
  options,
  handler,
}: {
  options: GlobalOptions;
  handler: (context: CommandContext) => Promise<void>;
}): Promise<void> => {
  let logger = createLogger({ level: options.verbose ? 'debug' : 'info' });

  try {
    const context = await createCommandContext({ options });
    logger = context.logger;
    await handler(context);
  } catch (error) {
    reportError({ error, logger });
  }
};
