import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import {
  ConfigurationError,
  describeError,
  hasErrorCode,
} from '../core/errors.js';
import { formatSchemaIssues } from '../core/stack-declaration.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from '../utils/logger.js';
import type { FailurePolicy } from '../types/index.js';

const CONFIG_DIR_NAME = '.stackrun';
const CONFIG_FILE_NAME = 'config.json';

export interface Config {
  provisionerBin: string;
  stackFileName: string;
  provisionerFiles: string[];
  /** null walks the whole tree */
  maxDiscoveryDepth: number | null;
  /** null disables the per-stack deadline */
  timeoutMs: number | null;
  autoApprove: boolean;
  failurePolicy: FailurePolicy;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: Config = {
  provisionerBin: 'terraform',
  stackFileName: 'dependencies.json',
  provisionerFiles: ['main.tf', 'backend.tf'],
  maxDiscoveryDepth: 4,
  timeoutMs: 3_600_000,
  autoApprove: true,
  failurePolicy: 'fail-fast',
  logLevel: 'info',
};

/** Largest delay a Node timer accepts */
export const MAX_TIMEOUT_MS = 2_147_483_647;

const FailurePolicySchema = z.enum(['fail-fast', 'continue']);

const ConfigFileSchema = z
  .object({
    provisionerBin: z.string().min(1),
    stackFileName: z.string().min(1),
    provisionerFiles: z.array(z.string().min(1)),
    maxDiscoveryDepth: z.number().int().positive().nullable(),
    timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).nullable(),
    autoApprove: z.boolean(),
    failurePolicy: FailurePolicySchema,
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  })
  .partial()
  .strict();

export type ConfigOverrides = Partial<Config>;

/**
 * Get the per-project config directory
 */
export const getConfigDir = ({ rootPath }: { rootPath: string }): string =>
  join(rootPath, CONFIG_DIR_NAME);

export const getConfigFilePath = ({ rootPath }: { rootPath: string }): string =>
  join(getConfigDir({ rootPath }), CONFIG_FILE_NAME);

/**
 * Read the project config file. A missing file yields no overrides.
 */
export const readConfigFile = async ({
  rootPath,
}: {
  rootPath: string;
}): Promise<ConfigOverrides> => {
  const filePath = getConfigFilePath({ rootPath });
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT', 'ENOTDIR')) return {};
    throw new ConfigurationError({
      message: `Cannot read ${filePath}: ${describeError(error)}`,
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError({
      message: `Invalid JSON in ${filePath}: ${describeError(error)}`,
      cause: error,
    });
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `Invalid config in ${filePath}: ${formatSchemaIssues(parsed.error)}`,
    });
  }

  return parsed.data;
};

/**
 * Parse a non-negative integer setting; 0 means "no limit"
 */
export const parseLimit = ({
  name,
  value,
}: {
  name: string;
  value: string;
}): number | null => {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigurationError({
      message: `${name} must be a non-negative integer, got '${value}'`,
    });
  }
  const parsed = Number.parseInt(trimmed, 10);
  return parsed === 0 ? null : parsed;
};

/**
 * Parse a timeout given in seconds into milliseconds; 0 means no deadline
 */
export const parseTimeoutSeconds = ({
  name,
  value,
}: {
  name: string;
  value: string;
}): number | null => {
  const seconds = parseLimit({ name, value });
  if (seconds === null) return null;
  const timeoutMs = seconds * 1000;
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new ConfigurationError({
      message: `${name} must be at most ${Math.floor(MAX_TIMEOUT_MS / 1000)} seconds, got '${value}'`,
    });
  }
  return timeoutMs;
};

export const parseFailurePolicy = (value: string): FailurePolicy => {
  const parsed = FailurePolicySchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `Failure policy must be 'fail-fast' or 'continue', got '${value}'`,
    });
  }
  return parsed.data;
};

/**
 * Read overrides from STACKRUN_* environment variables.
 * STACKRUN_TIMEOUT is given in seconds.
 */
export const configFromEnv = ({
  env,
}: {
  env: NodeJS.ProcessEnv;
}): ConfigOverrides => {
  const overrides: ConfigOverrides = {};

  const provisionerBin = env.STACKRUN_PROVISIONER_BIN;
  if (provisionerBin) overrides.provisionerBin = provisionerBin;

  const stackFileName = env.STACKRUN_STACK_FILE;
  if (stackFileName) overrides.stackFileName = stackFileName;

  const maxDepth = env.STACKRUN_MAX_DEPTH;
  if (maxDepth) {
    overrides.maxDiscoveryDepth = parseLimit({
      name: 'STACKRUN_MAX_DEPTH',
      value: maxDepth,
    });
  }

  const timeout = env.STACKRUN_TIMEOUT;
  if (timeout) {
    overrides.timeoutMs = parseTimeoutSeconds({ name: 'STACKRUN_TIMEOUT', value: timeout });
  }

  const logLevel = env.STACKRUN_LOG_LEVEL;
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError({
        message: `STACKRUN_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${logLevel}'`,
      });
    }
    overrides.logLevel = logLevel;
  }

  const failurePolicy = env.STACKRUN_FAILURE_POLICY;
  if (failurePolicy) overrides.failurePolicy = parseFailurePolicy(failurePolicy);

  return overrides;
};

const resolveField = <K extends keyof Config>(
  key: K,
  layers: readonly ConfigOverrides[]
): Config[K] => {
  let value = DEFAULT_CONFIG[key];
  for (const layer of layers) {
    const candidate = layer[key];
    if (candidate !== undefined) value = candidate;
  }
  return value;
};

/**
 * Load the effective config: defaults, then the project config file, then
 * environment variables, then explicit overrides (CLI flags).
 */
export const loadConfig = async ({
  rootPath,
  env = process.env,
  overrides = {},
}: {
  rootPath: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}): Promise<Config> => {
  const layers = [
    await readConfigFile({ rootPath }),
    configFromEnv({ env }),
    overrides,
  ];

  return {
    provisionerBin: resolveField('provisionerBin', layers),
    stackFileName: resolveField('stackFileName', layers),
    provisionerFiles: [...resolveField('provisionerFiles', layers)],
    maxDiscoveryDepth: resolveField('maxDiscoveryDepth', layers),
    timeoutMs: resolveField('timeoutMs', layers),
    autoApprove: resolveField('autoApprove', layers),
    failurePolicy: resolveField('failurePolicy', layers),
    logLevel: resolveField('logLevel', layers),
  };
};
