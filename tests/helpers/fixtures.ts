import { mkdir, mkdtemp, realpath, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import type { ProcessOutcome, ProcessRequest, ProcessRunner } from '../../src/core/process.js';
import type { Logger } from '../../src/utils/logger.js';
import type { Stack } from '../../src/types/index.js';

export const createTempDir = async (): Promise<string> =>
  realpath(await mkdtemp(join(tmpdir(), 'stackrun-')));

export const removeTempDir = async (dirPath: string): Promise<void> => {
  await rm(dirPath, { recursive: true, force: true });
};

/**
 * Write a map of relative paths to file contents under root
 */
export const writeTree = async (
  root: string,
  files: Record<string, string>
): Promise<void> => {
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(root, relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, content);
  }
};

export const makeStack = ({
  stackName,
  dependsOn = [],
  skipOnDestroy = false,
  varFiles = [],
  envFiles = [],
}: {
  stackName: string;
  dependsOn?: string[];
  skipOnDestroy?: boolean;
  varFiles?: string[];
  envFiles?: string[];
}): Stack => ({
  stackName,
  stackPath: `/stacks/${stackName}`,
  relativePath: `./${stackName}`,
  workingDirectory: `/stacks/${stackName}`,
  dependsOn,
  skipOnDestroy,
  varFiles,
  envFiles,
});

export const SUCCESS_OUTCOME: ProcessOutcome = {
  exitCode: 0,
  signal: null,
  output: '',
  durationMs: 5,
  timedOut: false,
  interrupted: false,
  launchError: null,
};

/**
 * Runner that answers from a table keyed by the stack directory name
 */
export const createFakeRunner = ({
  outcomes = {},
}: {
  outcomes?: Record<string, Partial<ProcessOutcome>>;
} = {}): { runner: ProcessRunner; calls: ProcessRequest[]; launched: () => string[] } => {
  const calls: ProcessRequest[] = [];

  const runner: ProcessRunner = async (request) => {
    calls.push(request);
    return { ...SUCCESS_OUTCOME, ...outcomes[basename(request.cwd)] };
  };

  return {
    runner,
    calls,
    launched: () => calls.map((call) => basename(call.cwd)),
  };
};

export interface RecordedMessages {
  debug: string[];
  info: string[];
  warn: string[];
  error: string[];
  success: string[];
}

export const createRecordingLogger = (): { logger: Logger; messages: RecordedMessages } => {
  const messages: RecordedMessages = { debug: [], info: [], warn: [], error: [], success: [] };

  return {
    messages,
    logger: {
      debug: (message) => messages.debug.push(message),
      info: (message) => messages.info.push(message),
      warn: (message) => messages.warn.push(message),
      error: (message) => messages.error.push(message),
      success: (message) => messages.success.push(message),
    },
  };
};
