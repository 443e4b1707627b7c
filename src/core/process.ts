import { spawn } from 'child_process';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_KILL_GRACE_MS = 5000;

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  cwd: string;
  env: Record<string, string>;
  /** null or omitted runs without a deadline */
  timeoutMs?: number | null;
  killGraceMs?: number;
  signal?: AbortSignal;
  onOutput?: (data: string) => void;
}

export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  output: string;
  durationMs: number;
  timedOut: boolean;
  interrupted: boolean;
  launchError: Error | null;
}

export type ProcessRunner = (request: ProcessRequest) => Promise<ProcessOutcome>;

/**
 * Spawn a subprocess and capture its combined output.
 *
 * Never rejects: launch failures come back as `launchError`. On timeout or
 * abort the child gets SIGTERM, then SIGKILL once the grace period passes.
 */
export const spawnProcess: ProcessRunner = (request) => {
  const {
    command,
    args,
    cwd,
    env,
    timeoutMs = null,
    killGraceMs = DEFAULT_KILL_GRACE_MS,
    signal,
    onOutput,
  } = request;

  const startTime = Date.now();

  return new Promise((resolve) => {
    const outputChunks: string[] = [];
    let timedOut = false;
    let interrupted = false;
    let settled = false;
    let timeoutTimer: NodeJS.Timeout | null = null;
    let killTimer: NodeJS.Timeout | null = null;

    const child = spawn(command, [...args], {
      cwd,
      env,
      stdio: ['inherit', 'pipe', 'pipe'],
    });

    const terminate = (): void => {
      if (killTimer || child.exitCode !== null || child.signalCode !== null) return;
      child.kill('SIGTERM');
      killTimer = setTimeout(() => {
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }, killGraceMs);
    };

    const onAbort = (): void => {
      interrupted = true;
      terminate();
    };

    const finish = (outcome: {
      exitCode: number | null;
      signal: NodeJS.Signals | null;
      launchError: Error | null;
    }): void => {
      if (settled) return;
      settled = true;
      if (timeoutTimer) clearTimeout(timeoutTimer);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);

      resolve({
        ...outcome,
        output: outputChunks.join(''),
        durationMs: Date.now() - startTime,
        timedOut,
        interrupted,
      });
    };

    const collect = (text: string): void => {
      outputChunks.push(text);
      onOutput?.(text);
    };

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');
    child.stdout?.on('data', collect);
    child.stderr?.on('data', collect);

    child.on('error', (error) => {
      finish({ exitCode: null, signal: null, launchError: error });
    });

    child.on('close', (code, closeSignal) => {
      finish({ exitCode: code, signal: closeSignal, launchError: null });
    });

    if (timeoutMs !== null) {
      timeoutTimer = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeoutMs);
    }

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
  });
};

export interface RecordedInvocation {
  command: string;
  args: string[];
  cwd: string;
}

/**
 * Runner that records invocations instead of spawning them.
 * Every invocation succeeds with exit code 0.
 */
export const createDryRunRunner = ({
  logger,
}: {
  logger: Logger;
}): { runner: ProcessRunner; invocations: RecordedInvocation[] } => {
  const invocations: RecordedInvocation[] = [];

  const runner: ProcessRunner = async ({ command, args, cwd }) => {
    invocations.push({ command, args: [...args], cwd });
    logger.info(`[dry-run] ${[command, ...args].join(' ')} (in ${cwd})`);

    return {
      exitCode: 0,
      signal: null,
      output: '',
      durationMs: 0,
      timedOut: false,
      interrupted: false,
      launchError: null,
    };
  };

  return { runner, invocations };
};
