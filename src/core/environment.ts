import { readFile } from 'fs/promises';
import { join } from 'path';
import dotenv from 'dotenv';
import { isFile } from '../utils/fs.js';

/**
 * Candidate var files for an environment, lowest precedence first.
 * Shared files live at the root; stack files override them.
 */
export const varFileCandidates = ({
  rootPath,
  stackPath,
  environment,
}: {
  rootPath: string;
  stackPath: string;
  environment: string;
}): string[] => [
  join(rootPath, 'environment', `${environment}.tfvars`),
  join(rootPath, `${environment}.tfvars`),
  join(rootPath, 'globals.tfvars'),
  join(stackPath, 'tfvars', `${environment}.tfvars`),
  join(stackPath, `${environment}.tfvars`),
];

export const envFileCandidates = ({
  rootPath,
  stackPath,
  environment,
}: {
  rootPath: string;
  stackPath: string;
  environment: string;
}): string[] => [
  join(rootPath, `.env.${environment}`),
  join(stackPath, `.env.${environment}`),
];

const existingFiles = async (candidates: string[]): Promise<string[]> => {
  const checks = await Promise.all(candidates.map((candidate) => isFile(candidate)));
  return [...new Set(candidates.filter((_, index) => checks[index]))];
};

export const resolveVarFiles = async (options: {
  rootPath: string;
  stackPath: string;
  environment: string | null;
}): Promise<string[]> =>
  options.environment === null
    ? []
    : existingFiles(varFileCandidates({ ...options, environment: options.environment }));

export const resolveEnvFiles = async (options: {
  rootPath: string;
  stackPath: string;
  environment: string | null;
}): Promise<string[]> =>
  options.environment === null
    ? []
    : existingFiles(envFileCandidates({ ...options, environment: options.environment }));

export const loadEnvFile = async ({
  filePath,
}: {
  filePath: string;
}): Promise<Record<string, string>> =>
  dotenv.parse(await readFile(filePath, 'utf-8'));

/**
 * Merge the base environment with per-stack overrides. Later maps win on
 * key collision. The inputs are never mutated.
 */
export const buildProcessEnv = ({
  baseEnv,
  overrides = [],
}: {
  baseEnv: NodeJS.ProcessEnv;
  overrides?: readonly Record<string, string>[];
}): Record<string, string> => {
  const merged: Record<string, string> = {};

  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) merged[key] = value;
  }

  for (const override of overrides) {
    Object.assign(merged, override);
  }

  return merged;
};

export const resolveStackEnv = async ({
  envFiles,
  baseEnv,
}: {
  envFiles: readonly string[];
  baseEnv: NodeJS.ProcessEnv;
}): Promise<Record<string, string>> => {
  const overrides = await Promise.all(
    envFiles.map((filePath) => loadEnvFile({ filePath }))
  );
  return buildProcessEnv({ baseEnv, overrides });
};
