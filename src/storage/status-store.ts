import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { getConfigDir } from './config.js';
import { ConfigurationError, describeError } from '../core/errors.js';
import { formatSchemaIssues } from '../core/stack-declaration.js';
import { isAbsent } from '../utils/fs.js';
import type { StackRunResult, StackStatusRecord } from '../types/index.js';

const StackStatusRecordSchema = z.object({
  stackName: z.string(),
  operation: z.string(),
  outcome: z.enum(['success', 'failure', 'skipped']),
  exitCode: z.number().int().nullable(),
  durationMs: z.number().nonnegative(),
  errorMessage: z.string().nullable(),
  skipReason: z
    .enum(['fail-fast', 'dependency-failed', 'skip-on-destroy', 'interrupted'])
    .nullable(),
  lastExecutedAt: z.string(),
});

export const getStatusDir = ({ rootPath }: { rootPath: string }): string =>
  join(getConfigDir({ rootPath }), 'status');

const statusFilePath = ({
  rootPath,
  stackName,
}: {
  rootPath: string;
  stackName: string;
}): string => join(getStatusDir({ rootPath }), `${encodeURIComponent(stackName)}.json`);

const parseStatusRecord = ({
  content,
  filePath,
}: {
  content: string;
  filePath: string;
}): StackStatusRecord => {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError({
      message: `Invalid JSON in ${filePath}: ${describeError(error)}`,
      cause: error,
    });
  }

  const parsed = StackStatusRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError({
      message: `Invalid status record in ${filePath}: ${formatSchemaIssues(parsed.error)}`,
    });
  }
  return parsed.data;
};

/**
 * Load the last recorded outcome for a stack, or null if it never ran
 */
export const loadStackStatus = async ({
  rootPath,
  stackName,
}: {
  rootPath: string;
  stackName: string;
}): Promise<StackStatusRecord | null> => {
  const filePath = statusFilePath({ rootPath, stackName });

  try {
    const content = await readFile(filePath, 'utf-8');
    return parseStatusRecord({ content, filePath });
  } catch (error) {
    if (isAbsent(error)) return null;
    throw error;
  }
};

/**
 * Load every recorded status, sorted by stack name
 */
export const loadAllStackStatuses = async ({
  rootPath,
}: {
  rootPath: string;
}): Promise<StackStatusRecord[]> => {
  const statusDir = getStatusDir({ rootPath });
  let fileNames: string[];

  try {
    fileNames = await readdir(statusDir);
  } catch (error) {
    if (isAbsent(error)) return [];
    throw error;
  }

  const records = await Promise.all(
    fileNames
      .filter((fileName) => fileName.endsWith('.json'))
      .map(async (fileName) => {
        const filePath = join(statusDir, fileName);
        const content = await readFile(filePath, 'utf-8');
        return parseStatusRecord({ content, filePath });
      })
  );

  return records.sort((a, b) =>
    a.stackName < b.stackName ? -1 : a.stackName > b.stackName ? 1 : 0
  );
};

/**
 * Persist the outcome of each stack from a run
 */
export const recordStackResults = async ({
  rootPath,
  results,
  now = new Date(),
}: {
  rootPath: string;
  results: readonly StackRunResult[];
  now?: Date;
}): Promise<void> => {
  if (results.length === 0) return;

  await mkdir(getStatusDir({ rootPath }), { recursive: true });
  const lastExecutedAt = now.toISOString();

  for (const result of results) {
    const record: StackStatusRecord = {
      stackName: result.stackName,
      operation: result.operation,
      outcome: result.outcome,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      errorMessage: result.errorMessage,
      skipReason: result.skipReason,
      lastExecutedAt,
    };
    await writeFile(
      statusFilePath({ rootPath, stackName: result.stackName }),
      JSON.stringify(record, null, 2)
    );
  }
};
