import { readFile } from 'fs/promises';
import { basename } from 'path';
import { z } from 'zod';
import { DiscoveryError, describeError, hasErrorCode } from './errors.js';
import type { StackDeclaration } from '../types/index.js';

const DependencyPathsSchema = z.object({
  paths: z.array(z.string()).default([]),
});

export const StackDeclarationSchema = z.object({
  name: z.string().trim().min(1).optional(),
  dependencies: z.union([z.array(z.string()), DependencyPathsSchema]).optional(),
  skip_on_destroy: z.boolean().optional(),
});

export const formatSchemaIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

/**
 * Dependencies may be written as relative paths ('../network'); only the
 * final segment names the stack.
 */
export const normalizeDependencyName = (dependency: string): string =>
  basename(dependency.trim());

export const parseStackDeclaration = ({
  content,
  filePath,
}: {
  content: string;
  filePath: string;
}): StackDeclaration => {
  let raw: unknown;

  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DiscoveryError({
      message: `Invalid JSON in ${filePath}: ${describeError(error)}`,
      path: filePath,
      cause: error,
    });
  }

  const parsed = StackDeclarationSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DiscoveryError({
      message: `Invalid stack declaration in ${filePath}: ${formatSchemaIssues(parsed.error)}`,
      path: filePath,
    });
  }

  const { name, dependencies, skip_on_destroy } = parsed.data;
  const declaredPaths =
    dependencies === undefined
      ? []
      : Array.isArray(dependencies)
        ? dependencies
        : dependencies.paths;

  const dependsOn = [
    ...new Set(
      declaredPaths.map(normalizeDependencyName).filter((dep) => dep !== '')
    ),
  ];

  return {
    name: name ?? null,
    dependsOn,
    skipOnDestroy: skip_on_destroy ?? false,
  };
};

/**
 * Read a stack's declaration file, or null when the stack has none
 */
export const readStackDeclaration = async ({
  filePath,
}: {
  filePath: string;
}): Promise<StackDeclaration | null> => {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw new DiscoveryError({
      message: `Cannot read ${filePath}: ${describeError(error)}`,
      path: filePath,
      cause: error,
    });
  }

  return parseStackDeclaration({ content, filePath });
};
