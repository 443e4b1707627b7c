import {
  CyclicDependencyError,
  DuplicateStackNameError,
  UnresolvedDependencyError,
} from './errors.js';
import type { Stack } from '../types/index.js';

/**
 * Name-keyed adjacency over the discovered stacks. An edge A -> B (B listed
 * in `dependencies.get(A)`) means B must succeed before A starts.
 */
export interface DependencyGraph {
  stacks: ReadonlyMap<string, Stack>;
  dependencies: ReadonlyMap<string, readonly string[]>;
  dependents: ReadonlyMap<string, readonly string[]>;
}

/**
 * Locale-independent ordering used for every tie-break
 */
export const compareNames = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const sortedNames = (graph: DependencyGraph): string[] =>
  [...graph.stacks.keys()].sort(compareNames);

const assertUniqueNames = ({ stacks }: { stacks: readonly Stack[] }): void => {
  const pathsByName = new Map<string, string[]>();

  stacks.forEach((stack) => {
    const existing = pathsByName.get(stack.stackName) ?? [];
    pathsByName.set(stack.stackName, [...existing, stack.stackPath]);
  });

  const duplicate = [...pathsByName.entries()]
    .filter(([, paths]) => paths.length > 1)
    .sort(([a], [b]) => compareNames(a, b))[0];

  if (duplicate) {
    const [stackName, paths] = duplicate;
    throw new DuplicateStackNameError({ stackName, paths });
  }
};

/**
 * Detect a cycle using DFS with separate in-progress and done sets.
 *
 * An edge into an in-progress node is a back-edge (a cycle); an edge into a
 * done node is a cross-edge and is ignored. Returns the cycle members in
 * cycle order, or null.
 */
export const detectCycle = ({
  graph,
}: {
  graph: DependencyGraph;
}): string[] | null => {
  const inProgress = new Set<string>();
  const done = new Set<string>();
  const path: string[] = [];

  const visit = (stackName: string): string[] | null => {
    inProgress.add(stackName);
    path.push(stackName);

    const dependencies = [...(graph.dependencies.get(stackName) ?? [])].sort(
      compareNames
    );

    for (const dependency of dependencies) {
      if (inProgress.has(dependency)) {
        return path.slice(path.indexOf(dependency));
      }
      if (!done.has(dependency)) {
        const cycle = visit(dependency);
        if (cycle) return cycle;
      }
    }

    path.pop();
    inProgress.delete(stackName);
    done.add(stackName);
    return null;
  };

  for (const stackName of sortedNames(graph)) {
    if (!done.has(stackName)) {
      const cycle = visit(stackName);
      if (cycle) return cycle;
    }
  }

  return null;
};

/**
 * Build the dependency graph for a set of discovered stacks.
 *
 * Throws DuplicateStackNameError, UnresolvedDependencyError or
 * CyclicDependencyError, checked in that order.
 */
export const buildDependencyGraph = ({
  stacks,
}: {
  stacks: readonly Stack[];
}): DependencyGraph => {
  assertUniqueNames({ stacks });

  const ordered = [...stacks].sort((a, b) => compareNames(a.stackName, b.stackName));
  const stackMap = new Map(ordered.map((stack) => [stack.stackName, stack]));
  const dependencies = new Map<string, string[]>();
  const dependents = new Map<string, string[]>(
    ordered.map((stack) => [stack.stackName, []])
  );

  ordered.forEach((stack) => {
    stack.dependsOn.forEach((dependencyName) => {
      if (!stackMap.has(dependencyName)) {
        throw new UnresolvedDependencyError({
          stackName: stack.stackName,
          dependencyName,
        });
      }
    });

    const uniqueDependencies = [...new Set(stack.dependsOn)];
    dependencies.set(stack.stackName, uniqueDependencies);

    uniqueDependencies.forEach((dependencyName) => {
      dependents.get(dependencyName)?.push(stack.stackName);
    });
  });

  const graph: DependencyGraph = { stacks: stackMap, dependencies, dependents };

  const cycle = detectCycle({ graph });
  if (cycle) {
    throw new CyclicDependencyError({ cycle });
  }

  return graph;
};
