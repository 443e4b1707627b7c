import { compareNames, type DependencyGraph } from './dependency-graph.js';
import { CyclicDependencyError } from './errors.js';
import type { ExecutionPlan, PlanDirection } from '../types/index.js';

const insertSorted = (queue: string[], stackName: string): void => {
  const index = queue.findIndex((queued) => compareNames(stackName, queued) < 0);
  if (index === -1) {
    queue.push(stackName);
  } else {
    queue.splice(index, 0, stackName);
  }
};

/**
 * Topological sort using Kahn's algorithm.
 * Among ready stacks the lexicographically smallest always goes first.
 */
export const computeApplyOrder = ({
  graph,
}: {
  graph: DependencyGraph;
}): string[] => {
  const inDegree = new Map<string, number>();
  graph.stacks.forEach((_, stackName) => {
    inDegree.set(stackName, (graph.dependencies.get(stackName) ?? []).length);
  });

  const queue: string[] = [];
  inDegree.forEach((degree, stackName) => {
    if (degree === 0) insertSorted(queue, stackName);
  });

  const sorted: string[] = [];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    sorted.push(current);

    (graph.dependents.get(current) ?? []).forEach((dependent) => {
      const degree = (inDegree.get(dependent) ?? 0) - 1;
      inDegree.set(dependent, degree);
      if (degree === 0) insertSorted(queue, dependent);
    });
  }

  if (sorted.length !== graph.stacks.size) {
    const remaining = [...graph.stacks.keys()]
      .filter((stackName) => !sorted.includes(stackName))
      .sort(compareNames);
    throw new CyclicDependencyError({ cycle: remaining });
  }

  return sorted;
};

export const directionFor = (operation: string): PlanDirection =>
  operation === 'destroy' ? 'destroy' : 'apply';

/**
 * Build the execution plan for an operation. Destroy runs the apply order
 * reversed.
 */
export const createExecutionPlan = ({
  graph,
  operation,
}: {
  graph: DependencyGraph;
  operation: string;
}): ExecutionPlan => {
  const applyOrder = Object.freeze(computeApplyOrder({ graph }));
  const direction = directionFor(operation);
  const order =
    direction === 'destroy' ? Object.freeze([...applyOrder].reverse()) : applyOrder;

  return { operation, direction, applyOrder, order };
};
