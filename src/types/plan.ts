export type StackOperation = 'init' | 'plan' | 'apply' | 'destroy';

export type PlanDirection = 'apply' | 'destroy';

export const STACK_OPERATIONS: readonly StackOperation[] = [
  'init',
  'plan',
  'apply',
  'destroy',
];

/**
 * Operations that take `-var-file` arguments
 */
export const VAR_FILE_OPERATIONS: ReadonlySet<string> = new Set(STACK_OPERATIONS);

/**
 * Operations that get `-auto-approve` when auto-approval is enabled
 */
export const AUTO_APPROVE_OPERATIONS: ReadonlySet<string> = new Set([
  'apply',
  'destroy',
]);

export interface ExecutionPlan {
  operation: string;
  direction: PlanDirection;
  applyOrder: readonly string[];
  order: readonly string[];
}
