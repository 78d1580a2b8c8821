/**
 * Centralized status constants for runs and step executions
 */

export const StepOutcome = {
  PENDING: 'pending',
  RUNNING: 'running',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
  SKIPPED: 'skipped',
  SUSPENDED: 'suspended',
} as const;

export type StepOutcomeType = (typeof StepOutcome)[keyof typeof StepOutcome];

export const RunStatus = {
  PENDING: 'pending',
  RUNNING: 'running',
  SUSPENDED: 'suspended',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
  EXITED: 'exited',
} as const;

export type RunStatusType = (typeof RunStatus)[keyof typeof RunStatus];

/** Statuses after which a run can no longer be resumed */
export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatusType> = new Set([
  RunStatus.SUCCEEDED,
  RunStatus.FAILED,
  RunStatus.EXITED,
]);

export function isTerminalRunStatus(status: RunStatusType): boolean {
  return TERMINAL_RUN_STATUSES.has(status);
}
