import type { ValidationReport } from '../parser/workflow-validator.ts';

/**
 * Error taxonomy shared by the parser, evaluator and runner.
 *
 * Action failures are data: the runner records them on the step execution and routes them
 * through on_failure / continue_on_error. Only ValidationError and engine-internal errors
 * escape a run.
 */

export const ActionErrorKind = {
  EXECUTION: 'execution',
  INVALID_INPUT: 'invalid_input',
  TIMEOUT: 'timeout',
  INTERRUPTED: 'interrupted',
  CANCELED: 'canceled',
  HTTP: 'http',
  LLM: 'llm',
  NOT_FOUND: 'not_found',
  CONTROL_FAIL: 'control_fail',
} as const;

export type ActionErrorKindType = (typeof ActionErrorKind)[keyof typeof ActionErrorKind];

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly report: ValidationReport
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ExpressionError extends Error {
  constructor(
    message: string,
    public readonly expression?: string
  ) {
    super(message);
    this.name = 'ExpressionError';
  }
}

export class ActionError extends Error {
  constructor(
    message: string,
    public readonly kind: ActionErrorKindType | string = ActionErrorKind.EXECUTION,
    public readonly outputs?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ActionError';
  }
}

export class TimeoutError extends ActionError {
  constructor(message: string) {
    super(message, ActionErrorKind.TIMEOUT);
    this.name = 'TimeoutError';
  }
}

export class GuardrailViolation extends Error {
  constructor(
    message: string,
    public readonly scanner: string,
    public readonly severity: 'low' | 'medium' | 'high' | 'critical',
    public readonly stage: 'input' | 'output'
  ) {
    super(message);
    this.name = 'GuardrailViolation';
  }
}

export type SuspendInputType = 'text' | 'multiline' | 'confirm' | 'choice';

export interface SuspendRequest {
  prompt: string;
  inputType: SuspendInputType;
  choices?: string[];
  default?: unknown;
  /** Seconds after suspension before a resume without a value falls back to the default */
  timeout?: number;
  /** Action-specific state carried across the suspension (e.g. generated instructions) */
  state?: Record<string, unknown>;
}

/**
 * Thrown by an action that needs an externally supplied value.
 * Not a failure: the runner persists a checkpoint and returns `suspended`.
 */
export class SuspendSignal extends Error {
  constructor(
    public readonly stepId: string,
    public readonly request: SuspendRequest
  ) {
    super(request.prompt);
    this.name = 'SuspendSignal';
  }
}

/**
 * Raised by control/exit and control/fail to end the whole run.
 */
export class RunTermination extends Error {
  constructor(
    public readonly mode: 'exit' | 'fail',
    message: string,
    public readonly outputs: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'RunTermination';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Short type name stored as `error_type` on a failed step execution
 */
export function errorTypeOf(error: unknown): string {
  if (error instanceof TimeoutError) return 'TimeoutError';
  if (error instanceof ActionError) {
    return error.kind === ActionErrorKind.EXECUTION ? 'ActionError' : `ActionError:${error.kind}`;
  }
  if (error instanceof Error) return error.name;
  return 'Error';
}
