import type { z } from 'zod';
import { formatZodError } from '../../parser/workflow-validator.ts';
import type { Logger } from '../../utils/logger.ts';
import { ActionError, ActionErrorKind } from '../errors.ts';

/**
 * Value handed back to a step that suspended, when the run is resumed
 */
export interface ResumeValue {
  /** False when the run was resumed without an answer */
  provided: boolean;
  value?: unknown;
  /** ISO timestamp of the suspension */
  suspendedAt: string;
  state?: Record<string, unknown>;
}

/** Mutations an action may make to the run's `variables` */
export interface VariableStore {
  set(name: string, value: unknown): void;
  append(name: string, value: unknown): unknown[];
}

export interface ActionContext {
  runId: string;
  workflowName: string;
  stepId: string;
  logger: Logger;
  /** Aborted on cancellation or when the step times out */
  signal: AbortSignal;
  /** Step timeout in seconds */
  timeout: number;
  /** Resolved workflow env */
  env: Record<string, string>;
  variables: VariableStore;
  /** Evaluates a condition against the live run state */
  evaluateCondition(condition: string | boolean): boolean;
  resume?: ResumeValue;
  interactive?: boolean;
}

export interface ActionResult {
  outputs: Record<string, unknown>;
  stdout?: string;
  stderr?: string;
  /** Path of captured output when capture_mode is `file` */
  file?: string;
}

/**
 * An action receives its evaluated `with` mapping. Failures are thrown as ActionError.
 */
export type ActionHandler = (
  input: Record<string, unknown>,
  context: ActionContext
) => Promise<ActionResult>;

export interface ActionDefinition {
  id: string;
  description: string;
  handler: ActionHandler;
  /** `with` keys passed through unevaluated, for expressions the action evaluates itself */
  deferred?: string[];
}

/**
 * Validate an action's `with` mapping, failing the step with `invalid_input`
 */
export function parseActionInput<T extends z.ZodTypeAny>(
  actionId: string,
  schema: T,
  input: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ActionError(
      `Invalid input for ${actionId}:\n${formatZodError(result.error)}`,
      ActionErrorKind.INVALID_INPUT
    );
  }
  return result.data;
}

export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new ActionError('Step canceled', ActionErrorKind.CANCELED);
  }
}
