import { z } from 'zod';
import { TIMEOUTS } from '../../utils/constants.ts';
import { RunTermination } from '../errors.ts';
import { sleep } from '../retry.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  parseActionInput,
  throwIfAborted,
} from './types.ts';

const ExitSchema = z
  .object({
    message: z.string().default('Workflow exited'),
    outputs: z.record(z.unknown()).default({}),
  })
  .strict();

const FailSchema = z
  .object({
    message: z.string().default('Workflow failed'),
    error_code: z.string().default('WORKFLOW_FAILURE'),
    details: z.record(z.unknown()).default({}),
  })
  .strict();

const WaitSchema = z
  .object({
    /** Condition, left unevaluated and re-checked on every poll */
    until: z.union([z.string(), z.boolean()]).optional(),
    /** Seconds */
    timeout: z.number().positive().default(60),
    /** Seconds between polls */
    interval: z.number().positive().optional(),
  })
  .strict();

export async function executeExit(
  input: Record<string, unknown>,
  _context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput('control/exit', ExitSchema, input);
  throw new RunTermination('exit', params.message, params.outputs);
}

export async function executeFail(
  input: Record<string, unknown>,
  _context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput('control/fail', FailSchema, input);
  throw new RunTermination('fail', params.message, {
    error_code: params.error_code,
    details: params.details,
  });
}

/**
 * Poll `until` until it holds or `timeout` elapses. Without `until`, waits out the timeout.
 */
export async function executeWait(
  input: Record<string, unknown>,
  context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput('control/wait', WaitSchema, input);
  const intervalMs = (params.interval ?? TIMEOUTS.WAIT_POLL_INTERVAL_MS / 1000) * 1000;
  const timeoutMs = params.timeout * 1000;
  const started = Date.now();
  const elapsed = () => (Date.now() - started) / 1000;

  if (params.until === undefined) {
    await sleep(timeoutMs, context.signal);
    throwIfAborted(context.signal);
    return { outputs: { waited: true, condition_met: false, elapsed: elapsed() } };
  }

  while (true) {
    throwIfAborted(context.signal);
    if (context.evaluateCondition(params.until)) {
      return { outputs: { waited: elapsed() > 0, condition_met: true, elapsed: elapsed() } };
    }
    const remaining = timeoutMs - (Date.now() - started);
    if (remaining <= 0) {
      context.logger.warn(`  ⚠️  ${context.stepId}: condition not met within ${params.timeout}s`);
      return { outputs: { waited: true, condition_met: false, elapsed: elapsed() } };
    }
    await sleep(Math.min(intervalMs, remaining), context.signal);
  }
}

export function createControlActions(): ActionDefinition[] {
  return [
    {
      id: 'control/exit',
      description: 'End the run successfully, still running finally steps',
      handler: executeExit,
    },
    {
      id: 'control/fail',
      description: 'End the run as failed, still running failure and finally steps',
      handler: executeFail,
    },
    {
      id: 'control/wait',
      description: 'Wait until a condition holds or a timeout elapses',
      handler: executeWait,
      deferred: ['until'],
    },
  ];
}
