import { beforeEach, describe, expect, test } from 'vitest';
import { MemoryCheckpointStore } from '../db/memory-store.ts';
import type { WorkflowDefinition } from '../parser/schema.ts';
import { WorkflowValidator } from '../parser/workflow-validator.ts';
import { SilentLogger } from '../utils/logger.ts';
import { type ActionRegistry, createDefaultRegistry } from './action-registry.ts';
import { ActionError } from './errors.ts';
import type { WorkflowEvent } from './events.ts';
import { RunContext, type RunContextSnapshot } from './run-context.ts';
import { type RunOptions, WorkflowRunner } from './workflow-runner.ts';

function define(document: Record<string, unknown>): WorkflowDefinition {
  const report = WorkflowValidator.validate(document);
  if (!report.workflow || !report.valid) {
    throw new Error(report.errors.map((e) => `${e.location}: ${e.message}`).join('\n'));
  }
  return report.workflow;
}

function job(steps: unknown[], extra: Record<string, unknown> = {}): WorkflowDefinition {
  return define({ name: 'test', jobs: { main: { steps, ...extra } } });
}

function withoutTiming(snapshot: RunContextSnapshot): RunContextSnapshot {
  const steps: RunContextSnapshot['steps'] = {};
  for (const [id, execution] of Object.entries(snapshot.steps)) {
    const { started_at: _started, completed_at: _completed, duration_ms: _duration, ...rest } = execution;
    steps[id] = rest;
  }
  return { ...snapshot, steps };
}

describe('WorkflowRunner', () => {
  let registry: ActionRegistry;
  let store: MemoryCheckpointStore;
  let events: WorkflowEvent[];
  let calls: Record<string, number>;

  const runner = (workflow: WorkflowDefinition, options: RunOptions = {}) =>
    new WorkflowRunner(workflow, {
      registry,
      store,
      logger: new SilentLogger(),
      onEvent: (event) => events.push(event),
      ...options,
    });

  beforeEach(() => {
    store = new MemoryCheckpointStore();
    events = [];
    calls = {};
    const count = (id: string) => {
      calls[id] = (calls[id] ?? 0) + 1;
      return calls[id];
    };
    registry = createDefaultRegistry({ logger: new SilentLogger() })
      .register({
        id: 'test/boom',
        description: 'Always fails',
        handler: async () => {
          count('boom');
          throw new ActionError('boom');
        },
      })
      .register({
        id: 'test/flaky',
        description: 'Fails until the third call',
        handler: async () => {
          const call = count('flaky');
          if (call < 3) throw new ActionError(`attempt ${call} failed`);
          return { outputs: { call } };
        },
      })
      .register({
        id: 'test/echo',
        description: 'Returns its input',
        handler: async (input) => {
          count('echo');
          return { outputs: { ...input } };
        },
      })
      .register({
        id: 'test/fail-on',
        description: 'Fails when value equals bad',
        handler: async (input) => {
          if (input.value === input.bad) throw new ActionError(`bad value ${String(input.value)}`);
          return { outputs: { value: input.value } };
        },
      })
      .register({
        id: 'test/hang',
        description: 'Waits for its signal',
        handler: (_input, context) =>
          new Promise((resolve) => {
            context.signal.addEventListener('abort', () => resolve({ outputs: {} }), { once: true });
          }),
      });
  });

  test('should run steps in order and succeed', async () => {
    const workflow = job([
      { id: 'first', uses: 'state/set', with: { greeting: 'hello' } },
      { id: 'second', uses: 'test/echo', with: { text: '${{ variables.greeting }} world' } },
    ]);

    const result = await runner(workflow, { runId: 'run-1' }).run();

    expect(result.status).toBe('succeeded');
    expect(result.error).toBeUndefined();
    expect(result.context.steps.second.outputs).toEqual({ text: 'hello world' });
    expect((await store.getRun('run-1'))?.status).toBe('succeeded');
    expect(events[0]).toMatchObject({ type: 'workflow.start', runId: 'run-1', resumed: false });
    expect(events[events.length - 1]).toMatchObject({ type: 'workflow.complete', status: 'succeeded' });
  });

  test('should run an empty loop zero times', async () => {
    const workflow = job([
      { id: 'each', loop: [], uses: 'state/append', with: { target: 'seen', value: '${{ loop.item }}' } },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('succeeded');
    expect(result.context.steps.each.outcome).toBe('succeeded');
    expect(result.context.steps.each.outputs).toMatchObject({
      iterations: 0,
      break_early: false,
      break_index: null,
    });
    expect(result.context.variables.seen).toBeUndefined();
  });

  test('should stop a loop when break_if holds', async () => {
    const workflow = job([
      {
        id: 'each',
        loop: ['a', 'b', 'c'],
        uses: 'state/append',
        with: { target: 'seen', value: '${{ loop.item }}' },
        break_if: 'loop.item == "b"',
      },
    ]);

    const result = await runner(workflow).run();

    expect(result.context.steps.each.outputs).toMatchObject({
      iterations: 2,
      succeeded: 2,
      break_early: true,
      break_index: 2,
      break_item: 'b',
    });
    expect(result.context.variables.seen).toEqual(['a', 'b']);
  });

  test('should evaluate a loop source expression', async () => {
    const workflow = define({
      name: 'test',
      inputs: { hosts: { type: 'array', default: ['web', 'db'] } },
      jobs: {
        main: {
          steps: [
            {
              id: 'each',
              loop: 'inputs.hosts',
              uses: 'state/append',
              with: { target: 'seen', value: '${{ loop.index }}:${{ loop.item }}' },
            },
          ],
        },
      },
    });

    const result = await runner(workflow).run();

    expect(result.context.variables.seen).toEqual(['1:web', '2:db']);
  });

  test('should fail a step whose loop source is not a list', async () => {
    const workflow = job([{ id: 'each', loop: '"text"', uses: 'test/echo' }]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.context.steps.each.outcome).toBe('failed');
    expect(result.error).toBe('Loop source of step "each" must be a list, got string');
  });

  test('should record failed iterations under continue_on_error', async () => {
    const workflow = job([
      {
        id: 'each',
        loop: [1, 2, 3],
        uses: 'test/fail-on',
        with: { value: '${{ loop.item }}', bad: 2 },
        continue_on_error: true,
      },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('succeeded');
    expect(result.context.steps.each.outputs).toMatchObject({
      iterations: 3,
      succeeded: 2,
      failed: 1,
      errors: [{ index: 1, item: 2, error: 'bad value 2', error_type: 'ActionError' }],
    });
  });

  test('should fail the loop when every iteration fails', async () => {
    const workflow = job([
      { id: 'each', loop: [1, 2], uses: 'test/boom', continue_on_error: true },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(calls.boom).toBe(2);
    expect(result.context.steps.each.outcome).toBe('failed');
    expect(result.error).toBe('All 2 iterations of step "each" failed');
  });

  test('should skip a single iteration when the body condition is false', async () => {
    const workflow = job([
      {
        id: 'each',
        loop: [1, 2, 3],
        if: 'loop.item != 2',
        uses: 'state/append',
        with: { target: 'seen', value: '${{ loop.item }}' },
      },
    ]);

    const result = await runner(workflow).run();

    expect(result.context.variables.seen).toEqual([1, 3]);
    expect(result.context.steps.each.outputs).toMatchObject({ iterations: 2, skipped: 1 });
  });

  test('should expose a skipped step with empty outputs', async () => {
    const workflow = job([
      { id: 'B', if: false, uses: 'state/set', with: { touched: true } },
      { id: 'C', uses: 'state/set', with: { result: '${{ steps.B.outputs | default("none") }}' } },
    ]);

    const result = await runner(workflow).run();

    expect(result.context.steps.B.outcome).toBe('skipped');
    expect(result.context.variables).toEqual({ result: 'none' });
    expect(events).toContainEqual(expect.objectContaining({ type: 'step.skipped', stepId: 'B', reason: 'condition' }));
  });

  test('should follow an on_failure jump', async () => {
    const workflow = job([
      { id: 'C', uses: 'test/boom', on_failure: 'D' },
      { id: 'between', uses: 'state/set', with: { between: true } },
      { id: 'D', uses: 'state/set', with: { handled: '${{ error.step }}: ${{ error.message }}' } },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('succeeded');
    expect(result.context.steps.C.outcome).toBe('failed');
    expect(result.context.steps.C.error).toBe('boom');
    expect(result.context.steps.between).toBeUndefined();
    expect(result.context.variables.handled).toBe('C: boom');
  });

  test('should continue past a failed step with continue_on_error', async () => {
    const workflow = job([
      { id: 'flop', uses: 'test/boom', continue_on_error: true },
      { id: 'next', uses: 'state/set', with: { reached: true } },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('succeeded');
    expect(result.context.steps.flop.outcome).toBe('failed');
    expect(result.context.variables.reached).toBe(true);
  });

  test('should not expose error to a step after a continue_on_error failure', async () => {
    const workflow = job([
      { id: 'flop', uses: 'test/boom', continue_on_error: true },
      { id: 'later', uses: 'state/set', with: { seen: '${{ error.message }}' } },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.context.steps.later.error_type).toBe('ExpressionError');
    expect(result.context.steps.later.error).toBe(
      'Failed to evaluate expression "error.message": "error" is not available here'
    );
    expect(result.context.variables.seen).toBeUndefined();
  });

  test('should close the failure scope once the on_failure target finishes', async () => {
    const workflow = job([
      { id: 'C', uses: 'test/boom', on_failure: 'D' },
      { id: 'D', uses: 'state/set', with: { handled: '${{ error.message }}' } },
      { id: 'E', uses: 'state/set', with: { again: '${{ error.message }}' } },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.context.variables.handled).toBe('boom');
    expect(result.context.steps.E.error_type).toBe('ExpressionError');
  });

  test('should run job handlers and skip later jobs after a failure', async () => {
    const workflow = define({
      name: 'test',
      jobs: {
        build: {
          steps: [{ id: 'compile', uses: 'test/boom' }],
          on_complete: [{ id: 'celebrate', uses: 'state/set', with: { celebrated: true } }],
          on_failure: [{ id: 'notify', uses: 'state/set', with: { notified: '${{ error.message }}' } }],
          finally: [{ id: 'tidy', uses: 'state/set', with: { tidy: true } }],
        },
        deploy: { steps: [{ id: 'ship', uses: 'test/echo' }] },
      },
      on_failure: [{ id: 'page', uses: 'state/set', with: { paged: true } }],
      finally: [{ id: 'close', uses: 'state/set', with: { closed: true } }],
    });

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.error).toBe('boom');
    expect(result.context.variables).toEqual({ notified: 'boom', tidy: true, paged: true, closed: true });
    expect(result.context.steps.celebrate).toBeUndefined();
    expect(result.context.steps.ship.outcome).toBe('skipped');
    expect(calls.echo).toBeUndefined();
  });

  test('should end the run as exited and still run finally steps', async () => {
    const workflow = job(
      [
        { id: 'stop', uses: 'control/exit', with: { message: 'nothing to do', outputs: { reason: 'clean' } } },
        { id: 'after', uses: 'state/set', with: { after: true } },
      ],
      {
        on_complete: [{ id: 'done', uses: 'state/set', with: { done: true } }],
        finally: [{ id: 'cleanup', uses: 'state/set', with: { cleaned: true } }],
      }
    );

    const result = await runner(workflow, { runId: 'run-exit' }).run();

    expect(result.status).toBe('exited');
    expect(result.outputs).toEqual({ reason: 'clean' });
    expect(result.context.steps.after).toBeUndefined();
    expect(result.context.variables).toEqual({ cleaned: true });
    expect((await store.getRun('run-exit'))?.outputs).toEqual({ reason: 'clean' });
  });

  test('should end the run as failed on control/fail and run failure handlers', async () => {
    const workflow = job([{ id: 'block', uses: 'control/fail', with: { message: 'Deploy blocked' } }], {
      on_failure: [{ id: 'notify', uses: 'state/set', with: { reason: '${{ error.message }}' } }],
    });

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Deploy blocked');
    expect(result.outputs).toEqual({ error_code: 'WORKFLOW_FAILURE', details: {} });
    expect(result.context.variables.reason).toBe('Deploy blocked');
  });

  test('should cancel before dispatch and still run finally steps', async () => {
    const controller = new AbortController();
    controller.abort();
    const workflow = job([{ id: 'first', uses: 'test/echo' }], {
      on_failure: [{ id: 'notify', uses: 'state/set', with: { notified: true } }],
      finally: [{ id: 'cleanup', uses: 'state/set', with: { cleaned: true } }],
    });

    const result = await runner(workflow, { signal: controller.signal }).run();

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Run canceled');
    expect(calls.echo).toBeUndefined();
    expect(result.context.variables).toEqual({ cleaned: true });
  });

  test('should retry a failing step', async () => {
    const workflow = job([{ id: 'flaky', uses: 'test/flaky', retry: { max_attempts: 3, delay: 0 } }]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('succeeded');
    expect(result.context.steps.flaky.attempts).toBe(3);
    expect(result.context.steps.flaky.outputs).toEqual({ call: 3 });
  });

  test('should not retry errors outside retry_on', async () => {
    const workflow = job([
      { id: 'flaky', uses: 'test/flaky', retry: { max_attempts: 3, delay: 0, retry_on: ['timeout'] } },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(calls.flaky).toBe(1);
    expect(result.error).toBe('attempt 1 failed');
  });

  test('should fail a step that exceeds its timeout', async () => {
    const workflow = job([{ id: 'slow', uses: 'test/hang', timeout: 1 }]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.context.steps.slow.error_type).toBe('TimeoutError');
    expect(result.error).toBe('Step "slow" timed out after 1000ms');
  });

  test('should suspend and resume with the same final state as a queued answer', async () => {
    const workflow = job([
      { id: 'ask', uses: 'human/input', with: { prompt: 'Ship it?' } },
      { id: 'record', uses: 'state/set', with: { answer: '${{ steps.ask.outputs.response }}' } },
    ]);

    const suspended = await runner(workflow, { runId: 'run-a' }).run();
    expect(suspended.status).toBe('suspended');
    expect(suspended.suspension?.stepId).toBe('ask');
    expect(suspended.suspension?.request.prompt).toBe('Ship it?');
    expect((await store.getRun('run-a'))?.status).toBe('suspended');
    expect((await store.latestCheckpoint('run-a'))?.kind).toBe('suspended');

    const resumed = await runner(workflow).resume('run-a', 'yes');
    expect(resumed.status).toBe('succeeded');
    expect(resumed.context.variables.answer).toBe('yes');

    const queuedStore = new MemoryCheckpointStore();
    const queued = await runner(workflow, { runId: 'run-a', store: queuedStore, answers: { ask: 'yes' } }).run();
    expect(queued.status).toBe('succeeded');
    expect(withoutTiming(resumed.context)).toEqual(withoutTiming(queued.context));
  });

  test('should resume with secret-derived state restored, not masked', async () => {
    const workflow = define({
      name: 'test',
      inputs: { token: { type: 'string', secret: true } },
      env: { AUTH: 'Bearer ${{ inputs.token }}' },
      jobs: {
        main: {
          steps: [
            { id: 'first', uses: 'test/echo', with: { auth: '${{ env.AUTH }}' } },
            { id: 'ask', uses: 'human/input', with: { prompt: 'Continue?' } },
            { id: 'call', uses: 'test/echo', with: { auth: '${{ env.AUTH }}' } },
          ],
        },
      },
    });
    const inputs = { token: 'test-secret' };

    const suspended = await runner(workflow, { runId: 'run-sealed', inputs }).run();
    expect(suspended.status).toBe('suspended');
    const checkpoint = await store.latestCheckpoint('run-sealed');
    expect(checkpoint?.context.env).toEqual({ AUTH: 'Bearer ***REDACTED:token***' });
    expect(checkpoint?.context.steps.first.outputs).toEqual({ auth: 'Bearer ***REDACTED:token***' });

    const resumed = await runner(workflow, { inputs }).resume('run-sealed', 'yes');
    expect(resumed.status).toBe('succeeded');
    expect(resumed.context.steps.call.outputs).toEqual({ auth: 'Bearer test-secret' });

    const queued = await runner(workflow, {
      runId: 'run-sealed',
      inputs,
      store: new MemoryCheckpointStore(),
      answers: { ask: 'yes' },
    }).run();
    expect(withoutTiming(resumed.context)).toEqual(withoutTiming(queued.context));
  });

  test('should reject resuming a finished run', async () => {
    const workflow = job([{ id: 'only', uses: 'test/echo' }]);
    await runner(workflow, { runId: 'run-done' }).run();

    await expect(runner(workflow).resume('run-done')).rejects.toThrow(
      'Run "run-done" already finished with status "succeeded"'
    );
  });

  test('should treat a step left running by a crash as interrupted', async () => {
    const workflow = job([
      { id: 'work', uses: 'test/echo', continue_on_error: true },
      { id: 'after', uses: 'state/set', with: { after: true } },
    ]);
    const context = new RunContext({ runId: 'run-crash', workflow });
    context.markRunning('work', 1);
    await store.createRun({ id: 'run-crash', workflowName: 'test', workflowPath: null, inputs: {} });
    await store.updateRun('run-crash', { status: 'running' });
    await store.saveCheckpoint({
      runId: 'run-crash',
      kind: 'intent',
      status: 'running',
      cursor: { job: 0, section: 'steps', node: 'work' },
      progress: { jobFailed: false, runFailed: false, termination: null, error: null },
      context: context.snapshot(),
      suspension: null,
    });

    const result = await runner(workflow).resume('run-crash');

    expect(result.status).toBe('succeeded');
    expect(calls.echo).toBeUndefined();
    expect(result.context.steps.work).toMatchObject({
      outcome: 'failed',
      error: 'Step "work" was interrupted',
      error_type: 'ActionError:interrupted',
    });
    expect(result.context.variables.after).toBe(true);
  });

  test('should fail a step whose output trips a guardrail', async () => {
    const workflow = job([
      {
        id: 'leak',
        uses: 'test/echo',
        with: { text: 'the classified plans' },
        guardrails: { output: { ban_substrings: { substrings: ['classified'] } } },
      },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(result.error).toBe(
      'Guardrail "ban_substrings" blocked output of step "leak": Banned substring "classified" found'
    );
    expect(result.context.steps.leak.error_type).toBe('GuardrailViolation');
    expect(events).toContainEqual(
      expect.objectContaining({ type: 'guardrail.violation', scanner: 'ban_substrings', action: 'abort' })
    );
  });

  test('should keep going when a guardrail policy is continue', async () => {
    const workflow = job([
      {
        id: 'leak',
        uses: 'test/echo',
        with: { text: 'the classified plans' },
        guardrails: { output: { ban_substrings: { substrings: ['classified'] } }, on_fail: 'continue' },
      },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('succeeded');
    expect(result.context.steps.leak.outputs).toEqual({ text: 'the classified plans' });
  });

  test('should retry a step on guardrail violations up to max_retries', async () => {
    const workflow = job([
      {
        id: 'leak',
        uses: 'test/echo',
        with: { text: 'classified' },
        guardrails: {
          output: { ban_substrings: { substrings: ['classified'] } },
          on_fail: 'retry',
          max_retries: 2,
        },
      },
    ]);

    const result = await runner(workflow).run();

    expect(result.status).toBe('failed');
    expect(calls.echo).toBe(3);
  });

  test('should redact secret inputs at rest', async () => {
    const workflow = define({
      name: 'test',
      inputs: { token: { type: 'string', secret: true } },
      jobs: { main: { steps: [{ id: 'use', uses: 'test/echo', with: { auth: '${{ inputs.token }}' } }] } },
    });

    const result = await runner(workflow, { runId: 'run-secret', inputs: { token: 'test-secret-value' } }).run();

    expect(result.context.steps.use.outputs).toEqual({ auth: 'test-secret-value' });
    expect((await store.getRun('run-secret'))?.inputs).toEqual({ token: '[REDACTED]' });
    const final = await store.latestCheckpoint('run-secret');
    expect(final?.context.inputs).toEqual({ token: '[REDACTED]' });
    expect(final?.context.steps.use.outputs).toEqual({ auth: '***REDACTED:token***' });
  });
});
