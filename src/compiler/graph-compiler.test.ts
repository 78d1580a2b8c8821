import { describe, expect, test } from 'vitest';
import type { WorkflowDefinition } from '../parser/schema.ts';
import { WorkflowValidator } from '../parser/workflow-validator.ts';
import { GraphCompiler } from './graph-compiler.ts';

function define(document: Record<string, unknown>): WorkflowDefinition {
  const report = WorkflowValidator.validate(document);
  if (!report.workflow || !report.valid) {
    throw new Error(report.errors.map((e) => `${e.location}: ${e.message}`).join('\n'));
  }
  return report.workflow;
}

function mainSteps(steps: unknown[], extra: Record<string, unknown> = {}) {
  const workflow = define({ name: 'test', jobs: { main: { steps } }, ...extra });
  return GraphCompiler.compileWorkflow(workflow).jobs[0].segments.steps;
}

describe('GraphCompiler', () => {
  test('should compile a linear list', () => {
    const segment = mainSteps([
      { id: 'a', run: 'echo a' },
      { id: 'b', run: 'echo b' },
    ]);
    expect(segment.entry).toBe('a');
    expect(segment.order).toEqual(['a', 'b']);
    expect(segment.nodes.a).toMatchObject({ kind: 'action', next: 'b', onFailure: null, loop: null });
    expect(segment.nodes.b).toMatchObject({ kind: 'action', next: null, onFailure: null });
  });

  test('should compile if into a branch whose false edge skips to the successor', () => {
    const segment = mainSteps([
      { id: 'a', run: 'echo a', if: 'inputs.go' },
      { id: 'b', run: 'echo b' },
    ]);
    expect(segment.entry).toBe('a#if');
    expect(segment.order).toEqual(['a#if', 'a', 'b']);
    expect(segment.nodes['a#if']).toEqual({
      id: 'a#if',
      kind: 'branch',
      stepId: 'a',
      condition: 'inputs.go',
      next: 'a',
      onFalse: 'b',
      perIteration: false,
    });
  });

  test('should compile loops into head, body, tail and back edge', () => {
    const segment = mainSteps([
      {
        id: 'each',
        uses: 'state/append',
        loop: '${{ inputs.items }}',
        if: "loop.item != 'x'",
        break_if: "loop.output.done",
        continue_on_error: true,
      },
      { id: 'after', run: 'echo done' },
    ]);
    expect(segment.order).toEqual(['each#loop', 'each#if', 'each', 'each#tail', 'each#back', 'after']);
    expect(segment.nodes['each#loop']).toMatchObject({
      kind: 'loop_head',
      source: '${{ inputs.items }}',
      next: 'each#if',
      exit: 'after',
      onFailure: null,
    });
    expect(segment.nodes['each#if']).toMatchObject({ onFalse: 'each#tail', perIteration: true });
    expect(segment.nodes.each).toMatchObject({ next: 'each#tail', onFailure: 'each#tail', loop: 'each' });
    expect(segment.nodes['each#tail']).toMatchObject({
      kind: 'loop_tail',
      breakIf: 'loop.output.done',
      next: 'each#back',
      exit: 'after',
    });
    expect(segment.nodes['each#back']).toMatchObject({
      kind: 'jump',
      target: 'each#loop',
      reason: 'loop_back',
    });
  });

  test('should route failures through an on_failure jump', () => {
    const segment = mainSteps([
      { id: 'c', run: 'exit 1', on_failure: 'd' },
      { id: 'x', run: 'echo skipped' },
      { id: 'd', run: 'echo recovered' },
    ]);
    expect(segment.order).toEqual(['c#fail', 'c', 'x', 'd']);
    expect(segment.nodes.c).toMatchObject({ next: 'x', onFailure: 'c#fail' });
    expect(segment.nodes['c#fail']).toMatchObject({ kind: 'jump', target: 'd', reason: 'on_failure' });
  });

  test('should prefer on_failure over continue_on_error inside loops', () => {
    const segment = mainSteps([
      { id: 'l', run: 'false', loop: '[1, 2]', continue_on_error: true, on_failure: 'h' },
      { id: 'h', run: 'echo handled', if: 'true' },
    ]);
    expect(segment.nodes.l).toMatchObject({ onFailure: 'l#fail' });
    expect(segment.nodes['l#loop']).toMatchObject({ onFailure: 'l#fail' });
    expect(segment.nodes['l#fail']).toMatchObject({ target: 'h#if' });
  });

  test('should be deterministic', () => {
    const document = {
      name: 'test',
      jobs: {
        main: {
          steps: [
            { id: 'a', run: 'echo', if: 'true' },
            { id: 'b', uses: 'state/set', loop: '[1]', on_failure: 'c' },
            { id: 'c', run: 'echo' },
          ],
          finally: [{ run: 'echo cleanup' }],
        },
      },
    };
    const first = GraphCompiler.compileWorkflow(define(document));
    const second = GraphCompiler.compileWorkflow(define(document));
    expect(second).toEqual(first);
    expect(GraphCompiler.executionOrder(second)).toEqual(GraphCompiler.executionOrder(first));
  });

  test('should merge step guardrails over workflow defaults', () => {
    const segment = mainSteps(
      [
        { id: 'merged', uses: 'llm/generate', guardrails: { output: { json: null } } },
        { id: 'inherited', uses: 'llm/generate' },
        { id: 'disabled', uses: 'llm/generate', guardrails: false },
      ],
      { guardrails: { input: { secrets: null, pii: { redact: true } } } }
    );
    const merged = segment.nodes.merged;
    const inherited = segment.nodes.inherited;
    const disabled = segment.nodes.disabled;
    if (merged.kind !== 'action' || inherited.kind !== 'action' || disabled.kind !== 'action') {
      throw new Error('expected action nodes');
    }
    expect(GraphCompiler.scannerCount(merged.guardrails)).toBe(3);
    expect(merged.guardrails?.input).toEqual({ secrets: null, pii: { redact: true } });
    expect(GraphCompiler.scannerCount(inherited.guardrails)).toBe(2);
    expect(disabled.guardrails).toBeNull();
    expect(GraphCompiler.scannerCount(disabled.guardrails)).toBe(0);
  });

  test('should compile guardrail step targets as jumps', () => {
    const segment = mainSteps([
      {
        id: 'ask',
        uses: 'llm/generate',
        guardrails: { output: { json: null }, on_fail: 'fallback' },
      },
      { id: 'fallback', run: 'echo fallback' },
    ]);
    expect(segment.nodes.ask).toMatchObject({ guardrailTarget: 'ask#guard' });
    expect(segment.nodes['ask#guard']).toMatchObject({ target: 'fallback', reason: 'guardrail' });
  });

  test('should resolve step timeouts against the workflow default', () => {
    const segment = mainSteps(
      [
        { id: 'quick', run: 'echo', timeout: 10 },
        { id: 'slow', run: 'echo' },
      ],
      { default_timeout: 60 }
    );
    expect(segment.nodes.quick).toMatchObject({ timeout: 10 });
    expect(segment.nodes.slow).toMatchObject({ timeout: 60 });
  });

  test('should list the planned execution order', () => {
    const compiled = GraphCompiler.compileWorkflow(
      define({
        name: 'test',
        jobs: {
          main: {
            steps: [
              { id: 'a', run: 'echo a' },
              { id: 'b', uses: 'state/set', if: 'true', with: { x: 1 } },
            ],
            finally: [{ id: 'c', run: 'echo c' }],
          },
        },
        finally: [{ id: 'd', run: 'echo d' }],
      })
    );
    expect(compiled.document.job).toBeNull();
    expect(compiled.document.segments.steps.entry).toBeNull();
    expect(GraphCompiler.executionOrder(compiled)).toEqual([
      'main/steps: a (run)',
      'main/steps: b (state/set) [if]',
      'main/finally: c (run)',
      'workflow/finally: d (run)',
    ]);
  });
});
