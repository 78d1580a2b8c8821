import { describe, expect, test } from 'vitest';
import { z } from 'zod';
import { type ValidationReport, WorkflowValidator, formatZodError } from './workflow-validator.ts';

function workflowWith(steps: unknown[], extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { name: 'test', jobs: { main: { steps } }, ...extra };
}

function codes(report: ValidationReport): string[] {
  return report.errors.map((error) => error.code);
}

describe('WorkflowValidator', () => {
  describe('structure', () => {
    test('should accept a minimal workflow and apply defaults', () => {
      const report = WorkflowValidator.validate(workflowWith([{ id: 'hello', run: 'echo hi' }]));
      expect(report.valid).toBe(true);
      expect(report.errors).toEqual([]);
      expect(report.warnings).toEqual([]);
      expect(report.workflow?.schema_version).toBe('1.0');
      expect(report.workflow?.shell_safety).toBe('strict');
      expect(report.workflow?.default_timeout).toBe(300);
      expect(report.workflow?.jobs.main.finally).toEqual([]);
      expect(report.workflow?.jobs.main.steps[0].continue_on_error).toBe(false);
    });

    test('should require exactly one of run or uses', () => {
      const neither = WorkflowValidator.validate(workflowWith([{ id: 'a' }]));
      expect(neither.valid).toBe(false);
      expect(neither.errors).toContainEqual({
        code: 'E001',
        message: 'Step must have either "run" or "uses"',
        location: 'jobs.main.steps[0]',
      });

      const both = WorkflowValidator.validate(workflowWith([{ id: 'a', run: 'x', uses: 'state/set' }]));
      expect(both.errors.map((e) => e.message)).toContain('Step cannot have both "run" and "uses"');
      expect(both.workflow).toBeUndefined();
    });

    test('should reject a workflow without jobs', () => {
      const report = WorkflowValidator.validate({ name: 'test', jobs: {} });
      expect(report.errors).toContainEqual({
        code: 'E001',
        message: 'Workflow must have at least one job',
        location: 'jobs',
      });
    });

    test('should reject unsupported schema versions', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo' }], { schema_version: 2 })
      );
      expect(report.errors).toContainEqual({
        code: 'E001',
        message: 'Unsupported schema version "2.0". Supported: 1.0',
        location: 'schema_version',
      });
    });

    test('should accept shorthand inputs as defaults', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo' }], { inputs: { target: 'localhost', retries: 3 } })
      );
      expect(report.valid).toBe(true);
      expect(report.workflow?.inputs?.target).toEqual({
        type: 'string',
        default: 'localhost',
        required: false,
        secret: false,
      });
      expect(report.workflow?.inputs?.retries.type).toBe('integer');
    });
  });

  describe('step ids', () => {
    test('should assign step_<n> ids skipping ids already in use', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ run: 'echo 1' }, { id: 'step_2', run: 'echo 2' }, { run: 'echo 3' }])
      );
      expect(report.valid).toBe(true);
      expect(report.workflow?.jobs.main.steps.map((s) => s.id)).toEqual([
        'step_1',
        'step_2',
        'step_3',
      ]);
    });

    test('should reject reserved and malformed ids', () => {
      const report = WorkflowValidator.validate(
        workflowWith([
          { id: 'loop', run: 'a' },
          { id: '9lives', run: 'b' },
          { id: '__hidden', run: 'c' },
          { id: 'x'.repeat(65), run: 'd' },
        ])
      );
      expect(codes(report)).toEqual(['E003', 'E002', 'E003', 'E002']);
      expect(report.errors[0].message).toBe('Step id "loop" is reserved');
    });

    test('should reject duplicate ids across jobs', () => {
      const report = WorkflowValidator.validate({
        name: 'test',
        jobs: {
          main: { steps: [{ id: 'a', run: 'echo' }] },
          other: { steps: [{ id: 'a', run: 'echo' }] },
        },
      });
      expect(report.errors).toEqual([
        {
          code: 'E004',
          message: 'Duplicate step id "a" (first defined at jobs.main.steps[0])',
          location: 'jobs.other.steps[0]',
          suggestion: 'Use unique ids for each step',
        },
      ]);
    });
  });

  describe('inputs', () => {
    test('should reject inconsistent input declarations', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo' }], {
          inputs: {
            flag: { type: 'boolean', pattern: '^x$' },
            count: { type: 'integer', default: '5' },
            ratio: { type: 'number', min: 5, max: 1 },
            name: { type: 'string', min: 1 },
            level: { type: 'string', enum: ['low', 'high'], default: 'mid' },
          },
        })
      );
      expect(report.errors.map((e) => e.message)).toEqual([
        'Input "flag": "pattern" is only valid for string inputs (type is boolean)',
        'Input "count": default "5" is not a integer',
        'Input "ratio": min (5) is greater than max (1)',
        'Input "name": "min"/"max" are only valid for integer or number inputs (type is string)',
        'Input "level": default "mid" is not one of the enum values',
      ]);
      expect(report.errors[0].location).toBe('inputs.flag');
    });

    test('should reject enum values of the wrong type', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo' }], {
          inputs: { port: { type: 'integer', enum: [80, '443'] } },
        })
      );
      expect(report.errors.map((e) => e.message)).toEqual([
        'Input "port": enum value "443" is not a integer',
      ]);
    });
  });

  describe('expressions', () => {
    test('should report unclosed templates', () => {
      const report = WorkflowValidator.validate(workflowWith([{ id: 'a', run: 'echo ${{ inputs.x' }]));
      expect(report.errors).toEqual([
        {
          code: 'E006',
          message: 'Unclosed expression starting at index 5',
          location: 'jobs.main.steps[0].run',
        },
      ]);
    });

    test('should report parse errors in bare conditions', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo', if: 'inputs.x ==' }])
      );
      expect(codes(report)).toEqual(['E006']);
      expect(report.errors[0].message.startsWith('Invalid expression "inputs.x =="')).toBe(true);
      expect(report.errors[0].location).toBe('jobs.main.steps[0].if');
    });

    test('should report unknown filters', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', uses: 'state/set', with: { value: '${{ inputs.x | nope }}' } }])
      );
      expect(report.errors).toEqual([
        {
          code: 'E007',
          message: 'Unknown filter "nope" in expression "inputs.x | nope"',
          location: 'jobs.main.steps[0].with.value',
          suggestion: 'Check spelling or use a supported filter',
        },
      ]);
    });

    test('should report forbidden property access', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo', if: 'inputs.constructor' }])
      );
      expect(report.errors).toEqual([
        {
          code: 'E008',
          message: 'Access to "constructor" is not allowed in expression "inputs.constructor"',
          location: 'jobs.main.steps[0].if',
        },
      ]);
    });

    test('should not resolve identifiers', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo', if: 'inputs.missing and undefined_name' }])
      );
      expect(report.valid).toBe(true);
    });
  });

  describe('references', () => {
    test('should reject forward step references', () => {
      const report = WorkflowValidator.validate(
        workflowWith([
          { id: 'a', uses: 'state/set', with: { v: '${{ steps.b.outputs.x }}' } },
          { id: 'b', run: 'echo b' },
        ])
      );
      expect(report.errors).toEqual([
        {
          code: 'E010',
          message: 'Step "a" references step "b", which has not run yet',
          location: 'jobs.main.steps[0].with',
          suggestion: 'A step can only read steps that run before it',
        },
      ]);
    });

    test('should reject references to unknown steps', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo', if: "steps.ghost.outcome == 'succeeded'" }])
      );
      expect(report.errors.map((e) => e.message)).toEqual([
        'Expression references unknown step "ghost"',
      ]);
    });

    test('should allow a loop to read itself only from break_if', () => {
      const ok = WorkflowValidator.validate(
        workflowWith([
          {
            id: 'poll',
            uses: 'state/set',
            loop: '[1, 2, 3]',
            break_if: 'steps.poll.outputs.iterations > 1',
          },
        ])
      );
      expect(ok.valid).toBe(true);

      const bad = WorkflowValidator.validate(
        workflowWith([{ id: 'poll', run: 'echo', if: "steps.poll.outcome == 'failed'" }])
      );
      expect(bad.errors.map((e) => e.message)).toEqual([
        'Step "poll" cannot read its own outputs in "if"',
      ]);
    });

    test('should let handler lists and later jobs read main steps', () => {
      const report = WorkflowValidator.validate({
        name: 'test',
        jobs: {
          build: {
            steps: [{ id: 'compile', run: 'make' }],
            on_failure: [{ id: 'notify', uses: 'state/set', with: { e: '${{ steps.compile.outcome }}' } }],
            finally: [{ id: 'tidy', uses: 'state/set', with: { n: '${{ steps.notify.outcome }}' } }],
          },
          deploy: {
            steps: [{ id: 'ship', uses: 'state/set', with: { b: '${{ steps.compile.outputs }}' } }],
          },
        },
        finally: [{ id: 'report', uses: 'state/set', with: { s: '${{ steps.ship.outcome }}' } }],
      });
      expect(report.errors).toEqual([]);
    });

    test('should reject main steps reading their own handler steps', () => {
      const report = WorkflowValidator.validate({
        name: 'test',
        jobs: {
          main: {
            steps: [
              { id: 'a', run: 'make' },
              { id: 'b', uses: 'state/set', with: { v: '${{ steps.cleanup.outcome }}' } },
            ],
            finally: [{ id: 'cleanup', run: 'rm -rf tmp' }],
          },
        },
      });
      expect(report.errors.map((e) => e.message)).toEqual([
        'Step "b" references step "cleanup", which has not run yet',
      ]);
    });

    test('should require on_failure targets later in the same list', () => {
      const backward = WorkflowValidator.validate(
        workflowWith([
          { id: 'a', run: 'echo a' },
          { id: 'b', run: 'echo b', on_failure: 'a' },
        ])
      );
      expect(backward.errors).toEqual([
        {
          code: 'E009',
          message: 'on_failure target "a" must come after the step that references it',
          location: 'jobs.main.steps[1].on_failure',
        },
      ]);

      const unknown = WorkflowValidator.validate(
        workflowWith([
          { id: 'a', run: 'echo a', on_failure: 'nope' },
          { id: 'b', run: 'echo b' },
        ])
      );
      expect(unknown.errors).toEqual([
        {
          code: 'E009',
          message: 'on_failure references unknown step "nope"',
          location: 'jobs.main.steps[0].on_failure',
          suggestion: 'Valid targets: b',
        },
      ]);

      const elsewhere = WorkflowValidator.validate({
        name: 'test',
        jobs: {
          main: {
            steps: [{ id: 'a', run: 'echo a', on_failure: 'c' }],
            finally: [{ id: 'c', run: 'echo c' }],
          },
        },
      });
      expect(elsewhere.errors.map((e) => e.message)).toEqual([
        'on_failure target "c" is not in the same step list',
      ]);
    });

    test('should check guardrail on_fail step targets', () => {
      const ok = WorkflowValidator.validate(
        workflowWith([
          { id: 'ask', uses: 'llm/generate', guardrails: { on_fail: 'fallback' } },
          { id: 'fallback', run: 'echo fallback' },
        ])
      );
      expect(ok.valid).toBe(true);

      const bad = WorkflowValidator.validate(
        workflowWith([{ id: 'a', run: 'echo' }], { guardrails: { on_fail: 'missing' } })
      );
      expect(bad.errors).toEqual([
        {
          code: 'E011',
          message: 'guardrails.on_fail references unknown step "missing"',
          location: 'guardrails.on_fail',
        },
      ]);
    });
  });

  describe('warnings', () => {
    test('should warn about unquoted interpolation in string commands', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'greet', run: 'echo ${{ inputs.name }} ${{ inputs.name | shell_quote }}' }])
      );
      expect(report.valid).toBe(true);
      expect(report.warnings).toEqual([
        {
          code: 'W008',
          message: 'Unquoted interpolation in shell command: ${{ inputs.name }}',
          location: 'jobs.main.steps[0].run',
          suggestion:
            'Use ${{ inputs.name | shell_quote }}, the array form of "run", or shell_safety: auto_quote',
        },
      ]);
    });

    test('should not warn for array commands or auto_quote', () => {
      const array = WorkflowValidator.validate(
        workflowWith([{ id: 'greet', run: ['echo', '${{ inputs.name }}'] }])
      );
      expect(array.warnings).toEqual([]);

      const auto = WorkflowValidator.validate(
        workflowWith([{ id: 'greet', run: 'echo ${{ inputs.name }}' }], { shell_safety: 'auto_quote' })
      );
      expect(auto.warnings).toEqual([]);
    });

    test('should promote warnings to errors in strict mode', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'greet', run: 'echo ${{ inputs.name }}' }]),
        { strict: true }
      );
      expect(report.valid).toBe(false);
      expect(codes(report)).toEqual(['W008']);
      expect(report.warnings).toEqual([]);
    });

    test('should warn about unknown actions and scanners when registries are given', () => {
      const report = WorkflowValidator.validate(
        workflowWith([
          { id: 'a', uses: 'custom/thing', guardrails: { input: { secrets: null, magic: {} } } },
        ]),
        { knownActions: ['state/set', 'run'], knownScanners: ['secrets'] }
      );
      expect(report.valid).toBe(true);
      expect(report.warnings).toEqual([
        {
          code: 'W001',
          message: 'Unknown action "custom/thing"',
          location: 'jobs.main.steps[0].uses',
          suggestion: 'Known actions: run, state/set',
        },
        {
          code: 'W002',
          message: 'Unknown guardrail scanner "magic"',
          location: 'jobs.main.steps[0].guardrails',
        },
      ]);
    });

    test('should warn about hardcoded secrets', () => {
      const report = WorkflowValidator.validate(
        workflowWith([{ id: 'call', run: 'curl -H "Authorization: Bearer abc123" https://example.test' }])
      );
      expect(report.warnings.map((w) => [w.code, w.location])).toEqual([
        ['W003', 'jobs.main.steps[0].run'],
      ]);
    });
  });

  test('formatZodError renders one line per issue', () => {
    const result = z.object({ name: z.string(), count: z.number() }).safeParse({ count: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toBe(
        '  - name: Required\n  - count: Expected number, received string'
      );
    }
  });
});
