import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, test } from 'vitest';
import { ValidationError } from '../runner/errors.ts';
import { WorkflowParser } from './workflow-parser.ts';

const VALID = `
name: greet
inputs:
  who:
    type: string
    default: world
jobs:
  main:
    steps:
      - id: hello
        run: ["echo", "hello \${{ inputs.who }}"]
`;

describe('WorkflowParser', () => {
  const tempDir = mkdtempSync(join(tmpdir(), 'runbook-parser-'));

  afterAll(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test('should parse a valid document', () => {
    const workflow = WorkflowParser.parseWorkflow(VALID);
    expect(workflow.name).toBe('greet');
    expect(workflow.inputs?.who.default).toBe('world');
    expect(workflow.jobs.main.steps[0].run).toEqual(['echo', 'hello ${{ inputs.who }}']);
  });

  test('should throw ValidationError carrying the report', () => {
    const content = 'name: broken\njobs:\n  main:\n    steps:\n      - id: a\n';
    let caught: unknown;
    try {
      WorkflowParser.parseWorkflow(content, {}, 'broken.yaml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.message).toBe(
        'Invalid workflow at broken.yaml:\n  - jobs.main.steps[0]: Step must have either "run" or "uses"'
      );
      expect(caught.report.valid).toBe(false);
    }
  });

  test('should report YAML syntax errors as structure errors', () => {
    const report = WorkflowParser.validateContent('name: [unclosed');
    expect(report.valid).toBe(false);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].code).toBe('E001');
    expect(report.errors[0].message.startsWith('Invalid YAML:')).toBe(true);
  });

  test('should load workflows from disk', () => {
    const path = join(tempDir, 'greet.yaml');
    writeFileSync(path, VALID);
    expect(WorkflowParser.loadWorkflow(path).jobs.main.steps[0].id).toBe('hello');
    expect(WorkflowParser.validateFile(path).valid).toBe(true);
  });

  test('should fail for missing files', () => {
    expect(() => WorkflowParser.loadWorkflow(join(tempDir, 'missing.yaml'))).toThrow(
      /Workflow file not found at/
    );
  });
});
