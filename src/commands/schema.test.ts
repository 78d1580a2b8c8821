import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, test } from 'vitest';
import { generateSchemas } from './schema.ts';

describe('generateSchemas', () => {
  const dir = mkdtempSync(join(tmpdir(), 'runbook-schema-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('writes workflow and config schemas', () => {
    const outputDir = join(dir, 'out');
    const files = generateSchemas(outputDir);
    expect(files).toEqual([join(outputDir, 'workflow.schema.json'), join(outputDir, 'config.schema.json')]);

    const workflow: unknown = JSON.parse(readFileSync(files[0], 'utf8'));
    expect(workflow).toMatchObject({
      $schema: 'http://json-schema.org/draft-07/schema#',
      $ref: '#/definitions/RunbookWorkflow',
    });
    const config: unknown = JSON.parse(readFileSync(files[1], 'utf8'));
    expect(config).toMatchObject({ $ref: '#/definitions/RunbookConfig' });
  });
});
