/**
 * runbook schema command
 * Generate JSON Schema for workflow and config files
 */

import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Command } from 'commander';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ConfigSchema } from '../parser/config-schema.ts';
import { WorkflowSchema } from '../parser/schema.ts';

const DRAFT_07 = 'http://json-schema.org/draft-07/schema#';

/**
 * Write workflow.schema.json and config.schema.json into `outputDir`; returns the file paths
 */
export function generateSchemas(outputDir: string): string[] {
  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }
  const schemas: Record<string, object> = {
    'workflow.schema.json': { $schema: DRAFT_07, ...zodToJsonSchema(WorkflowSchema, 'RunbookWorkflow') },
    'config.schema.json': { $schema: DRAFT_07, ...zodToJsonSchema(ConfigSchema, 'RunbookConfig') },
  };
  return Object.entries(schemas).map(([file, schema]) => {
    const path = join(outputDir, file);
    writeFileSync(path, `${JSON.stringify(schema, null, 2)}\n`);
    return path;
  });
}

export function registerSchemaCommand(program: Command): void {
  program
    .command('schema')
    .description('Generate JSON Schema for workflow and config files')
    .option('-o, --output <dir>', 'Output directory for schema files', '.runbook/schemas')
    .action((options: { output: string }) => {
      const outputDir = resolve(options.output);
      try {
        const files = generateSchemas(outputDir);
        console.log(`✓ Generated JSON schemas in ${outputDir}/`);
        for (const file of files) console.log(`  - ${file.slice(outputDir.length + 1)}`);
      } catch (error) {
        console.error('✗ Failed to generate schemas:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
