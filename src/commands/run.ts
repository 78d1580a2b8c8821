/**
 * runbook run command
 * Execute a workflow
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import { GraphCompiler } from '../compiler/graph-compiler.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { WorkflowRunner } from '../runner/workflow-runner.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { createRuntime, parseInputs, reportResult } from './utils.ts';

interface RunCommandOptions {
  input?: string[];
  dryRun?: boolean;
  events?: boolean;
  db?: string;
}

/**
 * Planned step order for `--dry-run`; nothing is executed or persisted
 */
export function planRun(workflowPath: string): string[] {
  const workflow = WorkflowParser.loadWorkflow(workflowPath);
  const compiled = GraphCompiler.compileWorkflow(workflow, ConfigLoader.load().guardrails);
  return [`Workflow: ${workflow.name}`, ...GraphCompiler.executionOrder(compiled).map((line) => `  ${line}`)];
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Execute a workflow')
    .argument('<file>', 'Path to the workflow file')
    .option('-i, --input <key=value...>', 'Input values')
    .option('--dry-run', 'Print the execution order without running anything')
    .option('--events', 'Emit structured JSON events (NDJSON) to stdout')
    .option('--db <path>', 'State database path')
    .action(async (file: string, options: RunCommandOptions) => {
      if (options.dryRun) {
        try {
          for (const line of planRun(file)) console.log(line);
        } catch (error) {
          console.error('✗ Failed to plan workflow:', error instanceof Error ? error.message : error);
          process.exit(1);
        }
        return;
      }

      const runtime = createRuntime({ db: options.db, events: options.events });
      let exitCode = 0;
      try {
        const workflow = WorkflowParser.loadWorkflow(file);
        const runner = new WorkflowRunner(workflow, {
          ...runtime.runOptions,
          inputs: parseInputs(options.input, runtime.logger),
          workflowPath: resolve(file),
        });
        const result = await runner.run();
        exitCode = reportResult(result, runtime.logger);
      } catch (error) {
        console.error('✗ Failed to execute workflow:', error instanceof Error ? error.message : error);
        exitCode = 1;
      } finally {
        runtime.close();
      }
      process.exit(exitCode);
    });
}
