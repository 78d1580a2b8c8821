/**
 * runbook resume command
 * Continue a suspended or interrupted run
 */

import type { Command } from 'commander';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { WorkflowRunner } from '../runner/workflow-runner.ts';
import { createRuntime, parseInputs, reportResult } from './utils.ts';

interface ResumeCommandOptions {
  input?: string;
  set?: string[];
  workflow?: string;
  events?: boolean;
  db?: string;
}

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Resume a suspended or interrupted run')
    .argument('<runId>', 'ID of the run to resume')
    .option('--input <value>', 'Answer for the step that suspended')
    .option('-i, --set <key=value...>', 'Input values (secret inputs must be supplied again)')
    .option('-w, --workflow <file>', 'Workflow file, when it has moved since the run started')
    .option('--events', 'Emit structured JSON events (NDJSON) to stdout')
    .option('--db <path>', 'State database path')
    .action(async (runId: string, options: ResumeCommandOptions) => {
      const runtime = createRuntime({ db: options.db, events: options.events });
      let exitCode = 0;
      try {
        const run = await runtime.db.getRun(runId);
        if (!run) {
          throw new Error(`Run not found: ${runId}`);
        }
        const workflowPath = options.workflow ?? run.workflowPath;
        if (!workflowPath) {
          throw new Error(`Run ${runId} has no recorded workflow file; pass --workflow`);
        }
        const workflow = WorkflowParser.loadWorkflow(workflowPath);
        const runner = new WorkflowRunner(workflow, {
          ...runtime.runOptions,
          inputs: parseInputs(options.set, runtime.logger),
          workflowPath,
        });
        const result = await runner.resume(runId, options.input);
        exitCode = reportResult(result, runtime.logger);
      } catch (error) {
        console.error('✗ Failed to resume run:', error instanceof Error ? error.message : error);
        exitCode = 1;
      } finally {
        runtime.close();
      }
      process.exit(exitCode);
    });
}
