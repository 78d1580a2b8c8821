/**
 * runbook runs command
 * List recent runs and prune old ones
 */

import type { Command } from 'commander';
import type { RunRecord } from '../db/types.ts';
import { WorkflowDb } from '../db/workflow-db.ts';
import { RunStatus } from '../types/status.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { PathResolver } from '../utils/paths.ts';

const RESET = '\x1b[0m';

function colorOf(status: RunRecord['status']): string {
  switch (status) {
    case RunStatus.SUCCEEDED:
      return '\x1b[32m';
    case RunStatus.FAILED:
      return '\x1b[31m';
    default:
      return '\x1b[33m';
  }
}

export function formatRunTable(runs: RunRecord[], color = false): string[] {
  const lines = [
    `${'ID'.padEnd(10)} ${'Workflow'.padEnd(25)} ${'Status'.padEnd(11)} Started At`,
    ''.padEnd(70, '-'),
  ];
  for (const run of runs) {
    const status = run.status.padEnd(11);
    lines.push(
      `${run.id.slice(0, 8).padEnd(10)} ${run.workflowName.padEnd(25)} ${
        color ? `${colorOf(run.status)}${status}${RESET}` : status
      } ${run.startedAt}`
    );
  }
  return lines;
}

interface RunsCommandOptions {
  limit: string;
  prune?: boolean;
  db?: string;
}

export function registerRunsCommand(program: Command): void {
  program
    .command('runs')
    .description('Show recent workflow runs')
    .option('-l, --limit <number>', 'Limit the number of runs to show', '20')
    .option('--prune', 'Delete runs older than storage.retention_days and vacuum')
    .option('--db <path>', 'State database path')
    .action(async (options: RunsCommandOptions) => {
      let db: WorkflowDb | undefined;
      try {
        db = new WorkflowDb(options.db ?? PathResolver.resolveDbPath());
        if (options.prune) {
          const days = ConfigLoader.load().storage.retention_days;
          console.log(`🧹 Pruning runs older than ${days} days...`);
          const count = await db.pruneRuns(days);
          await db.vacuum();
          console.log(`   ✓ Pruned ${count} old run(s)`);
          return;
        }

        const limit = Number.parseInt(options.limit, 10);
        if (!Number.isInteger(limit) || limit <= 0) {
          throw new Error(`Invalid --limit: ${options.limit}`);
        }
        const runs = await db.listRuns(limit);
        if (runs.length === 0) {
          console.log('No workflow runs found.');
          return;
        }
        console.log('\n🏛️  Workflow runs:');
        for (const line of formatRunTable(runs, process.stdout.isTTY)) console.log(line);
        console.log('');
      } catch (error) {
        console.error('✗ Failed to list runs:', error instanceof Error ? error.message : error);
        process.exit(1);
      } finally {
        db?.close();
      }
    });
}
