/**
 * runbook graph command
 * Visualize a compiled workflow
 */

import type { Command } from 'commander';
import { GraphCompiler } from '../compiler/graph-compiler.ts';
import { WorkflowParser } from '../parser/workflow-parser.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { generateMermaidGraph, renderWorkflowAsAscii } from '../utils/mermaid.ts';

export function registerGraphCommand(program: Command): void {
  program
    .command('graph')
    .description('Draw the compiled graph of a workflow')
    .argument('<file>', 'Path to the workflow file')
    .option('--mermaid', 'Print Mermaid flowchart source instead of ASCII')
    .action((file: string, options: { mermaid?: boolean }) => {
      try {
        const workflow = WorkflowParser.loadWorkflow(file);
        const compiled = GraphCompiler.compileWorkflow(workflow, ConfigLoader.load().guardrails);
        const ascii = options.mermaid ? '' : renderWorkflowAsAscii(compiled);
        if (ascii) {
          console.log(`\n${ascii}\n`);
        } else {
          console.log('\n```mermaid');
          console.log(generateMermaidGraph(compiled));
          console.log('```\n');
        }
      } catch (error) {
        console.error('✗ Failed to generate graph:', error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
