/**
 * runbook validate command
 * Validate workflow files
 */

import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Command } from 'commander';
import { glob } from 'glob';
import { formatMessages, WorkflowParser } from '../parser/workflow-parser.ts';
import type { ValidationReport } from '../parser/workflow-validator.ts';
import { createDefaultRegistry } from '../runner/action-registry.ts';
import { createDefaultScannerRegistry } from '../runner/guardrails/scanner-registry.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';

export interface ValidateCommandOptions {
  strict?: boolean;
  json?: boolean;
}

export interface FileReport {
  file: string;
  report: ValidationReport;
}

/**
 * Expand files and directories (searched recursively for .yaml/.yml) into a sorted file list
 */
export async function collectWorkflowFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const path of paths) {
    if (!existsSync(path)) {
      throw new Error(`Path not found: ${path}`);
    }
    if (statSync(path).isDirectory()) {
      const found = await glob('**/*.{yaml,yml}', { cwd: path, nodir: true });
      files.push(...found.sort().map((file) => join(path, file)));
    } else {
      files.push(path);
    }
  }
  return files;
}

export async function validatePaths(
  paths: string[],
  options: ValidateCommandOptions = {}
): Promise<FileReport[]> {
  const knownActions = createDefaultRegistry().ids();
  const knownScanners = createDefaultScannerRegistry()
    .list()
    .map((scanner) => scanner.name);

  const files = await collectWorkflowFiles(paths);
  return files.map((file) => ({
    file,
    report: WorkflowParser.validateFile(file, {
      strict: options.strict ?? false,
      knownActions,
      knownScanners,
    }),
  }));
}

/**
 * Print the reports; returns the number of invalid files
 */
export function printReports(
  reports: FileReport[],
  options: ValidateCommandOptions,
  logger: Logger = new ConsoleLogger()
): number {
  const failed = reports.filter(({ report }) => !report.valid).length;

  if (options.json) {
    logger.log(
      JSON.stringify(
        reports.map(({ file, report }) => ({
          file,
          valid: report.valid,
          errors: report.errors,
          warnings: report.warnings,
        })),
        null,
        2
      )
    );
    return failed;
  }

  for (const { file, report } of reports) {
    if (report.valid) {
      logger.log(`  ✓ ${file.padEnd(40)} ${report.workflow?.name ?? ''}`.trimEnd());
    } else {
      logger.error(`  ✗ ${file}`);
      logger.error(formatMessages(report.errors));
    }
    if (report.warnings.length > 0) {
      logger.warn(formatMessages(report.warnings));
    }
  }
  logger.log(`\nSummary: ${reports.length - failed} passed, ${failed} failed.`);
  return failed;
}

async function validateWorkflows(paths: string[], options: ValidateCommandOptions): Promise<void> {
  try {
    const reports = await validatePaths(paths, options);
    if (reports.length === 0) {
      console.log('⊘ No workflow files found to validate.');
      return;
    }
    if (!options.json) {
      console.log(`🔍 Validating ${reports.length} workflow(s)...\n`);
    }
    if (printReports(reports, options) > 0) {
      process.exit(1);
    }
  } catch (error) {
    console.error('✗ Validation failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

export function registerValidateCommand(program: Command): void {
  for (const [name, description] of [
    ['validate', 'Validate workflow files'],
    ['lint', 'Lint workflow files (alias of validate)'],
  ] as const) {
    program
      .command(name)
      .description(description)
      .argument('<paths...>', 'Workflow files or directories')
      .option('--strict', 'Treat warnings as errors')
      .option('--json', 'Print the reports as JSON')
      .action(async (paths: string[], options: ValidateCommandOptions) => {
        await validateWorkflows(paths, options);
      });
  }
}
