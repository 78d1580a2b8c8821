import { existsSync, readFileSync } from 'node:fs';
import * as yaml from 'js-yaml';
import { ValidationError } from '../runner/errors.ts';
import type { WorkflowDefinition } from './schema.ts';
import {
  type ValidateOptions,
  type ValidationMessage,
  type ValidationReport,
  ValidationCode,
  WorkflowValidator,
} from './workflow-validator.ts';

export function formatMessages(messages: ValidationMessage[]): string {
  return messages.map((message) => `  - ${message.location}: ${message.message}`).join('\n');
}

export class WorkflowParser {
  /**
   * Parse YAML and validate it; a YAML syntax error is reported as a structure error
   */
  static validateContent(content: string, options: ValidateOptions = {}): ValidationReport {
    let raw: unknown;
    try {
      raw = yaml.load(content);
    } catch (error) {
      return {
        valid: false,
        errors: [
          {
            code: ValidationCode.STRUCTURE,
            message: `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
            location: 'workflow',
          },
        ],
        warnings: [],
      };
    }
    return WorkflowValidator.validate(raw, options);
  }

  static validateFile(path: string, options: ValidateOptions = {}): ValidationReport {
    return WorkflowParser.validateContent(WorkflowParser.readFile(path), options);
  }

  /**
   * Parse and validate a workflow document, throwing ValidationError when it has errors
   */
  static parseWorkflow(
    content: string,
    options: ValidateOptions = {},
    source = '<inline>'
  ): WorkflowDefinition {
    const report = WorkflowParser.validateContent(content, options);
    if (!report.valid || !report.workflow) {
      throw new ValidationError(
        `Invalid workflow at ${source}:\n${formatMessages(report.errors)}`,
        report
      );
    }
    return report.workflow;
  }

  /**
   * Load and validate a workflow from a YAML file
   */
  static loadWorkflow(path: string, options: ValidateOptions = {}): WorkflowDefinition {
    return WorkflowParser.parseWorkflow(WorkflowParser.readFile(path), options, path);
  }

  private static readFile(path: string): string {
    if (!existsSync(path)) {
      throw new Error(`Workflow file not found at ${path}`);
    }
    return readFileSync(path, 'utf-8');
  }
}
