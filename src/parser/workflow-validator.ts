import type jsep from 'jsep';
import type { ZodError } from 'zod';
import { ExpressionEvaluator } from '../expression/evaluator.ts';
import { isKnownFilter, isPlainObject } from '../expression/filters.ts';
import {
  type InputDefinition,
  type JobDefinition,
  type ResolvedStep,
  type Step,
  type StepList,
  type StepSection,
  type Workflow,
  type WorkflowDefinition,
  STEP_SECTIONS,
  WorkflowSchema,
  listStepLists,
} from './schema.ts';

export interface ValidationMessage {
  code: string;
  message: string;
  /** Dotted document path, e.g. `jobs.main.steps[2].run` */
  location: string;
  suggestion?: string;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationMessage[];
  warnings: ValidationMessage[];
  /** Present once the structure phase passed */
  workflow?: WorkflowDefinition;
}

export interface ValidateOptions {
  /** Promote warnings to errors */
  strict?: boolean;
  /** Registered action ids; unknown `uses` values are reported when given */
  knownActions?: Iterable<string>;
  /** Registered guardrail scanners; unknown scanner names are reported when given */
  knownScanners?: Iterable<string>;
}

export const ValidationCode = {
  STRUCTURE: 'E001',
  INVALID_ID: 'E002',
  RESERVED_ID: 'E003',
  DUPLICATE_ID: 'E004',
  INVALID_INPUT: 'E005',
  INVALID_EXPRESSION: 'E006',
  UNKNOWN_FILTER: 'E007',
  FORBIDDEN_ACCESS: 'E008',
  INVALID_FAILURE_TARGET: 'E009',
  INVALID_STEP_REFERENCE: 'E010',
  INVALID_GUARDRAIL_TARGET: 'E011',
  UNKNOWN_ACTION: 'W001',
  UNKNOWN_SCANNER: 'W002',
  HARDCODED_SECRET: 'W003',
  UNQUOTED_INTERPOLATION: 'W008',
} as const;

const STEP_ID_PATTERN = /^[a-zA-Z][a-zA-Z0-9_-]*$/;
const MAX_STEP_ID_LENGTH = 64;

export const RESERVED_STEP_IDS: ReadonlySet<string> = new Set([
  '__start__',
  '__end__',
  '__error__',
  '__cleanup__',
  'loop',
  'inputs',
  'env',
  'steps',
  'workflow',
]);

export const GUARDRAIL_ACTIONS: ReadonlySet<string> = new Set(['abort', 'retry', 'continue']);

const SECRET_PATTERNS = [
  /password\s*[=:]\s*['"][^'"]+['"]/i,
  /api[_-]?key\s*[=:]\s*['"][^'"]+['"]/i,
  /secret\s*[=:]\s*['"][^'"]+['"]/i,
  /token\s*[=:]\s*['"][^'"]+['"]/i,
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/,
  /-----BEGIN\s+(?:RSA\s+)?PRIVATE\s+KEY-----/,
];

/**
 * Render zod issues as `  - <path>: <message>` lines
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Assign `step_<n>` to steps without an id, skipping ids the document already uses
 */
function assignStepIds(workflow: Workflow): WorkflowDefinition {
  const used = new Set<string>();
  const allSteps: Step[] = [];
  for (const job of Object.values(workflow.jobs)) {
    allSteps.push(...job.steps, ...(job.on_complete ?? []), ...(job.on_failure ?? []));
    allSteps.push(...(job.finally ?? []));
  }
  allSteps.push(
    ...(workflow.on_complete ?? []),
    ...(workflow.on_failure ?? []),
    ...(workflow.finally ?? [])
  );
  for (const step of allSteps) {
    if (step.id !== undefined) used.add(step.id);
  }

  let counter = 1;
  const resolve = (steps: Step[] | undefined): ResolvedStep[] =>
    (steps ?? []).map((step) => {
      if (step.id !== undefined) return { ...step, id: step.id };
      while (used.has(`step_${counter}`)) counter++;
      const id = `step_${counter}`;
      used.add(id);
      counter++;
      return { ...step, id };
    });

  const jobs: Record<string, JobDefinition> = {};
  for (const [name, job] of Object.entries(workflow.jobs)) {
    jobs[name] = {
      name: job.name,
      steps: resolve(job.steps),
      on_complete: resolve(job.on_complete),
      on_failure: resolve(job.on_failure),
      finally: resolve(job.finally),
    };
  }
  return {
    ...workflow,
    jobs,
    on_complete: resolve(workflow.on_complete),
    on_failure: resolve(workflow.on_failure),
    finally: resolve(workflow.finally),
  };
}

export function matchesInputType(type: InputDefinition['type'], value: unknown): boolean {
  switch (type) {
    case 'string':
    case 'file':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isPlainObject(value);
  }
}

/** A parsed expression together with the step field it came from */
interface FieldExpression {
  field: string;
  location: string;
  ast: jsep.Expression;
}

/**
 * Static validation of a workflow document.
 *
 * Runs six phases in order: structure, step ids, input declarations, expression syntax,
 * references and shell safety. Problems are collected into a report instead of thrown so
 * `--strict` can promote warnings.
 */
export class WorkflowValidator {
  private readonly errors: ValidationMessage[] = [];
  private readonly warnings: ValidationMessage[] = [];
  private readonly knownActions?: ReadonlySet<string>;
  private readonly knownScanners?: ReadonlySet<string>;
  /** Parsed expressions per step id, filled by the expression phase */
  private readonly expressions = new Map<string, FieldExpression[]>();

  private constructor(private readonly options: ValidateOptions) {
    this.knownActions = options.knownActions ? new Set(options.knownActions) : undefined;
    this.knownScanners = options.knownScanners ? new Set(options.knownScanners) : undefined;
  }

  static validate(document: unknown, options: ValidateOptions = {}): ValidationReport {
    return new WorkflowValidator(options).run(document);
  }

  private run(document: unknown): ValidationReport {
    const parsed = WorkflowSchema.safeParse(document);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        this.error(ValidationCode.STRUCTURE, issue.message, this.locationOf(issue.path));
      }
      return this.report();
    }

    const workflow = assignStepIds(parsed.data);
    const lists = listStepLists(workflow);

    this.checkStepIds(lists);
    this.checkInputs(workflow);
    this.checkExpressions(workflow, lists);
    this.checkReferences(workflow, lists);
    this.checkShellSafety(workflow, lists);

    return this.report(workflow);
  }

  private report(workflow?: WorkflowDefinition): ValidationReport {
    const errors = [...this.errors];
    let warnings = [...this.warnings];
    if (this.options.strict) {
      errors.push(...warnings);
      warnings = [];
    }
    return { valid: errors.length === 0, errors, warnings, workflow };
  }

  private error(code: string, message: string, location: string, suggestion?: string): void {
    this.errors.push({ code, message, location, ...(suggestion ? { suggestion } : {}) });
  }

  private warn(code: string, message: string, location: string, suggestion?: string): void {
    this.warnings.push({ code, message, location, ...(suggestion ? { suggestion } : {}) });
  }

  private locationOf(path: (string | number)[]): string {
    let location = '';
    for (const part of path) {
      if (typeof part === 'number') location += `[${part}]`;
      else location += location ? `.${part}` : part;
    }
    return location || 'workflow';
  }

  // ===== Phase 2: step ids =====

  private checkStepIds(lists: StepList[]): void {
    const seen = new Map<string, string>();
    for (const list of lists) {
      list.steps.forEach((step, index) => {
        const location = `${list.location}[${index}]`;
        const id = step.id;
        if (RESERVED_STEP_IDS.has(id)) {
          this.error(ValidationCode.RESERVED_ID, `Step id "${id}" is reserved`, location);
        } else if (id.startsWith('__') || id.startsWith('_internal_')) {
          this.error(
            ValidationCode.RESERVED_ID,
            `Step id "${id}" uses a reserved prefix ("__" or "_internal_")`,
            location
          );
        } else if (!STEP_ID_PATTERN.test(id)) {
          this.error(
            ValidationCode.INVALID_ID,
            `Invalid step id "${id}": must start with a letter and contain only letters, digits, "_" or "-"`,
            location
          );
        } else if (id.length > MAX_STEP_ID_LENGTH) {
          this.error(
            ValidationCode.INVALID_ID,
            `Step id "${id}" is longer than ${MAX_STEP_ID_LENGTH} characters`,
            location
          );
        }

        const previous = seen.get(id);
        if (previous !== undefined) {
          this.error(
            ValidationCode.DUPLICATE_ID,
            `Duplicate step id "${id}" (first defined at ${previous})`,
            location,
            'Use unique ids for each step'
          );
        } else {
          seen.set(id, location);
        }
      });
    }
  }

  // ===== Phase 3: input declarations =====

  private checkInputs(workflow: WorkflowDefinition): void {
    for (const [name, input] of Object.entries(workflow.inputs ?? {})) {
      const location = `inputs.${name}`;
      const numeric = input.type === 'integer' || input.type === 'number';

      if (input.pattern !== undefined) {
        if (input.type !== 'string') {
          this.error(
            ValidationCode.INVALID_INPUT,
            `Input "${name}": "pattern" is only valid for string inputs (type is ${input.type})`,
            location
          );
        } else {
          try {
            new RegExp(input.pattern);
          } catch (error) {
            this.error(
              ValidationCode.INVALID_INPUT,
              `Input "${name}": invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
              location
            );
          }
        }
      }

      if ((input.min !== undefined || input.max !== undefined) && !numeric) {
        this.error(
          ValidationCode.INVALID_INPUT,
          `Input "${name}": "min"/"max" are only valid for integer or number inputs (type is ${input.type})`,
          location
        );
      }
      if (input.min !== undefined && input.max !== undefined && input.min > input.max) {
        this.error(
          ValidationCode.INVALID_INPUT,
          `Input "${name}": min (${input.min}) is greater than max (${input.max})`,
          location
        );
      }

      if (input.enum !== undefined) {
        if (input.type === 'array' || input.type === 'object') {
          this.error(
            ValidationCode.INVALID_INPUT,
            `Input "${name}": "enum" cannot be used with type ${input.type}`,
            location
          );
        } else {
          for (const allowed of input.enum) {
            if (!matchesInputType(input.type, allowed)) {
              this.error(
                ValidationCode.INVALID_INPUT,
                `Input "${name}": enum value ${JSON.stringify(allowed)} is not a ${input.type}`,
                location
              );
            }
          }
        }
      }

      if (input.default !== undefined && input.default !== null) {
        if (!matchesInputType(input.type, input.default)) {
          this.error(
            ValidationCode.INVALID_INPUT,
            `Input "${name}": default ${JSON.stringify(input.default)} is not a ${input.type}`,
            location
          );
        } else if (
          input.enum !== undefined &&
          !input.enum.some((allowed) => allowed === input.default)
        ) {
          this.error(
            ValidationCode.INVALID_INPUT,
            `Input "${name}": default ${JSON.stringify(input.default)} is not one of the enum values`,
            location
          );
        }
      }
    }
  }

  // ===== Phase 4: expression syntax =====

  private checkExpressions(workflow: WorkflowDefinition, lists: StepList[]): void {
    for (const [key, value] of Object.entries(workflow.env ?? {})) {
      this.parseTemplate(value, `env.${key}`);
      this.checkHardcodedSecret(value, `env.${key}`);
    }

    for (const list of lists) {
      list.steps.forEach((step, index) => {
        const base = `${list.location}[${index}]`;
        const found: FieldExpression[] = [];
        const collect = (field: string, location: string, asts: jsep.Expression[]): void => {
          for (const ast of asts) found.push({ field, location, ast });
        };

        if (typeof step.if === 'string') {
          collect('if', `${base}.if`, this.parseCondition(step.if, `${base}.if`));
        }
        if (typeof step.loop === 'string') {
          collect('loop', `${base}.loop`, this.parseCondition(step.loop, `${base}.loop`));
        } else if (Array.isArray(step.loop)) {
          collect('loop', `${base}.loop`, this.parseValue(step.loop, `${base}.loop`));
        }
        if (typeof step.break_if === 'string') {
          collect('break_if', `${base}.break_if`, this.parseCondition(step.break_if, `${base}.break_if`));
        }
        if (step.run !== undefined) {
          const commands = typeof step.run === 'string' ? [step.run] : step.run;
          commands.forEach((command, i) => {
            const location = typeof step.run === 'string' ? `${base}.run` : `${base}.run[${i}]`;
            collect('run', location, this.parseTemplate(command, location));
            this.checkHardcodedSecret(command, location);
          });
        }
        if (step.with !== undefined) {
          collect('with', `${base}.with`, this.parseValue(step.with, `${base}.with`));
        }

        this.expressions.set(step.id, found);
      });
    }
  }

  /** Conditions and loop sources: a template, or a bare expression */
  private parseCondition(source: string, location: string): jsep.Expression[] {
    if (source.includes('${{') || source.includes('}}')) {
      return this.parseTemplate(source, location);
    }
    const ast = this.parseExpression(source, location);
    return ast ? [ast] : [];
  }

  private parseValue(value: unknown, location: string): jsep.Expression[] {
    if (typeof value === 'string') {
      this.checkHardcodedSecret(value, location);
      return this.parseTemplate(value, location);
    }
    if (Array.isArray(value)) {
      return value.flatMap((item, index) => this.parseValue(item, `${location}[${index}]`));
    }
    if (isPlainObject(value)) {
      return Object.entries(value).flatMap(([key, item]) =>
        this.parseValue(item, `${location}.${key}`)
      );
    }
    return [];
  }

  private parseTemplate(template: string, location: string): jsep.Expression[] {
    try {
      ExpressionEvaluator.validateTemplate(template);
    } catch (error) {
      this.error(
        ValidationCode.INVALID_EXPRESSION,
        error instanceof Error ? error.message : String(error),
        location
      );
      return [];
    }
    const asts: jsep.Expression[] = [];
    for (const { expr } of ExpressionEvaluator.scanExpressions(template)) {
      const ast = this.parseExpression(expr, location);
      if (ast) asts.push(ast);
    }
    return asts;
  }

  private parseExpression(expr: string, location: string): jsep.Expression | null {
    let ast: jsep.Expression;
    try {
      ast = ExpressionEvaluator.parse(expr);
    } catch (error) {
      this.error(
        ValidationCode.INVALID_EXPRESSION,
        error instanceof Error ? error.message : String(error),
        location
      );
      return null;
    }
    for (const name of ExpressionEvaluator.findFilterNames(ast)) {
      if (!isKnownFilter(name)) {
        this.error(
          ValidationCode.UNKNOWN_FILTER,
          `Unknown filter "${name}" in expression "${expr}"`,
          location,
          'Check spelling or use a supported filter'
        );
      }
    }
    for (const name of ExpressionEvaluator.findForbiddenAccess(ast)) {
      this.error(
        ValidationCode.FORBIDDEN_ACCESS,
        `Access to "${name}" is not allowed in expression "${expr}"`,
        location
      );
    }
    return ast;
  }

  private checkHardcodedSecret(text: string, location: string): void {
    if (SECRET_PATTERNS.some((pattern) => pattern.test(text))) {
      this.warn(
        ValidationCode.HARDCODED_SECRET,
        'Possible hardcoded secret detected',
        location,
        'Use inputs, env or secrets instead'
      );
    }
  }

  // ===== Phase 5: references =====

  private checkReferences(workflow: WorkflowDefinition, lists: StepList[]): void {
    const jobOrder = Object.keys(workflow.jobs);
    const allIds = new Set(lists.flatMap((list) => list.steps.map((step) => step.id)));

    for (const list of lists) {
      const readable = this.readableBefore(workflow, jobOrder, list);
      const earlier = new Set<string>();
      const positions = new Map(list.steps.map((step, index) => [step.id, index]));

      list.steps.forEach((step, index) => {
        const base = `${list.location}[${index}]`;

        if (step.on_failure !== undefined) {
          this.checkJumpTarget(
            step.on_failure,
            index,
            positions,
            allIds,
            ValidationCode.INVALID_FAILURE_TARGET,
            'on_failure',
            `${base}.on_failure`
          );
        }

        const guardrails = step.guardrails;
        const onFail = guardrails ? guardrails.on_fail : undefined;
        if (onFail !== undefined && !GUARDRAIL_ACTIONS.has(onFail)) {
          this.checkJumpTarget(
            onFail,
            index,
            positions,
            allIds,
            ValidationCode.INVALID_GUARDRAIL_TARGET,
            'guardrails.on_fail',
            `${base}.guardrails.on_fail`
          );
        }

        for (const { field, location, ast } of this.expressions.get(step.id) ?? []) {
          for (const ref of ExpressionEvaluator.findStepReferences(ast)) {
            if (ref === step.id) {
              if (field === 'break_if' && step.loop !== undefined) continue;
              this.error(
                ValidationCode.INVALID_STEP_REFERENCE,
                `Step "${step.id}" cannot read its own outputs in "${field}"`,
                location
              );
            } else if (!allIds.has(ref)) {
              this.error(
                ValidationCode.INVALID_STEP_REFERENCE,
                `Expression references unknown step "${ref}"`,
                location
              );
            } else if (!readable.has(ref) && !earlier.has(ref)) {
              this.error(
                ValidationCode.INVALID_STEP_REFERENCE,
                `Step "${step.id}" references step "${ref}", which has not run yet`,
                location,
                'A step can only read steps that run before it'
              );
            }
          }
        }

        earlier.add(step.id);
      });
    }

    this.checkUnknownNames(workflow, lists);

    const workflowOnFail = workflow.guardrails?.on_fail;
    if (
      workflowOnFail !== undefined &&
      !GUARDRAIL_ACTIONS.has(workflowOnFail) &&
      !allIds.has(workflowOnFail)
    ) {
      this.error(
        ValidationCode.INVALID_GUARDRAIL_TARGET,
        `guardrails.on_fail references unknown step "${workflowOnFail}"`,
        'guardrails.on_fail'
      );
    }
  }

  private checkJumpTarget(
    target: string,
    index: number,
    positions: Map<string, number>,
    allIds: Set<string>,
    code: string,
    field: string,
    location: string
  ): void {
    const position = positions.get(target);
    if (position === undefined) {
      const message = allIds.has(target)
        ? `${field} target "${target}" is not in the same step list`
        : `${field} references unknown step "${target}"`;
      this.error(code, message, location, `Valid targets: ${[...positions.keys()].slice(index + 1).join(', ') || '(none)'}`);
    } else if (position <= index) {
      this.error(
        code,
        `${field} target "${target}" must come after the step that references it`,
        location
      );
    }
  }

  /**
   * Steps that have always had their chance to run before any step of `list`
   */
  private readableBefore(
    workflow: WorkflowDefinition,
    jobOrder: string[],
    list: StepList
  ): Set<string> {
    const readable = new Set<string>();
    const addJob = (job: JobDefinition, sections: readonly StepSection[]): void => {
      for (const section of sections) {
        for (const step of job[section]) readable.add(step.id);
      }
    };
    const everySection = STEP_SECTIONS;

    if (list.job === null) {
      for (const job of Object.values(workflow.jobs)) addJob(job, everySection);
      if (list.section === 'finally') {
        for (const step of [...workflow.on_complete, ...workflow.on_failure]) readable.add(step.id);
      }
      return readable;
    }

    for (const name of jobOrder) {
      if (name === list.job) break;
      addJob(workflow.jobs[name], everySection);
    }
    const own = workflow.jobs[list.job];
    if (list.section !== 'steps') addJob(own, ['steps']);
    if (list.section === 'finally') addJob(own, ['on_complete', 'on_failure']);
    return readable;
  }

  private checkUnknownNames(workflow: WorkflowDefinition, lists: StepList[]): void {
    const scannerNames = (config: unknown): string[] => {
      if (!isPlainObject(config)) return [];
      return ['input', 'output'].flatMap((stage) => {
        const scanners = config[stage];
        return isPlainObject(scanners) ? Object.keys(scanners) : [];
      });
    };

    if (this.knownScanners) {
      for (const name of scannerNames(workflow.guardrails)) {
        if (!this.knownScanners.has(name)) {
          this.warn(ValidationCode.UNKNOWN_SCANNER, `Unknown guardrail scanner "${name}"`, 'guardrails');
        }
      }
    }

    for (const list of lists) {
      list.steps.forEach((step, index) => {
        const base = `${list.location}[${index}]`;
        if (this.knownActions && step.uses !== undefined && !this.knownActions.has(step.uses)) {
          this.warn(
            ValidationCode.UNKNOWN_ACTION,
            `Unknown action "${step.uses}"`,
            `${base}.uses`,
            `Known actions: ${[...this.knownActions].sort().join(', ')}`
          );
        }
        if (this.knownScanners) {
          for (const name of scannerNames(step.guardrails)) {
            if (!this.knownScanners.has(name)) {
              this.warn(
                ValidationCode.UNKNOWN_SCANNER,
                `Unknown guardrail scanner "${name}"`,
                `${base}.guardrails`
              );
            }
          }
        }
      });
    }
  }

  // ===== Phase 6: shell safety =====

  private checkShellSafety(workflow: WorkflowDefinition, lists: StepList[]): void {
    if (workflow.shell_safety === 'auto_quote') return;

    for (const list of lists) {
      list.steps.forEach((step, index) => {
        if (typeof step.run !== 'string') return;
        for (const { expr } of ExpressionEvaluator.scanExpressions(step.run)) {
          if (ExpressionEvaluator.isShellQuoted(expr)) continue;
          this.warn(
            ValidationCode.UNQUOTED_INTERPOLATION,
            `Unquoted interpolation in shell command: \${{ ${expr} }}`,
            `${list.location}[${index}].run`,
            `Use \${{ ${expr} | shell_quote }}, the array form of "run", or shell_safety: auto_quote`
          );
        }
      });
    }
  }
}
