import { type ExpressionContext, ExpressionEvaluator, type StepView } from '../expression/evaluator.ts';
import { toText } from '../expression/filters.ts';
import type { StepSection, WorkflowDefinition } from '../parser/schema.ts';
import { StepOutcome, type StepOutcomeType } from '../types/status.ts';
import { ExpressionError } from './errors.ts';

export interface StepExecution {
  outcome: StepOutcomeType;
  outputs: Record<string, unknown>;
  stdout?: string;
  stderr?: string;
  /** Path of the captured output when capture_mode is `file` */
  file?: string;
  error?: string;
  error_type?: string;
  started_at?: string;
  completed_at?: string;
  duration_ms?: number;
  attempts: number;
}

export interface LoopResult {
  index: number;
  item: unknown;
  outputs: Record<string, unknown>;
}

export interface LoopErrorRecord {
  index: number;
  item: unknown;
  error: string;
  error_type: string;
}

export interface LoopFrame {
  stepId: string;
  items: unknown[];
  /** Zero-based index of the current iteration */
  index0: number;
  /** Outputs of the most recent successful iteration */
  output: Record<string, unknown> | null;
  results: LoopResult[];
  errors: LoopErrorRecord[];
  iterations: number;
  succeeded: number;
  failed: number;
  skipped: number;
  truncated: boolean;
  breakEarly: boolean;
  /** One-based */
  breakIndex: number | null;
  breakItem: unknown;
  /** Outcome of the iteration that just ended; break_if only follows a success */
  lastOutcome: 'succeeded' | 'failed' | 'skipped' | null;
  maxResults: number;
  maxErrors: number;
}

/** The `error` root seen by failure handlers */
export interface FailureInfo {
  message: string;
  step: string;
  type: string;
}

export interface RunContextSnapshot {
  runId: string;
  workflowName: string;
  inputs: Record<string, unknown>;
  /** Env values resolved so far */
  env: Record<string, unknown>;
  steps: Record<string, StepExecution>;
  loops: LoopFrame[];
  variables: Record<string, unknown>;
  failure: FailureInfo | null;
  /** Step an on_failure or guardrail jump routed to */
  failureHandler: string | null;
}

export interface RunContextOptions {
  runId: string;
  workflow: WorkflowDefinition;
  inputs?: Record<string, unknown>;
  secrets?: Record<string, string>;
  /** Reject malformed `${{ }}` templates */
  strict?: boolean;
}

/**
 * Mutable state of one run. Everything except secrets round-trips through `snapshot()`.
 */
export class RunContext {
  readonly runId: string;
  readonly workflowName: string;
  inputs: Record<string, unknown>;
  variables: Record<string, unknown> = {};
  failure: FailureInfo | null = null;
  failureHandler: string | null = null;

  private handlingFailure = false;
  private readonly strict: boolean;
  private readonly envTemplates: Record<string, string>;
  private envCache: Record<string, unknown> = {};
  private readonly resolving = new Set<string>();
  private readonly secrets: Record<string, string>;
  private steps: Record<string, StepExecution> = {};
  private loops: LoopFrame[] = [];

  constructor(options: RunContextOptions) {
    this.runId = options.runId;
    this.workflowName = options.workflow.name;
    this.inputs = { ...(options.inputs ?? {}) };
    this.envTemplates = { ...(options.workflow.env ?? {}) };
    this.secrets = { ...(options.secrets ?? {}) };
    this.strict = options.strict ?? false;
  }

  static restore(
    snapshot: RunContextSnapshot,
    options: Omit<RunContextOptions, 'runId' | 'inputs'>
  ): RunContext {
    const copy = structuredClone(snapshot);
    const context = new RunContext({
      runId: copy.runId,
      workflow: options.workflow,
      inputs: copy.inputs,
      secrets: options.secrets,
      strict: options.strict,
    });
    context.envCache = copy.env;
    context.steps = copy.steps;
    context.loops = copy.loops;
    context.variables = copy.variables;
    context.failure = copy.failure;
    context.failureHandler = copy.failureHandler ?? null;
    return context;
  }

  snapshot(): RunContextSnapshot {
    return structuredClone({
      runId: this.runId,
      workflowName: this.workflowName,
      inputs: this.inputs,
      env: this.envCache,
      steps: this.steps,
      loops: this.loops,
      variables: this.variables,
      failure: this.failure,
      failureHandler: this.failureHandler,
    });
  }

  /**
   * Called before each step node runs. `error` is visible in the on_failure section and
   * while the step a failure jump routed to runs; leaving that step ends the handler.
   */
  enterStep(stepId: string, section: StepSection): void {
    if (stepId !== this.failureHandler) this.failureHandler = null;
    this.handlingFailure = section === 'on_failure' || this.failureHandler !== null;
  }

  get secretValues(): string[] {
    return Object.values(this.secrets);
  }

  // ===== Step executions =====

  getStep(stepId: string): StepExecution | undefined {
    return this.steps[stepId];
  }

  get stepIds(): string[] {
    return Object.keys(this.steps);
  }

  recordStep(stepId: string, execution: StepExecution): void {
    this.steps[stepId] = execution;
  }

  markRunning(stepId: string, attempts: number): void {
    this.steps[stepId] = {
      outcome: StepOutcome.RUNNING,
      outputs: {},
      started_at: new Date().toISOString(),
      attempts,
    };
  }

  markSkipped(stepId: string): void {
    this.steps[stepId] = { outcome: StepOutcome.SKIPPED, outputs: {}, attempts: 0 };
  }

  // ===== Loops =====

  pushLoop(stepId: string, items: unknown[], limits: { maxResults: number; maxErrors: number }): LoopFrame {
    const frame: LoopFrame = {
      stepId,
      items,
      index0: 0,
      output: null,
      results: [],
      errors: [],
      iterations: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      truncated: false,
      breakEarly: false,
      breakIndex: null,
      breakItem: null,
      lastOutcome: null,
      maxResults: limits.maxResults,
      maxErrors: limits.maxErrors,
    };
    this.loops.push(frame);
    return frame;
  }

  currentLoop(stepId?: string): LoopFrame | undefined {
    const frame = this.loops[this.loops.length - 1];
    if (stepId !== undefined && frame?.stepId !== stepId) return undefined;
    return frame;
  }

  popLoop(stepId: string): LoopFrame {
    const frame = this.loops.pop();
    if (!frame || frame.stepId !== stepId) {
      throw new Error(`Loop stack is out of sync: expected "${stepId}", found "${frame?.stepId ?? 'none'}"`);
    }
    return frame;
  }

  /** Drop every open loop, innermost first */
  abandonLoops(): LoopFrame[] {
    const frames = this.loops.reverse();
    this.loops = [];
    return frames;
  }

  recordIterationSuccess(frame: LoopFrame, outputs: Record<string, unknown>): void {
    frame.iterations++;
    frame.succeeded++;
    frame.lastOutcome = 'succeeded';
    frame.output = outputs;
    if (frame.results.length < frame.maxResults) {
      frame.results.push({ index: frame.index0, item: frame.items[frame.index0], outputs });
    } else {
      frame.truncated = true;
    }
  }

  recordIterationFailure(frame: LoopFrame, error: string, errorType: string): void {
    frame.iterations++;
    frame.failed++;
    frame.lastOutcome = 'failed';
    if (frame.errors.length < frame.maxErrors) {
      frame.errors.push({
        index: frame.index0,
        item: frame.items[frame.index0],
        error,
        error_type: errorType,
      });
    } else {
      frame.truncated = true;
    }
  }

  recordIterationSkipped(frame: LoopFrame): void {
    frame.skipped++;
    frame.lastOutcome = 'skipped';
  }

  static loopOutputs(frame: LoopFrame): Record<string, unknown> {
    return {
      results: frame.results,
      errors: frame.errors,
      iterations: frame.iterations,
      succeeded: frame.succeeded,
      failed: frame.failed,
      skipped: frame.skipped,
      break_early: frame.breakEarly,
      break_index: frame.breakIndex,
      break_item: frame.breakItem,
      truncated: frame.truncated,
    };
  }

  // ===== Variables =====

  setVariable(name: string, value: unknown): void {
    this.variables[name] = value;
  }

  appendVariable(name: string, value: unknown): unknown[] {
    const current = this.variables[name];
    let list: unknown[];
    if (Array.isArray(current)) list = [...current, value];
    else if (current === undefined || current === null) list = [value];
    else list = [current, value];
    this.variables[name] = list;
    return list;
  }

  // ===== Expression context =====

  /**
   * Read-only view handed to the evaluator. `error` is present only while a failure is
   * being handled (see `enterStep`).
   */
  expressionContext(): ExpressionContext {
    const steps: Record<string, StepView> = {};
    for (const [id, execution] of Object.entries(this.steps)) {
      steps[id] = {
        outcome: execution.outcome,
        outputs: execution.outputs,
        ...(execution.error !== undefined ? { error: execution.error } : {}),
        ...(execution.error_type !== undefined ? { error_type: execution.error_type } : {}),
        ...(execution.duration_ms !== undefined ? { duration_ms: execution.duration_ms } : {}),
      };
    }

    const context: ExpressionContext = {
      inputs: this.inputs,
      env: this.envView(),
      steps,
      variables: this.variables,
      secrets: this.secrets,
      workflow: { name: this.workflowName, run_id: this.runId },
    };
    const loop = this.loopView(this.loops.length - 1);
    if (loop) context.loop = loop;
    if (this.handlingFailure && this.failure) context.error = { ...this.failure };
    if (this.strict) context.strict = true;
    return context;
  }

  /**
   * Env values are resolved on first read and cached for the rest of the run
   */
  private envView(): Record<string, unknown> {
    const view: Record<string, unknown> = {};
    for (const key of Object.keys(this.envTemplates)) {
      Object.defineProperty(view, key, {
        enumerable: true,
        get: () => this.resolveEnv(key),
      });
    }
    return view;
  }

  resolveEnv(key: string): unknown {
    if (Object.hasOwn(this.envCache, key)) return this.envCache[key];
    const template = this.envTemplates[key];
    if (template === undefined) return undefined;
    if (this.resolving.has(key)) {
      throw new ExpressionError(`Circular reference while resolving env.${key}`);
    }
    this.resolving.add(key);
    try {
      const value = ExpressionEvaluator.evaluate(template, this.expressionContext());
      this.envCache[key] = value;
      return value;
    } finally {
      this.resolving.delete(key);
    }
  }

  /** Every env value, resolving the ones not read yet */
  resolvedEnv(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const key of Object.keys(this.envTemplates)) {
      env[key] = toText(this.resolveEnv(key));
    }
    return env;
  }

  private loopView(position: number): Record<string, unknown> | undefined {
    const frame = this.loops[position];
    if (!frame) return undefined;
    const total = frame.items.length;
    const index0 = frame.index0;
    return {
      item: frame.items[index0],
      index: index0 + 1,
      index0,
      total,
      first: index0 === 0,
      last: index0 === total - 1,
      revindex: total - index0,
      revindex0: total - index0 - 1,
      output: frame.output,
      results: frame.results,
      items: frame.items,
      parent: this.loopView(position - 1) ?? null,
    };
  }
}
