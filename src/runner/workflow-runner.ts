import { randomUUID } from 'node:crypto';
import { GraphCompiler } from '../compiler/graph-compiler.ts';
import {
  type ActionNode,
  type BranchNode,
  type CompiledWorkflow,
  type Graph,
  type GraphNode,
  type LoopHeadNode,
  type LoopTailNode,
  type Segment,
  getNode,
} from '../compiler/graph.ts';
import { MemoryCheckpointStore } from '../db/memory-store.ts';
import type {
  CheckpointKind,
  CheckpointStore,
  PendingSuspension,
  RunCursor,
  RunProgress,
} from '../db/types.ts';
import { ExpressionEvaluator } from '../expression/evaluator.ts';
import { isPlainObject } from '../expression/filters.ts';
import type { ResolvedStep, StepSection, WorkflowDefinition } from '../parser/schema.ts';
import { RunStatus, type RunStatusType, StepOutcome, isTerminalRunStatus } from '../types/status.ts';
import { ConsoleLogger, type Logger, RedactingLogger } from '../utils/logger.ts';
import { Redactor, mapStrings } from '../utils/redactor.ts';
import { type ActionRegistry, type ActionServices, createDefaultRegistry } from './action-registry.ts';
import {
  ActionError,
  ActionErrorKind,
  ExpressionError,
  GuardrailViolation,
  RunTermination,
  SuspendSignal,
  errorTypeOf,
  toError,
} from './errors.ts';
import type { EventHandler, WorkflowEvent, WorkflowEventBody } from './events.ts';
import type { ActionContext, ActionDefinition, ActionResult, ResumeValue } from './executors/types.ts';
import { GuardrailPipeline } from './guardrails/pipeline.ts';
import type { GuardrailStage, Violation } from './guardrails/types.ts';
import { InputResolver } from './inputs.ts';
import { calculateBackoff, sleep } from './retry.ts';
import { type LoopFrame, RunContext, type RunContextSnapshot, type StepExecution } from './run-context.ts';
import { withTimeout } from './timeout.ts';

export interface RunOptions {
  inputs?: Record<string, unknown>;
  /** Answers for steps that would otherwise suspend, keyed by step id */
  answers?: Record<string, unknown>;
  runId?: string;
  /** Source document, recorded so the run can be resumed from the CLI */
  workflowPath?: string;
  store?: CheckpointStore;
  registry?: ActionRegistry;
  /** Used to build the default registry when `registry` is not given */
  services?: ActionServices;
  guardrails?: GuardrailPipeline;
  /** Config-level guardrail defaults, merged under the workflow's */
  globalGuardrails?: Record<string, unknown>;
  logger?: Logger;
  onEvent?: EventHandler;
  signal?: AbortSignal;
  /** Mask secret values in persisted checkpoints and run records (default true) */
  redactAtRest?: boolean;
  /** When false only suspension and final checkpoints are written (default true) */
  checkpoints?: boolean;
  /** Reject malformed `${{ }}` templates instead of treating them as text */
  strictExpressions?: boolean;
}

export interface RunResult {
  runId: string;
  status: RunStatusType;
  /** Outputs handed to control/exit or control/fail */
  outputs: Record<string, unknown>;
  error?: string;
  context: RunContextSnapshot;
  suspension?: PendingSuspension;
}

interface Session {
  runId: string;
  context: RunContext;
  progress: RunProgress;
  logger: Logger;
  redactor: Redactor;
  /** Value for the step that suspended, delivered on its next dispatch */
  pendingResume: { stepId: string; value: ResumeValue } | null;
  /** Node whose dispatch never reached a checkpoint before the process stopped */
  pendingInterrupt: string | null;
  suspension: PendingSuspension | null;
}

/** Where a walk starts; an undefined node means the segment's entry */
interface StartPoint {
  job: number;
  section: StepSection;
  node: string | null | undefined;
}

interface Position {
  job: number;
  jobName: string | null;
  section: StepSection;
}

type NodeResult = { next: string | null } | { suspended: true };

/**
 * Walks the compiled graphs of a workflow: each job's `steps`, then its `on_complete` or
 * `on_failure`, then its `finally`; then the document-level lists. Every node transition is
 * checkpointed so a run can be resumed after a suspension or a crash.
 */
export class WorkflowRunner {
  private readonly compiled: CompiledWorkflow;
  private readonly store: CheckpointStore;
  private readonly registry: ActionRegistry;
  private readonly guardrails: GuardrailPipeline;
  private readonly baseLogger: Logger;
  private readonly redactAtRest: boolean;
  private readonly checkpoints: boolean;

  constructor(
    private readonly workflow: WorkflowDefinition,
    private readonly options: RunOptions = {}
  ) {
    this.compiled = GraphCompiler.compileWorkflow(workflow, options.globalGuardrails);
    this.baseLogger = options.logger ?? new ConsoleLogger();
    this.store = options.store ?? new MemoryCheckpointStore();
    this.registry =
      options.registry ?? createDefaultRegistry({ logger: this.baseLogger, ...(options.services ?? {}) });
    this.guardrails = options.guardrails ?? new GuardrailPipeline({ logger: this.baseLogger });
    this.redactAtRest = options.redactAtRest ?? true;
    this.checkpoints = options.checkpoints ?? true;
  }

  /**
   * Start a new run
   */
  async run(): Promise<RunResult> {
    const runId = this.options.runId ?? randomUUID();
    const { inputs, secrets } = InputResolver.resolve(this.workflow.inputs, this.options.inputs ?? {});
    const context = new RunContext({
      runId,
      workflow: this.workflow,
      inputs,
      secrets,
      strict: this.options.strictExpressions,
    });
    const session = this.createSession(runId, context, secrets, WorkflowRunner.freshProgress());

    await this.store.createRun({
      id: runId,
      workflowName: this.workflow.name,
      workflowPath: this.options.workflowPath ?? null,
      inputs: this.redactInputs(session, inputs),
    });
    return this.execute(session, { job: 0, section: 'steps', node: undefined }, false);
  }

  /**
   * Continue a suspended or interrupted run from its latest checkpoint. `answer` is handed
   * to the step that suspended; secret inputs must be supplied again through `inputs`.
   */
  async resume(runId: string, answer?: unknown): Promise<RunResult> {
    const run = await this.store.getRun(runId);
    if (!run) {
      throw new Error(`Run "${runId}" not found`);
    }
    if (isTerminalRunStatus(run.status)) {
      throw new Error(`Run "${runId}" already finished with status "${run.status}"`);
    }
    if (run.workflowName !== this.workflow.name) {
      throw new Error(
        `Run "${runId}" belongs to workflow "${run.workflowName}", not "${this.workflow.name}"`
      );
    }

    const { inputs, secrets } = InputResolver.resolve(this.workflow.inputs, {
      ...run.inputs,
      ...(this.options.inputs ?? {}),
    });
    const latest = await this.store.latestCheckpoint(runId);
    const context = latest
      ? RunContext.restore(WorkflowRunner.revealed(runId, latest.context, secrets), {
          workflow: this.workflow,
          secrets,
          strict: this.options.strictExpressions,
        })
      : new RunContext({
          runId,
          workflow: this.workflow,
          inputs,
          secrets,
          strict: this.options.strictExpressions,
        });
    context.inputs = inputs;

    const session = this.createSession(
      runId,
      context,
      secrets,
      latest ? latest.progress : WorkflowRunner.freshProgress()
    );

    let start: StartPoint = { job: 0, section: 'steps', node: undefined };
    if (latest) {
      start = { ...latest.cursor };
      if (latest.kind === 'intent') {
        session.pendingInterrupt = latest.cursor.node;
      }
      const suspension = latest.suspension;
      if (latest.kind === 'suspended' && suspension) {
        session.pendingResume = {
          stepId: suspension.stepId,
          value: {
            provided: answer !== undefined,
            ...(answer !== undefined ? { value: answer } : {}),
            suspendedAt: suspension.suspendedAt,
            ...(suspension.request.state ? { state: suspension.request.state } : {}),
          },
        };
      }
    }
    return this.execute(session, start, true);
  }

  private static freshProgress(): RunProgress {
    return { jobFailed: false, runFailed: false, termination: null, error: null };
  }

  private createSession(
    runId: string,
    context: RunContext,
    secrets: Record<string, string>,
    progress: RunProgress
  ): Session {
    const redactor = new Redactor(secrets, { forcedSecrets: Object.values(secrets) });
    return {
      runId,
      context,
      progress,
      logger: new RedactingLogger(this.baseLogger, redactor),
      redactor,
      pendingResume: null,
      pendingInterrupt: null,
      suspension: null,
    };
  }

  private async execute(session: Session, start: StartPoint, resumed: boolean): Promise<RunResult> {
    const { logger } = session;
    logger.log(`\n🏛️  ${resumed ? 'Resuming' : 'Running'} workflow: ${this.workflow.name}`);
    logger.log(`Run ID: ${session.runId}`);

    await this.store.updateRun(session.runId, { status: RunStatus.RUNNING });
    this.emit(session, {
      type: 'workflow.start',
      resumed,
      inputs: this.redactInputs(session, session.context.inputs),
    });

    let suspended: boolean;
    try {
      suspended = await this.walk(session, start);
    } catch (error) {
      const message = toError(error).message;
      logger.error(`\n✗ Workflow crashed: ${message}`);
      await this.store.updateRun(session.runId, {
        status: RunStatus.FAILED,
        error: session.redactor.redact(message),
      });
      this.emit(session, { type: 'workflow.complete', status: RunStatus.FAILED, error: message });
      throw error;
    }

    if (suspended && session.suspension) {
      const suspension = session.suspension;
      await this.store.updateRun(session.runId, { status: RunStatus.SUSPENDED });
      logger.log(`\n⏸  Workflow paused: ${suspension.request.prompt}`);
      logger.log(`   Resume with: runbook resume ${session.runId}`);
      this.emit(session, {
        type: 'workflow.suspended',
        stepId: suspension.stepId,
        prompt: suspension.request.prompt,
      });
      return {
        runId: session.runId,
        status: RunStatus.SUSPENDED,
        outputs: {},
        context: session.context.snapshot(),
        suspension,
      };
    }

    return this.complete(session);
  }

  private async complete(session: Session): Promise<RunResult> {
    const { termination, runFailed } = session.progress;
    let status: RunStatusType = RunStatus.SUCCEEDED;
    if (runFailed) status = RunStatus.FAILED;
    else if (termination?.mode === 'exit') status = RunStatus.EXITED;

    let error: string | undefined;
    if (status === RunStatus.FAILED) {
      error =
        termination && termination.mode !== 'exit'
          ? termination.message
          : (session.progress.error ?? 'Workflow failed');
    }
    const outputs = termination?.outputs ?? {};

    await this.store.updateRun(session.runId, {
      status,
      outputs: this.redactAtRest ? WorkflowRunner.redactRecord(session.redactor, outputs) : outputs,
      error: error === undefined ? null : session.redactor.redact(error),
    });
    await this.checkpoint(
      session,
      'final',
      { job: this.compiled.jobs.length, section: 'finally', node: null },
      status
    );

    if (status === RunStatus.SUCCEEDED) {
      session.logger.log('\n✨ Workflow completed successfully!\n');
    } else if (status === RunStatus.EXITED) {
      session.logger.log(`\n⏹  Workflow exited: ${termination?.message ?? ''}\n`);
    } else {
      session.logger.error(`\n✗ Workflow failed: ${error}\n`);
    }
    this.emit(session, {
      type: 'workflow.complete',
      status,
      ...(error !== undefined ? { error } : {}),
    });

    return {
      runId: session.runId,
      status,
      outputs,
      ...(error !== undefined ? { error } : {}),
      context: session.context.snapshot(),
    };
  }

  // ===== Graph walking =====

  /**
   * Returns true when the run suspended
   */
  private async walk(session: Session, start: StartPoint): Promise<boolean> {
    const graphs: Graph[] = [...this.compiled.jobs, this.compiled.document];
    const documentIndex = graphs.length - 1;

    for (let index = start.job; index < graphs.length; index++) {
      const graph = graphs[index];
      const isDocument = index === documentIndex;
      const resuming = index === start.job;

      if (!resuming) session.progress.jobFailed = false;
      if (!isDocument && !resuming && (session.progress.runFailed || session.progress.termination)) {
        this.skipGraph(session, graph);
        continue;
      }

      let section: StepSection | null = resuming ? start.section : 'steps';
      let node: string | null | undefined = resuming ? start.node : undefined;
      while (section !== null) {
        const segment = graph.segments[section];
        const position: Position = { job: index, jobName: graph.job, section };
        const suspended = await this.walkSegment(
          session,
          segment,
          node === undefined ? segment.entry : node,
          position
        );
        if (suspended) return true;

        section = this.followingSection(session, section, isDocument);
        node = undefined;
        if (section !== null) {
          await this.checkpoint(session, 'after', {
            job: index,
            section,
            node: graph.segments[section].entry,
          });
        }
      }
    }
    return false;
  }

  private followingSection(
    session: Session,
    current: StepSection,
    isDocument: boolean
  ): StepSection | null {
    this.checkCanceled(session);
    const { termination } = session.progress;
    const failed = isDocument ? session.progress.runFailed : session.progress.jobFailed;

    switch (current) {
      case 'steps':
        if (termination && termination.mode !== 'fail') return 'finally';
        return failed ? 'on_failure' : 'on_complete';
      case 'on_complete':
      case 'on_failure':
        return 'finally';
      case 'finally':
        return null;
    }
  }

  private skipGraph(session: Session, graph: Graph): void {
    session.logger.log(`  ⊘ Skipping job ${graph.job ?? ''} (run already failed or ended)`);
    for (const segment of Object.values(graph.segments)) {
      for (const id of segment.order) {
        const node = segment.nodes[id];
        if (node.kind !== 'action' || session.context.getStep(node.stepId)) continue;
        session.context.markSkipped(node.stepId);
        this.emit(session, { type: 'step.skipped', stepId: node.stepId, reason: 'job_failed' });
      }
    }
  }

  /**
   * Returns true when the run suspended
   */
  private async walkSegment(
    session: Session,
    segment: Segment,
    entry: string | null,
    position: Position
  ): Promise<boolean> {
    let current = entry;
    while (current !== null) {
      if (position.section !== 'finally' && this.checkCanceled(session)) return false;

      const node = getNode(segment, current);
      if (node.kind !== 'jump') {
        session.context.enterStep(node.stepId, position.section);
      } else if (node.reason !== 'loop_back' && node.target !== null) {
        session.context.failureHandler = getNode(segment, node.target).stepId;
      }
      const result = await this.visit(session, segment, node, position);
      if ('suspended' in result) return true;
      if (node.kind !== 'jump') {
        await this.checkpoint(session, 'after', { job: position.job, section: position.section, node: result.next });
      }
      current = result.next;
    }
    return false;
  }

  private async visit(
    session: Session,
    segment: Segment,
    node: GraphNode,
    position: Position
  ): Promise<NodeResult> {
    switch (node.kind) {
      case 'action':
        return this.visitAction(session, node, position);
      case 'branch':
        return this.visitBranch(session, segment, node, position);
      case 'loop_head':
        return this.visitLoopHead(session, node, position);
      case 'loop_tail':
        return this.visitLoopTail(session, segment, node, position);
      case 'jump':
        return { next: node.target };
    }
  }

  private checkCanceled(session: Session): boolean {
    if (!this.options.signal?.aborted) return false;
    if (session.progress.termination?.mode !== 'cancel') {
      session.progress.termination = { mode: 'cancel', message: 'Run canceled', outputs: {} };
      session.progress.jobFailed = true;
      session.progress.runFailed = true;
      session.logger.warn('\n🛑 Run canceled, running finally steps');
    }
    return true;
  }

  // ===== Control nodes =====

  private visitBranch(
    session: Session,
    segment: Segment,
    node: BranchNode,
    position: Position
  ): NodeResult {
    const { context } = session;
    let holds: boolean;
    try {
      holds = ExpressionEvaluator.evaluateCondition(node.condition, context.expressionContext());
    } catch (error) {
      const action = getNode(segment, node.stepId);
      if (action.kind !== 'action') throw error;
      return this.failStep(session, action, position, error, new Date(), 1);
    }
    if (holds) return { next: node.next };

    if (node.perIteration) {
      const frame = WorkflowRunner.activeLoop(context, node.stepId);
      context.recordIterationSkipped(frame);
      this.emit(session, {
        type: 'loop.iteration',
        stepId: node.stepId,
        index: frame.index0 + 1,
        total: frame.items.length,
        outcome: 'skipped',
      });
      return { next: node.onFalse };
    }

    context.markSkipped(node.stepId);
    session.logger.log(`  ⊘ Skipping step ${node.stepId} (condition not met)`);
    this.emit(session, { type: 'step.skipped', stepId: node.stepId, reason: 'condition' });
    return { next: node.onFalse };
  }

  private visitLoopHead(session: Session, node: LoopHeadNode, position: Position): NodeResult {
    const { context } = session;
    const existing = context.currentLoop(node.stepId);
    if (existing) {
      existing.index0++;
      if (existing.index0 >= existing.items.length) {
        return this.finishLoop(session, node.step, position, node.exit, node.onFailure);
      }
      return { next: node.next };
    }

    const startedAt = new Date();
    let items: unknown[];
    try {
      items = WorkflowRunner.materialize(node, context);
    } catch (error) {
      return this.failLoop(session, node.step, position, error, node.exit, node.onFailure, startedAt);
    }

    context.markRunning(node.stepId, 1);
    context.pushLoop(node.stepId, items, {
      maxResults: node.step.max_results,
      maxErrors: node.step.max_errors,
    });
    session.logger.log(`▶ Executing step: ${node.stepId} (loop over ${items.length} item(s))`);
    this.emit(session, {
      type: 'step.start',
      job: position.jobName,
      section: position.section,
      stepId: node.stepId,
      action: WorkflowRunner.actionOf(node.step),
      attempt: 1,
    });

    if (items.length === 0) {
      return this.finishLoop(session, node.step, position, node.exit, node.onFailure);
    }
    return { next: node.next };
  }

  private static materialize(node: LoopHeadNode, context: RunContext): unknown[] {
    const value = ExpressionEvaluator.evaluateValue(node.source, context.expressionContext());
    if (value === null || value === undefined) return [];
    if (!Array.isArray(value)) {
      throw new ExpressionError(
        `Loop source of step "${node.stepId}" must be a list, got ${typeof value}`,
        typeof node.source === 'string' ? node.source : undefined
      );
    }
    if (value.length > node.step.max_iterations) {
      throw new ActionError(
        `Loop of step "${node.stepId}" has ${value.length} items, more than max_iterations (${node.step.max_iterations})`,
        ActionErrorKind.INVALID_INPUT
      );
    }
    return value;
  }

  private visitLoopTail(
    session: Session,
    segment: Segment,
    node: LoopTailNode,
    position: Position
  ): NodeResult {
    const { context } = session;
    const frame = WorkflowRunner.activeLoop(context, node.stepId);
    if (frame.lastOutcome !== 'succeeded' || node.breakIf === null) {
      return { next: node.next };
    }

    const head = getNode(segment, `${node.stepId}#loop`);
    const onFailure = head.kind === 'loop_head' ? head.onFailure : null;
    let broke: boolean;
    try {
      broke = ExpressionEvaluator.evaluateCondition(node.breakIf, context.expressionContext());
    } catch (error) {
      return this.failLoop(session, node.step, position, error, node.exit, onFailure, null);
    }
    if (!broke) return { next: node.next };

    frame.breakEarly = true;
    frame.breakIndex = frame.index0 + 1;
    frame.breakItem = frame.items[frame.index0];
    session.logger.log(`  ⏹  Loop ${node.stepId} stopped at item ${frame.breakIndex}`);
    return this.finishLoop(session, node.step, position, node.exit, onFailure);
  }

  private static activeLoop(context: RunContext, stepId: string): LoopFrame {
    const frame = context.currentLoop(stepId);
    if (!frame) {
      throw new Error(`Loop "${stepId}" is not active`);
    }
    return frame;
  }

  /**
   * Close the loop and record the loop step. It fails only when every iteration failed.
   */
  private finishLoop(
    session: Session,
    step: ResolvedStep,
    position: Position,
    exit: string | null,
    onFailure: string | null
  ): NodeResult {
    const { context } = session;
    const frame = context.popLoop(step.id);
    const outputs = RunContext.loopOutputs(frame);
    const running = context.getStep(step.id);
    const startedAt = running?.started_at ? new Date(running.started_at) : new Date();

    if (frame.iterations > 0 && frame.succeeded === 0) {
      const error = new ActionError(`All ${frame.iterations} iterations of step "${step.id}" failed`);
      context.recordStep(step.id, {
        ...WorkflowRunner.timing(startedAt),
        outcome: StepOutcome.FAILED,
        outputs,
        error: error.message,
        error_type: errorTypeOf(error),
        attempts: 1,
      });
      return this.routeFailure(session, step, position, error, onFailure);
    }

    context.recordStep(step.id, {
      ...WorkflowRunner.timing(startedAt),
      outcome: StepOutcome.SUCCEEDED,
      outputs,
      attempts: 1,
    });
    session.logger.log(
      `  ✓ Step ${step.id} completed (${frame.succeeded}/${frame.items.length} iteration(s) succeeded)`
    );
    this.emitEnd(session, step, position, StepOutcome.SUCCEEDED, startedAt);
    return { next: exit };
  }

  /**
   * The loop itself failed: its source could not be materialized or break_if raised
   */
  private failLoop(
    session: Session,
    step: ResolvedStep,
    position: Position,
    error: unknown,
    exit: string | null,
    onFailure: string | null,
    startedAt: Date | null
  ): NodeResult {
    const { context } = session;
    const frame = context.currentLoop(step.id);
    if (frame) context.popLoop(step.id);
    const begun = startedAt ?? new Date(context.getStep(step.id)?.started_at ?? Date.now());
    const message = toError(error).message;

    context.recordStep(step.id, {
      ...WorkflowRunner.timing(begun),
      outcome: StepOutcome.FAILED,
      outputs: frame ? RunContext.loopOutputs(frame) : {},
      error: message,
      error_type: errorTypeOf(error),
      attempts: 1,
    });
    const edge = onFailure ?? (step.continue_on_error ? exit : null);
    return this.routeFailure(session, step, position, error, edge);
  }

  // ===== Actions =====

  private async visitAction(session: Session, node: ActionNode, position: Position): Promise<NodeResult> {
    const { step } = node;
    const { context, logger } = session;
    const action = WorkflowRunner.actionOf(step);
    const startedAt = new Date();

    if (session.pendingInterrupt === node.id) {
      session.pendingInterrupt = null;
      logger.warn(`  ⚠️  Step ${step.id} was interrupted before it finished`);
      const error = new ActionError(`Step "${step.id}" was interrupted`, ActionErrorKind.INTERRUPTED);
      return this.failStep(session, node, position, error, startedAt, context.getStep(step.id)?.attempts ?? 1);
    }

    const maxAttempts = step.retry?.max_attempts ?? 1;
    const guardrailRetries = node.guardrails?.max_retries ?? 2;
    let guardrailAttempts = 0;
    let attempt = 0;

    while (true) {
      attempt++;
      if (node.loop === null) context.markRunning(step.id, attempt);
      logger.log(`▶ Executing step: ${step.id} (${action})`);
      this.emit(session, {
        type: 'step.start',
        job: position.jobName,
        section: position.section,
        stepId: step.id,
        action,
        attempt,
      });
      await this.checkpoint(session, 'intent', {
        job: position.job,
        section: position.section,
        node: node.id,
      });

      try {
        const result = await this.dispatch(session, node, position);
        return this.succeedStep(session, node, position, result, startedAt, attempt);
      } catch (error) {
        if (error instanceof SuspendSignal) {
          return this.suspend(session, node, position, error);
        }
        if (error instanceof RunTermination) {
          return this.terminate(session, node, position, error, startedAt, attempt);
        }

        if (error instanceof GuardrailViolation) {
          if (node.guardrails?.on_fail === 'retry' && guardrailAttempts < guardrailRetries) {
            guardrailAttempts++;
            logger.log(`  ↻ Guardrail retry ${guardrailAttempts}/${guardrailRetries} for step ${step.id}`);
            continue;
          }
        } else if (attempt < maxAttempts && this.isRetryable(step, error)) {
          const retry = step.retry;
          const delay = retry
            ? calculateBackoff(attempt - 1, retry.backoff, retry.delay * 1000, retry.max_delay * 1000)
            : 0;
          logger.log(`  ↻ Retry ${attempt}/${maxAttempts - 1} for step ${step.id}: ${toError(error).message}`);
          await sleep(delay, this.options.signal);
          continue;
        }

        return this.failStep(session, node, position, error, startedAt, attempt);
      }
    }
  }

  private isRetryable(step: ResolvedStep, error: unknown): boolean {
    if (this.options.signal?.aborted) return false;
    if (error instanceof ActionError && error.kind === ActionErrorKind.CANCELED) return false;
    const retryOn = step.retry?.retry_on;
    if (!retryOn) return true;
    const names = [errorTypeOf(error), toError(error).name];
    if (error instanceof ActionError) names.push(error.kind);
    return names.some((name) => retryOn.includes(name));
  }

  private static actionOf(step: ResolvedStep): string {
    return step.uses ?? 'run';
  }

  private async dispatch(session: Session, node: ActionNode, position: Position): Promise<ActionResult> {
    const { step } = node;
    const { context } = session;
    const definition = this.registry.get(WorkflowRunner.actionOf(step));

    let input = this.buildInput(definition, step, context);
    input = this.applyGuardrails(session, node, 'input', input);

    const resume = this.takeResumeValue(session, step.id);
    const controller = new AbortController();
    // finally steps still run after cancellation
    const parent = position.section === 'finally' ? undefined : this.options.signal;
    const onAbort = () => controller.abort();
    if (parent?.aborted) controller.abort();
    else parent?.addEventListener('abort', onAbort, { once: true });

    const actionContext: ActionContext = {
      runId: session.runId,
      workflowName: this.workflow.name,
      stepId: step.id,
      logger: session.logger,
      signal: controller.signal,
      timeout: node.timeout,
      env: context.resolvedEnv(),
      variables: {
        set: (name, value) => context.setVariable(name, value),
        append: (name, value) => context.appendVariable(name, value),
      },
      evaluateCondition: (condition) =>
        ExpressionEvaluator.evaluateCondition(condition, context.expressionContext()),
      interactive: step.interactive,
      ...(resume ? { resume } : {}),
    };

    try {
      const result = await withTimeout(
        definition.handler(input, actionContext),
        node.timeout * 1000,
        `Step "${step.id}"`,
        () => controller.abort()
      );
      const outputs = this.applyGuardrails(session, node, 'output', result.outputs);
      return { ...result, outputs };
    } finally {
      parent?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * A suspended step gets its answer back on resume; otherwise a queued answer is handed
   * over as if the run had been resumed with it
   */
  private takeResumeValue(session: Session, stepId: string): ResumeValue | undefined {
    const pending = session.pendingResume;
    if (pending && pending.stepId === stepId) {
      session.pendingResume = null;
      return pending.value;
    }
    const answers = this.options.answers;
    if (answers && Object.hasOwn(answers, stepId)) {
      return { provided: true, value: answers[stepId], suspendedAt: new Date().toISOString() };
    }
    return undefined;
  }

  private buildInput(
    definition: ActionDefinition,
    step: ResolvedStep,
    context: RunContext
  ): Record<string, unknown> {
    const expressionContext = context.expressionContext();
    if (step.run !== undefined) {
      let command: string | string[];
      if (typeof step.run !== 'string') {
        command = step.run.map((part) => ExpressionEvaluator.evaluateString(part, expressionContext));
      } else if (this.workflow.shell_safety === 'auto_quote') {
        command = ExpressionEvaluator.interpolateShell(step.run, expressionContext);
      } else {
        command = ExpressionEvaluator.evaluateString(step.run, expressionContext);
      }
      return { command, capture_mode: step.capture_mode };
    }

    const deferred = new Set(definition.deferred ?? []);
    const input: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(step.with ?? {})) {
      input[key] = deferred.has(key) ? value : ExpressionEvaluator.evaluateObject(value, expressionContext);
    }
    return input;
  }

  private applyGuardrails(
    session: Session,
    node: ActionNode,
    stage: GuardrailStage,
    payload: Record<string, unknown>
  ): Record<string, unknown> {
    const result = this.guardrails.scan(node.guardrails, stage, payload);
    if (result.passed) {
      return isPlainObject(result.payload) ? result.payload : payload;
    }
    this.onViolation(session, node, stage, result.violation);
    return payload;
  }

  /**
   * `continue` only warns; every other policy fails the step with a GuardrailViolation
   */
  private onViolation(session: Session, node: ActionNode, stage: GuardrailStage, violation: Violation): void {
    const policy = node.guardrails?.on_fail ?? 'abort';
    this.emit(session, {
      type: 'guardrail.violation',
      stepId: node.stepId,
      stage,
      scanner: violation.scanner,
      severity: violation.severity,
      message: violation.message,
      action: policy,
    });
    if (policy === 'continue') {
      session.logger.warn(
        `  ⚠️  Guardrail ${violation.scanner} flagged ${stage} of step ${node.stepId}: ${violation.message}`
      );
      return;
    }
    throw new GuardrailViolation(
      `Guardrail "${violation.scanner}" blocked ${stage} of step "${node.stepId}": ${violation.message}`,
      violation.scanner,
      violation.severity,
      stage
    );
  }

  private succeedStep(
    session: Session,
    node: ActionNode,
    position: Position,
    result: ActionResult,
    startedAt: Date,
    attempts: number
  ): NodeResult {
    const { context } = session;
    if (node.loop !== null) {
      const frame = WorkflowRunner.activeLoop(context, node.loop);
      context.recordIterationSuccess(frame, result.outputs);
      this.emit(session, {
        type: 'loop.iteration',
        stepId: node.stepId,
        index: frame.index0 + 1,
        total: frame.items.length,
        outcome: 'succeeded',
      });
      return { next: node.next };
    }

    context.recordStep(node.stepId, {
      ...WorkflowRunner.timing(startedAt),
      outcome: StepOutcome.SUCCEEDED,
      outputs: result.outputs,
      ...(result.stdout !== undefined ? { stdout: result.stdout } : {}),
      ...(result.stderr !== undefined ? { stderr: result.stderr } : {}),
      ...(result.file !== undefined ? { file: result.file } : {}),
      attempts,
    });
    session.logger.log(`  ✓ Step ${node.stepId} completed`);
    this.emitEnd(session, node.step, position, StepOutcome.SUCCEEDED, startedAt);
    return { next: node.next };
  }

  /**
   * Record a failed attempt and pick the failure edge: a guardrail step target, the
   * on_failure jump, or continue_on_error. Without one the enclosing list fails.
   */
  private failStep(
    session: Session,
    node: ActionNode,
    position: Position,
    error: unknown,
    startedAt: Date,
    attempts: number
  ): NodeResult {
    const { step } = node;
    const { context, logger } = session;
    const message = toError(error).message;
    const errorType = errorTypeOf(error);
    const guardrailEdge = error instanceof GuardrailViolation ? node.guardrailTarget : null;

    if (node.loop !== null) {
      const frame = WorkflowRunner.activeLoop(context, node.loop);
      const edge = guardrailEdge ?? node.onFailure;
      context.recordIterationFailure(frame, message, errorType);
      this.emit(session, {
        type: 'loop.iteration',
        stepId: step.id,
        index: frame.index0 + 1,
        total: frame.items.length,
        outcome: 'failed',
      });
      if (edge === `${step.id}#tail`) {
        logger.warn(`  ⚠️  Step ${step.id} failed on item ${frame.index0 + 1}: ${message}`);
        return { next: edge };
      }

      context.popLoop(step.id);
      const running = context.getStep(step.id);
      context.recordStep(step.id, {
        ...WorkflowRunner.timing(running?.started_at ? new Date(running.started_at) : startedAt),
        outcome: StepOutcome.FAILED,
        outputs: RunContext.loopOutputs(frame),
        error: message,
        error_type: errorType,
        attempts,
      });
      return this.routeFailure(session, step, position, error, edge);
    }

    const outputs = error instanceof ActionError && error.outputs ? error.outputs : {};
    context.recordStep(step.id, {
      ...WorkflowRunner.timing(startedAt),
      outcome: StepOutcome.FAILED,
      outputs,
      error: message,
      error_type: errorType,
      attempts,
    });
    const edge = guardrailEdge ?? node.onFailure ?? (step.continue_on_error ? node.next : null);
    return this.routeFailure(session, step, position, error, edge);
  }

  private routeFailure(
    session: Session,
    step: ResolvedStep,
    position: Position,
    error: unknown,
    edge: string | null
  ): NodeResult {
    const message = toError(error).message;
    session.context.failure = { message, step: step.id, type: errorTypeOf(error) };
    session.logger.error(`  ✗ Step ${step.id} failed: ${message}`);
    this.emitEnd(session, step, position, StepOutcome.FAILED, null, message);

    if (edge !== null) return { next: edge };

    session.progress.jobFailed = true;
    session.progress.runFailed = true;
    session.progress.error ??= message;
    return { next: null };
  }

  private async suspend(
    session: Session,
    node: ActionNode,
    position: Position,
    signal: SuspendSignal
  ): Promise<NodeResult> {
    const { context } = session;
    const current = context.getStep(node.stepId);
    if (node.loop === null) {
      const execution: StepExecution = {
        outcome: StepOutcome.SUSPENDED,
        outputs: {},
        attempts: current?.attempts ?? 1,
        ...(current?.started_at ? { started_at: current.started_at } : {}),
      };
      context.recordStep(node.stepId, execution);
    }
    session.suspension = {
      stepId: node.stepId,
      request: signal.request,
      suspendedAt: new Date().toISOString(),
    };
    await this.checkpoint(
      session,
      'suspended',
      { job: position.job, section: position.section, node: node.id },
      RunStatus.SUSPENDED
    );
    return { suspended: true };
  }

  /**
   * control/exit and control/fail end the segment; the walk then only visits finally lists
   * (and on_failure lists for a failure)
   */
  private terminate(
    session: Session,
    node: ActionNode,
    position: Position,
    termination: RunTermination,
    startedAt: Date,
    attempts: number
  ): NodeResult {
    const { context, progress, logger } = session;
    const exiting = termination.mode === 'exit';
    const outcome = exiting ? StepOutcome.SUCCEEDED : StepOutcome.FAILED;

    for (const frame of context.abandonLoops()) {
      const running = context.getStep(frame.stepId);
      context.recordStep(frame.stepId, {
        ...WorkflowRunner.timing(running?.started_at ? new Date(running.started_at) : startedAt),
        outcome,
        outputs: RunContext.loopOutputs(frame),
        ...(exiting ? {} : { error: termination.message, error_type: errorTypeOf(termination) }),
        attempts: 1,
      });
    }
    if (node.loop === null) {
      context.recordStep(node.stepId, {
        ...WorkflowRunner.timing(startedAt),
        outcome,
        outputs: termination.outputs,
        ...(exiting ? {} : { error: termination.message, error_type: errorTypeOf(termination) }),
        attempts,
      });
    }

    progress.termination = {
      mode: termination.mode,
      message: termination.message,
      outputs: termination.outputs,
    };
    if (exiting) {
      logger.log(`  ⏹  Step ${node.stepId} ended the run: ${termination.message}`);
    } else {
      logger.error(`  ✗ Step ${node.stepId} failed the run: ${termination.message}`);
      context.failure = { message: termination.message, step: node.stepId, type: errorTypeOf(termination) };
      progress.jobFailed = true;
      progress.runFailed = true;
      progress.error ??= termination.message;
    }
    this.emitEnd(
      session,
      node.step,
      position,
      outcome,
      startedAt,
      exiting ? undefined : termination.message
    );
    return { next: null };
  }

  // ===== Persistence and events =====

  private async checkpoint(
    session: Session,
    kind: CheckpointKind,
    cursor: RunCursor,
    status: RunStatusType = RunStatus.RUNNING
  ): Promise<void> {
    if (!this.checkpoints && (kind === 'intent' || kind === 'after')) return;
    await this.store.saveCheckpoint({
      runId: session.runId,
      kind,
      status,
      cursor,
      progress: session.progress,
      context: this.persistable(session),
      suspension: kind === 'suspended' ? session.suspension : null,
    });
  }

  private redactInputs(session: Session, inputs: Record<string, unknown>): Record<string, unknown> {
    const redacted = InputResolver.redact(this.workflow.inputs, inputs);
    return this.redactAtRest ? WorkflowRunner.redactRecord(session.redactor, redacted) : redacted;
  }

  /**
   * Snapshot as written to the store. Secret inputs are always replaced; other values have
   * secrets sealed unless redaction at rest is off, so `resume` can restore them.
   */
  private persistable(session: Session): RunContextSnapshot {
    const snapshot = session.context.snapshot();
    snapshot.inputs = InputResolver.redact(this.workflow.inputs, snapshot.inputs);
    if (!this.redactAtRest) return snapshot;
    const { redactor } = session;
    return WorkflowRunner.mapSnapshot(snapshot, (text) => redactor.seal(text));
  }

  /** Checkpointed state with sealed secrets put back */
  private static revealed(
    runId: string,
    snapshot: RunContextSnapshot,
    secrets: Record<string, string>
  ): RunContextSnapshot {
    try {
      return WorkflowRunner.mapSnapshot(snapshot, (text) => Redactor.reveal(text, secrets));
    } catch (error) {
      throw new Error(`Run "${runId}" cannot be resumed: ${toError(error).message}`);
    }
  }

  /** Apply `text` to every string of step, env, variable, loop and failure state */
  private static mapSnapshot(
    snapshot: RunContextSnapshot,
    text: (value: string) => string
  ): RunContextSnapshot {
    const value = (item: unknown) => mapStrings(item, text);
    const record = (entries: Record<string, unknown>): Record<string, unknown> =>
      Object.fromEntries(Object.entries(entries).map(([key, item]) => [key, value(item)]));

    const steps: Record<string, StepExecution> = {};
    for (const [id, execution] of Object.entries(snapshot.steps)) {
      steps[id] = {
        ...execution,
        outputs: record(execution.outputs),
        ...(execution.stdout !== undefined ? { stdout: text(execution.stdout) } : {}),
        ...(execution.stderr !== undefined ? { stderr: text(execution.stderr) } : {}),
        ...(execution.error !== undefined ? { error: text(execution.error) } : {}),
      };
    }

    return {
      ...snapshot,
      inputs: record(snapshot.inputs),
      env: record(snapshot.env),
      variables: record(snapshot.variables),
      steps,
      loops: snapshot.loops.map((frame) => ({
        ...frame,
        items: frame.items.map(value),
        output: frame.output ? record(frame.output) : null,
        results: frame.results.map((result) => ({
          ...result,
          item: value(result.item),
          outputs: record(result.outputs),
        })),
        errors: frame.errors.map((entry) => ({
          ...entry,
          item: value(entry.item),
          error: text(entry.error),
        })),
        breakItem: value(frame.breakItem),
      })),
      failure: snapshot.failure ? { ...snapshot.failure, message: text(snapshot.failure.message) } : null,
    };
  }

  private static redactRecord(redactor: Redactor, value: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = redactor.redactValue(item);
    }
    return result;
  }

  private static timing(startedAt: Date): Pick<StepExecution, 'started_at' | 'completed_at' | 'duration_ms'> {
    const completedAt = new Date();
    return {
      started_at: startedAt.toISOString(),
      completed_at: completedAt.toISOString(),
      duration_ms: completedAt.getTime() - startedAt.getTime(),
    };
  }

  private emitEnd(
    session: Session,
    step: ResolvedStep,
    position: Position,
    outcome: StepExecution['outcome'],
    startedAt: Date | null,
    error?: string
  ): void {
    this.emit(session, {
      type: 'step.end',
      job: position.jobName,
      section: position.section,
      stepId: step.id,
      action: WorkflowRunner.actionOf(step),
      outcome,
      ...(startedAt ? { durationMs: Date.now() - startedAt.getTime() } : {}),
      ...(error !== undefined ? { error: session.redactor.redact(error) } : {}),
    });
  }

  private emit(session: Session, body: WorkflowEventBody): void {
    const handler = this.options.onEvent;
    if (!handler) return;
    const event: WorkflowEvent = {
      ...body,
      timestamp: new Date().toISOString(),
      runId: session.runId,
      workflow: this.workflow.name,
    };
    try {
      handler(event);
    } catch (error) {
      session.logger.warn(`⚠️  Event handler failed: ${toError(error).message}`);
    }
  }
}
