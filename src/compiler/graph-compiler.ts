import { isPlainObject } from '../expression/filters.ts';
import {
  type GuardrailsConfig,
  GuardrailsSchema,
  type JobDefinition,
  type ResolvedStep,
  STEP_SECTIONS,
  type StepSection,
  type WorkflowDefinition,
} from '../parser/schema.ts';
import { GUARDRAIL_ACTIONS } from '../parser/workflow-validator.ts';
import { TIMEOUTS } from '../utils/constants.ts';
import { deepMerge } from '../utils/merge.ts';
import type {
  ActionNode,
  CompiledWorkflow,
  Graph,
  GraphNode,
  JumpNode,
  Segment,
} from './graph.ts';

export interface CompileOptions {
  /** Workflow-level guardrail defaults (document `guardrails`) */
  guardrails?: GuardrailsConfig;
  /** Global defaults from config, merged under the workflow's */
  globalGuardrails?: Record<string, unknown>;
  /** Seconds; used for steps without `timeout` */
  defaultTimeout?: number;
}

/**
 * Lowers step lists into graphs of action, branch, loop and jump nodes.
 * Pure: the same input always produces structurally identical graphs.
 */
export class GraphCompiler {
  static compileWorkflow(
    workflow: WorkflowDefinition,
    globalGuardrails?: Record<string, unknown>
  ): CompiledWorkflow {
    const options: CompileOptions = {
      guardrails: workflow.guardrails,
      globalGuardrails,
      defaultTimeout: workflow.default_timeout,
    };
    const jobs = Object.entries(workflow.jobs).map(([name, job]) =>
      GraphCompiler.compile(job, options, name)
    );
    const document = GraphCompiler.compile(
      {
        steps: [],
        on_complete: workflow.on_complete,
        on_failure: workflow.on_failure,
        finally: workflow.finally,
      },
      options,
      null
    );
    return { name: workflow.name, jobs, document };
  }

  static compile(job: JobDefinition, options: CompileOptions = {}, name: string | null = null): Graph {
    const segment = (section: StepSection): Segment =>
      GraphCompiler.compileSegment(section, job[section], options);
    return {
      job: name,
      segments: {
        steps: segment('steps'),
        on_complete: segment('on_complete'),
        on_failure: segment('on_failure'),
        finally: segment('finally'),
      },
    };
  }

  /** Id of the first node a step compiles to */
  static entryOf(step: ResolvedStep): string {
    if (step.loop !== undefined) return `${step.id}#loop`;
    if (step.if !== undefined) return `${step.id}#if`;
    return step.id;
  }

  /**
   * Step guardrails deep-merged over the defaults; null when disabled or empty
   */
  static effectiveGuardrails(
    step: ResolvedStep,
    options: Pick<CompileOptions, 'guardrails' | 'globalGuardrails'>
  ): GuardrailsConfig | null {
    if (step.guardrails === false || step.guardrails === null) return null;

    let merged: Record<string, unknown> = {};
    if (options.globalGuardrails) merged = deepMerge(merged, options.globalGuardrails);
    if (options.guardrails) merged = deepMerge(merged, options.guardrails);
    if (step.guardrails) merged = deepMerge(merged, step.guardrails);

    const config = GuardrailsSchema.parse(merged);
    return GraphCompiler.scannerCount(config) > 0 ? config : null;
  }

  /** Number of scanners configured across both stages */
  static scannerCount(config: GuardrailsConfig | null): number {
    if (!config) return 0;
    const count = (stage: unknown): number => (isPlainObject(stage) ? Object.keys(stage).length : 0);
    return count(config.input) + count(config.output);
  }

  private static compileSegment(
    section: StepSection,
    steps: ResolvedStep[],
    options: CompileOptions
  ): Segment {
    const nodes: Record<string, GraphNode> = {};
    const order: string[] = [];
    const add = (node: GraphNode): void => {
      if (nodes[node.id]) throw new Error(`Duplicate node id "${node.id}"`);
      nodes[node.id] = node;
      order.push(node.id);
    };

    const positions = new Map(steps.map((step, index) => [step.id, index]));
    const laterTarget = (index: number, target: string): ResolvedStep | null => {
      const position = positions.get(target);
      return position !== undefined && position > index ? steps[position] : null;
    };

    steps.forEach((step, index) => {
      const following = steps[index + 1];
      const successor = following ? GraphCompiler.entryOf(following) : null;

      let failureJump: string | null = null;
      if (step.on_failure !== undefined) {
        const target = laterTarget(index, step.on_failure);
        if (!target) {
          throw new Error(
            `Step "${step.id}" on_failure target "${step.on_failure}" is not a later step in ${section}`
          );
        }
        failureJump = `${step.id}#fail`;
        add(GraphCompiler.jump(failureJump, step.id, GraphCompiler.entryOf(target), 'on_failure'));
      }

      const guardrails = GraphCompiler.effectiveGuardrails(step, options);
      let guardrailTarget: string | null = null;
      const onFail = guardrails?.on_fail;
      if (onFail !== undefined && !GUARDRAIL_ACTIONS.has(onFail)) {
        // Workflow-wide step targets only apply where the target runs later in the same list
        const target = laterTarget(index, onFail);
        if (target) {
          guardrailTarget = `${step.id}#guard`;
          add(GraphCompiler.jump(guardrailTarget, step.id, GraphCompiler.entryOf(target), 'guardrail'));
        }
      }

      const timeout = step.timeout ?? options.defaultTimeout ?? TIMEOUTS.DEFAULT_STEP_TIMEOUT_S;

      if (step.loop === undefined) {
        if (step.if !== undefined) {
          add({
            id: `${step.id}#if`,
            kind: 'branch',
            stepId: step.id,
            condition: step.if,
            next: step.id,
            onFalse: successor,
            perIteration: false,
          });
        }
        add(
          GraphCompiler.action(step, {
            next: successor,
            onFailure: failureJump,
            loop: null,
            guardrails,
            guardrailTarget,
            timeout,
          })
        );
        return;
      }

      const head = `${step.id}#loop`;
      const tail = `${step.id}#tail`;
      const back = `${step.id}#back`;
      const body = step.if !== undefined ? `${step.id}#if` : step.id;

      add({
        id: head,
        kind: 'loop_head',
        stepId: step.id,
        step,
        source: step.loop,
        next: body,
        exit: successor,
        onFailure: failureJump,
      });
      if (step.if !== undefined) {
        add({
          id: `${step.id}#if`,
          kind: 'branch',
          stepId: step.id,
          condition: step.if,
          next: step.id,
          onFalse: tail,
          perIteration: true,
        });
      }
      add(
        GraphCompiler.action(step, {
          next: tail,
          // on_failure wins over continue_on_error
          onFailure: failureJump ?? (step.continue_on_error ? tail : null),
          loop: step.id,
          guardrails,
          guardrailTarget,
          timeout,
        })
      );
      add({
        id: tail,
        kind: 'loop_tail',
        stepId: step.id,
        step,
        breakIf: step.break_if ?? null,
        next: back,
        exit: successor,
      });
      add(GraphCompiler.jump(back, step.id, head, 'loop_back'));
    });

    return {
      section,
      entry: steps[0] ? GraphCompiler.entryOf(steps[0]) : null,
      nodes,
      order,
    };
  }

  private static action(
    step: ResolvedStep,
    edges: Pick<ActionNode, 'next' | 'onFailure' | 'loop' | 'guardrails' | 'guardrailTarget' | 'timeout'>
  ): ActionNode {
    return { id: step.id, kind: 'action', stepId: step.id, step, ...edges };
  }

  private static jump(
    id: string,
    stepId: string,
    target: string,
    reason: JumpNode['reason']
  ): JumpNode {
    return { id, kind: 'jump', stepId, next: target, target, reason };
  }

  /**
   * Planned order of steps, ignoring conditions and failures: each job's steps then its
   * handlers, then the document handlers. Used by `run --dry-run`.
   */
  static executionOrder(compiled: CompiledWorkflow): string[] {
    const lines: string[] = [];
    const describe = (graph: Graph, prefix: string): void => {
      for (const section of STEP_SECTIONS) {
        const segment = graph.segments[section];
        for (const id of segment.order) {
          const node = segment.nodes[id];
          if (node.kind !== 'action') continue;
          const flags: string[] = [];
          if (node.step.if !== undefined) flags.push('if');
          if (node.step.loop !== undefined) flags.push('loop');
          if (node.step.on_failure !== undefined) flags.push(`on_failure→${node.step.on_failure}`);
          const action = node.step.uses ?? 'run';
          const suffix = flags.length > 0 ? ` [${flags.join(', ')}]` : '';
          lines.push(`${prefix}${section}: ${node.stepId} (${action})${suffix}`);
        }
      }
    };
    for (const graph of compiled.jobs) describe(graph, `${graph.job ?? ''}/`);
    describe(compiled.document, 'workflow/');
    return lines;
  }
}
