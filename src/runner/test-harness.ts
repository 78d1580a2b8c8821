import { SilentLogger } from '../utils/logger.ts';
import type { ActionContext, ResumeValue } from './executors/types.ts';

/**
 * ActionContext for exercising an action outside a run. Variables land in `harness.variables`;
 * conditions are answered by `conditions`, keyed by the condition text.
 */
export class TestHarness {
  readonly variables: Record<string, unknown> = {};
  readonly conditions = new Map<string, boolean | (() => boolean)>();
  readonly controller = new AbortController();
  resume: ResumeValue | undefined;

  constructor(
    private readonly overrides: Partial<Omit<ActionContext, 'variables' | 'evaluateCondition'>> = {}
  ) {}

  context(): ActionContext {
    const variables = this.variables;
    const context: ActionContext = {
      runId: 'test-run',
      workflowName: 'test',
      stepId: 'step',
      logger: new SilentLogger(),
      signal: this.controller.signal,
      timeout: 30,
      env: {},
      interactive: false,
      ...this.overrides,
      variables: {
        set(name, value) {
          variables[name] = value;
        },
        append(name, value) {
          const current = variables[name];
          const list = Array.isArray(current) ? [...current, value] : [value];
          variables[name] = list;
          return list;
        },
      },
      evaluateCondition: (condition) => {
        if (typeof condition === 'boolean') return condition;
        const answer = this.conditions.get(condition);
        if (answer === undefined) throw new Error(`No test answer for condition "${condition}"`);
        return typeof answer === 'function' ? answer() : answer;
      },
    };
    if (this.resume) context.resume = this.resume;
    return context;
  }

  /** Resume state as the runner hands it to a step that suspended */
  resumeWith(value?: unknown, suspendedAt = new Date().toISOString()): this {
    this.resume =
      value === undefined ? { provided: false, suspendedAt } : { provided: true, value, suspendedAt };
    return this;
  }
}
