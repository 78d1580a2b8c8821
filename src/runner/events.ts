import type { StepSection } from '../parser/schema.ts';
import type { RunStatusType, StepOutcomeType } from '../types/status.ts';

export type WorkflowEvent =
  | {
      type: 'workflow.start';
      timestamp: string;
      runId: string;
      workflow: string;
      resumed: boolean;
      inputs?: Record<string, unknown>;
    }
  | {
      type: 'step.start';
      timestamp: string;
      runId: string;
      workflow: string;
      job: string | null;
      section: StepSection;
      stepId: string;
      action: string;
      attempt: number;
    }
  | {
      type: 'step.end';
      timestamp: string;
      runId: string;
      workflow: string;
      job: string | null;
      section: StepSection;
      stepId: string;
      action: string;
      outcome: StepOutcomeType;
      durationMs?: number;
      error?: string;
    }
  | {
      type: 'step.skipped';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      reason: 'condition' | 'job_failed';
    }
  | {
      type: 'loop.iteration';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      /** One-based */
      index: number;
      total: number;
      outcome: 'succeeded' | 'failed' | 'skipped';
    }
  | {
      type: 'guardrail.violation';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      stage: 'input' | 'output';
      scanner: string;
      severity: string;
      message: string;
      action: string;
    }
  | {
      type: 'workflow.suspended';
      timestamp: string;
      runId: string;
      workflow: string;
      stepId: string;
      prompt: string;
    }
  | {
      type: 'workflow.complete';
      timestamp: string;
      runId: string;
      workflow: string;
      status: RunStatusType;
      error?: string;
    };

export type EventHandler = (event: WorkflowEvent) => void;

/** An event before the runner stamps it with the time, run id and workflow name */
export type WorkflowEventBody<E = WorkflowEvent> = E extends WorkflowEvent
  ? Omit<E, 'timestamp' | 'runId' | 'workflow'>
  : never;
