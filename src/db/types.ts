import type { StepSection } from '../parser/schema.ts';
import type { SuspendRequest } from '../runner/errors.ts';
import type { RunContextSnapshot } from '../runner/run-context.ts';
import type { RunStatusType } from '../types/status.ts';

// ===== Runs =====

export interface RunRecord {
  id: string;
  workflowName: string;
  /** Source document, kept so `resume` can recompile it */
  workflowPath: string | null;
  status: RunStatusType;
  /** Inputs with secret values replaced */
  inputs: Record<string, unknown>;
  outputs: Record<string, unknown> | null;
  error: string | null;
  startedAt: string;
  completedAt: string | null;
}

export interface NewRun {
  id: string;
  workflowName: string;
  workflowPath: string | null;
  inputs: Record<string, unknown>;
}

export interface RunUpdate {
  status: RunStatusType;
  outputs?: Record<string, unknown> | null;
  error?: string | null;
}

// ===== Checkpoints =====

/**
 * `intent` is written before a node is dispatched, `after` once it has completed,
 * `suspended` when a step is waiting for input, `final` when the run terminates.
 */
export type CheckpointKind = 'intent' | 'after' | 'suspended' | 'final';

export interface RunCursor {
  /** Index of the current job; the job count addresses the document-level lists */
  job: number;
  section: StepSection;
  /** Node to dispatch next; null once the section is finished */
  node: string | null;
}

export interface TerminationState {
  mode: 'exit' | 'fail' | 'cancel';
  message: string;
  outputs: Record<string, unknown>;
}

export interface RunProgress {
  /** The current job has failed */
  jobFailed: boolean;
  /** Some job or document-level list has failed */
  runFailed: boolean;
  termination: TerminationState | null;
  /** First failure message, reported as the run's error */
  error: string | null;
}

export interface PendingSuspension {
  stepId: string;
  request: SuspendRequest;
  suspendedAt: string;
}

export interface Checkpoint {
  runId: string;
  /** Monotonic per run; the highest one wins on resume */
  sequence: number;
  kind: CheckpointKind;
  status: RunStatusType;
  cursor: RunCursor;
  progress: RunProgress;
  context: RunContextSnapshot;
  suspension: PendingSuspension | null;
  createdAt: string;
}

export type NewCheckpoint = Omit<Checkpoint, 'sequence' | 'createdAt'>;

/**
 * Durable home of run records and their append-only checkpoint stream
 */
export interface CheckpointStore {
  createRun(run: NewRun): Promise<void>;
  updateRun(id: string, update: RunUpdate): Promise<void>;
  getRun(id: string): Promise<RunRecord | null>;
  listRuns(limit?: number): Promise<RunRecord[]>;
  saveCheckpoint(checkpoint: NewCheckpoint): Promise<Checkpoint>;
  latestCheckpoint(runId: string): Promise<Checkpoint | null>;
  listCheckpoints(runId: string): Promise<Checkpoint[]>;
}

// ===== Findings =====

export interface Finding {
  id: number;
  runId: string;
  stepId: string;
  title: string;
  note: string;
  /** 1 (informational) to 9 (critical) */
  severity: number;
  context: string | null;
  createdAt: string;
}

export type NewFinding = Omit<Finding, 'id' | 'createdAt'>;

export interface ReportSink {
  addFinding(finding: NewFinding): Promise<Finding>;
  listFindings(runId: string): Promise<Finding[]>;
}
