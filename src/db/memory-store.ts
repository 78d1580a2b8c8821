import type {
  Checkpoint,
  CheckpointStore,
  Finding,
  NewCheckpoint,
  NewFinding,
  NewRun,
  ReportSink,
  RunRecord,
  RunUpdate,
} from './types.ts';
import { RunStatus, isTerminalRunStatus } from '../types/status.ts';

/**
 * In-process store for tests and dry runs. Records are cloned on the way in and out,
 * so callers see the same isolation a database gives them.
 */
export class MemoryCheckpointStore implements CheckpointStore, ReportSink {
  private runs = new Map<string, RunRecord>();
  private checkpoints = new Map<string, Checkpoint[]>();
  private findings: Finding[] = [];
  private nextFindingId = 1;

  async createRun(run: NewRun): Promise<void> {
    if (this.runs.has(run.id)) {
      throw new Error(`Run "${run.id}" already exists`);
    }
    this.runs.set(run.id, {
      ...structuredClone(run),
      status: RunStatus.PENDING,
      outputs: null,
      error: null,
      startedAt: new Date().toISOString(),
      completedAt: null,
    });
  }

  async updateRun(id: string, update: RunUpdate): Promise<void> {
    const run = this.runs.get(id);
    if (!run) throw new Error(`Run "${id}" not found`);
    run.status = update.status;
    if (update.outputs !== undefined) run.outputs = structuredClone(update.outputs);
    if (update.error !== undefined) run.error = update.error;
    run.completedAt = isTerminalRunStatus(update.status) ? new Date().toISOString() : null;
  }

  async getRun(id: string): Promise<RunRecord | null> {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  async listRuns(limit = 50): Promise<RunRecord[]> {
    return [...this.runs.values()]
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(0, limit)
      .map((run) => structuredClone(run));
  }

  async saveCheckpoint(checkpoint: NewCheckpoint): Promise<Checkpoint> {
    const stream = this.checkpoints.get(checkpoint.runId) ?? [];
    const saved: Checkpoint = {
      ...structuredClone(checkpoint),
      sequence: stream.length + 1,
      createdAt: new Date().toISOString(),
    };
    stream.push(saved);
    this.checkpoints.set(checkpoint.runId, stream);
    return structuredClone(saved);
  }

  async latestCheckpoint(runId: string): Promise<Checkpoint | null> {
    const stream = this.checkpoints.get(runId);
    const latest = stream?.[stream.length - 1];
    return latest ? structuredClone(latest) : null;
  }

  async listCheckpoints(runId: string): Promise<Checkpoint[]> {
    return structuredClone(this.checkpoints.get(runId) ?? []);
  }

  async addFinding(finding: NewFinding): Promise<Finding> {
    const saved: Finding = {
      ...finding,
      id: this.nextFindingId++,
      createdAt: new Date().toISOString(),
    };
    this.findings.push(saved);
    return { ...saved };
  }

  async listFindings(runId: string): Promise<Finding[]> {
    return this.findings.filter((finding) => finding.runId === runId).map((finding) => ({ ...finding }));
  }
}
