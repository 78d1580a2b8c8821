import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { isPlainObject } from '../expression/filters.ts';
import type { RunContextSnapshot } from '../runner/run-context.ts';
import { sleep } from '../runner/retry.ts';
import { RunStatus, isTerminalRunStatus } from '../types/status.ts';
import { DB, FILE_MODES } from '../utils/constants.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { PathResolver } from '../utils/paths.ts';
import type {
  Checkpoint,
  CheckpointStore,
  Finding,
  NewCheckpoint,
  NewFinding,
  NewRun,
  PendingSuspension,
  ReportSink,
  RunRecord,
  RunUpdate,
} from './types.ts';

/**
 * Base error class for database operations
 */
export class DatabaseError extends Error {
  constructor(
    public override message: string,
    public code?: string | number,
    public retryable = false
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

// ===== Row schemas =====

const RunStatusSchema = z.enum([
  RunStatus.PENDING,
  RunStatus.RUNNING,
  RunStatus.SUSPENDED,
  RunStatus.SUCCEEDED,
  RunStatus.FAILED,
  RunStatus.EXITED,
]);

const JsonRecord = z.string().transform((text, ctx) => {
  const value: unknown = JSON.parse(text);
  if (!isPlainObject(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON object' });
    return z.NEVER;
  }
  return value;
});

const RunRowSchema = z.object({
  id: z.string(),
  workflow_name: z.string(),
  workflow_path: z.string().nullable(),
  status: RunStatusSchema,
  inputs: JsonRecord,
  outputs: JsonRecord.nullable(),
  error: z.string().nullable(),
  started_at: z.string(),
  completed_at: z.string().nullable(),
});

const CheckpointBodySchema = z.object({
  cursor: z.object({
    job: z.number().int().min(0),
    section: z.enum(['steps', 'on_complete', 'on_failure', 'finally']),
    node: z.string().nullable(),
  }),
  progress: z.object({
    jobFailed: z.boolean(),
    runFailed: z.boolean(),
    termination: z
      .object({
        mode: z.enum(['exit', 'fail', 'cancel']),
        message: z.string(),
        outputs: z.record(z.unknown()),
      })
      .nullable(),
    error: z.string().nullable(),
  }),
  context: z.custom<RunContextSnapshot>(
    (value) => isPlainObject(value) && typeof value.runId === 'string' && isPlainObject(value.steps),
    'Malformed run context snapshot'
  ),
  suspension: z
    .custom<PendingSuspension>(
      (value) => isPlainObject(value) && typeof value.stepId === 'string',
      'Malformed suspension'
    )
    .nullable(),
});

const CheckpointRowSchema = z.object({
  run_id: z.string(),
  sequence: z.number().int(),
  kind: z.enum(['intent', 'after', 'suspended', 'final']),
  status: RunStatusSchema,
  body: z.string(),
  created_at: z.string(),
});

const FindingRowSchema = z.object({
  id: z.number().int(),
  run_id: z.string(),
  step_id: z.string(),
  title: z.string(),
  note: z.string(),
  severity: z.number().int(),
  context: z.string().nullable(),
  created_at: z.string(),
});

function toRunRecord(row: unknown): RunRecord {
  const data = RunRowSchema.parse(row);
  return {
    id: data.id,
    workflowName: data.workflow_name,
    workflowPath: data.workflow_path,
    status: data.status,
    inputs: data.inputs,
    outputs: data.outputs,
    error: data.error,
    startedAt: data.started_at,
    completedAt: data.completed_at,
  };
}

function toCheckpoint(row: unknown): Checkpoint {
  const data = CheckpointRowSchema.parse(row);
  const body = CheckpointBodySchema.parse(JSON.parse(data.body));
  return {
    runId: data.run_id,
    sequence: data.sequence,
    kind: data.kind,
    status: data.status,
    ...body,
    createdAt: data.created_at,
  };
}

function toFinding(row: unknown): Finding {
  const data = FindingRowSchema.parse(row);
  return {
    id: data.id,
    runId: data.run_id,
    stepId: data.step_id,
    title: data.title,
    note: data.note,
    severity: data.severity,
    context: data.context,
    createdAt: data.created_at,
  };
}

/**
 * SQLite-backed checkpoint store and report sink
 */
export class WorkflowDb implements CheckpointStore, ReportSink {
  private db: Database.Database;

  private createRunStmt!: Database.Statement;
  private updateRunStmt!: Database.Statement;
  private getRunStmt!: Database.Statement;
  private listRunsStmt!: Database.Statement;
  private pruneRunsStmt!: Database.Statement;
  private nextSequenceStmt!: Database.Statement;
  private insertCheckpointStmt!: Database.Statement;
  private latestCheckpointStmt!: Database.Statement;
  private listCheckpointsStmt!: Database.Statement;
  private insertFindingStmt!: Database.Statement;
  private getFindingStmt!: Database.Statement;
  private listFindingsStmt!: Database.Statement;
  private isClosed = false;

  constructor(
    public readonly dbPath = PathResolver.resolveDbPath(),
    private readonly logger: Logger = new ConsoleLogger()
  ) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: FILE_MODES.SECURE_DIR });
      }
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma(`busy_timeout = ${DB.BUSY_TIMEOUT_MS}`);

    try {
      this.runMigrations();
      this.initStatements();
    } catch (error) {
      this.db.close();
      throw error;
    }
  }

  private runMigrations(): void {
    const version = Number(this.db.pragma('user_version', { simple: true }) ?? 0);

    if (version < 1) {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS workflow_runs (
          id TEXT PRIMARY KEY,
          workflow_name TEXT NOT NULL,
          workflow_path TEXT,
          status TEXT NOT NULL,
          inputs TEXT NOT NULL,
          outputs TEXT,
          error TEXT,
          started_at TEXT NOT NULL,
          completed_at TEXT
        );
        CREATE INDEX IF NOT EXISTS idx_runs_workflow ON workflow_runs(workflow_name);
        CREATE INDEX IF NOT EXISTS idx_runs_status ON workflow_runs(status);
        CREATE INDEX IF NOT EXISTS idx_runs_started ON workflow_runs(started_at);

        CREATE TABLE IF NOT EXISTS checkpoints (
          run_id TEXT NOT NULL,
          sequence INTEGER NOT NULL,
          kind TEXT NOT NULL,
          status TEXT NOT NULL,
          body TEXT NOT NULL,
          created_at TEXT NOT NULL,
          PRIMARY KEY (run_id, sequence),
          FOREIGN KEY (run_id) REFERENCES workflow_runs(id) ON DELETE CASCADE
        );
        PRAGMA user_version = 1;
      `);
    }

    // Version 2: findings recorded by report/add
    if (version < 2) {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS findings (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          run_id TEXT NOT NULL,
          step_id TEXT NOT NULL,
          title TEXT NOT NULL,
          note TEXT NOT NULL,
          severity INTEGER NOT NULL,
          context TEXT,
          created_at TEXT NOT NULL,
          FOREIGN KEY (run_id) REFERENCES workflow_runs(id) ON DELETE CASCADE
        );
        CREATE INDEX IF NOT EXISTS idx_findings_run ON findings(run_id);
        PRAGMA user_version = 2;
      `);
    }
  }

  private initStatements(): void {
    this.createRunStmt = this.db.prepare(`
      INSERT INTO workflow_runs (id, workflow_name, workflow_path, status, inputs, started_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.updateRunStmt = this.db.prepare(`
      UPDATE workflow_runs
      SET status = ?,
          outputs = COALESCE(?, outputs),
          error = COALESCE(?, error),
          completed_at = ?
      WHERE id = ?
    `);
    this.getRunStmt = this.db.prepare('SELECT * FROM workflow_runs WHERE id = ?');
    this.listRunsStmt = this.db.prepare(`
      SELECT * FROM workflow_runs
      ORDER BY started_at DESC
      LIMIT ?
    `);
    this.pruneRunsStmt = this.db.prepare(
      'DELETE FROM workflow_runs WHERE started_at < ? AND completed_at IS NOT NULL'
    );
    this.nextSequenceStmt = this.db.prepare(
      'SELECT COALESCE(MAX(sequence), 0) + 1 AS next FROM checkpoints WHERE run_id = ?'
    );
    this.insertCheckpointStmt = this.db.prepare(`
      INSERT INTO checkpoints (run_id, sequence, kind, status, body, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.latestCheckpointStmt = this.db.prepare(`
      SELECT * FROM checkpoints WHERE run_id = ?
      ORDER BY sequence DESC
      LIMIT 1
    `);
    this.listCheckpointsStmt = this.db.prepare(
      'SELECT * FROM checkpoints WHERE run_id = ? ORDER BY sequence ASC'
    );
    this.insertFindingStmt = this.db.prepare(`
      INSERT INTO findings (run_id, step_id, title, note, severity, context, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.getFindingStmt = this.db.prepare('SELECT * FROM findings WHERE id = ?');
    this.listFindingsStmt = this.db.prepare(
      'SELECT * FROM findings WHERE run_id = ? ORDER BY id ASC'
    );
  }

  private isSQLiteBusyError(error: unknown): boolean {
    if (error instanceof Database.SqliteError) {
      return error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED';
    }
    return false;
  }

  /**
   * Retry wrapper for SQLite operations that report SQLITE_BUSY while another process
   * holds the write lock. Exponential backoff with jitter.
   */
  private async withRetry<T>(operation: () => T, maxRetries: number = DB.MAX_RETRIES): Promise<T> {
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        return operation();
      } catch (error) {
        if (this.isSQLiteBusyError(error)) {
          lastError = error;
          if (attempt === maxRetries - 1) break;
          const delayMs = Math.min(
            DB.RETRY_MAX_DELAY_MS,
            DB.RETRY_BASE_DELAY_MS * 2 ** attempt + Math.random() * DB.RETRY_JITTER_MS
          );
          await sleep(delayMs);
          continue;
        }

        if (error instanceof DatabaseError) throw error;
        const msg = error instanceof Error ? error.message : String(error);
        const code = error instanceof Database.SqliteError ? error.code : undefined;
        throw new DatabaseError(msg, code, false);
      }
    }

    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    this.logger.warn(`⚠️  [WorkflowDb] SQLite busy after ${maxRetries} attempts: ${msg}`);
    throw new DatabaseError(
      `SQLite operation failed after ${maxRetries} retries: ${msg}`,
      DB.SQLITE_BUSY,
      true
    );
  }

  // ===== Workflow Runs =====

  async createRun(run: NewRun): Promise<void> {
    await this.withRetry(() => {
      this.createRunStmt.run(
        run.id,
        run.workflowName,
        run.workflowPath,
        RunStatus.PENDING,
        JSON.stringify(run.inputs),
        new Date().toISOString()
      );
    });
  }

  async updateRun(id: string, update: RunUpdate): Promise<void> {
    await this.withRetry(() => {
      const result = this.updateRunStmt.run(
        update.status,
        update.outputs ? JSON.stringify(update.outputs) : null,
        update.error ?? null,
        isTerminalRunStatus(update.status) ? new Date().toISOString() : null,
        id
      );
      if (result.changes === 0) {
        throw new DatabaseError(`Run "${id}" not found`, 'NOT_FOUND');
      }
    });
  }

  async getRun(id: string): Promise<RunRecord | null> {
    return this.withRetry(() => {
      const row = this.getRunStmt.get(id);
      return row === undefined ? null : toRunRecord(row);
    });
  }

  async listRuns(limit = 50): Promise<RunRecord[]> {
    return this.withRetry(() => this.listRunsStmt.all(limit).map(toRunRecord));
  }

  /**
   * Delete finished runs older than the given number of days. Checkpoints and findings
   * go with them through ON DELETE CASCADE.
   */
  async pruneRuns(days: number): Promise<number> {
    return this.withRetry(() => {
      const cutoff = new Date();
      cutoff.setDate(cutoff.getDate() - days);
      return this.pruneRunsStmt.run(cutoff.toISOString()).changes;
    });
  }

  async vacuum(): Promise<void> {
    await this.withRetry(() => {
      this.db.exec('VACUUM;');
    });
  }

  // ===== Checkpoints =====

  async saveCheckpoint(checkpoint: NewCheckpoint): Promise<Checkpoint> {
    const append = this.db.transaction((entry: NewCheckpoint): Checkpoint => {
      const next = z.object({ next: z.number().int() }).parse(this.nextSequenceStmt.get(entry.runId));
      const createdAt = new Date().toISOString();
      const body = {
        cursor: entry.cursor,
        progress: entry.progress,
        context: entry.context,
        suspension: entry.suspension,
      };
      this.insertCheckpointStmt.run(
        entry.runId,
        next.next,
        entry.kind,
        entry.status,
        JSON.stringify(body),
        createdAt
      );
      return { ...structuredClone(entry), sequence: next.next, createdAt };
    });
    return this.withRetry(() => append(checkpoint));
  }

  async latestCheckpoint(runId: string): Promise<Checkpoint | null> {
    return this.withRetry(() => {
      const row = this.latestCheckpointStmt.get(runId);
      return row === undefined ? null : toCheckpoint(row);
    });
  }

  async listCheckpoints(runId: string): Promise<Checkpoint[]> {
    return this.withRetry(() => this.listCheckpointsStmt.all(runId).map(toCheckpoint));
  }

  // ===== Findings =====

  async addFinding(finding: NewFinding): Promise<Finding> {
    return this.withRetry(() => {
      const result = this.insertFindingStmt.run(
        finding.runId,
        finding.stepId,
        finding.title,
        finding.note,
        finding.severity,
        finding.context,
        new Date().toISOString()
      );
      return toFinding(this.getFindingStmt.get(Number(result.lastInsertRowid)));
    });
  }

  async listFindings(runId: string): Promise<Finding[]> {
    return this.withRetry(() => this.listFindingsStmt.all(runId).map(toFinding));
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.db.close();
  }
}
