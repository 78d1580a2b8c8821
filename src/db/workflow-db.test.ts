import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RunContextSnapshot } from '../runner/run-context.ts';
import { SilentLogger } from '../utils/logger.ts';
import { MemoryCheckpointStore } from './memory-store.ts';
import type { CheckpointStore, NewCheckpoint, ReportSink } from './types.ts';
import { DatabaseError, WorkflowDb } from './workflow-db.ts';

function snapshot(runId: string, variables: Record<string, unknown> = {}): RunContextSnapshot {
  return {
    runId,
    workflowName: 'deploy',
    inputs: { target: 'staging' },
    env: {},
    steps: {
      build: { outcome: 'succeeded', outputs: { exit_code: 0 }, attempts: 1 },
    },
    loops: [],
    variables,
    failure: null,
    failureHandler: null,
  };
}

function checkpoint(runId: string, kind: NewCheckpoint['kind'], node: string | null): NewCheckpoint {
  return {
    runId,
    kind,
    status: 'running',
    cursor: { job: 0, section: 'steps', node },
    progress: { jobFailed: false, runFailed: false, termination: null, error: null },
    context: snapshot(runId, { node }),
    suspension: null,
  };
}

type Store = CheckpointStore & ReportSink;

const stores: Array<[string, () => Store & { close?: () => void }]> = [
  ['WorkflowDb', () => new WorkflowDb(':memory:', new SilentLogger())],
  ['MemoryCheckpointStore', () => new MemoryCheckpointStore()],
];

describe.each(stores)('%s', (_name, create) => {
  let store: Store & { close?: () => void };

  beforeEach(() => {
    store = create();
  });

  afterEach(() => {
    store.close?.();
  });

  it('should create and retrieve a run', async () => {
    await store.createRun({
      id: 'run-1',
      workflowName: 'deploy',
      workflowPath: 'flows/deploy.yaml',
      inputs: { target: 'staging' },
    });
    const run = await store.getRun('run-1');
    expect(run).toMatchObject({
      id: 'run-1',
      workflowName: 'deploy',
      workflowPath: 'flows/deploy.yaml',
      status: 'pending',
      inputs: { target: 'staging' },
      outputs: null,
      error: null,
      completedAt: null,
    });
  });

  it('should return null for an unknown run', async () => {
    expect(await store.getRun('missing')).toBeNull();
  });

  it('should update run status and stamp completion', async () => {
    await store.createRun({ id: 'run-2', workflowName: 'deploy', workflowPath: null, inputs: {} });

    await store.updateRun('run-2', { status: 'suspended' });
    expect((await store.getRun('run-2'))?.completedAt).toBeNull();

    await store.updateRun('run-2', {
      status: 'exited',
      outputs: { reason: 'nothing to do' },
      error: null,
    });
    const run = await store.getRun('run-2');
    expect(run?.status).toBe('exited');
    expect(run?.outputs).toEqual({ reason: 'nothing to do' });
    expect(run?.completedAt).not.toBeNull();
  });

  it('should list runs with a limit', async () => {
    for (const id of ['a', 'b', 'c']) {
      await store.createRun({ id, workflowName: 'deploy', workflowPath: null, inputs: {} });
    }
    expect(await store.listRuns(2)).toHaveLength(2);
    expect(await store.listRuns()).toHaveLength(3);
  });

  it('should append checkpoints with increasing sequence numbers', async () => {
    await store.createRun({ id: 'run-3', workflowName: 'deploy', workflowPath: null, inputs: {} });

    const first = await store.saveCheckpoint(checkpoint('run-3', 'intent', 'build'));
    const second = await store.saveCheckpoint(checkpoint('run-3', 'after', 'test'));

    expect(first.sequence).toBe(1);
    expect(second.sequence).toBe(2);

    const latest = await store.latestCheckpoint('run-3');
    expect(latest?.kind).toBe('after');
    expect(latest?.cursor).toEqual({ job: 0, section: 'steps', node: 'test' });
    expect(latest?.context.variables).toEqual({ node: 'test' });
    expect(latest?.context.steps.build.outputs).toEqual({ exit_code: 0 });

    const all = await store.listCheckpoints('run-3');
    expect(all.map((entry) => entry.sequence)).toEqual([1, 2]);
  });

  it('should return null when a run has no checkpoints', async () => {
    expect(await store.latestCheckpoint('nope')).toBeNull();
    expect(await store.listCheckpoints('nope')).toEqual([]);
  });

  it('should store and list findings per run', async () => {
    await store.createRun({ id: 'run-4', workflowName: 'audit', workflowPath: null, inputs: {} });
    await store.createRun({ id: 'run-5', workflowName: 'audit', workflowPath: null, inputs: {} });

    const finding = await store.addFinding({
      runId: 'run-4',
      stepId: 'scan',
      title: 'Open port',
      note: 'Open port\nPort 22 answers on the public interface',
      severity: 7,
      context: null,
    });
    await store.addFinding({
      runId: 'run-5',
      stepId: 'scan',
      title: 'Other run',
      note: 'Other run',
      severity: 1,
      context: '{"port": 80}',
    });

    expect(finding.id).toBe(1);
    expect(finding.title).toBe('Open port');

    const listed = await store.listFindings('run-4');
    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({ stepId: 'scan', severity: 7, context: null });
  });
});

describe('WorkflowDb', () => {
  let db: WorkflowDb;

  beforeEach(() => {
    db = new WorkflowDb(':memory:', new SilentLogger());
  });

  afterEach(() => {
    db.close();
  });

  it('should raise DatabaseError when updating an unknown run', async () => {
    await expect(db.updateRun('ghost', { status: 'failed' })).rejects.toBeInstanceOf(DatabaseError);
  });

  it('should keep the previous error when an update omits it', async () => {
    await db.createRun({ id: 'run-6', workflowName: 'deploy', workflowPath: null, inputs: {} });
    await db.updateRun('run-6', { status: 'failed', error: 'Step "build" failed' });
    await db.updateRun('run-6', { status: 'failed' });
    expect((await db.getRun('run-6'))?.error).toBe('Step "build" failed');
  });

  it('should reject checkpoints for unknown runs', async () => {
    await expect(db.saveCheckpoint(checkpoint('ghost', 'intent', 'build'))).rejects.toBeInstanceOf(
      DatabaseError
    );
  });

  it('should prune finished runs only', async () => {
    await db.createRun({ id: 'done', workflowName: 'deploy', workflowPath: null, inputs: {} });
    await db.createRun({ id: 'open', workflowName: 'deploy', workflowPath: null, inputs: {} });
    await db.updateRun('done', { status: 'succeeded' });

    // A negative retention puts the cutoff in the future
    expect(await db.pruneRuns(-1)).toBe(1);
    expect(await db.getRun('done')).toBeNull();
    expect(await db.getRun('open')).not.toBeNull();
  });

  it('should be safe to close twice', () => {
    db.close();
    expect(() => db.close()).not.toThrow();
  });
});
