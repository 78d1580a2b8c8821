import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryCheckpointStore } from '../../db/memory-store.ts';
import { SilentLogger } from '../../utils/logger.ts';
import { TestHarness } from '../test-harness.ts';
import { executeReportAdd, executeReportList } from './report-executor.ts';

describe('report-executor', () => {
  let sink: MemoryCheckpointStore;
  let harness: TestHarness;
  const logger = new SilentLogger();

  beforeEach(() => {
    sink = new MemoryCheckpointStore();
    harness = new TestHarness({ runId: 'run-1', stepId: 'scan' });
  });

  it('should record a finding titled by the first line of the note', async () => {
    const result = await executeReportAdd(
      { note: 'Open port\nPort 22 answers publicly', severity: '7', context: { port: 22 } },
      harness.context(),
      { sink, logger }
    );

    expect(result.outputs).toEqual({ finding_id: 1, title: 'Open port', severity: 7, success: true });
    const [finding] = await sink.listFindings('run-1');
    expect(finding).toMatchObject({
      runId: 'run-1',
      stepId: 'scan',
      note: 'Open port\nPort 22 answers publicly',
      context: '{\n  "port": 22\n}',
    });
  });

  it('should cap derived titles and prefer an explicit one', async () => {
    const long = await executeReportAdd({ note: 'x'.repeat(100) }, harness.context(), {
      sink,
      logger,
    });
    const titled = await executeReportAdd(
      { note: 'details', title: 'Weak cipher' },
      harness.context(),
      { sink, logger }
    );

    expect(long.outputs.title).toBe(`${'x'.repeat(77)}...`);
    expect(long.outputs.severity).toBe(5);
    expect(titled.outputs.title).toBe('Weak cipher');
  });

  it('should reject an empty note and an out-of-range severity', async () => {
    await expect(
      executeReportAdd({ note: '   ' }, harness.context(), { sink, logger })
    ).rejects.toThrow(/No note provided/);
    await expect(
      executeReportAdd({ note: 'x', severity: 12 }, harness.context(), { sink, logger })
    ).rejects.toThrow(/^Invalid input for report\/add:/);
  });

  it('should fail without a store', async () => {
    await expect(executeReportAdd({ note: 'x' }, harness.context(), { logger })).rejects.toThrow(
      'report/add requires a report store; none is configured'
    );
  });

  it('should list the findings of the current run', async () => {
    await executeReportAdd({ note: 'First', severity: 2 }, harness.context(), { sink, logger });
    await executeReportAdd({ note: 'Second', severity: 9 }, harness.context(), { sink, logger });
    await sink.addFinding({
      runId: 'other-run',
      stepId: 'scan',
      title: 'Elsewhere',
      note: 'Elsewhere',
      severity: 1,
      context: null,
    });

    const result = await executeReportList({}, harness.context(), { sink, logger });

    expect(result.outputs).toEqual({
      findings: [
        { id: 1, title: 'First', severity: 2, step: 'scan' },
        { id: 2, title: 'Second', severity: 9, step: 'scan' },
      ],
      count: 2,
      summary: '[2] First\n[9] Second',
    });
  });
});
