import { z } from 'zod';
import type { ReportSink } from '../../db/types.ts';
import type { Logger } from '../../utils/logger.ts';
import { ActionError } from '../errors.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  parseActionInput,
} from './types.ts';

const ReportAddSchema = z
  .object({
    note: z.string().trim().min(1, 'No note provided'),
    title: z.string().optional(),
    /** 1 (informational) to 9 (critical) */
    severity: z.coerce.number().int().min(1).max(9).default(5),
    context: z.unknown().optional(),
  })
  .strict();

const TITLE_LENGTH = 80;

export interface ReportActionOptions {
  sink?: ReportSink;
  logger: Logger;
}

function titleOf(note: string): string {
  const firstLine = note.split('\n')[0].trim();
  return firstLine.length > TITLE_LENGTH ? `${firstLine.slice(0, TITLE_LENGTH - 3)}...` : firstLine;
}

function requireSink(sink: ReportSink | undefined, actionId: string): ReportSink {
  if (!sink) {
    throw new ActionError(`${actionId} requires a report store; none is configured`);
  }
  return sink;
}

export async function executeReportAdd(
  input: Record<string, unknown>,
  context: ActionContext,
  options: ReportActionOptions
): Promise<ActionResult> {
  const params = parseActionInput('report/add', ReportAddSchema, input);
  const sink = requireSink(options.sink, 'report/add');

  const finding = await sink.addFinding({
    runId: context.runId,
    stepId: context.stepId,
    title: params.title ?? titleOf(params.note),
    note: params.note,
    severity: params.severity,
    context:
      params.context === undefined || params.context === null
        ? null
        : typeof params.context === 'string'
          ? params.context
          : JSON.stringify(params.context, null, 2),
  });
  options.logger.log(`  📝 Finding ${finding.id}: ${finding.title} (severity ${finding.severity})`);

  return {
    outputs: {
      finding_id: finding.id,
      title: finding.title,
      severity: finding.severity,
      success: true,
    },
  };
}

export async function executeReportList(
  _input: Record<string, unknown>,
  context: ActionContext,
  options: ReportActionOptions
): Promise<ActionResult> {
  const sink = requireSink(options.sink, 'report/list');
  const findings = await sink.listFindings(context.runId);
  return {
    outputs: {
      findings: findings.map((finding) => ({
        id: finding.id,
        title: finding.title,
        severity: finding.severity,
        step: finding.stepId,
      })),
      count: findings.length,
      summary: findings.map((finding) => `[${finding.severity}] ${finding.title}`).join('\n'),
    },
  };
}

export function createReportActions(options: ReportActionOptions): ActionDefinition[] {
  return [
    {
      id: 'report/add',
      description: 'Record a finding for the run',
      handler: (input, context) => executeReportAdd(input, context, options),
    },
    {
      id: 'report/list',
      description: 'List the findings recorded by the run so far',
      handler: (input, context) => executeReportList(input, context, options),
    },
  ];
}
