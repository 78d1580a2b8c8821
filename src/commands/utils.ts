/**
 * Shared utilities for CLI commands
 */

import { WorkflowDb } from '../db/workflow-db.ts';
import type { Config } from '../parser/config-schema.ts';
import type { WorkflowEvent } from '../runner/events.ts';
import { AiSdkLlmClient } from '../runner/llm-adapter.ts';
import type { RunOptions, RunResult } from '../runner/workflow-runner.ts';
import { RunStatus } from '../types/status.ts';
import { ConfigLoader } from '../utils/config-loader.ts';
import { LIMITS } from '../utils/constants.ts';
import { ConsoleLogger, type Logger, SilentLogger } from '../utils/logger.ts';
import { PathResolver } from '../utils/paths.ts';

const BLOCKED_KEYS = new Set(['__proto__', 'prototype', 'constructor']);

/**
 * Parse CLI input pairs (key=value) into a record. Values stay strings; they are coerced by
 * the workflow's input declarations.
 */
export const parseInputs = (
  pairs: string[] | undefined,
  logger: Logger = new ConsoleLogger()
): Record<string, string> => {
  const inputs: Record<string, string> = {};
  if (!pairs) return inputs;
  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index <= 0) {
      logger.warn(`⚠️  Invalid input format: "${pair}" (expected key=value)`);
      continue;
    }
    const key = pair.slice(0, index);
    const value = pair.slice(index + 1);

    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(key)) {
      logger.warn(`⚠️  Invalid input key: "${key}" (use alphanumeric and underscores only)`);
      continue;
    }
    if (BLOCKED_KEYS.has(key)) {
      logger.warn(`⚠️  Invalid input key: "${key}" (reserved keyword)`);
      continue;
    }
    if (value.length > LIMITS.MAX_INPUT_STRING_LENGTH) {
      logger.warn(
        `⚠️  Input "${key}" exceeds maximum length of ${LIMITS.MAX_INPUT_STRING_LENGTH} characters`
      );
      continue;
    }
    if (value.includes('\u0000')) {
      logger.warn(`⚠️  Input "${key}" contains invalid null characters`);
      continue;
    }
    inputs[key] = value;
  }
  return inputs;
};

export interface RuntimeOptions {
  db?: string;
  events?: boolean;
}

export interface Runtime {
  config: Config;
  db: WorkflowDb;
  logger: Logger;
  /** Runner options shared by `run` and `resume` */
  runOptions: RunOptions;
  close(): void;
}

/**
 * Wire config, storage, the LLM client and Ctrl-C cancellation for a command that executes
 * a workflow
 */
export function createRuntime(options: RuntimeOptions): Runtime {
  const config = ConfigLoader.load();

  const logger: Logger = options.events ? new SilentLogger() : new ConsoleLogger();
  const db = new WorkflowDb(options.db ?? PathResolver.resolveDbPath(), logger);
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once('SIGINT', onSigint);

  const runOptions: RunOptions = {
    store: db,
    logger,
    signal: controller.signal,
    services: {
      logger,
      reports: db,
      airgapped: config.llm.airgapped,
      ...(config.llm.provider ? { llm: new AiSdkLlmClient(config.llm) } : {}),
    },
    redactAtRest: config.storage.redact_secrets_at_rest,
    checkpoints: config.execution.checkpoint,
    strictExpressions: config.expression.strict,
    ...(config.guardrails ? { globalGuardrails: config.guardrails } : {}),
    ...(options.events
      ? {
          onEvent: (event: WorkflowEvent) => {
            process.stdout.write(`${JSON.stringify(event)}\n`);
          },
        }
      : {}),
  };

  return {
    config,
    db,
    logger,
    runOptions,
    close: () => {
      process.removeListener('SIGINT', onSigint);
      db.close();
    },
  };
}

/**
 * Print a run's outcome and return the process exit code
 */
export function reportResult(result: RunResult, logger: Logger): number {
  if (Object.keys(result.outputs).length > 0) {
    logger.log('Outputs:');
    logger.log(JSON.stringify(result.outputs, null, 2));
  }
  return result.status === RunStatus.FAILED ? 1 : 0;
}
