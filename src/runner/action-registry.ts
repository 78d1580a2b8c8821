import type { ReportSink } from '../db/types.ts';
import { ConsoleLogger, type Logger } from '../utils/logger.ts';
import { ActionError, ActionErrorKind } from './errors.ts';
import { createControlActions } from './executors/control-executor.ts';
import { createHumanActions } from './executors/human-executor.ts';
import { type LlmClient, createLlmActions } from './executors/llm-executor.ts';
import { createReportActions } from './executors/report-executor.ts';
import { createRequestActions } from './executors/request-executor.ts';
import { createScriptActions } from './executors/script-executor.ts';
import { createShellActions } from './executors/shell-executor.ts';
import { createStateActions } from './executors/state-executor.ts';
import type { ActionDefinition } from './executors/types.ts';

/**
 * Maps action ids (`uses:`) to handlers. The runner dispatches through the registry and never
 * branches on an id itself.
 */
export class ActionRegistry {
  private readonly actions = new Map<string, ActionDefinition>();

  register(definition: ActionDefinition): this {
    if (this.actions.has(definition.id)) {
      throw new Error(`Action "${definition.id}" is already registered`);
    }
    this.actions.set(definition.id, definition);
    return this;
  }

  has(id: string): boolean {
    return this.actions.has(id);
  }

  get(id: string): ActionDefinition {
    const definition = this.actions.get(id);
    if (!definition) {
      throw new ActionError(`Unknown action "${id}"`, ActionErrorKind.NOT_FOUND);
    }
    return definition;
  }

  list(): ActionDefinition[] {
    return [...this.actions.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  ids(): string[] {
    return this.list().map((definition) => definition.id);
  }
}

export interface ActionServices {
  logger?: Logger;
  /** Required by the llm/* actions */
  llm?: LlmClient;
  /** llm/instruct hands instructions to an operator instead of applying them */
  airgapped?: boolean;
  /** Receives report/add findings */
  reports?: ReportSink;
  /** Directory for `capture_mode: file` output */
  captureDir?: string;
  fetch?: typeof fetch;
}

/**
 * Registry holding every built-in action
 */
export function createDefaultRegistry(services: ActionServices = {}): ActionRegistry {
  const logger = services.logger ?? new ConsoleLogger();
  const registry = new ActionRegistry();
  const groups: ActionDefinition[][] = [
    createShellActions({ captureDir: services.captureDir }),
    createRequestActions({ fetch: services.fetch }),
    createLlmActions({ client: services.llm, airgapped: services.airgapped }),
    createHumanActions(),
    createStateActions(),
    createControlActions(),
    createReportActions({ sink: services.reports, logger }),
    createScriptActions(),
  ];
  for (const group of groups) {
    for (const definition of group) registry.register(definition);
  }
  return registry;
}
