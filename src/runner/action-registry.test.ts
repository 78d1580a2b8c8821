import { describe, expect, it } from 'vitest';
import { SilentLogger } from '../utils/logger.ts';
import { ActionRegistry, createDefaultRegistry } from './action-registry.ts';
import { ActionError, ActionErrorKind } from './errors.ts';

describe('ActionRegistry', () => {
  it('should register every built-in action', () => {
    const registry = createDefaultRegistry({ logger: new SilentLogger() });
    expect(registry.ids()).toEqual([
      'control/exit',
      'control/fail',
      'control/wait',
      'http/request',
      'human/decide',
      'human/input',
      'llm/analyze',
      'llm/decide',
      'llm/extract',
      'llm/generate',
      'llm/instruct',
      'report/add',
      'report/list',
      'run',
      'script/bash',
      'script/python',
      'state/append',
      'state/set',
    ]);
  });

  it('should mark control/wait until as deferred', () => {
    const registry = createDefaultRegistry({ logger: new SilentLogger() });
    expect(registry.get('control/wait').deferred).toEqual(['until']);
  });

  it('should reject duplicate ids', () => {
    const registry = new ActionRegistry();
    const definition = {
      id: 'custom/noop',
      description: 'Does nothing',
      handler: async () => ({ outputs: {} }),
    };
    registry.register(definition);
    expect(() => registry.register(definition)).toThrow('Action "custom/noop" is already registered');
  });

  it('should raise a not_found ActionError for unknown ids', () => {
    const registry = new ActionRegistry();
    let caught: unknown;
    try {
      registry.get('custom/missing');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ActionError);
    expect(caught).toMatchObject({ kind: ActionErrorKind.NOT_FOUND, message: 'Unknown action "custom/missing"' });
    expect(registry.has('custom/missing')).toBe(false);
  });
});
