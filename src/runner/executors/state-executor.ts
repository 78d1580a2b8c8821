import { z } from 'zod';
import { isPlainObject } from '../../expression/filters.ts';
import { ActionError, ActionErrorKind } from '../errors.ts';
import { type ActionContext, type ActionDefinition, type ActionResult, parseActionInput } from './types.ts';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const StateAppendSchema = z
  .object({
    target: z.string().regex(VARIABLE_NAME, 'must be a valid variable name'),
    value: z.unknown(),
  })
  .strict();

/**
 * Set run variables. Takes either `variables: {...}` or the names directly in `with`.
 */
export async function executeStateSet(
  input: Record<string, unknown>,
  context: ActionContext
): Promise<ActionResult> {
  const keys = Object.keys(input);
  const variables =
    keys.length === 1 && keys[0] === 'variables' && isPlainObject(input.variables)
      ? input.variables
      : input;

  for (const [name, value] of Object.entries(variables)) {
    if (!VARIABLE_NAME.test(name)) {
      throw new ActionError(`Invalid variable name "${name}"`, ActionErrorKind.INVALID_INPUT);
    }
    context.variables.set(name, value);
  }
  return { outputs: {} };
}

export async function executeStateAppend(
  input: Record<string, unknown>,
  context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput('state/append', StateAppendSchema, input);
  const list = context.variables.append(params.target, params.value ?? null);
  return { outputs: { [params.target]: list } };
}

export function createStateActions(): ActionDefinition[] {
  return [
    { id: 'state/set', description: 'Set run variables', handler: executeStateSet },
    {
      id: 'state/append',
      description: 'Append a value to a list variable',
      handler: executeStateAppend,
    },
  ];
}
