import { z } from 'zod';
import { toText } from '../../expression/filters.ts';
import { ActionError, ActionErrorKind, type SuspendRequest, SuspendSignal } from '../errors.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  type ResumeValue,
  parseActionInput,
  throwIfAborted,
} from './types.ts';

const HumanInputSchema = z
  .object({
    prompt: z.string().default('Please provide input:'),
    input_type: z.enum(['text', 'multiline']).default('text'),
    default: z.unknown().optional(),
    /** Seconds */
    timeout: z.number().positive().optional(),
  })
  .strict();

const HumanDecideSchema = z
  .object({
    prompt: z.string().default('Please decide:'),
    choices: z.array(z.union([z.string(), z.number(), z.boolean()]).transform(String)).min(1).optional(),
    default: z.unknown().optional(),
    timeout: z.number().positive().optional(),
  })
  .strict();

const YES = new Set(['y', 'yes', 'true', '1']);
const NO = new Set(['n', 'no', 'false', '0']);

type Answer = { kind: 'answer'; value: unknown } | { kind: 'default'; value: unknown };

/**
 * Decide what a resumed (or fresh) human step does: take the answer, fall back to the default,
 * or suspend again.
 */
function awaitAnswer(context: ActionContext, request: SuspendRequest): Answer {
  const resume: ResumeValue | undefined = context.resume;
  if (resume?.provided) return { kind: 'answer', value: resume.value };

  if (resume) {
    if (request.default !== undefined) {
      context.logger.log(`  ⏭  No answer for ${context.stepId}, using default`);
      return { kind: 'default', value: request.default };
    }
    if (request.timeout !== undefined) {
      const elapsed = (Date.now() - Date.parse(resume.suspendedAt)) / 1000;
      if (elapsed >= request.timeout) {
        throw new ActionError(
          `No input received within ${request.timeout}s`,
          ActionErrorKind.TIMEOUT
        );
      }
    }
  }

  context.logger.log(`  ⏳ Waiting for input: ${request.prompt}`);
  throw new SuspendSignal(context.stepId, request);
}

export async function executeHumanInput(
  input: Record<string, unknown>,
  context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput('human/input', HumanInputSchema, input);
  throwIfAborted(context.signal);

  const answer = awaitAnswer(context, {
    prompt: params.prompt,
    inputType: params.input_type,
    ...(params.default !== undefined ? { default: params.default } : {}),
    ...(params.timeout !== undefined ? { timeout: params.timeout } : {}),
  });
  return {
    outputs: { response: toText(answer.value), is_default: answer.kind === 'default' },
  };
}

export async function executeHumanDecide(
  input: Record<string, unknown>,
  context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput('human/decide', HumanDecideSchema, input);
  throwIfAborted(context.signal);

  const answer = awaitAnswer(context, {
    prompt: params.prompt,
    inputType: params.choices ? 'choice' : 'confirm',
    ...(params.choices ? { choices: params.choices } : {}),
    ...(params.default !== undefined ? { default: params.default } : {}),
    ...(params.timeout !== undefined ? { timeout: params.timeout } : {}),
  });

  if (params.choices) {
    const value = toText(answer.value).trim();
    // A 1-based number picks by position
    const byIndex = /^\d+$/.test(value) ? params.choices[Number(value) - 1] : undefined;
    const choice = params.choices.includes(value) ? value : byIndex;
    if (choice === undefined) {
      throw new ActionError(
        `"${value}" is not one of: ${params.choices.join(', ')}`,
        ActionErrorKind.INVALID_INPUT
      );
    }
    return { outputs: { value: choice } };
  }

  const confirmed = toConfirmation(answer.value);
  return { outputs: { value: confirmed, confirmed } };
}

function toConfirmation(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  const normalized = toText(value).trim().toLowerCase();
  if (normalized === '' || YES.has(normalized)) return true;
  if (NO.has(normalized)) return false;
  throw new ActionError(`Expected yes or no, got "${toText(value)}"`, ActionErrorKind.INVALID_INPUT);
}

export function createHumanActions(): ActionDefinition[] {
  return [
    {
      id: 'human/input',
      description: 'Ask a person for free-form input; suspends the run until answered',
      handler: executeHumanInput,
    },
    {
      id: 'human/decide',
      description: 'Ask a person to confirm or pick one of several choices',
      handler: executeHumanDecide,
    },
  ];
}
