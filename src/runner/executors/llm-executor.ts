import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { z } from 'zod';
import { isPlainObject, toText } from '../../expression/filters.ts';
import { extractJson } from '../../utils/json-parser.ts';
import { ActionError, ActionErrorKind, SuspendSignal } from '../errors.ts';
import type { LlmClient, LlmRequest } from '../llm-adapter.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  parseActionInput,
  throwIfAborted,
} from './types.ts';

export type { LlmClient } from '../llm-adapter.ts';

const ModelOptions = {
  model: z.string().optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
};

const OutputFormat = z.enum(['text', 'json']).default('text');

const GenerateSchema = z
  .object({ prompt: z.string().min(1), system: z.string().optional(), format: OutputFormat, ...ModelOptions })
  .strict();

const AnalyzeSchema = z
  .object({
    prompt: z.string().min(1),
    input: z.unknown().optional(),
    format: OutputFormat,
    ...ModelOptions,
  })
  .strict();

const ExtractFieldSchema = z.union([
  z.string(),
  z.object({ type: z.string().optional(), description: z.string().optional() }),
]);

const ExtractSchema = z
  .object({
    input: z.unknown(),
    schema: z.record(ExtractFieldSchema).refine((fields) => Object.keys(fields).length > 0, {
      message: 'schema needs at least one field',
    }),
    instructions: z.string().optional(),
    ...ModelOptions,
  })
  .strict();

const DecideSchema = z
  .object({
    prompt: z.string().min(1),
    choices: z.array(z.union([z.string(), z.number()]).transform(String)).min(2),
    context: z.unknown().optional(),
    ...ModelOptions,
  })
  .strict();

const FeedbackType = z.enum(['text', 'multiline', 'file_path', 'json']);

const InstructSchema = z
  .object({
    prompt: z.string().min(1),
    input: z.unknown().optional(),
    await_feedback: z.boolean().optional(),
    feedback_type: FeedbackType.default('text'),
    analyze_feedback: z.boolean().default(false),
    ...ModelOptions,
  })
  .strict();

const FEEDBACK_PROMPTS: Record<z.infer<typeof FeedbackType>, string> = {
  text: 'Please provide the result or output:',
  multiline: 'Please paste the output (multi-line supported):',
  file_path: 'Please provide the path to the output file:',
  json: 'Please provide the result as JSON:',
};

const JSON_INSTRUCTION = '\n\nRespond with valid JSON only, without commentary.';

export interface LlmActionOptions {
  client?: LlmClient;
  /** Default for llm/instruct `await_feedback` */
  airgapped?: boolean;
}

function requireClient(options: LlmActionOptions, actionId: string): LlmClient {
  if (!options.client) {
    throw new ActionError(`${actionId} requires an LLM client; none is configured`, ActionErrorKind.LLM);
  }
  return options.client;
}

function modelRequest(
  params: { model?: string; temperature?: number; max_tokens?: number },
  context: ActionContext
): Omit<LlmRequest, 'prompt'> {
  return {
    ...(params.model !== undefined ? { model: params.model } : {}),
    ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
    ...(params.max_tokens !== undefined ? { maxTokens: params.max_tokens } : {}),
    signal: context.signal,
  };
}

function withInput(prompt: string, input: unknown): string {
  const text = toText(input);
  return text ? `${prompt}\n\nINPUT:\n${text}` : prompt;
}

function parseModelJson(text: string, actionId: string): unknown {
  try {
    return extractJson(text);
  } catch (error) {
    throw new ActionError(
      `${actionId}: ${error instanceof Error ? error.message : String(error)}`,
      ActionErrorKind.LLM,
      { response: text }
    );
  }
}

export async function executeGenerate(
  input: Record<string, unknown>,
  context: ActionContext,
  options: LlmActionOptions
): Promise<ActionResult> {
  const params = parseActionInput('llm/generate', GenerateSchema, input);
  const client = requireClient(options, 'llm/generate');
  throwIfAborted(context.signal);

  const { text } = await client.complete({
    ...modelRequest(params, context),
    prompt: params.format === 'json' ? `${params.prompt}${JSON_INSTRUCTION}` : params.prompt,
    ...(params.system !== undefined ? { system: params.system } : {}),
  });
  return {
    outputs: {
      text,
      response: text,
      ...(params.format === 'json' ? { parsed: parseModelJson(text, 'llm/generate') } : {}),
    },
  };
}

export async function executeAnalyze(
  input: Record<string, unknown>,
  context: ActionContext,
  options: LlmActionOptions
): Promise<ActionResult> {
  const params = parseActionInput('llm/analyze', AnalyzeSchema, input);
  const client = requireClient(options, 'llm/analyze');
  throwIfAborted(context.signal);

  const prompt = withInput(params.prompt, params.input);
  const { text } = await client.complete({
    ...modelRequest(params, context),
    system: 'You are a careful analyst. Base every statement on the input provided.',
    prompt: params.format === 'json' ? `${prompt}${JSON_INSTRUCTION}` : prompt,
  });
  return {
    outputs: {
      analysis: text,
      ...(params.format === 'json' ? { parsed: parseModelJson(text, 'llm/analyze') } : {}),
    },
  };
}

/**
 * Outputs exactly the fields named in `schema`; fields the model leaves out are null
 */
export async function executeExtract(
  input: Record<string, unknown>,
  context: ActionContext,
  options: LlmActionOptions
): Promise<ActionResult> {
  const params = parseActionInput('llm/extract', ExtractSchema, input);
  const client = requireClient(options, 'llm/extract');
  throwIfAborted(context.signal);

  const fieldLines = Object.entries(params.schema).map(([name, field]) => {
    if (typeof field === 'string') return `- ${name}: ${field}`;
    const type = field.type ? ` (${field.type})` : '';
    return `- ${name}${type}${field.description ? `: ${field.description}` : ''}`;
  });
  const prompt = [
    params.instructions ?? 'Extract the following fields from the input.',
    'Fields:',
    ...fieldLines,
    'Use null for a field the input does not contain.',
  ].join('\n');

  const { text } = await client.complete({
    ...modelRequest(params, context),
    system: 'You extract structured data. Respond with a single JSON object.',
    prompt: `${withInput(prompt, params.input)}${JSON_INSTRUCTION}`,
  });

  const parsed = parseModelJson(text, 'llm/extract');
  if (!isPlainObject(parsed)) {
    throw new ActionError('llm/extract: model did not return a JSON object', ActionErrorKind.LLM, {
      response: text,
    });
  }
  const outputs: Record<string, unknown> = {};
  for (const name of Object.keys(params.schema)) {
    outputs[name] = parsed[name] ?? null;
  }
  return { outputs };
}

/**
 * Match a model reply to one of the choices: exact (case-insensitive) first, then the only
 * choice mentioned in the reply
 */
export function matchChoice(reply: string, choices: string[]): string | null {
  const normalized = reply
    .trim()
    .replace(/^["'`]+|["'`.!]+$/g, '')
    .toLowerCase();
  const exact = choices.find((choice) => choice.toLowerCase() === normalized);
  if (exact !== undefined) return exact;
  const mentioned = choices.filter((choice) => normalized.includes(choice.toLowerCase()));
  return mentioned.length === 1 ? mentioned[0] : null;
}

export async function executeDecide(
  input: Record<string, unknown>,
  context: ActionContext,
  options: LlmActionOptions
): Promise<ActionResult> {
  const params = parseActionInput('llm/decide', DecideSchema, input);
  const client = requireClient(options, 'llm/decide');
  throwIfAborted(context.signal);

  const prompt = [
    withInput(params.prompt, params.context),
    '',
    `Answer with exactly one of: ${params.choices.join(', ')}`,
  ].join('\n');
  const { text } = await client.complete({
    ...modelRequest(params, context),
    system: 'You make decisions. Reply with one of the listed choices and nothing else.',
    prompt,
  });

  const decision = matchChoice(text, params.choices);
  if (decision === null) {
    throw new ActionError(
      `llm/decide: reply "${text.trim().slice(0, 100)}" does not match any of: ${params.choices.join(', ')}`,
      ActionErrorKind.LLM,
      { response: text }
    );
  }
  return { outputs: { decision, choices: params.choices } };
}

/**
 * Apply an instruction, or in airgapped mode generate instructions for an operator, suspend,
 * and collect their feedback on resume
 */
export async function executeInstruct(
  input: Record<string, unknown>,
  context: ActionContext,
  options: LlmActionOptions
): Promise<ActionResult> {
  const params = parseActionInput('llm/instruct', InstructSchema, input);
  throwIfAborted(context.signal);
  const airgapped = params.await_feedback ?? options.airgapped ?? false;

  if (!airgapped) {
    const client = requireClient(options, 'llm/instruct');
    const response = await client.complete({
      ...modelRequest(params, context),
      prompt: withInput(params.prompt, params.input),
    });
    return { outputs: { response: response.text, model: response.model } };
  }

  const resume = context.resume;
  const stored = resume?.state?.instructions;
  if (resume?.provided && typeof stored === 'string') {
    return collectFeedback(params, stored, resume.value, context, options);
  }

  const client = requireClient(options, 'llm/instruct');
  const { text: instructions } =
    typeof stored === 'string'
      ? { text: stored }
      : await client.complete({
          ...modelRequest(params, context),
          system:
            'You write clear, step-by-step instructions for a human operator. Be specific about commands, paths and expected output.',
          prompt: withInput(params.prompt, params.input),
        });

  context.logger.log(`  📋 Instructions generated for ${context.stepId}, awaiting feedback`);
  throw new SuspendSignal(context.stepId, {
    prompt: `Instructions generated:\n\n${instructions}\n\n${FEEDBACK_PROMPTS[params.feedback_type]}`,
    inputType:
      params.feedback_type === 'multiline' || params.feedback_type === 'json' ? 'multiline' : 'text',
    state: { instructions },
  });
}

async function collectFeedback(
  params: z.infer<typeof InstructSchema>,
  instructions: string,
  value: unknown,
  context: ActionContext,
  options: LlmActionOptions
): Promise<ActionResult> {
  let feedback = toText(value);
  const outputs: Record<string, unknown> = {
    instructions,
    feedback_type: params.feedback_type,
  };

  if (params.feedback_type === 'file_path') {
    const path = feedback.trim().replace(/^~(?=\/|$)/, homedir());
    try {
      outputs.feedback_path = path;
      feedback = await readFile(path, 'utf8');
    } catch (error) {
      throw new ActionError(
        `Failed to read feedback file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        ActionErrorKind.EXECUTION,
        { instructions, feedback: path }
      );
    }
  }
  outputs.feedback = feedback;

  if (params.feedback_type === 'json') {
    try {
      outputs.parsed_json = JSON.parse(feedback);
    } catch (error) {
      throw new ActionError(
        `Feedback is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        ActionErrorKind.INVALID_INPUT,
        { instructions, feedback }
      );
    }
  }

  if (params.analyze_feedback) {
    const client = requireClient(options, 'llm/instruct');
    const { text } = await client.complete({
      ...modelRequest(params, context),
      system: 'You analyze the results an operator reports after following instructions.',
      prompt: `INSTRUCTIONS:\n${instructions}\n\nOPERATOR FEEDBACK:\n${feedback}\n\nSummarize the outcome and any problems.`,
    });
    outputs.feedback_analysis = text;
  }
  return { outputs };
}

export function createLlmActions(options: LlmActionOptions = {}): ActionDefinition[] {
  const bind =
    (
      fn: (
        input: Record<string, unknown>,
        context: ActionContext,
        options: LlmActionOptions
      ) => Promise<ActionResult>
    ) =>
    (input: Record<string, unknown>, context: ActionContext) =>
      fn(input, context, options);

  return [
    { id: 'llm/generate', description: 'Generate text from a prompt', handler: bind(executeGenerate) },
    { id: 'llm/analyze', description: 'Analyze input with a prompt', handler: bind(executeAnalyze) },
    { id: 'llm/extract', description: 'Extract named fields from input', handler: bind(executeExtract) },
    { id: 'llm/decide', description: 'Pick one of a fixed set of choices', handler: bind(executeDecide) },
    {
      id: 'llm/instruct',
      description: 'Apply an instruction, or hand instructions to an operator and await feedback',
      handler: bind(executeInstruct),
    },
  ];
}
