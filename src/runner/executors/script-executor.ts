import { z } from 'zod';
import { ActionError, ActionErrorKind } from '../errors.ts';
import { filterSensitiveEnv, runProcess } from './shell-executor.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  parseActionInput,
  throwIfAborted,
} from './types.ts';

interface Interpreter {
  actionId: string;
  /** `with` key holding inline source */
  sourceKey: 'code' | 'script';
  /** Argv reading the program from stdin */
  stdinArgv: string[];
  fileArgv: (path: string) => string[];
}

const PYTHON: Interpreter = {
  actionId: 'script/python',
  sourceKey: 'code',
  stdinArgv: ['python3', '-'],
  fileArgv: (path) => ['python3', path],
};

const BASH: Interpreter = {
  actionId: 'script/bash',
  sourceKey: 'script',
  stdinArgv: ['bash', '-s', '--'],
  fileArgv: (path) => ['bash', path],
};

const ScriptInputSchema = z
  .object({
    code: z.string().optional(),
    script: z.string().optional(),
    path: z.string().optional(),
    args: z.array(z.union([z.string(), z.number(), z.boolean()]).transform(String)).default([]),
    env: z.record(z.string()).default({}),
    cwd: z.string().optional(),
  })
  .strict();

/**
 * Run inline source (fed on stdin) or a script file with the interpreter
 */
async function executeScript(
  interpreter: Interpreter,
  input: Record<string, unknown>,
  context: ActionContext
): Promise<ActionResult> {
  const params = parseActionInput(interpreter.actionId, ScriptInputSchema, input);
  const inline = params[interpreter.sourceKey];
  if ((inline === undefined) === (params.path === undefined)) {
    throw new ActionError(
      `${interpreter.actionId} needs exactly one of "${interpreter.sourceKey}" or "path"`,
      ActionErrorKind.INVALID_INPUT
    );
  }
  throwIfAborted(context.signal);

  const argv =
    params.path !== undefined
      ? [...interpreter.fileArgv(params.path), ...params.args]
      : [...interpreter.stdinArgv, ...params.args];
  const result = await runProcess(argv, {
    env: { ...filterSensitiveEnv(process.env), ...context.env, ...params.env },
    cwd: params.cwd,
    signal: context.signal,
    ...(inline !== undefined ? { stdin: inline } : {}),
  });
  throwIfAborted(context.signal);

  const outputs = { stdout: result.stdout, stderr: result.stderr, exit_code: result.exitCode };
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new ActionError(
      `Script exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
      ActionErrorKind.EXECUTION,
      outputs
    );
  }
  return { outputs, stdout: result.stdout, stderr: result.stderr };
}

export function createScriptActions(): ActionDefinition[] {
  return [PYTHON, BASH].map((interpreter) => ({
    id: interpreter.actionId,
    description:
      interpreter === PYTHON ? 'Run a Python 3 script' : 'Run a bash script',
    handler: (input, context) => executeScript(interpreter, input, context),
  }));
}
