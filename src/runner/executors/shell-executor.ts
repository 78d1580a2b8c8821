/**
 * Shell command executor
 *
 * String commands run through `sh -c`, so values interpolated into them can inject commands.
 * Pipe them through `shell_quote`, use the array form of `run` (spawned without a shell), or
 * set `shell_safety: auto_quote` on the workflow.
 *
 * ```yaml
 * steps:
 *   - id: safe_echo
 *     run: echo ${{ inputs.message | shell_quote }}
 *   - id: no_shell
 *     run: [echo, "${{ inputs.message }}"]
 * ```
 */

import { spawn } from 'node:child_process';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { FILE_MODES, LIMITS } from '../../utils/constants.ts';
import { PathResolver } from '../../utils/paths.ts';
import { ActionError, ActionErrorKind } from '../errors.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  parseActionInput,
  throwIfAborted,
} from './types.ts';

export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  stdoutTruncated: boolean;
  stderrTruncated: boolean;
}

export interface ProcessOptions {
  env: Record<string, string>;
  cwd?: string;
  signal?: AbortSignal;
  /** Written to stdin, which is then closed */
  stdin?: string;
  /** Inherit the terminal instead of capturing output */
  interactive?: boolean;
  maxOutputBytes?: number;
}

const TRUNCATED_SUFFIX = '... [truncated output]';

/**
 * Filter sensitive environment variables from host environment
 * to prevent accidental leak of local secrets to child processes.
 */
export function filterSensitiveEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const sensitivePatterns = [
    /^.*_(API_KEY|SECRET|TOKEN|PASSWORD|CREDENTIAL|PRIVATE_KEY)(_.*)?$/i,
    /^(API_KEY|AUTH_TOKEN|SECRET_KEY|PRIVATE_KEY|PASSWORD|CREDENTIALS?)(_.*)?$/i,
    /^(AWS_SECRET|GITHUB_TOKEN|NPM_TOKEN|SSH_KEY|PGP_PASSPHRASE)(_.*)?$/i,
    /^.*_AUTH_(TOKEN|KEY|SECRET)(_.*)?$/i,
    /^(COOKIE|SESSION_ID|SESSION_SECRET)(_.*)?$/i,
  ];

  const filtered: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) continue;
    if (!sensitivePatterns.some((pattern) => pattern.test(key))) {
      filtered[key] = value;
    }
  }
  return filtered;
}

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  truncated = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer): void {
    if (this.truncated) return;
    if (this.bytes + chunk.byteLength > this.maxBytes) {
      const allowed = this.maxBytes - this.bytes;
      if (allowed > 0) this.chunks.push(chunk.subarray(0, allowed));
      this.bytes = this.maxBytes;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.bytes += chunk.byteLength;
  }

  text(): string {
    const text = Buffer.concat(this.chunks).toString('utf8');
    return this.truncated ? `${text}${TRUNCATED_SUFFIX}` : text;
  }
}

/**
 * Spawn `argv[0]` with the remaining arguments and collect its output.
 * Abort kills the child; a child that cannot be started is an ActionError.
 */
export function runProcess(argv: string[], options: ProcessOptions): Promise<ProcessResult> {
  const [file, ...args] = argv;
  if (file === undefined || file === '') {
    return Promise.reject(new ActionError('Empty command', ActionErrorKind.INVALID_INPUT));
  }
  const maxBytes = options.maxOutputBytes ?? LIMITS.MAX_PROCESS_OUTPUT_BYTES;

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: options.interactive ? 'inherit' : ['pipe', 'pipe', 'pipe'],
    });
    const stdout = new OutputBuffer(maxBytes);
    const stderr = new OutputBuffer(maxBytes);

    const onAbort = () => {
      child.kill('SIGTERM');
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });
    const cleanup = () => options.signal?.removeEventListener('abort', onAbort);

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));
    if (child.stdin) {
      child.stdin.on('error', () => {
        // EPIPE when the child exits without reading stdin
      });
      child.stdin.end(options.stdin ?? '');
    }

    child.on('error', (error) => {
      cleanup();
      reject(new ActionError(`Failed to start "${file}": ${error.message}`));
    });
    child.on('close', (code, signal) => {
      cleanup();
      resolve({
        stdout: stdout.text(),
        stderr: stderr.text(),
        exitCode: code ?? (signal ? 128 : 1),
        stdoutTruncated: stdout.truncated,
        stderrTruncated: stderr.truncated,
      });
    });
  });
}

const RunInputSchema = z
  .object({
    command: z.union([z.string().min(1), z.array(z.string()).min(1)]),
    capture_mode: z.enum(['memory', 'file', 'none']).default('memory'),
    cwd: z.string().optional(),
    env: z.record(z.string()).optional(),
  })
  .strict();

export interface ShellActionOptions {
  /** Directory for `capture_mode: file`; defaults to `<tmpdir>/runbook` */
  captureDir?: string;
}

/**
 * Execute a command. A string runs through `sh -c`, a list is spawned directly.
 */
export async function executeRun(
  input: Record<string, unknown>,
  context: ActionContext,
  options: ShellActionOptions = {}
): Promise<ActionResult> {
  const params = parseActionInput('run', RunInputSchema, input);
  throwIfAborted(context.signal);

  const argv = typeof params.command === 'string' ? ['sh', '-c', params.command] : params.command;
  context.logger.debug?.(`  $ ${typeof params.command === 'string' ? params.command : argv.join(' ')}`);

  const result = await runProcess(argv, {
    env: { ...filterSensitiveEnv(process.env), ...context.env, ...(params.env ?? {}) },
    cwd: params.cwd,
    signal: context.signal,
    interactive: context.interactive,
  });
  throwIfAborted(context.signal);

  let outputs: Record<string, unknown>;
  let file: string | undefined;
  if (context.interactive || params.capture_mode === 'none') {
    outputs = { exit_code: result.exitCode };
  } else if (params.capture_mode === 'file') {
    file = await captureToFile(options.captureDir, context, result.stdout);
    outputs = {
      file,
      stderr: result.stderr,
      exit_code: result.exitCode,
      lines: result.stdout === '' ? 0 : result.stdout.replace(/\n$/, '').split('\n').length,
    };
  } else {
    outputs = { stdout: result.stdout, stderr: result.stderr, exit_code: result.exitCode };
  }

  if (result.exitCode !== 0) {
    const detail = result.stderr.trim();
    throw new ActionError(
      `Command exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
      ActionErrorKind.EXECUTION,
      outputs
    );
  }

  return {
    outputs,
    ...(params.capture_mode === 'memory' ? { stdout: result.stdout, stderr: result.stderr } : {}),
    ...(file !== undefined ? { file } : {}),
  };
}

async function captureToFile(
  captureDir: string | undefined,
  context: ActionContext,
  content: string
): Promise<string> {
  const dir = join(captureDir ?? PathResolver.getCaptureDir(), context.runId);
  await mkdir(dir, { recursive: true, mode: FILE_MODES.SECURE_DIR });
  const path = join(dir, `${context.stepId}.out`);
  await writeFile(path, content, { mode: FILE_MODES.SECURE_FILE });
  return path;
}

export function createShellActions(options: ShellActionOptions = {}): ActionDefinition[] {
  return [
    {
      id: 'run',
      description: 'Run a shell command (string) or a program with arguments (list)',
      handler: (input, context) => executeRun(input, context, options),
    },
  ];
}
