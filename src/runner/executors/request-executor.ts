import { z } from 'zod';
import { isPlainObject } from '../../expression/filters.ts';
import { LIMITS, TIMEOUTS } from '../../utils/constants.ts';
import { ActionError, ActionErrorKind } from '../errors.ts';
import {
  type ActionContext,
  type ActionDefinition,
  type ActionResult,
  parseActionInput,
  throwIfAborted,
} from './types.ts';

async function readResponseTextWithLimit(
  response: Response,
  maxBytes: number
): Promise<{ text: string; truncated: boolean }> {
  if (!response.body) {
    return { text: '', truncated: false };
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';
  let bytesRead = 0;

  while (true) {
    const { value, done } = await reader.read();
    if (done) break;
    if (!value) continue;

    if (bytesRead + value.byteLength > maxBytes) {
      const allowed = maxBytes - bytesRead;
      if (allowed > 0) {
        text += decoder.decode(value.slice(0, allowed), { stream: true });
      }
      text += decoder.decode();
      await reader.cancel();
      return { text, truncated: true };
    }

    bytesRead += value.byteLength;
    text += decoder.decode(value, { stream: true });
  }

  text += decoder.decode();
  return { text, truncated: false };
}

const RequestInputSchema = z
  .object({
    url: z.string().url(),
    method: z
      .string()
      .default('GET')
      .transform((method) => method.toUpperCase()),
    headers: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    body: z.unknown().optional(),
    /** Seconds */
    timeout: z.number().positive().optional(),
    follow_redirects: z.boolean().default(true),
  })
  .strict();

export interface RequestActionOptions {
  fetch?: typeof fetch;
}

const MAX_REDIRECTS = 5;

/**
 * Execute an HTTP request. Non-2xx responses fail the step with kind `http`; the response
 * is still attached to the failure.
 */
export async function executeRequest(
  input: Record<string, unknown>,
  context: ActionContext,
  options: RequestActionOptions = {}
): Promise<ActionResult> {
  const params = parseActionInput('http/request', RequestInputSchema, input);
  throwIfAborted(context.signal);
  const fetchFn = options.fetch ?? fetch;

  const protocol = new URL(params.url).protocol;
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ActionError(`Unsupported URL protocol "${protocol}"`, ActionErrorKind.INVALID_INPUT);
  }

  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(params.headers)) headers[key] = String(value);

  let body: string | undefined;
  if (params.body !== undefined && params.body !== null) {
    const contentType = Object.entries(headers).find(
      ([k]) => k.toLowerCase() === 'content-type'
    )?.[1];

    if (contentType?.includes('application/x-www-form-urlencoded') && isPlainObject(params.body)) {
      const form = new URLSearchParams();
      for (const [key, value] of Object.entries(params.body)) form.append(key, String(value));
      body = form.toString();
    } else if (typeof params.body === 'string') {
      body = params.body;
    } else {
      body = JSON.stringify(params.body);
      if (!contentType) headers['Content-Type'] = 'application/json';
    }
  }

  const timeoutMs = params.timeout !== undefined ? params.timeout * 1000 : TIMEOUTS.DEFAULT_HTTP_TIMEOUT_MS;
  const controller = new AbortController();
  const onAbort = () => controller.abort(new Error('Step canceled'));
  context.signal.addEventListener('abort', onAbort, { once: true });
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  try {
    let response: Response | undefined;
    let currentUrl = params.url;
    let currentMethod = params.method;
    let currentBody = body;
    const currentHeaders: Record<string, string> = { ...headers };
    const removeHeader = (name: string) => {
      const target = name.toLowerCase();
      for (const key of Object.keys(currentHeaders)) {
        if (key.toLowerCase() === target) delete currentHeaders[key];
      }
    };

    for (let redirectCount = 0; redirectCount <= MAX_REDIRECTS; redirectCount++) {
      response = await fetchFn(currentUrl, {
        method: currentMethod,
        headers: currentHeaders,
        body: currentBody,
        redirect: 'manual',
        signal: controller.signal,
      });

      const contentLength = Number.parseInt(response.headers.get('content-length') ?? '', 10);
      if (Number.isFinite(contentLength) && contentLength > LIMITS.MAX_HTTP_RESPONSE_BYTES) {
        throw new ActionError(
          `Response too large: Content-Length ${contentLength} bytes exceeds limit of ${LIMITS.MAX_HTTP_RESPONSE_BYTES} bytes`,
          ActionErrorKind.HTTP
        );
      }

      if (!params.follow_redirects || response.status < 300 || response.status >= 400) break;
      const location = response.headers.get('location');
      if (!location) break;
      if (redirectCount >= MAX_REDIRECTS) {
        throw new ActionError(`Request exceeded maximum redirects (${MAX_REDIRECTS})`, ActionErrorKind.HTTP);
      }

      const nextUrl = new URL(location, currentUrl).href;
      if (
        response.status === 303 ||
        ((response.status === 301 || response.status === 302) &&
          currentMethod !== 'GET' &&
          currentMethod !== 'HEAD')
      ) {
        currentMethod = 'GET';
        currentBody = undefined;
        removeHeader('content-type');
      }
      if (new URL(currentUrl).origin !== new URL(nextUrl).origin) {
        removeHeader('authorization');
        removeHeader('proxy-authorization');
        removeHeader('cookie');
      }
      currentUrl = nextUrl;
    }

    if (!response) {
      throw new ActionError('Request failed: No response received', ActionErrorKind.HTTP);
    }

    const { text, truncated } = await readResponseTextWithLimit(
      response,
      LIMITS.MAX_HTTP_RESPONSE_BYTES
    );
    let data: unknown = text;
    if (text !== '') {
      try {
        data = JSON.parse(text);
      } catch {
        data = text;
      }
    }

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      responseHeaders[key] = value;
    });
    const outputs = {
      status_code: response.status,
      body: data,
      headers: responseHeaders,
      ...(truncated ? { truncated } : {}),
    };

    if (!response.ok) {
      const excerpt = text.length > 500 ? `${text.substring(0, 500)}...` : text;
      throw new ActionError(
        `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}${excerpt ? `: ${excerpt}` : ''}`,
        ActionErrorKind.HTTP,
        outputs
      );
    }
    return { outputs };
  } catch (error) {
    if (error instanceof ActionError) throw error;
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      throw new ActionError(
        reason instanceof Error ? reason.message : 'Request aborted',
        context.signal.aborted ? ActionErrorKind.CANCELED : ActionErrorKind.TIMEOUT
      );
    }
    throw new ActionError(
      `Request failed: ${error instanceof Error ? error.message : String(error)}`,
      ActionErrorKind.HTTP
    );
  } finally {
    clearTimeout(timer);
    context.signal.removeEventListener('abort', onAbort);
  }
}

export function createRequestActions(options: RequestActionOptions = {}): ActionDefinition[] {
  return [
    {
      id: 'http/request',
      description: 'Send an HTTP request and parse a JSON response body',
      handler: (input, context) => executeRequest(input, context, options),
    },
  ];
}
