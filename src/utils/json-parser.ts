import { LIMITS } from './constants.ts';

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Contents of ``` fenced blocks, language tag removed */
function fencedBlocks(text: string): string[] {
  const blocks: string[] = [];
  let from = 0;
  while (true) {
    const start = text.indexOf('```', from);
    if (start === -1) break;
    const end = text.indexOf('```', start + 3);
    if (end === -1) break;
    const block = text
      .substring(start + 3, end)
      .replace(/^[a-zA-Z]*\s+/, '')
      .trim();
    if (block) blocks.push(block);
    from = end + 3;
  }
  return blocks;
}

/**
 * The first `{...}` or `[...]` span whose brackets balance, ignoring brackets inside strings
 */
function balancedSpan(text: string): string | null {
  const brace = text.indexOf('{');
  const bracket = text.indexOf('[');
  const start = brace === -1 ? bracket : bracket === -1 ? brace : Math.min(brace, bracket);
  if (start === -1) return null;

  const opener = text[start];
  const closer = opener === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];
    if (escaped) {
      escaped = false;
    } else if (char === '\\') {
      escaped = true;
    } else if (char === '"') {
      inString = !inString;
    } else if (!inString && char === opener) {
      depth++;
      if (depth > LIMITS.MAX_JSON_BRACE_DEPTH) {
        throw new Error(
          `Failed to extract JSON: structure nested too deeply (max depth ${LIMITS.MAX_JSON_BRACE_DEPTH}).`
        );
      }
    } else if (!inString && char === closer) {
      depth--;
      if (depth === 0) return text.substring(start, i + 1);
    }
  }
  return null;
}

/**
 * Extract JSON from model output that may wrap it in prose or Markdown fences.
 *
 * Tries fenced blocks first, then the first balanced bracket span, then the whole text.
 */
export function extractJson(text: string): unknown {
  if (!text || text.trim().length === 0) {
    throw new Error('Failed to extract valid JSON from empty input.');
  }
  if (text.length > LIMITS.MAX_JSON_PARSE_LENGTH) {
    throw new Error(
      `Failed to extract JSON: input too large (${text.length} bytes, limit is ${LIMITS.MAX_JSON_PARSE_LENGTH}).`
    );
  }

  for (const block of fencedBlocks(text)) {
    const parsed = tryParse(block);
    if (parsed.ok) return parsed.value;
  }

  const span = balancedSpan(text);
  if (span !== null) {
    const parsed = tryParse(span);
    if (parsed.ok) return parsed.value;
  }

  const whole = tryParse(text.trim());
  if (whole.ok) return whole.value;
  throw new Error(`Failed to extract valid JSON from model output: ${text.substring(0, 100)}...`);
}
