import { ExpressionError } from '../runner/errors.ts';

/**
 * Filters available through the pipe syntax: `${{ value | filter(arg1, arg2) }}`.
 * The piped value is always the first argument.
 */
export type FilterFn = (value: unknown, ...args: unknown[]) => unknown;

const SHELL_SAFE = /^[A-Za-z0-9@%+=:,./_-]+$/;

/**
 * Quote a value so it is a single token for a POSIX shell.
 * Safe strings are returned unchanged; anything else is single-quoted with embedded
 * quotes closed, escaped and reopened.
 */
export function shellQuote(value: unknown): string {
  const text = toText(value);
  if (text.length === 0) return "''";
  if (SHELL_SAFE.test(text)) return text;
  return `'${text.replace(/'/g, `'"'"'`)}'`;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * String form used when a value is spliced into a template
 */
export function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function requireList(name: string, value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  throw new ExpressionError(`Filter "${name}" expects a list, got ${describeType(value)}`);
}

function requireString(name: string, value: unknown, label = 'argument'): string {
  if (typeof value === 'string') return value;
  throw new ExpressionError(`Filter "${name}" expects a string ${label}, got ${describeType(value)}`);
}

function optionalNumber(name: string, value: unknown, fallback: number): number {
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new ExpressionError(`Filter "${name}" expects a number argument, got ${describeType(value)}`);
}

export function describeType(value: unknown): string {
  if (value === null) return 'none';
  if (value === undefined) return 'undefined';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') return 'mapping';
  return typeof value;
}

function compile(name: string, pattern: unknown): RegExp {
  const source = requireString(name, pattern, 'pattern');
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ExpressionError(
      `Filter "${name}" got an invalid pattern: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return toText(a).localeCompare(toText(b));
}

function toInteger(value: unknown): number {
  if (value === null || value === undefined || value === '' || value === false) return 0;
  if (value === true) return 1;
  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (!Number.isFinite(parsed)) {
    throw new ExpressionError(`Cannot convert ${JSON.stringify(value)} to int`);
  }
  return Math.trunc(parsed);
}

function toFloat(value: unknown): number {
  if (value === null || value === undefined || value === '' || value === false) return 0;
  if (value === true) return 1;
  const parsed = typeof value === 'number' ? value : Number(String(value).trim());
  if (Number.isNaN(parsed)) {
    throw new ExpressionError(`Cannot convert ${JSON.stringify(value)} to float`);
  }
  return parsed;
}

function formatBytes(value: unknown): string {
  let size = toInteger(value);
  for (const unit of ['B', 'KB', 'MB', 'GB', 'TB']) {
    if (Math.abs(size) < 1024) return `${size.toFixed(1)} ${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)} PB`;
}

function safeFilename(value: unknown): string {
  let name = toText(value)
    .replace(/[\x00-\x1f\x7f]/g, '')
    .replace(/[<>:"/\\|?*]/g, '_')
    .replace(/^[. ]+|[. ]+$/g, '');
  if (name.length > 255) name = name.slice(0, 255);
  return name || 'unnamed';
}

function extractDomain(value: unknown): string {
  const text = toText(value);
  try {
    return new URL(text).host;
  } catch {
    // Not an absolute URL: take everything before the first slash
    return text.split('/')[0] ?? '';
  }
}

function indent(value: unknown, width?: unknown, first?: unknown): string {
  const lines = toText(value).split(/\r?\n/);
  const prefix = ' '.repeat(optionalNumber('indent', width, 4));
  return lines
    .map((line, index) => (index === 0 && first !== true ? line : prefix + line))
    .join('\n');
}

function parseJson(name: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ExpressionError(
      `Filter "${name}" could not parse JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function contains(haystack: unknown, needle: unknown): boolean {
  if (typeof haystack === 'string') return haystack.includes(toText(needle));
  if (Array.isArray(haystack)) return haystack.includes(needle);
  if (isPlainObject(haystack)) return typeof needle === 'string' && Object.hasOwn(haystack, needle);
  return false;
}

export const FILTERS: Readonly<Record<string, FilterFn>> = {
  shell_quote: (value) => shellQuote(value),
  length: (value) => {
    if (value === null || value === undefined) return 0;
    if (typeof value === 'string' || Array.isArray(value)) return value.length;
    if (isPlainObject(value)) return Object.keys(value).length;
    throw new ExpressionError(`Filter "length" cannot measure a ${describeType(value)}`);
  },
  default: (value, fallback = '') => {
    if (value === null || value === undefined) return fallback;
    if (isPlainObject(value) && Object.keys(value).length === 0) return fallback;
    return value;
  },
  keys: (value) => (isPlainObject(value) ? Object.keys(value) : []),
  values: (value) => (isPlainObject(value) ? Object.values(value) : []),
  first: (value) => {
    if (typeof value === 'string' || Array.isArray(value)) return value.length > 0 ? value[0] : null;
    return null;
  },
  last: (value) => {
    if (typeof value === 'string' || Array.isArray(value)) {
      return value.length > 0 ? value[value.length - 1] : null;
    }
    return null;
  },
  join: (value, separator = ',') => {
    if (value === null || value === undefined) return '';
    return requireList('join', value).map(toText).join(toText(separator));
  },
  contains: (haystack, needle) => contains(haystack, needle),
  startsWith: (value, prefix) =>
    value === null || value === undefined ? false : toText(value).startsWith(toText(prefix)),
  endsWith: (value, suffix) =>
    value === null || value === undefined ? false : toText(value).endsWith(toText(suffix)),
  format: (template, ...args) =>
    args.reduce<string>(
      (result, arg, index) => result.split(`{${index}}`).join(toText(arg)),
      toText(template)
    ),
  toJSON: (value) => JSON.stringify(value ?? null),
  fromJSON: (value) => parseJson('fromJSON', value),

  lower: (value) => toText(value).toLowerCase(),
  upper: (value) => toText(value).toUpperCase(),
  trim: (value) => toText(value).trim(),
  split: (value, separator) => {
    if (value === null || value === undefined || value === '') return [];
    const text = toText(value);
    if (separator === undefined || separator === null) return text.trim().split(/\s+/);
    return text.split(toText(separator));
  },
  replace: (value, search, replacement = '') =>
    toText(value).split(requireString('replace', search)).join(toText(replacement)),
  sort: (value) => {
    if (value === null || value === undefined) return [];
    return [...requireList('sort', value)].sort(compareValues);
  },
  unique: (value) => {
    if (value === null || value === undefined) return [];
    return [...new Set(requireList('unique', value))];
  },
  reverse: (value) => {
    if (typeof value === 'string') return [...value].reverse().join('');
    return [...requireList('reverse', value)].reverse();
  },
  min: (value) => {
    const list = requireList('min', value);
    return list.length === 0 ? null : [...list].sort(compareValues)[0];
  },
  max: (value) => {
    const list = requireList('max', value);
    return list.length === 0 ? null : [...list].sort(compareValues)[list.length - 1];
  },
  sum: (value) => requireList('sum', value).reduce<number>((total, item) => total + toFloat(item), 0),
  int: (value) => toInteger(value),
  float: (value) => toFloat(value),
  string: (value) => toText(value),
  bool: (value) => isTruthy(value),
  truncate: (value, length, suffix = '...') => {
    const text = toText(value);
    const max = optionalNumber('truncate', length, 80);
    if (text.length <= max) return text;
    const tail = toText(suffix);
    return text.slice(0, Math.max(0, max - tail.length)) + tail;
  },
  lines: (value) => {
    const text = toText(value);
    if (text.length === 0) return [];
    return text.replace(/\r?\n$/, '').split(/\r?\n/);
  },
  indent: (value, width, first) => indent(value, width, first),
  regex_match: (value, pattern) => compile('regex_match', pattern).test(toText(value)),
  regex_replace: (value, pattern, replacement = '') => {
    const regex = compile('regex_replace', pattern);
    return toText(value).replace(new RegExp(regex.source, 'g'), toText(replacement));
  },
  base64_encode: (value) => Buffer.from(toText(value), 'utf8').toString('base64'),
  base64_decode: (value) => Buffer.from(toText(value), 'base64').toString('utf8'),
  url_encode: (value) => encodeURIComponent(toText(value)),
  url_decode: (value) => decodeURIComponent(toText(value)),
  safe_filename: (value) => safeFilename(value),
  in_list: (value, items) =>
    requireList('in_list', items)
      .map((item) => toText(item).trim())
      .includes(toText(value)),
  json_encode: (value) => JSON.stringify(value ?? null),
  json_decode: (value) => parseJson('json_decode', toText(value)),
  extract_domain: (value) => extractDomain(value),
  format_bytes: (value) => formatBytes(value),
};

export function isKnownFilter(name: string): boolean {
  return Object.hasOwn(FILTERS, name);
}

export function getFilter(name: string): FilterFn {
  if (!isKnownFilter(name)) {
    throw new ExpressionError(`Unknown filter "${name}"`);
  }
  return FILTERS[name];
}

const FALSY_STRINGS = new Set(['', 'false', '0', 'no', 'none']);

/**
 * Truthiness used by `if`, `break_if` and `control/wait`: empty collections and
 * "false"-like strings are false.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return !FALSY_STRINGS.has(value.trim().toLowerCase());
  if (Array.isArray(value)) return value.length > 0;
  if (isPlainObject(value)) return Object.keys(value).length > 0;
  return true;
}
