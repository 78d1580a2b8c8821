/**
 * Masks secret values in strings and nested values before they are logged or checkpointed
 */

export const REDACTED = '***REDACTED***';

/** Mask left by `seal`, naming the secret it replaced */
const SEALED = /\*\*\*REDACTED:([A-Za-z0-9_-]+)\*\*\*/g;

function sealedMask(name: string): string {
  return `***REDACTED:${name}***`;
}

/** Apply `text` to every string inside a JSON-like value */
export function mapStrings(value: unknown, text: (value: string) => string): unknown {
  if (typeof value === 'string') return text(value);
  if (Array.isArray(value)) return value.map((item) => mapStrings(item, text));
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = mapStrings(item, text);
    }
    return result;
  }
  return value;
}

/** Key fragments whose values are redacted from 6 characters instead of 10 */
const SENSITIVE_KEY_PARTS = [
  'api_key',
  'apikey',
  'token',
  'secret',
  'password',
  'passwd',
  'pwd',
  'auth',
  'credential',
  'access_key',
  'private_key',
];

/** Values too common to be worth masking even under a sensitive key */
const COMMON_VALUES = new Set([
  'true',
  'false',
  'null',
  'undefined',
  'none',
  'default',
  'public',
  'private',
  'pending',
  'running',
  'succeeded',
  'failed',
  'skipped',
  'suspended',
]);

export interface RedactorOptions {
  /** Values masked regardless of key or length */
  forcedSecrets?: string[];
  /** Called when a sensitive key holds a value too common to mask */
  onCommonValue?: (key: string) => void;
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_PARTS.some((part) => lower.includes(part));
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class Redactor {
  private readonly pattern: RegExp | null;
  /** Secret value to the first name it was given under */
  private readonly names = new Map<string, string>();
  readonly secretCount: number;

  constructor(secrets: Record<string, string>, options: RedactorOptions = {}) {
    const values = new Set<string>();

    for (const [key, value] of Object.entries(secrets)) {
      if (typeof value === 'string' && value.length > 0 && !this.names.has(value)) {
        this.names.set(value, key);
      }
    }

    for (const forced of options.forcedSecrets ?? []) {
      if (forced.length > 0) values.add(forced);
    }

    for (const [key, value] of Object.entries(secrets)) {
      if (typeof value !== 'string' || value.length === 0) continue;
      const sensitive = isSensitiveKey(key);
      if (COMMON_VALUES.has(value.toLowerCase())) {
        if (sensitive) options.onCommonValue?.(key);
        continue;
      }
      if (value.length >= (sensitive ? 6 : 10)) {
        values.add(value);
      }
    }

    // Longest first so a secret containing another is masked whole
    const ordered = [...values].sort((a, b) => b.length - a.length);
    this.secretCount = ordered.length;
    this.pattern =
      ordered.length > 0 ? new RegExp(ordered.map(escapeRegExp).join('|'), 'g') : null;
  }

  redact(text: string): string {
    if (!this.pattern || text.length === 0) return text;
    return text.replace(this.pattern, REDACTED);
  }

  redactValue(value: unknown): unknown {
    return mapStrings(value, (text) => this.redact(text));
  }

  /**
   * Mask like `redact`, but name the secret so `reveal` can put it back. A forced value
   * with no name gets the plain mask.
   */
  seal(text: string): string {
    if (!this.pattern || text.length === 0) return text;
    return text.replace(this.pattern, (match) => {
      const name = this.names.get(match);
      return name === undefined ? REDACTED : sealedMask(name);
    });
  }

  sealValue(value: unknown): unknown {
    return mapStrings(value, (text) => this.seal(text));
  }

  /**
   * Replace each sealed mask with the value of the secret it names. Throws when that
   * secret is not in `secrets`.
   */
  static reveal(text: string, secrets: Record<string, string>): string {
    if (!text.includes('***REDACTED:')) return text;
    return text.replace(SEALED, (_match, name: string) => {
      const value = Object.hasOwn(secrets, name) ? secrets[name] : undefined;
      if (value === undefined) {
        throw new Error(`Secret "${name}" is required to restore a redacted value`);
      }
      return value;
    });
  }

  static revealValue(value: unknown, secrets: Record<string, string>): unknown {
    return mapStrings(value, (text) => Redactor.reveal(text, secrets));
  }
}
