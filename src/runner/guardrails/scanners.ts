import { z } from 'zod';
import { isPlainObject } from '../../expression/filters.ts';
import { LIMITS } from '../../utils/constants.ts';
import { type Scanner, type ScannerOutcome, collectStrings, mapStrings } from './types.ts';

const SECRET_PATTERNS = [
  /(api[_-]?key|apikey)\s*[:=]\s*["']?[\w-]{20,}/gi,
  /(secret|password|passwd|pwd)\s*[:=]\s*["']?[^\s"']{8,}/gi,
  /(token|bearer)\s*[:=]?\s*["']?[\w-]{20,}/gi,
  /aws[_-]?(access|secret)[_-]?key\s*[:=]\s*["']?[\w/+=]{20,}/gi,
  /-----BEGIN (RSA |DSA |EC |OPENSSH )?PRIVATE KEY-----[\s\S]*?(-----END (RSA |DSA |EC |OPENSSH )?PRIVATE KEY-----|$)/g,
  /\b(ghp|gho|ghu|ghs|ghr)_[a-zA-Z0-9]{36}\b/g,
  /\bsk-[a-zA-Z0-9_-]{32,}\b/g,
  /\bxox[baprs]-[\w-]+/g,
  /\bAKIA[0-9A-Z]{16}\b/g,
];

const PII_PATTERNS = {
  email: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g,
  ssn: /\b\d{3}-\d{2}-\d{4}\b/g,
  credit_card: /\b(?:\d{4}[ -]?){3}\d{4}\b/g,
  phone: /(?<!\d)(?:\+?1[-. ]?)?\(?\d{3}\)?[-. ]?\d{3}[-. ]\d{4}\b/g,
} as const;

type PiiEntity = keyof typeof PII_PATTERNS;

const PII_ENTITIES: readonly string[] = Object.keys(PII_PATTERNS);

function isPiiEntity(value: string): value is PiiEntity {
  return PII_ENTITIES.includes(value);
}

/** Zero-width, bidi control and other characters that render as nothing */
const INVISIBLE = /[\u00AD\u200B-\u200F\u202A-\u202E\u2060-\u2064\u2066-\u2069\uFEFF]/g;

function countMatches(texts: string[], pattern: RegExp): number {
  let count = 0;
  for (const text of texts) count += text.match(pattern)?.length ?? 0;
  return count;
}

const RedactParams = z.object({ redact: z.boolean().default(true) }).passthrough();

export const secretsScanner: Scanner<typeof RedactParams> = {
  name: 'secrets',
  description: 'API keys, tokens, passwords and private keys',
  severity: 'high',
  params: RedactParams,
  scan(payload, params): ScannerOutcome {
    const texts = collectStrings(payload);
    const found = SECRET_PATTERNS.reduce((sum, pattern) => sum + countMatches(texts, pattern), 0);
    if (found === 0) return { ok: true, payload };
    if (!params.redact) return { ok: false, message: `Possible secret detected (${found} match(es))` };
    return {
      ok: true,
      payload: mapStrings(payload, (text) =>
        SECRET_PATTERNS.reduce((acc, pattern) => acc.replace(pattern, '[REDACTED_SECRET]'), text)
      ),
    };
  },
};

const PiiParams = z
  .object({
    redact: z.boolean().default(true),
    entities: z
      .array(z.string().refine(isPiiEntity, { message: `must be one of: ${PII_ENTITIES.join(', ')}` }))
      .optional(),
  })
  .passthrough();

export const piiScanner: Scanner<typeof PiiParams> = {
  name: 'pii',
  description: 'Email addresses, SSNs, card and phone numbers',
  severity: 'medium',
  params: PiiParams,
  scan(payload, params): ScannerOutcome {
    const entities = (params.entities ?? PII_ENTITIES).filter(isPiiEntity);
    const texts = collectStrings(payload);
    const found = entities.filter((entity) => countMatches(texts, PII_PATTERNS[entity]) > 0);
    if (found.length === 0) return { ok: true, payload };
    if (!params.redact) return { ok: false, message: `PII detected: ${found.join(', ')}` };
    return {
      ok: true,
      payload: mapStrings(payload, (text) =>
        found.reduce(
          (acc, entity) => acc.replace(PII_PATTERNS[entity], `[REDACTED_${entity.toUpperCase()}]`),
          text
        )
      ),
    };
  },
};

const BanSubstringsParams = z
  .object({
    substrings: z.array(z.string().min(1)).min(1),
    case_sensitive: z.boolean().default(false),
  })
  .passthrough();

export const banSubstringsScanner: Scanner<typeof BanSubstringsParams> = {
  name: 'ban_substrings',
  description: 'Rejects payloads containing any listed substring',
  severity: 'medium',
  params: BanSubstringsParams,
  scan(payload, params): ScannerOutcome {
    const fold = (text: string) => (params.case_sensitive ? text : text.toLowerCase());
    const texts = collectStrings(payload).map(fold);
    const banned = params.substrings.find((substring) =>
      texts.some((text) => text.includes(fold(substring)))
    );
    return banned === undefined
      ? { ok: true, payload }
      : { ok: false, message: `Banned substring "${banned}" found` };
  },
};

const RegexParams = z
  .object({
    patterns: z
      .array(
        z.string().refine(
          (pattern) => {
            try {
              new RegExp(pattern);
              return true;
            } catch {
              return false;
            }
          },
          { message: 'must be a valid regular expression' }
        )
      )
      .min(1),
    /** true: any match fails; false: the payload must match at least one pattern */
    blocked: z.boolean().default(true),
  })
  .passthrough();

export const regexScanner: Scanner<typeof RegexParams> = {
  name: 'regex',
  description: 'Blocks (or requires) matches of the given patterns',
  severity: 'medium',
  params: RegexParams,
  scan(payload, params): ScannerOutcome {
    const texts = collectStrings(payload);
    const matching = params.patterns.find((pattern) => {
      const regex = new RegExp(pattern);
      return texts.some((text) => regex.test(text));
    });
    if (params.blocked) {
      return matching === undefined
        ? { ok: true, payload }
        : { ok: false, message: `Blocked pattern /${matching}/ matched` };
    }
    return matching === undefined
      ? { ok: false, message: 'Payload matches none of the required patterns' }
      : { ok: true, payload };
  },
};

const InvisibleTextParams = z.object({ strip: z.boolean().default(false) }).passthrough();

export const invisibleTextScanner: Scanner<typeof InvisibleTextParams> = {
  name: 'invisible_text',
  description: 'Zero-width and bidirectional control characters',
  severity: 'medium',
  params: InvisibleTextParams,
  scan(payload, params): ScannerOutcome {
    const found = countMatches(collectStrings(payload), INVISIBLE);
    if (found === 0) return { ok: true, payload };
    if (params.strip) {
      return { ok: true, payload: mapStrings(payload, (text) => text.replace(INVISIBLE, '')) };
    }
    return { ok: false, message: `Invisible characters found (${found})` };
  },
};

const TokenLimitParams = z.object({ limit: z.number().int().positive().default(4096) }).passthrough();

export const tokenLimitScanner: Scanner<typeof TokenLimitParams> = {
  name: 'token_limit',
  description: 'Estimated token count (characters / 4) must stay under a limit',
  severity: 'low',
  params: TokenLimitParams,
  scan(payload, params): ScannerOutcome {
    const chars = collectStrings(payload).reduce((sum, text) => sum + text.length, 0);
    const tokens = Math.ceil(chars / LIMITS.CHARS_PER_TOKEN);
    return tokens > params.limit
      ? { ok: false, message: `Payload has about ${tokens} tokens, limit is ${params.limit}` }
      : { ok: true, payload };
  },
};

/** Keys checked, in order, when a mapping payload is given to the json scanner without `field` */
const TEXT_KEYS = ['response', 'text', 'analysis', 'stdout', 'body'];

const JsonParams = z
  .object({
    field: z.string().optional(),
    required_fields: z.array(z.string()).default([]),
  })
  .passthrough();

export const jsonScanner: Scanner<typeof JsonParams> = {
  name: 'json',
  description: 'Payload text must parse as JSON',
  severity: 'medium',
  params: JsonParams,
  scan(payload, params): ScannerOutcome {
    let target: unknown = payload;
    if (isPlainObject(payload)) {
      const key = params.field ?? TEXT_KEYS.find((candidate) => candidate in payload);
      if (key === undefined) return { ok: false, message: 'No text field to validate as JSON' };
      target = payload[key];
    }

    let parsed: unknown = target;
    if (typeof target === 'string') {
      try {
        parsed = JSON.parse(target);
      } catch (error) {
        return {
          ok: false,
          message: `Output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        };
      }
    }

    if (params.required_fields.length > 0) {
      const document = parsed;
      const missing = isPlainObject(document)
        ? params.required_fields.filter((name) => !(name in document))
        : params.required_fields;
      if (missing.length > 0) {
        return { ok: false, message: `JSON is missing required fields: ${missing.join(', ')}` };
      }
    }
    return { ok: true, payload };
  },
};

export const BUILT_IN_SCANNERS = [
  secretsScanner,
  piiScanner,
  banSubstringsScanner,
  regexScanner,
  invisibleTextScanner,
  tokenLimitScanner,
  jsonScanner,
];
