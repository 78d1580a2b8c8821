import type { z } from 'zod';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export type GuardrailStage = 'input' | 'output';

export interface Violation {
  scanner: string;
  severity: Severity;
  message: string;
}

export type ScanResult =
  | { passed: true; payload: unknown }
  | { passed: false; violation: Violation };

/** What a single scanner reports; the pipeline adds the scanner name and severity */
export type ScannerOutcome = { ok: true; payload: unknown } | { ok: false; message: string };

export interface Scanner<P extends z.ZodTypeAny = z.ZodTypeAny> {
  name: string;
  description: string;
  severity: Severity;
  params: P;
  scan(payload: unknown, params: z.infer<P>): ScannerOutcome;
}

/**
 * Apply `fn` to every string inside a payload, rebuilding lists and mappings
 */
export function mapStrings(value: unknown, fn: (text: string) => string): unknown {
  if (typeof value === 'string') return fn(value);
  if (Array.isArray(value)) return value.map((item) => mapStrings(item, fn));
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) result[key] = mapStrings(item, fn);
    return result;
  }
  return value;
}

export function collectStrings(value: unknown): string[] {
  const texts: string[] = [];
  mapStrings(value, (text) => {
    texts.push(text);
    return text;
  });
  return texts;
}
