import { isPlainObject } from '../expression/filters.ts';

/**
 * Recursively merge `source` over `target`. Mappings merge key by key; any other value
 * (lists included) replaces the target's. Undefined source values are ignored.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const output: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = output[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      output[key] = deepMerge(current, value);
    } else {
      output[key] = value;
    }
  }
  return output;
}
