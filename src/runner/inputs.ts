import { isPlainObject, toText } from '../expression/filters.ts';
import type { InputDefinition } from '../parser/schema.ts';
import { matchesInputType } from '../parser/workflow-validator.ts';

export interface ResolvedInputs {
  inputs: Record<string, unknown>;
  /** Values of inputs declared `secret: true`, keyed by input name */
  secrets: Record<string, string>;
}

const TRUE_WORDS = new Set(['true', 'yes', '1', 'on']);
const FALSE_WORDS = new Set(['false', 'no', '0', 'off']);

/**
 * Applies input declarations to the values supplied for a run: coercion of CLI strings,
 * defaults, required checks and constraints.
 */
export class InputResolver {
  static readonly REDACTED_PLACEHOLDER = '[REDACTED]';

  static resolve(
    definitions: Record<string, InputDefinition> | undefined,
    provided: Record<string, unknown>
  ): ResolvedInputs {
    const inputs: Record<string, unknown> = { ...provided };
    const secrets: Record<string, string> = {};
    if (!definitions) return { inputs, secrets };

    for (const [name, definition] of Object.entries(definitions)) {
      let value = inputs[name];

      if (definition.secret && value === InputResolver.REDACTED_PLACEHOLDER) {
        throw new Error(
          `Secret input "${name}" was redacted at rest. Provide it again to resume this run.`
        );
      }

      if (value === undefined && definition.default !== undefined) {
        value = definition.default;
      }
      if (value === undefined || value === null) {
        if (definition.required && definition.default === undefined) {
          throw new Error(`Missing required input: ${name}`);
        }
        if (value === null) inputs[name] = null;
        continue;
      }

      value = InputResolver.coerce(name, definition, value);
      InputResolver.check(name, definition, value);
      inputs[name] = value;

      if (definition.secret) secrets[name] = toText(value);
    }
    return { inputs, secrets };
  }

  /**
   * Converts a string to the declared type. Non-string values are only type-checked.
   */
  static coerce(name: string, definition: Pick<InputDefinition, 'type'>, value: unknown): unknown {
    const { type } = definition;
    if (typeof value !== 'string' || type === 'string' || type === 'file') {
      if (!matchesInputType(type, value)) {
        throw new Error(`Input "${name}" must be ${article(type)}, got ${JSON.stringify(value)}`);
      }
      return value;
    }

    const text = value.trim();
    switch (type) {
      case 'integer': {
        if (!/^[+-]?\d+$/.test(text)) {
          throw new Error(`Input "${name}" must be an integer, got "${value}"`);
        }
        return Number.parseInt(text, 10);
      }
      case 'number': {
        const parsed = Number(text);
        if (text === '' || !Number.isFinite(parsed)) {
          throw new Error(`Input "${name}" must be a number, got "${value}"`);
        }
        return parsed;
      }
      case 'boolean': {
        const word = text.toLowerCase();
        if (TRUE_WORDS.has(word)) return true;
        if (FALSE_WORDS.has(word)) return false;
        throw new Error(`Input "${name}" must be a boolean, got "${value}"`);
      }
      case 'array': {
        if (text.startsWith('[')) {
          const parsed = parseJson(name, text);
          if (Array.isArray(parsed)) return parsed;
        }
        return text
          .split(',')
          .map((part) => part.trim())
          .filter((part) => part !== '');
      }
      case 'object': {
        const parsed = parseJson(name, text);
        if (!isPlainObject(parsed)) {
          throw new Error(`Input "${name}" must be a JSON object, got "${value}"`);
        }
        return parsed;
      }
    }
  }

  private static check(name: string, definition: InputDefinition, value: unknown): void {
    if (definition.enum && !definition.enum.some((allowed) => allowed === value)) {
      throw new Error(
        `Input "${name}" must be one of: ${definition.enum.map((v) => String(v)).join(', ')}`
      );
    }
    if (definition.pattern !== undefined && typeof value === 'string') {
      if (!new RegExp(definition.pattern).test(value)) {
        throw new Error(`Input "${name}" does not match pattern /${definition.pattern}/`);
      }
    }
    if (typeof value === 'number') {
      if (definition.min !== undefined && value < definition.min) {
        throw new Error(`Input "${name}" must be >= ${definition.min}, got ${value}`);
      }
      if (definition.max !== undefined && value > definition.max) {
        throw new Error(`Input "${name}" must be <= ${definition.max}, got ${value}`);
      }
    }
  }

  /**
   * Copy of the inputs with secret values replaced, for storage at rest
   */
  static redact(
    definitions: Record<string, InputDefinition> | undefined,
    inputs: Record<string, unknown>
  ): Record<string, unknown> {
    const copy = { ...inputs };
    for (const [name, definition] of Object.entries(definitions ?? {})) {
      if (definition.secret && copy[name] !== undefined && copy[name] !== null) {
        copy[name] = InputResolver.REDACTED_PLACEHOLDER;
      }
    }
    return copy;
  }
}

function parseJson(name: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(
      `Input "${name}" is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function article(type: string): string {
  return /^[aeiou]/.test(type) ? `an ${type}` : `a ${type}`;
}
