import { z } from 'zod';

export const LlmConfigSchema = z
  .object({
    /** AI SDK provider package, e.g. `@ai-sdk/openai` */
    provider: z.string().optional(),
    /** Export of the provider package to call; found by name when omitted */
    factory: z.string().optional(),
    default_model: z.string().optional(),
    base_url: z.string().url().optional(),
    /** Environment variable holding the API key */
    api_key_env: z.string().optional(),
    /** llm/instruct hands instructions to an operator instead of applying them */
    airgapped: z.boolean().default(false),
  })
  .default({});

export const ConfigSchema = z.object({
  storage: z
    .object({
      retention_days: z.number().int().min(0).default(30),
      redact_secrets_at_rest: z.boolean().default(true),
    })
    .default({}),
  expression: z
    .object({
      strict: z.boolean().default(false),
    })
    .default({}),
  execution: z
    .object({
      /** Write a checkpoint around every step; suspension and completion are always recorded */
      checkpoint: z.boolean().default(true),
    })
    .default({}),
  llm: LlmConfigSchema,
  /** Guardrail defaults applied beneath every workflow's own */
  guardrails: z.record(z.unknown()).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LlmConfig = z.infer<typeof LlmConfigSchema>;
