import { z } from 'zod';

export const SUPPORTED_SCHEMA_VERSIONS = ['1.0'] as const;

// ===== Input Schema =====

export const InputTypeSchema = z.enum([
  'string',
  'integer',
  'number',
  'boolean',
  'file',
  'array',
  'object',
]);

const InputDefinitionSchema = z
  .object({
    type: InputTypeSchema.default('string'),
    description: z.string().optional(),
    required: z.boolean().default(true),
    default: z.unknown().optional(),
    enum: z.array(z.union([z.string(), z.number(), z.boolean()])).optional(),
    pattern: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    secret: z.boolean().default(false),
  })
  .strict();

function inferInputType(value: unknown): z.infer<typeof InputTypeSchema> {
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  if (Array.isArray(value)) return 'array';
  if (value !== null && typeof value === 'object') return 'object';
  return 'string';
}

/**
 * An input is either a full definition or a bare default value (`inputs: { target: "localhost" }`)
 */
export const InputSchema = z.preprocess((value) => {
  if (value !== null && typeof value === 'object' && !Array.isArray(value) && 'type' in value) {
    return value;
  }
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    const keys = Object.keys(value);
    const definitionKeys = ['description', 'required', 'default', 'enum', 'pattern', 'min', 'max', 'secret'];
    if (keys.length > 0 && keys.every((key) => definitionKeys.includes(key))) return value;
  }
  if (value === null) return { type: 'string', required: false };
  return { type: inferInputType(value), default: value, required: false };
}, InputDefinitionSchema);

// ===== Retry Schema =====

export const RetrySchema = z
  .object({
    max_attempts: z.number().int().min(1).max(10).default(3),
    backoff: z.enum(['linear', 'exponential']).default('exponential'),
    /** Seconds before the first retry */
    delay: z.number().min(0).default(1),
    max_delay: z.number().min(0).default(60),
    /** Error kinds or type names to retry; all failures when omitted */
    retry_on: z.array(z.string()).optional(),
  })
  .strict();

// ===== Guardrails Schema =====

export const GuardrailOnFailSchema = z.string().min(1);

export const GuardrailsSchema = z
  .object({
    input: z.record(z.record(z.unknown()).nullable()).optional(),
    output: z.record(z.record(z.unknown()).nullable()).optional(),
    /** abort | retry | continue | <step id> */
    on_fail: GuardrailOnFailSchema.optional(),
    max_retries: z.number().int().min(0).max(10).optional(),
  })
  .strict();

/** A step may override guardrails or disable them with a falsy value */
const StepGuardrailsSchema = z.union([GuardrailsSchema, z.literal(false), z.null()]);

// ===== Step Schema =====

const ConditionSchema = z.union([z.string(), z.boolean()]);

export const StepSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    run: z.union([z.string(), z.array(z.string()).min(1)]).optional(),
    uses: z.string().min(1).optional(),
    with: z.record(z.unknown()).optional(),
    if: ConditionSchema.optional(),
    loop: z.union([z.string(), z.array(z.unknown())]).optional(),
    break_if: ConditionSchema.optional(),
    continue_on_error: z.boolean().default(false),
    max_iterations: z.number().int().min(1).default(10_000),
    max_results: z.number().int().min(0).default(100),
    max_errors: z.number().int().min(0).default(50),
    on_failure: z.string().optional(),
    timeout: z.number().int().min(1).max(86_400).optional(),
    capture_mode: z.enum(['memory', 'file', 'none']).default('memory'),
    interactive: z.boolean().default(false),
    guardrails: StepGuardrailsSchema.optional(),
    retry: RetrySchema.optional(),
  })
  .strict()
  .superRefine((step, ctx) => {
    const actions = Number(step.run !== undefined) + Number(step.uses !== undefined);
    if (actions === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Step must have either "run" or "uses"',
      });
    } else if (actions > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Step cannot have both "run" and "uses"',
      });
    }
    if (step.with !== undefined && step.run !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '"with" is only valid together with "uses"',
        path: ['with'],
      });
    }
    if (step.break_if !== undefined && step.loop === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: '"break_if" requires "loop"',
        path: ['break_if'],
      });
    }
  });

const StepListSchema = z.array(StepSchema);

// ===== Job Schema =====

export const JobSchema = z
  .object({
    name: z.string().optional(),
    steps: StepListSchema.min(1, 'Job must have at least one step'),
    finally: StepListSchema.optional(),
    on_complete: StepListSchema.optional(),
    on_failure: StepListSchema.optional(),
  })
  .strict();

// ===== Workflow Schema =====

export const WorkflowSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    version: z.union([z.string(), z.number()]).transform(String).optional(),
    author: z.string().optional(),
    schema_version: z
      .union([z.string(), z.number()])
      .transform((value) => (typeof value === 'number' ? value.toFixed(1) : value))
      .default('1.0'),
    inputs: z.record(InputSchema).optional(),
    env: z.record(z.union([z.string(), z.number(), z.boolean()]).transform(String)).optional(),
    jobs: z
      .record(JobSchema)
      .refine((jobs) => Object.keys(jobs).length > 0, 'Workflow must have at least one job'),
    finally: StepListSchema.optional(),
    on_complete: StepListSchema.optional(),
    on_failure: StepListSchema.optional(),
    guardrails: GuardrailsSchema.optional(),
    shell_safety: z.enum(['strict', 'auto_quote']).default('strict'),
    default_timeout: z.number().int().min(1).max(86_400).default(300),
  })
  .strict()
  .superRefine((data, ctx) => {
    if (!(SUPPORTED_SCHEMA_VERSIONS as readonly string[]).includes(data.schema_version)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unsupported schema version "${data.schema_version}". Supported: ${SUPPORTED_SCHEMA_VERSIONS.join(', ')}`,
        path: ['schema_version'],
      });
    }
  });

export type InputType = z.infer<typeof InputTypeSchema>;
export type InputDefinition = z.infer<typeof InputDefinitionSchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
export type GuardrailsConfig = z.infer<typeof GuardrailsSchema>;
export type Step = z.infer<typeof StepSchema>;
export type Job = z.infer<typeof JobSchema>;
export type Workflow = z.infer<typeof WorkflowSchema>;

/** A step after id assignment */
export type ResolvedStep = Step & { id: string };

export type StepSection = 'steps' | 'on_complete' | 'on_failure' | 'finally';

export const STEP_SECTIONS: readonly StepSection[] = ['steps', 'on_complete', 'on_failure', 'finally'];

export interface JobDefinition {
  name?: string;
  steps: ResolvedStep[];
  on_complete: ResolvedStep[];
  on_failure: ResolvedStep[];
  finally: ResolvedStep[];
}

/**
 * Validated document with every step id assigned and every step list present
 */
export type WorkflowDefinition = Omit<Workflow, 'jobs' | 'finally' | 'on_complete' | 'on_failure'> & {
  jobs: Record<string, JobDefinition>;
  on_complete: ResolvedStep[];
  on_failure: ResolvedStep[];
  finally: ResolvedStep[];
};

export interface StepList {
  /** Owning job, or null for document-level lists */
  job: string | null;
  section: StepSection;
  steps: ResolvedStep[];
  /** Dotted location used in validation messages, e.g. `jobs.main.steps` */
  location: string;
}

/**
 * Every step list of a definition in execution order: each job's lists, then the document's
 */
export function listStepLists(workflow: WorkflowDefinition): StepList[] {
  const lists: StepList[] = [];
  for (const [jobName, job] of Object.entries(workflow.jobs)) {
    for (const section of STEP_SECTIONS) {
      lists.push({
        job: jobName,
        section,
        steps: job[section],
        location: `jobs.${jobName}.${section}`,
      });
    }
  }
  for (const section of STEP_SECTIONS) {
    if (section === 'steps') continue;
    lists.push({ job: null, section, steps: workflow[section], location: section });
  }
  return lists;
}
