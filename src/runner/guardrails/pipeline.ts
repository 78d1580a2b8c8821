import { z } from 'zod';
import type { GuardrailsConfig } from '../../parser/schema.ts';
import { formatZodError } from '../../parser/workflow-validator.ts';
import { type Logger, SilentLogger } from '../../utils/logger.ts';
import { ActionError, ActionErrorKind } from '../errors.ts';
import { type ScannerRegistry, createDefaultScannerRegistry } from './scanner-registry.ts';
import type { GuardrailStage, ScanResult, Severity } from './types.ts';

const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export interface GuardrailPipelineOptions {
  registry?: ScannerRegistry;
  logger?: Logger;
}

/**
 * Runs the scanners configured for one stage, in declaration order. Each scanner sees the
 * payload as left by the previous one, so redactions accumulate; the first violation stops
 * the scan.
 */
export class GuardrailPipeline {
  private readonly registry: ScannerRegistry;
  private readonly logger: Logger;
  private readonly warned = new Set<string>();

  constructor(options: GuardrailPipelineOptions = {}) {
    this.registry = options.registry ?? createDefaultScannerRegistry();
    this.logger = options.logger ?? new SilentLogger();
  }

  scan(config: GuardrailsConfig | null, stage: GuardrailStage, payload: unknown): ScanResult {
    const scanners = config?.[stage];
    if (!scanners) return { passed: true, payload };

    let current = payload;
    for (const [name, rawParams] of Object.entries(scanners)) {
      const scanner = this.registry.get(name);
      if (!scanner) {
        if (!this.warned.has(name)) {
          this.warned.add(name);
          this.logger.warn(`⚠️  Unknown guardrail scanner "${name}", skipping`);
        }
        continue;
      }

      const { severity: severityOverride, ...rest } = rawParams ?? {};
      const parsed = scanner.params.safeParse(rest);
      if (!parsed.success) {
        throw new ActionError(
          `Invalid params for guardrail scanner "${name}":\n${formatZodError(parsed.error)}`,
          ActionErrorKind.INVALID_INPUT
        );
      }
      const severity = GuardrailPipeline.severityOf(name, severityOverride, scanner.severity);

      const outcome = scanner.scan(current, parsed.data);
      if (!outcome.ok) {
        return { passed: false, violation: { scanner: name, severity, message: outcome.message } };
      }
      current = outcome.payload;
    }
    return { passed: true, payload: current };
  }

  private static severityOf(name: string, override: unknown, fallback: Severity): Severity {
    if (override === undefined) return fallback;
    const parsed = SeveritySchema.safeParse(override);
    if (!parsed.success) {
      throw new ActionError(
        `Invalid severity for guardrail scanner "${name}": ${String(override)}`,
        ActionErrorKind.INVALID_INPUT
      );
    }
    return parsed.data;
  }
}
