/**
 * Output Schema Validator
 *
 * Turns guardrail-cleared model text into a typed object. A direct parse is
 * tried first; on failure exactly one repair is attempted through the injected
 * strategy, then the issues surface as SchemaMismatchError. Required fields are
 * never filled in.
 */

import type { z } from 'zod';
import type { SafetyContext } from '../types/safety.types';
import { getSchemaRepairCounter } from '../metrics/gateway.metrics';
import { mapZodIssues } from '../utils/api-response';
import { SchemaMismatchError, type SchemaIssue } from '../utils/errors';
import { logger } from '../utils/logger';
import type { ModelGateway } from './model-gateway.service';
import type { PromptBuilder } from './prompt-builder.service';
import type { SafetyGuardrail } from './safety-guardrail.service';

export interface RepairStrategy {
  readonly name: string;
  /** Produces one replacement candidate for text that failed validation. */
  repair(text: string, issues: SchemaIssue[], context?: SafetyContext): Promise<string>;
}

type ParseOutcome<T> = { ok: true; value: T } | { ok: false; issues: SchemaIssue[] };

/** Strips code fences, keeps the outermost object and drops trailing commas. */
export function cleanJsonText(text: string): string {
  let cleaned = text.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  if (start !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }
  return cleaned.replace(/,\s*([}\]])/g, '$1');
}

export class LenientJsonRepair implements RepairStrategy {
  readonly name = 'extract';

  async repair(text: string): Promise<string> {
    return cleanJsonText(text);
  }
}

export interface ModelReformatRepairDeps {
  gateway: ModelGateway;
  prompts: PromptBuilder;
  guardrail: SafetyGuardrail;
}

/**
 * Asks the model to reformat its own output. The call runs with the gateway's
 * full retry budget, separate from the call that produced the original text,
 * and the reply goes back through the guardrail before it is parsed.
 */
export class ModelReformatRepair implements RepairStrategy {
  readonly name = 'reprompt';

  constructor(private readonly deps: ModelReformatRepairDeps) {}

  async repair(text: string, issues: SchemaIssue[], context: SafetyContext = {}): Promise<string> {
    const prompt = this.deps.prompts.buildRepairPrompt(
      text,
      issues.map((i) => `${i.path || '(root)'}: ${i.message}`)
    );
    const result = await this.deps.gateway.complete(prompt);
    const verdict = await this.deps.guardrail.screen(result.text, {
      ...context,
      source: `${context.source ?? 'output'}:repair`,
    });
    if (verdict.decision === 'reject') {
      throw this.deps.guardrail.rejection(verdict);
    }
    return cleanJsonText(verdict.text);
  }
}

export class OutputSchemaValidator<T> {
  private readonly repairs = getSchemaRepairCounter();

  constructor(
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly repairStrategy: RepairStrategy
  ) {}

  async validate(text: string, context?: SafetyContext): Promise<T> {
    const first = this.parse(text);
    if (first.ok) return first.value;

    logger.warn('schema-validator:repair', {
      strategy: this.repairStrategy.name,
      issues: first.issues.length,
      source: context?.source ?? 'unknown',
    });
    const repaired = await this.repairStrategy.repair(text, first.issues, context);
    const second = this.parse(repaired);
    if (second.ok) {
      this.repairs.inc({ strategy: this.repairStrategy.name, result: 'repaired' });
      return second.value;
    }

    this.repairs.inc({ strategy: this.repairStrategy.name, result: 'failed' });
    logger.error('schema-validator:mismatch', {
      strategy: this.repairStrategy.name,
      issues: second.issues,
      source: context?.source ?? 'unknown',
    });
    throw new SchemaMismatchError(second.issues);
  }

  private parse(text: string): ParseOutcome<T> {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return {
        ok: false,
        issues: [{ path: '', message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` }],
      };
    }
    const parsed = this.schema.safeParse(raw);
    return parsed.success ? { ok: true, value: parsed.data } : { ok: false, issues: mapZodIssues(parsed.error) };
  }
}
