/**
 * Intervention Service
 *
 * Pipeline for EMT intervention plans:
 * aggregate scores → build prompt → model call → safety guardrail → schema validation.
 * The streaming variant shares the first two stages. Streamed text is held back
 * until a line or sentence ends (or MAX_HELD_CHARS accumulate), screened, and
 * only then forwarded, redacted where the verdict says so. The whole text is
 * screened again before the completion event.
 */

import type { AggregatedScores, InterventionSubmission } from '../types/intervention.types';
import type { GatewayCallResult, StreamEvent } from '../types/gateway.types';
import type { SafetyContext, SafetyVerdict } from '../types/safety.types';
import { ErrorCodes } from '../types/api.types';
import type { InterventionPlan } from '../utils/zod-schemas/intervention.schema';
import { logger } from '../utils/logger';
import type { ModelGateway } from './model-gateway.service';
import type { OutputSchemaValidator } from './output-schema-validator.service';
import type { BuiltPrompt, PromptBuilder } from './prompt-builder.service';
import type { SafetyGuardrail } from './safety-guardrail.service';
import { aggregateScores } from './score-aggregator.service';
import type { StreamingGateway } from './streaming-gateway.service';

export interface InterventionServiceDeps {
  prompts: PromptBuilder;
  gateway: ModelGateway;
  streaming: StreamingGateway;
  guardrail: SafetyGuardrail;
  validator: OutputSchemaValidator<InterventionPlan>;
}

export interface InterventionResult {
  plan: InterventionPlan;
  aggregated: AggregatedScores;
  templateId: string;
  verdict: SafetyVerdict;
  call: GatewayCallResult;
}

export class InterventionService {
  constructor(private readonly deps: InterventionServiceDeps) {}

  async generatePlan(submission: InterventionSubmission): Promise<InterventionResult> {
    const { aggregated, built, context } = this.prepare(submission);

    const call = await this.deps.gateway.complete(built.prompt);
    const verdict = await this.deps.guardrail.screen(call.text, context);
    if (verdict.decision === 'reject') {
      throw this.deps.guardrail.rejection(verdict);
    }
    const plan = await this.deps.validator.validate(verdict.text, context);

    logger.info('intervention:plan-generated', {
      classId: submission.metadata.classId,
      templateId: built.templateId,
      attempts: call.attempts,
      latencyMs: call.latencyMs,
      decision: verdict.decision,
      strategies: plan.strategies.length,
    });
    return { plan, aggregated, templateId: built.templateId, verdict, call };
  }

  /**
   * Prompt building happens before this returns, so a missing template throws
   * here rather than inside the stream.
   */
  streamPlan(submission: InterventionSubmission, signal?: AbortSignal): AsyncGenerator<StreamEvent, void, undefined> {
    const { built, context } = this.prepare(submission);
    logger.info('intervention:stream-started', {
      classId: submission.metadata.classId,
      templateId: built.templateId,
    });
    return this.screenStream(this.deps.streaming.stream(built.prompt, signal ? { signal } : {}), context);
  }

  private prepare(submission: InterventionSubmission): {
    aggregated: AggregatedScores;
    built: BuiltPrompt;
    context: SafetyContext;
  } {
    const { metadata } = submission;
    const aggregated = aggregateScores(submission.scores);
    const built = this.deps.prompts.buildInterventionPrompt({ scores: aggregated, metadata });
    const context: SafetyContext = {
      source: 'intervention',
      ...(metadata.gradeLevel !== undefined ? { gradeLevel: metadata.gradeLevel } : {}),
    };
    return { aggregated, built, context };
  }

  /**
   * Forwards only screened text. A reject on any segment, or on the whole text
   * at the end, stops the stream with a single SAFETY_REJECTION event.
   */
  private async *screenStream(
    events: AsyncGenerator<StreamEvent, void, undefined>,
    context: SafetyContext
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const segmentContext: SafetyContext = { ...context, source: 'intervention:stream' };
    let assembled = '';
    let held = '';
    let completed = false;

    for await (const event of events) {
      if ('token' in event) {
        assembled += event.token;
        held += event.token;
        const end = releasableLength(held);
        if (end === 0) continue;
        const verdict = this.deps.guardrail.evaluate(held.slice(0, end), segmentContext);
        held = held.slice(end);
        if (verdict.decision === 'reject') {
          yield this.rejectionEvent(verdict);
          return;
        }
        yield { token: verdict.text };
        continue;
      }
      if (event.status === 'error') {
        yield event;
        return;
      }
      // Leaving the loop lets the upstream stream release its pool slot before the final screening
      completed = true;
      break;
    }
    if (!completed) return;

    if (held) {
      const verdict = this.deps.guardrail.evaluate(held, segmentContext);
      if (verdict.decision === 'reject') {
        yield this.rejectionEvent(verdict);
        return;
      }
      yield { token: verdict.text };
    }

    const overall = await this.deps.guardrail.screen(assembled, { ...context, source: 'intervention:stream-complete' });
    if (overall.decision === 'reject') {
      yield this.rejectionEvent(overall);
      return;
    }
    yield { status: 'complete' };
  }

  private rejectionEvent(verdict: SafetyVerdict): StreamEvent {
    const rejection = this.deps.guardrail.rejection(verdict);
    return { status: 'error', error: { code: ErrorCodes.SAFETY_REJECTION, message: rejection.message } };
  }
}

/** Upper bound on unscreened text held back while waiting for a line or sentence to end. */
export const MAX_HELD_CHARS = 400;

/** Index just past the last line end, or sentence end followed by whitespace; -1 when none. */
function lastBoundary(text: string): number {
  for (let i = text.length - 1; i >= 0; i--) {
    const ch = text[i];
    if (ch === '\n') return i + 1;
    if ((ch === '.' || ch === '!' || ch === '?') && i + 1 < text.length && /\s/.test(text[i + 1])) return i + 1;
  }
  return -1;
}

/**
 * How much of the held text can be screened and released now. Past the cap
 * the cut falls before the trailing word so a term is not split across
 * segments; a single over-long word is released whole.
 */
export function releasableLength(held: string): number {
  const boundary = lastBoundary(held);
  if (boundary > 0) return boundary;
  if (held.length < MAX_HELD_CHARS) return 0;
  const lastSpace = held.search(/\s\S*$/);
  return lastSpace > 0 ? lastSpace : held.length;
}
