import { z } from 'zod';
import type { ContentReviewer, SafetyContext, SafetyViolation } from '../types/safety.types';
import { logger } from '../utils/logger';
import type { ModelGateway } from './model-gateway.service';
import { cleanJsonText } from './output-schema-validator.service';
import type { PromptBuilder } from './prompt-builder.service';

const ReviewReplySchema = z.object({
  is_safe: z.boolean(),
  reason: z.string().optional(),
  suggestion: z.string().optional(),
});

type ReviewReply = z.infer<typeof ReviewReplySchema>;

export const MODEL_REVIEW_CATEGORY = 'model-review';
export const REVIEW_UNAVAILABLE_CATEGORY = 'review-unavailable';

export interface ModelContentReviewerDeps {
  gateway: ModelGateway;
  prompts: PromptBuilder;
}

function parseReply(text: string): ReviewReply | null {
  let raw: unknown;
  try {
    raw = JSON.parse(cleanJsonText(text));
  } catch {
    return null;
  }
  const parsed = ReviewReplySchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Asks the model whether content suits a classroom. Fails closed: a failed
 * call or an unreadable reply is a critical finding, so the content is
 * rejected at every safety level.
 */
export class ModelContentReviewer implements ContentReviewer {
  constructor(private readonly deps: ModelContentReviewerDeps) {}

  async review(text: string, context: SafetyContext): Promise<SafetyViolation | null> {
    let reply: string;
    try {
      reply = (await this.deps.gateway.complete(this.deps.prompts.buildSafetyReviewPrompt(text))).text;
    } catch (error) {
      return this.unavailable(error instanceof Error ? error.message : String(error), context);
    }

    const verdict = parseReply(reply);
    if (verdict === null) return this.unavailable('review reply was not the expected JSON', context);
    if (verdict.is_safe) return null;

    return {
      layer: 'model-review',
      category: MODEL_REVIEW_CATEGORY,
      match: '',
      severity: 'critical',
      reason: verdict.reason ?? 'Content not appropriate for children',
      suggestion: verdict.suggestion ?? 'Review and revise content',
    };
  }

  private unavailable(reason: string, context: SafetyContext): SafetyViolation {
    logger.warn('content-review:unavailable', { source: context.source ?? 'unknown', reason });
    return {
      layer: 'model-review',
      category: REVIEW_UNAVAILABLE_CATEGORY,
      match: '',
      severity: 'critical',
      reason: 'Safety review could not be completed',
      suggestion: 'Retry the request',
    };
  }
}
