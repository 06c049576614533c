import type { CurriculumRequest } from '../types/curriculum.types';
import type { GatewayCallResult } from '../types/gateway.types';
import type { SafetyVerdict } from '../types/safety.types';
import type { CurriculumResponse } from '../utils/zod-schemas/curriculum.schema';
import { logger } from '../utils/logger';
import type { ModelGateway } from './model-gateway.service';
import type { OutputSchemaValidator } from './output-schema-validator.service';
import type { PromptBuilder } from './prompt-builder.service';
import type { SafetyGuardrail } from './safety-guardrail.service';

export interface CurriculumServiceDeps {
  prompts: PromptBuilder;
  /** Gateway registered under the `curriculum` liveness key. */
  gateway: ModelGateway;
  guardrail: SafetyGuardrail;
  validator: OutputSchemaValidator<CurriculumResponse>;
}

export interface CurriculumResult {
  recommendations: CurriculumResponse;
  templateId: string;
  verdict: SafetyVerdict;
  call: GatewayCallResult;
}

export class CurriculumService {
  constructor(private readonly deps: CurriculumServiceDeps) {}

  async recommend(request: CurriculumRequest): Promise<CurriculumResult> {
    const built = this.deps.prompts.buildCurriculumPrompt(request);
    const context = { gradeLevel: Number(request.gradeLevel), source: 'curriculum' };

    const call = await this.deps.gateway.complete(built.prompt);
    const verdict = await this.deps.guardrail.screen(call.text, context);
    if (verdict.decision === 'reject') {
      throw this.deps.guardrail.rejection(verdict);
    }
    const recommendations = await this.deps.validator.validate(verdict.text, context);

    logger.info('curriculum:recommendations-generated', {
      gradeLevel: request.gradeLevel,
      skillAreas: request.skillAreas,
      templateId: built.templateId,
      attempts: call.attempts,
      decision: verdict.decision,
      interventions: recommendations.recommended_interventions.length,
    });
    return { recommendations, templateId: built.templateId, verdict, call };
  }
}
