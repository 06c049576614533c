/**
 * Composition root: builds every collaborator once from an AppConfig.
 * Tests pass overrides (fetch, clock, data) instead of touching the environment.
 */

import type { AppConfig } from '../config/app.config';
import type { FetchLike } from '../types/gateway.types';
import {
  loadStaticTemplateData,
  StaticPromptTemplateProvider,
} from '../adapters/templates/static-prompt-templates';
import type { PromptTemplateProvider } from '../services/ports/prompt-template.port';
import { CurriculumService } from '../services/curriculum.service';
import { HealthMonitor } from '../services/health-monitor.service';
import { InterventionService } from '../services/intervention.service';
import { LivenessRegistry } from '../services/liveness-registry.service';
import { ModelCallPool } from '../services/model-call-pool.service';
import { ModelContentReviewer } from '../services/model-content-reviewer.service';
import { ModelGateway } from '../services/model-gateway.service';
import {
  LenientJsonRepair,
  ModelReformatRepair,
  OutputSchemaValidator,
  type RepairStrategy,
} from '../services/output-schema-validator.service';
import { PromptBuilder } from '../services/prompt-builder.service';
import {
  loadBannedTerms,
  SafetyGuardrail,
  type BannedTermCategory,
} from '../services/safety-guardrail.service';
import { StreamingGateway } from '../services/streaming-gateway.service';
import { InterventionPlanSchema } from '../utils/zod-schemas/intervention.schema';
import { CurriculumResponseSchema } from '../utils/zod-schemas/curriculum.schema';
import { logger } from '../utils/logger';

export const MODEL_SUBSYSTEM = 'model';
export const CURRICULUM_SUBSYSTEM = 'curriculum';

export interface CompositionOverrides {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  templates?: PromptTemplateProvider;
  bannedTerms?: BannedTermCategory[];
}

export class CompositionRoot {
  private readonly _liveness: LivenessRegistry;
  private readonly _pool: ModelCallPool;
  private readonly _interventionService: InterventionService;
  private readonly _curriculumService: CurriculumService;
  private readonly _healthMonitor: HealthMonitor;

  constructor(private readonly config: AppConfig, overrides: CompositionOverrides = {}) {
    this._liveness = new LivenessRegistry();
    this._pool = new ModelCallPool(config.pool);

    const gatewayDeps = {
      generation: config.generation,
      retry: config.retry,
      pool: this._pool,
      liveness: this._liveness,
      ...(overrides.fetchImpl ? { fetchImpl: overrides.fetchImpl } : {}),
      ...(overrides.sleep ? { sleep: overrides.sleep } : {}),
      ...(overrides.random ? { random: overrides.random } : {}),
    };
    const modelGateway = new ModelGateway({ ...gatewayDeps, subsystem: MODEL_SUBSYSTEM, endpoint: config.model });
    const curriculumGateway = new ModelGateway({
      ...gatewayDeps,
      subsystem: CURRICULUM_SUBSYSTEM,
      endpoint: config.curriculumModel,
    });
    const streamingGateway = new StreamingGateway({
      subsystem: MODEL_SUBSYSTEM,
      endpoint: config.model,
      generation: config.generation,
      chunkTimeoutMs: config.streamChunkTimeoutMs,
      pool: this._pool,
      liveness: this._liveness,
      ...(overrides.fetchImpl ? { fetchImpl: overrides.fetchImpl } : {}),
    });

    const prompts = new PromptBuilder(overrides.templates ?? new StaticPromptTemplateProvider(loadStaticTemplateData()));
    const guardrail = new SafetyGuardrail({
      level: config.safetyLevel,
      bannedTerms: overrides.bannedTerms ?? loadBannedTerms(),
      includeViolationDetails: config.safetyIncludeViolationDetails,
      ...(config.safetyModelReview ? { reviewer: new ModelContentReviewer({ gateway: modelGateway, prompts }) } : {}),
    });
    const repairFor = (gateway: ModelGateway): RepairStrategy =>
      config.repairStrategy === 'reprompt'
        ? new ModelReformatRepair({ gateway, prompts, guardrail })
        : new LenientJsonRepair();

    this._interventionService = new InterventionService({
      prompts,
      gateway: modelGateway,
      streaming: streamingGateway,
      guardrail,
      validator: new OutputSchemaValidator(InterventionPlanSchema, repairFor(modelGateway)),
    });
    this._curriculumService = new CurriculumService({
      prompts,
      gateway: curriculumGateway,
      guardrail,
      validator: new OutputSchemaValidator(CurriculumResponseSchema, repairFor(curriculumGateway)),
    });
    this._healthMonitor = new HealthMonitor({
      liveness: this._liveness,
      subsystems: [MODEL_SUBSYSTEM, CURRICULUM_SUBSYSTEM],
      probes: [modelGateway, curriculumGateway],
    });

    logger.info('composition-root:ready', {
      provider: config.model.provider,
      model: config.model.model,
      curriculumModel: config.curriculumModel.model,
      safetyLevel: config.safetyLevel,
      safetyModelReview: config.safetyModelReview,
      repairStrategy: config.repairStrategy,
      maxConcurrent: config.pool.maxConcurrent,
      maxQueued: config.pool.maxQueued,
    });
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLivenessRegistry(): LivenessRegistry {
    return this._liveness;
  }

  getInterventionService(): InterventionService {
    return this._interventionService;
  }

  getCurriculumService(): CurriculumService {
    return this._curriculumService;
  }

  getHealthMonitor(): HealthMonitor {
    return this._healthMonitor;
  }

  async shutdown(): Promise<void> {
    await this._pool.stop();
  }
}
