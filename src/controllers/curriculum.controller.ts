import type { NextFunction, Request, Response } from 'express';
import type { CurriculumRequest } from '../types/curriculum.types';
import type { CurriculumService } from '../services/curriculum.service';
import { ok } from '../utils/api-response';

export class CurriculumController {
  constructor(private readonly service: CurriculumService) {}

  /** POST /api/v1/curriculum */
  async recommend(req: Request, res: Response, next: NextFunction) {
    try {
      const request: CurriculumRequest = req.body;
      const result = await this.service.recommend(request);
      return ok(res, {
        ...result.recommendations,
        template_id: result.templateId,
        safety: {
          decision: result.verdict.decision,
          severity: result.verdict.severity,
          violations: result.verdict.violations.length,
        },
      });
    } catch (error) {
      return next(error);
    }
  }
}
