import { Router } from 'express';
import { CurriculumController } from '../controllers/curriculum.controller';
import { validate } from '../middleware/validation.middleware';
import type { CurriculumService } from '../services/curriculum.service';
import { CurriculumRequestSchema } from '../utils/zod-schemas/curriculum.schema';

export function createCurriculumRouter(service: CurriculumService): Router {
  const router = Router();
  const controller = new CurriculumController(service);

  /**
   * POST /api/v1/curriculum
   * Recommend curriculum interventions for a grade and skill areas
   */
  router.post('/', validate(CurriculumRequestSchema), controller.recommend.bind(controller));

  return router;
}
