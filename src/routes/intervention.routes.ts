import { Router } from 'express';
import { InterventionController } from '../controllers/intervention.controller';
import { validate } from '../middleware/validation.middleware';
import type { InterventionService } from '../services/intervention.service';
import { InterventionSubmissionSchema } from '../utils/zod-schemas/intervention.schema';

export function createInterventionRouter(service: InterventionService): Router {
  const router = Router();
  const controller = new InterventionController(service);

  /**
   * POST /api/v1/interventions
   * Generate a validated, safety-screened intervention plan
   */
  router.post('/', validate(InterventionSubmissionSchema), controller.createPlan.bind(controller));

  /**
   * POST /api/v1/interventions/stream
   * Stream plan tokens as Server-Sent Events
   */
  router.post('/stream', validate(InterventionSubmissionSchema), controller.streamPlan.bind(controller));

  return router;
}
