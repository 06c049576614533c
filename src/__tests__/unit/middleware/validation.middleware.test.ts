import request from 'supertest';
import express from 'express';
import { z } from 'zod';
import { validate } from '../../../middleware/validation.middleware';
import { CurriculumRequestSchema } from '../../../utils/zod-schemas/curriculum.schema';

describe('validate', () => {
  function makeApp<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
    const app = express();
    app.use(express.json());
    app.post('/v', validate(schema), (req, res) => {
      res.json({ body: req.body });
    });
    return app;
  }

  it('replaces the body with the transformed value', async () => {
    const res = await request(makeApp(CurriculumRequestSchema))
      .post('/v')
      .send({ grade_level: '5', skill_areas: ['anger_management', 'anger_management'], score: 40 })
      .expect(200);

    expect(res.body.body).toEqual({ gradeLevel: '5', skillAreas: ['anger_management'], score: 40 });
  });

  it('answers 400 with every issue', async () => {
    const res = await request(makeApp(CurriculumRequestSchema))
      .post('/v')
      .send({ grade_level: '5', skill_areas: [], score: 140 })
      .expect(400);

    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details.source).toBe('body');
    expect(res.body.error.details.issues.map((i: { path: string }) => i.path)).toEqual(['skill_areas', 'score']);
  });

  it('answers 500 when the schema itself throws', async () => {
    const exploding = z.unknown().transform(() => {
      throw new Error('bug in transform');
    });

    const res = await request(makeApp(exploding)).post('/v').send({}).expect(500);

    expect(res.body.error.code).toBe('INTERNAL_ERROR');
  });
});
