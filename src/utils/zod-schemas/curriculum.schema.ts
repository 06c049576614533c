import { z } from 'zod';
import { GRADE_LEVELS, SKILL_AREAS, type CurriculumRequest } from '../../types/curriculum.types';

export const CurriculumRequestSchema = z
  .object({
    grade_level: z.enum(GRADE_LEVELS),
    skill_areas: z.array(z.enum(SKILL_AREAS)).min(1).max(SKILL_AREAS.length),
    score: z.number().min(0).max(100),
  })
  .transform(
    (body): CurriculumRequest => ({
      gradeLevel: body.grade_level,
      skillAreas: [...new Set(body.skill_areas)],
      score: body.score,
    })
  );

const nonEmptyText = z.string().trim().min(1);

export const CurriculumInterventionSchema = z.object({
  name: nonEmptyText,
  grade_levels: z.array(z.enum(GRADE_LEVELS)).min(1),
  skill_area: z.enum(SKILL_AREAS),
  summary: nonEmptyText,
  implementation: z.object({
    steps: z.array(nonEmptyText).min(1),
    materials: z.array(nonEmptyText).optional(),
    time_allocation: nonEmptyText.optional(),
  }),
  intended_purpose: nonEmptyText,
});

export const CurriculumResponseSchema = z.object({
  recommended_interventions: z.array(CurriculumInterventionSchema).min(1),
  skill_focus: z.array(nonEmptyText).min(1),
  implementation_order: z.array(nonEmptyText).min(1),
});

export type CurriculumIntervention = z.infer<typeof CurriculumInterventionSchema>;
export type CurriculumResponse = z.infer<typeof CurriculumResponseSchema>;
