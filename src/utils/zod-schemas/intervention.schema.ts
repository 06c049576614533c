import { z } from 'zod';
import { EMT_AREAS, type InterventionSubmission } from '../../types/intervention.types';
import { aggregateScores, lowestScoringArea } from '../../services/score-aggregator.service';

const scoreList = z.array(z.number().min(0, 'Scores must be between 0 and 100').max(100, 'Scores must be between 0 and 100')).max(1000);

// Wire format keeps the snake_case field names published to API clients.
export const InterventionSubmissionSchema = z
  .object({
    scores: z
      .object({
        EMT1: scoreList.optional(),
        EMT2: scoreList.optional(),
        EMT3: scoreList.optional(),
        EMT4: scoreList.optional(),
      })
      .strict(),
    metadata: z.object({
      class_id: z.string().trim().min(1).max(100),
      /** Omitted: the lowest-scoring area with data is used. */
      deficient_area: z.enum(EMT_AREAS).optional(),
      num_students: z.number().int().positive().max(1000),
      grade_level: z.number().int().min(1).max(12).optional(),
    }),
  })
  .transform((body, ctx): InterventionSubmission => {
    const deficientArea = body.metadata.deficient_area ?? lowestScoringArea(aggregateScores(body.scores));
    if (deficientArea === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['metadata', 'deficient_area'],
        message: 'deficient_area is required when no area has scores',
      });
      return z.NEVER;
    }
    return {
      scores: body.scores,
      metadata: {
        classId: body.metadata.class_id,
        deficientArea,
        numStudents: body.metadata.num_students,
        ...(body.metadata.grade_level !== undefined ? { gradeLevel: body.metadata.grade_level } : {}),
      },
    };
  });

export type InterventionSubmissionBody = z.input<typeof InterventionSubmissionSchema>;

const nonEmptyText = z.string().trim().min(1);

export const InterventionStrategySchema = z.object({
  activity: nonEmptyText,
  implementation: z.array(nonEmptyText).min(1),
  expected_outcomes: z.array(nonEmptyText).min(1),
  time_allocation: nonEmptyText,
  resources: z.array(nonEmptyText),
});

export const SuccessMetricsSchema = z.object({
  quantitative: z.array(nonEmptyText).min(1),
  qualitative: z.array(nonEmptyText).min(1),
  assessment_methods: z.array(nonEmptyText).min(1),
});

export const InterventionPlanSchema = z.object({
  analysis: nonEmptyText,
  strategies: z.array(InterventionStrategySchema).min(1).max(5),
  timeline: z
    .record(z.string(), z.array(nonEmptyText))
    .refine((weeks) => Object.keys(weeks).length > 0, { message: 'timeline must contain at least one week' }),
  success_metrics: SuccessMetricsSchema,
  resources: z.array(nonEmptyText),
});

export type InterventionStrategy = z.infer<typeof InterventionStrategySchema>;
export type InterventionPlan = z.infer<typeof InterventionPlanSchema>;
