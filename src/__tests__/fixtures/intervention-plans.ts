import type { InterventionPlan } from '../../utils/zod-schemas/intervention.schema';
import type { CurriculumResponse } from '../../utils/zod-schemas/curriculum.schema';
import type { InterventionSubmissionBody } from '../../utils/zod-schemas/intervention.schema';

export const SAFE_PLAN: InterventionPlan = {
  analysis: 'The class scores lowest on situation-to-expression tasks.',
  strategies: [
    {
      activity: 'Story Feelings Circle',
      implementation: ['Read a short story aloud', 'Pause and ask how the character feels'],
      expected_outcomes: ['Students link situations to feelings'],
      time_allocation: '20 minutes, three times a week',
      resources: ['Picture books', 'Feeling face cards'],
    },
  ],
  timeline: {
    week1: ['Introduce feeling faces'],
    week2: ['Story circles'],
  },
  success_metrics: {
    quantitative: ['Raise the class average by 10 points'],
    qualitative: ['Students name feelings during stories'],
    assessment_methods: ['Repeat the assessment after four weeks'],
  },
  resources: ['Picture books', 'Feeling face cards'],
};

export function planWithAnalysis(analysis: string): InterventionPlan {
  return { ...SAFE_PLAN, analysis };
}

export const SAFE_CURRICULUM: CurriculumResponse = {
  recommended_interventions: [
    {
      name: 'Heart Breathing',
      grade_levels: ['2', '5'],
      skill_area: 'emotional_regulation',
      summary: 'A slow breathing routine for calming down.',
      implementation: {
        steps: ['Sit quietly', 'Breathe in for four counts', 'Breathe out for four counts'],
        time_allocation: '5 minutes',
      },
      intended_purpose: 'Help students settle strong feelings.',
    },
  ],
  skill_focus: ['emotional_regulation'],
  implementation_order: ['Heart Breathing'],
};

/** Wire body with area EMT2 left empty. */
export const SUBMISSION_BODY: InterventionSubmissionBody = {
  scores: {
    EMT1: [65, 70, 68],
    EMT2: [],
    EMT3: [72, 75, 70],
    EMT4: [63, 65, 64],
  },
  metadata: {
    class_id: 'class-4b',
    deficient_area: 'EMT2',
    num_students: 3,
    grade_level: 2,
  },
};
