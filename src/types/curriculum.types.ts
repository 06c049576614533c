export const SKILL_AREAS = ['emotional_awareness', 'emotional_regulation', 'anger_management'] as const;
export type SkillArea = (typeof SKILL_AREAS)[number];

export const GRADE_LEVELS = ['1', '2', '5'] as const;
export type GradeLevel = (typeof GRADE_LEVELS)[number];

export interface CurriculumRequest {
  gradeLevel: GradeLevel;
  skillAreas: SkillArea[];
  score: number;
}

// Catalogue entry loaded from data/templates/curriculum-interventions.json
export interface CurriculumCatalogueEntry {
  name: string;
  gradeLevels: GradeLevel[];
  skillArea: SkillArea;
  summary: string;
  implementation: string;
  purpose: string;
}
