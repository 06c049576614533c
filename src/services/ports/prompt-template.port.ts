import type { EmtArea } from '../../types/intervention.types';
import type { GradeLevel, SkillArea } from '../../types/curriculum.types';

export interface InterventionPromptContext {
  area: EmtArea;
  classId: string;
  numStudents: number;
  /** Pre-formatted averages ("65.33%" or "no data"), in fixed area order. */
  averages: Record<EmtArea, string>;
  gradeLevel?: number;
}

export interface CurriculumPromptContext {
  gradeLevel: GradeLevel;
  skillAreas: SkillArea[];
  score: number;
}

/**
 * Source of prompt text. Returns null when nothing is registered for the
 * template id (or, for curriculum, nothing matches the requested skill areas).
 */
export interface PromptTemplateProvider {
  readonly name: string;
  renderIntervention(templateId: string, context: InterventionPromptContext): string | null;
  renderCurriculum(templateId: string, context: CurriculumPromptContext): string | null;
}
