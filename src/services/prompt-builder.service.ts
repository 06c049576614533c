import { isEmtArea, type EmtArea, type InterventionRequest } from '../types/intervention.types';
import type { CurriculumRequest } from '../types/curriculum.types';
import { TemplateNotFoundError } from '../utils/errors';
import { describeAverage } from './score-aggregator.service';
import type { PromptTemplateProvider } from './ports/prompt-template.port';

export interface BuiltPrompt {
  templateId: string;
  prompt: string;
}

/**
 * Chooses the template for a request and asks the provider for its text.
 * A missing template is a configuration gap and is never retried.
 */
export class PromptBuilder {
  constructor(private readonly templates: PromptTemplateProvider) {}

  buildInterventionPrompt(request: InterventionRequest): BuiltPrompt {
    const { scores, metadata } = request;
    const templateId = `intervention/${metadata.deficientArea}`;
    if (!isEmtArea(metadata.deficientArea)) {
      throw new TemplateNotFoundError(templateId, `Unknown assessment area "${metadata.deficientArea}"`);
    }
    const averages: Record<EmtArea, string> = {
      EMT1: describeAverage(scores.EMT1),
      EMT2: describeAverage(scores.EMT2),
      EMT3: describeAverage(scores.EMT3),
      EMT4: describeAverage(scores.EMT4),
    };

    const prompt = this.templates.renderIntervention(templateId, {
      area: metadata.deficientArea,
      classId: metadata.classId,
      numStudents: metadata.numStudents,
      averages,
      ...(metadata.gradeLevel !== undefined ? { gradeLevel: metadata.gradeLevel } : {}),
    });
    if (prompt === null) throw new TemplateNotFoundError(templateId);
    return { templateId, prompt };
  }

  buildCurriculumPrompt(request: CurriculumRequest): BuiltPrompt {
    const templateId = `curriculum/grade-${request.gradeLevel}`;
    const prompt = this.templates.renderCurriculum(templateId, {
      gradeLevel: request.gradeLevel,
      skillAreas: request.skillAreas,
      score: request.score,
    });
    if (prompt === null) {
      throw new TemplateNotFoundError(
        templateId,
        `No curriculum interventions registered for grade ${request.gradeLevel} and skill areas ${request.skillAreas.join(', ')}`
      );
    }
    return { templateId, prompt };
  }

  buildRepairPrompt(previousOutput: string, issues: string[]): string {
    return `The JSON below does not match the required structure.

Problems found:
${issues.map((i) => `- ${i}`).join('\n')}

Return ONLY the corrected JSON object. Keep the content, fix the structure, and add no commentary.

${previousOutput}`;
  }

  buildSafetyReviewPrompt(content: string): string {
    return `You review educational material written for children.

Decide whether a teacher could use the content below with children in a classroom.

CONTENT:
${content}

Respond with ONLY a JSON object:
{"is_safe": true}

or, when it is not appropriate:
{"is_safe": false, "reason": "short explanation", "suggestion": "how to make it appropriate"}`;
  }
}
