import {
  loadStaticTemplateData,
  StaticPromptTemplateProvider,
} from '../../../adapters/templates/static-prompt-templates';
import { PromptBuilder } from '../../../services/prompt-builder.service';
import { aggregateScores } from '../../../services/score-aggregator.service';
import { TemplateNotFoundError } from '../../../utils/errors';

describe('PromptBuilder', () => {
  const data = loadStaticTemplateData();
  const scores = aggregateScores({ EMT1: [65, 70, 68], EMT2: [], EMT3: [72, 75, 70], EMT4: [63, 65, 64] });

  describe('buildInterventionPrompt', () => {
    it('selects the template for the deficient area and renders averages', () => {
      const builder = new PromptBuilder(new StaticPromptTemplateProvider(data));

      const built = builder.buildInterventionPrompt({
        scores,
        metadata: { deficientArea: 'EMT2', classId: 'class-4b', numStudents: 3 },
      });

      expect(built.templateId).toBe('intervention/EMT2');
      expect(built.prompt).toContain('- EMT1 (Visual Emotion Matching): 67.67%');
      expect(built.prompt).toContain('- EMT2 (Situation-to-Expression): no data');
      expect(built.prompt).toContain('- EMT4 (Label-to-Expression): 64.00%');
      expect(built.prompt).toContain('FOCUS AREA: Situation-to-Expression Connection');
      expect(built.prompt).not.toContain('Grade Level');
    });

    it('includes the grade when one is given', () => {
      const builder = new PromptBuilder(new StaticPromptTemplateProvider(data));

      const built = builder.buildInterventionPrompt({
        scores,
        metadata: { deficientArea: 'EMT1', classId: 'class-4b', numStudents: 3, gradeLevel: 2 },
      });

      expect(built.prompt).toContain('- Grade Level: 2\n');
    });

    it('rejects an unknown area before asking the template provider', () => {
      const provider = new StaticPromptTemplateProvider(data);
      const render = jest.spyOn(provider, 'renderIntervention');
      const builder = new PromptBuilder(provider);

      expect(() =>
        builder.buildInterventionPrompt({ scores, metadata: { deficientArea: 'EMT9', classId: 'c', numStudents: 1 } })
      ).toThrow(TemplateNotFoundError);
      expect(render).not.toHaveBeenCalled();
    });

    it('rejects an area whose template is not registered', () => {
      const { EMT1, EMT2, EMT4 } = data.strategies;
      const partial = new StaticPromptTemplateProvider({
        catalogue: data.catalogue,
        strategies: { ...(EMT1 ? { EMT1 } : {}), ...(EMT2 ? { EMT2 } : {}), ...(EMT4 ? { EMT4 } : {}) },
      });
      const builder = new PromptBuilder(partial);

      let caught: unknown;
      try {
        builder.buildInterventionPrompt({ scores, metadata: { deficientArea: 'EMT3', classId: 'c', numStudents: 1 } });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(TemplateNotFoundError);
      expect(caught).toMatchObject({ templateId: 'intervention/EMT3', statusCode: 500, code: 'TEMPLATE_NOT_FOUND' });
    });
  });

  describe('buildCurriculumPrompt', () => {
    const builder = new PromptBuilder(new StaticPromptTemplateProvider(data));

    it('lists only catalogue entries for the grade and skill areas', () => {
      const built = builder.buildCurriculumPrompt({ gradeLevel: '5', skillAreas: ['anger_management'], score: 42 });

      expect(built.templateId).toBe('curriculum/grade-5');
      expect(built.prompt).toContain('* Play the Judge (anger_management; grades 2, 5)');
      expect(built.prompt).toContain('* Time Blocks (anger_management; grades 2, 5)');
      expect(built.prompt).not.toContain('Heart Breathing');
      expect(built.prompt).toContain('- Current Score: 42%');
    });

    it('fails when the grade has nothing for the requested skill areas', () => {
      expect(() =>
        builder.buildCurriculumPrompt({ gradeLevel: '1', skillAreas: ['anger_management'], score: 30 })
      ).toThrow(TemplateNotFoundError);
    });
  });

  describe('buildRepairPrompt', () => {
    it('lists the issues and appends the previous output', () => {
      const builder = new PromptBuilder(new StaticPromptTemplateProvider(data));

      const prompt = builder.buildRepairPrompt('{"analysis": 1}', ['analysis: Expected string, received number']);

      expect(prompt).toContain('- analysis: Expected string, received number\n');
      expect(prompt.endsWith('{"analysis": 1}')).toBe(true);
    });
  });
});
