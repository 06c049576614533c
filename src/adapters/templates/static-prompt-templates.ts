/**
 * Static Prompt Templates
 *
 * Prompt text for intervention and curriculum generation, filled from the
 * strategy and catalogue tables under data/templates. Loaded once at start-up.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { EMT_AREAS, EMT_AREA_LABELS, type EmtArea } from '../../types/intervention.types';
import { GRADE_LEVELS, SKILL_AREAS, type CurriculumCatalogueEntry } from '../../types/curriculum.types';
import type {
  CurriculumPromptContext,
  InterventionPromptContext,
  PromptTemplateProvider,
} from '../../services/ports/prompt-template.port';

const StrategySchema = z.object({
  activity: z.string(),
  implementation: z.array(z.string()).min(1),
  resources: z.array(z.string()),
});

const AreaStrategiesSchema = z.object({
  focus: z.string(),
  description: z.string(),
  strategies: z.array(StrategySchema).min(1),
});

const StrategyTableSchema = z.record(z.enum(EMT_AREAS), AreaStrategiesSchema);

const CatalogueSchema = z.array(
  z.object({
    name: z.string(),
    gradeLevels: z.array(z.enum(GRADE_LEVELS)).min(1),
    skillArea: z.enum(SKILL_AREAS),
    summary: z.string(),
    implementation: z.string(),
    purpose: z.string(),
  })
);

export type AreaStrategies = z.infer<typeof AreaStrategiesSchema>;
export type StrategyTable = Partial<Record<EmtArea, AreaStrategies>>;

export interface StaticTemplateData {
  strategies: StrategyTable;
  catalogue: CurriculumCatalogueEntry[];
}

const DEFAULT_DATA_DIR = path.resolve(__dirname, '../../../data/templates');

export function loadStaticTemplateData(dataDir: string = DEFAULT_DATA_DIR): StaticTemplateData {
  const read = (file: string): unknown => JSON.parse(fs.readFileSync(path.join(dataDir, file), 'utf8'));
  return {
    strategies: StrategyTableSchema.parse(read('emt-strategies.json')),
    catalogue: CatalogueSchema.parse(read('curriculum-interventions.json')),
  };
}

const SAFETY_GUIDELINES = `SAFETY GUIDELINES - CRITICAL:
- Use only positive, encouraging and age-appropriate language
- Every activity must be safe, supervised and suitable for a classroom
- Never ask for personal information about students or families
- Never suggest online accounts, contact with strangers or unsupervised tasks
- Promote inclusion and respect for every student`;

const INTERVENTION_SHAPE = `{
  "analysis": "<short analysis of the class averages>",
  "strategies": [
    {
      "activity": "<activity name>",
      "implementation": ["<step>", "..."],
      "expected_outcomes": ["<outcome>", "..."],
      "time_allocation": "<e.g. 20 minutes daily>",
      "resources": ["<material>", "..."]
    }
  ],
  "timeline": { "week1": ["<activity>"], "week2": ["..."], "week3": ["..."], "week4": ["..."] },
  "success_metrics": {
    "quantitative": ["<measurable target>"],
    "qualitative": ["<observable indicator>"],
    "assessment_methods": ["<method>"]
  },
  "resources": ["<every material needed across the plan>"]
}`;

const CURRICULUM_SHAPE = `{
  "recommended_interventions": [
    {
      "name": "<intervention name>",
      "grade_levels": ["<grade>"],
      "skill_area": "emotional_awareness" | "emotional_regulation" | "anger_management",
      "summary": "<one sentence>",
      "implementation": { "steps": ["<step>"], "materials": ["<material>"], "time_allocation": "<time>" },
      "intended_purpose": "<purpose>"
    }
  ],
  "skill_focus": ["<area of focus>"],
  "implementation_order": ["<intervention name>"]
}`;

export class StaticPromptTemplateProvider implements PromptTemplateProvider {
  readonly name = 'static';
  private readonly interventionTemplates = new Map<string, EmtArea>();
  private readonly curriculumTemplates = new Map<string, CurriculumCatalogueEntry[]>();

  constructor(private readonly data: StaticTemplateData) {
    for (const area of EMT_AREAS) {
      if (data.strategies[area]) this.interventionTemplates.set(`intervention/${area}`, area);
    }
    for (const grade of GRADE_LEVELS) {
      const entries = data.catalogue.filter((e) => e.gradeLevels.includes(grade));
      if (entries.length > 0) this.curriculumTemplates.set(`curriculum/grade-${grade}`, entries);
    }
  }

  renderIntervention(templateId: string, ctx: InterventionPromptContext): string | null {
    const area = this.interventionTemplates.get(templateId);
    const table = area ? this.data.strategies[area] : undefined;
    if (!area || !table || area !== ctx.area) return null;

    const averages = EMT_AREAS.map((a) => `- ${a} (${EMT_AREA_LABELS[a]}): ${ctx.averages[a]}`).join('\n');
    const strategies = table.strategies
      .map((s) => `* ${s.activity}\n${s.implementation.map((step) => `  - ${step}`).join('\n')}\n  Resources: ${s.resources.join(', ')}`)
      .join('\n');

    return `You are an expert educational intervention specialist supporting emotional development in children.

TASK: Create a four-week intervention plan for a class that needs support in ${area} (${table.focus}).

${SAFETY_GUIDELINES}

CLASS INFORMATION:
- Class ID: ${ctx.classId}
- Number of Students: ${ctx.numStudents}
${ctx.gradeLevel !== undefined ? `- Grade Level: ${ctx.gradeLevel}\n` : ''}- Primary Area Needing Intervention: ${area}

CURRENT PERFORMANCE (class averages):
${averages}

FOCUS AREA: ${table.focus} - ${table.description}
PROVEN STRATEGIES FOR ${area}:
${strategies}

INSTRUCTIONS:
1. Build the plan around ${area} using the strategies above, adapted to the class
2. Include 3 to 5 strategies
3. Provide a progressive four-week timeline
4. Give measurable success metrics for ${area}
5. Areas marked "no data" were not assessed; do not draw conclusions about them

Respond with ONLY a JSON object with exactly this structure:
${INTERVENTION_SHAPE}`;
  }

  renderCurriculum(templateId: string, ctx: CurriculumPromptContext): string | null {
    const entries = this.curriculumTemplates.get(templateId);
    if (!entries || templateId !== `curriculum/grade-${ctx.gradeLevel}`) return null;
    const matching = entries.filter((e) => ctx.skillAreas.includes(e.skillArea));
    if (matching.length === 0) return null;

    const catalogue = matching
      .map((e) => `* ${e.name} (${e.skillArea}; grades ${e.gradeLevels.join(', ')})\n  Summary: ${e.summary}\n  Implementation: ${e.implementation}\n  Purpose: ${e.purpose}`)
      .join('\n');

    return `You are an expert educational intervention specialist supporting emotional development in children.

TASK: Recommend interventions for a grade ${ctx.gradeLevel} class based on its current performance.

${SAFETY_GUIDELINES}

STUDENT INFORMATION:
- Grade Level: ${ctx.gradeLevel}
- Focus Areas: ${ctx.skillAreas.join(', ')}
- Current Score: ${ctx.score}%

AVAILABLE INTERVENTIONS:
${catalogue}

GUIDELINES:
1. Select only interventions listed above
2. Prioritise areas where the score shows the most need
3. Give a clear implementation order

Respond with ONLY a JSON object with exactly this structure:
${CURRICULUM_SHAPE}`;
  }
}
