/**
 * Intervention Types
 *
 * Shapes flowing through the intervention pipeline: raw EMT scores, class-level
 * aggregates and the request handed to prompt building.
 */

export const EMT_AREAS = ['EMT1', 'EMT2', 'EMT3', 'EMT4'] as const;

export type EmtArea = (typeof EMT_AREAS)[number];

export const EMT_AREA_LABELS: Record<EmtArea, string> = {
  EMT1: 'Visual Emotion Matching',
  EMT2: 'Situation-to-Expression',
  EMT3: 'Expression Labeling',
  EMT4: 'Label-to-Expression',
};

export function isEmtArea(value: string): value is EmtArea {
  return (EMT_AREAS as readonly string[]).includes(value);
}

/** Raw per-student scores (0-100) keyed by area; absent keys are treated as empty. */
export type ScoreSet = Partial<Record<EmtArea, number[]>>;

/** Class average per area; `null` marks an area with no data. */
export type AggregatedScores = Record<EmtArea, number | null>;

export interface ClassMetadata {
  classId: string;
  deficientArea: EmtArea;
  numStudents: number;
  gradeLevel?: number;
}

/**
 * Aggregated scores plus class metadata, as handed to prompt building. The area
 * stays a plain string there so an unknown one fails as a missing template.
 */
export interface InterventionRequest {
  scores: AggregatedScores;
  metadata: Omit<ClassMetadata, 'deficientArea'> & { deficientArea: string };
}

/** What the HTTP layer hands to the service: raw scores plus class metadata. */
export interface InterventionSubmission {
  scores: ScoreSet;
  metadata: ClassMetadata;
}
