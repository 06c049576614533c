import { EMT_AREAS, type AggregatedScores, type EmtArea, type ScoreSet } from '../types/intervention.types';

/**
 * Reduces per-student scores to class averages. Individual scores stop here;
 * only the returned averages travel further down the pipeline.
 */
export function aggregateScores(scores: ScoreSet): AggregatedScores {
  const mean = (area: EmtArea): number | null => {
    const values = scores[area] ?? [];
    return values.length === 0 ? null : values.reduce((sum, v) => sum + v, 0) / values.length;
  };
  return {
    EMT1: mean('EMT1'),
    EMT2: mean('EMT2'),
    EMT3: mean('EMT3'),
    EMT4: mean('EMT4'),
  };
}

/** Lowest-scoring area with data, or null when every area is empty. Ties keep key order. */
export function lowestScoringArea(scores: AggregatedScores): EmtArea | null {
  let lowest: EmtArea | null = null;
  for (const area of EMT_AREAS) {
    const avg = scores[area];
    if (avg === null) continue;
    const current = lowest === null ? null : scores[lowest];
    if (current === null || avg < current) lowest = area;
  }
  return lowest;
}

export function describeAverage(avg: number | null): string {
  return avg === null ? 'no data' : `${avg.toFixed(2)}%`;
}
