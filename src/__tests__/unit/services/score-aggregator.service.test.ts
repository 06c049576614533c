import { aggregateScores, describeAverage, lowestScoringArea } from '../../../services/score-aggregator.service';

describe('aggregateScores', () => {
  it('averages each area and marks empty areas as no data', () => {
    const result = aggregateScores({
      EMT1: [65, 70, 68],
      EMT2: [],
      EMT3: [72, 75, 70],
      EMT4: [63, 65, 64],
    });

    expect(result.EMT1).toBeCloseTo(67.667, 3);
    expect(result.EMT2).toBeNull();
    expect(result.EMT3).toBeCloseTo(72.333, 3);
    expect(result.EMT4).toBe(64);
  });

  it('treats absent areas as empty and keeps the fixed key order', () => {
    const result = aggregateScores({ EMT3: [50] });

    expect(Object.keys(result)).toEqual(['EMT1', 'EMT2', 'EMT3', 'EMT4']);
    expect(result).toEqual({ EMT1: null, EMT2: null, EMT3: 50, EMT4: null });
  });

  it('returns no data everywhere for an empty score set', () => {
    expect(aggregateScores({})).toEqual({ EMT1: null, EMT2: null, EMT3: null, EMT4: null });
  });
});

describe('lowestScoringArea', () => {
  it('ignores areas without data', () => {
    expect(lowestScoringArea({ EMT1: 70, EMT2: null, EMT3: 55, EMT4: 80 })).toBe('EMT3');
  });

  it('keeps the first area on ties', () => {
    expect(lowestScoringArea({ EMT1: 60, EMT2: 60, EMT3: null, EMT4: 90 })).toBe('EMT1');
  });

  it('returns null when no area has data', () => {
    expect(lowestScoringArea({ EMT1: null, EMT2: null, EMT3: null, EMT4: null })).toBeNull();
  });
});

describe('describeAverage', () => {
  it('formats averages with two decimals', () => {
    expect(describeAverage(65.3333)).toBe('65.33%');
    expect(describeAverage(null)).toBe('no data');
  });
});
