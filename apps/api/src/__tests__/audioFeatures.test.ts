import { describe, it, expect } from 'vitest';
import {
  computeEnergySegments,
  detectOnsets,
  estimateTempo,
  toRhythmTimeline,
  type Envelope,
} from '../services/audioFeatures';

function envelope(samples: number[], bucketsPerSecond = 10): Envelope {
  return { samples, bucketsPerSecond, duration: samples.length / bucketsPerSecond };
}

describe('detectOnsets', () => {
  it('finds the buckets where loudness jumps', () => {
    expect(detectOnsets(envelope([0, 0, 1, 0, 0, 0, 1, 0, 0, 0]))).toEqual([0.2, 0.6]);
  });

  it('finds nothing in a flat envelope', () => {
    expect(detectOnsets(envelope(new Array(20).fill(0.5)))).toEqual([]);
  });

  it('needs at least three buckets', () => {
    expect(detectOnsets(envelope([0, 1]))).toEqual([]);
  });
});

describe('toRhythmTimeline', () => {
  it('starts at 0, sorts and drops points closer than 0.1s', () => {
    expect(toRhythmTimeline([0.05, 0.5, 0.55, 0.7, 0.3])).toEqual([0, 0.3, 0.5, 0.7]);
  });

  it('removes duplicates', () => {
    expect(toRhythmTimeline([1, 1, 2])).toEqual([0, 1, 2]);
  });
});

describe('estimateTempo', () => {
  it('uses the median interval between onsets', () => {
    expect(estimateTempo([0, 0.5, 1, 1.5])).toBe(120);
    expect(estimateTempo([0, 0.5, 1, 3])).toBe(120);
  });

  it('is 0 with fewer than two onsets', () => {
    expect(estimateTempo([])).toBe(0);
    expect(estimateTempo([4])).toBe(0);
  });
});

describe('computeEnergySegments', () => {
  it('splits into equal segments with mean squared energy and local tempo', () => {
    const env = envelope([...new Array(20).fill(0.5), ...new Array(20).fill(1)]);
    const segments = computeEnergySegments(env, [0.5, 1.0, 1.5, 2.5, 3.5], 2);

    expect(segments).toEqual([
      { index: 0, startTime: 0, duration: 2, energy: 0.25, tempo: 120 },
      { index: 1, startTime: 2, duration: 2, energy: 1, tempo: 60 },
    ]);
  });

  it('returns [] for empty audio', () => {
    expect(computeEnergySegments(envelope([]), [], 4)).toEqual([]);
  });

  it('treats a count below one as a single segment', () => {
    expect(computeEnergySegments(envelope([1, 1]), [], 0)).toHaveLength(1);
  });
});
