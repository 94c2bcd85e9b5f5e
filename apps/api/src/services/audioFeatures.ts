import type { EnergySegment } from '@beatcut/shared';

/**
 * Rhythm and loudness features computed from an RMS envelope (see
 * computeWaveform): one value per bucket, `bucketsPerSecond` buckets per
 * second, normalised to 0..1.
 */
export interface Envelope {
  samples: number[];
  bucketsPerSecond: number;
  duration: number;
}

/** Rhythm points closer than this are merged into the earlier one. */
export const MIN_RHYTHM_GAP = 0.1;

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Onsets are local maxima of the positive flux (rise of the
 * envelope between buckets) above mean + `sensitivity` standard deviations.
 * Returns times in seconds.
 */
export function detectOnsets(envelope: Envelope, sensitivity = 0.5): number[] {
  const { samples, bucketsPerSecond } = envelope;
  if (samples.length < 3) return [];

  const flux = samples.map((v, i) => (i === 0 ? 0 : Math.max(0, v - samples[i - 1])));
  const m = mean(flux);
  const std = Math.sqrt(mean(flux.map((f) => (f - m) ** 2)));
  const threshold = m + sensitivity * std;

  const onsets: number[] = [];
  for (let i = 1; i < flux.length - 1; i++) {
    if (flux[i] > threshold && flux[i] >= flux[i - 1] && flux[i] > flux[i + 1]) {
      onsets.push(i / bucketsPerSecond);
    }
  }
  return onsets;
}

/**
 * Sorted, deduplicated cut points starting at 0, with points closer than
 * `minGap` to the previous kept point dropped.
 */
export function toRhythmTimeline(onsets: readonly number[], minGap = MIN_RHYTHM_GAP): number[] {
  const sorted = [0, ...onsets].filter((t) => Number.isFinite(t) && t >= 0).sort((a, b) => a - b);
  const kept: number[] = [];
  for (const t of sorted) {
    if (kept.length === 0 || t - kept[kept.length - 1] >= minGap) kept.push(t);
  }
  return kept;
}

/** Beats per minute from the median inter-onset interval; 0 with fewer than two onsets */
export function estimateTempo(onsets: readonly number[]): number {
  if (onsets.length < 2) return 0;
  const intervals = onsets.slice(1).map((t, i) => t - onsets[i]).filter((d) => d > 0);
  const interval = median(intervals);
  return interval > 0 ? 60 / interval : 0;
}

/**
 * Split the envelope into `count` equal segments. Energy is the mean squared
 * envelope value of the segment; tempo comes from the onsets inside it.
 */
export function computeEnergySegments(
  envelope: Envelope,
  onsets: readonly number[],
  count: number
): EnergySegment[] {
  const n = Math.max(1, Math.floor(count));
  const { samples, bucketsPerSecond, duration } = envelope;
  if (!(duration > 0)) return [];
  const segmentDuration = duration / n;

  return Array.from({ length: n }, (_, index) => {
    const startTime = index * segmentDuration;
    const endTime = startTime + segmentDuration;
    const from = Math.floor(startTime * bucketsPerSecond);
    const to = Math.min(samples.length, Math.floor(endTime * bucketsPerSecond));
    const slice = samples.slice(from, Math.max(from, to));
    return {
      index,
      startTime,
      duration: segmentDuration,
      energy: mean(slice.map((v) => v * v)),
      tempo: estimateTempo(onsets.filter((t) => t >= startTime && t < endTime)),
    };
  });
}
