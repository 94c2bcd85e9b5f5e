import type { TransitionFilterContext, TransitionFilterResult } from '../types';

export const OUTPUT_PAD = 'vout';

/**
 * A transition may never take more than half of either input, otherwise the
 * overlap would eat the whole clip.
 */
export function clampTransitionDuration(context: TransitionFilterContext): number {
  const { duration, durationA, durationB } = context;
  if (!(duration > 0) || !(durationA > 0) || !(durationB > 0)) {
    throw new Error(
      `Invalid transition durations: duration=${duration} durationA=${durationA} durationB=${durationB}`
    );
  }
  return Math.min(duration, durationA / 2, durationB / 2);
}

export function fmt(seconds: number): string {
  return seconds.toFixed(3);
}

/**
 * Overlapping transition built on FFmpeg's xfade filter.
 * The second input starts `effectiveDuration` seconds before the first ends,
 * so the output is shorter than the sum of the inputs by that overlap.
 */
export function buildXfade(xfadeName: string, context: TransitionFilterContext): TransitionFilterResult {
  const d = clampTransitionDuration(context);
  const offset = context.durationA - d;
  return {
    filters: [
      `[0:v][1:v]xfade=transition=${xfadeName}:duration=${fmt(d)}:offset=${fmt(offset)},format=yuv420p[${OUTPUT_PAD}]`,
    ],
    outputPad: OUTPUT_PAD,
    effectiveDuration: d,
    outputDuration: context.durationA + context.durationB - d,
  };
}
