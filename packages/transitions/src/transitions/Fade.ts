/**
 * Fade Transition
 *
 * Fade to black and back: the first clip fades out over its last `d` seconds,
 * the second fades in over its first `d` seconds, then both are concatenated.
 * There is no overlap, so the output keeps the full length of both inputs.
 *
 *   [0:v] fade=out ─┐
 *                   ├─ concat ─▶ [vout]
 *   [1:v] fade=in  ─┘
 */

import type { TransitionDefinition, TransitionFilterContext, TransitionFilterResult } from '../types';
import { OUTPUT_PAD, clampTransitionDuration, fmt } from './xfade';

export const FadeTransition: TransitionDefinition = {
  kind: 'fade',
  description: 'Fade through black, no overlap',

  buildFilter(context: TransitionFilterContext): TransitionFilterResult {
    const d = clampTransitionDuration(context);
    const fadeOutStart = context.durationA - d;
    return {
      filters: [
        `[0:v]fade=t=out:st=${fmt(fadeOutStart)}:d=${fmt(d)}[fa]`,
        `[1:v]fade=t=in:st=0:d=${fmt(d)}[fb]`,
        `[fa][fb]concat=n=2:v=1:a=0,format=yuv420p[${OUTPUT_PAD}]`,
      ],
      outputPad: OUTPUT_PAD,
      effectiveDuration: d,
      outputDuration: context.durationA + context.durationB,
    };
  },
};
