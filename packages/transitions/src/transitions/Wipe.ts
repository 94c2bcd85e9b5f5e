/**
 * Wipe Transition
 *
 * A hard edge sweeps across the frame revealing the second clip.
 * The edge travels right-to-left (xfade=wipeleft).
 */

import type { TransitionDefinition } from '../types';
import { buildXfade } from './xfade';

export const WipeTransition: TransitionDefinition = {
  kind: 'wipe',
  description: 'Right-to-left wipe',
  buildFilter: (context) => buildXfade('wipeleft', context),
};
