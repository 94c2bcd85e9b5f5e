/**
 * Dissolve Transition
 *
 * The clips overlap for `d` seconds while the second one dissolves in over
 * the first (xfade=dissolve).
 */

import type { TransitionDefinition } from '../types';
import { buildXfade } from './xfade';

export const DissolveTransition: TransitionDefinition = {
  kind: 'dissolve',
  description: 'Overlapping dissolve',
  buildFilter: (context) => buildXfade('dissolve', context),
};
