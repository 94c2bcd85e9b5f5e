/**
 * Flash Transition
 *
 * Cross-fade through a white frame, the classic "camera flash" cut.
 */

import type { TransitionDefinition } from '../types';
import { buildXfade } from './xfade';

export const FlashTransition: TransitionDefinition = {
  kind: 'flash',
  description: 'Cross-fade through white',
  buildFilter: (context) => buildXfade('fadewhite', context),
};
