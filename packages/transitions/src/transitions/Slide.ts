/**
 * Slide Transition
 *
 * The second clip slides in and pushes the first one out of frame.
 */

import type { TransitionDefinition } from '../types';
import { buildXfade } from './xfade';

export const SlideTransition: TransitionDefinition = {
  kind: 'slide',
  description: 'Right-to-left slide',
  buildFilter: (context) => buildXfade('slideleft', context),
};
