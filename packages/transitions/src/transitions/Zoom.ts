/**
 * Zoom Transition
 *
 * The first clip zooms in towards the centre while the second fades in.
 */

import type { TransitionDefinition } from '../types';
import { buildXfade } from './xfade';

export const ZoomTransition: TransitionDefinition = {
  kind: 'zoom',
  description: 'Zoom into the next clip',
  buildFilter: (context) => buildXfade('zoomin', context),
};
