/**
 * @beatcut/transitions: one definition per transition kind.
 *
 *   const def = findTransition(kind);
 *   const { filters, outputPad } = def.buildFilter({ durationA, durationB, duration });
 *
 * ## Adding a new transition
 *   1. Create src/transitions/MyTransition.ts implementing TransitionDefinition
 *   2. Add its kind to TRANSITION_TYPES in @beatcut/shared
 *   3. Add it to TRANSITION_REGISTRY below
 */

import type { TransitionType } from '@beatcut/shared';
import type { TransitionDefinition } from './types';
import { FadeTransition } from './transitions/Fade';
import { DissolveTransition } from './transitions/Dissolve';
import { WipeTransition } from './transitions/Wipe';
import { SlideTransition } from './transitions/Slide';
import { ZoomTransition } from './transitions/Zoom';
import { FlashTransition } from './transitions/Flash';

export type {
  TransitionDefinition,
  TransitionFilterContext,
  TransitionFilterResult,
} from './types';

export { clampTransitionDuration } from './transitions/xfade';
export {
  FadeTransition,
  DissolveTransition,
  WipeTransition,
  SlideTransition,
  ZoomTransition,
  FlashTransition,
};

export const TRANSITION_REGISTRY: Readonly<Record<TransitionType, TransitionDefinition>> = {
  fade: FadeTransition,
  dissolve: DissolveTransition,
  wipe: WipeTransition,
  slide: SlideTransition,
  zoom: ZoomTransition,
  flash: FlashTransition,
};

export function findTransition(kind: TransitionType): TransitionDefinition {
  return TRANSITION_REGISTRY[kind];
}
