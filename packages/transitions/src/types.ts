/**
 * Transition Types: @beatcut/transitions
 *
 * Every transition kind lives in ONE file under src/transitions/<Name>.ts and
 * exposes a TransitionDefinition. The FFmpeg media service looks the kind up in
 * TRANSITION_REGISTRY and runs the filter graph it returns against exactly two
 * inputs:
 *
 *   ffmpeg -i <clipA> -i <clipB> -filter_complex <filters.join(';')> -map [<outputPad>] ...
 *
 * Inputs are expected to share resolution, frame rate and pixel format (the
 * engine normalises every trimmed clip before folding).
 *
 * ## When a transition doesn't look right
 *   → Find the kind in TRANSITION_REGISTRY (src/index.ts) → open its file
 *   → Look at its buildFilter method
 */

import type { TransitionType } from '@beatcut/shared';

/**
 * All data a transition builder needs.
 * Durations are in seconds and must be > 0.
 */
export interface TransitionFilterContext {
  /** Duration of the first input (the running fold output) */
  durationA: number;
  /** Duration of the second input (the incoming clip) */
  durationB: number;
  /** Requested transition length; clamped by the builder */
  duration: number;
}

export interface TransitionFilterResult {
  /** FFmpeg filter graph fragments, joined with ';' by the caller */
  filters: string[];
  /** Output pad carrying the combined video stream */
  outputPad: string;
  /** Transition length actually used after clamping */
  effectiveDuration: number;
  /** Expected duration of the combined output */
  outputDuration: number;
}

export interface TransitionDefinition {
  /** Identifier, matches the TransitionType accepted by the API */
  readonly kind: TransitionType;

  /** Human readable summary (for logs and docs) */
  readonly description: string;

  buildFilter(context: TransitionFilterContext): TransitionFilterResult;
}
