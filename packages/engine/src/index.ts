export * from './types';
export * from './errors';
export { createLogger, defaultLogger } from './logger';
export type { EngineLogger } from './logger';
export type { RandomSource } from './random';
export { shuffle, sample } from './random';
export type { Result } from './result';
export { ok, err, attempt, partition, toError } from './result';
export { mapWithConcurrency } from './concurrency';
export { ScratchSpace } from './scratch';
export { analyzeClips, describeClip, DEFAULT_PROBE_CONCURRENCY } from './clipAnalyzer';
export {
  STRATEGY_REGISTRY,
  resolveStrategyName,
  distributeEven,
  distributeByRhythm,
  distributeByEnergy,
  filterRhythmPoints,
  extendClipPool,
  totalDuration,
  placeClip,
  EPSILON,
} from './strategies';
export type { StrategyContext, StrategyDefinition, EvenOptions, RhythmOptions } from './strategies';
export { buildEditPlan, buildTargetedEditPlan, DEFAULT_ENERGY_SEGMENT_COUNT } from './planBuilder';
export type { TargetedPlanOptions } from './planBuilder';
export { executePlan } from './planExecutor';
