import type {
  EnergySegment,
  ExecutionStage,
  RhythmTimeline,
  TransitionType,
} from '@beatcut/shared';
import type { EngineLogger } from './logger';
import type { RandomSource } from './random';

// ─── Media Operations Service ────────────────────────────────────────────────

export interface MediaStreamInfo {
  codecType: 'video' | 'audio' | 'other';
  width?: number;
  height?: number;
  fps?: number;
}

export interface MediaProbe {
  duration: number;   // seconds
  size: number;       // bytes
  streams: MediaStreamInfo[];
}

/**
 * Decode/encode work the engine delegates. Every method that produces a file
 * writes it to the `outputPath` chosen by the engine and resolves with that
 * path, so the engine keeps ownership of scratch artifacts.
 */
export interface MediaOperations {
  probe(filePath: string): Promise<MediaProbe>;
  trim(inputPath: string, start: number, end: number, outputPath: string): Promise<string>;
  concat(inputPaths: readonly string[], outputPath: string): Promise<string>;
  transition(
    pathA: string,
    pathB: string,
    kind: TransitionType,
    duration: number,
    outputPath: string
  ): Promise<string>;
  muxAudio(videoPath: string, audioPath: string, durationCap: number, outputPath: string): Promise<string>;
}

// ─── Audio Analysis Service ──────────────────────────────────────────────────

export interface AudioAnalysisService {
  duration(audioPath: string): Promise<number>;
  rhythmPoints(audioPath: string): Promise<RhythmTimeline>;
  energySegments(audioPath: string, count: number): Promise<EnergySegment[]>;
}

// ─── Dependencies ────────────────────────────────────────────────────────────

export interface AnalyzeDeps {
  media: MediaOperations;
  logger?: EngineLogger;
  /** Probes in flight at once (default 4) */
  probeConcurrency?: number;
}

export interface PlanDeps extends AnalyzeDeps {
  audio: AudioAnalysisService;
  random?: RandomSource;
  /** Number of energy segments requested for the energy strategy (default 8) */
  energySegmentCount?: number;
}

export interface ExecuteDeps {
  media: MediaOperations;
  /** Directory under which each execution creates its own scratch directory */
  scratchRoot: string;
  logger?: EngineLogger;
  /** Parallel trims (default 1) */
  trimConcurrency?: number;
  /** Called as each stage completes, with overall completion 0..1 */
  onProgress?: (stage: ExecutionStage, fraction: number) => void;
}
