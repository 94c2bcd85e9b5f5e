// ─── Clips ───────────────────────────────────────────────────────────────────

export interface ClipDescriptor {
  readonly index: number;           // position in the caller's input list
  readonly sourcePath: string;
  readonly durationSeconds: number;
  readonly width: number;           // 0 when the clip has no video stream
  readonly height: number;
  readonly fps: number;
  readonly hasAudio: boolean;
}

/**
 * A source sub-interval mapped onto an interval of the output timeline.
 * sourceEnd - sourceStart === outputEnd - outputStart (no speed change).
 */
export interface DistributedClip extends ClipDescriptor {
  readonly sourceStart: number;     // seconds into the source clip
  readonly sourceEnd: number;
  readonly outputStart: number;     // seconds on the output timeline
  readonly outputEnd: number;
  // Energy strategy only:
  readonly segmentEnergy?: number;
  readonly segmentTempo?: number;
}

// ─── Audio analysis ──────────────────────────────────────────────────────────

/** Strictly ascending timestamps (seconds) where a cut is musically natural. */
export type RhythmTimeline = readonly number[];

export interface EnergySegment {
  readonly index: number;
  readonly startTime: number;  // seconds
  readonly duration: number;   // seconds
  readonly energy: number;     // >= 0, relative loudness
  readonly tempo: number;      // estimated BPM, 0 when unknown
}

// ─── Plans ───────────────────────────────────────────────────────────────────

export const STRATEGY_NAMES = ['rhythm', 'energy', 'even'] as const;
export type StrategyName = typeof STRATEGY_NAMES[number];

export const TRANSITION_TYPES = ['fade', 'dissolve', 'wipe', 'slide', 'zoom', 'flash'] as const;
export type TransitionType = typeof TRANSITION_TYPES[number];

export interface EditPlan {
  readonly clips: readonly ClipDescriptor[];
  readonly audioPath: string | null;   // null for target-duration plans without music
  readonly audioDuration: number;      // timeline length in seconds
  readonly strategy: StrategyName;
  readonly distributedClips: readonly DistributedClip[];
}

// ─── Execution ───────────────────────────────────────────────────────────────

export interface ExecutionWarning {
  kind: 'transitionFallback' | 'clipDropped';
  index: number;        // incoming clip, as an index into plan.distributedClips
  message: string;
}

export interface ExecutionResult {
  outputPath: string;
  duration: number;     // seconds
  size: number;         // bytes
  clipCount: number;    // clips present in the output
  strategy: StrategyName;
  transitionType: TransitionType | null;
  warnings: ExecutionWarning[];
  droppedClips: number[];   // indices into plan.distributedClips
}

export type ExecutionStage = 'analyze' | 'trim' | 'fold' | 'mux' | 'validate';

// ─── Jobs ────────────────────────────────────────────────────────────────────

export const JOB_STATUSES = ['QUEUED', 'RUNNING', 'DONE', 'ERROR', 'CANCELLED'] as const;
export type JobStatus = typeof JOB_STATUSES[number];
export const JOB_TYPES = ['autoEdit', 'smartEdit'] as const;
export type JobType = typeof JOB_TYPES[number];

export interface Job {
  id: string;
  type: JobType;
  status: JobStatus;
  progress: number;      // 0..100
  error?: string;
  errorStage?: ExecutionStage;
  outputPath?: string;   // relative to workspace
  result?: ExecutionResult;
  createdAt: string;
  updatedAt: string;
}

// ─── API request / response types ────────────────────────────────────────────

export interface AutoEditRequest {
  clipPaths: string[];
  audioPath: string;
  strategy?: StrategyName;
  transitionType?: TransitionType | null;
  transitionDuration?: number;   // seconds, 0..2
  minClipDuration?: number;      // seconds, 0.5..10
}

export interface SmartEditRequest {
  clipPaths: string[];
  targetDuration?: number;       // seconds, > 0
  audioPath?: string;
  transitionType?: TransitionType | null;
  transitionDuration?: number;
}

export interface ApiError {
  error: string;
  details?: string;
}

export interface CreateJobResponse {
  jobId: string;
}

/** Job as the API reports it: no server paths, warnings lifted to the top */
export interface JobView {
  id: string;
  type: JobType;
  status: JobStatus;
  progress: number;
  createdAt: string;
  updatedAt: string;
  error?: string;
  errorStage?: ExecutionStage;
  downloadUrl?: string;  // set once the job is DONE
  result?: Omit<ExecutionResult, 'outputPath' | 'warnings'>;
  warnings: ExecutionWarning[];
}

export interface JobStatusResponse {
  job: JobView;
  lastLogLines: string[];
}

export interface JobListResponse {
  jobs: JobView[];
}

// ─── Guards ──────────────────────────────────────────────────────────────────

export function isStrategyName(value: unknown): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

export function isJobType(value: unknown): value is JobType {
  return JOB_TYPES.some((type) => type === value);
}

export function isTransitionType(value: unknown): value is TransitionType {
  return TRANSITION_TYPES.some((type) => type === value);
}
