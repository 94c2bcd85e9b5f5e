import type { ExecutionStage, ExecutionWarning } from '@beatcut/shared';

/**
 * Base class of every fatal engine failure. `stage` names the pipeline step
 * that ran out of usable material, so callers can log or retry accordingly.
 */
export abstract class EditEngineError extends Error {
  abstract readonly stage: ExecutionStage;

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = new.target.name;
  }
}

export class NoValidClipsError extends EditEngineError {
  readonly stage = 'analyze';

  constructor(public readonly clipCount: number) {
    super(`No valid clips: all ${clipCount} clip reference(s) failed analysis`);
  }
}

export interface ClipFailure {
  index: number;        // position in plan.distributedClips
  sourcePath: string;
  message: string;
}

export class TrimFailureError extends EditEngineError {
  readonly stage = 'trim';

  constructor(public readonly failures: readonly ClipFailure[]) {
    super(
      failures.length === 0
        ? 'Edit plan contains no distributed clips'
        : `Failed to trim any of ${failures.length} clip(s)`
    );
  }
}

export class FoldFailureError extends EditEngineError {
  readonly stage = 'fold';

  constructor(message: string, cause?: unknown) {
    super(message, cause);
  }
}

export class AudioMuxFailureError extends EditEngineError {
  readonly stage = 'mux';

  constructor(public readonly audioPath: string, cause?: unknown) {
    super(`Failed to add audio track ${audioPath}`, cause);
  }
}

export class InvalidOutputError extends EditEngineError {
  readonly stage = 'validate';

  constructor(public readonly artifactPath: string, reason: string, cause?: unknown) {
    super(`Output failed validation (${reason}): ${artifactPath}`, cause);
  }
}

/**
 * Non-fatal: a transition could not be rendered and the pair was joined with
 * a plain concatenation instead. Collected into ExecutionResult.warnings.
 */
export class TransitionFallbackWarning {
  readonly kind = 'transitionFallback';

  constructor(
    public readonly index: number,
    public readonly transitionType: string,
    public readonly cause: Error
  ) {}

  get message(): string {
    return `Transition '${this.transitionType}' into clip ${this.index} failed, concatenated instead: ${this.cause.message}`;
  }

  toJSON(): ExecutionWarning {
    return { kind: this.kind, index: this.index, message: this.message };
  }
}

/** Non-fatal: neither the transition nor the plain join worked, so the clip was left out. */
export class ClipDroppedWarning {
  readonly kind = 'clipDropped';

  constructor(
    public readonly index: number,
    public readonly cause: Error
  ) {}

  get message(): string {
    return `Clip ${this.index} could not be joined and was left out: ${this.cause.message}`;
  }

  toJSON(): ExecutionWarning {
    return { kind: this.kind, index: this.index, message: this.message };
  }
}
