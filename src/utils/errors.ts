/**
 * Error taxonomy for the pipeline.
 *
 * Per-item errors (SyncError, GenerationError, TimeoutError) drop one panel.
 * Stage errors (ConcatError, CompositionError) fail the whole run.
 */

export type PipelineStage =
  | 'planning'
  | 'generating'
  | 'syncing'
  | 'composing'
  | 'verifying';

export class PipelineError extends Error {
  constructor(message: string, public readonly stage: PipelineStage, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class TranscoderError extends Error {
  constructor(message: string, public readonly stderr = '', options?: { cause?: unknown }) {
    super(stderr ? `${message}: ${stderr}` : message, options);
    this.name = 'TranscoderError';
  }
}

export class SyncError extends PipelineError {
  constructor(message: string, public readonly panelIndex?: number, options?: { cause?: unknown }) {
    super(message, 'syncing', options);
    this.name = 'SyncError';
  }
}

export class NormalizeError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'composing', options);
    this.name = 'NormalizeError';
  }
}

export class ConcatError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'composing', options);
    this.name = 'ConcatError';
  }
}

export class CompositionError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'composing', options);
    this.name = 'CompositionError';
  }
}

export class GenerationError extends PipelineError {
  constructor(message: string, public readonly panelIndex?: number, options?: { cause?: unknown }) {
    super(message, 'generating', options);
    this.name = 'GenerationError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
