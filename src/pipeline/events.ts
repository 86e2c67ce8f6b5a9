/**
 * Progress events streamed to the caller. Payload keys are snake_case on the
 * wire. A run emits exactly one terminal event (`complete` or `error`).
 */
import type { PipelineMode } from '../config.js';

export type PipelineState =
  | 'idle'
  | 'planning'
  | 'generating'
  | 'syncing'
  | 'composing'
  | 'verifying'
  | 'complete'
  | 'failed';

export interface CompletePayload {
  final_path: string;
  verified: boolean;
  verification_failures: string[];
  has_audio: boolean;
  has_captions: boolean;
  clip_count: number;
  clips_attempted: number;
  clips_failed: number;
  actual_duration_ms: number;
  actual_resolution: string;
}

export type ProgressEventType = 'tts_progress' | 'video_progress' | 'music_progress';
export type MessageEventType = 'align_progress' | 'caption_progress' | 'compose' | 'keepalive';

export type PipelineEvent =
  | { type: 'start'; run_id: string; mode: PipelineMode; panel_count: number }
  | { type: ProgressEventType; message: string; index?: number }
  | { type: MessageEventType; message: string }
  | ({ type: 'complete' } & CompletePayload)
  | { type: 'error'; message: string };

export type TerminalEvent = Extract<PipelineEvent, { type: 'complete' | 'error' }>;

export function isTerminal(event: PipelineEvent): event is TerminalEvent {
  return event.type === 'complete' || event.type === 'error';
}

export type Emit = (event: PipelineEvent) => void;

// Legal forward moves; any state may fail
const NEXT: Record<PipelineState, readonly PipelineState[]> = {
  idle:       ['planning'],
  planning:   ['generating'],
  generating: ['syncing'],
  syncing:    ['composing'],
  composing:  ['verifying'],
  verifying:  ['complete'],
  complete:   [],
  failed:     [],
};

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  if (to === 'failed') return from !== 'complete' && from !== 'failed';
  return NEXT[from].includes(to);
}
