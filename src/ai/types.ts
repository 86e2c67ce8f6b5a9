/**
 * Collaborator contracts. The pipeline only sees these interfaces; the
 * fal.ai / ElevenLabs adapters and the test fakes implement them.
 * Every call writes its result to `outputPath` inside the run directory.
 */
import type { AudioTrack, Panel, SilentClip, WordSegment } from '../pipeline/types.js';

export interface VideoRequest {
  panel: Panel;
  targetDurationMs: number;
  outputPath: string;
  signal: AbortSignal;
}

export interface VideoGenerator {
  generate(req: VideoRequest): Promise<SilentClip>;
}

export interface SpeechRequest {
  text: string;
  /** Persona key; the same key always yields the same voice. */
  voiceKey: string;
  outputPath: string;
  signal: AbortSignal;
}

export interface SpeechGenerator {
  synthesize(req: SpeechRequest): Promise<AudioTrack>;
}

export interface MusicRequest {
  lyrics: string;
  style: string;
  durationMs: number;
  outputPath: string;
  signal: AbortSignal;
}

export interface MusicGenerator {
  compose(req: MusicRequest): Promise<AudioTrack>;
}

export interface AlignRequest {
  audio: AudioTrack;
  text: string;
  signal: AbortSignal;
}

export interface ForcedAligner {
  /** Word timestamps relative to the start of `audio`, in playback order. */
  align(req: AlignRequest): Promise<WordSegment[]>;
}

export interface Collaborators {
  video: VideoGenerator;
  speech: SpeechGenerator;
  music: MusicGenerator;
  aligner: ForcedAligner;
}
