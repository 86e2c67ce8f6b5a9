/**
 * Domain model shared by every stage. All durations are integer milliseconds.
 */

export interface DialogueLine {
  speaker: string;
  text: string;
}

export interface Panel {
  index: number;
  /** Reference image for the motion clip. */
  imagePath: string;
  dialogue?: DialogueLine[];
  /** Camera / shot description passed to the video generator. */
  shot?: string;
  /** Lyric lines pinned to this panel (music mode). */
  lyricLines?: string[];
  targetDurationMs?: number;
}

export interface AudioTrack {
  path: string;
  durationMs: number;
  sampleRate?: number;
  channels?: number;
}

export interface SilentClip {
  path: string;
  durationMs: number;
  width: number;
  height: number;
  pixelFormat: string;
  colorSpace: string;
  colorRange: string;
  /** Generators may return clips that already carry an audio stream. */
  hasAudio: boolean;
}

export interface SyncedClip {
  path: string;
  durationMs: number;
}

export interface WordSegment {
  text: string;
  startMs: number;
  endMs: number;
}

export interface CaptionSegment {
  text: string;
  startMs: number;
  endMs: number;
  words: WordSegment[];
  speaker?: string;
}

export interface CaptionTrack {
  segments: CaptionSegment[];
  strategy: 'panel_locked' | 'alignment_locked';
}

export interface ExpectedOutput {
  durationMs?: number;
  width: number;
  height: number;
  requireAudio: boolean;
}

export interface VerificationResult {
  passed: boolean;
  checks: {
    exists: boolean;
    fileSize: boolean;
    video: boolean;
    duration: boolean;
    resolution: boolean;
    audio: boolean;
  };
  failures: string[];
  observed: {
    durationMs: number;
    width: number;
    height: number;
    hasVideo: boolean;
    hasAudio: boolean;
    fileSizeBytes: number;
  };
}

/**
 * Audio side of a panel in dialogue mode. `words` are panel-relative
 * aligner timestamps; `lines` is how many words each dialogue line owns.
 */
export interface PanelAudio {
  track: AudioTrack;
  words: WordSegment[];
  lines: Array<{ text: string; speaker?: string; wordCount: number }>;
}

/**
 * One panel's generation outcome. Video and audio are only ever carried
 * together: a panel either survives with both or is dropped with a reason.
 */
export type PanelResult =
  | { status: 'ready'; panel: Panel; targetDurationMs: number; video: SilentClip; audio: PanelAudio | null }
  | { status: 'dropped'; panel: Panel; reason: string };
