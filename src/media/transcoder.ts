/**
 * Media transcoder / compositor contract.
 *
 * The pipeline never shells out directly; it goes through this interface so
 * the decisions (pad or truncate, copy or normalize) stay testable. Every
 * operation writes exactly one output file and rejects with TranscoderError
 * (carrying the tool's stderr) on failure.
 */
import type { TargetProfile } from '../config.js';
import type { CaptionTrack } from '../pipeline/types.js';

export interface VideoStreamInfo {
  width: number;
  height: number;
  pixelFormat: string;
  colorSpace: string;
  colorRange: string;
  codec: string;
}

export interface AudioStreamInfo {
  codec: string;
  sampleRate: number;
  channels: number;
}

export interface MediaProbe {
  durationMs: number;
  video: VideoStreamInfo | null;
  audio: AudioStreamInfo | null;
}

export interface AttachAudioParams {
  videoPath: string;
  audioPath: string;
  durationMs: number;
  /** Hold the last video frame for this long to reach `durationMs`. */
  holdLastFrameMs: number;
  outputPath: string;
}

export interface Transcoder {
  probe(filePath: string): Promise<MediaProbe>;
  /** Trim or hold the video to exactly `durationMs`, dropping any audio. */
  fitVideo(inputPath: string, durationMs: number, holdLastFrameMs: number, outputPath: string): Promise<void>;
  /** Append silence so the output lasts exactly `durationMs`. */
  padAudio(inputPath: string, durationMs: number, outputPath: string): Promise<void>;
  /** Map the audio file in as the clip's only audio stream. Never mixes. */
  attachAudio(params: AttachAudioParams): Promise<void>;
  /** Mix the audio file under the clip's existing audio stream. */
  mixAudio(params: AttachAudioParams): Promise<void>;
  normalize(inputPath: string, profile: TargetProfile, outputPath: string): Promise<void>;
  /** Stream-copy concatenation; inputs must share one profile. */
  concat(inputPaths: string[], outputPath: string): Promise<void>;
  concatAudio(inputPaths: string[], outputPath: string): Promise<void>;
  silence(durationMs: number, outputPath: string): Promise<void>;
  burnCaptions(videoPath: string, captions: CaptionTrack, profile: TargetProfile, outputPath: string): Promise<void>;
}
