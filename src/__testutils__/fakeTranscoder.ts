/**
 * In-process Transcoder for tests. Media files are small JSON descriptors
 * written to real paths; `probe` reads them back. Operations derive their
 * output the way ffmpeg would (durations, streams, profiles) and refuse the
 * inputs ffmpeg would choke on: mixing into a clip with no audio stream, or
 * stream-copy joining clips of different profiles.
 */
import * as fs from 'fs';
import { z } from 'zod';
import type { TargetProfile } from '../config.js';
import type { AttachAudioParams, AudioStreamInfo, MediaProbe, Transcoder, VideoStreamInfo } from '../media/transcoder.js';
import type { CaptionTrack } from '../pipeline/types.js';
import { TranscoderError } from '../utils/errors.js';

export const CANONICAL_VIDEO: VideoStreamInfo = {
  width: 1080, height: 1920, pixelFormat: 'yuv420p', colorSpace: 'bt709', colorRange: 'tv', codec: 'h264',
};

export const SMALL_FULL_RANGE_VIDEO: VideoStreamInfo = {
  width: 720, height: 1280, pixelFormat: 'yuvj420p', colorSpace: 'bt709', colorRange: 'pc', codec: 'h264',
};

export const AAC_STEREO: AudioStreamInfo = { codec: 'aac', sampleRate: 48000, channels: 2 };

const MediaSchema = z.object({
  durationMs: z.number(),
  video: z.object({
    width: z.number(), height: z.number(), pixelFormat: z.string(),
    colorSpace: z.string(), colorRange: z.string(), codec: z.string(),
  }).nullable(),
  audio: z.object({ codec: z.string(), sampleRate: z.number(), channels: z.number() }).nullable(),
});

// Keeps video outputs above the verifier's minimum size
const FILLER = 'x'.repeat(16_000);

export async function writeFakeMedia(filePath: string, media: MediaProbe): Promise<void> {
  const body = media.video ? { ...media, filler: FILLER } : media;
  await fs.promises.writeFile(filePath, JSON.stringify(body), 'utf-8');
}

export async function readFakeMedia(filePath: string): Promise<MediaProbe> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new TranscoderError(`${filePath}: No such file or directory`, '', { cause: err });
  }
  try {
    return MediaSchema.parse(JSON.parse(raw));
  } catch (err) {
    throw new TranscoderError(`${filePath}: Invalid data found when processing input`, '', { cause: err });
  }
}

function sameVideo(a: VideoStreamInfo | null, b: VideoStreamInfo | null): boolean {
  return a !== null && b !== null &&
    a.width === b.width && a.height === b.height &&
    a.pixelFormat === b.pixelFormat && a.colorSpace === b.colorSpace && a.colorRange === b.colorRange;
}

export type TranscoderOp = Exclude<keyof Transcoder, 'probe'>;

export interface TranscoderCall {
  op: TranscoderOp;
  inputs: string[];
  output: string;
  durationMs?: number;
}

export class FakeTranscoder implements Transcoder {
  readonly calls: TranscoderCall[] = [];
  readonly probes: string[] = [];
  readonly burned: CaptionTrack[] = [];
  /** Ops that reject with TranscoderError when called. */
  readonly failOps = new Set<TranscoderOp>();
  /** The next stream-copy concat writes this (wrong) video profile instead. */
  corruptNextConcat: VideoStreamInfo | null = null;
  /** fitVideo writes a clip this much shorter than asked. */
  fitShortfallMs = 0;

  private record(call: TranscoderCall): void {
    this.calls.push(call);
    if (this.failOps.has(call.op)) throw new TranscoderError(`FFmpeg ${call.op} failed`, 'Conversion failed!');
  }

  callsOf(op: TranscoderOp): TranscoderCall[] {
    return this.calls.filter((c) => c.op === op);
  }

  async probe(filePath: string): Promise<MediaProbe> {
    this.probes.push(filePath);
    return readFakeMedia(filePath);
  }

  async fitVideo(inputPath: string, durationMs: number, holdLastFrameMs: number, outputPath: string): Promise<void> {
    this.record({ op: 'fitVideo', inputs: [inputPath], output: outputPath, durationMs });
    const src = await readFakeMedia(inputPath);
    const length = Math.min(durationMs, src.durationMs + holdLastFrameMs) - this.fitShortfallMs;
    await writeFakeMedia(outputPath, { durationMs: length, video: src.video, audio: null });
  }

  async padAudio(inputPath: string, durationMs: number, outputPath: string): Promise<void> {
    this.record({ op: 'padAudio', inputs: [inputPath], output: outputPath, durationMs });
    const src = await readFakeMedia(inputPath);
    if (!src.audio) throw new TranscoderError('padAudio: input has no audio stream');
    await writeFakeMedia(outputPath, { durationMs: Math.max(src.durationMs, durationMs), video: null, audio: AAC_STEREO });
  }

  private async merge(op: 'attachAudio' | 'mixAudio', p: AttachAudioParams): Promise<void> {
    this.record({ op, inputs: [p.videoPath, p.audioPath], output: p.outputPath, durationMs: p.durationMs });
    const video = await readFakeMedia(p.videoPath);
    const audio = await readFakeMedia(p.audioPath);
    if (op === 'mixAudio' && !video.audio) {
      throw new TranscoderError('mixAudio', 'Stream specifier \':a:0\' in filtergraph matches no streams.');
    }
    if (!audio.audio) throw new TranscoderError(op, 'audio input has no audio stream');
    const streamLength = Math.max(video.durationMs + p.holdLastFrameMs, audio.durationMs);
    await writeFakeMedia(p.outputPath, {
      durationMs: Math.min(p.durationMs, streamLength),
      video: video.video,
      audio: AAC_STEREO,
    });
  }

  async attachAudio(params: AttachAudioParams): Promise<void> {
    await this.merge('attachAudio', params);
  }

  async mixAudio(params: AttachAudioParams): Promise<void> {
    await this.merge('mixAudio', params);
  }

  async normalize(inputPath: string, profile: TargetProfile, outputPath: string): Promise<void> {
    this.record({ op: 'normalize', inputs: [inputPath], output: outputPath });
    const src = await readFakeMedia(inputPath);
    await writeFakeMedia(outputPath, {
      durationMs: src.durationMs,
      video: { ...profile, codec: 'h264' },
      audio: src.audio ? AAC_STEREO : null,
    });
  }

  async concat(inputPaths: string[], outputPath: string): Promise<void> {
    this.record({ op: 'concat', inputs: [...inputPaths], output: outputPath });
    const inputs = await Promise.all(inputPaths.map((p) => readFakeMedia(p)));
    const first = inputs[0];
    if (!first) throw new TranscoderError('concat', 'no inputs');
    if (!inputs.every((m) => sameVideo(m.video, first.video))) {
      throw new TranscoderError('concat', 'stream copy of mismatched video parameters');
    }
    const video = this.corruptNextConcat ?? first.video;
    this.corruptNextConcat = null;
    await writeFakeMedia(outputPath, {
      durationMs: inputs.reduce((sum, m) => sum + m.durationMs, 0),
      video,
      audio: inputs.every((m) => m.audio !== null) ? first.audio : null,
    });
  }

  async concatAudio(inputPaths: string[], outputPath: string): Promise<void> {
    this.record({ op: 'concatAudio', inputs: [...inputPaths], output: outputPath });
    const inputs = await Promise.all(inputPaths.map((p) => readFakeMedia(p)));
    await writeFakeMedia(outputPath, {
      durationMs: inputs.reduce((sum, m) => sum + m.durationMs, 0),
      video: null,
      audio: AAC_STEREO,
    });
  }

  async silence(durationMs: number, outputPath: string): Promise<void> {
    this.record({ op: 'silence', inputs: [], output: outputPath, durationMs });
    await writeFakeMedia(outputPath, { durationMs, video: null, audio: AAC_STEREO });
  }

  async burnCaptions(videoPath: string, captions: CaptionTrack, profile: TargetProfile, outputPath: string): Promise<void> {
    this.record({ op: 'burnCaptions', inputs: [videoPath], output: outputPath });
    this.burned.push(captions);
    const src = await readFakeMedia(videoPath);
    await writeFakeMedia(outputPath, {
      durationMs: src.durationMs,
      video: src.video ? { ...src.video, pixelFormat: profile.pixelFormat, colorSpace: profile.colorSpace, colorRange: profile.colorRange } : null,
      audio: src.audio,
    });
  }
}
