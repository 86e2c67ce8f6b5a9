/**
 * FFmpeg-backed Transcoder: padding, audio attach/mix, normalization,
 * concatenation, silence, and caption burn-in.
 *
 * Argument builders are pure and exported so the exact command lines can be
 * checked without the binaries. The runner uses async execFile so a long
 * encode never blocks the event loop (keepalives keep flowing).
 */
import { execFile } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { promisify } from 'util';
import { env, type TargetProfile } from '../config.js';
import type { CaptionTrack } from '../pipeline/types.js';
import { TranscoderError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { FFPROBE_ARGS, parseProbeOutput } from './probe.js';
import { buildAssDocument, escapeFilterPath } from './subtitles.js';
import type { AttachAudioParams, MediaProbe, Transcoder } from './transcoder.js';

const execFileAsync = promisify(execFile);

// Synced clips share one audio layout so stream-copy concat stays clean
const AUDIO_OUT = ['-c:a', 'aac', '-b:a', '192k', '-ar', '48000', '-ac', '2'] as const;
const VIDEO_OUT = ['-c:v', 'libx264', '-preset', 'veryfast', '-crf', '18'] as const;

// ── Helpers ────────────────────────────────────────────────────────────────────

export function seconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function colourTags(profile: TargetProfile): string[] {
  return [
    '-pix_fmt', profile.pixelFormat,
    '-color_range', profile.colorRange,
    '-colorspace', profile.colorSpace,
    '-color_trc', profile.colorSpace,
    '-color_primaries', profile.colorSpace,
  ];
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    return String(err.stderr).trim().split('\n').slice(-5).join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}

async function runFfmpeg(args: readonly string[], label: string): Promise<void> {
  logger.debug(`FFmpeg [${label}]`, { args: args.join(' ') });
  try {
    await execFileAsync(env.FFMPEG_PATH, ['-y', '-hide_banner', ...args], { maxBuffer: 32 * 1024 * 1024 });
  } catch (err) {
    throw new TranscoderError(`FFmpeg ${label} failed`, stderrOf(err), { cause: err });
  }
}

async function runFfprobe(filePath: string): Promise<string> {
  try {
    const { stdout } = await execFileAsync(env.FFPROBE_PATH, [...FFPROBE_ARGS, filePath], { maxBuffer: 8 * 1024 * 1024 });
    return stdout;
  } catch (err) {
    throw new TranscoderError(`FFprobe failed for ${filePath}`, stderrOf(err), { cause: err });
  }
}

// ── Argument builders ──────────────────────────────────────────────────────────

export function padAudioArgs(inputPath: string, durationMs: number, outputPath: string): string[] {
  const s = seconds(durationMs);
  return ['-i', inputPath, '-af', `apad=whole_dur=${s}`, '-t', s, ...AUDIO_OUT, outputPath];
}

function holdFilter(holdLastFrameMs: number): string {
  return `tpad=stop_mode=clone:stop_duration=${seconds(holdLastFrameMs)}`;
}

export function fitVideoArgs(inputPath: string, durationMs: number, holdLastFrameMs: number, outputPath: string): string[] {
  const videoCodec = holdLastFrameMs > 0
    ? ['-vf', holdFilter(holdLastFrameMs), ...VIDEO_OUT]
    : ['-c:v', 'copy'];
  return ['-i', inputPath, '-map', '0:v:0', ...videoCodec, '-an', '-t', seconds(durationMs), outputPath];
}

export function attachAudioArgs(p: AttachAudioParams): string[] {
  const videoCodec = p.holdLastFrameMs > 0
    ? ['-vf', holdFilter(p.holdLastFrameMs), ...VIDEO_OUT]
    : ['-c:v', 'copy'];
  return [
    '-i', p.videoPath,
    '-i', p.audioPath,
    '-map', '0:v:0',
    '-map', '1:a:0',
    ...videoCodec,
    ...AUDIO_OUT,
    '-t', seconds(p.durationMs),
    p.outputPath,
  ];
}

export function mixAudioArgs(p: AttachAudioParams): string[] {
  const graph = ['[0:a:0][1:a:0]amix=inputs=2:duration=longest:normalize=0[aout]'];
  let videoMap = '0:v:0';
  let videoCodec: string[] = ['-c:v', 'copy'];
  if (p.holdLastFrameMs > 0) {
    graph.push(`[0:v:0]${holdFilter(p.holdLastFrameMs)}[vout]`);
    videoMap = '[vout]';
    videoCodec = [...VIDEO_OUT];
  }
  return [
    '-i', p.videoPath,
    '-i', p.audioPath,
    '-filter_complex', graph.join(';'),
    '-map', videoMap,
    '-map', '[aout]',
    ...videoCodec,
    ...AUDIO_OUT,
    '-t', seconds(p.durationMs),
    p.outputPath,
  ];
}

/** Scale to cover the frame, center-crop, then tag the colour metadata explicitly. */
export function normalizeArgs(inputPath: string, profile: TargetProfile, outputPath: string): string[] {
  const { width: w, height: h } = profile;
  const vf = [
    `scale=${w}:${h}:force_original_aspect_ratio=increase`,
    `crop=${w}:${h}`,
    'setsar=1',
    `format=${profile.pixelFormat}`,
  ].join(',');
  return [
    '-i', inputPath,
    '-vf', vf,
    ...VIDEO_OUT,
    ...colourTags(profile),
    ...AUDIO_OUT,
    outputPath,
  ];
}

export function concatListContent(paths: readonly string[]): string {
  return paths.map((p) => `file '${path.resolve(p).replace(/'/g, "'\\''")}'`).join('\n') + '\n';
}

export function concatArgs(listPath: string, outputPath: string): string[] {
  return ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', outputPath];
}

export function concatAudioArgs(inputPaths: readonly string[], outputPath: string): string[] {
  const inputs = inputPaths.flatMap((p) => ['-i', p]);
  const labels = inputPaths.map((_, i) => `[${i}:a:0]`).join('');
  return [
    ...inputs,
    '-filter_complex', `${labels}concat=n=${inputPaths.length}:v=0:a=1[aout]`,
    '-map', '[aout]',
    ...AUDIO_OUT,
    outputPath,
  ];
}

export function silenceArgs(durationMs: number, outputPath: string): string[] {
  return ['-f', 'lavfi', '-i', 'anullsrc=r=48000:cl=stereo', '-t', seconds(durationMs), ...AUDIO_OUT, outputPath];
}

export function burnCaptionsArgs(videoPath: string, assPath: string, profile: TargetProfile, outputPath: string): string[] {
  return [
    '-i', videoPath,
    '-vf', `subtitles=${escapeFilterPath(assPath)}`,
    ...VIDEO_OUT,
    ...colourTags(profile),
    '-c:a', 'copy',
    outputPath,
  ];
}

// ── Transcoder ─────────────────────────────────────────────────────────────────

export class FfmpegTranscoder implements Transcoder {
  async probe(filePath: string): Promise<MediaProbe> {
    const stdout = await runFfprobe(filePath);
    try {
      return parseProbeOutput(stdout);
    } catch (err) {
      throw new TranscoderError(`FFprobe returned unreadable output for ${filePath}`, '', { cause: err });
    }
  }

  async fitVideo(inputPath: string, durationMs: number, holdLastFrameMs: number, outputPath: string): Promise<void> {
    await runFfmpeg(fitVideoArgs(inputPath, durationMs, holdLastFrameMs, outputPath), 'fitVideo');
  }

  async padAudio(inputPath: string, durationMs: number, outputPath: string): Promise<void> {
    await runFfmpeg(padAudioArgs(inputPath, durationMs, outputPath), 'padAudio');
  }

  async attachAudio(params: AttachAudioParams): Promise<void> {
    await runFfmpeg(attachAudioArgs(params), 'attachAudio');
  }

  async mixAudio(params: AttachAudioParams): Promise<void> {
    await runFfmpeg(mixAudioArgs(params), 'mixAudio');
  }

  async normalize(inputPath: string, profile: TargetProfile, outputPath: string): Promise<void> {
    await runFfmpeg(normalizeArgs(inputPath, profile, outputPath), 'normalize');
  }

  async concat(inputPaths: string[], outputPath: string): Promise<void> {
    const listPath = `${outputPath}.concat.txt`;
    await fs.promises.writeFile(listPath, concatListContent(inputPaths), 'utf-8');
    try {
      await runFfmpeg(concatArgs(listPath, outputPath), 'concat');
    } finally {
      await fs.promises.rm(listPath, { force: true });
    }
  }

  async concatAudio(inputPaths: string[], outputPath: string): Promise<void> {
    await runFfmpeg(concatAudioArgs(inputPaths, outputPath), 'concatAudio');
  }

  async silence(durationMs: number, outputPath: string): Promise<void> {
    await runFfmpeg(silenceArgs(durationMs, outputPath), 'silence');
  }

  async burnCaptions(videoPath: string, captions: CaptionTrack, profile: TargetProfile, outputPath: string): Promise<void> {
    const assPath = `${outputPath}.ass`;
    await fs.promises.writeFile(assPath, buildAssDocument(captions, profile), 'utf-8');
    try {
      await runFfmpeg(burnCaptionsArgs(videoPath, assPath, profile, outputPath), 'burnCaptions');
    } finally {
      await fs.promises.rm(assPath, { force: true });
    }
  }
}
