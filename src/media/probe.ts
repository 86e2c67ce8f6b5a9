/**
 * ffprobe output parsing and canonical-profile comparison.
 */
import { z } from 'zod';
import type { TargetProfile } from '../config.js';
import type { AudioTrack, SilentClip } from '../pipeline/types.js';
import type { MediaProbe } from './transcoder.js';

// ffprobe -show_streams -show_format -of json; numbers arrive as strings in places
const StreamSchema = z.object({
  codec_type:  z.string().optional(),
  codec_name:  z.string().optional(),
  width:       z.coerce.number().optional(),
  height:      z.coerce.number().optional(),
  pix_fmt:     z.string().optional(),
  color_space: z.string().optional(),
  color_range: z.string().optional(),
  sample_rate: z.coerce.number().optional(),
  channels:    z.coerce.number().optional(),
  duration:    z.coerce.number().optional(),
});

const ProbeSchema = z.object({
  streams: z.array(StreamSchema).default([]),
  format:  z.object({ duration: z.coerce.number().optional() }).default({}),
});

export const FFPROBE_ARGS = ['-v', 'error', '-show_streams', '-show_format', '-of', 'json'] as const;

export function parseProbeOutput(stdout: string): MediaProbe {
  const parsed = ProbeSchema.parse(JSON.parse(stdout));
  const video = parsed.streams.find((s) => s.codec_type === 'video');
  const audio = parsed.streams.find((s) => s.codec_type === 'audio');

  // Format duration is the reliable one for concatenated files; stream duration is the fallback
  const seconds = parsed.format.duration ?? video?.duration ?? audio?.duration ?? 0;

  return {
    durationMs: Math.round(seconds * 1000),
    video: video
      ? {
          width:       video.width ?? 0,
          height:      video.height ?? 0,
          pixelFormat: video.pix_fmt ?? 'unknown',
          colorSpace:  video.color_space ?? 'unknown',
          colorRange:  video.color_range ?? 'unknown',
          codec:       video.codec_name ?? 'unknown',
        }
      : null,
    audio: audio
      ? {
          codec:      audio.codec_name ?? 'unknown',
          sampleRate: audio.sample_rate ?? 0,
          channels:   audio.channels ?? 0,
        }
      : null,
  };
}

/** Untagged streams never match: an unknown colorspace is treated as a deviation. */
export function matchesProfile(probe: MediaProbe, profile: TargetProfile): boolean {
  const v = probe.video;
  if (!v) return false;
  return (
    v.width === profile.width &&
    v.height === profile.height &&
    v.pixelFormat === profile.pixelFormat &&
    v.colorSpace === profile.colorSpace &&
    v.colorRange === profile.colorRange
  );
}

export function describeProfile(probe: MediaProbe): string {
  const v = probe.video;
  if (!v) return 'no-video';
  return `${v.width}x${v.height}/${v.pixelFormat}/${v.colorSpace}/${v.colorRange}`;
}

export function clipFromProbe(path: string, probe: MediaProbe): SilentClip {
  return {
    path,
    durationMs:  probe.durationMs,
    width:       probe.video?.width ?? 0,
    height:      probe.video?.height ?? 0,
    pixelFormat: probe.video?.pixelFormat ?? 'unknown',
    colorSpace:  probe.video?.colorSpace ?? 'unknown',
    colorRange:  probe.video?.colorRange ?? 'unknown',
    hasAudio:    probe.audio !== null,
  };
}

export function audioTrackFromProbe(path: string, probe: MediaProbe): AudioTrack {
  return {
    path,
    durationMs: probe.durationMs,
    ...(probe.audio ? { sampleRate: probe.audio.sampleRate, channels: probe.audio.channels } : {}),
  };
}
