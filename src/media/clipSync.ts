/**
 * ClipSync: merge one silent motion clip with one audio track so the result
 * lasts exactly the panel's target duration.
 *
 *   audio short  → padded with trailing silence (never stretched)
 *   audio long   → truncated at the target; the video sets the length
 *   video short  → last frame held until the target
 *   no audio stream on the clip → attached by stream mapping, never mixed
 *
 * `fitClip` applies the same length rules to the video alone, for runs whose
 * audio is attached after concatenation.
 */
import type { AudioTrack, SilentClip, SyncedClip } from '../pipeline/types.js';
import { artifactPath, type RunContext } from '../pipeline/runContext.js';
import { SyncError, errorMessage } from '../utils/errors.js';
import { clipFromProbe } from './probe.js';
import type { MediaProbe } from './transcoder.js';

async function probeInput(
  ctx: RunContext,
  filePath: string,
  kind: 'video' | 'audio',
  label: string,
  panelIndex: number | undefined,
): Promise<MediaProbe> {
  let probe: MediaProbe;
  try {
    probe = await ctx.transcoder.probe(filePath);
  } catch (err) {
    throw new SyncError(`${label}: ${kind} input unreadable (${errorMessage(err)})`, panelIndex, { cause: err });
  }
  if (probe.durationMs <= 0) {
    throw new SyncError(`${label}: ${kind} input has zero duration`, panelIndex);
  }
  if (kind === 'video' && !probe.video) {
    throw new SyncError(`${label}: clip has no video stream`, panelIndex);
  }
  if (kind === 'audio' && !probe.audio) {
    throw new SyncError(`${label}: audio input has no audio stream`, panelIndex);
  }
  return probe;
}

/**
 * `panelIndex` names the panel in errors and file names; leave it out when
 * syncing a whole joined clip (music runs).
 */
export async function syncClip(
  ctx: RunContext,
  clip: SilentClip,
  audio: AudioTrack,
  targetDurationMs: number,
  panelIndex?: number,
): Promise<SyncedClip> {
  const label = panelIndex === undefined ? 'Composition' : `Panel ${panelIndex}`;
  const prefix = panelIndex === undefined ? 'composition' : `panel-${panelIndex}`;
  if (!Number.isFinite(targetDurationMs) || targetDurationMs <= 0) {
    throw new SyncError(`${label}: invalid target duration ${targetDurationMs}ms`, panelIndex);
  }

  // Record durations are hints; the files decide
  const videoProbe = await probeInput(ctx, clip.path, 'video', label, panelIndex);
  const audioProbe = await probeInput(ctx, audio.path, 'audio', label, panelIndex);

  let audioPath = audio.path;
  try {
    if (audioProbe.durationMs < targetDurationMs) {
      audioPath = artifactPath(ctx, `${prefix}-audio-padded.m4a`);
      await ctx.transcoder.padAudio(audio.path, targetDurationMs, audioPath);
    }

    const params = {
      videoPath: clip.path,
      audioPath,
      durationMs: targetDurationMs,
      holdLastFrameMs: Math.max(0, targetDurationMs - videoProbe.durationMs),
      outputPath: artifactPath(ctx, `${prefix}-synced.mp4`),
    };

    if (videoProbe.audio) {
      await ctx.transcoder.mixAudio(params);
    } else {
      await ctx.transcoder.attachAudio(params);
    }

    ctx.log.debug('ClipSync: synced', {
      panelIndex,
      targetDurationMs,
      videoMs: videoProbe.durationMs,
      audioMs: audioProbe.durationMs,
      mode: videoProbe.audio ? 'mix' : 'attach',
    });

    return { path: params.outputPath, durationMs: targetDurationMs };
  } catch (err) {
    throw new SyncError(`${label}: sync failed (${errorMessage(err)})`, panelIndex, { cause: err });
  }
}

export async function fitClip(
  ctx: RunContext,
  clip: SilentClip,
  targetDurationMs: number,
  panelIndex: number,
): Promise<SilentClip> {
  if (!Number.isFinite(targetDurationMs) || targetDurationMs <= 0) {
    throw new SyncError(`Panel ${panelIndex}: invalid target duration ${targetDurationMs}ms`, panelIndex);
  }
  const videoProbe = await probeInput(ctx, clip.path, 'video', `Panel ${panelIndex}`, panelIndex);

  const outputPath = artifactPath(ctx, `panel-${panelIndex}-fitted.mp4`);
  let fitted: MediaProbe;
  try {
    await ctx.transcoder.fitVideo(clip.path, targetDurationMs, Math.max(0, targetDurationMs - videoProbe.durationMs), outputPath);
    fitted = await ctx.transcoder.probe(outputPath);
  } catch (err) {
    throw new SyncError(`Panel ${panelIndex}: fit failed (${errorMessage(err)})`, panelIndex, { cause: err });
  }
  if (Math.abs(fitted.durationMs - targetDurationMs) > ctx.policy.durationToleranceMs) {
    throw new SyncError(
      `Panel ${panelIndex}: fitted clip lasts ${fitted.durationMs}ms, expected ${targetDurationMs}ms`,
      panelIndex,
    );
  }
  return { ...clipFromProbe(outputPath, fitted), durationMs: targetDurationMs };
}
