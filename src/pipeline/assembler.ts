/**
 * Syncing, composing and verifying stages.
 *
 * Syncing turns each ready panel into an exact-duration clip. Composing joins
 * them, attaches the song in music runs, and burns captions onto the joined
 * clip (so caption times are composition-relative). Verifying checks the
 * artifact and repairs a resolution failure once via forced normalization.
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  alignmentLockedCaptions,
  panelLockedCaptions,
  panelWindows,
  type AlignedPanel,
} from '../captions/captionLocker.js';
import type { PipelineMode } from '../config.js';
import { fitClip, syncClip } from '../media/clipSync.js';
import { concatClips } from '../media/concatenator.js';
import { clipFromProbe } from '../media/probe.js';
import { verifyOutput } from '../gates/verifier.js';
import { CompositionError, errorMessage } from '../utils/errors.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import type { Emit } from './events.js';
import { artifactPath, type RunContext } from './runContext.js';
import type { AudioTrack, CaptionTrack, ExpectedOutput, PanelAudio, PanelResult, VerificationResult } from './types.js';

export type ReadyPanel = Extract<PanelResult, { status: 'ready' }>;

/** A panel that made it through syncing: one clip of exactly `durationMs`. */
export interface PlacedPanel {
  panelIndex: number;
  path: string;
  durationMs: number;
  audio: PanelAudio | null;
  /** Carried so music captions follow the panel they belong to. */
  lyricLines: string[];
}

export interface CompositionPlan {
  panels: PlacedPanel[];
  music: AudioTrack | null;
  captions: CaptionTrack | null;
  expected: ExpectedOutput;
}

export interface ComposedArtifact {
  path: string;
  hasCaptions: boolean;
}

// ── Syncing ───────────────────────────────────────────────────────────────────

/**
 * Dialogue runs sync each clip with its own audio; music runs only fit the
 * video to length (the song is attached after the join). A panel that fails
 * here is dropped like a generation failure.
 */
export async function syncPanels(
  ctx: RunContext,
  ready: readonly ReadyPanel[],
  lyricsByPanel: ReadonlyMap<number, string[]>,
  emit: Emit,
): Promise<PlacedPanel[]> {
  const settled = await mapWithConcurrency(ready, ctx.policy.generationConcurrency, async (r): Promise<PlacedPanel> => {
    const panelIndex = r.panel.index;
    const lyricLines = lyricsByPanel.get(panelIndex) ?? [];
    if (r.audio) {
      const synced = await syncClip(ctx, r.video, r.audio.track, r.targetDurationMs, panelIndex);
      return { panelIndex, path: synced.path, durationMs: synced.durationMs, audio: r.audio, lyricLines };
    }
    const fitted = await fitClip(ctx, r.video, r.targetDurationMs, panelIndex);
    return { panelIndex, path: fitted.path, durationMs: fitted.durationMs, audio: null, lyricLines };
  });

  const placed: PlacedPanel[] = [];
  settled.forEach((s, i) => {
    if (s.ok) {
      placed.push(s.value);
      return;
    }
    const panelIndex = ready[i]?.panel.index;
    ctx.log.warn('Assembler: panel dropped at sync', { panelIndex, error: s.error });
    emit({
      type: 'video_progress',
      ...(panelIndex === undefined ? {} : { index: panelIndex }),
      message: `Panel ${panelIndex === undefined ? '?' : panelIndex + 1} dropped: ${errorMessage(s.error)}`,
    });
  });
  return placed;
}

// ── Planning the composition ──────────────────────────────────────────────────

export interface PlanOptions {
  mode: PipelineMode;
  music: AudioTrack | null;
  captions: boolean;
}

/**
 * Lay the surviving panels end to end and derive caption timing from that
 * layout. Expected duration is the sum of the surviving panels' targets.
 */
export function planComposition(ctx: RunContext, placed: readonly PlacedPanel[], opts: PlanOptions): CompositionPlan {
  const windows = panelWindows(placed.map((p) => ({ panelIndex: p.panelIndex, durationMs: p.durationMs })));
  const durationMs = placed.reduce((sum, p) => sum + p.durationMs, 0);

  let captions: CaptionTrack | null = null;
  if (opts.captions && opts.mode === 'dialogue') {
    const aligned: AlignedPanel[] = [];
    placed.forEach((p, i) => {
      const window = windows[i];
      if (p.audio && window) aligned.push({ window, audio: p.audio });
    });
    captions = alignmentLockedCaptions(aligned, ctx.policy.minWordDurationMs);
  } else if (opts.captions) {
    captions = panelLockedCaptions(windows, placed.map((p) => p.lyricLines), {
      marginRatio: ctx.policy.captionMarginRatio,
      minWordDurationMs: ctx.policy.minWordDurationMs,
    });
  }

  return {
    panels: [...placed],
    music: opts.music,
    captions,
    expected: {
      durationMs,
      width: ctx.profile.width,
      height: ctx.profile.height,
      requireAudio: opts.mode === 'dialogue' || opts.music !== null,
    },
  };
}

// ── Composing ─────────────────────────────────────────────────────────────────

export interface ComposeOptions {
  forceNormalize?: boolean;
}

export async function composeFinal(
  ctx: RunContext,
  plan: CompositionPlan,
  emit: Emit,
  opts: ComposeOptions = {},
): Promise<ComposedArtifact> {
  const suffix = opts.forceNormalize ? '.repair' : '';

  emit({ type: 'compose', message: `Joining ${plan.panels.length} clips${opts.forceNormalize ? ' with forced normalization' : ''}` });
  const joined = await concatClips(ctx, plan.panels.map((p) => p.path), {
    forceNormalize: opts.forceNormalize,
    ...(opts.forceNormalize ? { outputName: 'joined.repair.mp4' } : {}),
  });

  let current = joined.path;
  if (plan.music) {
    emit({ type: 'compose', message: 'Adding music to video' });
    try {
      const withMusic = await syncClip(ctx, clipFromProbe(joined.path, joined.probe), plan.music, joined.durationMs);
      current = withMusic.path;
    } catch (err) {
      throw new CompositionError(`Attaching music failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  const captions = plan.captions;
  if (!captions || captions.segments.length === 0) return { path: current, hasCaptions: false };

  emit({ type: 'caption_progress', message: `Burning ${captions.segments.length} caption segments (${captions.strategy})` });
  const captioned = artifactPath(ctx, `final${suffix}.mp4`);
  try {
    await ctx.transcoder.burnCaptions(current, captions, ctx.profile, captioned);
  } catch (err) {
    throw new CompositionError(`Caption burn-in failed: ${errorMessage(err)}`, { cause: err });
  }
  return { path: captioned, hasCaptions: true };
}

// ── Verifying ─────────────────────────────────────────────────────────────────

export interface VerifiedArtifact {
  artifact: ComposedArtifact;
  verification: VerificationResult;
  repaired: boolean;
}

/**
 * Verify once; on a resolution failure rebuild the composition through the
 * slow path and verify again. A second failure is reported, not retried.
 * If the repair itself fails, the first artifact is kept and reported as unverified.
 */
export async function verifyWithRepair(
  ctx: RunContext,
  plan: CompositionPlan,
  artifact: ComposedArtifact,
  emit: Emit,
): Promise<VerifiedArtifact> {
  const opts = { durationToleranceMs: ctx.policy.durationToleranceMs, minOutputBytes: ctx.policy.minOutputBytes };
  const first = await verifyOutput(ctx.transcoder, artifact.path, plan.expected, opts);
  if (first.checks.resolution) return { artifact, verification: first, repaired: false };

  emit({ type: 'compose', message: 'Resolution mismatch; re-normalizing all clips' });
  ctx.log.warn('Assembler: repairing composition', { failures: first.failures });
  let repaired: ComposedArtifact;
  try {
    repaired = await composeFinal(ctx, plan, emit, { forceNormalize: true });
  } catch (err) {
    ctx.log.error('Assembler: repair failed, keeping first artifact', { error: err });
    const verification = { ...first, failures: [...first.failures, `repair failed: ${errorMessage(err)}`] };
    return { artifact, verification, repaired: false };
  }
  const second = await verifyOutput(ctx.transcoder, repaired.path, plan.expected, opts);
  return { artifact: repaired, verification: second, repaired: true };
}

// ── Delivery ──────────────────────────────────────────────────────────────────

/** Move the artifact out of the run directory before it is removed. */
export async function deliverArtifact(ctx: RunContext, filePath: string, outputDir: string): Promise<string> {
  await fs.promises.mkdir(outputDir, { recursive: true });
  const dest = path.resolve(outputDir, `${ctx.runId}${path.extname(filePath) || '.mp4'}`);
  try {
    await fs.promises.rename(filePath, dest);
  } catch (err) {
    // Run directory and output directory on different devices
    if (!(err instanceof Error && 'code' in err && err.code === 'EXDEV')) throw err;
    await fs.promises.copyFile(filePath, dest);
    await fs.promises.rm(filePath, { force: true });
  }
  return dest;
}
