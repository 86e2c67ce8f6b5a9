/**
 * Generating stage: runs the video branch and the audio branch concurrently
 * and joins them into one PanelResult per panel.
 *
 * Pairing is decided here and only here. A panel whose video or audio failed
 * leaves as `dropped` with both halves discarded; nothing downstream can see
 * a clip without its audio or audio without its clip.
 */
import type { Collaborators } from '../ai/types.js';
import { groupLinesByPanel, extractLyricLines } from '../captions/lyrics.js';
import { audioTrackFromProbe } from '../media/probe.js';
import { errorMessage, GenerationError } from '../utils/errors.js';
import { mapWithConcurrency, withTimeout, type Settled } from '../utils/concurrency.js';
import { withRetry } from '../utils/retry.js';
import type { Emit } from './events.js';
import { artifactPath, type RunContext } from './runContext.js';
import type { AudioTrack, Panel, PanelAudio, PanelResult, SilentClip } from './types.js';

export const NARRATOR_VOICE = 'narrator';

export interface ProducerDeps {
  collaborators: Collaborators;
  emit: Emit;
}

export function targetDurationOf(ctx: RunContext, panel: Panel): number {
  return panel.targetDurationMs ?? ctx.policy.panelDurationMs;
}

function bounded<T>(ctx: RunContext, work: Promise<T>, label: string): Promise<T> {
  return withTimeout(work, ctx.policy.generationTimeoutMs, label);
}

// ── Video branch ──────────────────────────────────────────────────────────────

async function generateVideo(ctx: RunContext, panel: Panel, deps: ProducerDeps): Promise<SilentClip> {
  return withRetry(
    (attempt) => bounded(ctx, deps.collaborators.video.generate({
      panel,
      targetDurationMs: targetDurationOf(ctx, panel),
      outputPath: artifactPath(ctx, `panel-${panel.index}-video-${attempt}.mp4`),
      signal: ctx.signal,
    }), `video panel ${panel.index}`),
    {
      maxAttempts: ctx.policy.videoMaxAttempts,
      baseDelayMs: ctx.policy.retryBaseDelayMs,
      signal: ctx.signal,
      label: `video panel ${panel.index}`,
      onRetry: (attempt, err) => deps.emit({
        type: 'video_progress',
        index: panel.index,
        message: `Clip ${panel.index + 1} attempt ${attempt} failed (${errorMessage(err)}), retrying`,
      }),
    },
  );
}

export async function runVideoBranch(ctx: RunContext, panels: readonly Panel[], deps: ProducerDeps): Promise<Settled<SilentClip>[]> {
  let done = 0;
  return mapWithConcurrency(panels, ctx.policy.generationConcurrency, async (panel) => {
    try {
      const clip = await generateVideo(ctx, panel, deps);
      done++;
      deps.emit({ type: 'video_progress', index: panel.index, message: `Clip ${panel.index + 1} ready (${done}/${panels.length})` });
      return clip;
    } catch (err) {
      done++;
      deps.emit({ type: 'video_progress', index: panel.index, message: `Clip ${panel.index + 1} failed: ${errorMessage(err)}` });
      throw err;
    }
  });
}

// ── Dialogue audio branch ─────────────────────────────────────────────────────

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * One panel's speech: each line in its speaker's voice, joined into one
 * track, then aligned against the joined text. Panels with nothing to say
 * get a silent track of the target length so every synced clip carries audio.
 */
export async function producePanelAudio(ctx: RunContext, panel: Panel, deps: ProducerDeps): Promise<PanelAudio> {
  const { speech, aligner } = deps.collaborators;
  const lines = (panel.dialogue ?? []).filter((l) => l.text.trim().length > 0);

  if (lines.length === 0) {
    const silencePath = artifactPath(ctx, `panel-${panel.index}-silence.m4a`);
    const durationMs = targetDurationOf(ctx, panel);
    await ctx.transcoder.silence(durationMs, silencePath);
    return { track: { path: silencePath, durationMs }, words: [], lines: [] };
  }

  const parts: AudioTrack[] = [];
  for (const [li, line] of lines.entries()) {
    parts.push(await bounded(ctx, speech.synthesize({
      text: line.text,
      voiceKey: line.speaker || NARRATOR_VOICE,
      outputPath: artifactPath(ctx, `panel-${panel.index}-line-${li}.mp3`),
      signal: ctx.signal,
    }), `tts panel ${panel.index} line ${li}`));
  }

  let track: AudioTrack;
  const first = parts[0];
  if (parts.length === 1 && first) {
    track = first;
  } else {
    const joinedPath = artifactPath(ctx, `panel-${panel.index}-speech.m4a`);
    await ctx.transcoder.concatAudio(parts.map((p) => p.path), joinedPath);
    track = audioTrackFromProbe(joinedPath, await ctx.transcoder.probe(joinedPath));
  }
  deps.emit({ type: 'tts_progress', index: panel.index, message: `Speech ready for panel ${panel.index + 1} (${Math.round(track.durationMs)}ms)` });

  const text = lines.map((l) => l.text).join(' ');
  deps.emit({ type: 'align_progress', message: `Aligning words for panel ${panel.index + 1}` });
  const words = await bounded(ctx, aligner.align({ audio: track, text, signal: ctx.signal }), `align panel ${panel.index}`);
  if (words.length === 0) throw new GenerationError(`Aligner returned no words for panel ${panel.index}`, panel.index);

  return {
    track,
    words,
    lines: lines.map((l) => ({ text: l.text, ...(l.speaker ? { speaker: l.speaker } : {}), wordCount: wordCount(l.text) })),
  };
}

export async function runDialogueAudioBranch(ctx: RunContext, panels: readonly Panel[], deps: ProducerDeps): Promise<Settled<PanelAudio>[]> {
  return mapWithConcurrency(panels, ctx.policy.generationConcurrency, async (panel) => {
    try {
      return await producePanelAudio(ctx, panel, deps);
    } catch (err) {
      deps.emit({ type: 'tts_progress', index: panel.index, message: `Audio for panel ${panel.index + 1} failed: ${errorMessage(err)}` });
      throw err;
    }
  });
}

// ── Join ──────────────────────────────────────────────────────────────────────

/** Collapse per-branch outcomes to one result per panel, in panel order. */
export function pairResults(
  ctx: RunContext,
  panels: readonly Panel[],
  videos: readonly Settled<SilentClip>[],
  audios: readonly Settled<PanelAudio>[] | null,
): PanelResult[] {
  return panels.map((panel, i): PanelResult => {
    const video = videos[i];
    const audio = audios ? audios[i] : null;
    if (!video || !video.ok) {
      return { status: 'dropped', panel, reason: `video generation failed: ${video ? errorMessage(video.error) : 'missing'}` };
    }
    if (audios) {
      if (!audio || !audio.ok) {
        return { status: 'dropped', panel, reason: `audio generation failed: ${audio ? errorMessage(audio.error) : 'missing'}` };
      }
      return { status: 'ready', panel, targetDurationMs: targetDurationOf(ctx, panel), video: video.value, audio: audio.value };
    }
    return { status: 'ready', panel, targetDurationMs: targetDurationOf(ctx, panel), video: video.value, audio: null };
  });
}

export async function produceDialogue(ctx: RunContext, panels: readonly Panel[], deps: ProducerDeps): Promise<PanelResult[]> {
  const [videos, audios] = await Promise.all([
    runVideoBranch(ctx, panels, deps),
    runDialogueAudioBranch(ctx, panels, deps),
  ]);
  return pairResults(ctx, panels, videos, audios);
}

// ── Music ─────────────────────────────────────────────────────────────────────

export interface MusicProduction {
  results: PanelResult[];
  music: AudioTrack | null;
  /** Lyric lines per panel, aligned with `results`. */
  lyricsByPanel: string[][];
}

/** Panel-pinned lines win; the rest are grouped from the song's lyrics. */
export function lyricsForPanels(panels: readonly Panel[], lyrics: string | undefined): string[][] {
  const grouped = groupLinesByPanel(extractLyricLines(lyrics ?? ''), panels.length);
  return panels.map((panel, i) => panel.lyricLines ?? grouped[i] ?? []);
}

export async function produceMusic(
  ctx: RunContext,
  panels: readonly Panel[],
  song: { lyrics?: string; style: string },
  deps: ProducerDeps,
): Promise<MusicProduction> {
  const lyricsByPanel = lyricsForPanels(panels, song.lyrics);
  const durationMs = panels.reduce((sum, p) => sum + targetDurationOf(ctx, p), 0);

  const musicTask = (async (): Promise<AudioTrack | null> => {
    deps.emit({ type: 'music_progress', message: `Composing ${Math.round(durationMs / 1000)}s track` });
    try {
      const track = await bounded(ctx, deps.collaborators.music.compose({
        lyrics: lyricsByPanel.flat().join('\n'),
        style: song.style,
        durationMs,
        outputPath: artifactPath(ctx, 'music.mp3'),
        signal: ctx.signal,
      }), 'music');
      deps.emit({ type: 'music_progress', message: `Music ready (${track.durationMs}ms)` });
      return track;
    } catch (err) {
      deps.emit({ type: 'music_progress', message: `Music failed: ${errorMessage(err)}; continuing without music` });
      ctx.log.warn('Producer: music generation failed', { error: err });
      return null;
    }
  })();

  const [videos, music] = await Promise.all([runVideoBranch(ctx, panels, deps), musicTask]);
  return { results: pairResults(ctx, panels, videos, null), music, lyricsByPanel };
}
