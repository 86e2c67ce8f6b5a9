/**
 * CaptionLocker: turns lyric or dialogue text into composition-relative
 * caption timing. No rendering happens here.
 *
 * - panel-locked (music): lines sit inside their panel's window minus a
 *   margin, words spaced evenly; sung timing is ignored on purpose.
 * - alignment-locked (dialogue): aligner word timestamps are sanitized
 *   against the panel clip and shifted by the panel's offset.
 */
import type { CaptionSegment, CaptionTrack, PanelAudio, WordSegment } from '../pipeline/types.js';

export const MUSIC_SPEAKER = '♪';

/** A surviving panel's slot in the joined video. */
export interface PanelWindow {
  panelIndex: number;
  startMs: number;
  durationMs: number;
}

/** Cumulative windows in composition order; dropped panels take no time. */
export function panelWindows(slots: ReadonlyArray<{ panelIndex: number; durationMs: number }>): PanelWindow[] {
  let offset = 0;
  return slots.map(({ panelIndex, durationMs }) => {
    const window = { panelIndex, startMs: offset, durationMs };
    offset += durationMs;
    return window;
  });
}

// ── Panel-locked ───────────────────────────────────────────────────────────────

export interface PanelLockedOptions {
  /** Fraction of the window trimmed from each side. */
  marginRatio: number;
  minWordDurationMs: number;
}

export function panelLockedCaptions(
  windows: readonly PanelWindow[],
  linesPerWindow: ReadonlyArray<readonly string[]>,
  opts: PanelLockedOptions,
): CaptionTrack {
  const segments: CaptionSegment[] = [];

  windows.forEach((window, wi) => {
    const lines = linesPerWindow[wi] ?? [];
    if (lines.length === 0) return;

    const margin = Math.floor(window.durationMs * opts.marginRatio);
    const captionStart = window.startMs + margin;
    const captionEnd = window.startMs + window.durationMs - margin;
    const lineDuration = Math.floor((captionEnd - captionStart) / lines.length);
    if (lineDuration <= 0) return;

    lines.forEach((line, li) => {
      const lineStart = captionStart + li * lineDuration;
      const lineEnd = Math.min(lineStart + lineDuration, captionEnd);
      const tokens = line.split(/\s+/).filter(Boolean);
      if (tokens.length === 0) return;

      // Dense lines share slots so every word keeps at least the floor
      const span = lineEnd - lineStart;
      const groups = groupTokens(tokens, Math.max(1, Math.floor(span / opts.minWordDurationMs)));
      const wordDuration = Math.floor(span / groups.length);
      const spaced = groups.map((text, i) => ({
        text,
        startMs: i * wordDuration,
        endMs: Math.min((i + 1) * wordDuration, span),
      }));
      const words = sanitizeWords(spaced, span, opts.minWordDurationMs)
        .map((w) => ({ text: w.text, startMs: w.startMs + lineStart, endMs: w.endMs + lineStart }));

      segments.push({ text: line, startMs: lineStart, endMs: lineEnd, words, speaker: MUSIC_SPEAKER });
    });
  });

  return { segments, strategy: 'panel_locked' };
}

/** Join neighbouring tokens so there are at most `maxGroups` of them, in order. */
export function groupTokens(tokens: readonly string[], maxGroups: number): string[] {
  if (tokens.length <= maxGroups) return [...tokens];
  const groups: string[] = [];
  for (let k = 0; k < maxGroups; k++) {
    const from = Math.floor((k * tokens.length) / maxGroups);
    const to = Math.floor(((k + 1) * tokens.length) / maxGroups);
    groups.push(tokens.slice(from, to).join(' '));
  }
  return groups;
}

// ── Alignment-locked ───────────────────────────────────────────────────────────

/**
 * Make aligner words usable as captions within a clip of `clipDurationMs`.
 * Words only ever move later: each starts no earlier than the previous one
 * ends and lasts at least `minWordDurationMs`. Words starting at or past the
 * clip end were truncated from the audio and are dropped; the one word
 * crossing the end is cut at it.
 */
export function sanitizeWords<T extends WordSegment>(words: readonly T[], clipDurationMs: number, minWordDurationMs: number): T[] {
  const out: T[] = [];
  let prevEnd = 0;
  for (const word of words) {
    if (word.text.trim().length === 0) continue;
    const startMs = Math.max(Math.round(word.startMs), prevEnd, 0);
    if (startMs >= clipDurationMs) break;
    const endMs = Math.min(Math.max(Math.round(word.endMs), startMs + minWordDurationMs), clipDurationMs);
    out.push({ ...word, startMs, endMs });
    prevEnd = endMs;
  }
  return out;
}

export interface AlignedPanel {
  window: PanelWindow;
  audio: PanelAudio;
}

export function alignmentLockedCaptions(panels: readonly AlignedPanel[], minWordDurationMs: number): CaptionTrack {
  const segments: CaptionSegment[] = [];

  for (const { window, audio } of panels) {
    if (audio.lines.length === 0) continue;

    // Owning line of each aligner word, by the lines' word counts
    const owners: number[] = [];
    audio.lines.forEach((line, li) => {
      for (let k = 0; k < line.wordCount; k++) owners.push(li);
    });
    const lastLine = audio.lines.length - 1;
    const tagged = audio.words.map((w, i) => ({ ...w, line: owners[i] ?? lastLine }));

    const clean = sanitizeWords(tagged, window.durationMs, minWordDurationMs);

    audio.lines.forEach((line, li) => {
      const words = clean
        .filter((w) => w.line === li)
        .map((w) => ({ text: w.text, startMs: w.startMs + window.startMs, endMs: w.endMs + window.startMs }));
      const first = words[0];
      const last = words[words.length - 1];
      if (!first || !last) return;
      segments.push({
        text: line.text,
        startMs: first.startMs,
        endMs: last.endMs,
        words,
        ...(line.speaker ? { speaker: line.speaker } : {}),
      });
    });
  }

  return { segments, strategy: 'alignment_locked' };
}
