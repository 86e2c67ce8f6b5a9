/**
 * ASS subtitle generation with karaoke word highlighting.
 *
 * `\k` sweeps from SecondaryColour to PrimaryColour, so Primary is the
 * "already spoken" colour and Secondary the "not yet" colour.
 */
import type { TargetProfile } from '../config.js';
import type { CaptionSegment, CaptionTrack } from '../pipeline/types.js';

// ASS colours are &HAABBGGRR
const COLOURS = {
  spoken:  '&H0000D7FF',
  pending: '&H00FFFFFF',
  outline: '&H00000000',
  box:     '&HC0000000',
} as const;

/** H:MM:SS.cc, truncating to centiseconds. */
export function msToAssTime(ms: number): string {
  const totalCs = Math.floor(Math.max(0, ms) / 10);
  const cs = totalCs % 100;
  const totalS = Math.floor(totalCs / 100);
  const s = totalS % 60;
  const totalM = Math.floor(totalS / 60);
  const m = totalM % 60;
  const h = Math.floor(totalM / 60);
  return `${h}:${pad2(m)}:${pad2(s)}.${pad2(cs)}`;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function escapeAssText(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/{/g, '\\{').replace(/}/g, '\\}').replace(/\r?\n/g, ' ');
}

/**
 * Karaoke text for one segment. Each word's sweep runs until the next word
 * starts, so inter-word gaps stay in step with the audio; a leading gap is
 * emitted as an empty sweep.
 */
export function karaokeText(segment: CaptionSegment): string {
  if (segment.words.length === 0) return escapeAssText(segment.text);

  const parts: string[] = [];
  const first = segment.words[0];
  if (first && first.startMs > segment.startMs) {
    parts.push(`{\\k${Math.floor((first.startMs - segment.startMs) / 10)}}`);
  }
  segment.words.forEach((word, i) => {
    const until = segment.words[i + 1]?.startMs ?? Math.max(word.endMs, segment.endMs);
    const cs = Math.max(1, Math.floor((until - word.startMs) / 10));
    parts.push(`{\\k${cs}}${escapeAssText(word.text)}${i < segment.words.length - 1 ? ' ' : ''}`);
  });
  return parts.join('');
}

export function buildAssDocument(track: CaptionTrack, profile: TargetProfile): string {
  const header = [
    '[Script Info]',
    'Title: panelcut captions',
    'ScriptType: v4.00+',
    'WrapStyle: 0',
    'ScaledBorderAndShadow: yes',
    'YCbCr Matrix: TV.709',
    `PlayResX: ${profile.width}`,
    `PlayResY: ${profile.height}`,
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
    `Style: Caption,Noto Sans,56,${COLOURS.spoken},${COLOURS.pending},${COLOURS.outline},${COLOURS.box},-1,0,0,0,100,100,1,0,3,4,0,2,40,40,120,1`,
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
  ];

  const events = track.segments.map((seg) =>
    `Dialogue: 0,${msToAssTime(seg.startMs)},${msToAssTime(seg.endMs)},Caption,${(seg.speaker ?? '').replace(/,/g, ' ')},0,0,0,,${karaokeText(seg)}`,
  );

  return [...header, ...events].join('\n') + '\n';
}

/** Escape a path for use as the subtitles filter's filename argument. */
export function escapeFilterPath(filePath: string): string {
  return filePath
    .replace(/\\/g, '\\\\')
    .replace(/:/g, '\\:')
    .replace(/'/g, "\\'")
    .replace(/,/g, '\\,');
}
