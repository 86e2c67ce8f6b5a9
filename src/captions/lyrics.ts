/**
 * Lyric text handling for music mode.
 */

// [Verse 1], [Chorus], [Bridge] ...
const STRUCTURE_TAG = /^\[.*\]$/;

/** Non-empty lyric lines with song-structure tags removed. */
export function extractLyricLines(lyrics: string): string[] {
  return lyrics
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !STRUCTURE_TAG.test(line));
}

/**
 * Split lines into `panelCount` consecutive groups of ⌊lines/panels⌋ (at
 * least one). Lines left over go to the last panel; panels past the end of
 * the lyrics get an empty group.
 */
export function groupLinesByPanel(lines: readonly string[], panelCount: number): string[][] {
  if (panelCount <= 0) return [];
  const perPanel = Math.max(1, Math.floor(lines.length / panelCount));
  const groups: string[][] = [];
  for (let p = 0; p < panelCount; p++) {
    const start = p * perPanel;
    const end = p === panelCount - 1 ? lines.length : Math.min(start + perPanel, lines.length);
    groups.push(lines.slice(start, Math.max(start, end)));
  }
  return groups;
}
