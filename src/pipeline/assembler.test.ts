import * as fs from 'fs';
import * as path from 'path';
import { createTestContext, makeTempDir, removeDir, type TestContext } from '../__testutils__/context.js';
import { AAC_STEREO, CANONICAL_VIDEO, SMALL_FULL_RANGE_VIDEO, writeFakeMedia } from '../__testutils__/fakeTranscoder.js';
import { clipFromProbe } from '../media/probe.js';
import {
  composeFinal,
  deliverArtifact,
  planComposition,
  syncPanels,
  verifyWithRepair,
  type PlacedPanel,
  type ReadyPanel,
} from './assembler.js';
import type { PipelineEvent } from './events.js';
import { artifactPath } from './runContext.js';
import type { PanelAudio } from './types.js';

let t: TestContext;
let events: PipelineEvent[];
const emit = (e: PipelineEvent): void => { events.push(e); };

beforeEach(async () => {
  t = await createTestContext();
  events = [];
});
afterEach(async () => { await removeDir(t.root); });

async function readyPanel(index: number, opts: { audioMs?: number; video?: typeof CANONICAL_VIDEO } = {}): Promise<ReadyPanel> {
  const videoPath = artifactPath(t.ctx, `v${index}.mp4`);
  const media = { durationMs: 5000, video: opts.video ?? CANONICAL_VIDEO, audio: null };
  await writeFakeMedia(videoPath, media);
  let audio: PanelAudio | null = null;
  if (opts.audioMs !== undefined) {
    const audioPath = artifactPath(t.ctx, `a${index}.m4a`);
    await writeFakeMedia(audioPath, { durationMs: opts.audioMs, video: null, audio: AAC_STEREO });
    audio = {
      track: { path: audioPath, durationMs: opts.audioMs },
      words: [{ text: 'hi', startMs: 0, endMs: 400 }],
      lines: [{ text: 'hi', speaker: 'Ana', wordCount: 1 }],
    };
  }
  return {
    status: 'ready',
    panel: { index, imagePath: `p${index}.png` },
    targetDurationMs: 4000,
    video: clipFromProbe(videoPath, media),
    audio,
  };
}

describe('syncPanels', () => {
  it('syncs dialogue panels and fits music panels to their targets', async () => {
    const placed = await syncPanels(t.ctx, [await readyPanel(0, { audioMs: 1500 }), await readyPanel(1)], new Map([[1, ['la']]]), emit);

    expect(placed.map((p) => [p.panelIndex, path.basename(p.path), p.durationMs, p.lyricLines])).toEqual([
      [0, 'panel-0-synced.mp4', 4000, []],
      [1, 'panel-1-fitted.mp4', 4000, ['la']],
    ]);
  });

  it('drops a panel whose sync fails and reports it', async () => {
    const broken = await readyPanel(1, { audioMs: 1500 });
    await fs.promises.rm(broken.audio?.track.path ?? '');

    const placed = await syncPanels(t.ctx, [await readyPanel(0, { audioMs: 1500 }), broken], new Map(), emit);

    expect(placed.map((p) => p.panelIndex)).toEqual([0]);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: 'video_progress', index: 1 });
    expect(events[0] && 'message' in events[0] ? events[0].message : '').toMatch(/^Panel 2 dropped: Panel 1: audio input unreadable/);
  });
});

describe('planComposition', () => {
  const placed = (panelIndex: number, audio: PanelAudio | null, lyricLines: string[] = []): PlacedPanel => ({
    panelIndex, path: `/w/panel-${panelIndex}.mp4`, durationMs: 4000, audio, lyricLines,
  });
  const audio: PanelAudio = {
    track: { path: '/w/a.m4a', durationMs: 400 },
    words: [{ text: 'hi', startMs: 0, endMs: 400 }],
    lines: [{ text: 'hi', wordCount: 1 }],
  };

  it('expects the sum of surviving targets and audio in dialogue runs', () => {
    const plan = planComposition(t.ctx, [placed(0, audio), placed(2, audio)], { mode: 'dialogue', music: null, captions: true });

    expect(plan.expected).toEqual({ durationMs: 8000, width: 1080, height: 1920, requireAudio: true });
    expect(plan.captions?.strategy).toBe('alignment_locked');
    expect(plan.captions?.segments.map((s) => [s.startMs, s.endMs])).toEqual([[0, 400], [4000, 4400]]);
  });

  it('uses panel-locked captions and requires audio only with a song in music runs', () => {
    const withoutSong = planComposition(t.ctx, [placed(0, null, ['la la'])], { mode: 'music', music: null, captions: true });
    expect(withoutSong.expected.requireAudio).toBe(false);
    expect(withoutSong.captions?.strategy).toBe('panel_locked');

    const withSong = planComposition(t.ctx, [placed(0, null)], { mode: 'music', music: { path: '/w/m.mp3', durationMs: 4000 }, captions: false });
    expect(withSong.expected.requireAudio).toBe(true);
    expect(withSong.captions).toBeNull();
  });
});

describe('composeFinal / verifyWithRepair', () => {
  it('repairs a resolution failure once by forcing normalization', async () => {
    const placed = await syncPanels(t.ctx, [await readyPanel(0, { audioMs: 1000 }), await readyPanel(1, { audioMs: 1000 })], new Map(), emit);
    const plan = planComposition(t.ctx, placed, { mode: 'dialogue', music: null, captions: true });
    t.transcoder.corruptNextConcat = SMALL_FULL_RANGE_VIDEO;

    const composed = await composeFinal(t.ctx, plan, emit);
    const verified = await verifyWithRepair(t.ctx, plan, composed, emit);

    expect(composed).toEqual({ path: artifactPath(t.ctx, 'final.mp4'), hasCaptions: true });
    expect(verified.repaired).toBe(true);
    expect(verified.artifact).toEqual({ path: artifactPath(t.ctx, 'final.repair.mp4'), hasCaptions: true });
    expect(verified.verification.passed).toBe(true);
    expect(t.transcoder.callsOf('normalize')).toHaveLength(2);
  });

  it('keeps the first artifact, unverified, when the repair pass fails', async () => {
    const placed = await syncPanels(t.ctx, [await readyPanel(0, { audioMs: 1000 })], new Map(), emit);
    const plan = planComposition(t.ctx, placed, { mode: 'dialogue', music: null, captions: false });
    t.transcoder.corruptNextConcat = SMALL_FULL_RANGE_VIDEO;

    const composed = await composeFinal(t.ctx, plan, emit);
    t.transcoder.failOps.add('normalize');
    const verified = await verifyWithRepair(t.ctx, plan, composed, emit);

    expect(verified.repaired).toBe(false);
    expect(verified.artifact).toEqual({ path: artifactPath(t.ctx, 'joined.mp4'), hasCaptions: false });
    expect(verified.verification.passed).toBe(false);
    expect(verified.verification.checks.resolution).toBe(false);
    expect(verified.verification.failures.at(-1)).toMatch(/^repair failed: Normalization before concat failed: /);
  });

  it('leaves a passing artifact alone', async () => {
    const placed = await syncPanels(t.ctx, [await readyPanel(0, { audioMs: 1000 })], new Map(), emit);
    const plan = planComposition(t.ctx, placed, { mode: 'dialogue', music: null, captions: false });

    const composed = await composeFinal(t.ctx, plan, emit);
    const verified = await verifyWithRepair(t.ctx, plan, composed, emit);

    expect(composed).toEqual({ path: artifactPath(t.ctx, 'joined.mp4'), hasCaptions: false });
    expect(verified.repaired).toBe(false);
    expect(verified.verification.observed.durationMs).toBe(4000);
  });

  it('attaches the song to the joined clip in music runs', async () => {
    const placed = await syncPanels(t.ctx, [await readyPanel(0), await readyPanel(1)], new Map(), emit);
    const musicPath = artifactPath(t.ctx, 'music.mp3');
    await writeFakeMedia(musicPath, { durationMs: 7000, video: null, audio: AAC_STEREO });
    const plan = planComposition(t.ctx, placed, { mode: 'music', music: { path: musicPath, durationMs: 7000 }, captions: false });

    const composed = await composeFinal(t.ctx, plan, emit);

    expect(composed.path).toBe(artifactPath(t.ctx, 'composition-synced.mp4'));
    const probe = await t.transcoder.probe(composed.path);
    expect(probe.durationMs).toBe(8000);
    expect(probe.audio).toEqual(AAC_STEREO);
  });

  it('turns a failed caption burn into a CompositionError', async () => {
    const placed = await syncPanels(t.ctx, [await readyPanel(0, { audioMs: 1000 })], new Map(), emit);
    const plan = planComposition(t.ctx, placed, { mode: 'dialogue', music: null, captions: true });
    t.transcoder.failOps.add('burnCaptions');

    await expect(composeFinal(t.ctx, plan, emit))
      .rejects.toThrow('Caption burn-in failed: FFmpeg burnCaptions failed: Conversion failed!');
  });
});

describe('deliverArtifact', () => {
  it('moves the artifact to the output directory under the run id', async () => {
    const out = await makeTempDir();
    try {
      const src = artifactPath(t.ctx, 'final.mp4');
      await fs.promises.writeFile(src, 'video');

      const dest = await deliverArtifact(t.ctx, src, out);

      expect(dest).toBe(path.join(out, 'test.mp4'));
      expect(await fs.promises.readFile(dest, 'utf-8')).toBe('video');
      expect(fs.existsSync(src)).toBe(false);
    } finally {
      await removeDir(out);
    }
  });
});
