import { createTestContext, removeDir, type TestContext } from '../__testutils__/context.js';
import { AAC_STEREO, CANONICAL_VIDEO, writeFakeMedia } from '../__testutils__/fakeTranscoder.js';
import { artifactPath } from '../pipeline/runContext.js';
import type { AudioTrack, SilentClip } from '../pipeline/types.js';
import { SyncError } from '../utils/errors.js';
import { fitClip, syncClip } from './clipSync.js';
import { clipFromProbe } from './probe.js';

let t: TestContext;

beforeEach(async () => { t = await createTestContext(); });
afterEach(async () => { await removeDir(t.root); });

async function makeClip(name: string, durationMs: number, withAudio = false): Promise<SilentClip> {
  const p = artifactPath(t.ctx, name);
  const media = { durationMs, video: CANONICAL_VIDEO, audio: withAudio ? AAC_STEREO : null };
  await writeFakeMedia(p, media);
  return clipFromProbe(p, media);
}

async function makeAudio(name: string, durationMs: number): Promise<AudioTrack> {
  const p = artifactPath(t.ctx, name);
  await writeFakeMedia(p, { durationMs, video: null, audio: AAC_STEREO });
  return { path: p, durationMs };
}

describe('syncClip', () => {
  it('pads short audio to the target and attaches it', async () => {
    const clip = await makeClip('v.mp4', 5000);
    const audio = await makeAudio('a.mp3', 3000);

    const synced = await syncClip(t.ctx, clip, audio, 4000, 0);

    expect(synced).toEqual({
      path: artifactPath(t.ctx, 'panel-0-synced.mp4'), durationMs: 4000,
    });
    expect(t.transcoder.callsOf('padAudio')).toEqual([
      { op: 'padAudio', inputs: [audio.path], output: artifactPath(t.ctx, 'panel-0-audio-padded.m4a'), durationMs: 4000 },
    ]);
    expect(t.transcoder.callsOf('attachAudio')).toHaveLength(1);
    expect(t.transcoder.callsOf('mixAudio')).toHaveLength(0);
    expect((await t.transcoder.probe(synced.path)).durationMs).toBe(4000);
  });

  it('truncates long audio and holds the last frame of a short clip', async () => {
    const clip = await makeClip('v.mp4', 3000);
    const audio = await makeAudio('a.mp3', 6000);

    const synced = await syncClip(t.ctx, clip, audio, 4000, 1);

    expect(t.transcoder.callsOf('padAudio')).toHaveLength(0);
    const attach = t.transcoder.callsOf('attachAudio')[0];
    expect(attach?.inputs).toEqual([clip.path, audio.path]);
    expect(attach?.durationMs).toBe(4000);
    expect((await t.transcoder.probe(synced.path)).durationMs).toBe(4000);
  });

  it('mixes only when the clip already carries audio', async () => {
    const clip = await makeClip('v.mp4', 4000, true);
    const audio = await makeAudio('a.mp3', 4000);

    await syncClip(t.ctx, clip, audio, 4000, 0);

    expect(t.transcoder.callsOf('mixAudio')).toHaveLength(1);
    expect(t.transcoder.callsOf('attachAudio')).toHaveLength(0);
  });

  it('names composition outputs when no panel is given', async () => {
    const clip = await makeClip('joined.mp4', 8000);
    const audio = await makeAudio('music.mp3', 8000);

    const synced = await syncClip(t.ctx, clip, audio, 8000);

    expect(synced.path).toBe(artifactPath(t.ctx, 'composition-synced.mp4'));
  });

  it('fails with SyncError when the audio file is missing', async () => {
    const clip = await makeClip('v.mp4', 4000);
    const err = await syncClip(t.ctx, clip, { path: artifactPath(t.ctx, 'gone.mp3'), durationMs: 4000 }, 4000, 2)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SyncError);
    expect(err).toMatchObject({ panelIndex: 2 });
    expect(err instanceof Error ? err.message : '').toMatch(/^Panel 2: audio input unreadable \(/);
  });

  it('rejects zero-duration audio', async () => {
    const clip = await makeClip('v.mp4', 4000);
    const audio = await makeAudio('a.mp3', 0);
    await expect(syncClip(t.ctx, clip, audio, 4000, 0)).rejects.toThrow('Panel 0: audio input has zero duration');
  });

  it('rejects a non-positive target', async () => {
    const clip = await makeClip('v.mp4', 4000);
    const audio = await makeAudio('a.mp3', 4000);
    await expect(syncClip(t.ctx, clip, audio, 0, 3)).rejects.toThrow('Panel 3: invalid target duration 0ms');
  });

  it('wraps transcoder failures', async () => {
    const clip = await makeClip('v.mp4', 4000);
    const audio = await makeAudio('a.mp3', 4000);
    t.transcoder.failOps.add('attachAudio');
    await expect(syncClip(t.ctx, clip, audio, 4000, 0))
      .rejects.toThrow('Panel 0: sync failed (FFmpeg attachAudio failed: Conversion failed!)');
  });
});

describe('fitClip', () => {
  it('holds a short clip to the target and drops any audio', async () => {
    const clip = await makeClip('v.mp4', 3000, true);

    const fitted = await fitClip(t.ctx, clip, 4000, 0);

    expect(fitted.path).toBe(artifactPath(t.ctx, 'panel-0-fitted.mp4'));
    expect(fitted.durationMs).toBe(4000);
    expect(fitted.hasAudio).toBe(false);
    expect(t.transcoder.callsOf('fitVideo')[0]?.durationMs).toBe(4000);
  });

  it('rejects a fitted clip far shorter than the target', async () => {
    const clip = await makeClip('v.mp4', 3000);
    t.transcoder.fitShortfallMs = 3000;

    await expect(fitClip(t.ctx, clip, 8000, 1)).rejects.toMatchObject({
      name: 'SyncError',
      panelIndex: 1,
      message: 'Panel 1: fitted clip lasts 5000ms, expected 8000ms',
    });
  });
});
