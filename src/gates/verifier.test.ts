import * as fs from 'fs';
import * as path from 'path';
import { makeTempDir, removeDir } from '../__testutils__/context.js';
import { AAC_STEREO, CANONICAL_VIDEO, FakeTranscoder, writeFakeMedia } from '../__testutils__/fakeTranscoder.js';
import type { ExpectedOutput } from '../pipeline/types.js';
import { durationWithinTolerance, verifyOutput } from './verifier.js';

const EXPECTED: ExpectedOutput = { durationMs: 8000, width: 1080, height: 1920, requireAudio: true };
const OPTS = { durationToleranceMs: 2000, minOutputBytes: 10_000 };

let dir: string;
const transcoder = new FakeTranscoder();

beforeEach(async () => { dir = await makeTempDir(); });
afterEach(async () => { await removeDir(dir); });

describe('durationWithinTolerance', () => {
  it('includes the tolerance boundary', () => {
    expect(durationWithinTolerance(10_000, 8000, 2000)).toBe(true);
    expect(durationWithinTolerance(10_001, 8000, 2000)).toBe(false);
  });

  it('passes when no duration is expected', () => {
    expect(durationWithinTolerance(123, undefined, 0)).toBe(true);
  });
});

describe('verifyOutput', () => {
  it('passes a conforming artifact and reports what it saw', async () => {
    const p = path.join(dir, 'final.mp4');
    await writeFakeMedia(p, { durationMs: 8500, video: CANONICAL_VIDEO, audio: AAC_STEREO });
    const size = (await fs.promises.stat(p)).size;

    const result = await verifyOutput(transcoder, p, EXPECTED, OPTS);

    expect(result.passed).toBe(true);
    expect(result.failures).toEqual([]);
    expect(result.observed).toEqual({
      durationMs: 8500, width: 1080, height: 1920, hasVideo: true, hasAudio: true, fileSizeBytes: size,
    });
  });

  it('reports a missing file and stops', async () => {
    const p = path.join(dir, 'nope.mp4');
    const result = await verifyOutput(transcoder, p, EXPECTED, OPTS);
    expect(result.passed).toBe(false);
    expect(result.failures).toEqual([`File not found: ${p}`]);
    expect(result.checks.exists).toBe(false);
  });

  it('collects every failing check of a wrong artifact', async () => {
    const p = path.join(dir, 'final.mp4');
    await writeFakeMedia(p, {
      durationMs: 12_000,
      video: { ...CANONICAL_VIDEO, width: 720, height: 1280 },
      audio: null,
    });

    const result = await verifyOutput(transcoder, p, EXPECTED, OPTS);

    expect(result.failures).toEqual([
      'No audio stream found (required)',
      'Duration mismatch: expected 8000ms, got 12000ms (tolerance 2000ms)',
      'Resolution mismatch: expected 1080x1920, got 720x1280',
    ]);
    expect(result.checks).toEqual({ exists: true, fileSize: true, video: true, duration: false, resolution: false, audio: false });
  });

  it('flags a tiny audio-only file', async () => {
    const p = path.join(dir, 'final.mp4');
    await writeFakeMedia(p, { durationMs: 8000, video: null, audio: AAC_STEREO });
    const size = (await fs.promises.stat(p)).size;

    const result = await verifyOutput(transcoder, p, EXPECTED, OPTS);

    expect(result.failures).toEqual([
      `File too small: ${size} bytes (min 10000)`,
      'No video stream found',
      'Resolution mismatch: expected 1080x1920, got 0x0',
    ]);
  });

  it('does not require audio unless asked', async () => {
    const p = path.join(dir, 'final.mp4');
    await writeFakeMedia(p, { durationMs: 8000, video: CANONICAL_VIDEO, audio: null });
    const result = await verifyOutput(transcoder, p, { ...EXPECTED, requireAudio: false }, OPTS);
    expect(result.passed).toBe(true);
  });

  it('turns an unreadable file into a probe failure', async () => {
    const p = path.join(dir, 'final.mp4');
    await fs.promises.writeFile(p, 'not media');
    const result = await verifyOutput(transcoder, p, EXPECTED, { ...OPTS, minOutputBytes: 0 });
    expect(result.failures).toEqual([`Probe failed: ${p}: Invalid data found when processing input`]);
  });
});
