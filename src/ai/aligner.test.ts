import * as fs from 'fs';
import * as path from 'path';
import { makeTempDir, removeDir } from '../__testutils__/context.js';
import { json, stubFetch } from '../__testutils__/stubFetch.js';
import { ElevenLabsAligner, toWordSegments } from './aligner.js';
import { ElevenLabsClient } from './elevenlabs.js';

describe('toWordSegments', () => {
  it('converts seconds to ms and drops whitespace tokens', () => {
    expect(toWordSegments([
      { text: ' hi ', start: 0.1, end: 0.35 },
      { text: ' ', start: 0.35, end: 0.4 },
      { text: 'there', start: 0.4, end: 0.9 },
    ])).toEqual([
      { text: 'hi', startMs: 100, endMs: 350 },
      { text: 'there', startMs: 400, endMs: 900 },
    ]);
  });
});

describe('ElevenLabsAligner', () => {
  it('uploads the audio with its transcript as a form', async () => {
    const dir = await makeTempDir();
    try {
      const audioPath = path.join(dir, 'speech.m4a');
      await fs.promises.writeFile(audioPath, 'audio-bytes');
      const stub = stubFetch(() => json({ words: [{ text: 'hi', start: 0, end: 0.25 }] }));
      const aligner = new ElevenLabsAligner(new ElevenLabsClient('test-secret', stub.fetch, 'https://api.test'));

      const words = await aligner.align({
        audio: { path: audioPath, durationMs: 250 },
        text: 'hi',
        signal: new AbortController().signal,
      });

      expect(words).toEqual([{ text: 'hi', startMs: 0, endMs: 250 }]);
      const req = stub.requests[0];
      expect(req?.url).toBe('https://api.test/v1/forced-alignment');
      expect(req?.headers.get('Content-Type')).toBeNull();
      expect(req?.body instanceof FormData ? req.body.get('text') : null).toBe('hi');
    } finally {
      await removeDir(dir);
    }
  });
});
