/**
 * Forced alignment via ElevenLabs: word timestamps for the exact audio that
 * will be played, keyed to the text that was spoken.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { WordSegment } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';
import { ElevenLabsClient } from './elevenlabs.js';
import { readJson } from './http.js';
import type { AlignRequest, ForcedAligner } from './types.js';

const AlignmentSchema = z.object({
  words: z.array(z.object({
    text:  z.string(),
    start: z.number(),
    end:   z.number(),
  })),
});

/** Seconds → ms; whitespace tokens the API returns between words are dropped. */
export function toWordSegments(words: z.infer<typeof AlignmentSchema>['words']): WordSegment[] {
  return words
    .filter((w) => w.text.trim().length > 0)
    .map((w) => ({ text: w.text.trim(), startMs: Math.round(w.start * 1000), endMs: Math.round(w.end * 1000) }));
}

export class ElevenLabsAligner implements ForcedAligner {
  constructor(private readonly client = new ElevenLabsClient()) {}

  async align(req: AlignRequest): Promise<WordSegment[]> {
    const audio = await fs.promises.readFile(req.audio.path);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)]), path.basename(req.audio.path));
    form.append('text', req.text);

    const res = await this.client.post('/v1/forced-alignment', { body: form, signal: req.signal });
    const words = toWordSegments((await readJson(res, AlignmentSchema, 'forced alignment')).words);
    logger.debug('aligner.align', { words: words.length, audioMs: req.audio.durationMs });
    return words;
  }
}
