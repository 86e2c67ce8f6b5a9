/**
 * Song generation via ElevenLabs music. One global track per run.
 */
import { audioTrackFromProbe } from '../media/probe.js';
import type { Transcoder } from '../media/transcoder.js';
import type { AudioTrack } from '../pipeline/types.js';
import { GenerationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ElevenLabsClient } from './elevenlabs.js';
import { writeBody } from './http.js';
import type { MusicGenerator, MusicRequest } from './types.js';

// API limits on music_length_ms
const MIN_LENGTH_MS = 10_000;
const MAX_LENGTH_MS = 300_000;

export function musicPrompt(style: string, lyrics: string): string {
  return `${style.trim()}\n\nLyrics:\n${lyrics.trim()}`;
}

export function musicLengthMs(durationMs: number): number {
  return Math.min(MAX_LENGTH_MS, Math.max(MIN_LENGTH_MS, Math.round(durationMs)));
}

export class ElevenLabsMusicGenerator implements MusicGenerator {
  constructor(
    private readonly transcoder: Transcoder,
    private readonly client = new ElevenLabsClient(),
  ) {}

  async compose(req: MusicRequest): Promise<AudioTrack> {
    const lengthMs = musicLengthMs(req.durationMs);
    logger.info('music.compose', { style: req.style, lengthMs });

    const res = await this.client.post('/v1/music', {
      query: { output_format: 'mp3_44100_128' },
      accept: 'audio/mpeg',
      signal: req.signal,
      body: { prompt: musicPrompt(req.style, req.lyrics), music_length_ms: lengthMs },
    });
    await writeBody(res, req.outputPath);

    const probe = await this.transcoder.probe(req.outputPath);
    if (!probe.audio || probe.durationMs <= 0) throw new GenerationError('Music track came back empty');
    return audioTrackFromProbe(req.outputPath, probe);
  }
}
