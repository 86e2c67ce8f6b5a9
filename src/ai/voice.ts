/**
 * Text-to-speech via ElevenLabs.
 * Voice consistency: a persona key always resolves to the same voice id and
 * the same sampling seed, so repeated lines from one character sound alike.
 */
import { env } from '../config.js';
import { audioTrackFromProbe } from '../media/probe.js';
import type { Transcoder } from '../media/transcoder.js';
import type { AudioTrack } from '../pipeline/types.js';
import { GenerationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { ElevenLabsClient } from './elevenlabs.js';
import { writeBody } from './http.js';
import type { SpeechGenerator, SpeechRequest } from './types.js';

const TTS_MODEL = 'eleven_multilingual_v2';
const OUTPUT_FORMAT = 'mp3_44100_128';

/** FNV-1a, kept within ElevenLabs' seed range. */
export function personaSeed(voiceKey: string): number {
  let hash = 0x811c9dc5;
  for (const ch of voiceKey) {
    hash ^= ch.codePointAt(0) ?? 0;
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash % 4_294_967_295;
}

export class ElevenLabsSpeechGenerator implements SpeechGenerator {
  constructor(
    private readonly transcoder: Transcoder,
    /** Persona key → ElevenLabs voice id. */
    private readonly voices: Readonly<Record<string, string>> = {},
    private readonly client = new ElevenLabsClient(),
    private readonly defaultVoice = env.ELEVENLABS_DEFAULT_VOICE,
  ) {}

  voiceFor(voiceKey: string): string {
    return this.voices[voiceKey] ?? this.defaultVoice;
  }

  async synthesize(req: SpeechRequest): Promise<AudioTrack> {
    const voiceId = this.voiceFor(req.voiceKey);
    logger.debug('voice.synthesize', { voiceKey: req.voiceKey, voiceId, chars: req.text.length });

    const res = await this.client.post(`/v1/text-to-speech/${encodeURIComponent(voiceId)}`, {
      query: { output_format: OUTPUT_FORMAT },
      accept: 'audio/mpeg',
      signal: req.signal,
      body: {
        text: req.text,
        model_id: TTS_MODEL,
        seed: personaSeed(req.voiceKey),
        voice_settings: { stability: 0.5, similarity_boost: 0.75 },
      },
    });
    await writeBody(res, req.outputPath);

    const probe = await this.transcoder.probe(req.outputPath);
    if (!probe.audio || probe.durationMs <= 0) {
      throw new GenerationError(`Speech for "${req.voiceKey}" came back empty`);
    }
    return audioTrackFromProbe(req.outputPath, probe);
  }
}
