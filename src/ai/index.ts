import type { Transcoder } from '../media/transcoder.js';
import { ElevenLabsAligner } from './aligner.js';
import { ElevenLabsClient } from './elevenlabs.js';
import { FalQueueClient } from './fal.js';
import { ElevenLabsMusicGenerator } from './music.js';
import type { Collaborators } from './types.js';
import { FalVideoGenerator } from './video.js';
import { ElevenLabsSpeechGenerator } from './voice.js';

/** Production collaborators: fal.ai for motion clips, ElevenLabs for speech, music and alignment. */
export function createCollaborators(transcoder: Transcoder, voices: Readonly<Record<string, string>> = {}): Collaborators {
  const elevenlabs = new ElevenLabsClient();
  return {
    video:   new FalVideoGenerator(transcoder, new FalQueueClient()),
    speech:  new ElevenLabsSpeechGenerator(transcoder, voices, elevenlabs),
    music:   new ElevenLabsMusicGenerator(transcoder, elevenlabs),
    aligner: new ElevenLabsAligner(elevenlabs),
  };
}

export type { Collaborators } from './types.js';
