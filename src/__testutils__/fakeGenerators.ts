import type {
  AlignRequest, Collaborators, ForcedAligner, MusicGenerator, MusicRequest,
  SpeechGenerator, SpeechRequest, VideoGenerator, VideoRequest,
} from '../ai/types.js';
import type { VideoStreamInfo } from '../media/transcoder.js';
import type { AudioTrack, SilentClip, WordSegment } from '../pipeline/types.js';
import { GenerationError } from '../utils/errors.js';
import { AAC_STEREO, CANONICAL_VIDEO, writeFakeMedia } from './fakeTranscoder.js';

export const SPEECH_MS_PER_WORD = 400;

export interface FakeVideoOptions {
  durationMs?: number;
  /** Panels whose generation always fails. */
  failPanels?: readonly number[];
  /** Panels that fail this many times before succeeding. */
  flakyPanels?: ReadonlyMap<number, number>;
  videoFor?: (panelIndex: number) => VideoStreamInfo;
  withAudio?: readonly number[];
}

export class FakeVideoGenerator implements VideoGenerator {
  readonly requests: VideoRequest[] = [];
  private readonly attempts = new Map<number, number>();

  constructor(private readonly opts: FakeVideoOptions = {}) {}

  async generate(req: VideoRequest): Promise<SilentClip> {
    this.requests.push(req);
    const index = req.panel.index;
    const attempt = (this.attempts.get(index) ?? 0) + 1;
    this.attempts.set(index, attempt);

    if (this.opts.failPanels?.includes(index)) throw new GenerationError(`content policy rejection for panel ${index}`, index);
    if (attempt <= (this.opts.flakyPanels?.get(index) ?? 0)) throw new GenerationError(`upstream busy (attempt ${attempt})`, index);

    const video = this.opts.videoFor?.(index) ?? CANONICAL_VIDEO;
    const hasAudio = this.opts.withAudio?.includes(index) ?? false;
    const durationMs = this.opts.durationMs ?? 5000;
    await writeFakeMedia(req.outputPath, { durationMs, video, audio: hasAudio ? AAC_STEREO : null });
    return {
      path: req.outputPath,
      durationMs,
      width: video.width,
      height: video.height,
      pixelFormat: video.pixelFormat,
      colorSpace: video.colorSpace,
      colorRange: video.colorRange,
      hasAudio,
    };
  }

  attemptsFor(panelIndex: number): number {
    return this.attempts.get(panelIndex) ?? 0;
  }
}

/** Speech lasts SPEECH_MS_PER_WORD per word of the line. */
export class FakeSpeechGenerator implements SpeechGenerator {
  readonly requests: SpeechRequest[] = [];

  constructor(private readonly failTexts: readonly string[] = []) {}

  async synthesize(req: SpeechRequest): Promise<AudioTrack> {
    this.requests.push(req);
    if (this.failTexts.includes(req.text)) throw new GenerationError(`tts rejected "${req.text}"`);
    const durationMs = req.text.split(/\s+/).filter(Boolean).length * SPEECH_MS_PER_WORD;
    await writeFakeMedia(req.outputPath, { durationMs, video: null, audio: AAC_STEREO });
    return { path: req.outputPath, durationMs, sampleRate: 44100, channels: 2 };
  }
}

export class FakeMusicGenerator implements MusicGenerator {
  readonly requests: MusicRequest[] = [];

  constructor(private readonly fail = false) {}

  async compose(req: MusicRequest): Promise<AudioTrack> {
    this.requests.push(req);
    if (this.fail) throw new GenerationError('music service unavailable');
    await writeFakeMedia(req.outputPath, { durationMs: req.durationMs, video: null, audio: AAC_STEREO });
    return { path: req.outputPath, durationMs: req.durationMs, sampleRate: 44100, channels: 2 };
  }
}

/** Lays the words back to back, SPEECH_MS_PER_WORD each, from time zero. */
export class FakeAligner implements ForcedAligner {
  readonly requests: AlignRequest[] = [];

  constructor(private readonly failTexts: readonly string[] = []) {}

  async align(req: AlignRequest): Promise<WordSegment[]> {
    this.requests.push(req);
    if (this.failTexts.includes(req.text)) throw new GenerationError('alignment failed');
    return req.text.split(/\s+/).filter(Boolean).map((text, i) => ({
      text,
      startMs: i * SPEECH_MS_PER_WORD,
      endMs: (i + 1) * SPEECH_MS_PER_WORD,
    }));
  }
}

export interface FakeCollaborators extends Collaborators {
  video: FakeVideoGenerator;
  speech: FakeSpeechGenerator;
  music: FakeMusicGenerator;
  aligner: FakeAligner;
}

export function fakeCollaborators(overrides: Partial<FakeCollaborators> = {}): FakeCollaborators {
  return {
    video: overrides.video ?? new FakeVideoGenerator(),
    speech: overrides.speech ?? new FakeSpeechGenerator(),
    music: overrides.music ?? new FakeMusicGenerator(),
    aligner: overrides.aligner ?? new FakeAligner(),
  };
}
