/**
 * Image-to-video via fal.ai. This module is the sole entry point for clip
 * generation; pipeline code never calls fal.ai directly.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PIPELINE_POLICY } from '../config.js';
import { clipFromProbe } from '../media/probe.js';
import type { Transcoder } from '../media/transcoder.js';
import type { Panel, SilentClip } from '../pipeline/types.js';
import { GenerationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { FalQueueClient } from './fal.js';
import { downloadTo, type FetchLike } from './http.js';
import type { VideoGenerator, VideoRequest } from './types.js';

const DEFAULT_MODEL = 'fal-ai/kling-video/v2.1/standard/image-to-video';

// The model accepts 5 s or 10 s; ClipSync trims the surplus
const SUPPORTED_SECONDS = [5, 10] as const;
const LONGEST_SECONDS = 10;

const VideoResultSchema = z.object({
  video: z.object({ url: z.string().url() }),
});

const MIME_BY_EXT: Record<string, string> = {
  '.png':  'image/png',
  '.jpg':  'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
};

export function clipSecondsFor(targetDurationMs: number): number {
  const wanted = targetDurationMs / 1000;
  return SUPPORTED_SECONDS.find((s) => s >= wanted) ?? LONGEST_SECONDS;
}

export function motionPrompt(panel: Panel): string {
  const base = 'Keep the first frame exactly as the input image. Smooth, subtle character animation. Vertical 9:16 framing.';
  return panel.shot ? `${base} Camera: ${panel.shot}` : base;
}

/** Remote references pass through; local images are inlined as data URIs. */
export async function imageReference(imagePath: string): Promise<string> {
  if (/^https?:\/\//.test(imagePath) || imagePath.startsWith('data:')) return imagePath;
  const mime = MIME_BY_EXT[path.extname(imagePath).toLowerCase()] ?? 'application/octet-stream';
  const data = await fs.promises.readFile(imagePath);
  return `data:${mime};base64,${data.toString('base64')}`;
}

export class FalVideoGenerator implements VideoGenerator {
  constructor(
    private readonly transcoder: Transcoder,
    private readonly client = new FalQueueClient(),
    private readonly fetchImpl: FetchLike = fetch,
    private readonly model = DEFAULT_MODEL,
    private readonly timeoutMs = PIPELINE_POLICY.generationTimeoutMs,
  ) {}

  async generate(req: VideoRequest): Promise<SilentClip> {
    const { panel } = req;
    logger.info('video.generate', { panelIndex: panel.index, targetDurationMs: req.targetDurationMs });

    const result = await this.client.run(this.model, {
      prompt: motionPrompt(panel),
      image_url: await imageReference(panel.imagePath),
      duration: String(clipSecondsFor(req.targetDurationMs)),
      aspect_ratio: '9:16',
      generate_audio: false,
    }, VideoResultSchema, { signal: req.signal, timeoutMs: this.timeoutMs });

    await downloadTo(this.fetchImpl, result.video.url, req.outputPath, req.signal);

    const probe = await this.transcoder.probe(req.outputPath);
    if (!probe.video || probe.durationMs <= 0) {
      throw new GenerationError(`Panel ${panel.index}: generated clip has no usable video`, panel.index);
    }
    return clipFromProbe(req.outputPath, probe);
  }
}
