/**
 * Normalizer: bring a clip to the canonical profile (resolution, pixel
 * format, colorspace, range). Always probes; a conforming clip comes back
 * untouched, so normalizing twice equals normalizing once.
 */
import * as path from 'path';
import { artifactPath, type RunContext } from '../pipeline/runContext.js';
import { NormalizeError, errorMessage } from '../utils/errors.js';
import { describeProfile, matchesProfile } from './probe.js';
import type { MediaProbe } from './transcoder.js';

export interface NormalizedClip {
  path: string;
  probe: MediaProbe;
  /** False when the input already conformed and was returned as-is. */
  transcoded: boolean;
}

export interface NormalizeOptions {
  /** Re-encode even when the probe reports a conforming clip. */
  force?: boolean;
}

async function probeOrThrow(ctx: RunContext, filePath: string): Promise<MediaProbe> {
  try {
    return await ctx.transcoder.probe(filePath);
  } catch (err) {
    throw new NormalizeError(`Cannot probe ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

export async function normalizeClip(ctx: RunContext, inputPath: string, opts: NormalizeOptions = {}): Promise<NormalizedClip> {
  const before = await probeOrThrow(ctx, inputPath);
  if (!before.video) throw new NormalizeError(`No video stream in ${inputPath}`);

  if (!opts.force && matchesProfile(before, ctx.profile)) {
    return { path: inputPath, probe: before, transcoded: false };
  }

  const base = path.basename(inputPath, path.extname(inputPath));
  const outputPath = artifactPath(ctx, `${base}.norm${opts.force ? '-forced' : ''}.mp4`);
  try {
    await ctx.transcoder.normalize(inputPath, ctx.profile, outputPath);
  } catch (err) {
    throw new NormalizeError(`Normalization failed for ${inputPath}: ${errorMessage(err)}`, { cause: err });
  }

  const after = await probeOrThrow(ctx, outputPath);
  if (!matchesProfile(after, ctx.profile)) {
    throw new NormalizeError(`Normalized output still off-profile: ${describeProfile(after)}`);
  }

  ctx.log.info('Normalizer: clip normalized', {
    input: path.basename(inputPath),
    from: describeProfile(before),
    to: describeProfile(after),
  });
  return { path: outputPath, probe: after, transcoded: true };
}
