/**
 * Concatenator: join ordered clips into one continuous video.
 *
 * Fast path: every clip already conforms to the target profile → stream copy.
 * Slow path: any deviation (or `forceNormalize`) → normalize every clip first.
 * A profile-mixed set is never handed to the stream-copy concat.
 */
import { artifactPath, type RunContext } from '../pipeline/runContext.js';
import { ConcatError, errorMessage } from '../utils/errors.js';
import { describeProfile, matchesProfile } from './probe.js';
import { normalizeClip } from './normalizer.js';
import type { MediaProbe } from './transcoder.js';

export interface ConcatOptions {
  /** Normalize every clip regardless of what the probe reports. */
  forceNormalize?: boolean;
  outputName?: string;
}

export interface ConcatResult {
  path: string;
  durationMs: number;
  width: number;
  height: number;
  hasAudio: boolean;
  strategy: 'stream_copy' | 'normalized';
  clipCount: number;
  probe: MediaProbe;
}

export async function concatClips(ctx: RunContext, clipPaths: readonly string[], opts: ConcatOptions = {}): Promise<ConcatResult> {
  if (clipPaths.length === 0) throw new ConcatError('No clips to concatenate');

  const probes: MediaProbe[] = [];
  for (const [i, clipPath] of clipPaths.entries()) {
    try {
      probes.push(await ctx.transcoder.probe(clipPath));
    } catch (err) {
      throw new ConcatError(`Cannot open clip ${i} (${clipPath}): ${errorMessage(err)}`, { cause: err });
    }
  }

  const mismatched = probes
    .map((probe, i) => ({ i, probe }))
    .filter(({ probe }) => !matchesProfile(probe, ctx.profile));
  const slowPath = opts.forceNormalize === true || mismatched.length > 0;

  let inputs = [...clipPaths];
  if (slowPath) {
    ctx.log.info('Concatenator: normalizing before concat', {
      forced: opts.forceNormalize === true,
      mismatched: mismatched.map(({ i, probe }) => `${i}:${describeProfile(probe)}`),
    });
    inputs = [];
    for (const clipPath of clipPaths) {
      try {
        const normalized = await normalizeClip(ctx, clipPath, { force: opts.forceNormalize });
        inputs.push(normalized.path);
      } catch (err) {
        throw new ConcatError(`Normalization before concat failed: ${errorMessage(err)}`, { cause: err });
      }
    }
  }

  const outputPath = artifactPath(ctx, opts.outputName ?? (slowPath ? 'joined.normalized.mp4' : 'joined.mp4'));
  let joined: MediaProbe;
  try {
    await ctx.transcoder.concat(inputs, outputPath);
    joined = await ctx.transcoder.probe(outputPath);
  } catch (err) {
    throw new ConcatError(`Concatenation failed: ${errorMessage(err)}`, { cause: err });
  }

  const result: ConcatResult = {
    path: outputPath,
    durationMs: joined.durationMs,
    width: joined.video?.width ?? 0,
    height: joined.video?.height ?? 0,
    hasAudio: joined.audio !== null,
    strategy: slowPath ? 'normalized' : 'stream_copy',
    clipCount: clipPaths.length,
    probe: joined,
  };
  ctx.log.info('Concatenator: joined', { clips: result.clipCount, strategy: result.strategy, durationMs: result.durationMs });
  return result;
}
