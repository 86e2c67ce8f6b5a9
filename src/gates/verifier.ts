/**
 * Output verification gate.
 * Probes the final artifact and checks it against what the run promised:
 * file present and non-trivial, a video stream, duration within tolerance,
 * exact resolution, audio when required.
 * Never throws for a bad artifact; every problem becomes a failure string.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { MediaProbe, Transcoder } from '../media/transcoder.js';
import type { ExpectedOutput, VerificationResult } from '../pipeline/types.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface VerifyOptions {
  durationToleranceMs: number;
  minOutputBytes: number;
}

/** |actual − expected| ≤ tolerance; an unspecified expectation always passes. */
export function durationWithinTolerance(actualMs: number, expectedMs: number | undefined, toleranceMs: number): boolean {
  if (expectedMs === undefined) return true;
  return Math.abs(actualMs - expectedMs) <= toleranceMs;
}

export async function verifyOutput(
  transcoder: Transcoder,
  filePath: string,
  expected: ExpectedOutput,
  opts: VerifyOptions,
): Promise<VerificationResult> {
  const failures: string[] = [];
  const checks = { exists: false, fileSize: false, video: false, duration: false, resolution: false, audio: false };
  const observed = { durationMs: 0, width: 0, height: 0, hasVideo: false, hasAudio: false, fileSizeBytes: 0 };
  const done = (): VerificationResult => {
    const passed = failures.length === 0;
    const name = path.basename(filePath);
    if (passed) logger.info('Verifier: PASSED', { file: name, ...observed });
    else logger.warn('Verifier: FAILED', { file: name, failures });
    return { passed, checks, failures, observed };
  };

  let size: number;
  try {
    size = (await fs.promises.stat(filePath)).size;
  } catch {
    failures.push(`File not found: ${filePath}`);
    return done();
  }
  checks.exists = true;
  observed.fileSizeBytes = size;

  if (size < opts.minOutputBytes) {
    failures.push(`File too small: ${size} bytes (min ${opts.minOutputBytes})`);
  } else {
    checks.fileSize = true;
  }

  let probe: MediaProbe;
  try {
    probe = await transcoder.probe(filePath);
  } catch (err) {
    failures.push(`Probe failed: ${errorMessage(err)}`);
    return done();
  }

  observed.durationMs = probe.durationMs;
  observed.hasVideo = probe.video !== null;
  observed.hasAudio = probe.audio !== null;
  observed.width = probe.video?.width ?? 0;
  observed.height = probe.video?.height ?? 0;

  if (probe.video) checks.video = true;
  else failures.push('No video stream found');

  if (!expected.requireAudio || probe.audio) checks.audio = true;
  else failures.push('No audio stream found (required)');

  if (durationWithinTolerance(probe.durationMs, expected.durationMs, opts.durationToleranceMs)) {
    checks.duration = true;
  } else {
    failures.push(
      `Duration mismatch: expected ${expected.durationMs}ms, got ${probe.durationMs}ms (tolerance ${opts.durationToleranceMs}ms)`,
    );
  }

  if (observed.width === expected.width && observed.height === expected.height) {
    checks.resolution = true;
  } else {
    failures.push(
      `Resolution mismatch: expected ${expected.width}x${expected.height}, got ${observed.width}x${observed.height}`,
    );
  }

  return done();
}
