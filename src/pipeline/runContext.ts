/**
 * Per-run state threaded explicitly through every stage: the run-scoped work
 * directory, target profile, policy, cancellation signal and a logger bound
 * to the run id. Nothing in the pipeline reads ambient "current run" state.
 */
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { CANONICAL_PROFILE, PIPELINE_POLICY, env, type PipelinePolicy, type TargetProfile } from '../config.js';
import type { Transcoder } from '../media/transcoder.js';
import { logger, type Logger } from '../utils/logger.js';

export interface RunContext {
  readonly runId: string;
  readonly workDir: string;
  readonly profile: TargetProfile;
  readonly policy: PipelinePolicy;
  readonly signal: AbortSignal;
  readonly log: Logger;
  readonly transcoder: Transcoder;
}

export interface CreateRunContextOptions {
  transcoder: Transcoder;
  runId?: string;
  /** Parent of the run directory; defaults to TEMP_DIR. */
  baseDir?: string;
  profile?: TargetProfile;
  policy?: Partial<PipelinePolicy>;
  signal?: AbortSignal;
}

export async function createRunContext(opts: CreateRunContextOptions): Promise<RunContext> {
  const runId = opts.runId ?? randomUUID();
  const workDir = path.resolve(opts.baseDir ?? env.TEMP_DIR, `run-${runId}`);
  await fs.promises.mkdir(workDir, { recursive: true });

  return {
    runId,
    workDir,
    profile: opts.profile ?? CANONICAL_PROFILE,
    policy: { ...PIPELINE_POLICY, ...opts.policy },
    signal: opts.signal ?? new AbortController().signal,
    log: logger.child({ runId }),
    transcoder: opts.transcoder,
  };
}

/** Path for a derived artifact inside the run directory. */
export function artifactPath(ctx: RunContext, name: string): string {
  return path.join(ctx.workDir, name);
}

/** Removes the run directory and everything derived in it. */
export async function disposeRunContext(ctx: RunContext): Promise<void> {
  await fs.promises.rm(ctx.workDir, { recursive: true, force: true });
  ctx.log.debug('RunContext: work directory removed', { workDir: ctx.workDir });
}
