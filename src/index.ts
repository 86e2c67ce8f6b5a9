#!/usr/bin/env node
/**
 * panelcut: entry point.
 *
 *   run <request.json>                               stream run events as JSON lines
 *   verify <file> [--duration <ms>] [--require-audio] check an existing artifact
 *
 * Events go to stdout, logs to stderr. Exit code 0 on `complete`, 1 otherwise.
 */
import * as fs from 'fs';
import { CANONICAL_PROFILE, PIPELINE_POLICY } from './config.js';
import { createCollaborators } from './ai/index.js';
import { verifyOutput } from './gates/verifier.js';
import { FfmpegTranscoder } from './media/ffmpeg.js';
import { isTerminal } from './pipeline/events.js';
import { runPipeline } from './pipeline/index.js';
import { parseRunRequest } from './pipeline/request.js';
import { parseVerifyArgs } from './cli.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage:
  panelcut run <request.json>
  panelcut verify <file> [--duration <ms>] [--require-audio]`;

// ── Commands ──────────────────────────────────────────────────────────────────

async function runCommand(requestPath: string): Promise<number> {
  const raw: unknown = JSON.parse(await fs.promises.readFile(requestPath, 'utf-8'));
  const request = parseRunRequest(raw);
  const transcoder = new FfmpegTranscoder();

  const run = runPipeline(request, {
    transcoder,
    collaborators: createCollaborators(transcoder, request.voices),
  });

  let code = 1;
  for await (const event of run) {
    process.stdout.write(JSON.stringify(event) + '\n');
    if (isTerminal(event)) code = event.type === 'complete' ? 0 : 1;
  }
  return code;
}

async function verifyCommand(args: readonly string[]): Promise<number> {
  const { file, durationMs, requireAudio } = parseVerifyArgs(args);
  const result = await verifyOutput(
    new FfmpegTranscoder(),
    file,
    { durationMs, width: CANONICAL_PROFILE.width, height: CANONICAL_PROFILE.height, requireAudio },
    { durationToleranceMs: PIPELINE_POLICY.durationToleranceMs, minOutputBytes: PIPELINE_POLICY.minOutputBytes },
  );
  process.stdout.write(JSON.stringify(result, null, 2) + '\n');
  return result.passed ? 0 : 1;
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...args] = process.argv;

async function main(): Promise<number> {
  switch (command) {
    case 'run': {
      const requestPath = args[0];
      if (!requestPath) {
        process.stderr.write(USAGE + '\n');
        return 2;
      }
      return runCommand(requestPath);
    }

    case 'verify':
      return verifyCommand(args);

    default:
      process.stderr.write(USAGE + '\n');
      return 2;
  }
}

main().then(
  (code) => { process.exitCode = code; },
  (err: unknown) => {
    logger.error('Fatal error', { err });
    process.exitCode = 1;
  },
);
