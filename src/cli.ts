/**
 * Argument parsing for the CLI, kept apart from the entry point so it can be
 * tested without starting a command.
 */

export interface VerifyArgs {
  file: string;
  durationMs?: number;
  requireAudio: boolean;
}

export function parseVerifyArgs(args: readonly string[]): VerifyArgs {
  const [file, ...rest] = args;
  if (!file) throw new Error('verify: missing <file>');
  let durationMs: number | undefined;
  let requireAudio = false;
  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--require-audio') {
      requireAudio = true;
    } else if (arg === '--duration') {
      const value = Number(rest[++i]);
      if (!Number.isFinite(value) || value <= 0) throw new Error('verify: --duration takes a positive number of ms');
      durationMs = value;
    } else {
      throw new Error(`verify: unknown option ${arg}`);
    }
  }
  return { file, ...(durationMs === undefined ? {} : { durationMs }), requireAudio };
}
