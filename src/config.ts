import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Collaborators (checked lazily by the adapters that need them)
  FAL_KEY:                  z.string().min(1).optional(),
  ELEVENLABS_API_KEY:       z.string().min(1).optional(),
  ELEVENLABS_DEFAULT_VOICE: z.string().default('21m00Tcm4TlvDq8ikWAM'),

  // Media tools
  FFMPEG_PATH:              z.string().default('ffmpeg'),
  FFPROBE_PATH:             z.string().default('ffprobe'),

  // Local storage
  TEMP_DIR:                 z.string().default('/tmp/panelcut'),
  OUTPUT_DIR:               z.string().default('./output'),

  // Pipeline policy
  PANEL_DURATION_MS:        z.coerce.number().int().positive().default(4000),
  DURATION_TOLERANCE_MS:    z.coerce.number().int().nonnegative().default(2000),
  MIN_WORD_DURATION_MS:     z.coerce.number().int().positive().default(50),
  GENERATION_CONCURRENCY:   z.coerce.number().int().positive().default(3),
  GENERATION_TIMEOUT_MS:    z.coerce.number().int().positive().default(600_000),
  KEEPALIVE_INTERVAL_MS:    z.coerce.number().int().positive().default(15_000),
  MIN_OUTPUT_BYTES:         z.coerce.number().int().nonnegative().default(10_000),

  // Logging
  LOG_LEVEL:                z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:               z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(raw: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

// ── Canonical output profile ──────────────────────────────────────────────────

export interface TargetProfile {
  width: number;
  height: number;
  pixelFormat: string;
  colorSpace: string;
  colorRange: string;
}

export const CANONICAL_PROFILE: TargetProfile = {
  width:       1080,
  height:      1920,
  pixelFormat: 'yuv420p',
  colorSpace:  'bt709',
  colorRange:  'tv',
};

// ── Pipeline policy ───────────────────────────────────────────────────────────

export interface PipelinePolicy {
  panelDurationMs: number;
  durationToleranceMs: number;
  minWordDurationMs: number;
  /** Fraction of a panel window trimmed from each side for panel-locked captions. */
  captionMarginRatio: number;
  generationConcurrency: number;
  generationTimeoutMs: number;
  keepaliveIntervalMs: number;
  minOutputBytes: number;
  videoMaxAttempts: number;
  /** First backoff delay between video generation attempts. */
  retryBaseDelayMs: number;
}

export const PIPELINE_POLICY: PipelinePolicy = {
  panelDurationMs:       env.PANEL_DURATION_MS,
  durationToleranceMs:   env.DURATION_TOLERANCE_MS,
  minWordDurationMs:     env.MIN_WORD_DURATION_MS,
  captionMarginRatio:    0.1,
  generationConcurrency: env.GENERATION_CONCURRENCY,
  generationTimeoutMs:   env.GENERATION_TIMEOUT_MS,
  keepaliveIntervalMs:   env.KEEPALIVE_INTERVAL_MS,
  minOutputBytes:        env.MIN_OUTPUT_BYTES,
  videoMaxAttempts:      3,
  retryBaseDelayMs:      2_000,
};

// ── Retry Policy ──────────────────────────────────────────────────────────────
// Applies to collaborator HTTP calls (fal.ai, ElevenLabs).

export const RETRY_POLICY = {
  maxAttempts:   3,
  baseDelayMs:   2_000,
  backoffFactor: 2,
  pollIntervalMs: 5_000,
} as const;

export const PIPELINE_MODES = ['dialogue', 'music'] as const;

export type PipelineMode = typeof PIPELINE_MODES[number];
