import { z } from 'zod';
import { PIPELINE_MODES, type PipelineMode } from '../config.js';
import type { DialogueLine, Panel } from './types.js';

// ── Dialogue ──────────────────────────────────────────────────────────────────

/** "Speaker: text" → { speaker, text }; text without a prefix has no speaker. */
export function parseDialogueString(raw: string): DialogueLine {
  const trimmed = raw.trim();
  const match = /^([^:]+):\s*(.+)$/.exec(trimmed);
  if (match?.[1] && match[2]) return { speaker: match[1].trim(), text: match[2].trim() };
  return { speaker: '', text: trimmed };
}

const DialogueLineSchema = z.union([
  z.string().trim().min(1).transform(parseDialogueString),
  z.object({
    speaker: z.string().trim().default(''),
    text:    z.string().trim().min(1),
  }),
]);

const PanelSchema = z.object({
  imagePath:        z.string().min(1),
  dialogue:         z.union([DialogueLineSchema, z.array(DialogueLineSchema)])
    .optional()
    .transform((d) => (d === undefined ? undefined : Array.isArray(d) ? d : [d])),
  shot:             z.string().optional(),
  lyricLines:       z.array(z.string().trim().min(1)).optional(),
  targetDurationMs: z.number().int().positive().optional(),
});

// ── Run request ───────────────────────────────────────────────────────────────

export const RunRequestSchema = z.object({
  mode:            z.enum(PIPELINE_MODES),
  panels:          z.array(PanelSchema).min(1),
  /** Song lyrics with optional [Verse]-style tags (music mode). */
  lyrics:          z.string().optional(),
  musicStyle:      z.string().default('cinematic pop, warm vocals'),
  /** Persona key → ElevenLabs voice id. */
  voices:          z.record(z.string()).default({}),
  captions:        z.boolean().default(true),
  panelDurationMs: z.number().int().positive().optional(),
}).superRefine((req, ctx) => {
  if (req.mode === 'dialogue' && req.lyrics !== undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['lyrics'], message: 'lyrics apply to music mode only' });
  }
});

export interface RunRequest {
  mode: PipelineMode;
  panels: Panel[];
  lyrics?: string;
  musicStyle: string;
  voices: Record<string, string>;
  captions: boolean;
  panelDurationMs?: number;
}

/** Validates a raw request and stamps panel indices in the order given. */
export function parseRunRequest(raw: unknown): RunRequest {
  const parsed = RunRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid run request: ${invalid}`);
  }
  const { panels, ...rest } = parsed.data;
  return { ...rest, panels: panels.map((p, index) => ({ ...p, index })) };
}
