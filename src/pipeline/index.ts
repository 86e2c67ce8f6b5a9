/**
 * Pipeline orchestrator.
 *
 * Drives one run through idle → planning → generating → syncing → composing →
 * verifying → complete | failed, streaming progress events to the caller.
 * Per-panel failures drop that panel (with its audio) and the run goes on;
 * stage failures end the run with a single `error` event. Either way the run
 * directory is removed before the event stream closes.
 */
import { env, type PipelinePolicy, type TargetProfile } from '../config.js';
import type { Collaborators } from '../ai/types.js';
import type { Transcoder } from '../media/transcoder.js';
import { EventChannel } from '../utils/channel.js';
import { PipelineError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  composeFinal,
  deliverArtifact,
  planComposition,
  syncPanels,
  verifyWithRepair,
  type ReadyPanel,
} from './assembler.js';
import { canTransition, type CompletePayload, type PipelineEvent, type PipelineState, type TerminalEvent } from './events.js';
import { produceDialogue, produceMusic } from './producer.js';
import type { RunRequest } from './request.js';
import { createRunContext, disposeRunContext, type RunContext } from './runContext.js';
import type { AudioTrack, PanelResult } from './types.js';

export interface PipelineOptions {
  collaborators: Collaborators;
  transcoder: Transcoder;
  runId?: string;
  /** Parent of the run directory; defaults to TEMP_DIR. */
  workRoot?: string;
  /** Where the delivered artifact lands; defaults to OUTPUT_DIR. */
  outputDir?: string;
  profile?: TargetProfile;
  policy?: Partial<PipelinePolicy>;
}

interface Generated {
  results: PanelResult[];
  music: AudioTrack | null;
  lyricsByPanel: ReadonlyMap<number, string[]>;
}

export class PipelineRun implements AsyncIterable<PipelineEvent> {
  private current: PipelineState = 'idle';
  private readonly channel = new EventChannel<PipelineEvent>();
  private readonly controller = new AbortController();
  private keepalive: NodeJS.Timeout | null = null;
  private terminal: TerminalEvent | null = null;

  /** Settles with the terminal event once the run is over and cleaned up. Never rejects. */
  readonly finished: Promise<TerminalEvent>;

  constructor(private readonly request: RunRequest, private readonly opts: PipelineOptions) {
    this.finished = this.execute();
  }

  get state(): PipelineState {
    return this.current;
  }

  [Symbol.asyncIterator](): AsyncIterator<PipelineEvent> {
    return this.channel[Symbol.asyncIterator]();
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private readonly emit = (event: PipelineEvent): void => {
    if (this.channel.isClosed || this.terminal) return;
    this.channel.push(event);
  };

  private transition(next: PipelineState, ctx?: RunContext): void {
    if (!canTransition(this.current, next)) {
      throw new PipelineError(`Illegal state transition ${this.current} → ${next}`, 'planning');
    }
    (ctx?.log ?? logger).info(`Pipeline: ${this.current} → ${next}`);
    this.current = next;
  }

  private startKeepalive(intervalMs: number): void {
    this.keepalive = setInterval(() => {
      this.emit({ type: 'keepalive', message: `Still ${this.current}` });
    }, intervalMs);
  }

  private stopKeepalive(): void {
    if (this.keepalive) clearInterval(this.keepalive);
    this.keepalive = null;
  }

  private async execute(): Promise<TerminalEvent> {
    let ctx: RunContext | null = null;
    let terminal: TerminalEvent;
    try {
      this.transition('planning');
      ctx = await createRunContext({
        transcoder: this.opts.transcoder,
        runId: this.opts.runId,
        baseDir: this.opts.workRoot,
        profile: this.opts.profile,
        policy: { ...this.opts.policy, ...(this.request.panelDurationMs ? { panelDurationMs: this.request.panelDurationMs } : {}) },
        signal: this.controller.signal,
      });
      this.startKeepalive(ctx.policy.keepaliveIntervalMs);
      this.emit({ type: 'start', run_id: ctx.runId, mode: this.request.mode, panel_count: this.request.panels.length });

      const payload = await this.runStages(ctx);
      this.transition('complete', ctx);
      terminal = { type: 'complete', ...payload };
    } catch (err) {
      (ctx?.log ?? logger).error('Pipeline: run failed', { state: this.current, error: err });
      this.current = 'failed';
      terminal = { type: 'error', message: errorMessage(err) };
    } finally {
      this.stopKeepalive();
      // Cancels collaborator calls still running after a timeout
      this.controller.abort();
    }

    if (ctx) {
      await disposeRunContext(ctx).catch((err: unknown) => {
        (ctx?.log ?? logger).warn('Pipeline: could not remove run directory', { error: err });
      });
    }

    this.emit(terminal);
    this.terminal = terminal;
    this.channel.close();
    return terminal;
  }

  private async generate(ctx: RunContext): Promise<Generated> {
    const deps = { collaborators: this.opts.collaborators, emit: this.emit };
    if (this.request.mode === 'dialogue') {
      const results = await produceDialogue(ctx, this.request.panels, deps);
      return { results, music: null, lyricsByPanel: new Map<number, string[]>() };
    }
    const produced = await produceMusic(ctx, this.request.panels, { lyrics: this.request.lyrics, style: this.request.musicStyle }, deps);
    const lyricsByPanel = new Map(this.request.panels.map((p, i) => [p.index, produced.lyricsByPanel[i] ?? []] as const));
    return { results: produced.results, music: produced.music, lyricsByPanel };
  }

  private async runStages(ctx: RunContext): Promise<CompletePayload> {
    const attempted = this.request.panels.length;

    this.transition('generating', ctx);
    const generated = await this.generate(ctx);
    const ready = generated.results.filter((r): r is ReadyPanel => r.status === 'ready');
    for (const dropped of generated.results) {
      if (dropped.status === 'dropped') ctx.log.warn('Pipeline: panel dropped', { panelIndex: dropped.panel.index, reason: dropped.reason });
    }
    if (ready.length === 0) throw new PipelineError('No panels survived generation', 'generating');

    this.transition('syncing', ctx);
    const placed = await syncPanels(ctx, ready, generated.lyricsByPanel, this.emit);
    if (placed.length === 0) throw new PipelineError('No panels survived syncing', 'syncing');

    this.transition('composing', ctx);
    const plan = planComposition(ctx, placed, { mode: this.request.mode, music: generated.music, captions: this.request.captions });
    const composed = await composeFinal(ctx, plan, this.emit);

    this.transition('verifying', ctx);
    const { artifact, verification } = await verifyWithRepair(ctx, plan, composed, this.emit);
    const finalPath = await deliverArtifact(ctx, artifact.path, this.opts.outputDir ?? env.OUTPUT_DIR);

    return {
      final_path: finalPath,
      verified: verification.passed,
      verification_failures: verification.failures,
      has_audio: verification.observed.hasAudio,
      has_captions: artifact.hasCaptions,
      clip_count: placed.length,
      clips_attempted: attempted,
      clips_failed: attempted - placed.length,
      actual_duration_ms: verification.observed.durationMs,
      actual_resolution: `${verification.observed.width}x${verification.observed.height}`,
    };
  }
}

/** Start a run. Iterate the returned run for events or await `finished`. */
export function runPipeline(request: RunRequest, opts: PipelineOptions): PipelineRun {
  return new PipelineRun(request, opts);
}
