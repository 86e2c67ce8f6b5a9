/**
 * fal.ai queue client: submit → poll status → fetch result.
 * Generation jobs run minutes; each poll is a suspension point and the whole
 * wait is bounded by `timeoutMs`.
 */
import { z } from 'zod';
import { RETRY_POLICY, env } from '../config.js';
import { TimeoutError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError, sleep, withRetry } from '../utils/retry.js';
import { ensureOk, readJson, type FetchLike } from './http.js';

const FAL_QUEUE_BASE = 'https://queue.fal.run';

const SubmitSchema = z.object({
  request_id:   z.string(),
  status_url:   z.string().url().optional(),
  response_url: z.string().url().optional(),
});

const StatusSchema = z.object({
  status: z.enum(['IN_QUEUE', 'IN_PROGRESS', 'COMPLETED']),
  queue_position: z.number().optional(),
});

export type FalStatus = z.infer<typeof StatusSchema>['status'];

export interface FalRunOptions {
  signal?: AbortSignal;
  timeoutMs: number;
  pollIntervalMs?: number;
  onStatus?: (status: FalStatus) => void;
}

export class FalQueueClient {
  constructor(
    private readonly apiKey: string | undefined = env.FAL_KEY,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly baseUrl: string = FAL_QUEUE_BASE,
  ) {}

  private headers(): Record<string, string> {
    if (!this.apiKey) throw new NonRetryableError('FAL_KEY is not set');
    return { Authorization: `Key ${this.apiKey}`, 'Content-Type': 'application/json' };
  }

  /** Queue URLs address the app (owner/name) even for nested model paths. */
  private appBase(model: string): string {
    const [owner, name] = model.split('/');
    return `${this.baseUrl}/${owner}/${name}`;
  }

  async submit(model: string, input: unknown, signal?: AbortSignal): Promise<z.infer<typeof SubmitSchema>> {
    return withRetry(async () => {
      const res = await this.fetchImpl(`${this.baseUrl}/${model}`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(input),
        signal,
      });
      await ensureOk(res, `fal submit ${model}`);
      return readJson(res, SubmitSchema, `fal submit ${model}`);
    }, { ...RETRY_POLICY, signal, label: `fal.submit ${model}` });
  }

  /**
   * Submit and wait for the result, parsed with `schema`.
   * Rejects with TimeoutError once `timeoutMs` has elapsed without completion.
   */
  async run<S extends z.ZodTypeAny>(model: string, input: unknown, schema: S, opts: FalRunOptions): Promise<z.output<S>> {
    const submitted = await this.submit(model, input, opts.signal);
    const requestId = submitted.request_id;
    const statusUrl = submitted.status_url ?? `${this.appBase(model)}/requests/${requestId}/status`;
    const responseUrl = submitted.response_url ?? `${this.appBase(model)}/requests/${requestId}`;
    const interval = opts.pollIntervalMs ?? RETRY_POLICY.pollIntervalMs;
    const deadline = Date.now() + opts.timeoutMs;

    logger.debug('fal: submitted', { model, requestId });

    for (;;) {
      const status = await withRetry(async () => {
        const res = await this.fetchImpl(statusUrl, { headers: this.headers(), signal: opts.signal });
        await ensureOk(res, 'fal status');
        return readJson(res, StatusSchema, 'fal status');
      }, { ...RETRY_POLICY, signal: opts.signal, label: 'fal.status' });

      opts.onStatus?.(status.status);
      if (status.status === 'COMPLETED') break;
      if (Date.now() + interval > deadline) throw new TimeoutError(`fal ${model} ${requestId}`, opts.timeoutMs);
      await sleep(interval, opts.signal);
    }

    return withRetry(async () => {
      const res = await this.fetchImpl(responseUrl, { headers: this.headers(), signal: opts.signal });
      await ensureOk(res, 'fal result');
      return readJson(res, schema, `fal result ${model}`);
    }, { ...RETRY_POLICY, signal: opts.signal, label: 'fal.result' });
  }
}
