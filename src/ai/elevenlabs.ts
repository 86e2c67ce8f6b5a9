/**
 * Minimal ElevenLabs REST client shared by the speech, music and alignment
 * adapters. Transient failures (429/5xx, network) are retried with backoff.
 */
import { RETRY_POLICY, env } from '../config.js';
import { NonRetryableError, withRetry } from '../utils/retry.js';
import { ensureOk, type FetchLike } from './http.js';

const ELEVENLABS_BASE = 'https://api.elevenlabs.io';

export interface ElevenLabsPost {
  /** JSON-encoded unless it is already FormData. */
  body: FormData | Record<string, unknown>;
  query?: Record<string, string>;
  accept?: string;
  signal?: AbortSignal;
}

export class ElevenLabsClient {
  constructor(
    private readonly apiKey: string | undefined = env.ELEVENLABS_API_KEY,
    private readonly fetchImpl: FetchLike = fetch,
    private readonly baseUrl: string = ELEVENLABS_BASE,
  ) {}

  async post(pathname: string, req: ElevenLabsPost): Promise<Response> {
    const apiKey = this.apiKey;
    if (!apiKey) throw new NonRetryableError('ELEVENLABS_API_KEY is not set');

    const url = new URL(pathname, this.baseUrl);
    for (const [k, v] of Object.entries(req.query ?? {})) url.searchParams.set(k, v);

    return withRetry(async () => {
      const isForm = req.body instanceof FormData;
      const headers: Record<string, string> = { 'xi-api-key': apiKey };
      if (!isForm) headers['Content-Type'] = 'application/json';
      if (req.accept) headers['Accept'] = req.accept;

      const res = await this.fetchImpl(url.toString(), {
        method: 'POST',
        headers,
        body: req.body instanceof FormData ? req.body : JSON.stringify(req.body),
        signal: req.signal,
      });
      return ensureOk(res, `elevenlabs ${pathname}`);
    }, { ...RETRY_POLICY, signal: req.signal, label: `elevenlabs ${pathname}` });
  }
}
