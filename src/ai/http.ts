/**
 * Shared HTTP plumbing for collaborator APIs: status-aware errors (4xx is
 * final, 429/5xx are retried), JSON decoding through a zod schema, and
 * downloading results into the run directory.
 */
import * as fs from 'fs';
import type { z } from 'zod';
import { NonRetryableError } from '../utils/retry.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class HttpError extends Error {
  constructor(message: string, public readonly status: number, public readonly body = '') {
    super(body ? `${message} (${status}): ${body.slice(0, 300)}` : `${message} (${status})`);
    this.name = 'HttpError';
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/** Throws HttpError, or NonRetryableError wrapping it for final client errors. */
export async function ensureOk(res: Response, label: string): Promise<Response> {
  if (res.ok) return res;
  const body = await res.text().catch(() => '');
  const err = new HttpError(label, res.status, body);
  if (isRetryableStatus(res.status)) throw err;
  throw new NonRetryableError(err.message, { cause: err });
}

export async function readJson<S extends z.ZodTypeAny>(res: Response, schema: S, label: string): Promise<z.output<S>> {
  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) {
    throw new NonRetryableError(`${label}: unexpected response shape (${parsed.error.issues.map((i) => i.path.join('.')).join(', ')})`);
  }
  return parsed.data;
}

export async function downloadTo(
  fetchImpl: FetchLike,
  url: string,
  outputPath: string,
  signal?: AbortSignal,
): Promise<void> {
  const res = await ensureOk(await fetchImpl(url, { signal }), `download ${url}`);
  await fs.promises.writeFile(outputPath, Buffer.from(await res.arrayBuffer()));
}

export async function writeBody(res: Response, outputPath: string): Promise<void> {
  await fs.promises.writeFile(outputPath, Buffer.from(await res.arrayBuffer()));
}
