import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { PipelinePolicy } from '../config.js';
import { createRunContext, type RunContext } from '../pipeline/runContext.js';
import { FakeTranscoder } from './fakeTranscoder.js';

export const FAST_POLICY: Partial<PipelinePolicy> = {
  retryBaseDelayMs: 0,
  keepaliveIntervalMs: 60_000,
  generationTimeoutMs: 5_000,
};

export async function makeTempDir(prefix = 'panelcut-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export interface TestContext {
  ctx: RunContext;
  transcoder: FakeTranscoder;
  root: string;
}

export async function createTestContext(policy: Partial<PipelinePolicy> = {}): Promise<TestContext> {
  const root = await makeTempDir();
  const transcoder = new FakeTranscoder();
  const ctx = await createRunContext({ transcoder, runId: 'test', baseDir: root, policy: { ...FAST_POLICY, ...policy } });
  return { ctx, transcoder, root };
}
