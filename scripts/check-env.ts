#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for panelcut.
 * Checks collaborator keys, media tools and working directories.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { execFile } from 'child_process';
import { accessSync, constants, mkdirSync } from 'fs';
import { promisify } from 'util';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

const execFileAsync = promisify(execFile);

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    // Mask secrets: show first 6 chars + ellipsis
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

function checkOptional(label: string, value: string | undefined, defaultVal: string): void {
  const effective = value ?? defaultVal;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${effective}${value ? '' : '  (default)'}`);
}

// ── Section: Collaborator keys ────────────────────────────────────────────────

console.log(`\n${BOLD}=== panelcut: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Collaborator keys${RESET}`);

checkRequired('FAL_KEY',            process.env['FAL_KEY'],            'Get from https://fal.ai/dashboard');
checkRequired('ELEVENLABS_API_KEY', process.env['ELEVENLABS_API_KEY'], 'Get from ElevenLabs profile → API keys');

// ── Section: Pipeline policy ──────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Pipeline policy${RESET}`);

checkOptional('PANEL_DURATION_MS',      process.env['PANEL_DURATION_MS'],      '4000');
checkOptional('DURATION_TOLERANCE_MS',  process.env['DURATION_TOLERANCE_MS'],  '2000');
checkOptional('MIN_WORD_DURATION_MS',   process.env['MIN_WORD_DURATION_MS'],   '50');
checkOptional('GENERATION_CONCURRENCY', process.env['GENERATION_CONCURRENCY'], '3');
checkOptional('GENERATION_TIMEOUT_MS',  process.env['GENERATION_TIMEOUT_MS'],  '600000');
checkOptional('KEEPALIVE_INTERVAL_MS',  process.env['KEEPALIVE_INTERVAL_MS'],  '15000');
checkOptional('LOG_LEVEL',              process.env['LOG_LEVEL'],              'info');

// ── Section: Media tools ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Media tools${RESET}`);

async function checkTool(label: string, bin: string): Promise<void> {
  try {
    const { stdout } = await execFileAsync(bin, ['-version']);
    pass(label, stdout.split('\n')[0] ?? bin);
  } catch (err) {
    fail(label, `${bin} not runnable (${err instanceof Error ? err.message : String(err)}); install ffmpeg or set ${label}_PATH`);
    anyRequiredFailed = true;
  }
}

await checkTool('FFMPEG',  process.env['FFMPEG_PATH']  ?? 'ffmpeg');
await checkTool('FFPROBE', process.env['FFPROBE_PATH'] ?? 'ffprobe');

// ── Section: Working directories ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Working directories${RESET}`);

function checkWritableDir(label: string, dirPath: string): void {
  try {
    mkdirSync(dirPath, { recursive: true });
    accessSync(dirPath, constants.W_OK);
    pass(label, dirPath);
  } catch (err) {
    fail(label, `${dirPath} is not writable (${err instanceof Error ? err.message : String(err)})`);
    anyRequiredFailed = true;
  }
}

checkWritableDir('TEMP_DIR',   process.env['TEMP_DIR']   ?? '/tmp/panelcut');
checkWritableDir('OUTPUT_DIR', process.env['OUTPUT_DIR'] ?? './output');

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight FAILED${RESET}: fix the items above.\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}Pre-flight passed.${RESET}\n`);
