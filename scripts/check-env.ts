#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for the render service.
 * Checks media tooling, optional integrations, the output directory, the
 * Supabase connection and the Telegram bot.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { accessSync, constants, mkdirSync } from 'fs';
import { createClient } from '@supabase/supabase-js';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

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

const skip = (label: string, why: string) => console.log(`  ${YELLOW}○${RESET} ${label}  (${why})`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function checkBinary(label: string, binary: string): void {
  try {
    const out = execFileSync(binary, ['-version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
    pass(label, out.split('\n')[0]?.slice(0, 60) ?? '');
  } catch {
    fail(label, `Install it or set the path in .env (tried "${binary}")`);
    anyRequiredFailed = true;
  }
}

/** Integrations are optional, but half-configured ones are an error. */
function checkGroup(label: string, keys: string[]): boolean {
  const set = keys.filter((k) => (process.env[k] ?? '').trim().length > 0);
  if (set.length === 0) {
    skip(label, 'not configured — optional');
    return false;
  }
  if (set.length < keys.length) {
    fail(label, `Set all of: ${keys.join(', ')}`);
    anyRequiredFailed = true;
    return false;
  }
  pass(label, keys.map((k) => `${k}=${(process.env[k] ?? '').slice(0, 6)}…`).join(' '));
  return true;
}

console.log(`\n${BOLD}=== Render service — Pre-flight Check ===${RESET}\n`);

// ── Section: Media tooling ────────────────────────────────────────────────────

console.log(`${BOLD}[ 1 ] Media tooling${RESET}`);
checkBinary('ffmpeg',  process.env['FFMPEG_PATH']  ?? 'ffmpeg');
checkBinary('ffprobe', process.env['FFPROBE_PATH'] ?? 'ffprobe');

// ── Section: Integrations ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Integrations${RESET}`);
const openAiOk  = checkGroup('OpenAI (narration + caption timing)', ['OPENAI_API_KEY']);
const supabaseOk = checkGroup('Supabase (durable job mirror)', ['SUPABASE_URL', 'SUPABASE_SERVICE_KEY']);
checkGroup('Cloudinary (video upload)', ['CLOUDINARY_CLOUD_NAME', 'CLOUDINARY_API_KEY', 'CLOUDINARY_API_SECRET']);
const telegramOk = checkGroup('Telegram (alerts + commands)', ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_CHAT_ID']);

if (!openAiOk) {
  console.log(`  ${YELLOW}!${RESET} Without OPENAI_API_KEY renders fail at narration.`);
}

// ── Section: Output directory ─────────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Output directory${RESET}`);
const outputDir = process.env['OUTPUT_DIR'] ?? './outputs';
try {
  mkdirSync(outputDir, { recursive: true });
  accessSync(outputDir, constants.W_OK);
  pass('OUTPUT_DIR writable', outputDir);
} catch (err) {
  fail('OUTPUT_DIR not writable', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Section: Supabase connection ──────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Supabase connection${RESET}`);

const supabaseUrl = process.env['SUPABASE_URL'];
const supabaseKey = process.env['SUPABASE_SERVICE_KEY'];

if (supabaseOk && supabaseUrl && supabaseKey) {
  process.stdout.write(`  Testing Supabase connection… `);
  try {
    const sb = createClient(supabaseUrl, supabaseKey);
    const { error } = await sb.from('render_jobs').select('id').limit(1);
    if (error) throw new Error(error.message);
    console.log(`${GREEN}✓${RESET}  connected`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Supabase connection failed', err instanceof Error ? err.message : 'apply migrations/001_render_jobs.sql');
    anyRequiredFailed = true;
  }
} else {
  skip('Supabase connection', 'skipped — not configured');
}

// ── Section: Telegram bot ─────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 5 ] Telegram bot${RESET}`);

const tgToken = process.env['TELEGRAM_BOT_TOKEN'];

if (telegramOk && tgToken) {
  process.stdout.write(`  Checking Telegram bot… `);
  try {
    const res = await fetch(`https://api.telegram.org/bot${tgToken}/getMe`);
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    console.log(`${GREEN}✓${RESET}  bot reachable`);
  } catch (err) {
    console.log(`${RED}✗${RESET}`);
    fail('Telegram check failed', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
} else {
  skip('Telegram check', 'skipped — not configured');
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}\n`);
}
