/**
 * Operator channel for the render service: failure alerts go out, and
 * /status, /cancel and /pause come in as replies built from job records.
 * Sending never throws; a Telegram outage is only logged.
 */
import { env, FEATURES } from '../config.js';
import { logger } from '../utils/logger.js';
import type { Job } from '../db/jobs.js';

// ── Internal send ─────────────────────────────────────────────────────────────

const BASE_URL = () => `https://api.telegram.org/bot${env.TELEGRAM_BOT_TOKEN}`;

export async function sendMessage(text: string): Promise<void> {
  if (!FEATURES.telegram) return;
  try {
    const res = await fetch(`${BASE_URL()}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: env.TELEGRAM_CHAT_ID,
        text,
        parse_mode: 'HTML',
      }),
    });
    if (!res.ok) {
      logger.warn('Telegram: sendMessage failed', { status: res.status });
    }
  } catch (err) {
    logger.warn('Telegram: unreachable', { error: String(err) });
  }
}

export const escapeHtml = (s: string) => s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

// ── Public API ─────────────────────────────────────────────────────────────────

export type AlertSeverity = 'info' | 'failure';

const ALERT_BADGE: Record<AlertSeverity, string> = { info: '🎬', failure: '🚨' };

/** `message` is Telegram HTML; escape any job text put into it. */
export const formatAlert = (severity: AlertSeverity, message: string): string =>
  `${ALERT_BADGE[severity]} ${message}`;

export async function alertOperator(severity: AlertSeverity, message: string): Promise<void> {
  await sendMessage(formatAlert(severity, message));
}

export function formatJob(job: Job): string {
  const lines = [
    `<b>Job</b> <code>${job.id}</code>`,
    `<b>Project:</b> ${job.projectId ? escapeHtml(job.projectId) : '—'}`,
    `<b>Status:</b> ${job.status} (${Math.round(job.progress)}%)`,
  ];
  if (job.videoUrl) lines.push(`<b>Video:</b> <a href="${escapeHtml(job.videoUrl)}">open</a>`);
  if (job.error) lines.push(`<b>Error:</b> ${escapeHtml(job.error)}`);
  return lines.join('\n');
}

// ── Command handler ────────────────────────────────────────────────────────────

/** The slice of the orchestrator operator commands need. */
export interface JobControl {
  get(jobId: string): Promise<Job | null>;
  getByProject(projectId: string): Promise<Job | null>;
  requestStop(jobId: string, target: 'cancelled' | 'paused'): Promise<Job | null>;
}

const HELP =
  'Available commands:\n' +
  '  <code>/status &lt;jobId|projectId&gt;</code>\n' +
  '  <code>/cancel &lt;jobId&gt;</code>\n' +
  '  <code>/pause &lt;jobId&gt;</code>\n' +
  '  <code>/help</code>';

/**
 * Handle an inbound Telegram operator command.
 *
 * Supported commands:
 *   /status <jobId|projectId>
 *   /cancel <jobId>
 *   /pause <jobId>
 *   /help
 */
export async function handleTelegramCommand(command: string, jobs: JobControl): Promise<string> {
  const parts = command.trim().split(/\s+/);
  const cmd = parts[0]?.toLowerCase().replace(/@.*$/, '');
  const arg = parts[1];

  logger.info('Telegram: handling command', { command: cmd });

  switch (cmd) {
    case '/status': {
      if (!arg) return 'Usage: /status <jobId|projectId>';
      const job = (await jobs.get(arg)) ?? (await jobs.getByProject(arg));
      return job ? `📊 ${formatJob(job)}` : `No job found for <code>${escapeHtml(arg)}</code>.`;
    }

    case '/cancel':
    case '/pause': {
      if (!arg) return `Usage: ${cmd} <jobId>`;
      const target = cmd === '/cancel' ? 'cancelled' : 'paused';
      const job = await jobs.requestStop(arg, target);
      if (!job) return `No job found for <code>${escapeHtml(arg)}</code>.`;
      const icon = target === 'cancelled' ? '🛑' : '⏸️';
      return `${icon} Stop requested (${target}).\n${formatJob(job)}`;
    }

    case '/help':
    case '/start':
      return HELP;

    default:
      return `Unknown command: ${escapeHtml(cmd ?? '(none)')}\n${HELP}`;
  }
}
