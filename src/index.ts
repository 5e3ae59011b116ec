#!/usr/bin/env node
/**
 * Render service — entry point.
 *
 * CLI commands run one operation and exit; `server` keeps the process alive
 * with node-cron for scratch retention and Telegram long-polling for operator
 * commands.
 */
import * as fs from 'fs';
import cron from 'node-cron';
import { z } from 'zod';
import { logger } from './utils/logger.js';
import { env, FEATURES, STORAGE_RETENTION } from './config.js';
import { RenderContext } from './context.js';
import { alertOperator, handleTelegramCommand, sendMessage, type JobControl } from './monitoring/telegram.js';
import { purgeScratchDirs } from './monitoring/retention.js';
import { syncPendingToSupabase } from './db/client.js';
import type { Job } from './db/jobs.js';

// ── Telegram long-poll ────────────────────────────────────────────────────────

const UpdatesSchema = z.object({
  ok: z.boolean(),
  result: z.array(z.object({
    update_id: z.number(),
    message: z.object({ text: z.string().optional() }).passthrough().optional(),
  }).passthrough()).default([]),
});

let lastUpdateId = 0;

async function pollTelegramCommands(jobs: JobControl): Promise<void> {
  try {
    const url =
      `https://api.telegram.org/bot${env.TELEGRAM_BOT_TOKEN}/getUpdates` +
      `?offset=${lastUpdateId + 1}&timeout=30&allowed_updates=["message"]`;

    const res = await fetch(url);
    if (!res.ok) return;

    const parsed = UpdatesSchema.safeParse(await res.json());
    if (!parsed.success || !parsed.data.ok) return;

    for (const update of parsed.data.result) {
      lastUpdateId = update.update_id;
      const text = update.message?.text?.trim();
      if (!text?.startsWith('/')) continue;

      logger.info('Telegram: received command', { text });
      try {
        await sendMessage(await handleTelegramCommand(text, jobs));
      } catch (err) {
        logger.error('Telegram: command handler error', { text, err });
      }
    }
  } catch (err) {
    logger.warn('Telegram: poll failed (will retry)', { err });
  }
}

function startTelegramPolling(jobs: JobControl): void {
  const POLL_INTERVAL_MS = 5_000;

  const loop = () => {
    void pollTelegramCommands(jobs).finally(() => {
      setTimeout(loop, POLL_INTERVAL_MS);
    });
  };

  loop();
  logger.info('Telegram: long-poll loop started');
}

// ── Cron schedules ────────────────────────────────────────────────────────────

function startCron(rendersDir: string): void {
  cron.schedule(STORAGE_RETENTION.purgeCron, () => {
    logger.info('Cron: purging old scratch directories');
    try {
      purgeScratchDirs(rendersDir, STORAGE_RETENTION.scratchDays);
    } catch (err) {
      logger.error('Cron: scratch purge error', { err });
    }
  });
  logger.info('Cron: schedules registered');
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, arg] = process.argv;

function printJob(job: Job | null, lookup: string): void {
  if (!job) {
    process.stderr.write(`No job found for ${lookup}\n`);
    process.exitCode = 1;
    return;
  }
  process.stdout.write(JSON.stringify(job, null, 2) + '\n');
}

async function main(): Promise<void> {
  logger.info('Render service: starting', { command: command ?? 'server' });
  const context = new RenderContext();
  const orchestrator = await context.orchestrator();

  switch (command) {
    case 'render': {
      if (!arg) throw new Error('Usage: render <project.json>');
      const payload: unknown = JSON.parse(fs.readFileSync(arg, 'utf-8'));
      const job = await orchestrator.submit(payload);
      logger.info('CLI: job submitted — waiting for completion', { jobId: job.id });
      await orchestrator.idle();
      const final = await orchestrator.get(job.id);
      printJob(final, job.id);
      if (final?.status === 'failed') process.exitCode = 1;
      break;
    }

    case 'status': {
      if (!arg) throw new Error('Usage: status <jobId|projectId>');
      printJob((await orchestrator.get(arg)) ?? (await orchestrator.getByProject(arg)), arg);
      break;
    }

    case 'cancel':
    case 'pause': {
      if (!arg) throw new Error(`Usage: ${command} <jobId>`);
      printJob(await orchestrator.requestStop(arg, command === 'cancel' ? 'cancelled' : 'paused'), arg);
      break;
    }

    case 'purge': {
      const removed = purgeScratchDirs(orchestrator.rendersDir, STORAGE_RETENTION.scratchDays);
      process.stdout.write(`Removed ${removed.length} scratch director${removed.length === 1 ? 'y' : 'ies'}\n`);
      break;
    }

    case undefined:
    case 'server':
    default:
      // Server mode: cron + Telegram polling
      startCron(orchestrator.rendersDir);
      if (FEATURES.telegram) startTelegramPolling(orchestrator);
      if (FEATURES.supabase && !(await syncPendingToSupabase())) {
        logger.warn('Render service: queued Supabase writes left pending until the next write');
      }
      await alertOperator('info', 'Render service started.');
      logger.info('Render service: server mode running');
      // Keep the process alive
      break;
  }
}

main().catch((err) => {
  logger.error('Fatal startup error', { err });
  process.exit(1);
});
