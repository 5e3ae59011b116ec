import { describe, it, expect, vi } from 'vitest';
import { escapeHtml, formatAlert, formatJob, handleTelegramCommand, type JobControl } from './telegram.js';
import type { Job } from '../db/jobs.js';

const completed: Job = {
  id: 'abc123',
  projectId: 'promo <1>',
  status: 'completed',
  progress: 100,
  videoUrl: '/videos/promo_1/promo_1_final.mp4?v=a1b2c3',
  error: null,
};

function fakeJobs(overrides: Partial<JobControl> = {}): JobControl {
  return {
    get: vi.fn(async (id: string) => (id === completed.id ? completed : null)),
    getByProject: vi.fn(async () => null),
    requestStop: vi.fn(async (id: string, target: 'cancelled' | 'paused'): Promise<Job | null> =>
      id === 'live1'
        ? { ...completed, id, status: target === 'cancelled' ? 'cancelling' : 'pausing', progress: 42.4, videoUrl: null }
        : null),
    ...overrides,
  };
}

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML reserves', () => {
    expect(escapeHtml('a < b && c > d')).toBe('a &lt; b &amp;&amp; c &gt; d');
  });
});

describe('formatAlert', () => {
  it('prefixes the message with a severity badge', () => {
    expect(formatAlert('failure', 'Render job <code>abc123</code> failed')).toBe('🚨 Render job <code>abc123</code> failed');
    expect(formatAlert('info', 'Render service started.')).toBe('🎬 Render service started.');
  });
});

describe('formatJob', () => {
  it('lists id, project, status and video link', () => {
    expect(formatJob(completed)).toBe(
      '<b>Job</b> <code>abc123</code>\n' +
        '<b>Project:</b> promo &lt;1&gt;\n' +
        '<b>Status:</b> completed (100%)\n' +
        '<b>Video:</b> <a href="/videos/promo_1/promo_1_final.mp4?v=a1b2c3">open</a>',
    );
  });

  it('shows the error of a failed job', () => {
    const failed: Job = { ...completed, projectId: null, status: 'failed', videoUrl: null, error: 'ffmpeg <died>' };
    expect(formatJob(failed).split('\n').slice(1)).toEqual([
      '<b>Project:</b> —',
      '<b>Status:</b> failed (100%)',
      '<b>Error:</b> ffmpeg &lt;died&gt;',
    ]);
  });
});

describe('handleTelegramCommand', () => {
  it('reports a job by id', async () => {
    const reply = await handleTelegramCommand('/status abc123', fakeJobs());
    expect(reply).toBe(`📊 ${formatJob(completed)}`);
  });

  it('falls back to a project lookup and strips the bot mention', async () => {
    const jobs = fakeJobs({ getByProject: vi.fn(async () => completed) });
    const reply = await handleTelegramCommand('/status@render_bot promo', jobs);
    expect(jobs.getByProject).toHaveBeenCalledWith('promo');
    expect(reply.startsWith('📊 ')).toBe(true);
  });

  it('says when nothing matches', async () => {
    expect(await handleTelegramCommand('/status <none>', fakeJobs())).toBe('No job found for <code>&lt;none&gt;</code>.');
  });

  it('requests a cancel or pause', async () => {
    const jobs = fakeJobs();

    const cancel = await handleTelegramCommand('/cancel live1', jobs);
    expect(cancel.split('\n')[0]).toBe('🛑 Stop requested (cancelled).');
    expect(cancel).toContain('<b>Status:</b> cancelling (42%)');

    const pause = await handleTelegramCommand('/PAUSE live1', jobs);
    expect(pause.split('\n')[0]).toBe('⏸️ Stop requested (paused).');
    expect(jobs.requestStop).toHaveBeenLastCalledWith('live1', 'paused');
  });

  it('answers usage and help', async () => {
    const jobs = fakeJobs();
    expect(await handleTelegramCommand('/cancel', jobs)).toBe('Usage: /cancel <jobId>');
    expect(await handleTelegramCommand('/help', jobs)).toContain('/status &lt;jobId|projectId&gt;');
    expect((await handleTelegramCommand('/render now', jobs)).split('\n')[0]).toBe('Unknown command: /render');
  });
});
