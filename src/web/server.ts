import express, { NextFunction, Request, Response } from 'express';
import { errorMessage } from '../core/errors.js';
import { MailQueue } from '../core/queue.js';
import { escapeHtml } from '../core/renderer.js';
import { JOB_STATES, Job, JobSummary } from '../core/types.js';

const STATE_LIMIT = 100;

function html(title: string, body: string) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(title)}</title>
  <style>
    :root { --bg: #0d0d10; --card: #1b1b1f; --text: #e8e8e8; --border: #2a2a2d; --accent: #007bff;
            --success: #4caf50; --fail: #f44336; --warn: #ff9800; --gray: #6c757d; }
    * { box-sizing: border-box; }
    body { margin: 0; font-family: 'Segoe UI', Roboto, sans-serif; background: var(--bg); color: var(--text); }
    header { background: #18181b; padding: 15px 25px; border-bottom: 1px solid var(--border); }
    header h1 { margin: 0; font-size: 1.5rem; color: var(--accent); }
    header a { color: inherit; text-decoration: none; }
    main { padding: 20px 30px; }
    h2 { margin-top: 40px; color: var(--accent); border-left: 4px solid var(--accent); padding-left: 10px; }
    table { width: 100%; border-collapse: collapse; background: var(--card); margin-top: 10px; }
    th, td { padding: 10px 12px; border-bottom: 1px solid var(--border); font-size: 0.9rem; text-align: left; }
    th { background: #202024; color: #ccc; }
    td a { color: var(--accent); }
    button { background: var(--fail); color: white; border: none; padding: 6px 10px; border-radius: 4px; cursor: pointer; }
    .stats-bar { display: flex; justify-content: space-around; background: var(--card);
                 border: 1px solid var(--border); padding: 15px; border-radius: 8px; margin-top: 20px; }
    .stat { text-align: center; font-size: 0.95rem; }
    .stat span { display: block; font-size: 1.4rem; margin-top: 5px; }
    .stat.pending span, .stat.failed_transient span { color: var(--warn); }
    .stat.in_flight span { color: var(--accent); }
    .stat.sent span { color: var(--success); }
    .stat.failed_permanent span { color: var(--fail); }
    .stat.cancelled span { color: var(--gray); }
  </style>
</head>
<body>
  <header><h1><a href="/jobs">Mail Queue</a></h1></header>
  <main>${body}</main>
  <script>
    async function cancelJob(id) {
      const res = await fetch('/jobs/' + encodeURIComponent(id) + '/cancel', { method: 'POST' });
      if (!res.ok) alert('❌ ' + (await res.text()));
      location.reload();
    }
  </script>
</body>
</html>`;
}

export function statsBar(summary: JobSummary) {
  const cells = JOB_STATES.map(
    (s) => `<div class="stat ${s}">${s.toUpperCase()}<span>${summary.counts[s]}</span></div>`
  );
  return `<div class="stats-bar">${cells.join('')}</div>`;
}

export function jobTable(jobs: Job[]) {
  if (jobs.length === 0) return `<p><i>No jobs</i></p>`;
  const rows = jobs.map((j) => {
    const campaign = j.campaign_id
      ? `<a href="/campaigns/${encodeURIComponent(j.campaign_id)}">${escapeHtml(j.campaign_id)}</a>`
      : '';
    const cancel = j.state === 'pending' ? `<button onclick="cancelJob('${escapeHtml(j.id)}')">Cancel</button>` : '';
    return `<tr>
      <td>${escapeHtml(j.id)}</td>
      <td>${escapeHtml(j.recipient)}</td>
      <td>${escapeHtml(j.not_before)}</td>
      <td>${j.attempt_count}</td>
      <td>${campaign}</td>
      <td>${escapeHtml((j.last_error ?? '').slice(0, 80))}</td>
      <td>${cancel}</td>
    </tr>`;
  });
  return `<table><tr><th>ID</th><th>Recipient</th><th>Due</th><th>Attempts</th><th>Campaign</th><th>Last Error</th><th></th></tr>${rows.join('')}</table>`;
}

type Handler = (req: Request, res: Response) => Promise<void>;

// express 4 does not forward rejected promises
const route = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

/** Read-mostly dashboard over a queue. The caller decides where to listen. */
export function createServer(queue: MailQueue) {
  const app = express();

  app.get('/', (_req, res) => res.redirect('/jobs'));

  app.get(
    '/jobs',
    route(async (_req, res) => {
      let body = statsBar(await queue.summary());
      for (const state of JOB_STATES) {
        const jobs = await queue.list({ state, limit: STATE_LIMIT });
        body += `<h2>${state.toUpperCase()}</h2>${jobTable(jobs)}`;
      }
      res.send(html('Mail Queue', body));
    })
  );

  app.get(
    '/campaigns/:id',
    route(async (req, res) => {
      const campaignId = req.params.id;
      const summary = await queue.summary(campaignId);
      if (summary.total === 0) {
        res.status(404).send(html('Not found', `<p>No campaign ${escapeHtml(campaignId)}</p>`));
        return;
      }
      const jobs = await queue.list({ campaignId });
      const body =
        `<h2>Campaign ${escapeHtml(campaignId)}</h2>` +
        `<p>${summary.sent} sent, ${summary.failed} failed, ${summary.pending} pending of ${summary.total}</p>` +
        statsBar(summary) +
        jobTable(jobs);
      res.send(html(`Campaign ${campaignId}`, body));
    })
  );

  app.get(
    '/api/summary',
    route(async (req, res) => {
      const campaign = typeof req.query.campaign === 'string' ? req.query.campaign : undefined;
      res.json(await queue.summary(campaign));
    })
  );

  app.post(
    '/jobs/:id/cancel',
    route(async (req, res) => {
      const id = req.params.id;
      if (await queue.cancel(id)) {
        res.status(200).send('OK');
        return;
      }
      const job = await queue.get(id);
      if (!job) {
        res.status(404).send(`No job ${id}`);
        return;
      }
      res.status(409).send(`Job ${id} is ${job.state}; only pending jobs can be cancelled`);
    })
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error(`[dashboard] ❌ ${errorMessage(err)}`);
    res.status(500).send(errorMessage(err));
  });

  return app;
}
