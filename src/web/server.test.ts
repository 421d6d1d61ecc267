import assert from 'node:assert/strict';
import { once } from 'node:events';
import { Server } from 'node:http';
import test from 'node:test';
import { MailQueue } from '../core/queue.js';
import { testQueue } from '../testing/fakes.js';
import { createServer, jobTable } from './server.js';

const message = {
  recipient: 'ana@example.com',
  subject: { kind: 'inline' as const, source: 'Hi' },
  body: { kind: 'inline' as const, source: 'Hello' },
};

async function withServer(queue: MailQueue, fn: (base: string) => Promise<void>) {
  const server: Server = createServer(queue).listen(0, '127.0.0.1');
  await once(server, 'listening');
  const addr = server.address();
  if (addr === null || typeof addr === 'string') throw new Error('server has no port');
  try {
    await fn(`http://127.0.0.1:${addr.port}`);
  } finally {
    server.closeAllConnections();
    server.close();
  }
}

test('the jobs page lists jobs by state with counts', async () => {
  const { queue } = testQueue();
  const id = await queue.submit(message);
  await withServer(queue, async (base) => {
    const res = await fetch(`${base}/jobs`);
    assert.equal(res.status, 200);
    const html = await res.text();
    assert.ok(html.includes('<div class="stat pending">PENDING<span>1</span></div>'));
    assert.ok(html.includes(`<td>${id}</td>`));
    assert.ok(html.includes(`<button onclick="cancelJob('${id}')">Cancel</button>`));
  });
});

test('the root redirects to the jobs page', async () => {
  const { queue } = testQueue();
  await withServer(queue, async (base) => {
    const res = await fetch(`${base}/`, { redirect: 'manual' });
    assert.equal(res.status, 302);
    assert.equal(res.headers.get('location'), '/jobs');
  });
});

test('stored text is escaped', async () => {
  const { queue } = testQueue();
  await queue.store.createRejected(message, '<script>alert(1)</script>');
  await withServer(queue, async (base) => {
    const html = await (await fetch(`${base}/jobs`)).text();
    assert.ok(html.includes('<td>&lt;script&gt;alert(1)&lt;/script&gt;</td>'));
    assert.equal(html.includes('<script>alert(1)'), false);
  });
});

test('a campaign page summarizes its jobs', async () => {
  const { queue } = testQueue();
  const { campaignId } = await queue.submitCampaign({
    body: message.body,
    subject: message.subject,
    rows: [{ email: 'ana@example.com' }, { email: 'bob@example.com' }, { email: 'broken' }],
  });
  await withServer(queue, async (base) => {
    const res = await fetch(`${base}/campaigns/${campaignId}`);
    assert.equal(res.status, 200);
    const html = await res.text();
    assert.ok(html.includes(`<h2>Campaign ${campaignId}</h2>`));
    assert.ok(html.includes('<p>0 sent, 1 failed, 2 pending of 3</p>'));

    const summary: unknown = await (await fetch(`${base}/api/summary?campaign=${campaignId}`)).json();
    assert.deepEqual(summary, await queue.summary(campaignId));

    assert.equal((await fetch(`${base}/campaigns/unknown`)).status, 404);
  });
});

test('cancel works once, for pending jobs only', async () => {
  const { queue } = testQueue();
  const id = await queue.submit(message);
  await withServer(queue, async (base) => {
    const first = await fetch(`${base}/jobs/${id}/cancel`, { method: 'POST' });
    assert.equal(first.status, 200);
    assert.equal(await first.text(), 'OK');

    const again = await fetch(`${base}/jobs/${id}/cancel`, { method: 'POST' });
    assert.equal(again.status, 409);
    assert.equal(await again.text(), `Job ${id} is cancelled; only pending jobs can be cancelled`);

    const missing = await fetch(`${base}/jobs/nope/cancel`, { method: 'POST' });
    assert.equal(missing.status, 404);
    assert.equal(await missing.text(), 'No job nope');
  });
  assert.equal((await queue.get(id))?.state, 'cancelled');
});

test('jobTable shows a placeholder when empty', () => {
  assert.equal(jobTable([]), '<p><i>No jobs</i></p>');
});
