import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';
import { RenderError } from './errors.js';
import { TemplateRenderer, composeMessage, htmlToText, isHtml, listTemplates } from './renderer.js';

const inline = (source: string) => ({ kind: 'inline' as const, source });

function templateDir() {
  const dir = mkdtempSync(path.join(os.tmpdir(), 'mailctl-templates-'));
  writeFileSync(path.join(dir, 'welcome.html'), '<p>Hi {{name}}, welcome to {{ company }}</p>');
  writeFileSync(path.join(dir, 'note.txt'), 'Hello {{name}}');
  writeFileSync(path.join(dir, 'broken.txt'), 'Hi {{name');
  writeFileSync(path.join(dir, 'readme.md'), 'not a template');
  return dir;
}

test('substitutes placeholders, spaces inside braces allowed', async () => {
  const r = new TemplateRenderer();
  const res = await r.render(inline('Hi {{ name }}, your code is {{code}}.'), { name: 'Ana', code: 'X-1' });
  assert.deepEqual(res, { status: 'rendered', content: 'Hi Ana, your code is X-1.' });
});

test('reports the first missing variable', async () => {
  const res = await new TemplateRenderer().render(inline('{{greeting}} {{name}}'), { greeting: 'Hi' });
  assert.deepEqual(res, { status: 'missing_variable', variable: 'name' });
});

test('variable names are case-sensitive', async () => {
  const res = await new TemplateRenderer().render(inline('Hi {{Name}}'), { name: 'Ana' });
  assert.deepEqual(res, { status: 'missing_variable', variable: 'Name' });
});

test('reports syntax errors with the line number', async () => {
  const r = new TemplateRenderer();
  assert.deepEqual(await r.render(inline('Hello\n{{name'), {}), {
    status: 'syntax_error',
    detail: 'unclosed placeholder on line 2',
  });
  assert.deepEqual(await r.render(inline('Hi {{ 1x }}'), {}), {
    status: 'syntax_error',
    detail: "invalid placeholder '{{ 1x }}' on line 1",
  });
});

test('escapes values inside HTML templates only', async () => {
  const r = new TemplateRenderer();
  const vars = { name: 'Tom & <Jerry>' };
  assert.deepEqual(await r.render(inline('<p>Hi {{name}}</p>'), vars), {
    status: 'rendered',
    content: '<p>Hi Tom &amp; &lt;Jerry&gt;</p>',
  });
  assert.deepEqual(await r.render(inline('Hi {{name}}'), vars), { status: 'rendered', content: 'Hi Tom & <Jerry>' });
});

test('lists variables once, in first-use order', async () => {
  const names = await new TemplateRenderer().variablesOf(inline('{{b}} {{a}} {{b}}'));
  assert.deepEqual(names, ['b', 'a']);
});

test('loads file templates relative to the template directory', async () => {
  const r = new TemplateRenderer(templateDir());
  assert.deepEqual(await r.render({ kind: 'file', path: 'note.txt' }, { name: 'Ana' }), {
    status: 'rendered',
    content: 'Hello Ana',
  });
  assert.deepEqual(await r.render({ kind: 'file', path: 'nope.txt' }, {}), {
    status: 'syntax_error',
    detail: 'template not found: nope.txt',
  });
  await assert.rejects(r.variablesOf({ kind: 'file', path: 'nope.txt' }), RenderError);
});

test('detects HTML and builds a plain-text alternative', () => {
  assert.equal(isHtml('<P>hello</P>'), true);
  assert.equal(isHtml('1 < 2 and 3 > 2'), false);
  const html = '<html><body><h1>Hello Ana</h1><p>Line one<br>line two</p><p>Tom &amp; Jerry</p></body></html>';
  assert.equal(htmlToText(html), 'Hello Ana\n\nLine one\nline two\n\nTom & Jerry');
  assert.equal(htmlToText('<style>p { color: red }</style><p>Hi</p>'), 'Hi');
});

test('composes a message from a job', async () => {
  const msg = await composeMessage(new TemplateRenderer(), {
    subject_template: inline('Welcome,\n  {{name}}'),
    body_template: inline('<p>Hi {{name}}</p>'),
    variables: { name: 'Ana' },
    cc: ['cc@example.com'],
    bcc: [],
    attachments: [],
  });
  assert.deepEqual(msg, {
    subject: 'Welcome, Ana',
    html: '<p>Hi Ana</p>',
    text: 'Hi Ana',
    cc: ['cc@example.com'],
    bcc: [],
    attachments: [],
  });
});

test('a plain-text body is sent without an HTML part', async () => {
  const msg = await composeMessage(new TemplateRenderer(), {
    subject_template: inline('Hi'),
    body_template: inline('Line 1\nLine 2'),
    variables: {},
    cc: [],
    bcc: [],
    attachments: [],
  });
  assert.equal(msg.html, null);
  assert.equal(msg.text, 'Line 1\nLine 2');
});

test('composing fails with a RenderError naming the part', async () => {
  await assert.rejects(
    composeMessage(new TemplateRenderer(), {
      subject_template: inline('Hi'),
      body_template: inline('Dear {{name}}'),
      variables: {},
      cc: [],
      bcc: [],
      attachments: [],
    }),
    (err: unknown) => err instanceof RenderError && err.message === "body: missing variable 'name'"
  );
});

test('lists templates with their variables and keeps going past a broken one', async () => {
  const dir = templateDir();
  const list = await listTemplates(new TemplateRenderer(dir), dir);
  assert.deepEqual(
    list.map((t) => [t.name, t.type, t.variables.join(','), t.error ?? '']),
    [
      ['broken', 'text', '', 'unclosed placeholder on line 1'],
      ['note', 'text', 'name', ''],
      ['welcome', 'html', 'name,company', ''],
    ]
  );
});
