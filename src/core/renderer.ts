import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { RenderError } from './errors.js';
import { Job, OutboundMessage, TemplateRef, Variables } from './types.js';

export type RenderResult =
  | { status: 'rendered'; content: string }
  | { status: 'missing_variable'; variable: string }
  | { status: 'syntax_error'; detail: string };

export interface Renderer {
  /** Placeholder names a template needs, in first-use order. Throws RenderError if unloadable. */
  variablesOf(ref: TemplateRef): Promise<string[]>;
  render(ref: TemplateRef, variables: Variables): Promise<RenderResult>;
}

type Token = { type: 'text'; value: string } | { type: 'var'; name: string };

const NAME = /^[A-Za-z_][\w-]*$/;
const HTML_MARKERS = ['<html', '<body', '<div', '<p>', '<table', '<!doctype', '<br'];

/**
 * `{{ name }}` substitution over inline text or files under `templateDir`.
 * Values are HTML-escaped when the template itself is HTML.
 */
export class TemplateRenderer implements Renderer {
  constructor(private readonly templateDir = './templates') {}

  async variablesOf(ref: TemplateRef) {
    const source = await this.load(ref);
    const tokens = tokenize(source);
    if ('error' in tokens) throw new RenderError(tokens.error);
    const names: string[] = [];
    for (const t of tokens.tokens) {
      if (t.type === 'var' && !names.includes(t.name)) names.push(t.name);
    }
    return names;
  }

  async render(ref: TemplateRef, variables: Variables): Promise<RenderResult> {
    let source: string;
    try {
      source = await this.load(ref);
    } catch (err) {
      return { status: 'syntax_error', detail: err instanceof Error ? err.message : String(err) };
    }
    const tokens = tokenize(source);
    if ('error' in tokens) return { status: 'syntax_error', detail: tokens.error };

    const escape = isHtml(source);
    let out = '';
    for (const t of tokens.tokens) {
      if (t.type === 'text') {
        out += t.value;
        continue;
      }
      if (!Object.prototype.hasOwnProperty.call(variables, t.name)) {
        return { status: 'missing_variable', variable: t.name };
      }
      out += escape ? escapeHtml(variables[t.name]) : variables[t.name];
    }
    return { status: 'rendered', content: out };
  }

  resolve(templatePath: string) {
    return path.isAbsolute(templatePath) ? templatePath : path.resolve(this.templateDir, templatePath);
  }

  private async load(ref: TemplateRef) {
    if (ref.kind === 'inline') return ref.source;
    const file = this.resolve(ref.path);
    try {
      return await readFile(file, 'utf8');
    } catch {
      throw new RenderError(`template not found: ${ref.path}`);
    }
  }
}

function tokenize(source: string): { tokens: Token[] } | { error: string } {
  const tokens: Token[] = [];
  let pos = 0;
  while (pos < source.length) {
    const open = source.indexOf('{{', pos);
    if (open < 0) {
      tokens.push({ type: 'text', value: source.slice(pos) });
      break;
    }
    if (open > pos) tokens.push({ type: 'text', value: source.slice(pos, open) });
    const close = source.indexOf('}}', open + 2);
    if (close < 0) {
      return { error: `unclosed placeholder on line ${lineOf(source, open)}` };
    }
    const name = source.slice(open + 2, close).trim();
    if (!NAME.test(name)) {
      return { error: `invalid placeholder '{{${source.slice(open + 2, close)}}}' on line ${lineOf(source, open)}` };
    }
    tokens.push({ type: 'var', name });
    pos = close + 2;
  }
  return { tokens };
}

function lineOf(source: string, offset: number) {
  return source.slice(0, offset).split('\n').length;
}

export function isHtml(content: string) {
  const lower = content.toLowerCase();
  return HTML_MARKERS.some((m) => lower.includes(m));
}

export function escapeHtml(value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' ',
};

/** Plain-text alternative for an HTML body. */
export function htmlToText(html: string) {
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|h[1-6])>/gi, '\n\n')
    .replace(/<\/(div|tr|li)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&(amp|lt|gt|quot|#39|nbsp);/g, (m) => ENTITIES[m] ?? m)
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n\s*\n/g, '\n\n')
    .trim();
}

export interface TemplateInfo {
  name: string;
  path: string;
  type: 'html' | 'text';
  variables: string[];
  error?: string;
}

export async function listTemplates(renderer: TemplateRenderer, dir: string): Promise<TemplateInfo[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch {
    return [];
  }
  const out: TemplateInfo[] = [];
  for (const file of entries.sort()) {
    const ext = path.extname(file).toLowerCase();
    if (!['.html', '.htm', '.txt'].includes(ext)) continue;
    const full = path.join(dir, file);
    let variables: string[] = [];
    let error: string | undefined;
    try {
      variables = await renderer.variablesOf({ kind: 'file', path: full });
    } catch (err) {
      error = err instanceof Error ? err.message : String(err);
    }
    out.push({ name: path.basename(file, ext), path: full, type: ext === '.txt' ? 'text' : 'html', variables, error });
  }
  return out;
}

function unwrap(result: RenderResult, what: string) {
  switch (result.status) {
    case 'rendered':
      return result.content;
    case 'missing_variable':
      throw new RenderError(`${what}: missing variable '${result.variable}'`);
    case 'syntax_error':
      throw new RenderError(`${what}: ${result.detail}`);
  }
}

/**
 * Render a job's subject and body into a message. An HTML body gets a
 * plain-text alternative; a text body is sent as-is.
 */
export async function composeMessage(
  renderer: Renderer,
  job: Pick<Job, 'subject_template' | 'body_template' | 'variables' | 'cc' | 'bcc' | 'attachments'>
): Promise<OutboundMessage> {
  const subject = unwrap(await renderer.render(job.subject_template, job.variables), 'subject');
  const body = unwrap(await renderer.render(job.body_template, job.variables), 'body');
  const html = isHtml(body);
  return {
    subject: subject.replace(/\s+/g, ' ').trim(),
    html: html ? body : null,
    text: html ? htmlToText(body) : body,
    cc: job.cc,
    bcc: job.bcc,
    attachments: job.attachments,
  };
}
