import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { CliError } from '../src/errors';
import { buildWebPage, escapeHtml, loadViewerScript, WEB_PAGE_FILE, writeWebPage } from '../src/webPage';

describe('buildWebPage', () => {
  const html = buildWebPage('{"a":"<b>"}\n', {
    viewerScript: 'console.log("</script>");',
    truncateLimit: 42,
    title: 'data.jsonl'
  });

  it('embeds the raw input escaped inside the editor', () => {
    expect(html).toContain(
      '<textarea id="jsonInput" placeholder="Paste your JSON or JSONL here">\n{&quot;a&quot;:&quot;&lt;b&gt;&quot;}\n</textarea>'
    );
  });

  it('passes the truncate limit and title to the page', () => {
    expect(html).toContain('<body data-truncate-limit="42">');
    expect(html).toContain('<title>data.jsonl · jsonl-tree</title>');
  });

  it('inlines the viewer script under a matching nonce', () => {
    const nonce = /script-src 'nonce-([A-Za-z0-9]{16})'/.exec(html)?.[1];

    expect(nonce).toBeDefined();
    expect(html).toContain(`<script nonce="${nonce}">console.log("<\\/script>");</script>`);
  });
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('page files', () => {
  it('writes to a fresh temporary directory by default', async () => {
    const filePath = await writeWebPage('<p>hi</p>');
    try {
      expect(path.basename(filePath)).toBe(WEB_PAGE_FILE);
      expect(path.basename(path.dirname(filePath))).toMatch(/^jsonl-tree-/);
      expect(fs.readFileSync(filePath, 'utf8')).toBe('<p>hi</p>');
    } finally {
      fs.rmSync(path.dirname(filePath), { recursive: true, force: true });
    }
  });

  it('writes to the requested target', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jsonl-tree-page-'));
    const target = path.join(dir, 'out.html');
    try {
      await expect(writeWebPage('<p>hi</p>', target)).resolves.toBe(target);
      expect(fs.readFileSync(target, 'utf8')).toBe('<p>hi</p>');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('explains how to build a missing viewer bundle', async () => {
    const bundle = path.join(os.tmpdir(), 'jsonl-tree-no-such-dir', 'viewer.js');
    const pending = loadViewerScript(bundle);

    await expect(pending).rejects.toBeInstanceOf(CliError);
    await expect(pending).rejects.toThrow(`Web viewer bundle not found at '${bundle}'. Run "npm run build" first.`);
  });
});
