import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import open from 'open';
import { CliError, describeError, errnoCode } from './errors';

export const VIEWER_BUNDLE = path.resolve(__dirname, '..', 'media', 'viewer.js');
export const WEB_PAGE_FILE = 'jsonl-tree.html';

export interface WebPageOptions {
  /** Bundled browser client, inlined into the page. */
  viewerScript: string;
  truncateLimit: number;
  title?: string;
}

export function buildWebPage(rawText: string, options: WebPageOptions): string {
  const nonce = generateNonce();
  const title = escapeHtml(options.title ? `${options.title} · jsonl-tree` : 'jsonl-tree');
  const script = options.viewerScript.replace(/<\/script/gi, '<\\/script');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <meta http-equiv="Content-Security-Policy" content="default-src 'none'; style-src 'unsafe-inline'; script-src 'nonce-${nonce}';" />
  <title>${title}</title>
  <style>
    :root {
      color-scheme: light dark;
    }
    body {
      margin: 0;
      padding: 1rem;
      font-family: 'Segoe UI', system-ui, sans-serif;
    }
    textarea {
      box-sizing: border-box;
      width: 100%;
      min-height: 8rem;
      font-family: SFMono-Regular, Consolas, monospace;
      font-size: 0.85rem;
    }
    .toolbar {
      display: flex;
      align-items: center;
      gap: 0.75rem;
      margin: 0.5rem 0 1rem;
    }
    .summary {
      font-size: 0.85rem;
      opacity: 0.75;
    }
    .tree,
    .tree ul {
      list-style: none;
      margin: 0;
      padding-left: 1.25rem;
      font-family: SFMono-Regular, Consolas, monospace;
      font-size: 0.85rem;
      line-height: 1.5;
    }
    .tree {
      padding-left: 0;
    }
    .tree-node {
      cursor: default;
      white-space: pre;
    }
    .tree-node--branch,
    .tree-node--truncated {
      cursor: pointer;
    }
    .tree-node--truncated {
      text-decoration: underline dotted;
    }
    .tree-node--lineError {
      color: #d64545;
      font-weight: 600;
    }
    .tree-node--errorSource {
      font-style: italic;
    }
    .tree-node--errorMessage {
      color: #d64545;
      opacity: 0.75;
    }
    .tree-node__chevron {
      display: inline-block;
      width: 1rem;
    }
    dialog {
      width: 80%;
      height: 80%;
      padding: 0;
    }
    dialog header {
      display: flex;
      justify-content: space-between;
      align-items: center;
      padding: 0.5rem 1rem;
      border-bottom: 1px solid rgba(127, 127, 127, 0.35);
    }
    dialog pre {
      margin: 0;
      padding: 1rem;
      white-space: pre-wrap;
      word-break: break-word;
      overflow: auto;
    }
  </style>
</head>
<body data-truncate-limit="${options.truncateLimit}">
  <textarea id="jsonInput" placeholder="Paste your JSON or JSONL here">
${escapeHtml(rawText)}</textarea>
  <div class="toolbar">
    <button id="renderButton" type="button">Render</button>
    <span id="summary" class="summary" role="status"></span>
  </div>
  <ul id="tree" class="tree" role="tree"></ul>
  <dialog id="detailDialog">
    <header>
      <span>Full Text</span>
      <button id="detailClose" type="button">Back</button>
    </header>
    <pre id="detailText"></pre>
  </dialog>
  <script nonce="${nonce}">${script}</script>
</body>
</html>`;
}

export async function loadViewerScript(bundlePath: string = VIEWER_BUNDLE): Promise<string> {
  try {
    return await fs.promises.readFile(bundlePath, 'utf8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      throw new CliError(`Web viewer bundle not found at '${bundlePath}'. Run "npm run build" first.`);
    }
    throw new CliError(`Error reading web viewer bundle '${bundlePath}': ${describeError(error)}`);
  }
}

/** Writes the page to `target`, or to a fresh temporary directory. Returns the file path. */
export async function writeWebPage(html: string, target?: string): Promise<string> {
  const filePath = target ?? path.join(await fs.promises.mkdtemp(path.join(os.tmpdir(), 'jsonl-tree-')), WEB_PAGE_FILE);
  await fs.promises.writeFile(filePath, html, 'utf8');
  return filePath;
}

export async function openInBrowser(filePath: string): Promise<void> {
  await open(pathToFileURL(path.resolve(filePath)).href);
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function generateNonce(): string {
  const chars = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
  let result = '';
  for (let i = 0; i < 16; i += 1) {
    result += chars.charAt(Math.floor(Math.random() * chars.length));
  }
  return result;
}
