import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough, Writable } from 'stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { run, USAGE } from '../src/cli';
import type { CliIo } from '../src/cli';

interface Capture {
  stream: Writable & { isTTY?: boolean };
  text(): string;
}

function capture(isTTY?: boolean): Capture {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });
  return { stream: Object.assign(stream, { isTTY, columns: 40, rows: 10 }), text: () => chunks.join('') };
}

describe('run', () => {
  let dir: string;
  let stdout: Capture;
  let stderr: Capture;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'jsonl-tree-cli-'));
    stdout = capture();
    stderr = capture();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function createIo(input: string, extra: Partial<CliIo> = {}): CliIo {
    const stdin = new PassThrough();
    stdin.end(input);
    return {
      stdin,
      stdout: stdout.stream,
      stderr: stderr.stream,
      env: { XDG_CONFIG_HOME: dir },
      ...extra
    };
  }

  it('prints the expanded tree when output is not a terminal', async () => {
    const code = await run([], createIo('{"a":[1,2]}'));

    expect(code).toBe(0);
    expect(stdout.text()).toBe('JSON Data\n  [0]: {...}\n    a: [...]\n      [0]: 1\n      [1]: 2\n');
    expect(stderr.text()).toBe('');
  });

  it('prints line errors beside the parsed documents', async () => {
    const code = await run(['--print'], createIo('{"a":1}\n{bad}\n'));

    expect(code).toBe(0);
    expect(stdout.text()).toBe(
      [
        'JSON Data',
        '  [0]: {...}',
        '    a: 1',
        '  [1]: Line 2: Parsing Error',
        '    Original text: {bad}',
        '    Error: InvalidSymbol at 2:2',
        ''
      ].join('\n')
    );
  });

  it('prints only the root for empty input', async () => {
    await expect(run(['--print'], createIo(''))).resolves.toBe(0);
    expect(stdout.text()).toBe('JSON Data\n');
  });

  it('reads a named file and applies the truncate limit flag', async () => {
    const file = path.join(dir, 'data.json');
    fs.writeFileSync(file, '"abcdef"');

    const code = await run([file, '--truncate-limit', '3'], createIo(''));

    expect(code).toBe(0);
    expect(stdout.text()).toBe('JSON Data\n  [0]: abc...\n');
  });

  it('fails with exit code 1 for a missing file', async () => {
    const file = path.join(dir, 'missing.json');

    const code = await run([file], createIo(''));

    expect(code).toBe(1);
    expect(stderr.text()).toBe(`Error: File '${file}' does not exist.\n`);
  });

  it('fails with exit code 1 for invalid flag values', async () => {
    const code = await run(['--truncate-limit', '0'], createIo('[]'));

    expect(code).toBe(1);
    expect(stderr.text()).toBe('Error: Invalid settings: settings/truncateLimit must be >= 1\n');
  });

  it('shows usage with exit code 2 for command line mistakes', async () => {
    const code = await run(['a.json', 'b.json'], createIo(''));

    expect(code).toBe(2);
    expect(stderr.text()).toBe(`Error: Expected at most one input file, got 2.\n\n${USAGE}`);
  });

  it('rejects unknown options', async () => {
    const code = await run(['--bogus'], createIo(''));

    expect(code).toBe(2);
    expect(stderr.text().startsWith('Error: ')).toBe(true);
    expect(stderr.text().endsWith(USAGE)).toBe(true);
  });

  it('prints help and version', async () => {
    await expect(run(['--help'], createIo(''))).resolves.toBe(0);
    expect(stdout.text()).toBe(USAGE);

    const version = capture();
    await expect(run(['-v'], { ...createIo(''), stdout: version.stream })).resolves.toBe(0);
    expect(version.text()).toBe('0.1.0\n');
  });

  it('writes the web page to the requested file', async () => {
    const out = path.join(dir, 'page.html');

    const code = await run(['--out', out], createIo('[1]', { loadViewerScript: async () => 'void 0;' }));

    expect(code).toBe(0);
    expect(stdout.text()).toBe(`${out}\n`);
    expect(fs.readFileSync(out, 'utf8')).toContain('<textarea id="jsonInput" placeholder="Paste your JSON or JSONL here">\n[1]</textarea>');
  });

  it('opens the web page in a browser', async () => {
    const opened: string[] = [];

    const code = await run(
      ['--web'],
      createIo('[1]', {
        loadViewerScript: async () => 'void 0;',
        openBrowser: async (filePath) => {
          opened.push(filePath);
        }
      })
    );

    try {
      expect(code).toBe(0);
      expect(opened).toHaveLength(1);
      expect(stdout.text()).toBe(`Opened ${opened[0]}\n`);
    } finally {
      opened.forEach((filePath) => fs.rmSync(path.dirname(filePath), { recursive: true, force: true }));
    }
  });

  it('runs the interactive tree on the terminal when data was piped', async () => {
    const terminal = capture(true);
    let released = false;

    const code = await run(
      [],
      createIo('{"a":1}', {
        stdout: terminal.stream,
        openTerminal: () => {
          const keyboard = new PassThrough();
          setTimeout(() => keyboard.write('q'), 0);
          return {
            input: keyboard,
            release: () => {
              released = true;
            }
          };
        }
      })
    );

    expect(code).toBe(0);
    expect(released).toBe(true);
    expect(terminal.text()).toContain('▾ JSON Data');
  });

  it('fails with exit code 1 when the log file cannot be opened', async () => {
    const logFile = path.join(dir, 'missing', 'run.log');

    const code = await run(['--print', '--log-file', logFile], createIo('[1]'));

    expect(code).toBe(1);
    expect(stdout.text()).toBe('');
    expect(stderr.text()).toBe(`Error: Cannot open log file '${logFile}': ENOENT: no such file or directory, open '${logFile}'\n`);
  });

  it('logs to the configured file', async () => {
    const logFile = path.join(dir, 'run.log');

    await run(['--print', '--log-file', logFile, '--log-level', 'debug'], createIo('{"a":1}'));

    const lines = fs.readFileSync(logFile, 'utf8').trim().split('\n');
    expect(lines.some((line) => line.endsWith('[info] [jsonl-tree] Parsed <stdin> in document mode: 1 documents, 0 line errors'))).toBe(true);
    expect(lines.some((line) => line.endsWith('[debug] [jsonl-tree] Projected 3 tree nodes with truncate limit 500'))).toBe(true);
  });
});
