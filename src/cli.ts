import * as fs from 'fs';
import * as path from 'path';
import * as tty from 'tty';
import type { Writable } from 'stream';
import { parseArgs } from 'util';
import { analyzeInput, countLineErrors } from './documentParser';
import { CliError, describeError, InputError, UsageError } from './errors';
import { readInput } from './inputSource';
import type { InputStream, InputText } from './inputSource';
import { OutputChannel } from './outputChannel';
import { loadSettings } from './settings';
import type { Settings, SettingsOverrides } from './settings';
import { TreeApp } from './treeApp';
import type { TerminalInput, TerminalOutput } from './treeApp';
import { printTree } from './treePrinter';
import { countNodes, projectDocuments } from './treeProjector';
import type { TreeNode } from './treeProjector';
import { buildWebPage, loadViewerScript, openInBrowser, writeWebPage } from './webPage';

export const USAGE = `Usage: jsonl-tree [file] [options]

Browse JSON or JSON Lines data as a collapsible tree.
Reads standard input when no file is given.

Options:
  --web, --webui            Open the data in a web page instead of the terminal UI
  -o, --out <file>          Write the web page to <file> without opening a browser
  -p, --print               Print the fully expanded tree and exit
  --truncate-limit <n>      Characters shown before a string is truncated (default 500)
  --expand-depth <n>        Tree levels expanded on start (default 1)
  -c, --config <file>       Settings file (default ~/.config/jsonl-tree/settings.json)
  --log-file <file>         Append log lines to <file>
  --log-level <level>       off, error, warn, info or debug
  --no-color                Disable colours
  -h, --help                Show this help
  -v, --version             Show the version
`;

const LOG_NAME = 'jsonl-tree';

export interface TerminalSession {
  input: TerminalInput;
  release(): void;
}

export interface CliIo {
  stdin: InputStream & TerminalInput;
  stdout: TerminalOutput;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  /** Keyboard for the interactive tree when stdin carried the data. */
  openTerminal?: () => TerminalSession;
  openBrowser?: (filePath: string) => Promise<void>;
  loadViewerScript?: () => Promise<string>;
}

interface CommandLine {
  file?: string;
  web: boolean;
  out?: string;
  print: boolean;
  help: boolean;
  version: boolean;
  config?: string;
  overrides: SettingsOverrides;
}

export function processIo(): CliIo {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env
  };
}

/** Runs the command line and resolves with the process exit code. */
export async function run(argv: string[], io: CliIo = processIo()): Promise<number> {
  let log = OutputChannel.create(LOG_NAME, {});

  try {
    const args = parseCommandLine(argv);
    if (args.help) {
      io.stdout.write(USAGE);
      return 0;
    }
    if (args.version) {
      io.stdout.write(`${readVersion()}\n`);
      return 0;
    }

    const { settings, source } = await loadSettings({ configPath: args.config, env: io.env, overrides: args.overrides });
    log = OutputChannel.create(LOG_NAME, {
      ...settings,
      onSinkFailure: (error, filePath) =>
        io.stderr.write(`Warning: stopped logging to '${filePath}': ${describeError(error)}\n`)
    });
    log.info(source ? `Loaded settings from ${source}` : 'Using default settings');

    const input = await readInput({ file: args.file, stdin: io.stdin });
    log.info(`Read ${input.text.length} characters from ${input.source}`);

    if (args.web || args.out !== undefined) {
      return await runWeb(input, settings, args.out, io, log);
    }

    const root = buildTree(input, settings, log);
    if (args.print || !io.stdout.isTTY) {
      io.stdout.write(`${printTree(root).join('\n')}\n`);
      return 0;
    }
    return await runInteractive(root, input.source, settings, io, log);
  } catch (error) {
    const message = describeError(error);
    log.error(message);
    io.stderr.write(`Error: ${message}\n`);
    if (error instanceof UsageError) {
      io.stderr.write(`\n${USAGE}`);
    }
    return error instanceof CliError ? error.exitCode : 1;
  }
}

function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = parseRawArguments(argv);
  if (positionals.length > 1) {
    throw new UsageError(`Expected at most one input file, got ${positionals.length}.`);
  }

  return {
    file: positionals[0],
    web: Boolean(values.web || values.webui),
    out: values.out,
    print: Boolean(values.print),
    help: Boolean(values.help),
    version: Boolean(values.version),
    config: values.config,
    overrides: {
      truncateLimit: toNumber(values['truncate-limit']),
      expandDepth: toNumber(values['expand-depth']),
      logFile: values['log-file'],
      logLevel: values['log-level'],
      color: values['no-color'] ? false : undefined
    }
  };
}

function parseRawArguments(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        web: { type: 'boolean' },
        webui: { type: 'boolean' },
        out: { type: 'string', short: 'o' },
        print: { type: 'boolean', short: 'p' },
        'truncate-limit': { type: 'string' },
        'expand-depth': { type: 'string' },
        config: { type: 'string', short: 'c' },
        'log-file': { type: 'string' },
        'log-level': { type: 'string' },
        'no-color': { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' }
      }
    });
  } catch (error) {
    throw new UsageError(describeError(error));
  }
}

// Non-numeric text becomes NaN and is rejected by settings validation.
function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed ? Number(trimmed) : Number.NaN;
}

function buildTree(input: InputText, settings: Settings, log: OutputChannel): TreeNode {
  const analysis = analyzeInput(input.text);
  const errorCount = countLineErrors(analysis.documents);
  log.info(
    `Parsed ${input.source} in ${analysis.mode} mode: ${analysis.documents.length} documents, ${errorCount} line errors`
  );
  if (log.isEnabled('debug')) {
    for (const document of analysis.documents) {
      if (document.kind === 'lineError') {
        log.debug(`Line ${document.lineNumber}: ${document.message}`);
      }
    }
  }

  const root = projectDocuments(analysis.documents, settings.truncateLimit);
  log.debug(`Projected ${countNodes(root)} tree nodes with truncate limit ${settings.truncateLimit}`);
  return root;
}

async function runWeb(
  input: InputText,
  settings: Settings,
  out: string | undefined,
  io: CliIo,
  log: OutputChannel
): Promise<number> {
  const viewerScript = await (io.loadViewerScript ?? loadViewerScript)();
  const html = buildWebPage(input.text, {
    viewerScript,
    truncateLimit: settings.truncateLimit,
    title: input.source
  });

  let filePath: string;
  try {
    filePath = await writeWebPage(html, out);
  } catch (error) {
    throw new CliError(`Error writing web page${out ? ` '${out}'` : ''}: ${describeError(error)}`);
  }
  log.info(`Wrote web page to ${filePath}`);

  if (out !== undefined) {
    io.stdout.write(`${filePath}\n`);
    return 0;
  }

  await (io.openBrowser ?? openInBrowser)(filePath);
  io.stdout.write(`Opened ${filePath}\n`);
  return 0;
}

async function runInteractive(
  root: TreeNode,
  source: string,
  settings: Settings,
  io: CliIo,
  log: OutputChannel
): Promise<number> {
  const session: TerminalSession = io.stdin.isTTY
    ? { input: io.stdin, release: () => undefined }
    : (io.openTerminal ?? openControllingTerminal)();

  const app = new TreeApp(root, {
    input: session.input,
    output: io.stdout,
    title: source,
    expandDepth: settings.expandDepth,
    color: settings.color,
    log
  });

  log.info('Starting interactive tree');
  try {
    await app.run();
  } finally {
    session.release();
  }
  log.info('Interactive tree closed');
  return 0;
}

function openControllingTerminal(): TerminalSession {
  const device = process.platform === 'win32' ? 'CONIN$' : '/dev/tty';
  let fd: number;
  try {
    fd = fs.openSync(device, 'r');
  } catch (error) {
    throw new InputError(`Cannot open ${device} for keyboard input (${describeError(error)}). Use --print or --web instead.`);
  }
  const input = new tty.ReadStream(fd);
  return { input, release: () => input.destroy() };
}

function readVersion(): string {
  const text = fs.readFileSync(path.resolve(__dirname, '..', 'package.json'), 'utf8');
  const parsed: unknown = JSON.parse(text);
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return 'unknown';
}
