import * as readline from 'readline';
import type { Key } from 'readline';
import type { Readable, Writable } from 'stream';
import { DetailView } from './detailView';
import { formatJsonPath } from './jsonPath';
import type { OutputChannel } from './outputChannel';
import { enterScreen, leaveScreen, paintFrame, Styler } from './terminalScreen';
import type { Style } from './terminalScreen';
import { clipText, escapeControlCharacters } from './textUtils';
import { ROOT_LABEL } from './treeProjector';
import type { TreeNode, TreeNodeKind } from './treeProjector';
import { TreeViewModel } from './treeViewModel';
import type { VisibleRow } from './treeViewModel';

export type TerminalInput = Readable & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
export type TerminalOutput = Writable & { isTTY?: boolean; columns?: number; rows?: number };

export type AppMode = 'tree' | 'detail' | 'search';

export interface TreeAppOptions {
  input: TerminalInput;
  output: TerminalOutput;
  /** Shown in the header next to the root label, usually the input name. */
  title?: string;
  expandDepth?: number;
  color?: boolean;
  log?: OutputChannel;
}

const CHROME_LINES = 3;
const TREE_HINTS = '↑↓ move  ←→ collapse/expand  * expand all  enter select  / search  n/N next/prev  q quit';
const DETAIL_HINTS = '↑↓ scroll  PgUp/PgDn page  b back  q quit';
const SEARCH_HINTS = 'enter find  esc cancel';

const KIND_STYLES: Partial<Record<TreeNodeKind, Style>> = {
  lineError: 'error',
  errorSource: 'errorSource',
  errorMessage: 'errorDetail',
  root: 'bold'
};

export class TreeApp {
  private readonly model: TreeViewModel;
  private readonly styler: Styler;
  private mode: AppMode = 'tree';
  private detail: DetailView | undefined;
  private query = '';
  private lastQuery = '';
  private message: string | undefined;
  private closed = false;
  private finish: (() => void) | undefined;

  constructor(root: TreeNode, private readonly options: TreeAppOptions) {
    this.model = new TreeViewModel(root, { expandDepth: options.expandDepth });
    this.styler = new Styler(options.color ?? true);
  }

  public get currentMode(): AppMode {
    return this.mode;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /** Takes over the terminal until the user quits. */
  public run(): Promise<void> {
    const { input, output } = this.options;

    return new Promise((resolve) => {
      const onKeypress = (str: string | undefined, key: Key | undefined) => {
        this.handleKey(str, key ?? {});
        if (!this.closed) {
          this.draw();
        }
      };
      const onResize = () => this.draw();

      this.finish = () => {
        input.off('keypress', onKeypress);
        output.off('resize', onResize);
        if (input.isTTY) {
          input.setRawMode?.(false);
        }
        input.pause();
        output.write(leaveScreen());
        resolve();
      };

      readline.emitKeypressEvents(input);
      if (input.isTTY) {
        input.setRawMode?.(true);
      }
      input.on('keypress', onKeypress);
      output.on('resize', onResize);
      input.resume();
      output.write(enterScreen());
      this.draw();
    });
  }

  public handleKey(str: string | undefined, key: Key): void {
    if (key.ctrl && key.name === 'c') {
      this.quit();
      return;
    }

    switch (this.mode) {
      case 'search':
        this.handleSearchKey(str, key);
        return;
      case 'detail':
        if (str === 'q') {
          this.quit();
          return;
        }
        this.handleDetailKey(str, key);
        return;
      case 'tree':
        if (str === 'q') {
          this.quit();
          return;
        }
        this.handleTreeKey(str, key);
        return;
    }
  }

  public renderFrame(): string[] {
    const width = this.width();
    const bodyHeight = this.bodyHeight();

    if (this.mode === 'detail' && this.detail) {
      const view = this.detail.window(width, bodyHeight);
      const last = Math.min(view.offset + view.lines.length, view.total);
      return [
        this.headerLine(this.detail.title, width),
        ...view.lines,
        this.styler.apply(clipText(`Lines ${view.offset + 1}-${last} of ${view.total}`, width), 'accent'),
        this.styler.apply(clipText(DETAIL_HINTS, width), 'muted')
      ];
    }

    const { start, rows } = this.model.window(bodyHeight);
    const cursor = this.model.cursorIndex;
    const title = this.options.title ? `${ROOT_LABEL} · ${this.options.title}` : ROOT_LABEL;

    return [
      this.headerLine(title, width),
      ...rows.map((row, offset) => this.treeLine(row, start + offset === cursor, width)),
      this.statusLine(width),
      this.styler.apply(clipText(this.mode === 'search' ? SEARCH_HINTS : TREE_HINTS, width), 'muted')
    ];
  }

  private handleTreeKey(str: string | undefined, key: Key) {
    this.message = undefined;

    switch (key.name) {
      case 'up':
        this.model.moveBy(-1);
        return;
      case 'down':
        this.model.moveBy(1);
        return;
      case 'pageup':
        this.model.moveBy(-this.bodyHeight());
        return;
      case 'pagedown':
        this.model.moveBy(this.bodyHeight());
        return;
      case 'home':
        this.model.moveTo(0);
        return;
      case 'end':
        this.model.moveToLast();
        return;
      case 'right':
        this.model.expandOrEnter();
        return;
      case 'left':
        this.model.collapseOrLeave();
        return;
      case 'return':
      case 'enter':
      case 'space':
        this.activate();
        return;
      default:
        break;
    }

    switch (str) {
      case 'k':
        this.model.moveBy(-1);
        return;
      case 'j':
        this.model.moveBy(1);
        return;
      case 'g':
        this.model.moveTo(0);
        return;
      case 'G':
        this.model.moveToLast();
        return;
      case 'l':
        this.model.expandOrEnter();
        return;
      case 'h':
        this.model.collapseOrLeave();
        return;
      case '*':
        this.model.expandAll();
        return;
      case '/':
        this.mode = 'search';
        this.query = '';
        return;
      case 'n':
        this.findNext(1);
        return;
      case 'N':
        this.findNext(-1);
        return;
      default:
        return;
    }
  }

  private handleDetailKey(str: string | undefined, key: Key) {
    const detail = this.detail;
    if (!detail) {
      this.mode = 'tree';
      return;
    }

    const width = this.width();
    const height = this.bodyHeight();
    if (key.name === 'escape' || str === 'b') {
      this.detail = undefined;
      this.mode = 'tree';
      return;
    }

    if (key.name === 'up' || str === 'k') {
      detail.scrollBy(-1, width, height);
    } else if (key.name === 'down' || str === 'j') {
      detail.scrollBy(1, width, height);
    } else if (key.name === 'pageup') {
      detail.scrollBy(-height, width, height);
    } else if (key.name === 'pagedown' || key.name === 'space') {
      detail.scrollBy(height, width, height);
    } else if (key.name === 'home' || str === 'g') {
      detail.scrollToStart();
    } else if (key.name === 'end' || str === 'G') {
      detail.scrollToEnd(width, height);
    }
  }

  private handleSearchKey(str: string | undefined, key: Key) {
    switch (key.name) {
      case 'escape':
        this.mode = 'tree';
        this.query = '';
        return;
      case 'return':
      case 'enter':
        this.mode = 'tree';
        this.lastQuery = this.query;
        this.findNext(1);
        return;
      case 'backspace':
        this.query = Array.from(this.query).slice(0, -1).join('');
        return;
      default:
        break;
    }

    if (str && !key.ctrl && !key.meta && Array.from(str).length === 1 && str >= ' ') {
      this.query += str;
    }
  }

  private activate() {
    const result = this.model.activate();
    if (result.type !== 'detail') {
      return;
    }
    this.options.log?.debug(`Opened full text of ${formatJsonPath(result.node.path)} (${result.text.length} chars)`);
    this.detail = new DetailView(result.text);
    this.mode = 'detail';
  }

  private findNext(direction: 1 | -1) {
    if (!this.lastQuery) {
      return;
    }
    const match = this.model.find(this.lastQuery, direction);
    this.message = match ? undefined : `No match for "${this.lastQuery}"`;
  }

  private quit() {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.finish?.();
  }

  private draw() {
    this.options.output.write(paintFrame(this.renderFrame()));
  }

  private headerLine(text: string, width: number): string {
    return this.styler.apply(clipText(` ${text}`, width).padEnd(width), 'inverse');
  }

  private treeLine(row: VisibleRow, selected: boolean, width: number): string {
    const marker = row.node.expandable ? (row.expanded ? '▾' : '▸') : ' ';
    const text = clipText(`${'  '.repeat(row.depth)}${marker} ${escapeControlCharacters(row.node.label)}`, width);
    return this.styler.apply(text, KIND_STYLES[row.node.kind], selected ? 'inverse' : undefined);
  }

  private statusLine(width: number): string {
    if (this.mode === 'search') {
      return clipText(`/${this.query}`, width);
    }
    if (this.message) {
      return this.styler.apply(clipText(this.message, width), 'accent');
    }
    const rows = this.model.visibleRows.length;
    const position = `${this.model.cursorIndex + 1}/${rows}`;
    return this.styler.apply(clipText(`${formatJsonPath(this.model.current.path)}  ${position}`, width), 'accent');
  }

  private width(): number {
    return Math.max(20, this.options.output.columns ?? 80);
  }

  private bodyHeight(): number {
    return Math.max(1, (this.options.output.rows ?? 24) - CHROME_LINES);
  }
}
