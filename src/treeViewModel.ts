import type { TreeNode } from './treeProjector';

export interface VisibleRow {
  readonly node: TreeNode;
  readonly depth: number;
  readonly expanded: boolean;
}

export type ActivationResult =
  | { type: 'detail'; node: TreeNode; text: string }
  | { type: 'toggled'; expanded: boolean }
  | { type: 'none' };

export interface TreeViewModelOptions {
  /** Nodes shallower than this depth start expanded; the root is depth 0. */
  expandDepth?: number;
}

export class TreeViewModel {
  private readonly expanded = new Set<string>();
  private readonly parents = new Map<string, TreeNode>();
  private readonly order: TreeNode[] = [];
  private rows: VisibleRow[] = [];
  private cursorId: string;
  private scrollTop = 0;

  constructor(public readonly root: TreeNode, options: TreeViewModelOptions = {}) {
    const expandDepth = options.expandDepth ?? 1;
    this.index(root, undefined, 0, expandDepth);
    this.cursorId = root.id;
    this.rebuild();
  }

  public get visibleRows(): readonly VisibleRow[] {
    return this.rows;
  }

  public get cursorIndex(): number {
    const index = this.rows.findIndex((row) => row.node.id === this.cursorId);
    return index < 0 ? 0 : index;
  }

  public get current(): TreeNode {
    return this.rows[this.cursorIndex]?.node ?? this.root;
  }

  public isExpanded(node: TreeNode): boolean {
    return this.expanded.has(node.id);
  }

  public parentOf(node: TreeNode): TreeNode | undefined {
    return this.parents.get(node.id);
  }

  public moveBy(delta: number): void {
    this.moveTo(this.cursorIndex + delta);
  }

  public moveTo(index: number): void {
    const clamped = Math.min(Math.max(index, 0), this.rows.length - 1);
    const row = this.rows[clamped];
    if (row) {
      this.cursorId = row.node.id;
    }
  }

  public moveToLast(): void {
    this.moveTo(this.rows.length - 1);
  }

  public expand(node: TreeNode = this.current): boolean {
    if (!node.expandable || this.expanded.has(node.id)) {
      return false;
    }
    this.expanded.add(node.id);
    this.rebuild();
    return true;
  }

  public collapse(node: TreeNode = this.current): boolean {
    if (!this.expanded.delete(node.id)) {
      return false;
    }
    this.rebuild();
    return true;
  }

  public toggle(node: TreeNode = this.current): boolean {
    if (this.isExpanded(node)) {
      this.collapse(node);
      return false;
    }
    return this.expand(node);
  }

  public expandAll(node: TreeNode = this.current): void {
    const visit = (target: TreeNode) => {
      if (target.expandable) {
        this.expanded.add(target.id);
      }
      target.children.forEach(visit);
    };
    visit(node);
    this.rebuild();
  }

  /** Right arrow: expand a collapsed branch, otherwise step into its first child. */
  public expandOrEnter(): void {
    const node = this.current;
    if (this.expand(node)) {
      return;
    }
    const [firstChild] = node.children;
    if (firstChild && this.isExpanded(node)) {
      this.cursorId = firstChild.id;
    }
  }

  /** Left arrow: collapse an expanded branch, otherwise step to the parent. */
  public collapseOrLeave(): void {
    const node = this.current;
    if (this.collapse(node)) {
      return;
    }
    const parent = this.parentOf(node);
    if (parent) {
      this.cursorId = parent.id;
    }
  }

  public activate(): ActivationResult {
    const node = this.current;
    if (node.fullValue !== undefined) {
      return { type: 'detail', node, text: node.fullValue };
    }
    if (node.expandable) {
      return { type: 'toggled', expanded: this.toggle(node) };
    }
    return { type: 'none' };
  }

  /**
   * Finds the next node, in pre-order and wrapping around, whose label
   * contains `query` case-insensitively. The match is revealed and selected.
   */
  public find(query: string, direction: 1 | -1 = 1): TreeNode | undefined {
    const needle = query.toLowerCase();
    if (!needle) {
      return undefined;
    }

    const start = this.order.findIndex((node) => node.id === this.cursorId);
    const total = this.order.length;
    for (let step = 1; step <= total; step += 1) {
      const node = this.order[(((start + direction * step) % total) + total) % total];
      if (node && node.label.toLowerCase().includes(needle)) {
        this.reveal(node);
        return node;
      }
    }
    return undefined;
  }

  public reveal(node: TreeNode): void {
    for (let parent = this.parentOf(node); parent; parent = this.parentOf(parent)) {
      this.expanded.add(parent.id);
    }
    this.cursorId = node.id;
    this.rebuild();
  }

  /** Rows to draw in a viewport of `height` lines, scrolled to keep the cursor visible. */
  public window(height: number): { start: number; rows: readonly VisibleRow[] } {
    const size = Math.max(1, height);
    const cursor = this.cursorIndex;
    if (cursor < this.scrollTop) {
      this.scrollTop = cursor;
    } else if (cursor >= this.scrollTop + size) {
      this.scrollTop = cursor - size + 1;
    }
    this.scrollTop = Math.max(0, Math.min(this.scrollTop, Math.max(0, this.rows.length - size)));
    return { start: this.scrollTop, rows: this.rows.slice(this.scrollTop, this.scrollTop + size) };
  }

  private index(node: TreeNode, parent: TreeNode | undefined, depth: number, expandDepth: number) {
    this.order.push(node);
    if (parent) {
      this.parents.set(node.id, parent);
    }
    if (node.expandable && depth < expandDepth) {
      this.expanded.add(node.id);
    }
    node.children.forEach((child) => this.index(child, node, depth + 1, expandDepth));
  }

  private rebuild() {
    const rows: VisibleRow[] = [];
    const visit = (node: TreeNode, depth: number) => {
      const expanded = this.expanded.has(node.id);
      rows.push({ node, depth, expanded });
      if (expanded) {
        node.children.forEach((child) => visit(child, depth + 1));
      }
    };
    visit(this.root, 0);
    this.rows = rows;
  }
}
