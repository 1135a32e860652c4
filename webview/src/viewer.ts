import { countLineErrors, parseDocuments } from '../../src/documentParser';
import { DEFAULT_TRUNCATE_LIMIT, projectDocuments } from '../../src/treeProjector';
import type { TreeNode } from '../../src/treeProjector';

interface ViewerElements {
  input: HTMLTextAreaElement;
  tree: HTMLElement;
  summary: HTMLElement;
  dialog: HTMLDialogElement;
  detailText: HTMLElement;
}

class TreeViewer {
  private readonly expanded = new Set<string>();
  private readonly truncateLimit: number;

  constructor(private readonly elements: ViewerElements) {
    const limit = Number(document.body.dataset.truncateLimit);
    this.truncateLimit = Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_TRUNCATE_LIMIT;
  }

  public render(): void {
    const documents = parseDocuments(this.elements.input.value);
    const root = projectDocuments(documents, this.truncateLimit);
    const errors = countLineErrors(documents);

    this.expanded.add(root.id);
    this.elements.summary.textContent = `${plural(documents.length, 'document')}, ${plural(errors, 'parse error')}`;
    this.elements.tree.replaceChildren(this.buildBranch(root, 0));
  }

  public showDetail(text: string): void {
    this.elements.detailText.textContent = text;
    this.elements.dialog.showModal();
  }

  private buildBranch(node: TreeNode, depth: number): HTMLLIElement {
    const isExpanded = node.expandable && this.expanded.has(node.id);
    const listItem = document.createElement('li');
    listItem.className = 'tree-branch';
    listItem.dataset.depth = String(depth);
    listItem.setAttribute('role', 'treeitem');
    if (node.expandable) {
      listItem.setAttribute('aria-expanded', String(isExpanded));
    }

    const control = document.createElement(node.expandable ? 'button' : 'div');
    control.className = [
      'tree-node',
      node.expandable ? 'tree-node--branch' : 'tree-node--leaf',
      `tree-node--${node.kind}`,
      node.fullValue !== undefined ? 'tree-node--truncated' : ''
    ]
      .filter(Boolean)
      .join(' ');
    if (control instanceof HTMLButtonElement) {
      control.type = 'button';
    }

    const chevron = document.createElement('span');
    chevron.className = 'tree-node__chevron';
    chevron.setAttribute('aria-hidden', 'true');
    chevron.textContent = node.expandable ? (isExpanded ? '▾' : '▸') : '';
    control.appendChild(chevron);

    const label = document.createElement('span');
    label.className = 'tree-node__label';
    label.textContent = node.label;
    control.appendChild(label);

    control.addEventListener('click', () => {
      const { fullValue } = node;
      if (fullValue !== undefined) {
        this.showDetail(fullValue);
        return;
      }
      if (!node.expandable) {
        return;
      }
      if (this.expanded.has(node.id)) {
        this.expanded.delete(node.id);
      } else {
        this.expanded.add(node.id);
      }
      listItem.replaceWith(this.buildBranch(node, depth));
    });

    listItem.appendChild(control);

    if (isExpanded && node.children.length) {
      const childList = document.createElement('ul');
      childList.setAttribute('role', 'group');
      node.children.forEach((child) => childList.appendChild(this.buildBranch(child, depth + 1)));
      listItem.appendChild(childList);
    }

    return listItem;
  }
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

(function () {
  const input = document.getElementById('jsonInput');
  const tree = document.getElementById('tree');
  const summary = document.getElementById('summary');
  const dialog = document.getElementById('detailDialog');
  const detailText = document.getElementById('detailText');

  if (!(input instanceof HTMLTextAreaElement) || !tree || !summary || !(dialog instanceof HTMLDialogElement) || !detailText) {
    return;
  }

  const viewer = new TreeViewer({ input, tree, summary, dialog, detailText });
  document.getElementById('renderButton')?.addEventListener('click', () => viewer.render());
  document.getElementById('detailClose')?.addEventListener('click', () => dialog.close());
  viewer.render();
})();
