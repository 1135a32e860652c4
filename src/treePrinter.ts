import { escapeControlCharacters } from './textUtils';
import type { TreeNode } from './treeProjector';

/** Every node of the fully expanded tree, one line each, two spaces per level. */
export function printTree(root: TreeNode): string[] {
  const lines: string[] = [];
  const visit = (node: TreeNode, depth: number) => {
    lines.push(`${'  '.repeat(depth)}${escapeControlCharacters(node.label)}`);
    node.children.forEach((child) => visit(child, depth + 1));
  };
  visit(root, 0);
  return lines;
}
