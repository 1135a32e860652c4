import type { DocumentSet, JsonDocument, JsonValue, JsonValueKind } from './jsonValue';
import { exceedsLimit, truncateText } from './textUtils';

export const DEFAULT_TRUNCATE_LIMIT = 500;
export const ROOT_LABEL = 'JSON Data';

export type PathSegment = string | number;

export type TreeNodeKind = 'root' | JsonValueKind | 'lineError' | 'errorSource' | 'errorMessage';

export interface TreeNode {
  readonly id: string;
  readonly kind: TreeNodeKind;
  readonly label: string;
  readonly expandable: boolean;
  /** Untruncated text, present only when the label had to be shortened. */
  readonly fullValue?: string;
  /** Document index followed by the keys and indices leading to this node. */
  readonly path: readonly PathSegment[];
  readonly children: readonly TreeNode[];
}

export function encodePath(path: readonly PathSegment[]): string {
  return JSON.stringify(path);
}

export function preview(value: JsonValue, limit: number = DEFAULT_TRUNCATE_LIMIT): string {
  switch (value.kind) {
    case 'string':
      return truncateText(value.value, limit);
    case 'object':
      return '{...}';
    case 'array':
      return '[...]';
    case 'number':
      return value.text;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
  }
}

export function isTruncated(value: JsonValue, limit: number = DEFAULT_TRUNCATE_LIMIT): boolean {
  return value.kind === 'string' && exceedsLimit(value.value, limit);
}

export function projectDocuments(documents: DocumentSet, truncateLimit: number = DEFAULT_TRUNCATE_LIMIT): TreeNode {
  return {
    id: encodePath([]),
    kind: 'root',
    label: ROOT_LABEL,
    expandable: true,
    path: [],
    children: documents.map((document, index) => projectDocument(document, index, truncateLimit))
  };
}

function projectDocument(document: JsonDocument, index: number, limit: number): TreeNode {
  if (document.kind === 'parsed') {
    return projectValue(`[${index}]`, document.value, [index], limit);
  }

  const path = [index];
  const id = encodePath(path);
  const source: TreeNode = {
    id: `${id}#source`,
    kind: 'errorSource',
    label: `Original text: ${truncateText(document.rawText, limit)}`,
    expandable: false,
    ...(exceedsLimit(document.rawText, limit) ? { fullValue: document.rawText } : {}),
    path,
    children: []
  };
  const message: TreeNode = {
    id: `${id}#message`,
    kind: 'errorMessage',
    label: `Error: ${document.message}`,
    expandable: false,
    path,
    children: []
  };

  return {
    id,
    kind: 'lineError',
    label: `[${index}]: Line ${document.lineNumber}: Parsing Error`,
    expandable: true,
    path,
    children: [source, message]
  };
}

function projectValue(name: string, value: JsonValue, path: PathSegment[], limit: number): TreeNode {
  return {
    id: encodePath(path),
    kind: value.kind,
    label: `${name}: ${preview(value, limit)}`,
    expandable: value.kind === 'object' || value.kind === 'array',
    ...(isTruncated(value, limit) && value.kind === 'string' ? { fullValue: value.value } : {}),
    path,
    children: projectChildren(value, path, limit)
  };
}

function projectChildren(value: JsonValue, path: PathSegment[], limit: number): TreeNode[] {
  switch (value.kind) {
    case 'object':
      return value.entries.map((entry) => projectValue(entry.key, entry.value, [...path, entry.key], limit));
    case 'array':
      return value.items.map((item, index) => projectValue(`[${index}]`, item, [...path, index], limit));
    default:
      return [];
  }
}

export function countNodes(node: TreeNode): number {
  return node.children.reduce((total, child) => total + countNodes(child), 1);
}
