import type { Node } from 'jsonc-parser';

export interface JsonEntry {
  readonly key: string;
  readonly value: JsonValue;
}

export type JsonValue =
  | { readonly kind: 'null' }
  | { readonly kind: 'boolean'; readonly value: boolean }
  /** `text` is the number exactly as written in the source. */
  | { readonly kind: 'number'; readonly value: number; readonly text: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'object'; readonly entries: readonly JsonEntry[] }
  | { readonly kind: 'array'; readonly items: readonly JsonValue[] };

export type JsonValueKind = JsonValue['kind'];

export type JsonDocument =
  | { readonly kind: 'parsed'; readonly value: JsonValue }
  | {
      readonly kind: 'lineError';
      readonly lineNumber: number;
      readonly rawText: string;
      readonly message: string;
    };

export type DocumentSet = readonly JsonDocument[];

const NULL_VALUE: JsonValue = { kind: 'null' };

/**
 * Converts an error-free jsonc-parser syntax tree into a {@link JsonValue}.
 *
 * Object entries keep source order. A repeated key stays at the position of
 * its first occurrence and takes the value of its last one. `source` is the
 * text the tree was parsed from.
 */
export function fromNode(node: Node, source: string): JsonValue {
  switch (node.type) {
    case 'object':
      return { kind: 'object', entries: collectEntries(node.children ?? [], source) };
    case 'array':
      return { kind: 'array', items: (node.children ?? []).map((child) => fromNode(child, source)) };
    case 'property': {
      const valueNode = node.children?.[1];
      return valueNode ? fromNode(valueNode, source) : NULL_VALUE;
    }
    case 'string':
      return { kind: 'string', value: String(node.value) };
    case 'number':
      return { kind: 'number', value: Number(node.value), text: source.slice(node.offset, node.offset + node.length) };
    case 'boolean':
      return { kind: 'boolean', value: node.value === true };
    case 'null':
      return NULL_VALUE;
  }
}

function collectEntries(properties: Node[], source: string): JsonEntry[] {
  const entries: JsonEntry[] = [];
  const positions = new Map<string, number>();

  for (const property of properties) {
    const keyNode = property.children?.[0];
    if (!keyNode) {
      continue;
    }
    const key = String(keyNode.value);
    const entry: JsonEntry = { key, value: fromNode(property, source) };
    const existing = positions.get(key);
    if (existing === undefined) {
      positions.set(key, entries.length);
      entries.push(entry);
    } else {
      entries[existing] = entry;
    }
  }

  return entries;
}

export function toPlain(value: JsonValue): unknown {
  switch (value.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
      return value.value;
    case 'array':
      return value.items.map(toPlain);
    case 'object': {
      const result: Record<string, unknown> = {};
      for (const entry of value.entries) {
        Object.defineProperty(result, entry.key, {
          value: toPlain(entry.value),
          enumerable: true,
          writable: true,
          configurable: true
        });
      }
      return result;
    }
  }
}
