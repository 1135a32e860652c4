import { parseTree, printParseErrorCode } from 'jsonc-parser';
import type { Node, ParseError, ParseOptions } from 'jsonc-parser';
import { fromNode } from './jsonValue';
import type { JsonValue } from './jsonValue';

/** Deepest array or object nesting accepted; the root container is depth 1. */
export const MAX_NESTING_DEPTH = 512;

export const NESTING_TOO_DEEP = 'NestingTooDeep';

export const strictParseOptions: ParseOptions = {
  allowTrailingComma: false,
  disallowComments: true,
  allowEmptyContent: false
};

export interface JsonDecodeFailure {
  code: string;
  offset: number;
  line: number;
  column: number;
}

export type JsonAnalysisResult =
  | { ok: true; value: JsonValue }
  | { ok: false; failure: JsonDecodeFailure };

// Any reported parse error, including trailing content, fails the decode.
export function analyzeJsonText(text: string, options: ParseOptions = strictParseOptions): JsonAnalysisResult {
  const errors: ParseError[] = [];
  let root: Node | undefined;
  try {
    root = parseTree(text, errors, options);
  } catch (error) {
    if (error instanceof RangeError) {
      return { ok: false, failure: toFailure(text, NESTING_TOO_DEEP, 0) };
    }
    throw error;
  }
  const [first] = errors;

  if (first) {
    return { ok: false, failure: toFailure(text, printParseErrorCode(first.error), first.offset) };
  }
  if (!root) {
    return { ok: false, failure: toFailure(text, 'ValueExpected', 0) };
  }
  const tooDeep = findTooDeep(root);
  if (tooDeep) {
    return { ok: false, failure: toFailure(text, NESTING_TOO_DEEP, tooDeep.offset) };
  }
  return { ok: true, value: fromNode(root, text) };
}

// Iterative walk; the tree may be deeper than the call stack.
function findTooDeep(root: Node): Node | undefined {
  const pending: { node: Node; depth: number }[] = [{ node: root, depth: 0 }];
  for (let item = pending.pop(); item; item = pending.pop()) {
    const { node } = item;
    const depth = node.type === 'object' || node.type === 'array' ? item.depth + 1 : item.depth;
    if (depth > MAX_NESTING_DEPTH) {
      return node;
    }
    node.children?.forEach((child) => pending.push({ node: child, depth }));
  }
  return undefined;
}

/**
 * Formats a failure as `<code> at <line>:<column>`. `lineOffset` shifts the
 * line when the decoded text was cut from a larger input.
 */
export function formatDecodeFailure(failure: JsonDecodeFailure, lineOffset = 0): string {
  return `${failure.code} at ${failure.line + lineOffset}:${failure.column}`;
}

function toFailure(text: string, code: string, offset: number): JsonDecodeFailure {
  const { line, column } = toLineColumn(text, offset);
  return { code, offset, line, column };
}

function toLineColumn(text: string, offset: number) {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);

  for (let index = 0; index < end; index += 1) {
    const char = text[index];
    if (char === '\n' || (char === '\r' && text[index + 1] !== '\n')) {
      line += 1;
      lineStart = index + 1;
    }
  }

  return { line, column: offset - lineStart + 1 };
}
