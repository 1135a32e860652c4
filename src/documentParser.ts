import { analyzeJsonText, formatDecodeFailure } from './jsonAnalysis';
import type { DocumentSet, JsonDocument } from './jsonValue';

export type InputMode = 'document' | 'lines';

export interface InputAnalysis {
  mode: InputMode;
  documents: DocumentSet;
}

export function parseDocuments(rawText: string): DocumentSet {
  return analyzeInput(rawText).documents;
}

/**
 * Classifies raw input as one JSON document or as JSON Lines.
 *
 * The whole text is tried first. Only when it fails to decode is each
 * non-blank line decoded on its own; a line that fails becomes a
 * `lineError` document numbered by its physical line.
 */
export function analyzeInput(rawText: string): InputAnalysis {
  const whole = analyzeJsonText(rawText);
  if (whole.ok) {
    return { mode: 'document', documents: [{ kind: 'parsed', value: whole.value }] };
  }

  const documents: JsonDocument[] = [];
  rawText.split(/\r\n|\n|\r/).forEach((line, index) => {
    if (!line.trim()) {
      return;
    }

    const lineNumber = index + 1;
    const result = analyzeJsonText(line);
    if (result.ok) {
      documents.push({ kind: 'parsed', value: result.value });
      return;
    }

    documents.push({
      kind: 'lineError',
      lineNumber,
      rawText: line,
      message: formatDecodeFailure(result.failure, lineNumber - 1)
    });
  });

  return { mode: 'lines', documents };
}

export function countLineErrors(documents: DocumentSet): number {
  return documents.filter((document) => document.kind === 'lineError').length;
}
