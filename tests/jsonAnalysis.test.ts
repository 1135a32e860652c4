import { describe, expect, it } from 'vitest';
import { analyzeJsonText, formatDecodeFailure, MAX_NESTING_DEPTH, NESTING_TOO_DEEP } from '../src/jsonAnalysis';
import { toPlain } from '../src/jsonValue';

describe('analyzeJsonText', () => {
  it('decodes a complete document', () => {
    const result = analyzeJsonText('{"name": "Ada", "tags": ["x", 1, true, null]}');

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(toPlain(result.value)).toEqual({ name: 'Ada', tags: ['x', 1, true, null] });
    }
  });

  it('reports the position of the first error', () => {
    const result = analyzeJsonText('[1,');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.code).toBe('ValueExpected');
      expect(formatDecodeFailure(result.failure)).toBe('ValueExpected at 1:4');
    }
  });

  it('rejects content after the first value', () => {
    const result = analyzeJsonText('{"a":1}{"b":2}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(formatDecodeFailure(result.failure)).toBe('EndOfFileExpected at 1:8');
    }
  });

  it('rejects empty text', () => {
    expect(analyzeJsonText('').ok).toBe(false);
    expect(analyzeJsonText('   ').ok).toBe(false);
  });

  it('rejects comments and trailing commas', () => {
    expect(analyzeJsonText('[1, 2,]').ok).toBe(false);
    expect(analyzeJsonText('// note\n[1]').ok).toBe(false);
  });

  it('rejects nesting past the depth limit', () => {
    const atLimit = analyzeJsonText(`${'['.repeat(MAX_NESTING_DEPTH)}${']'.repeat(MAX_NESTING_DEPTH)}`);
    const pastLimit = analyzeJsonText(`${'['.repeat(600)}${']'.repeat(600)}`);

    expect(atLimit.ok).toBe(true);
    expect(pastLimit.ok).toBe(false);
    if (!pastLimit.ok) {
      expect(formatDecodeFailure(pastLimit.failure)).toBe('NestingTooDeep at 1:513');
    }
  });

  it('reports very deep nesting instead of overflowing the stack', () => {
    const result = analyzeJsonText(`${'['.repeat(20000)}${']'.repeat(20000)}`);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.code).toBe(NESTING_TOO_DEEP);
    }
  });

  it('keeps the source text of numbers', () => {
    const result = analyzeJsonText('[12345678901234567890, -0.0]');

    expect(result.ok).toBe(true);
    if (result.ok && result.value.kind === 'array') {
      expect(result.value.items).toEqual([
        { kind: 'number', value: 12345678901234567890, text: '12345678901234567890' },
        { kind: 'number', value: -0, text: '-0.0' }
      ]);
    }
  });

  it('shifts the reported line by the given offset', () => {
    const result = analyzeJsonText('[1,');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(formatDecodeFailure(result.failure, 4)).toBe('ValueExpected at 5:4');
    }
  });
});

describe('toPlain', () => {
  it('keeps "__proto__" as an ordinary key', () => {
    const result = analyzeJsonText('{"__proto__": {"polluted": true}}');

    expect(result.ok).toBe(true);
    if (result.ok) {
      const plain = toPlain(result.value);
      expect(Object.getPrototypeOf(plain)).toBe(Object.prototype);
      expect(Object.prototype.hasOwnProperty.call(plain, '__proto__')).toBe(true);
      expect('polluted' in {}).toBe(false);
    }
  });
});
