import { describe, it, expect } from 'vitest';
import {
  canonicalString,
  canonicalBytes,
  compareKeys,
  formatCanonicalNumber,
  quoteString,
} from '../src/canonical.js';
import { EncodingError } from '../src/errors.js';
import type { OracleRecord } from '../src/types/json.js';
import { loadGoldenVectors } from './helpers.js';

const golden = loadGoldenVectors();

describe('canonicalString', () => {
  it('produces deterministic output', () => {
    const result1 = canonicalString(golden.nested.record);
    const result2 = canonicalString(golden.nested.record);
    expect(result1).toBe(result2);
  });

  it('matches golden canonical string for a flat record', () => {
    expect(canonicalString(golden.flat.record)).toBe(golden.flat.canonical);
  });

  it('matches golden canonical string for a nested record', () => {
    expect(canonicalString(golden.nested.record)).toBe(golden.nested.canonical);
  });

  it('is independent of key insertion order', () => {
    const a: OracleRecord = { id: '1', label: 'POSITIVE', score: 0.87 };
    const b: OracleRecord = { score: 0.87, id: '1', label: 'POSITIVE' };
    const c: OracleRecord = { label: 'POSITIVE', score: 0.87, id: '1' };
    expect(canonicalString(a)).toBe(canonicalString(b));
    expect(canonicalString(b)).toBe(canonicalString(c));
  });

  it('sorts nested keys at every level', () => {
    const result = canonicalString({ b: { d: 1, c: 2 }, a: [{ z: 1, y: { q: 0, p: 0 } }] });
    expect(result).toBe('{"a":[{"y":{"p":0,"q":0},"z":1}],"b":{"c":2,"d":1}}');
  });

  it('preserves array order', () => {
    expect(canonicalString({ items: [3, 1, 2] })).toBe('{"items":[3,1,2]}');
  });

  it('has exactly one rendering for null, {} and []', () => {
    expect(canonicalString(null)).toBe('null');
    expect(canonicalString({})).toBe('{}');
    expect(canonicalString([])).toBe('[]');
    expect(canonicalString({ a: {}, b: [], c: null })).toBe('{"a":{},"b":[],"c":null}');
  });

  it('renders booleans as literals', () => {
    expect(canonicalString([true, false])).toBe('[true,false]');
  });

  it('orders keys by code point rather than UTF-16 unit', () => {
    // U+E000 < U+1F600 by code point, but its UTF-16 unit sorts after the surrogate pair
    const record: OracleRecord = { '\u{1F600}': 1, '\uE000': 2, b: 3, B: 4 };
    expect(canonicalString(record)).toBe('{"B":4,"b":3,"\uE000":2,"\u{1F600}":1}');
  });

  it('throws EncodingError with the location of NaN', () => {
    const bad: OracleRecord = { id: '1', nested: { values: [1, Number.NaN] } };
    expect(() => canonicalString(bad)).toThrow(EncodingError);
    try {
      canonicalString(bad);
    } catch (err) {
      expect(err).toBeInstanceOf(EncodingError);
      if (err instanceof EncodingError) {
        expect(err.path).toBe('$.nested.values[1]');
      }
    }
  });

  it('throws on Infinity', () => {
    expect(() => canonicalString({ score: Number.POSITIVE_INFINITY })).toThrow(
      'Non-finite number Infinity cannot be canonicalized at $.score',
    );
  });

  it('throws on undefined members instead of dropping them', () => {
    const bad = { id: '1', label: undefined };
    expect(() => canonicalString(bad as unknown as OracleRecord)).toThrow('Unexpected undefined at $.label');
  });

  it('throws on non-plain objects', () => {
    const bad = { when: new Date(0) };
    expect(() => canonicalString(bad as unknown as OracleRecord)).toThrow('Unsupported Date value at $.when');
  });

  it('throws on holes in sparse arrays', () => {
    const sparse: unknown[] = [];
    sparse[1] = 1;
    const bad = { a: sparse };
    expect(() => canonicalString(bad as unknown as OracleRecord)).toThrow(EncodingError);
    expect(() => canonicalString(bad as unknown as OracleRecord)).toThrow('Unexpected undefined at $.a[0]');
  });

  it('throws on bigint', () => {
    const bad = { n: 10n };
    expect(() => canonicalString(bad as unknown as OracleRecord)).toThrow('Unsupported type bigint at $.n');
  });
});

describe('formatCanonicalNumber', () => {
  const table: ReadonlyArray<readonly [number, string]> = [
    [0, '0'],
    [-0, '0'],
    [1.0, '1'],
    [0.87, '0.87'],
    [-12.5, '-12.5'],
    [100, '100'],
    [1e21, '1000000000000000000000'],
    [1.2345e25, '12345000000000000000000000'],
    [1.5e-7, '0.00000015'],
    [-2.5e-8, '-0.000000025'],
    [0.000001, '0.000001'],
    [123456789012345680000, '123456789012345680000'],
  ];

  for (const [input, expected] of table) {
    it(`renders ${String(input)} as ${expected}`, () => {
      expect(formatCanonicalNumber(input)).toBe(expected);
    });
  }

  it('never uses exponent notation', () => {
    expect(formatCanonicalNumber(5e-324)).not.toContain('e');
    expect(formatCanonicalNumber(1.7976931348623157e308)).not.toContain('e');
  });
});

describe('quoteString', () => {
  it('applies the short escapes', () => {
    expect(quoteString('a"b\\c\b\f\n\r\t')).toBe('"a\\"b\\\\c\\b\\f\\n\\r\\t"');
  });

  it('escapes other control characters as lowercase \\u', () => {
    expect(quoteString('\u0000\u001f')).toBe('"\\u0000\\u001f"');
  });

  it('writes non-ASCII and DEL literally', () => {
    expect(quoteString('é€\u007f🚀')).toBe('"é€\u007f🚀"');
  });

  it('escapes lone surrogates', () => {
    expect(quoteString('x\ud800y\udc00')).toBe('"x\\ud800y\\udc00"');
  });

  it('does not escape forward slash', () => {
    expect(quoteString('a/b')).toBe('"a/b"');
  });
});

describe('compareKeys', () => {
  it('sorts ASCII by byte value', () => {
    expect(['b', 'a', 'B', '_', 'ab'].sort(compareKeys)).toEqual(['B', '_', 'a', 'ab', 'b']);
  });

  it('puts supplementary characters after the private use area', () => {
    expect(compareKeys('\u{1F600}', '\uE000')).toBeGreaterThan(0);
    expect(compareKeys('\uD7FF', '\u{10000}')).toBeLessThan(0);
  });
});

describe('canonicalBytes', () => {
  it('returns Uint8Array', () => {
    expect(canonicalBytes(golden.flat.record)).toBeInstanceOf(Uint8Array);
  });

  it('is the UTF-8 encoding of canonicalString', () => {
    const bytes = canonicalBytes(golden.nested.record);
    expect(bytes).toEqual(new TextEncoder().encode(golden.nested.canonical));
    expect(bytes.length).toBe(golden.nested.byteLength);
  });
});
