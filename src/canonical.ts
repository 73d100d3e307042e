import type { JsonValue } from './types/json.js';
import { SHORT_ESCAPES } from './canonical-spec.js';
import { EncodingError } from './errors.js';

function unicodeEscape(unit: number): string {
  return `\\u${unit.toString(16).padStart(4, '0')}`;
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/** Quote a string using the fixed escaping table (rule 3). */
export function quoteString(value: string): string {
  let out = '"';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    const unit = value.charCodeAt(i);
    const short = SHORT_ESCAPES[ch];
    if (short !== undefined) {
      out += short;
    } else if (unit < 0x20) {
      out += unicodeEscape(unit);
    } else if (isHighSurrogate(unit) && isLowSurrogate(value.charCodeAt(i + 1))) {
      out += ch + value[i + 1];
      i++;
    } else if (isHighSurrogate(unit) || isLowSurrogate(unit)) {
      out += unicodeEscape(unit);
    } else {
      out += ch;
    }
  }
  return `${out}"`;
}

/** Expand "d.ddde±x" into positional notation. */
function expandExponent(text: string): string {
  const negative = text.startsWith('-');
  const unsigned = negative ? text.slice(1) : text;
  const [mantissa, exponentText] = unsigned.split('e');
  const exponent = Number(exponentText);
  const dot = mantissa.indexOf('.');
  const digits = mantissa.replace('.', '');
  const point = (dot === -1 ? mantissa.length : dot) + exponent;

  let expanded: string;
  if (point <= 0) {
    expanded = `0.${'0'.repeat(-point)}${digits}`;
  } else if (point >= digits.length) {
    expanded = digits + '0'.repeat(point - digits.length);
  } else {
    expanded = `${digits.slice(0, point)}.${digits.slice(point)}`;
  }
  return negative ? `-${expanded}` : expanded;
}

/**
 * Render a number under rule 4: shortest round-trip digits, never in
 * exponent form, -0 as 0. Throws on NaN and infinities.
 */
export function formatCanonicalNumber(value: number, path = '$'): string {
  if (!Number.isFinite(value)) {
    throw new EncodingError(`Non-finite number ${String(value)} cannot be canonicalized`, path);
  }
  if (value === 0) return '0';
  const text = String(value);
  return text.includes('e') ? expandExponent(text) : text;
}

/**
 * Order two keys by Unicode code point (equivalently, by UTF-8 bytes).
 * UTF-16 code unit order disagrees only between surrogates and U+E000..U+FFFF,
 * so surrogates are lifted above that range before comparing.
 */
export function compareKeys(a: string, b: string): number {
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const x = a.charCodeAt(i);
    const y = b.charCodeAt(i);
    if (x !== y) return codePointWeight(x) - codePointWeight(y);
  }
  return a.length - b.length;
}

function codePointWeight(unit: number): number {
  if (unit < 0xd800) return unit;
  return unit >= 0xe000 ? unit - 0x800 : unit + 0x2000;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Recursively canonicalize a value according to Oracle Canonical JSON rules.
 * - Object keys sorted by code point
 * - Arrays order-preserved
 * - Numbers in fixed positional form
 * - No whitespace
 */
function canonicalValue(value: unknown, path: string): string {
  if (value === null) return 'null';
  if (value === undefined) throw new EncodingError('Unexpected undefined', path);

  switch (typeof value) {
    case 'string':
      return quoteString(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return formatCanonicalNumber(value, path);
    case 'object': {
      if (Array.isArray(value)) {
        // indexed so a hole in a sparse array reaches the undefined check
        const items: string[] = [];
        for (let i = 0; i < value.length; i++) {
          const item: unknown = value[i];
          items.push(canonicalValue(item, `${path}[${i}]`));
        }
        return `[${items.join(',')}]`;
      }
      if (!isPlainObject(value)) {
        const kind = value.constructor?.name ?? 'object';
        throw new EncodingError(`Unsupported ${kind} value`, path);
      }
      const entries = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
      const pairs = entries.map(([k, v]) => `${quoteString(k)}:${canonicalValue(v, `${path}.${k}`)}`);
      return `{${pairs.join(',')}}`;
    }
    default:
      throw new EncodingError(`Unsupported type ${typeof value}`, path);
  }
}

/**
 * Produce the deterministic string that is hashed and signed.
 * Implements Oracle Canonical JSON (see canonical-spec.ts).
 */
export function canonicalString(value: JsonValue): string {
  return canonicalValue(value, '$');
}

/**
 * Convenience: canonicalString() encoded as UTF-8 via globalThis.TextEncoder.
 */
export function canonicalBytes(value: JsonValue): Uint8Array {
  const str = canonicalString(value);
  return new globalThis.TextEncoder().encode(str);
}
