/**
 * Oracle Canonical JSON -- Specification
 *
 * A compact, dependency-free subset inspired by RFC 8785 (JCS).
 * This module documents the exact rules implemented by canonical.ts.
 *
 * Rules:
 *
 * 1. KEY ORDERING: Object keys are sorted by Unicode code point at every
 *    nesting level, recursively. Code point order is the order of the keys'
 *    UTF-8 bytes. (A lone surrogate sorts after every BMP character.)
 *
 * 2. ARRAY ORDERING: Arrays are order-preserving. Never sort array elements.
 *
 * 3. STRINGS: One fixed escaping table, nothing else is escaped:
 *      "  -> \"        \  -> \\
 *      U+0008 -> \b    U+000C -> \f    U+000A -> \n
 *      U+000D -> \r    U+0009 -> \t
 *      other U+0000..U+001F and lone surrogates -> \uXXXX (lowercase hex)
 *    Non-ASCII characters are written literally and encoded as UTF-8.
 *    No Unicode normalization: strings are serialized as given.
 *
 * 4. NUMBERS: Finite IEEE-754 doubles only. NaN and +/-Infinity throw.
 *    -0 renders as 0. Any other value renders as the shortest decimal that
 *    round-trips to the same double (the digits of ECMAScript
 *    Number::toString), with exponent notation expanded to positional form:
 *      1e21    -> 1000000000000000000000
 *      1.5e-7  -> 0.00000015
 *    No exponent, no leading "+", no trailing fractional zeros. An integral
 *    value has no fractional part, so 1.0 and 1 both render as 1.
 *
 * 5. LITERALS: true, false, null. null, {} and [] each have one rendering.
 *
 * 6. NO WHITESPACE: No spaces, no newlines. Compact JSON only.
 *
 * 7. REJECTED VALUES: undefined (including as an object property), bigint,
 *    functions, symbols and objects that are not plain objects or arrays
 *    (Date, Map, class instances) throw EncodingError with their location.
 */

/** Escapes applied by rule 3, in addition to \uXXXX for control characters. */
export const SHORT_ESCAPES: Readonly<Record<string, string>> = {
  '"': '\\"',
  '\\': '\\\\',
  '\b': '\\b',
  '\f': '\\f',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
} as const;

