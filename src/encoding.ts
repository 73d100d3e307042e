const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function isStrictBase64(s: string): boolean {
  return BASE64_PATTERN.test(s);
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

/**
 * Decode standard padded base64. Returns null instead of the lenient
 * Buffer behaviour (which skips unknown characters) on malformed input.
 */
export function decodeBase64(s: string): Uint8Array | null {
  if (!isStrictBase64(s)) return null;
  return new Uint8Array(Buffer.from(s, 'base64'));
}

/** Public-data equality (key fingerprints, not secrets). */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return Buffer.from(a).equals(Buffer.from(b));
}
