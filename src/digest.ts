import { createHash } from 'crypto';
import type { JsonValue } from './types/json.js';
import { canonicalBytes } from './canonical.js';

/** SHA-256 of canonical bytes. Always 32 bytes. */
export function digest(bytes: Uint8Array): Uint8Array {
  return new Uint8Array(createHash('sha256').update(bytes).digest());
}

export function digestRecord(record: JsonValue): Uint8Array {
  return digest(canonicalBytes(record));
}

export function digestHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}
